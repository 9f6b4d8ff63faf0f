import type { Queryable } from "../routing/cacheBackends";
import type { RoutingConfig } from "../routing/config";
import { ToolMap } from "../routing/types";
import { createDirectoryTool } from "./directory";
import { withWebFallback } from "./fallback";
import { WebSearchOptions, createWebSearchTool } from "./webSearch";

export interface ToolRegistryOptions {
  db: Queryable;
  config: RoutingConfig;
  webSearch?: WebSearchOptions;
}

/** Directory tools fall back to web search; web search stands alone. */
export function createToolRegistry({ db, config, webSearch }: ToolRegistryOptions): ToolMap {
  const web = createWebSearchTool(webSearch);
  return {
    institutions: withWebFallback(createDirectoryTool("institutions", db, config), web),
    hospitals: withWebFallback(createDirectoryTool("hospitals", db, config), web),
    restaurants: withWebFallback(createDirectoryTool("restaurants", db, config), web),
    web_search: web
  };
}
