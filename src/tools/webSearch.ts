import { z } from "zod";
import { ExecutionOutcome, Query, QueryTool, ToolRunOptions } from "../routing/types";
import { describeError, fetchJson } from "../utils";

export interface WebSearchOptions {
  apiKey?: string;
  engine?: "google" | "google_news";
  numResults?: number;
  baseUrl?: string;
}

export interface WebSearchResult {
  title: string;
  snippet?: string;
  link?: string;
}

const SERPAPI_URL = "https://serpapi.com/search.json";

const SerpItemSchema = z.object({
  title: z.string(),
  snippet: z.string().optional(),
  link: z.string().optional()
});

const SerpPayloadSchema = z.object({
  answer_box: z.object({ answer: z.string().optional(), snippet: z.string().optional() }).optional(),
  organic_results: z.array(z.unknown()).optional(),
  news_results: z.array(z.unknown()).optional()
});

export function parseSearchResults(payload: unknown): WebSearchResult[] {
  const parsed = SerpPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return [];
  }
  const results: WebSearchResult[] = [];
  const answer = parsed.data.answer_box?.answer ?? parsed.data.answer_box?.snippet;
  if (answer) {
    results.push({ title: "Answer", snippet: answer });
  }
  for (const item of [...(parsed.data.organic_results ?? []), ...(parsed.data.news_results ?? [])]) {
    const result = SerpItemSchema.safeParse(item);
    if (result.success) {
      results.push(result.data);
    }
  }
  return results;
}

export function formatSearchResults(query: string, results: WebSearchResult[], limit = 5): string {
  const lines = results.slice(0, limit).map((result, index) => {
    const snippet = result.snippet ? ` - ${result.snippet}` : "";
    const link = result.link ? ` (${result.link})` : "";
    return `${index + 1}. ${result.title}${snippet}${link}`;
  });
  return [`Web search results for "${query}":`, ...lines].join("\n");
}

function failure(message: string): ExecutionOutcome {
  return { success: false, usedFallback: false, resultEmpty: true, rawResult: message };
}

export function createWebSearchTool({
  apiKey,
  engine = "google",
  numResults = 5,
  baseUrl = SERPAPI_URL
}: WebSearchOptions = {}): QueryTool {
  return {
    name: "web_search",
    async run(query: Query, { signal }: ToolRunOptions = {}): Promise<ExecutionOutcome> {
      if (query.original.length === 0) {
        return failure("Web search needs a non-empty question");
      }
      if (!apiKey) {
        return failure("Web search is not configured (SERPAPI_KEY is missing)");
      }

      try {
        const payload = await fetchJson(
          baseUrl,
          { params: { api_key: apiKey, engine, q: query.original, num: numResults }, timeout: 15_000, signal },
          { retries: 1 }
        );
        const results = parseSearchResults(payload);
        if (results.length === 0) {
          return {
            success: true,
            usedFallback: false,
            resultEmpty: true,
            rawResult: `No web results found for "${query.original}".`
          };
        }
        return {
          success: true,
          usedFallback: false,
          resultEmpty: false,
          rawResult: formatSearchResults(query.original, results, numResults)
        };
      } catch (error) {
        console.warn(`Web search failed: ${describeError(error)}`);
        return failure(`Web search failed: ${describeError(error)}`);
      }
    }
  };
}
