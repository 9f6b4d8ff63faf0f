import { ExecutionOutcome, Query, QueryTool, ToolRunOptions } from "../routing/types";
import { describeError } from "../utils";

async function runSafely(tool: QueryTool, query: Query, options?: ToolRunOptions): Promise<ExecutionOutcome> {
  try {
    return await tool.run(query, options);
  } catch (error) {
    console.warn(`${tool.name} threw: ${describeError(error)}`);
    return { success: false, usedFallback: false, resultEmpty: true, rawResult: describeError(error) };
  }
}

/**
 * Wraps a domain tool so that a failed or empty answer is retried once against
 * web search. usedFallback is set only when web search supplied the answer;
 * otherwise the domain tool's own outcome is returned.
 */
export function withWebFallback(primary: QueryTool, web: QueryTool): QueryTool {
  return {
    name: primary.name,
    async run(query: Query, options?: ToolRunOptions): Promise<ExecutionOutcome> {
      const outcome = await runSafely(primary, query, options);
      if ((outcome.success && !outcome.resultEmpty) || options?.signal?.aborted) {
        return outcome;
      }

      const webOutcome = await runSafely(web, query, options);
      if (webOutcome.success && !webOutcome.resultEmpty) {
        return { ...webOutcome, usedFallback: true, sqlText: outcome.sqlText };
      }
      return outcome;
    }
  };
}
