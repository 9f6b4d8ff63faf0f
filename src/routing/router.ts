import { z } from "zod";
import {
  DeadlineExceededError,
  OperationAbortedError,
  describeError,
  roundTo,
  safeJsonParse,
  toQuery,
  withDeadline
} from "../utils";
import { RoutingConfig, createRoutingConfig } from "./config";
import { scoreOutcome } from "./confidence";
import { explainRouting, recommendTools } from "./explain";
import { classifyQuery } from "./queryClassifier";
import { ResultCache } from "./resultCache";
import {
  CacheEntryInfo,
  CacheStatistics,
  Clock,
  ExecutionOutcome,
  Query,
  QuestionType,
  RoutingDecision,
  TOOL_NAMES,
  ToolMap,
  ToolName,
  ToolRecommendation,
  systemClock
} from "./types";

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface QueryRouterOptions {
  tools: ToolMap;
  cache: ResultCache;
  config?: RoutingConfig;
  cacheEnabled?: boolean;
  cacheTtlSeconds?: number;
  toolTimeoutMs?: number;
  clock?: Clock;
}

export interface AnswerOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface AnswerResult {
  query: string;
  response: string;
  toolUsed: ToolName;
  routingConfidence: number;
  resultConfidence: number;
  cached: boolean;
  cacheHits: number;
  questionType: QuestionType;
  sqlText: string | null;
  executionTimeMs: number;
}

export interface CompoundAnswerResult extends Omit<AnswerResult, "toolUsed" | "questionType" | "sqlText"> {
  toolUsed: "multiple";
  parts: AnswerResult[];
}

export interface RoutingExplanation {
  decision: RoutingDecision;
  explanation: string;
  recommendations: ToolRecommendation[];
}

const CachedAnswerSchema = z.object({
  response: z.string(),
  toolUsed: z.enum(TOOL_NAMES),
  resultConfidence: z.number().min(0).max(1),
  sqlText: z.string().nullable()
});

type CachedAnswer = z.infer<typeof CachedAnswerSchema>;

interface ToolExecution {
  outcome: ExecutionOutcome;
  interrupted: boolean;
}

export function splitQuestions(text: string): string[] {
  return text
    .split("?")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Classifies a question, serves it from the result cache when possible and
 * otherwise runs the selected tool under a deadline, scores the outcome and
 * caches it.
 */
export class QueryRouter {
  private readonly config: RoutingConfig;

  private readonly tools: ToolMap;

  private readonly cache: ResultCache;

  private readonly cacheEnabled: boolean;

  private readonly cacheTtlSeconds: number | undefined;

  private readonly toolTimeoutMs: number;

  private readonly clock: Clock;

  constructor(options: QueryRouterOptions) {
    for (const name of TOOL_NAMES) {
      const tool = options.tools[name];
      if (!tool || tool.name !== name) {
        throw new Error(`Tool map entry "${name}" is missing or registered under another name`);
      }
    }
    this.tools = { ...options.tools };
    this.cache = options.cache;
    this.config = options.config ?? createRoutingConfig();
    this.cacheEnabled = options.cacheEnabled ?? true;
    this.cacheTtlSeconds = options.cacheTtlSeconds;
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
  }

  route(query: string): RoutingDecision {
    return classifyQuery(query, this.config);
  }

  explain(query: string): RoutingExplanation {
    const decision = this.route(query);
    return {
      decision,
      explanation: explainRouting(query, decision),
      recommendations: recommendTools(decision, this.config)
    };
  }

  async answer(rawQuery: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const startedAt = this.clock.now();
    const query = toQuery(rawQuery);
    const decision = this.route(rawQuery);

    const hit = await this.lookup(query, decision.primaryTool);
    if (hit) {
      return {
        query: query.original,
        response: hit.answer.response,
        toolUsed: hit.answer.toolUsed,
        routingConfidence: decision.confidence,
        resultConfidence: hit.answer.resultConfidence,
        cached: true,
        cacheHits: hit.hitCount,
        questionType: decision.questionType,
        sqlText: hit.answer.sqlText,
        executionTimeMs: this.clock.now() - startedAt
      };
    }

    const { outcome, interrupted } = await this.execute(decision.primaryTool, query, options);
    const { score } = scoreOutcome(decision, outcome);
    const answer: CachedAnswer = {
      response: outcome.success ? outcome.rawResult : describeFailure(decision.primaryTool, outcome),
      toolUsed: outcome.usedFallback ? this.config.fallbackTool : decision.primaryTool,
      resultConfidence: score,
      sqlText: outcome.sqlText ?? null
    };

    if (this.cacheEnabled && !interrupted && outcome.success && !outcome.resultEmpty) {
      await this.store(query, decision.primaryTool, answer);
    }

    return {
      query: query.original,
      ...answer,
      routingConfidence: decision.confidence,
      cached: false,
      cacheHits: 0,
      questionType: decision.questionType,
      executionTimeMs: this.clock.now() - startedAt
    };
  }

  /** Answers every "?"-separated question in `rawQuery` and combines the results. */
  async answerCompound(rawQuery: string, options: AnswerOptions = {}): Promise<AnswerResult | CompoundAnswerResult> {
    const questions = splitQuestions(rawQuery);
    if (questions.length < 2) {
      return this.answer(rawQuery, options);
    }

    const startedAt = this.clock.now();
    const parts: AnswerResult[] = [];
    for (const question of questions) {
      parts.push(await this.answer(question, options));
    }

    return {
      query: rawQuery.trim(),
      response: parts.map((part, index) => `**Query ${index + 1}: ${part.query}**\n\n${part.response}`).join("\n\n"),
      toolUsed: "multiple",
      routingConfidence: 0,
      resultConfidence: roundTo(parts.reduce((sum, part) => sum + part.resultConfidence, 0) / parts.length, 2),
      cached: parts.some((part) => part.cached),
      cacheHits: parts.reduce((sum, part) => sum + part.cacheHits, 0),
      executionTimeMs: this.clock.now() - startedAt,
      parts
    };
  }

  async answerBatch(queries: string[], options: AnswerOptions = {}): Promise<AnswerResult[]> {
    const results: AnswerResult[] = [];
    for (const query of queries) {
      results.push(await this.answer(query, options));
    }
    return results;
  }

  cacheStats(): Promise<CacheStatistics> {
    return this.cache.statistics();
  }

  cacheClearAll(): Promise<number> {
    return this.cache.clearAll();
  }

  cacheClearExpired(): Promise<number> {
    return this.cache.invalidateExpired();
  }

  /** Looks up the cache entry a question would hit, by default under the tool it routes to. */
  cacheInfo(rawQuery: string, tool?: ToolName): Promise<CacheEntryInfo> {
    return this.cache.info(toQuery(rawQuery).normalized, tool ?? this.route(rawQuery).primaryTool);
  }

  private async lookup(query: Query, tool: ToolName): Promise<{ answer: CachedAnswer; hitCount: number } | null> {
    if (!this.cacheEnabled) {
      return null;
    }
    try {
      const entry = await this.cache.get(query.normalized, tool);
      if (!entry) {
        return null;
      }
      const parsed = CachedAnswerSchema.safeParse(safeJsonParse(entry.value));
      if (!parsed.success) {
        console.warn(`Discarding unreadable cache entry ${entry.key}`);
        await this.cache.invalidate(query.normalized, tool);
        return null;
      }
      return { answer: parsed.data, hitCount: entry.hitCount };
    } catch (error) {
      console.warn(`Cache lookup failed, continuing without cache: ${describeError(error)}`);
      return null;
    }
  }

  private async store(query: Query, tool: ToolName, answer: CachedAnswer): Promise<void> {
    try {
      await this.cache.set(query.normalized, tool, JSON.stringify(answer), this.cacheTtlSeconds);
    } catch (error) {
      console.warn(`Cache store failed, returning uncached result: ${describeError(error)}`);
    }
  }

  private async execute(toolName: ToolName, query: Query, options: AnswerOptions): Promise<ToolExecution> {
    const tool = this.tools[toolName];
    try {
      const outcome = await withDeadline((signal) => tool.run(query, { signal }), {
        timeoutMs: options.timeoutMs ?? this.toolTimeoutMs,
        signal: options.signal
      });
      return { outcome, interrupted: false };
    } catch (error) {
      if (error instanceof DeadlineExceededError || error instanceof OperationAbortedError) {
        console.warn(`Tool ${toolName} interrupted: ${error.message}`);
        return { outcome: failedOutcome(error.message), interrupted: true };
      }
      console.error(`Tool ${toolName} failed`, error);
      return { outcome: failedOutcome(describeError(error)), interrupted: false };
    }
  }
}

function failedOutcome(message: string): ExecutionOutcome {
  return { success: false, usedFallback: false, resultEmpty: true, rawResult: message };
}

function describeFailure(tool: ToolName, outcome: ExecutionOutcome): string {
  const detail = outcome.rawResult.trim().length > 0 ? outcome.rawResult.trim() : "no details were reported";
  return `Sorry, the ${tool} lookup could not produce an answer (${detail}). Try rephrasing the question or ask again later.`;
}
