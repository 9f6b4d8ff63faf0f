export const TOOL_NAMES = ["institutions", "hospitals", "restaurants", "web_search"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const DIRECTORY_TOOLS = ["institutions", "hospitals", "restaurants"] as const satisfies readonly ToolName[];

export type DirectoryToolName = (typeof DIRECTORY_TOOLS)[number];

export const QUESTION_TYPES = ["count", "list", "comparison", "filter", "general"] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export interface Query {
  original: string;
  normalized: string;
}

export type ToolScores = Record<ToolName, number>;

export interface RoutingDecision {
  readonly primaryTool: ToolName;
  readonly confidence: number;
  readonly questionType: QuestionType;
  readonly hasLocation: boolean;
  readonly location: string | null;
  readonly toolScores: Readonly<ToolScores>;
}

export interface ExecutionOutcome {
  success: boolean;
  usedFallback: boolean;
  resultEmpty: boolean;
  rawResult: string;
  sqlText?: string;
}

export interface ToolRunOptions {
  signal?: AbortSignal;
}

export interface QueryTool {
  readonly name: ToolName;
  run(query: Query, options?: ToolRunOptions): Promise<ExecutionOutcome>;
}

export type ToolMap = Record<ToolName, QueryTool>;

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export interface CacheEntry {
  key: string;
  query: string;
  tool: string;
  value: string;
  createdAt: number;
  ttlSeconds: number;
  hitCount: number;
  lastAccessed: number;
}

export type PersistedCacheRow = CacheEntry;

export interface PersistenceBackend {
  get(key: string): Promise<PersistedCacheRow | null>;
  set(row: PersistedCacheRow): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheStatistics {
  totalEntries: number;
  liveEntries: number;
  expiredEntries: number;
  averageHitCount: number;
  hits: number;
  misses: number;
  hitRate: number;
  maxEntries: number;
  popular: Array<{ query: string; tool: string; hitCount: number }>;
}

export type CacheEntryInfo =
  | { cached: false }
  | {
      cached: true;
      key: string;
      query: string;
      tool: string;
      createdAt: number;
      expiresAt: number;
      hitCount: number;
      lastAccessed: number;
      timeToExpiry: string;
    };

export type ConfidenceBand = "clean" | "complex" | "fallback" | "failed";

export interface ConfidenceFactors {
  routingConfidence: number;
  bandFloor: number;
  bandCeiling: number;
  success: boolean;
  usedFallback: boolean;
  resultEmpty: boolean;
}

export interface ConfidenceComputation {
  score: number;
  band: ConfidenceBand;
  factors: ConfidenceFactors;
}

export interface ToolRecommendation {
  tool: ToolName;
  score: number;
  share: number;
}
