import { z } from "zod";
import rawLexicon from "./lexicon.json";
import { normalizeQuery, tokenize } from "../utils";
import { QuestionType, TOOL_NAMES, ToolName } from "./types";

const WeightedTermSchema = z.object({
  term: z.string().min(1),
  weight: z.number().positive()
});

const LexiconSchema = z.object({
  tools: z.object({
    institutions: z.array(WeightedTermSchema),
    hospitals: z.array(WeightedTermSchema),
    restaurants: z.array(WeightedTermSchema),
    web_search: z.array(WeightedTermSchema)
  }),
  questionTypes: z.array(
    z.object({
      type: z.enum(["count", "list", "comparison", "filter"]),
      phrases: z.array(z.string().min(1)).min(1)
    })
  ),
  gazetteer: z.array(z.string().min(1)),
  locationLinks: z.array(z.string().min(1))
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export interface LexiconPhrase {
  text: string;
  tokens: readonly string[];
}

export interface WeightedKeyword extends LexiconPhrase {
  weight: number;
}

export interface Place extends LexiconPhrase {
  name: string;
}

export interface QuestionPattern {
  type: Exclude<QuestionType, "general">;
  phrases: readonly LexiconPhrase[];
}

export interface RoutingConfig {
  readonly keywords: Readonly<Record<ToolName, readonly WeightedKeyword[]>>;
  readonly questionPatterns: readonly QuestionPattern[];
  readonly gazetteer: readonly Place[];
  readonly locationLinks: readonly string[];
  readonly positionalBonus: number;
  readonly toolPriority: readonly ToolName[];
  readonly fallbackTool: ToolName;
  readonly minRoutingConfidence: number;
  readonly maxRoutingConfidence: number;
}

export interface RoutingConfigOverrides {
  lexicon?: unknown;
  positionalBonus?: number;
  toolPriority?: readonly ToolName[];
}

export const DEFAULT_POSITIONAL_BONUS = 0.5;
export const DEFAULT_TOOL_PRIORITY: readonly ToolName[] = ["institutions", "hospitals", "restaurants", "web_search"];

/**
 * Builds the immutable routing configuration once at startup. Every phrase is
 * normalized and tokenized here so the classifier only compares token arrays.
 */
export function createRoutingConfig(overrides: RoutingConfigOverrides = {}): RoutingConfig {
  const parsed = LexiconSchema.safeParse(overrides.lexicon ?? rawLexicon);
  if (!parsed.success) {
    throw new Error(`Invalid routing lexicon: ${JSON.stringify(parsed.error.format())}`);
  }
  const lexicon = parsed.data;

  const keywords: Record<ToolName, WeightedKeyword[]> = {
    institutions: toKeywords(lexicon.tools.institutions),
    hospitals: toKeywords(lexicon.tools.hospitals),
    restaurants: toKeywords(lexicon.tools.restaurants),
    web_search: toKeywords(lexicon.tools.web_search)
  };

  const unknownPriority = (overrides.toolPriority ?? []).filter((tool) => !TOOL_NAMES.includes(tool));
  if (unknownPriority.length > 0) {
    throw new Error(`Unknown tools in priority order: ${unknownPriority.join(", ")}`);
  }

  const config: RoutingConfig = {
    keywords,
    questionPatterns: lexicon.questionTypes.map((pattern) => ({
      type: pattern.type,
      phrases: pattern.phrases.map(toPhrase)
    })),
    gazetteer: lexicon.gazetteer.map((name) => ({ ...toPhrase(name), name })),
    locationLinks: lexicon.locationLinks.map(normalizeQuery),
    positionalBonus: overrides.positionalBonus ?? DEFAULT_POSITIONAL_BONUS,
    toolPriority: overrides.toolPriority ?? DEFAULT_TOOL_PRIORITY,
    fallbackTool: "web_search",
    minRoutingConfidence: 0.05,
    maxRoutingConfidence: 0.95
  };

  return deepFreeze(config);
}

function toKeywords(entries: Lexicon["tools"][ToolName]): WeightedKeyword[] {
  return entries.map((entry) => ({ ...toPhrase(entry.term), weight: entry.weight }));
}

function toPhrase(text: string): LexiconPhrase {
  const normalized = normalizeQuery(text);
  return { text: normalized, tokens: tokenize(normalized) };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
}
