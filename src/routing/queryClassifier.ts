import { clamp, findPhrase, tokenize, toQuery } from "../utils";
import type { Place, RoutingConfig, WeightedKeyword } from "./config";
import { QuestionType, RoutingDecision, TOOL_NAMES, ToolName, ToolScores } from "./types";

const SCORE_EPSILON = 1e-9;

export interface KeywordHit {
  tool: ToolName;
  keyword: WeightedKeyword;
  start: number;
  end: number;
}

export interface LocationMatch {
  place: Place;
  start: number;
  end: number;
}

export function classifyQuery(rawQuery: string, config: RoutingConfig): RoutingDecision {
  const query = toQuery(typeof rawQuery === "string" ? rawQuery : "");
  const tokens = tokenize(query.normalized);

  const hits = collectKeywordHits(tokens, config);
  const toolScores = scoreTools(tokens, hits, config);
  const questionType = detectQuestionType(tokens, config);
  const location = detectLocation(tokens, config);
  const primaryTool = pickPrimaryTool(toolScores, hits, location, tokens, config);
  const confidence = computeRoutingConfidence(toolScores, primaryTool, config);

  return Object.freeze({
    primaryTool,
    confidence,
    questionType,
    hasLocation: location !== null,
    location: location?.place.name ?? null,
    toolScores: Object.freeze(toolScores)
  }) satisfies RoutingDecision;
}

export function collectKeywordHits(tokens: readonly string[], config: RoutingConfig): KeywordHit[] {
  const hits: KeywordHit[] = [];
  for (const tool of TOOL_NAMES) {
    for (const keyword of config.keywords[tool]) {
      const start = findPhrase(tokens, keyword.tokens);
      if (start >= 0) {
        hits.push({ tool, keyword, start, end: start + keyword.tokens.length });
      }
    }
  }
  return hits;
}

function scoreTools(tokens: readonly string[], hits: readonly KeywordHit[], config: RoutingConfig): ToolScores {
  const scores: ToolScores = { institutions: 0, hospitals: 0, restaurants: 0, web_search: 0 };
  const leadingThird = tokens.length / 3;
  for (const hit of hits) {
    scores[hit.tool] += hit.keyword.weight;
    if (hit.start < leadingThird) {
      scores[hit.tool] += config.positionalBonus;
    }
  }
  return scores;
}

export function detectQuestionType(tokens: readonly string[], config: RoutingConfig): QuestionType {
  for (const pattern of config.questionPatterns) {
    if (pattern.phrases.some((phrase) => findPhrase(tokens, phrase.tokens) >= 0)) {
      return pattern.type;
    }
  }
  return "general";
}

/** Longest gazetteer span wins; the earliest one among equally long spans. */
export function detectLocation(tokens: readonly string[], config: RoutingConfig): LocationMatch | null {
  let best: LocationMatch | null = null;
  for (const place of config.gazetteer) {
    const start = findPhrase(tokens, place.tokens);
    if (start < 0) {
      continue;
    }
    const candidate: LocationMatch = { place, start, end: start + place.tokens.length };
    if (
      !best ||
      place.tokens.length > best.place.tokens.length ||
      (place.tokens.length === best.place.tokens.length && start < best.start)
    ) {
      best = candidate;
    }
  }
  return best;
}

function pickPrimaryTool(
  scores: ToolScores,
  hits: readonly KeywordHit[],
  location: LocationMatch | null,
  tokens: readonly string[],
  config: RoutingConfig
): ToolName {
  const max = Math.max(...TOOL_NAMES.map((tool) => scores[tool]));
  if (max <= 0) {
    return config.fallbackTool;
  }

  let tied = TOOL_NAMES.filter((tool) => Math.abs(scores[tool] - max) < SCORE_EPSILON);
  if (tied.length > 1 && location) {
    const qualified = tied.filter((tool) =>
      hits.some((hit) => hit.tool === tool && isQualifiedByLocation(hit, location, tokens, config))
    );
    if (qualified.length > 0) {
      tied = qualified;
    }
  }

  return orderByPriority(tied, config)[0] ?? config.fallbackTool;
}

/**
 * A keyword is location-qualified when the detected place follows it
 * directly ("hospitals dhaka") or after one linking word ("hospitals in dhaka").
 */
function isQualifiedByLocation(hit: KeywordHit, location: LocationMatch, tokens: readonly string[], config: RoutingConfig): boolean {
  const gap = location.start - hit.end;
  if (gap === 0) {
    return true;
  }
  return gap === 1 && config.locationLinks.includes(tokens[hit.end] ?? "");
}

export function orderByPriority(tools: readonly ToolName[], config: RoutingConfig): ToolName[] {
  const rank = (tool: ToolName): number => {
    const index = config.toolPriority.indexOf(tool);
    return index >= 0 ? index : config.toolPriority.length + TOOL_NAMES.indexOf(tool);
  };
  return [...tools].sort((a, b) => rank(a) - rank(b));
}

function computeRoutingConfidence(scores: ToolScores, primaryTool: ToolName, config: RoutingConfig): number {
  const total = TOOL_NAMES.reduce((sum, tool) => sum + scores[tool], 0);
  if (total <= 0) {
    return 0;
  }
  return clamp(scores[primaryTool] / total, config.minRoutingConfidence, config.maxRoutingConfidence);
}
