import { roundTo } from "../utils";
import type { RoutingConfig } from "./config";
import { orderByPriority } from "./queryClassifier";
import { RoutingDecision, TOOL_NAMES, ToolName, ToolRecommendation } from "./types";

export function recommendTools(decision: RoutingDecision, config: RoutingConfig): ToolRecommendation[] {
  const total = TOOL_NAMES.reduce((sum, tool) => sum + decision.toolScores[tool], 0);
  if (total <= 0) {
    return [];
  }
  const scored = TOOL_NAMES.filter((tool) => decision.toolScores[tool] > 0);
  const priorityRank = new Map(orderByPriority(scored, config).map((tool, index): [ToolName, number] => [tool, index]));

  return scored
    .map((tool) => ({
      tool,
      score: decision.toolScores[tool],
      share: roundTo(decision.toolScores[tool] / total, 4)
    }))
    .sort((a, b) => b.score - a.score || (priorityRank.get(a.tool) ?? 0) - (priorityRank.get(b.tool) ?? 0));
}

export function explainRouting(query: string, decision: RoutingDecision): string {
  const lines = [
    `Query analysis for: "${query.trim()}"`,
    "",
    `Primary tool: ${decision.primaryTool}`,
    `Confidence: ${decision.confidence.toFixed(2)}`,
    `Question type: ${decision.questionType}`,
    `Has location: ${decision.hasLocation ? "yes" : "no"}`
  ];
  if (decision.location) {
    lines.push(`Location: ${decision.location}`);
  }
  lines.push("", "Tool scores:");
  for (const tool of TOOL_NAMES) {
    lines.push(`  ${tool}: ${decision.toolScores[tool]}`);
  }
  return lines.join("\n");
}
