import { z } from "zod";
import type { Queryable } from "../routing/cacheBackends";
import type { RoutingConfig } from "../routing/config";
import { detectLocation, detectQuestionType } from "../routing/queryClassifier";
import { DirectoryToolName, ExecutionOutcome, Query, QueryTool } from "../routing/types";
import { describeError, tokenize } from "../utils";

interface DirectoryTable {
  table: string;
  label: string;
  detailColumn: string;
  metricColumn: string;
  metricLabel: string;
}

export const DIRECTORY_TABLES: Record<DirectoryToolName, DirectoryTable> = {
  institutions: { table: "institutions", label: "institutions", detailColumn: "type", metricColumn: "established", metricLabel: "established" },
  hospitals: { table: "hospitals", label: "hospitals", detailColumn: "type", metricColumn: "beds", metricLabel: "beds" },
  restaurants: { table: "restaurants", label: "restaurants", detailColumn: "cuisine", metricColumn: "rating", metricLabel: "rating" }
};

const LIST_LIMIT = 20;
const COUNTRY_LEVEL = new Set(["Bangladesh"]);

const CountRowSchema = z.object({ total: z.coerce.number() });
const ListRowSchema = z.object({
  name: z.string(),
  detail: z.string().nullable(),
  city: z.string().nullable(),
  metric: z.union([z.string(), z.number()]).nullable()
});

export interface DirectoryStatement {
  text: string;
  values: string[];
  mode: "count" | "list";
  city: string | null;
}

export function buildDirectoryStatement(tool: DirectoryToolName, query: Query, config: RoutingConfig): DirectoryStatement {
  const layout = DIRECTORY_TABLES[tool];
  const tokens = tokenize(query.normalized);
  const place = detectLocation(tokens, config)?.place.name ?? null;
  const city = place && !COUNTRY_LEVEL.has(place) ? place : null;
  const where = city ? " WHERE city ILIKE $1" : "";
  const values = city ? [city] : [];

  if (detectQuestionType(tokens, config) === "count") {
    return { text: `SELECT COUNT(*) AS total FROM ${layout.table}${where}`, values, mode: "count", city };
  }

  return {
    text:
      `SELECT name, ${layout.detailColumn} AS detail, city, ${layout.metricColumn} AS metric ` +
      `FROM ${layout.table}${where} ORDER BY name LIMIT ${LIST_LIMIT}`,
    values,
    mode: "list",
    city
  };
}

/** A domain tool that answers from one of the directory tables. */
export function createDirectoryTool(tool: DirectoryToolName, db: Queryable, config: RoutingConfig): QueryTool {
  const layout = DIRECTORY_TABLES[tool];

  return {
    name: tool,
    async run(query: Query): Promise<ExecutionOutcome> {
      const statement = buildDirectoryStatement(tool, query, config);
      const scope = statement.city ? ` in ${statement.city}` : "";

      try {
        const result = await db.query(statement.text, statement.values);

        if (statement.mode === "count") {
          const parsed = CountRowSchema.safeParse(result.rows[0]);
          const total = parsed.success ? parsed.data.total : 0;
          return {
            success: true,
            usedFallback: false,
            resultEmpty: total === 0,
            rawResult: total === 0 ? `No ${layout.label} found${scope}.` : `Found ${total} ${layout.label}${scope}.`,
            sqlText: statement.text
          };
        }

        const rows = result.rows
          .map((row) => ListRowSchema.safeParse(row))
          .flatMap((parsed) => (parsed.success ? [parsed.data] : []));
        if (rows.length === 0) {
          return {
            success: true,
            usedFallback: false,
            resultEmpty: true,
            rawResult: `No ${layout.label} found${scope}.`,
            sqlText: statement.text
          };
        }

        const lines = rows.map((row) => {
          const details = [row.detail, row.city, row.metric === null ? null : `${layout.metricLabel}: ${row.metric}`]
            .filter((part): part is string => typeof part === "string" && part.length > 0)
            .join(", ");
          return details.length > 0 ? `- ${row.name} (${details})` : `- ${row.name}`;
        });
        return {
          success: true,
          usedFallback: false,
          resultEmpty: false,
          rawResult: [`Found ${rows.length} ${layout.label}${scope}:`, ...lines].join("\n"),
          sqlText: statement.text
        };
      } catch (error) {
        console.warn(`${tool} lookup failed: ${describeError(error)}`);
        return {
          success: false,
          usedFallback: false,
          resultEmpty: true,
          rawResult: `Database error: ${describeError(error)}`,
          sqlText: statement.text
        };
      }
    }
  };
}
