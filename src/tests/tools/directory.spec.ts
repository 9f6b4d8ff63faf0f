import { afterEach, describe, expect, it, vi } from "vitest";
import type { Queryable } from "../../routing/cacheBackends";
import { createRoutingConfig } from "../../routing/config";
import type { ExecutionOutcome, QueryTool } from "../../routing/types";
import { buildDirectoryStatement, createDirectoryTool } from "../../tools/directory";
import { withWebFallback } from "../../tools/fallback";
import { createToolRegistry } from "../../tools/registry";
import { toQuery } from "../../utils";

const config = createRoutingConfig();

function fakeDb(rows: Record<string, unknown>[] | Error) {
  const calls: { text: string; values?: unknown[] }[] = [];
  const db: Queryable = {
    query: async (text: string, values?: unknown[]) => {
      calls.push({ text, values });
      if (rows instanceof Error) {
        throw rows;
      }
      return { rows };
    }
  };
  return { db, calls };
}

function stubTool(name: QueryTool["name"], outcome: ExecutionOutcome | Error) {
  return {
    name,
    run: vi.fn(async () => {
      if (outcome instanceof Error) {
        throw outcome;
      }
      return outcome;
    })
  } satisfies QueryTool;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildDirectoryStatement", () => {
  it("counts rows in the detected city", () => {
    const statement = buildDirectoryStatement("hospitals", toQuery("How many hospitals are in Sylhet?"), config);
    expect(statement).toEqual({
      text: "SELECT COUNT(*) AS total FROM hospitals WHERE city ILIKE $1",
      values: ["Sylhet"],
      mode: "count",
      city: "Sylhet"
    });
  });

  it("lists rows without a city filter for country-wide questions", () => {
    const statement = buildDirectoryStatement("restaurants", toQuery("restaurants in Bangladesh"), config);
    expect(statement).toEqual({
      text: "SELECT name, cuisine AS detail, city, rating AS metric FROM restaurants ORDER BY name LIMIT 20",
      values: [],
      mode: "list",
      city: null
    });
  });
});

describe("createDirectoryTool", () => {
  it("answers a count question", async () => {
    const { db, calls } = fakeDb([{ total: "4" }]);
    const outcome = await createDirectoryTool("hospitals", db, config).run(toQuery("How many hospitals are in Sylhet?"));

    expect(outcome).toEqual({
      success: true,
      usedFallback: false,
      resultEmpty: false,
      rawResult: "Found 4 hospitals in Sylhet.",
      sqlText: "SELECT COUNT(*) AS total FROM hospitals WHERE city ILIKE $1"
    });
    expect(calls[0]?.values).toEqual(["Sylhet"]);
  });

  it("marks a zero count as empty", async () => {
    const { db } = fakeDb([{ total: 0 }]);
    const outcome = await createDirectoryTool("institutions", db, config).run(toQuery("How many colleges in Rangpur"));
    expect(outcome.resultEmpty).toBe(true);
    expect(outcome.rawResult).toBe("No institutions found in Rangpur.");
  });

  it("lists matching rows", async () => {
    const { db } = fakeDb([
      { name: "Kacchi House", detail: "Bangladeshi", city: "Dhaka", metric: 4.5 },
      { name: "Tea Stall", detail: null, city: null, metric: null }
    ]);
    const outcome = await createDirectoryTool("restaurants", db, config).run(toQuery("restaurants in Bangladesh"));

    expect(outcome.resultEmpty).toBe(false);
    expect(outcome.rawResult).toBe(
      ["Found 2 restaurants:", "- Kacchi House (Bangladeshi, Dhaka, rating: 4.5)", "- Tea Stall"].join("\n")
    );
  });

  it("reports an empty list", async () => {
    const { db } = fakeDb([]);
    const outcome = await createDirectoryTool("restaurants", db, config).run(toQuery("restaurants in Bangladesh"));
    expect(outcome).toMatchObject({ success: true, resultEmpty: true, rawResult: "No restaurants found." });
  });

  it("turns database errors into a failed outcome", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { db } = fakeDb(new Error("relation does not exist"));
    const outcome = await createDirectoryTool("hospitals", db, config).run(toQuery("Hospitals in Khulna"));

    expect(outcome.success).toBe(false);
    expect(outcome.rawResult).toBe("Database error: relation does not exist");
    expect(outcome.sqlText).toBe(
      "SELECT name, type AS detail, city, beds AS metric FROM hospitals WHERE city ILIKE $1 ORDER BY name LIMIT 20"
    );
  });
});

describe("withWebFallback", () => {
  const query = toQuery("Hospitals in Khulna");
  const web = (): ReturnType<typeof stubTool> =>
    stubTool("web_search", { success: true, usedFallback: false, resultEmpty: false, rawResult: "Web search results" });

  it("keeps a good primary answer without consulting web search", async () => {
    const primary = stubTool("hospitals", { success: true, usedFallback: false, resultEmpty: false, rawResult: "Found 2 hospitals." });
    const search = web();

    const outcome = await withWebFallback(primary, search).run(query);
    expect(outcome.rawResult).toBe("Found 2 hospitals.");
    expect(outcome.usedFallback).toBe(false);
    expect(search.run).not.toHaveBeenCalled();
  });

  it("uses web search when the primary answer is empty", async () => {
    const primary = stubTool("hospitals", {
      success: true,
      usedFallback: false,
      resultEmpty: true,
      rawResult: "No hospitals found.",
      sqlText: "SELECT 1"
    });

    const outcome = await withWebFallback(primary, web()).run(query);
    expect(outcome).toEqual({
      success: true,
      usedFallback: true,
      resultEmpty: false,
      rawResult: "Web search results",
      sqlText: "SELECT 1"
    });
  });

  it("reports the primary failure when web search fails too", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const primary = stubTool("hospitals", new Error("db down"));
    const search = stubTool("web_search", {
      success: false,
      usedFallback: false,
      resultEmpty: true,
      rawResult: "Web search is not configured (SERPAPI_KEY is missing)"
    });

    const outcome = await withWebFallback(primary, search).run(query);
    expect(outcome).toEqual({ success: false, usedFallback: false, resultEmpty: true, rawResult: "db down" });
    expect(search.run).toHaveBeenCalledTimes(1);
  });

  it("does not fall back once the caller has cancelled", async () => {
    const primary = stubTool("hospitals", { success: false, usedFallback: false, resultEmpty: true, rawResult: "aborted" });
    const search = web();
    const controller = new AbortController();
    controller.abort();

    const outcome = await withWebFallback(primary, search).run(query, { signal: controller.signal });
    expect(outcome.usedFallback).toBe(false);
    expect(search.run).not.toHaveBeenCalled();
  });
});

describe("createToolRegistry", () => {
  it("registers every tool under its own name", () => {
    const { db } = fakeDb([]);
    const tools = createToolRegistry({ db, config });
    expect(Object.entries(tools).map(([key, tool]) => [key, tool.name])).toEqual([
      ["institutions", "institutions"],
      ["hospitals", "hospitals"],
      ["restaurants", "restaurants"],
      ["web_search", "web_search"]
    ]);
  });

  it("keeps the directory answer when web search cannot help", async () => {
    const { db } = fakeDb([]);
    const tools = createToolRegistry({ db, config });

    const outcome = await tools.restaurants.run(toQuery("restaurants in Bangladesh"));
    expect(outcome).toEqual({
      success: true,
      usedFallback: false,
      resultEmpty: true,
      rawResult: "No restaurants found.",
      sqlText: "SELECT name, cuisine AS detail, city, rating AS metric FROM restaurants ORDER BY name LIMIT 20"
    });
  });
});
