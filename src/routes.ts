import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { QueryRouter } from "./routing/router";
import { TOOL_NAMES } from "./routing/types";

const AnswerRequestSchema = z.object({
  query: z.string().max(2000),
  split: z.boolean().optional(),
  timeoutMs: z.number().int().positive().max(120_000).optional()
});

const RouteRequestSchema = z.object({
  query: z.string().max(2000)
});

const CacheInfoQuerySchema = z.object({
  query: z.string().min(1).max(2000),
  tool: z.enum(TOOL_NAMES).optional()
});

export function createRoutes(queryRouter: QueryRouter): Router {
  const router = Router();

  router.post("/query", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AnswerRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must include a query string.", issues: parsed.error.issues });
    }

    const { query, split, timeoutMs } = parsed.data;
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const options = { signal: controller.signal, timeoutMs };
      const result = split ? await queryRouter.answerCompound(query, options) : await queryRouter.answer(query, options);
      return res.json(result);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/route", (req: Request, res: Response) => {
    const parsed = RouteRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must include a query string.", issues: parsed.error.issues });
    }
    return res.json(queryRouter.explain(parsed.data.query));
  });

  router.get("/cache/stats", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return res.json(await queryRouter.cacheStats());
    } catch (error) {
      return next(error);
    }
  });

  router.get("/cache/info", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CacheInfoQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: "Query string must include a query and may name a tool.", issues: parsed.error.issues });
    }
    try {
      return res.json(await queryRouter.cacheInfo(parsed.data.query, parsed.data.tool));
    } catch (error) {
      return next(error);
    }
  });

  router.delete("/cache", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return res.json({ removed: await queryRouter.cacheClearAll() });
    } catch (error) {
      return next(error);
    }
  });

  router.delete("/cache/expired", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return res.json({ removed: await queryRouter.cacheClearExpired() });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
