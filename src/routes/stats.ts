import { Response, Router } from "express";
import { listLaneAliases, listRankAliases } from "../data/aliases.js";
import {
  ExtractionError,
  InvalidLaneError,
  InvalidRankError,
  RequestValidationError,
  TransportError
} from "../errors.js";
import {
  championDataQuerySchema,
  countersQuerySchema,
  matchupQuerySchema,
  patchNotesQuerySchema,
  tierlistQuerySchema
} from "../schemas/stats.js";
import type { LolalyticsStatsService } from "../services/lolalyticsStatsService.js";

interface CreateStatsRouterOptions {
  statsService: LolalyticsStatsService;
}

function sendPipelineError(res: Response, error: unknown): Response {
  if (error instanceof InvalidLaneError || error instanceof InvalidRankError) {
    return res.status(400).json({
      error: error instanceof InvalidLaneError ? "Invalid lane." : "Invalid rank.",
      message: error.message,
      validValues: error instanceof InvalidLaneError ? "/api/lanes" : "/api/ranks"
    });
  }
  if (error instanceof RequestValidationError) {
    return res.status(400).json({ error: "Invalid request.", message: error.message });
  }
  if (error instanceof TransportError) {
    return res.status(error.kind === "timeout" ? 504 : 502).json({
      error: "Upstream request failed.",
      message: error.message,
      failure: error.kind,
      upstreamStatus: error.status ?? null
    });
  }
  if (error instanceof ExtractionError) {
    return res.status(502).json({
      error: "Upstream page could not be read.",
      message: error.message,
      operation: error.operation
    });
  }
  console.error("[stats] Unexpected failure:", error);
  return res.status(500).json({
    error: "Unexpected error.",
    message: error instanceof Error ? error.message : "Unknown error"
  });
}

export function createStatsRouter(options: CreateStatsRouterOptions): Router {
  const { statsService } = options;
  const router = Router();

  router.get("/lanes", (_req, res) => {
    res.json({ lanes: listLaneAliases() });
  });

  router.get("/ranks", (_req, res) => {
    res.json({ ranks: listRankAliases() });
  });

  router.get("/tierlist", async (req, res) => {
    const parsed = tierlistQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid query.", details: parsed.error.flatten() });
    }
    try {
      const entries = await statsService.getTierlist(parsed.data);
      return res.json({ entries });
    } catch (error) {
      return sendPipelineError(res, error);
    }
  });

  router.get("/champions/:champion/counters", async (req, res) => {
    const parsed = countersQuerySchema.safeParse({ ...req.query, champion: req.params.champion });
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid query.", details: parsed.error.flatten() });
    }
    try {
      const entries = await statsService.getCounters(parsed.data);
      return res.json({ champion: parsed.data.champion, entries });
    } catch (error) {
      return sendPipelineError(res, error);
    }
  });

  router.get("/champions/:champion", async (req, res) => {
    const parsed = championDataQuerySchema.safeParse({ ...req.query, champion: req.params.champion });
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid query.", details: parsed.error.flatten() });
    }
    try {
      const stats = await statsService.getChampionData(parsed.data);
      return res.json({ champion: parsed.data.champion, stats });
    } catch (error) {
      return sendPipelineError(res, error);
    }
  });

  router.get("/matchups/:champion1/:champion2", async (req, res) => {
    const parsed = matchupQuerySchema.safeParse({
      ...req.query,
      champion1: req.params.champion1,
      champion2: req.params.champion2
    });
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid query.", details: parsed.error.flatten() });
    }
    try {
      const stats = await statsService.getMatchup(parsed.data);
      return res.json({ champion1: parsed.data.champion1, champion2: parsed.data.champion2, stats });
    } catch (error) {
      return sendPipelineError(res, error);
    }
  });

  router.get("/patch-notes", async (req, res) => {
    const parsed = patchNotesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid query.", details: parsed.error.flatten() });
    }
    try {
      const groups = await statsService.getPatchNotes(parsed.data);
      return res.json({ category: parsed.data.category, groups });
    } catch (error) {
      return sendPipelineError(res, error);
    }
  });

  return router;
}
