import cors from "cors";
import express, { type Express } from "express";
import { createStatsRouter } from "./routes/stats.js";
import type { LolalyticsStatsService } from "./services/lolalyticsStatsService.js";

interface CreateAppOptions {
  corsOrigin: string;
  statsService: LolalyticsStatsService;
}

export function createApp(options: CreateAppOptions): Express {
  const app = express();
  app.use(
    cors({
      origin: options.corsOrigin === "*" ? true : options.corsOrigin
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "lolalytics-stats" });
  });

  app.use("/api", createStatsRouter({ statsService: options.statsService }));
  return app;
}
