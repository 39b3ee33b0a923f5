import { createApp } from "./app.js";
import { env, transportHeaders } from "./config/env.js";
import { HttpDocumentTransport } from "./services/documentTransport.js";
import { LolalyticsStatsService } from "./services/lolalyticsStatsService.js";

async function bootstrap(): Promise<void> {
  const transport = new HttpDocumentTransport({
    baseUrl: env.LOLALYTICS_BASE_URL,
    timeoutMs: env.LOLALYTICS_TIMEOUT_MS,
    headers: transportHeaders(env)
  });
  const app = createApp({
    corsOrigin: env.CORS_ORIGIN,
    statsService: new LolalyticsStatsService(transport)
  });
  console.log(`[lolalytics] Scraping ${env.LOLALYTICS_BASE_URL} (timeout ${env.LOLALYTICS_TIMEOUT_MS}ms).`);

  app.listen(env.PORT, () => {
    console.log(`lolalytics-stats listening on http://localhost:${env.PORT}`);
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start lolalytics-stats:", error);
  process.exit(1);
});
