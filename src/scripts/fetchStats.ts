#!/usr/bin/env node
import { parseArgs, runCommand } from "../cli/fetchStatsCommand.js";
import { env, transportHeaders } from "../config/env.js";
import { InvalidLaneError, InvalidRankError } from "../errors.js";
import { HttpDocumentTransport } from "../services/documentTransport.js";
import { LolalyticsStatsService } from "../services/lolalyticsStatsService.js";

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const service = new LolalyticsStatsService(
    new HttpDocumentTransport({
      baseUrl: env.LOLALYTICS_BASE_URL,
      timeoutMs: env.LOLALYTICS_TIMEOUT_MS,
      headers: transportHeaders(env)
    })
  );
  const result = await runCommand(options, service);
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  console.error("[lolalytics] FAILED");
  console.error(error instanceof Error ? error.message : error);
  if (error instanceof InvalidLaneError) console.error("[lolalytics] Run with --list-lanes to see valid lanes.");
  if (error instanceof InvalidRankError) console.error("[lolalytics] Run with --list-ranks to see valid ranks.");
  process.exit(1);
});
