import { HttpDocumentTransport, type HttpDocumentTransportOptions } from "./services/documentTransport.js";
import {
  LolalyticsStatsService,
  type ChampionDataQuery,
  type CountersQuery,
  type MatchupQuery,
  type PatchNotesQuery,
  type TierlistQuery
} from "./services/lolalyticsStatsService.js";
import type {
  ChampionStats,
  CounterEntry,
  MatchupStats,
  PatchNoteGroups,
  TierlistEntry
} from "./types/records.js";

export { listLaneAliases, listRankAliases, resolveLane, resolveRank } from "./data/aliases.js";
export {
  ExtractionError,
  InvalidLaneError,
  InvalidRankError,
  RequestValidationError,
  StatsPipelineError,
  TransportError
} from "./errors.js";
export type { TransportFailureKind } from "./errors.js";
export {
  DEFAULT_BASE_URL,
  HttpDocumentTransport
} from "./services/documentTransport.js";
export type { DocumentTransport, HttpDocumentTransportOptions } from "./services/documentTransport.js";
export { DEFAULT_ROW_COUNT, LolalyticsStatsService } from "./services/lolalyticsStatsService.js";
export type {
  ChampionDataQuery,
  CountersQuery,
  MatchupQuery,
  PatchNotesQuery,
  TierlistQuery
} from "./services/lolalyticsStatsService.js";
export { buildTarget, renderTargetUrl } from "./services/queryBuilder.js";
export {
  extractChampionStats,
  extractCounters,
  extractMatchup,
  extractPatchNotes,
  extractTierlist
} from "./services/recordExtractor.js";
export * from "./types/records.js";

// One-shot helpers: each builds its own HTTP transport and runs a single call.

function oneShot(options?: HttpDocumentTransportOptions): LolalyticsStatsService {
  return new LolalyticsStatsService(new HttpDocumentTransport(options));
}

export function tierlist(query: TierlistQuery = {}, options?: HttpDocumentTransportOptions): Promise<TierlistEntry[]> {
  return oneShot(options).getTierlist(query);
}

export function counters(query: CountersQuery, options?: HttpDocumentTransportOptions): Promise<CounterEntry[]> {
  return oneShot(options).getCounters(query);
}

export function championData(query: ChampionDataQuery, options?: HttpDocumentTransportOptions): Promise<ChampionStats> {
  return oneShot(options).getChampionData(query);
}

export function matchup(query: MatchupQuery, options?: HttpDocumentTransportOptions): Promise<MatchupStats> {
  return oneShot(options).getMatchup(query);
}

export function patchNotes(query: PatchNotesQuery, options?: HttpDocumentTransportOptions): Promise<PatchNoteGroups> {
  return oneShot(options).getPatchNotes(query);
}
