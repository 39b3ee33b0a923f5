import { resolveLane, resolveRank } from "../data/aliases.js";
import { RequestValidationError } from "../errors.js";
import {
  PATCH_CATEGORIES,
  type ChampionStats,
  type CounterEntry,
  type MatchupStats,
  type PatchCategory,
  type PatchNoteGroups,
  type StatsRequest,
  type TierlistEntry
} from "../types/records.js";
import type { DocumentTransport } from "./documentTransport.js";
import { buildTarget } from "./queryBuilder.js";
import {
  extractChampionStats,
  extractCounters,
  extractMatchup,
  extractPatchNotes,
  extractTierlist
} from "./recordExtractor.js";

export const DEFAULT_ROW_COUNT = 10;

export interface TierlistQuery {
  n?: number;
  lane?: string;
  rank?: string;
}

export interface CountersQuery {
  n?: number;
  champion: string;
  rank?: string;
}

export interface ChampionDataQuery {
  champion: string;
  lane?: string;
  rank?: string;
}

export interface MatchupQuery {
  champion1: string;
  champion2: string;
  lane?: string;
  rank?: string;
}

export interface PatchNotesQuery {
  category: string;
  rank?: string;
}

function rowCount(raw: number | undefined): number {
  const n = raw ?? DEFAULT_ROW_COUNT;
  if (!Number.isInteger(n) || n < 1) {
    throw new RequestValidationError(`Row count must be a positive integer, got ${n}.`);
  }
  return n;
}

function isPatchCategory(raw: string): raw is PatchCategory {
  return PATCH_CATEGORIES.some((category) => category === raw);
}

function patchCategory(raw: string): PatchCategory {
  if (!isPatchCategory(raw)) {
    throw new RequestValidationError(`Category must be one of ${PATCH_CATEGORIES.join(", ")}; got "${raw}".`);
  }
  return raw;
}

/**
 * Entry point of the scrape pipeline. Each call validates its raw arguments,
 * resolves lane/rank aliases, builds the page address, fetches the page once
 * and extracts records from it. A failure at any step rejects the call; nothing
 * partial is returned.
 */
export class LolalyticsStatsService {
  constructor(private readonly transport: DocumentTransport) {}

  private async load(request: StatsRequest): Promise<string> {
    return this.transport.fetchDocument(buildTarget(request));
  }

  async getTierlist(query: TierlistQuery = {}): Promise<TierlistEntry[]> {
    const n = rowCount(query.n);
    const lane = resolveLane(query.lane ?? "");
    const rank = resolveRank(query.rank ?? "");
    const html = await this.load({ operation: "tierlist", n, lane, rank });
    return extractTierlist(html, n);
  }

  async getCounters(query: CountersQuery): Promise<CounterEntry[]> {
    const n = rowCount(query.n);
    const rank = resolveRank(query.rank ?? "");
    const html = await this.load({ operation: "counters", n, champion: query.champion, rank });
    return extractCounters(html, n);
  }

  async getChampionData(query: ChampionDataQuery): Promise<ChampionStats> {
    const lane = resolveLane(query.lane ?? "");
    const rank = resolveRank(query.rank ?? "");
    const html = await this.load({ operation: "champion_data", champion: query.champion, lane, rank });
    return extractChampionStats(html);
  }

  async getMatchup(query: MatchupQuery): Promise<MatchupStats> {
    const lane = resolveLane(query.lane ?? "");
    const rank = resolveRank(query.rank ?? "");
    const html = await this.load({
      operation: "matchup",
      champion1: query.champion1,
      champion2: query.champion2,
      lane,
      rank
    });
    return extractMatchup(html);
  }

  async getPatchNotes(query: PatchNotesQuery): Promise<PatchNoteGroups> {
    const category = patchCategory(query.category);
    const rank = resolveRank(query.rank ?? "");
    const html = await this.load({ operation: "patch_notes", category, rank });
    return extractPatchNotes(html, category);
  }
}
