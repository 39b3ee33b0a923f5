import { readFileSync } from "node:fs";
import { z } from "zod";
import { InvalidLaneError, InvalidRankError } from "../errors.js";
import { LANES, RANKS, type CanonicalLane, type CanonicalRank } from "../types/records.js";

const LANE_VALUES = ["", ...LANES] as const;
const RANK_VALUES = ["", ...RANKS] as const;

const aliasFileSchema = z.object({
  lanes: z.record(z.string(), z.enum(LANE_VALUES)),
  ranks: z.record(z.string(), z.enum(RANK_VALUES))
});

// Resolves to <root>/data/aliases.json from both src/data and dist/data.
const ALIAS_FILE = new URL("../../data/aliases.json", import.meta.url);

function loadAliasTables(): z.infer<typeof aliasFileSchema> {
  const parsed = aliasFileSchema.safeParse(JSON.parse(readFileSync(ALIAS_FILE, "utf8")));
  if (!parsed.success) {
    throw new Error(`Alias table ${ALIAS_FILE.pathname} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

const tables = loadAliasTables();

const LANE_ALIASES: Readonly<Record<string, CanonicalLane>> = Object.freeze({ ...tables.lanes });
const RANK_ALIASES: Readonly<Record<string, CanonicalRank>> = Object.freeze({ ...tables.ranks });
const laneLookup: ReadonlyMap<string, CanonicalLane> = new Map(Object.entries(LANE_ALIASES));
const rankLookup: ReadonlyMap<string, CanonicalRank> = new Map(Object.entries(RANK_ALIASES));

export function resolveLane(raw: string): CanonicalLane {
  if (raw === "") return "";
  const lane = laneLookup.get(raw);
  if (lane === undefined) throw new InvalidLaneError(raw);
  return lane;
}

export function resolveRank(raw: string): CanonicalRank {
  if (raw === "") return "";
  const rank = rankLookup.get(raw);
  if (rank === undefined) throw new InvalidRankError(raw);
  return rank;
}

/** Every accepted lane spelling mapped to the lane it stands for. */
export function listLaneAliases(): Readonly<Record<string, CanonicalLane>> {
  return LANE_ALIASES;
}

/** Every accepted rank spelling mapped to the rank it stands for. */
export function listRankAliases(): Readonly<Record<string, CanonicalRank>> {
  return RANK_ALIASES;
}
