export const LANES = ["top", "jungle", "middle", "bottom", "support"] as const;
/** "" leaves the lane unset, which the site reads as all lanes. */
export type CanonicalLane = (typeof LANES)[number] | "";

export const RANKS = [
  "challenger",
  "grandmaster_plus",
  "grandmaster",
  "master_plus",
  "master",
  "diamond_plus",
  "diamond",
  "emerald",
  "platinum_plus",
  "platinum",
  "gold_plus",
  "gold",
  "silver",
  "bronze",
  "iron",
  "unranked",
  "all",
  "1trick"
] as const;
/** "" leaves the rank unset, so the site applies its default tier. */
export type CanonicalRank = (typeof RANKS)[number] | "";

export const STATS_OPERATIONS = ["tierlist", "counters", "champion_data", "matchup", "patch_notes"] as const;
export type StatsOperation = (typeof STATS_OPERATIONS)[number];

export const PATCH_GROUPS = ["buffed", "nerfed", "adjusted"] as const;
export type PatchGroup = (typeof PATCH_GROUPS)[number];
export const PATCH_CATEGORIES = ["all", ...PATCH_GROUPS] as const;
export type PatchCategory = (typeof PATCH_CATEGORIES)[number];

export type StatsRequest =
  | { operation: "tierlist"; n: number; lane: CanonicalLane; rank: CanonicalRank }
  | { operation: "counters"; n: number; champion: string; rank: CanonicalRank }
  | { operation: "champion_data"; champion: string; lane: CanonicalLane; rank: CanonicalRank }
  | { operation: "matchup"; champion1: string; champion2: string; lane: CanonicalLane; rank: CanonicalRank }
  | { operation: "patch_notes"; category: PatchCategory; rank: CanonicalRank };

export interface TargetDescriptor {
  /** Relative to the site root, no leading slash. */
  path: string;
  query: Array<[name: string, value: string]>;
}

// Every value below is the trimmed text shown on the page ("52.3%", "S+", "12,408").

export interface TierlistEntry {
  rank: string;
  champion: string;
  tier: string;
  winrate: string;
  /** Pick/ban influence; "" when the page has no such column. */
  pbi: string;
}

export interface CounterEntry {
  champion: string;
  winrate: string;
}

export interface DamageBreakdown {
  physical: string;
  magic: string;
  true: string;
  total: string;
  physicalShare: string;
  magicShare: string;
  trueShare: string;
}

export interface ChampionStats {
  winrate: string;
  winrateDelta: string;
  gameAvgWinrate: string;
  pickrate: string;
  tier: string;
  rank: string;
  banrate: string;
  games: string;
  damage: DamageBreakdown | null;
}

export interface MatchupStats {
  winrate: string;
  games: string;
}

export interface PatchNoteEntry {
  champion: string;
  winrate: string;
  pickrate: string;
  banrate: string;
}

export type PatchNoteGroups = Partial<Record<PatchGroup, PatchNoteEntry[]>>;
