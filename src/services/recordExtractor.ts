import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { ExtractionError } from "../errors.js";
import {
  PATCH_GROUPS,
  type ChampionStats,
  type CounterEntry,
  type DamageBreakdown,
  type MatchupStats,
  type PatchCategory,
  type PatchGroup,
  type PatchNoteEntry,
  type PatchNoteGroups,
  type TierlistEntry
} from "../types/records.js";

type Selection = Cheerio<Element>;
type AnchorPath = readonly string[];

// Anchors are child-step chains starting at <body>, mirroring the page's fixed
// layout. A step matches direct children only, so wrappers elsewhere in the page
// never shift a region.
const ANCHORS = {
  tierlist: {
    table: ["main", "div:nth-of-type(6)"],
    firstRow: 3,
    rank: ["div:nth-of-type(1)"],
    champion: ["div:nth-of-type(3)", "a"],
    tier: ["div:nth-of-type(4)"],
    winrate: ["div:nth-of-type(6)", "div", "span:nth-of-type(1)"],
    pbi: ["div:nth-of-type(8)", "div"]
  },
  counters: {
    strip: ["main", "div:nth-of-type(6)", "div:nth-of-type(1)", "div:nth-of-type(2)"],
    champion: ["div:nth-of-type(1)", "a", "div", "div:nth-of-type(1)"],
    winrate: ["div:nth-of-type(1)", "a", "div", "div:nth-of-type(2)", "div"]
  },
  championStats: {
    panel: ["main", "div:nth-of-type(5)", "div:nth-of-type(1)", "div:nth-of-type(2)", "div:nth-of-type(2)"]
  },
  matchup: {
    panel: [
      "main",
      "div:nth-of-type(5)",
      "div:nth-of-type(1)",
      "div:nth-of-type(2)",
      "div:nth-of-type(3)",
      "div",
      "div"
    ],
    winrate: ["div:nth-of-type(1)", "div:nth-of-type(1)"],
    games: ["div:nth-of-type(2)", "div:nth-of-type(1)"]
  },
  patchNotes: {
    section: ["main", "div:nth-of-type(5)", "div:nth-of-type(4)"],
    champion: ["div", "div:nth-of-type(1)", "span:nth-of-type(1)", "a"],
    winrate: ["div", "div:nth-of-type(2)", "span"],
    pickrate: ["div", "div:nth-of-type(3)", "span:nth-of-type(1)"],
    banrate: ["div", "div:nth-of-type(3)", "span:nth-of-type(2)"]
  }
} as const;

// Stat grid of the build page: two rows of four cells, value in each cell's first div.
const STAT_CELLS: ReadonlyArray<[field: Exclude<keyof ChampionStats, "damage">, row: number, cell: number]> = [
  ["winrate", 1, 1],
  ["winrateDelta", 1, 2],
  ["gameAvgWinrate", 1, 3],
  ["pickrate", 1, 4],
  ["tier", 2, 1],
  ["rank", 2, 2],
  ["banrate", 2, 3],
  ["games", 2, 4]
];

const PATCH_GROUP_COLUMN: Record<PatchGroup, number> = { buffed: 1, nerfed: 2, adjusted: 3 };

const DAMAGE_KINDS = ["physical", "magic", "true", "total"] as const;
type DamageKind = (typeof DAMAGE_KINDS)[number];

function descend(scope: Selection, steps: AnchorPath): Selection {
  return steps.reduce((node, step) => node.children(step), scope);
}

function locate($: CheerioAPI, path: AnchorPath): Selection {
  return descend($("body"), path).first();
}

function textAt(scope: Selection, path: AnchorPath): string | null {
  const node = descend(scope, path).first();
  return node.length > 0 ? node.text().trim() : null;
}

function firstLine(text: string): string {
  return text.split("\n")[0].trim();
}

function leadingNumber(text: string): number {
  const match = /^[0-9.]+/.exec(text.replace(/,/g, ""));
  const value = match ? Number(match[0]) : 0;
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

function share(part: number, whole: number): string {
  if (whole <= 0) return "0%";
  return `${((part / whole) * 100).toFixed(1)}%`;
}

export function extractTierlist(html: string, n: number): TierlistEntry[] {
  const $ = cheerio.load(html);
  const anchors = ANCHORS.tierlist;
  const table = locate($, anchors.table);
  if (table.length === 0) {
    throw new ExtractionError("tierlist", "tier list table not found");
  }

  const rows = table.children("div").slice(anchors.firstRow - 1);
  const entries: TierlistEntry[] = [];
  for (let i = 0; i < rows.length && entries.length < n; i += 1) {
    const row = rows.eq(i);
    const champion = textAt(row, anchors.champion);
    // The first row without a champion link closes the table.
    if (champion === null) break;
    const rank = textAt(row, anchors.rank);
    const tier = textAt(row, anchors.tier);
    const winrate = textAt(row, anchors.winrate);
    if (rank === null || tier === null || winrate === null) {
      throw new ExtractionError(
        "tierlist",
        `row ${entries.length + 1} (${champion}) is missing its rank, tier or winrate cell`
      );
    }
    entries.push({ rank, champion, tier, winrate, pbi: textAt(row, anchors.pbi) ?? "" });
  }

  if (entries.length === 0) {
    throw new ExtractionError("tierlist", "tier list table has no champion rows");
  }
  return entries;
}

export function extractCounters(html: string, n: number): CounterEntry[] {
  const $ = cheerio.load(html);
  const anchors = ANCHORS.counters;
  const strip = locate($, anchors.strip);
  if (strip.length === 0) {
    throw new ExtractionError("counters", "counter list not found");
  }

  const cards = strip.children("span");
  const entries: CounterEntry[] = [];
  for (let i = 0; i < cards.length && entries.length < n; i += 1) {
    const card = cards.eq(i);
    const champion = textAt(card, anchors.champion);
    if (champion === null) break;
    const winrate = textAt(card, anchors.winrate);
    if (winrate === null) {
      throw new ExtractionError("counters", `counter ${entries.length + 1} (${champion}) has no winrate`);
    }
    entries.push({ champion, winrate });
  }

  if (entries.length === 0) {
    throw new ExtractionError("counters", "counter list has no champions");
  }
  return entries;
}

function extractDamage($: CheerioAPI): DamageBreakdown | null {
  const amounts = new Map<DamageKind, string>();
  for (const kind of DAMAGE_KINDS) {
    const label = `${kind} damage`;
    // Leaf div whose whole text is the label; its amount sits in the next sibling div.
    const labelNodes = $("div").filter((_, element) => {
      const node = $(element);
      if (node.children("div").length > 0) return false;
      return node.text().replace(/\s+/g, " ").trim().toLowerCase() === label;
    });
    for (let i = 0; i < labelNodes.length; i += 1) {
      const amount = firstLine(labelNodes.eq(i).nextAll("div").first().text().trim());
      if (/^[0-9]/.test(amount)) {
        amounts.set(kind, amount);
        break;
      }
    }
  }
  if (amounts.size === 0) return null;

  const physical = leadingNumber(amounts.get("physical") ?? "");
  const magic = leadingNumber(amounts.get("magic") ?? "");
  const trueDamage = leadingNumber(amounts.get("true") ?? "");
  const totalText = amounts.get("total");
  const total = leadingNumber(totalText ?? "") || physical + magic + trueDamage;

  return {
    physical: amounts.get("physical") ?? "0",
    magic: amounts.get("magic") ?? "0",
    true: amounts.get("true") ?? "0",
    total: totalText && leadingNumber(totalText) > 0 ? totalText : String(total),
    physicalShare: share(physical, total),
    magicShare: share(magic, total),
    trueShare: share(trueDamage, total)
  };
}

export function extractChampionStats(html: string): ChampionStats {
  const $ = cheerio.load(html);
  const panel = locate($, ANCHORS.championStats.panel);
  if (panel.length === 0) {
    throw new ExtractionError("champion_data", "stat panel not found");
  }

  const stats: Omit<ChampionStats, "damage"> = {
    winrate: "",
    winrateDelta: "",
    gameAvgWinrate: "",
    pickrate: "",
    tier: "",
    rank: "",
    banrate: "",
    games: ""
  };
  for (const [field, row, cell] of STAT_CELLS) {
    const text = textAt(panel, [`div:nth-of-type(${row})`, `div:nth-of-type(${cell})`, "div:nth-of-type(1)"]);
    if (text === null) {
      throw new ExtractionError("champion_data", `stat cell "${field}" not found`);
    }
    stats[field] = firstLine(text);
  }

  return { ...stats, damage: extractDamage($) };
}

export function extractMatchup(html: string): MatchupStats {
  const $ = cheerio.load(html);
  const anchors = ANCHORS.matchup;
  const panel = locate($, anchors.panel);
  const winrate = panel.length > 0 ? textAt(panel, anchors.winrate) : null;
  const games = panel.length > 0 ? textAt(panel, anchors.games) : null;
  if (winrate === null || games === null) {
    throw new ExtractionError("matchup", "matchup summary not found");
  }
  return { winrate: firstLine(winrate), games: firstLine(games) };
}

function extractPatchGroup(section: Selection, group: PatchGroup): PatchNoteEntry[] {
  const anchors = ANCHORS.patchNotes;
  const list = descend(section, [`div:nth-of-type(${PATCH_GROUP_COLUMN[group]})`, "div"]).first();
  const items = list.children("div");
  const entries: PatchNoteEntry[] = [];
  for (let i = 0; i < items.length; i += 1) {
    const item = items.eq(i);
    const champion = textAt(item, anchors.champion);
    const winrate = textAt(item, anchors.winrate);
    const pickrate = textAt(item, anchors.pickrate);
    const banrate = textAt(item, anchors.banrate);
    if (champion === null || winrate === null || pickrate === null || banrate === null) break;
    entries.push({ champion, winrate, pickrate, banrate });
  }
  return entries;
}

export function extractPatchNotes(html: string, category: PatchCategory): PatchNoteGroups {
  const $ = cheerio.load(html);
  const section = locate($, ANCHORS.patchNotes.section);
  if (section.length === 0) {
    throw new ExtractionError("patch_notes", "patch changes section not found");
  }

  const groups: PatchNoteGroups = {};
  for (const group of category === "all" ? PATCH_GROUPS : [category]) {
    groups[group] = extractPatchGroup(section, group);
  }
  return groups;
}
