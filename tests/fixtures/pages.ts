// Minimal pages reproducing the layout the extractor anchors on. Only the
// structure matters; every value is made up.

export interface TierRowFixture {
  rank: string;
  champion: string;
  tier: string;
  winrate: string;
  pbi?: string;
}

export interface CounterFixture {
  champion: string;
  winrate: string;
}

export interface PatchEntryFixture {
  champion: string;
  winrate: string;
  pickrate: string;
  banrate: string;
}

const fillers = (count: number): string =>
  Array.from({ length: count }, (_, i) => `<div class="filler-${i + 1}">filler</div>`).join("");

const page = (main: string, extra = ""): string =>
  `<!DOCTYPE html><html><head><title>fixture</title></head><body><main>${main}</main>${extra}</body></html>`;

export function tierlistPage(rows: TierRowFixture[]): string {
  const body = rows
    .map(
      (row) =>
        `<div>` +
        `<div>${row.rank}</div>` +
        `<div><img alt=""></div>` +
        `<div><a href="/lol/${row.champion.toLowerCase()}/build/">${row.champion}</a></div>` +
        `<div>${row.tier}</div>` +
        `<div>lane</div>` +
        `<div><div><span>${row.winrate}</span><span>+0.1</span></div></div>` +
        `<div>1.0%</div>` +
        (row.pbi === undefined ? "" : `<div><div>${row.pbi}</div></div>`) +
        `</div>`
    )
    .join("");
  return page(`${fillers(5)}<div><div>Rank</div><div>Filters</div>${body}<div>Load more</div></div>`);
}

export function makeTierRows(count: number): TierRowFixture[] {
  return Array.from({ length: count }, (_, i) => ({
    rank: String(i + 1),
    champion: `Champion${i + 1}`,
    tier: i < 2 ? "S+" : "A",
    winrate: `${(55 - i * 0.5).toFixed(1)}%`,
    pbi: String(40 - i)
  }));
}

export function countersPage(counters: CounterFixture[]): string {
  const cards = counters
    .map(
      (counter) =>
        `<span><div><a href="/lol/x/vs/${counter.champion.toLowerCase()}/build/">` +
        `<div><div>${counter.champion}</div><div><div>${counter.winrate}</div></div></div>` +
        `</a></div></span>`
    )
    .join("");
  return page(`${fillers(5)}<div><div><div>Counters</div><div>${cards}</div></div></div>`);
}

export const DEFAULT_STAT_VALUES = [
  "51.2%",
  "+1.4%",
  "49.8%",
  "6.3%",
  "S",
  "7 / 62",
  "4.1%",
  "48,213"
] as const;

export function championPage(values: readonly string[] = DEFAULT_STAT_VALUES, damage = ""): string {
  const cell = (value: string): string => `<div><div>${value}</div><div>label</div></div>`;
  const firstRow = values.slice(0, 4).map(cell).join("");
  const secondRow = values.slice(4, 8).map(cell).join("");
  return page(
    `${fillers(4)}<div><div><div>Header</div><div><div>Portrait</div><div>` +
      `<div>${firstRow}</div><div>${secondRow}</div>` +
      `</div></div></div></div>`,
    damage
  );
}

export function damageSection(rows: Array<[label: string, value: string]>): string {
  const body = rows.map(([label, value]) => `<div><div>${label}</div><div>${value}</div></div>`).join("");
  return `<section class="damage">${body}</section>`;
}

/** Each candidate is a [winrate, games] summary block; the page lists them in order. */
export function matchupPage(...candidates: Array<[winrate: string, games: string]>): string {
  const blocks = candidates
    .map(
      ([winrate, games]) =>
        `<div><div>` +
        `<div><div>${winrate}</div><div>Win Rate</div></div>` +
        `<div><div>${games}</div><div>Games</div></div>` +
        `</div></div>`
    )
    .join("");
  return page(
    `${fillers(4)}<div><div><div>Header</div><div><div>A</div><div>B</div>` +
      `<div>${blocks}</div>` +
      `</div></div></div>`
  );
}

export function patchNotesPage(columns: [PatchEntryFixture[], PatchEntryFixture[], PatchEntryFixture[]]): string {
  const entry = (item: PatchEntryFixture): string =>
    `<div><div>` +
    `<div><span><a href="/lol/${item.champion.toLowerCase()}/build/">${item.champion}</a></span><span>Mid</span></div>` +
    `<div><span>${item.winrate}</span></div>` +
    `<div><span>${item.pickrate}</span><span>${item.banrate}</span></div>` +
    `</div></div>`;
  const column = (items: PatchEntryFixture[]): string => `<div><div>${items.map(entry).join("")}</div></div>`;
  return page(
    `${fillers(4)}<div><div>Patch</div><div>Stats</div><div>Tabs</div><div>${columns.map(column).join("")}</div></div>`
  );
}

export const EMPTY_PAGE = page(`<div>Nothing to see here</div>`);
