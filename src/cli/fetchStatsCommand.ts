import { listLaneAliases, listRankAliases } from "../data/aliases.js";
import { RequestValidationError } from "../errors.js";
import type { LolalyticsStatsService } from "../services/lolalyticsStatsService.js";

export const CLI_OPERATIONS = ["tierlist", "counters", "champion", "matchup", "patch-notes"] as const;
export type CliOperation = (typeof CLI_OPERATIONS)[number];

export interface CliOptions {
  operation: CliOperation | null;
  n?: number;
  lane: string;
  rank: string;
  champion: string;
  champion2: string;
  category: string;
  listLanes: boolean;
  listRanks: boolean;
}

export const USAGE = [
  "Usage: lolalytics-stats <operation> [options]",
  "",
  "Operations:",
  "  tierlist      --n 10 --lane top --rank d+",
  "  counters      --champion yasuo --n 10 --rank m+",
  "  champion      --champion jax --lane top --rank d+",
  "  matchup       --champion jax --champion2 fiora --lane top",
  "  patch-notes   --category all|buffed|nerfed|adjusted --rank g+",
  "",
  "  --list-lanes  print every lane alias",
  "  --list-ranks  print every rank alias"
].join("\n");

function isCliOperation(raw: string): raw is CliOperation {
  return CLI_OPERATIONS.some((operation) => operation === raw);
}

export function parseArgs(args: string[]): CliOptions {
  const read = (name: string, fallback: string): string => {
    const index = args.indexOf(`--${name}`);
    if (index >= 0 && index + 1 < args.length) return args[index + 1];
    return fallback;
  };
  const has = (name: string): boolean => args.includes(`--${name}`);

  const first = args[0] ?? "";
  if (first && !first.startsWith("--") && !isCliOperation(first)) {
    throw new RequestValidationError(`Unknown operation "${first}".\n\n${USAGE}`);
  }

  return {
    operation: isCliOperation(first) ? first : null,
    n: has("n") ? Number(read("n", "")) : undefined,
    lane: read("lane", ""),
    rank: read("rank", ""),
    champion: read("champion", ""),
    champion2: read("champion2", ""),
    category: read("category", "all"),
    listLanes: has("list-lanes"),
    listRanks: has("list-ranks")
  };
}

export async function runCommand(options: CliOptions, service: LolalyticsStatsService): Promise<unknown> {
  if (options.listLanes) return listLaneAliases();
  if (options.listRanks) return listRankAliases();

  switch (options.operation) {
    case "tierlist":
      return service.getTierlist({ n: options.n, lane: options.lane, rank: options.rank });
    case "counters":
      return service.getCounters({ n: options.n, champion: options.champion, rank: options.rank });
    case "champion":
      return service.getChampionData({ champion: options.champion, lane: options.lane, rank: options.rank });
    case "matchup":
      return service.getMatchup({
        champion1: options.champion,
        champion2: options.champion2,
        lane: options.lane,
        rank: options.rank
      });
    case "patch-notes":
      return service.getPatchNotes({ category: options.category, rank: options.rank });
    case null:
      throw new RequestValidationError(`Missing operation.\n\n${USAGE}`);
  }
}
