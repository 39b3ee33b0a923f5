import { RequestValidationError } from "../errors.js";
import type { CanonicalLane, CanonicalRank, StatsRequest, TargetDescriptor } from "../types/records.js";

function championSegment(raw: string, label: string): string {
  if (!raw) {
    throw new RequestValidationError(`${label} cannot be empty.`);
  }
  return encodeURIComponent(raw);
}

function filterQuery(lane: CanonicalLane, rank: CanonicalRank): TargetDescriptor["query"] {
  const query: TargetDescriptor["query"] = [];
  if (lane) query.push(["lane", lane]);
  if (rank) query.push(["tier", rank]);
  return query;
}

export function buildTarget(request: StatsRequest): TargetDescriptor {
  switch (request.operation) {
    case "tierlist":
      return { path: "lol/tierlist/", query: filterQuery(request.lane, request.rank) };
    case "counters":
      return {
        path: `lol/${championSegment(request.champion, "Champion name")}/counters/`,
        query: filterQuery("", request.rank)
      };
    case "champion_data":
      return {
        path: `lol/${championSegment(request.champion, "Champion name")}/build/`,
        query: filterQuery(request.lane, request.rank)
      };
    case "matchup": {
      const first = championSegment(request.champion1, "First champion name");
      const second = championSegment(request.champion2, "Second champion name");
      if (request.champion1 === request.champion2) {
        throw new RequestValidationError("A matchup needs two different champions.");
      }
      return { path: `lol/${first}/vs/${second}/build/`, query: filterQuery(request.lane, request.rank) };
    }
    case "patch_notes":
      return { path: "", query: filterQuery("", request.rank) };
  }
}

export function renderTargetUrl(baseUrl: string, target: TargetDescriptor): string {
  const root = `${baseUrl.replace(/\/+$/, "")}/`;
  const params = new URLSearchParams(target.query);
  return `${root}${target.path}${params.size > 0 ? `?${params.toString()}` : ""}`;
}
