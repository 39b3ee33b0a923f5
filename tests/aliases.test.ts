import { describe, it, expect } from "vitest";
import { listLaneAliases, listRankAliases, resolveLane, resolveRank } from "../src/data/aliases.js";
import { InvalidLaneError, InvalidRankError } from "../src/errors.js";
import { LANES, RANKS } from "../src/types/records.js";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw.");
}

describe("resolveLane", () => {
  it("maps every documented alias to its lane", () => {
    for (const [alias, lane] of Object.entries(listLaneAliases())) {
      expect(resolveLane(alias)).toBe(lane);
    }
  });

  it("resolves the jungle shortcuts", () => {
    expect(resolveLane("jg")).toBe("jungle");
    expect(resolveLane("jng")).toBe("jungle");
    expect(resolveLane("adc")).toBe("bottom");
    expect(resolveLane("mid")).toBe("middle");
  });

  it("accepts each canonical lane as its own alias", () => {
    for (const lane of LANES) {
      expect(resolveLane(lane)).toBe(lane);
    }
  });

  it("returns the unset sentinel for an empty string", () => {
    expect(resolveLane("")).toBe("");
  });

  it("rejects unknown lanes with the raw input attached", () => {
    const error = captureError(() => resolveLane("invalid_lane"));
    expect(error).toBeInstanceOf(InvalidLaneError);
    expect(error).toMatchObject({
      raw: "invalid_lane",
      message: 'Invalid lane "invalid_lane". Use listLaneAliases() (or GET /api/lanes) to see the valid lanes.'
    });
  });

  it("matches case-sensitively", () => {
    expect(() => resolveLane("TOP")).toThrow(InvalidLaneError);
    expect(() => resolveLane("Jg")).toThrow(InvalidLaneError);
  });
});

describe("resolveRank", () => {
  it("maps every documented alias to its rank", () => {
    for (const [alias, rank] of Object.entries(listRankAliases())) {
      expect(resolveRank(alias)).toBe(rank);
    }
  });

  it("resolves plus-tier and one-trick shortcuts", () => {
    expect(resolveRank("dia+")).toBe("diamond_plus");
    expect(resolveRank("m+")).toBe("master_plus");
    expect(resolveRank("gm+")).toBe("grandmaster_plus");
    expect(resolveRank("p+")).toBe("platinum_plus");
    expect(resolveRank("otp")).toBe("1trick");
    expect(resolveRank("-")).toBe("unranked");
  });

  it("accepts each canonical rank as its own alias", () => {
    for (const rank of RANKS) {
      expect(resolveRank(rank)).toBe(rank);
    }
  });

  it("returns the default sentinel for an empty string", () => {
    expect(resolveRank("")).toBe("");
  });

  it("rejects unknown ranks", () => {
    expect(() => resolveRank("test")).toThrow(InvalidRankError);
    expect(() => resolveRank("Diamond")).toThrow(InvalidRankError);
    expect(() => resolveRank("test")).toThrow(
      'Invalid rank "test". Use listRankAliases() (or GET /api/ranks) to see the valid ranks.'
    );
  });
});

describe("alias tables", () => {
  it("are frozen", () => {
    expect(Object.isFrozen(listLaneAliases())).toBe(true);
    expect(Object.isFrozen(listRankAliases())).toBe(true);
  });

  it("list the empty sentinel first", () => {
    expect(Object.keys(listLaneAliases())[0]).toBe("");
    expect(Object.keys(listLaneAliases())).toHaveLength(13);
  });
});
