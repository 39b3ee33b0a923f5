import { describe, it, expect } from "vitest";
import { RequestValidationError } from "../src/errors.js";
import { buildTarget, renderTargetUrl } from "../src/services/queryBuilder.js";

describe("buildTarget", () => {
  it("builds the tier list address with lane before tier", () => {
    expect(buildTarget({ operation: "tierlist", n: 5, lane: "top", rank: "diamond_plus" })).toEqual({
      path: "lol/tierlist/",
      query: [
        ["lane", "top"],
        ["tier", "diamond_plus"]
      ]
    });
  });

  it("omits unset filters", () => {
    expect(buildTarget({ operation: "tierlist", n: 5, lane: "", rank: "" })).toEqual({
      path: "lol/tierlist/",
      query: []
    });
  });

  it("keeps the champion name as given", () => {
    expect(buildTarget({ operation: "counters", n: 10, champion: "Yasuo", rank: "master_plus" })).toEqual({
      path: "lol/Yasuo/counters/",
      query: [["tier", "master_plus"]]
    });
    expect(buildTarget({ operation: "champion_data", champion: "dr mundo", lane: "", rank: "" }).path).toBe(
      "lol/dr%20mundo/build/"
    );
  });

  it("builds the matchup address from both champions", () => {
    expect(
      buildTarget({ operation: "matchup", champion1: "jax", champion2: "fiora", lane: "top", rank: "master" })
    ).toEqual({
      path: "lol/jax/vs/fiora/build/",
      query: [
        ["lane", "top"],
        ["tier", "master"]
      ]
    });
  });

  it("points patch notes at the front page", () => {
    expect(buildTarget({ operation: "patch_notes", category: "all", rank: "gold_plus" })).toEqual({
      path: "",
      query: [["tier", "gold_plus"]]
    });
  });

  it("is deterministic", () => {
    const request = { operation: "champion_data", champion: "jax", lane: "top", rank: "diamond_plus" } as const;
    expect(JSON.stringify(buildTarget(request))).toBe(JSON.stringify(buildTarget(request)));
  });

  it("rejects empty champion names", () => {
    expect(() => buildTarget({ operation: "counters", n: 5, champion: "", rank: "" })).toThrow(
      new RequestValidationError("Champion name cannot be empty.")
    );
    expect(() =>
      buildTarget({ operation: "matchup", champion1: "jax", champion2: "", lane: "", rank: "" })
    ).toThrow("Second champion name cannot be empty.");
  });

  it("rejects a matchup of a champion against itself", () => {
    expect(() =>
      buildTarget({ operation: "matchup", champion1: "jax", champion2: "jax", lane: "", rank: "" })
    ).toThrow(RequestValidationError);
  });
});

describe("renderTargetUrl", () => {
  it("joins path and query onto the base URL", () => {
    expect(
      renderTargetUrl("https://lolalytics.com/", {
        path: "lol/jax/build/",
        query: [
          ["lane", "top"],
          ["tier", "diamond_plus"]
        ]
      })
    ).toBe("https://lolalytics.com/lol/jax/build/?lane=top&tier=diamond_plus");
  });

  it("normalizes a base URL without trailing slash", () => {
    expect(renderTargetUrl("https://mirror.example.test", { path: "lol/tierlist/", query: [] })).toBe(
      "https://mirror.example.test/lol/tierlist/"
    );
  });

  it("renders the front page with only a query", () => {
    expect(renderTargetUrl("https://lolalytics.com/", { path: "", query: [["tier", "1trick"]] })).toBe(
      "https://lolalytics.com/?tier=1trick"
    );
  });
});
