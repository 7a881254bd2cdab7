import { describe, expect, it } from "vitest";
import { isTerminal, nextStage } from "../src/pipeline/machine";

describe("nextStage", () => {
  it("walks the happy path to DONE", () => {
    let stage = nextStage({ stage: "RESOLVE_WINDOW" });
    const visited = [stage];
    while (!isTerminal(stage)) {
      stage = nextStage({ stage, roomsQueried: 2, roomsFailed: 0 });
      visited.push(stage);
    }
    expect(visited).toEqual(["FETCH_ALL", "MATCH", "LAYOUT", "APPLY_IGNORE_POLICY", "DONE"]);
  });

  it("keeps going on partial failure and ends in PARTIAL_FAILURE", () => {
    expect(nextStage({ stage: "FETCH_ALL", roomsQueried: 3, roomsFailed: 1 })).toBe("MATCH");
    expect(nextStage({ stage: "APPLY_IGNORE_POLICY", roomsQueried: 3, roomsFailed: 1 })).toBe("PARTIAL_FAILURE");
  });

  it("fails when every room fetch failed", () => {
    expect(nextStage({ stage: "FETCH_ALL", roomsQueried: 3, roomsFailed: 3 })).toBe("FAILED");
    expect(nextStage({ stage: "FAILED" })).toBe("FAILED");
  });
});
