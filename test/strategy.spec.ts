import { describe, it, expect } from "vitest";

import { chooseGreedyMove, makeStrategy } from "../src/ai";
import { boardWithPenguins, makeTestBoard } from "./helpers";

describe("chooseGreedyMove", () => {
  it("lands on the richest reachable tile", () => {
    const board = boardWithPenguins({ rows: ["1 2 3 1 1"], penguins: [[0, 0, 0], [1, 0, 4]] });
    expect(chooseGreedyMove(board, 0)).toEqual({ kind: "slide", from: 0, to: 2 });
  });

  it("keeps the first enumerated move on ties", () => {
    const board = boardWithPenguins({ rows: ["1 3 1 3 1"], penguins: [[0, 0, 2], [1, 0, 0]] });
    // right reaches (0,3) before left reaches (0,1)
    expect(chooseGreedyMove(board, 0)).toEqual({ kind: "slide", from: 2, to: 3 });
  });

  it("places on the richest allowed cell", () => {
    const any = makeTestBoard({ rows: ["1 3 2 3"], placementRule: "any" });
    expect(chooseGreedyMove(any, 0)).toEqual({ kind: "place", at: 1 });

    const singleFish = makeTestBoard({ rows: ["2 3 1 1"] });
    expect(chooseGreedyMove(singleFish, 0)).toEqual({ kind: "place", at: 2 });
  });

  it("returns null without a legal move", () => {
    const board = boardWithPenguins({ rows: ["1 0 1"], penguins: [[0, 0, 0], [1, 0, 2]] });
    expect(chooseGreedyMove(board, 0)).toBeNull();
  });
});

describe("makeStrategy", () => {
  it("wraps search results as decisions with diagnostics", () => {
    const board = boardWithPenguins({ rows: ["1 1 1 1 0 1"], penguins: [[0, 0, 0], [1, 0, 5]] });
    const strategy = makeStrategy("search", { now: () => 0 });

    const mine = strategy.chooseMove({ board, player: 0, budgetMs: 0 });
    expect(mine).toEqual({
      kind: "move",
      move: { kind: "slide", from: 0, to: 1 },
      details: { score: 146, depth: 1, nodes: 3, elapsedMs: 0, stopReason: "budget" },
    });

    expect(strategy.chooseMove({ board, player: 1, budgetMs: 100 })).toEqual({
      kind: "pass",
      details: { nodes: 0, elapsedMs: 0 },
    });
  });

  it("builds the greedy strategy by name", () => {
    const board = boardWithPenguins({ rows: ["1 0 1"], penguins: [[0, 0, 0], [1, 0, 2]] });
    const greedy = makeStrategy("greedy");
    expect(greedy.name).toBe("greedy");
    expect(greedy.chooseMove({ board, player: 1, budgetMs: 10 })).toEqual({ kind: "pass" });
  });
});
