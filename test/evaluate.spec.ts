import { describe, it, expect } from "vitest";

import { evaluate, evaluateFeatures, Evaluator, WEIGHTS } from "../src/ai";
import { applyMove, cloneBoard, isOpenTile, listLegalMoves, makeBoard, nextPlayer, slideTargets } from "../src/engine";
import type { BoardState, PlayerIndex } from "../src/types";
import { boardWithPenguins, mulberry32, pickOne } from "./helpers";

// Tiles each player reaches strictly first, one breadth-first search per player.
function territoryByPlayer(board: BoardState): number[] {
  const dist: number[][] = [];
  for (let player = 0; player < board.playerCount; player++) {
    const d = new Array<number>(board.fish.length).fill(Infinity);
    let frontier = board.penguins.filter((p) => p.owner === player).map((p) => p.cell);
    for (const c of frontier) d[c] = 0;
    for (let step = 1; frontier.length > 0; step++) {
      const next: number[] = [];
      for (const c of frontier) {
        for (const t of slideTargets(board, c)) {
          if (d[t] === Infinity) {
            d[t] = step;
            next.push(t);
          }
        }
      }
      frontier = next;
    }
    dist.push(d);
  }

  const territory = new Array<number>(board.playerCount).fill(0);
  for (let cell = 0; cell < board.fish.length; cell++) {
    if (!isOpenTile(board, cell)) continue;
    const ds = dist.map((d) => d[cell]);
    const best = Math.min(...ds);
    if (best !== Infinity && ds.filter((x) => x === best).length === 1) territory[ds.indexOf(best)]++;
  }
  return territory;
}

// Random mid-game positions: placements, then a handful of slides.
function randomPositions(seed: number, count: number): BoardState[] {
  const rng = mulberry32(seed);
  const width = 5 + (seed % 3);
  const fish = Array.from({ length: width * 5 }, () => (rng() < 0.2 ? 0 : 1 + Math.floor(rng() * 3)));
  const board = makeBoard({
    width,
    height: 5,
    playerCount: 2 + (seed % 2),
    penguinsPerPlayer: 2,
    fish,
    rules: { placementRule: "any" },
  });

  const positions: BoardState[] = [];
  let player: PlayerIndex = 0;
  for (let ply = 0; ply < 30 && positions.length < count; ply++) {
    const moves = listLegalMoves(board, player);
    if (moves.length > 0) applyMove(board, pickOne(moves, rng), player);
    player = nextPlayer(board, player);
    if (board.penguins.length > 0) positions.push(cloneBoard(board));
  }
  return positions;
}

describe("evaluate", () => {
  it("breaks a position into weighted features", () => {
    // p0 reaches (0,1) and (0,2); p1 reaches both of those and (0,4)
    const board = boardWithPenguins({ rows: ["1 1 1 1 1"], penguins: [[0, 0, 0], [1, 0, 3]] });

    expect(evaluateFeatures(board, 0)).toEqual({
      captured: 0,
      mobility: -1,
      territory: -1,
      isolation: 0,
      total: -8,
    });
  });

  it("charges a penguin with no slide left", () => {
    const board = boardWithPenguins({ rows: ["1 0 1 1"], penguins: [[0, 0, 0], [1, 0, 2]] });

    expect(evaluateFeatures(board, 0)).toEqual({
      captured: 0,
      mobility: -1,
      territory: -1,
      isolation: -1,
      total: -38,
    });
  });

  it("rises strictly with the player's own captured fish", () => {
    const board = boardWithPenguins({
      rows: ["1 2 3", "3 2 1", "1 1 1"],
      penguins: [
        [0, 0, 0],
        [1, 2, 2],
      ],
    });
    board.captured[0] = 3;
    const lower = evaluate(board, 0);
    board.captured[0] = 5;
    const higher = evaluate(board, 0);

    expect(higher - lower).toBe(2 * WEIGHTS.captured);
  });

  it("is zero-sum between two players", () => {
    const board = boardWithPenguins({
      rows: ["1 2 3 1", "3 2 1 2", "1 1 3 1"],
      penguins: [
        [0, 0, 0],
        [1, 2, 3],
        [0, 1, 2],
        [1, 2, 0],
      ],
    });
    board.captured[1] = 4;

    expect(evaluate(board, 0) + evaluate(board, 1)).toBe(0);
  });

  it("measures a three-player position against the leading opponent", () => {
    const board = boardWithPenguins({
      rows: ["1 1 1 1 1 1 1"],
      playerCount: 3,
      penguins: [
        [0, 0, 0],
        [1, 0, 3],
        [2, 0, 6],
      ],
    });
    board.captured[1] = 2;
    board.captured[2] = 5;

    expect(evaluateFeatures(board, 0).captured).toBe(-5);
    expect(evaluateFeatures(board, 2).captured).toBe(3);
  });

  it("gives each tile to the one player who reaches it first, as separate per-player searches do", () => {
    for (let seed = 1; seed <= 6; seed++) {
      for (const board of randomPositions(seed, 10)) {
        const territory = territoryByPlayer(board);
        for (let player = 0; player < board.playerCount; player++) {
          const others = territory.filter((_, i) => i !== player);
          expect(evaluateFeatures(board, player).territory).toBe(territory[player] - Math.max(...others));
        }
      }
    }
  });

  it("scores the same with one reused evaluator as with a fresh one per call", () => {
    const positions = randomPositions(4, 12);
    const shared = new Evaluator(positions[0]);
    for (const board of positions) {
      expect(shared.score(board, 0)).toBe(evaluate(board, 0));
      expect(shared.features(board, 1)).toEqual(evaluateFeatures(board, 1));
    }
  });

  it("refuses a board of another shape", () => {
    const small = boardWithPenguins({ rows: ["1 1 1"], penguins: [[0, 0, 0], [1, 0, 2]] });
    const wide = boardWithPenguins({ rows: ["1 1 1 1"], penguins: [[0, 0, 0], [1, 0, 3]] });
    expect(() => new Evaluator(small).score(wide, 0)).toThrow(
      "evaluator built for 3 cells and 2 players, got 4 and 2"
    );
  });
});
