import { describe, it, expect } from "vitest";

import { ProtocolError } from "../src/protocol/errors";
import {
  formatPlacement,
  formatSlide,
  type Header,
  parseHeader,
  parseIntegers,
  parseMovementNotice,
  parsePlacementNotice,
} from "../src/protocol/wire";

const header: Header = { width: 4, height: 3, penguinsPerPlayer: 2, me: 1, playerCount: 3 };

function errorOf(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error("expected a ProtocolError");
}

describe("parseIntegers", () => {
  it("splits on any run of whitespace", () => {
    expect(parseIntegers("  3\t-1   0 12 ")).toEqual([3, -1, 0, 12]);
  });

  it("rejects anything that is not a plain integer", () => {
    for (const bad of ["1 2.5", "1 x", "1 +2", "1 0x10"]) {
      expect(errorOf(() => parseIntegers(bad, 7)).code).toBe("MALFORMED_LINE");
    }
    expect(errorOf(() => parseIntegers("4 four", 7)).message).toBe('line 7: not an integer: "four"');
  });
});

describe("parseHeader", () => {
  it("reads width, height, penguins per player, own id and player count", () => {
    expect(parseHeader("4 3 2 1 3")).toEqual(header);
  });

  it("rejects the wrong number of fields", () => {
    const err = errorOf(() => parseHeader("4 3 2 1", 1));
    expect(err.code).toBe("MALFORMED_LINE");
    expect(err.message).toBe("line 1: header: expected 5 fields, got 4");
  });

  it("rejects impossible games", () => {
    expect(errorOf(() => parseHeader("0 3 2 0 2")).code).toBe("BAD_HEADER");
    expect(errorOf(() => parseHeader("4 3 0 0 2")).code).toBe("BAD_HEADER");
    expect(errorOf(() => parseHeader("4 3 2 0 1")).code).toBe("BAD_HEADER");
    expect(errorOf(() => parseHeader("4 3 2 2 2")).message).toBe("own player id 2 outside 0..1");
  });
});

describe("parsePlacementNotice", () => {
  it("recognises our turn with and without a budget", () => {
    expect(parsePlacementNotice("1", header)).toEqual({ type: "yourTurn" });
    expect(parsePlacementNotice("1 750", header)).toEqual({ type: "yourTurn", budgetMs: 750 });
  });

  it("reads opponent placements and passes", () => {
    expect(parsePlacementNotice("2 1 3", header)).toEqual({ type: "placed", player: 2, at: { y: 1, x: 3 } });
    expect(parsePlacementNotice("0 -1 -1", header)).toEqual({ type: "passed", player: 0 });
  });

  it("reads the end of placement", () => {
    expect(parsePlacementNotice("-1", header)).toEqual({ type: "phaseEnd" });
  });

  it("rejects unknown players and wrong field counts", () => {
    expect(errorOf(() => parsePlacementNotice("3 0 0", header)).code).toBe("UNKNOWN_PLAYER");
    expect(errorOf(() => parsePlacementNotice("2 1", header)).message).toBe("placement: expected 3 fields, got 2");
    expect(errorOf(() => parsePlacementNotice("1 750 3", header)).message).toBe(
      "own turn: expected 1 or 2 fields, got 3"
    );
    expect(errorOf(() => parsePlacementNotice("", header)).message).toBe("empty notification");
  });
});

describe("parseMovementNotice", () => {
  it("reads our turn, opponent slides, passes and the end of the game", () => {
    expect(parseMovementNotice("1 200", header)).toEqual({ type: "yourTurn", budgetMs: 200 });
    expect(parseMovementNotice("0 4 2 2", header)).toEqual({
      type: "moved",
      player: 0,
      penguinId: 4,
      to: { y: 2, x: 2 },
    });
    expect(parseMovementNotice("2 -1 -1 -1", header)).toEqual({ type: "passed", player: 2 });
    expect(parseMovementNotice("-1", header)).toEqual({ type: "gameOver" });
  });

  it("rejects a slide report with a field missing", () => {
    const err = errorOf(() => parseMovementNotice("0 4 2", header, 12));
    expect(err.code).toBe("MALFORMED_LINE");
    expect(err.lineNumber).toBe(12);
    expect(err.message).toBe("line 12: move: expected 4 fields, got 3");
  });

  it("rejects trailing fields after the end-of-game marker", () => {
    expect(errorOf(() => parseMovementNotice("-1 0", header)).message).toBe("end of game: expected 1 fields, got 2");
  });
});

describe("formatting", () => {
  it("writes placements as 'y x' and slides as 'penguin y x'", () => {
    expect(formatPlacement({ y: 2, x: 0 })).toBe("2 0");
    expect(formatSlide(3, { y: 1, x: 4 })).toBe("3 1 4");
  });
});
