import { describe, it, expect } from "vitest";
import {
  canonicalDirection,
  isMovementAction,
  extractLocation,
  extractScore,
  extractMoves,
  isTerminal,
  matchesFailure,
  parseValidActions,
  parseInventory,
  extractResultText,
  toObservation,
} from "./observation.js";

describe("directions", () => {
  it("maps abbreviations to canonical directions", () => {
    expect(canonicalDirection("N")).toBe("north");
    expect(canonicalDirection(" d ")).toBe("down");
    expect(canonicalDirection("northeast")).toBeUndefined();
  });

  it("classifies movement actions", () => {
    expect(isMovementAction("enter")).toBe(true);
    expect(isMovementAction("W")).toBe(true);
    expect(isMovementAction("take lamp")).toBe(false);
  });
});

describe("extractLocation", () => {
  it("takes the first non-empty line", () => {
    expect(extractLocation("\n\nWest of House\nYou are standing in an open field.")).toBe("West of House");
  });

  it("skips bracketed status lines", () => {
    expect(extractLocation("[Score: 5 | Moves: 3]\n\nKitchen\nA table sits here.")).toBe("Kitchen");
  });

  it("falls back to Unknown", () => {
    expect(extractLocation("")).toBe("Unknown");
    expect(extractLocation("[a]\n  [b]")).toBe("Unknown");
  });
});

describe("score and moves", () => {
  it("reads bracketed and plain score forms", () => {
    expect(extractScore("[Score: 10 | Moves: 4]")).toBe(10);
    expect(extractScore("Your score 7 of a possible 350")).toBe(7);
    expect(extractScore("Nothing to see here")).toBeUndefined();
  });

  it("reads moves", () => {
    expect(extractMoves("[Score: 0 | Moves: 12]")).toBe(12);
    expect(extractMoves("no counter")).toBeUndefined();
  });
});

describe("isTerminal", () => {
  it("detects death and game over case-insensitively", () => {
    expect(isTerminal("*** You have died ***")).toBe(true);
    expect(isTerminal("GAME OVER")).toBe(true);
    expect(isTerminal("The game is not over yet")).toBe(false);
  });
});

describe("matchesFailure", () => {
  it("matches refusal phrases", () => {
    expect(matchesFailure("You can't go that way.")).toBe(true);
    expect(matchesFailure("Nothing happens.")).toBe(true);
    expect(matchesFailure("It is pitch black. You are likely to be eaten.")).toBe(false);
  });

  it("only matches at the start of a word", () => {
    expect(matchesFailure("There is another door here.")).toBe(false);
  });

  it("does not match plain success text", () => {
    expect(matchesFailure("Taken.")).toBe(false);
  });
});

describe("parseValidActions", () => {
  it("splits the listing after the marker", () => {
    expect(parseValidActions("Valid actions: north, take lamp, open mailbox")).toEqual([
      "north",
      "take lamp",
      "open mailbox",
    ]);
  });

  it("returns undefined without the marker", () => {
    expect(parseValidActions("Error: not supported")).toBeUndefined();
  });
});

describe("parseInventory", () => {
  it("reads the interpreter's carrying list", () => {
    expect(parseInventory("You are carrying:\n  A brass lantern\n  A leaflet")).toEqual([
      "A brass lantern",
      "A leaflet",
    ]);
  });

  it("reads a comma-separated list", () => {
    expect(parseInventory("Inventory: lamp, sword")).toEqual(["lamp", "sword"]);
  });

  it("treats empty-handed as empty", () => {
    expect(parseInventory("You are empty-handed.")).toEqual([]);
  });
});

describe("extractResultText", () => {
  it("prefers typed content", () => {
    expect(extractResultText({ content: [{ type: "text", text: "hi" }] })).toBe("hi");
  });

  it("falls back to a list of typed items", () => {
    expect(extractResultText([{ text: "a" }, { text: "b" }])).toBe("a");
    expect(extractResultText([42])).toBe("42");
  });

  it("stringifies anything else", () => {
    expect(extractResultText("plain")).toBe("plain");
    expect(extractResultText({ foo: 1 })).toBe('{"foo":1}');
    expect(extractResultText(undefined)).toBe("");
  });
});

describe("toObservation", () => {
  it("never lowers the score and falls back to known moves", () => {
    const obs = toObservation("[Score: 5]\nKitchen", { score: 10, moves: 3 });
    expect(obs).toEqual({
      text: "[Score: 5]\nKitchen",
      locationHint: "Kitchen",
      score: 10,
      moves: 3,
      terminal: false,
    });
    expect(Object.isFrozen(obs)).toBe(true);
  });

  it("takes a higher reported score and the reported moves", () => {
    const obs = toObservation("[Score: 15 | Moves: 9]\nAttic", { score: 10, moves: 3 });
    expect(obs.score).toBe(15);
    expect(obs.moves).toBe(9);
  });
});
