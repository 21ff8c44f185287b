import { describe, it, expect } from "vitest";
import { SESSION_OPERATIONS } from "@grue/schemas";
import { parseResponse, parseArguments } from "./response-parser.js";

const accepted = [...SESSION_OPERATIONS];

describe("parseResponse", () => {
  it("parses a well-formed response", () => {
    const raw = 'THOUGHT: Go north.\nTOOL: play_action\nARGS: {"action": "north"}';
    expect(parseResponse(raw, accepted)).toEqual({
      rationale: "Go north.",
      operation: "play_action",
      arguments: { action: "north" },
    });
  });

  it("matches labels case-insensitively", () => {
    expect(parseResponse("thought: x\ntool: memory\nargs: {}", accepted)).toEqual({
      rationale: "x",
      operation: "memory",
      arguments: {},
    });
  });

  it("strips markdown around labels and values", () => {
    const raw = "**THOUGHT:** check the map\n**TOOL:** `get_map`\n- ARGS: {}";
    const decision = parseResponse(raw, accepted);
    expect(decision.rationale).toBe("check the map");
    expect(decision.operation).toBe("get_map");
    expect(decision.arguments).toEqual({});
  });

  it("uses only the first occurrence of each label", () => {
    const raw = "TOOL: inventory\nTOOL: memory\nARGS: {}";
    expect(parseResponse(raw, accepted).operation).toBe("inventory");
  });

  it("picks an accepted name written inside a sentence", () => {
    expect(parseResponse("TOOL: use get_map please", accepted).operation).toBe("get_map");
  });

  it("keeps an unknown operation for the normalizer", () => {
    expect(parseResponse("TOOL: Look_Around", accepted).operation).toBe("look_around");
  });

  it("returns defaults for unlabeled text", () => {
    expect(parseResponse("I think I'll go north", accepted)).toEqual({
      rationale: "No reasoning provided",
      operation: "play_action",
      arguments: { action: "look" },
    });
  });

  it("returns defaults for an empty response", () => {
    expect(parseResponse("", accepted)).toEqual({
      rationale: "No reasoning provided",
      operation: "play_action",
      arguments: { action: "look" },
    });
  });

  it("treats an empty thought as missing", () => {
    expect(parseResponse("THOUGHT:\nTOOL: play_action", accepted).rationale).toBe("No reasoning provided");
  });
});

describe("parseArguments", () => {
  it("accepts single-quoted JSON", () => {
    expect(parseArguments("{'action': 'open mailbox'}")).toEqual({ action: "open mailbox" });
  });

  it("extracts a lone action pair from broken JSON", () => {
    expect(parseArguments('"action": "take lamp", junk')).toEqual({ action: "take lamp" });
  });

  it("rejects non-object JSON", () => {
    expect(parseArguments("[1, 2]")).toEqual({ action: "look" });
  });

  it("falls back to look on truncated input", () => {
    expect(parseArguments("{")).toEqual({ action: "look" });
  });
});
