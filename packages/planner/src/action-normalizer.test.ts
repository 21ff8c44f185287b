import { describe, it, expect, beforeEach } from "vitest";
import { SESSION_OPERATIONS } from "@grue/schemas";
import { normalizeAction, resolveOperation, canonicalizeAction } from "./action-normalizer.js";
import type { NormalizerContext } from "./action-normalizer.js";
import { ExplorationTracker } from "./exploration-tracker.js";
import { ActionOutcomeStats } from "./action-outcomes.js";

const accepted = [...SESSION_OPERATIONS];

describe("resolveOperation", () => {
  it("resolves synonyms", () => {
    expect(resolveOperation("do", accepted)).toBe("play_action");
    expect(resolveOperation("status", accepted)).toBe("memory");
    expect(resolveOperation("map", accepted)).toBe("get_map");
    expect(resolveOperation("inv", accepted)).toBe("inventory");
    expect(resolveOperation("valid", accepted)).toBe("get_valid_actions");
    expect(resolveOperation("MEMORY", accepted)).toBe("memory");
  });

  it("falls back to play_action for unknown names", () => {
    expect(resolveOperation("dance", accepted)).toBe("play_action");
  });

  it("falls back when the synonym target is not offered", () => {
    expect(resolveOperation("valid", ["play_action", "memory"])).toBe("play_action");
  });

  it("stays inside the accepted set when play_action is missing", () => {
    expect(resolveOperation("dance", ["memory", "get_map"])).toBe("memory");
  });
});

describe("canonicalizeAction", () => {
  it("replaces rejected verbs", () => {
    expect(canonicalizeAction("Grab Lamp")).toBe("take lamp");
    expect(canonicalizeAction("search")).toBe("look");
    expect(canonicalizeAction("use key")).toBe("examine key");
  });

  it("strips markers and collapses whitespace", () => {
    expect(canonicalizeAction("**inspect**   the   mailbox")).toBe("examine the mailbox");
    expect(canonicalizeAction("`open door.`")).toBe("open door");
  });

  it("only touches the first word", () => {
    expect(canonicalizeAction("open search box")).toBe("open search box");
  });

  it("turns an empty action into look", () => {
    expect(canonicalizeAction("  ")).toBe("look");
  });
});

describe("normalizeAction", () => {
  let tracker: ExplorationTracker;
  let failures: ActionOutcomeStats;
  let ctx: NormalizerContext;

  beforeEach(() => {
    tracker = new ExplorationTracker();
    tracker.visit("West of House");
    failures = new ActionOutcomeStats();
    ctx = {
      acceptedOperations: accepted,
      failures,
      validActions: [],
      directions: tracker,
      currentLocation: "West of House",
    };
  });

  it("passes non-play operations through with their arguments", () => {
    expect(normalizeAction("mem", {}, ctx)).toEqual({
      operation: "memory",
      arguments: {},
      notes: ['operation "mem" resolved to memory'],
    });
  });

  it("marks a movement direction as tried", () => {
    const call = normalizeAction("play_action", { action: "N" }, ctx);
    expect(call.arguments).toEqual({ action: "n" });
    expect(tracker.untriedDirections("West of House")).toEqual(["south", "east", "west", "up", "down"]);
  });

  it("keeps extra arguments", () => {
    const call = normalizeAction("play_action", { action: "look", extra: 1 }, ctx);
    expect(call.arguments).toEqual({ action: "look", extra: 1 });
    expect(call.notes).toEqual([]);
  });

  it("defaults a missing action to look", () => {
    expect(normalizeAction("play_action", { action: 5 }, ctx).arguments).toEqual({ action: "look" });
  });

  it("substitutes a fresh valid action after three failures", () => {
    for (let i = 0; i < 3; i++) failures.recordFailure("open window");
    ctx.validActions = ["open window", "enter house", "north"];
    const call = normalizeAction("play_action", { action: "open window" }, ctx);
    expect(call.arguments).toEqual({ action: "enter house" });
    expect(call.notes).toContain('"open window" failed 3 times; trying "enter house"');
  });

  it("leaves an action that failed twice alone", () => {
    failures.recordFailure("open window");
    failures.recordFailure("open window");
    ctx.validActions = ["enter house"];
    expect(normalizeAction("play_action", { action: "open window" }, ctx).arguments).toEqual({
      action: "open window",
    });
  });

  it("falls back to an untried direction that has not failed", () => {
    failures.recordFailure("north");
    for (let i = 0; i < 3; i++) failures.recordFailure("climb tree");
    const call = normalizeAction("play_action", { action: "climb tree" }, ctx);
    expect(call.arguments).toEqual({ action: "south" });
    expect(tracker.untriedDirections("West of House")).toEqual(["north", "east", "west", "up", "down"]);
  });

  it("keeps the action when nothing can replace it", () => {
    for (let i = 0; i < 3; i++) failures.recordFailure("climb tree");
    ctx.currentLocation = "Nowhere";
    expect(normalizeAction("play_action", { action: "climb tree" }, ctx).arguments).toEqual({
      action: "climb tree",
    });
  });
});
