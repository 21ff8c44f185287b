import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { GameSession, ModelCallFn, OperationArguments, SessionOperation } from "@grue/schemas";
import { SESSION_OPERATIONS } from "@grue/schemas";
import { SYSTEM_PROMPT } from "@grue/planner";
import { RunRecorder } from "@grue/recorder";
import { TurnOrchestrator } from "./orchestrator.js";
import type { OrchestratorConfig } from "./orchestrator.js";
import { SessionState } from "./session-state.js";

type Responder = (operation: SessionOperation, args: OperationArguments) => unknown;

class FakeSession implements GameSession {
  calls: Array<[SessionOperation, OperationArguments]> = [];

  constructor(
    private respond: Responder,
    private operations: string[] = [...SESSION_OPERATIONS],
  ) {}

  async listOperations(): Promise<string[]> {
    return this.operations;
  }

  async callOperation(name: SessionOperation, args: OperationArguments): Promise<unknown> {
    this.calls.push([name, args]);
    return this.respond(name, args);
  }

  playedActions(): unknown[] {
    return this.calls.filter(([op]) => op === "play_action").map(([, args]) => args.action);
  }
}

function reply(action: string, thought = "Keep exploring."): string {
  return `THOUGHT: ${thought}\nTOOL: play_action\nARGS: {"action": "${action}"}`;
}

/** Model that plays the given replies in order and repeats the last one. */
function scriptedModel(replies: string[]) {
  let i = 0;
  return vi.fn<ModelCallFn>(async () => {
    const text = replies[Math.min(i, replies.length - 1)] ?? "";
    i++;
    return { text, usage: { input_tokens: 10, output_tokens: 5, total_tokens: 15 } };
  });
}

const CLEARING = "Clearing\nYou are in a clearing.";

describe("TurnOrchestrator", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "grue-orchestrator-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function makeOrchestrator(
    session: GameSession,
    callModel: ModelCallFn,
    overrides: Partial<OrchestratorConfig> = {},
  ): TurnOrchestrator {
    return new TurnOrchestrator({
      session,
      callModel,
      recorder: new RunRecorder({ logDir: dir, fsync: false }),
      gameId: "testgame",
      agentId: "test-agent",
      maxSteps: 1,
      seed: 42,
      ...overrides,
    });
  }

  // ─── Scenarios ───────────────────────────────────────────────────

  it("moves into a new location and picks up its score", async () => {
    const session = new FakeSession((_op, args) =>
      args.action === "north" ? "You are in a dark forest.\nScore: 10" : CLEARING,
      ["play_action"],
    );
    const state = new SessionState();
    const orchestrator = makeOrchestrator(session, scriptedModel([reply("north")]), { state });

    const result = await orchestrator.run();

    expect(state.location).toBe("You are in a dark forest.");
    expect(state.score).toBe(10);
    expect(state.tracker.locationCount()).toBe(2);
    expect(state.tracker.edgesFrom("Clearing")).toEqual(["north -> You are in a dark forest."]);
    expect(state.tracker.untriedDirections("Clearing")).toEqual(["south", "east", "west", "up", "down"]);
    expect(result).toMatchObject({
      finalScore: 10,
      maxScore: 350,
      moves: 1,
      locationsVisited: ["Clearing", "You are in a dark forest."],
      gameCompleted: false,
      usage: { calls: 1, input_tokens: 10, output_tokens: 5 },
    });
    expect(result.history).toEqual([
      ["Keep exploring.", 'play_action({"action":"north"})', "You are in a dark forest.\nScore: 10"],
    ]);

    const saved = await RunRecorder.load(result.artifactPath);
    expect(saved.ended_at).not.toBeNull();
    expect(saved.final_score).toBe(10);
    expect(saved.map_state).toEqual({
      Clearing: ["north -> You are in a dark forest."],
      "You are in a dark forest.": [],
    });
    expect(saved.turns).toHaveLength(1);
    expect(saved.turns[0]).toMatchObject({
      index: 1,
      rationale: "Keep exploring.",
      operation: "play_action",
      arguments: { action: "north" },
      observation_excerpt: "You are in a dark forest.\nScore: 10",
      location: "You are in a dark forest.",
      score: 10,
      moves: 1,
    });
  });

  it("breaks a loop of three identical actions on the next turn", async () => {
    const session = new FakeSession((op, args) => {
      if (op === "get_valid_actions") return "Valid actions: wait, open door, north";
      if (args.action === "wait") return "Clearing\nTime passes.";
      if (args.action === "open door") return "Clearing\nThe door opens.";
      return CLEARING;
    }, ["play_action", "get_valid_actions"]);
    const state = new SessionState();
    const orchestrator = makeOrchestrator(session, scriptedModel([reply("wait")]), { state, maxSteps: 4 });

    await orchestrator.run();

    expect(session.playedActions()).toEqual(["look", "wait", "wait", "wait", "open door"]);
    expect(state.monitor.isLooping()).toBe(false);
  });

  it("counts failures and stops repeating an action that failed three times", async () => {
    const session = new FakeSession((_op, args) =>
      args.action === "look" ? CLEARING : "Clearing\nYou can't go that way.",
      ["play_action"],
    );
    const state = new SessionState();
    const model = scriptedModel([reply("up"), reply("look"), reply("up"), reply("look"), reply("up"), reply("look"), reply("up")]);
    const orchestrator = makeOrchestrator(session, model, { state, maxSteps: 7 });

    await orchestrator.run();

    expect(session.playedActions()).toEqual(["look", "up", "look", "up", "look", "up", "look", "north"]);
    expect(state.failures.count("up")).toBe(3);
    expect(state.failures.count("north")).toBe(1);
  });

  it("ends the run when the player dies", async () => {
    const session = new FakeSession((_op, args) =>
      args.action === "north" ? "Forest\n*** You have died ***" : CLEARING,
      ["play_action"],
    );
    const model = scriptedModel([reply("north")]);
    const orchestrator = makeOrchestrator(session, model, { maxSteps: 10 });

    const result = await orchestrator.run();

    expect(model).toHaveBeenCalledTimes(1);
    expect(result.gameCompleted).toBe(true);
    expect(result.history).toHaveLength(1);
    expect(orchestrator.currentPhase).toBe("terminated");
    expect((await RunRecorder.load(result.artifactPath)).game_completed).toBe(true);
  });

  // ─── Dispatch and model errors ───────────────────────────────────

  it("turns a session error into an observation and keeps going", async () => {
    const session = new FakeSession((_op, args) => {
      if (args.action === "xyzzy") throw new Error("boom");
      return CLEARING;
    }, ["play_action"]);
    const state = new SessionState();
    const orchestrator = makeOrchestrator(session, scriptedModel([reply("xyzzy"), reply("look")]), {
      state,
      maxSteps: 2,
    });

    const result = await orchestrator.run();

    expect(result.history.map(([, , obs]) => obs)).toEqual(["Error: boom", CLEARING]);
    expect(state.location).toBe("Clearing");
    const saved = await RunRecorder.load(result.artifactPath);
    expect(saved.turns[0]?.observation_excerpt).toBe("Error: boom");
    expect(saved.turns[0]?.location).toBe("Clearing");
  });

  it("records a model failure in the artifact and rethrows it", async () => {
    const session = new FakeSession(() => CLEARING, ["play_action"]);
    const model = vi.fn<ModelCallFn>(async () => {
      throw new Error("model unavailable");
    });
    const recorder = new RunRecorder({ logDir: dir, fsync: false });
    const orchestrator = makeOrchestrator(session, model, { recorder });

    await expect(orchestrator.run()).rejects.toThrow("model unavailable");

    const saved = await RunRecorder.load(recorder.path ?? "");
    expect(saved.error).toBe("model unavailable");
    expect(saved.ended_at).not.toBeNull();
    expect(saved.turns).toEqual([]);
  });

  it("refuses to run twice", async () => {
    const session = new FakeSession(() => CLEARING, ["play_action"]);
    const orchestrator = makeOrchestrator(session, scriptedModel([reply("look")]));
    await orchestrator.run();
    await expect(orchestrator.run()).rejects.toThrow("A TurnOrchestrator runs once; create a new one per run");
  });

  // ─── Prompting ───────────────────────────────────────────────────

  it("varies the seed per turn and sends the system prompt", async () => {
    const session = new FakeSession(() => CLEARING, ["play_action"]);
    const model = scriptedModel([reply("look")]);
    await makeOrchestrator(session, model, { maxSteps: 2, maxTokens: 200 }).run();

    expect(model).toHaveBeenNthCalledWith(
      1,
      SYSTEM_PROMPT,
      expect.stringContaining("Current situation:\nClearing\nYou are in a clearing."),
      { seed: 43, maxTokens: 200 },
    );
    expect(model).toHaveBeenNthCalledWith(2, SYSTEM_PROMPT, expect.any(String), { seed: 44, maxTokens: 200 });
  });

  it("includes walkthrough hints for the current step", async () => {
    const session = new FakeSession(() => CLEARING, ["play_action"]);
    const model = scriptedModel([reply("look")]);
    await makeOrchestrator(session, model, { walkthrough: ["north", "east", "open window", "enter"] }).run();

    expect(model.mock.calls[0]?.[1]).toContain("[HINT - Optimal next steps: north, east, open window]");
  });

  // ─── Queries ─────────────────────────────────────────────────────

  it("takes start snapshots and resolves query synonyms", async () => {
    const session = new FakeSession((op) => {
      switch (op) {
        case "inventory":
          return { content: [{ type: "text", text: "You are carrying:\n  A brass lantern" }] };
        case "get_valid_actions":
          return "Valid actions: north, look";
        case "get_map":
          return "Explored Locations and Exits:\n\n* Clearing";
        default:
          return CLEARING;
      }
    });
    const state = new SessionState();
    const model = scriptedModel(["THOUGHT: What do I have?\nTOOL: inv\nARGS: {}"]);
    const result = await makeOrchestrator(session, model, { state }).run();

    expect(session.calls.map(([op]) => op)).toEqual([
      "inventory",
      "get_valid_actions",
      "play_action",
      "inventory",
    ]);
    expect(state.inventory).toEqual(["A brass lantern"]);
    expect(state.validActions).toEqual(["north", "look"]);
    expect(state.location).toBe("Clearing");
    expect(result.moves).toBe(0);

    const saved = await RunRecorder.load(result.artifactPath);
    expect(saved.turns[0]).toMatchObject({
      operation: "inventory",
      arguments: {},
      inventory: ["A brass lantern"],
      valid_actions: ["north", "look"],
    });
  });
});
