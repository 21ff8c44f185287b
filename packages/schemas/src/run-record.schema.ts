import { SESSION_OPERATIONS } from "./types.js";

export const TurnRecordSchema = {
  type: "object",
  required: [
    "index", "rationale", "operation", "arguments", "observation_excerpt",
    "location", "score", "moves", "inventory", "valid_actions", "timestamp",
  ],
  properties: {
    index: { type: "integer", minimum: 0 },
    rationale: { type: "string" },
    operation: { type: "string", enum: [...SESSION_OPERATIONS] },
    arguments: { type: "object" },
    observation_excerpt: { type: "string" },
    location: { type: "string" },
    score: { type: "integer", minimum: 0 },
    moves: { type: "integer", minimum: 0 },
    inventory: { type: "array", items: { type: "string" } },
    valid_actions: { type: "array", items: { type: "string" } },
    timestamp: { type: "string", format: "date-time" },
  },
  additionalProperties: false,
} as const;

export const RunRecordSchema = {
  type: "object",
  required: [
    "run_id", "game_id", "agent_id", "seed", "max_steps", "started_at", "ended_at",
    "final_score", "final_moves", "locations_visited", "game_completed", "map_state", "turns",
  ],
  properties: {
    run_id: { type: "string", minLength: 1 },
    game_id: { type: "string", minLength: 1 },
    agent_id: { type: "string", minLength: 1 },
    seed: { type: "integer" },
    max_steps: { type: "integer", minimum: 0 },
    started_at: { type: "string", format: "date-time" },
    ended_at: {
      anyOf: [
        { type: "string", format: "date-time" },
        { type: "null" },
      ],
    },
    final_score: { type: "integer", minimum: 0 },
    final_moves: { type: "integer", minimum: 0 },
    locations_visited: { type: "array", items: { type: "string" }, uniqueItems: true },
    game_completed: { type: "boolean" },
    map_state: {
      type: "object",
      additionalProperties: { type: "array", items: { type: "string" } },
    },
    error: { type: "string" },
    turns: { type: "array", items: TurnRecordSchema },
  },
  additionalProperties: false,
} as const;
