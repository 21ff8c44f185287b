import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import type { GoogleGenAI } from "@google/genai";
import type { ModelCallFn, ModelCallOptions, ModelCallResult } from "@grue/schemas";
import { ConfigError, PROVIDERS } from "./config.js";
import type { RunnerConfig } from "./config.js";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
}

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  // Network errors
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    return err.status === 429 || err.status >= 500;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const retries = options?.retries ?? MAX_RETRIES;
  const baseDelay = options?.baseDelayMs ?? BASE_DELAY_MS;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !isTransientError(err)) throw err;
      const delay = baseDelay * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
      await new Promise(r => setTimeout(r, delay));
    }
  }
}

function usage(model: string, input: number, output: number): ModelCallResult["usage"] {
  return { input_tokens: input, output_tokens: output, total_tokens: input + output, model };
}

/** Memoize a lazily imported client; a failed import is retried on the next call. */
function lazyClient<C>(load: () => Promise<C>): () => Promise<C> {
  let clientPromise: Promise<C> | null = null;
  return () => {
    if (!clientPromise) {
      clientPromise = load().catch((err: unknown) => {
        clientPromise = null;
        throw err;
      });
    }
    return clientPromise;
  };
}

// ─── Providers ──────────────────────────────────────────────────────

/** The Messages API has no seed; temperature 0 is the closest to reproducible. */
function createClaudeCallFn(model: string, apiKey: string): ModelCallFn {
  const client = lazyClient<Anthropic>(() =>
    import("@anthropic-ai/sdk").then(({ default: AnthropicClient }) => new AnthropicClient({ apiKey })),
  );

  return async (systemPrompt, userPrompt, options) => {
    const anthropic = await client();
    return withRetry(async () => {
      const response = await anthropic.messages.create({
        model,
        max_tokens: options.maxTokens,
        temperature: 0,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      });
      const text = response.content.flatMap(block => (block.type === "text" ? [block.text] : [])).join("");
      if (!text) {
        throw new Error("Claude returned no text content");
      }
      return { text, usage: usage(model, response.usage.input_tokens, response.usage.output_tokens) };
    });
  };
}

function createOpenAICallFn(model: string, apiKey?: string, baseURL?: string): ModelCallFn {
  const client = lazyClient<OpenAI>(() =>
    import("openai").then(({ default: OpenAIClient }) => new OpenAIClient({
      apiKey: apiKey ?? "not-needed",
      ...(baseURL ? { baseURL } : {}),
    })),
  );

  return async (systemPrompt, userPrompt, options) => {
    const openai = await client();
    return withRetry(async () => {
      const response = await openai.chat.completions.create({
        model,
        temperature: 0,
        max_tokens: options.maxTokens,
        seed: options.seed,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
      });
      let content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI returned no content");
      }
      // Strip Qwen3-style <think>...</think> reasoning
      content = content.replace(/<think>[\s\S]*?<\/think>\s*/g, "");
      return {
        text: content,
        usage: usage(model, response.usage?.prompt_tokens ?? 0, response.usage?.completion_tokens ?? 0),
      };
    });
  };
}

function createGeminiCallFn(model: string, apiKey: string): ModelCallFn {
  const client = lazyClient<GoogleGenAI>(() =>
    import("@google/genai").then(({ GoogleGenAI: GeminiClient }) => new GeminiClient({ apiKey })),
  );

  return async (systemPrompt, userPrompt, options) => {
    const ai = await client();
    return withRetry(async () => {
      const response = await ai.models.generateContent({
        model,
        contents: [{ role: "user", parts: [{ text: userPrompt }] }],
        config: {
          systemInstruction: systemPrompt,
          temperature: 0,
          maxOutputTokens: options.maxTokens,
          seed: options.seed,
        },
      });
      const text = response.text;
      if (!text) {
        throw new Error("Gemini returned no content");
      }
      return {
        text,
        usage: usage(
          model,
          response.usageMetadata?.promptTokenCount ?? 0,
          response.usageMetadata?.candidatesTokenCount ?? 0,
        ),
      };
    });
  };
}

// ─── Offline ────────────────────────────────────────────────────────

const MOCK_MOVES: ReadonlyArray<readonly [thought: string, tool: string, args: string]> = [
  ["Look around first.", "play_action", '{"action": "look"}'],
  ["Head north to explore.", "play_action", '{"action": "north"}'],
  ["Check what I am carrying.", "inventory", "{}"],
  ["Try east.", "play_action", '{"action": "east"}'],
  ["Open anything nearby.", "play_action", '{"action": "open mailbox"}'],
  ["Take what is here.", "play_action", '{"action": "take all"}'],
  ["Go south.", "play_action", '{"action": "south"}'],
  ["Try west.", "play_action", '{"action": "west"}'],
];
const MOCK_MOVES_FALLBACK = ["Look around.", "play_action", '{"action": "look"}'] as const;

/**
 * Offline stand-in that plays a fixed exploration cycle. The turn seed picks
 * the move, so a run seed reproduces the same sequence.
 */
export function createMockCallFn(): ModelCallFn {
  return async (_systemPrompt: string, _userPrompt: string, options: ModelCallOptions) => {
    const [thought, tool, args] = MOCK_MOVES[options.seed % MOCK_MOVES.length] ?? MOCK_MOVES_FALLBACK;
    return {
      text: `THOUGHT: ${thought}\nTOOL: ${tool}\nARGS: ${args}`,
      usage: usage("mock", 0, 0),
    };
  };
}

export function createModelCall(config: Pick<RunnerConfig, "provider" | "model" | "apiKey" | "baseURL">): ModelCallFn {
  const { provider, model, apiKey, baseURL } = config;
  switch (provider) {
    case "mock":
      return createMockCallFn();
    case "claude":
      if (!apiKey) throw new ConfigError("ANTHROPIC_API_KEY environment variable is required for the claude provider.");
      return createClaudeCallFn(model, apiKey);
    case "openai":
      return createOpenAICallFn(model, apiKey, baseURL);
    case "gemini":
      if (!apiKey) throw new ConfigError("GOOGLE_API_KEY environment variable is required for the gemini provider.");
      return createGeminiCallFn(model, apiKey);
    default:
      throw new ConfigError(`Unknown provider: "${String(provider)}". Valid options: ${PROVIDERS.join(", ")}`);
  }
}
