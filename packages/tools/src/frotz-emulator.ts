/**
 * Z-machine interpreter over a dfrotz child process. Commands go in on stdin;
 * each response is read from stdout up to the next "> " prompt.
 *
 * dfrotz (-m suppresses [MORE] pauses) prints every turn as:
 *
 *   " West of House                              Score: 0        Moves: 3\n"
 *   "\n"
 *   "Opening the small mailbox reveals a leaflet.\n"
 *   "\n"
 *   "> "          <- prompt without a trailing newline; dfrotz blocks here
 *
 * The status line starts with a space and carries "Score:" and "Moves:".
 */

import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

export const DFROTZ_BIN = "dfrotz";

export const NO_RESPONSE = "(no visible response)";

export interface FrotzResult {
  /** Raw dfrotz output for this turn, prompt removed. */
  output: string;
  /** Response text without the status line or blank lines. */
  body: string;
  /** Room name from the status line, "" when there was none. */
  roomHeader: string;
  score?: number;
  moves?: number;
  durationMs: number;
}

/** The interpreter as the game session sees it. */
export interface GameEmulator {
  launch(): Promise<FrotzResult>;
  send(command: string): Promise<FrotzResult>;
  close(): Promise<void>;
}

/** The slice of a child process the emulator talks to. */
export interface FrotzProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  exitCode: number | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "exit", listener: (code: number | null) => void): unknown;
  kill(): boolean;
}

export type SpawnFrotz = (bin: string, args: string[]) => FrotzProcess;

export interface FrotzEmulatorOptions {
  bin?: string;
  /** Interpreter random seed (dfrotz -s). */
  seed?: number;
  /** Saved game to restore on startup (dfrotz -L). */
  restorePath?: string;
  spawnProcess?: SpawnFrotz;
}

const STATUS_LINE = /Score:\s*(-?\d+).*Moves:\s*(\d+)/i;

export function parseOutput(raw: string): Pick<FrotzResult, "body" | "roomHeader" | "score" | "moves"> {
  const lines = raw.split("\n");
  const statusIdx = lines.findIndex(l => STATUS_LINE.test(l));

  let roomHeader = "";
  let score: number | undefined;
  let moves: number | undefined;
  let bodyLines = lines;

  const status = statusIdx === -1 ? undefined : lines[statusIdx];
  if (status !== undefined) {
    // Everything from the first run of 2+ spaces onward is the score block
    roomHeader = status.replace(/\s{2,}Score:.*$/i, "").trim();
    const match = STATUS_LINE.exec(status);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      score = parseInt(match[1], 10);
      moves = parseInt(match[2], 10);
    }
    bodyLines = lines.slice(statusIdx + 1);
  }

  const body = bodyLines
    .map(l => l.trim())
    .filter(l => l.length > 0)
    .join("\n")
    .trim();

  return { roomHeader, body: body || NO_RESPONSE, score, moves };
}

interface Waiter {
  check: () => void;
  fail: (err: Error) => void;
}

export class FrotzEmulator implements GameEmulator {
  private gamePath: string;
  private bin: string;
  private seed?: number;
  private restorePath?: string;
  private spawnProcess: SpawnFrotz;

  private proc: FrotzProcess | null = null;
  private buffer = "";
  private waiters: Waiter[] = [];
  private failure: Error | null = null;

  constructor(gamePath: string, options?: FrotzEmulatorOptions) {
    this.gamePath = gamePath;
    this.bin = options?.bin ?? DFROTZ_BIN;
    this.seed = options?.seed;
    this.restorePath = options?.restorePath;
    this.spawnProcess = options?.spawnProcess ?? ((bin, args) => spawn(bin, args));
  }

  // ── lifecycle ────────────────────────────────────────────────────────────────

  /** Start dfrotz and return the opening screen. */
  async launch(): Promise<FrotzResult> {
    if (this.proc) throw new Error("dfrotz is already running");
    const args = ["-m"];
    if (this.seed !== undefined) args.push("-s", String(this.seed));
    if (this.restorePath) args.push("-L", this.restorePath);
    args.push(this.gamePath);

    const start = Date.now();
    const proc = this.spawnProcess(this.bin, args);
    this.proc = proc;
    this.buffer = "";
    this.failure = null;

    // A decoder on the stream keeps multi-byte characters split across chunks intact
    proc.stdout.setEncoding("utf8");
    proc.stdout.on("data", (chunk: string) => {
      this.buffer += chunk;
      for (const w of [...this.waiters]) w.check();
    });
    // "Using normal formatting." / "Loading ..." chatter
    proc.stderr.on("data", () => {});
    proc.stdin.on("error", (err: Error) => this.fail(new Error(`dfrotz stdin error: ${err.message}`)));
    proc.on("error", err => this.fail(new Error(`dfrotz process error: ${err.message}. Is dfrotz installed?`)));
    proc.on("exit", code => this.fail(new Error(`dfrotz exited with code ${code ?? "null"}`)));

    const raw = await this.readUntilPrompt();
    return { output: raw, ...parseOutput(raw), durationMs: Date.now() - start };
  }

  async send(command: string): Promise<FrotzResult> {
    const proc = this.proc;
    if (!proc) throw new Error("dfrotz is not running; call launch() first");
    if (this.failure) throw this.failure;

    const start = Date.now();
    proc.stdin.write(`${command}\n`);
    const raw = await this.readUntilPrompt();
    return { output: raw, ...parseOutput(raw), durationMs: Date.now() - start };
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;
    this.proc = null;
    if (proc.exitCode !== null) return;
    proc.stdin.write("quit\ny\n");
    await new Promise<void>(r => setTimeout(r, 150));
    if (proc.exitCode === null) proc.kill();
  }

  // ── prompt detection ─────────────────────────────────────────────────────────

  private fail(err: Error): void {
    this.failure ??= err;
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) w.fail(this.failure);
  }

  /**
   * Resolve with everything before the "> " prompt. The very first prompt may
   * arrive without a preceding newline; ">" inside game text is never at the
   * end of the buffer while dfrotz is waiting for input.
   */
  private readUntilPrompt(): Promise<string> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      const waiter: Waiter = {
        check: () => {
          const atPrompt = /\n> *$/.test(this.buffer) || /^> *$/.test(this.buffer.trim());
          if (!atPrompt) return;
          this.waiters = this.waiters.filter(w => w !== waiter);
          const promptIdx = this.buffer.lastIndexOf("\n>");
          const text = promptIdx === -1 ? this.buffer.replace(/> *$/, "").trim() : this.buffer.slice(0, promptIdx);
          this.buffer = "";
          resolve(text);
        },
        fail: reject,
      };
      this.waiters.push(waiter);
      waiter.check();
    });
  }
}
