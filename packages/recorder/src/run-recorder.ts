import { mkdir, open, readFile, rename } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuid } from "uuid";
import type { RunFinalMetadata, RunMetadata, RunRecord, TurnRecord } from "@grue/schemas";
import { isRunRecord, validateRunRecordData, validateTurnRecordData } from "@grue/schemas";

export interface RunRecorderOptions {
  logDir: string;
  /** fsync the temp file before the rename. Default: true */
  fsync?: boolean;
  /** Clock used for timestamps and the file name. */
  now?: () => Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time YYYYMMDD_HHMMSS. */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_").slice(0, 64) || "unnamed";
}

/**
 * Durable per-run artifact at `<logDir>/<game>_<agent>_<YYYYMMDD_HHMMSS>_<run id
 * prefix>.json`. The whole record is rewritten atomically on every call, so a
 * crash leaves the last complete version on disk.
 */
export class RunRecorder {
  private logDir: string;
  private fsync: boolean;
  private now: () => Date;
  private record: RunRecord | null = null;
  private filePath: string | null = null;

  constructor(options: RunRecorderOptions) {
    this.logDir = options.logDir;
    this.fsync = options.fsync ?? true;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string | null {
    return this.filePath;
  }

  get current(): Readonly<RunRecord> | null {
    return this.record;
  }

  async start(metadata: RunMetadata): Promise<string> {
    const started = this.now();
    const runId = uuid();
    this.record = {
      run_id: runId,
      ...metadata,
      started_at: started.toISOString(),
      ended_at: null,
      final_score: 0,
      final_moves: 0,
      locations_visited: [],
      game_completed: false,
      map_state: {},
      turns: [],
    };
    // The run id suffix keeps runs started in the same second apart
    this.filePath = join(
      this.logDir,
      `${safeSegment(metadata.game_id)}_${safeSegment(metadata.agent_id)}_${fileTimestamp(started)}_${runId.slice(0, 8)}.json`,
    );
    await this.persist();
    return runId;
  }

  async append(turn: TurnRecord): Promise<void> {
    const record = this.requireRecord();
    const validation = validateTurnRecordData(turn);
    if (!validation.valid) {
      throw new Error(`Invalid turn record: ${validation.errors.join(", ")}`);
    }
    record.turns.push(turn);
    await this.persist();
  }

  async finish(final: RunFinalMetadata): Promise<string> {
    const record = this.requireRecord();
    record.ended_at = this.now().toISOString();
    record.final_score = final.final_score;
    record.final_moves = final.final_moves;
    record.locations_visited = [...new Set(final.locations_visited)];
    record.game_completed = final.game_completed;
    record.map_state = final.map_state;
    if (final.error !== undefined) record.error = final.error;
    await this.persist();
    return this.requirePath();
  }

  /** Read an artifact back and check it against the run-record schema. */
  static async load(path: string): Promise<RunRecord> {
    const data: unknown = JSON.parse(await readFile(path, "utf-8"));
    if (!isRunRecord(data)) {
      throw new Error(`Invalid run record: ${validateRunRecordData(data).errors.join(", ")}`);
    }
    return data;
  }

  private requireRecord(): RunRecord {
    if (!this.record) throw new Error("No active run. Call start() first.");
    return this.record;
  }

  private requirePath(): string {
    if (!this.filePath) throw new Error("No active run. Call start() first.");
    return this.filePath;
  }

  private async persist(): Promise<void> {
    const record = this.requireRecord();
    const target = this.requirePath();
    const validation = validateRunRecordData(record);
    if (!validation.valid) {
      throw new Error(`Invalid run record: ${validation.errors.join(", ")}`);
    }

    await mkdir(this.logDir, { recursive: true });
    const tmpPath = `${target}.${record.run_id}.tmp`;
    const fh = await open(tmpPath, "w");
    try {
      await fh.writeFile(JSON.stringify(record, null, 2), "utf-8");
      if (this.fsync) await fh.sync();
    } finally {
      await fh.close();
    }
    await rename(tmpPath, target);
  }
}
