/**
 * @shipledger/event-store — Append-only identifier counter logs.
 *
 * Every identifier issuance is recorded as its own line:
 * {"counter":42,"timestamp":"2026-01-19T10:00:00.000Z","action":"ID_GENERATED"}
 *
 * The highest counter ever written is the high-water mark. Counters are
 * never overwritten, so recovery after a crash can only move forward.
 */

import {
  openSync,
  closeSync,
  writeSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { encodeTornLineMarker, parseTornLineMarker } from "./torn-line.js";

// =============================================================================
// Types
// =============================================================================

export const CounterRecordSchema = z.object({
  counter: z.number().int().min(1),
  timestamp: z.string().datetime({ offset: true }),
  action: z.literal("ID_GENERATED"),
});

export type CounterRecord = z.infer<typeof CounterRecordSchema>;

/**
 * Durable storage for issued counters.
 */
export interface CounterLog {
  /** Highest counter persisted so far, or 0 if none */
  lastCounter(): number;

  /**
   * Persist an issuance. Must be durable before returning.
   *
   * @throws IdentifierError("STORAGE_FAILURE") if the write fails or the
   *   counter does not exceed the high-water mark
   */
  append(record: CounterRecord): void;
}

export type IdentifierErrorCode =
  | "STORAGE_FAILURE"
  | "EXHAUSTED"
  | "INVALID_OPTIONS";

export class IdentifierError extends Error {
  constructor(
    public readonly code: IdentifierErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "IdentifierError";
  }
}

function assertAdvances(record: CounterRecord, last: number): void {
  if (record.counter <= last) {
    throw new IdentifierError(
      "STORAGE_FAILURE",
      `Counter ${record.counter} does not advance past ${last}`,
    );
  }
}

// =============================================================================
// In-Memory
// =============================================================================

export class InMemoryCounterLog implements CounterLog {
  private readonly _records: CounterRecord[] = [];

  lastCounter(): number {
    return this._records[this._records.length - 1]?.counter ?? 0;
  }

  append(record: CounterRecord): void {
    assertAdvances(record, this.lastCounter());
    this._records.push(record);
  }

  records(): readonly CounterRecord[] {
    return [...this._records];
  }
}

// =============================================================================
// JSONL
// =============================================================================

export interface JsonlCounterLogOptions {
  readonly filePath: string;
}

/**
 * File-backed counter log.
 *
 * Loading is strict: any undecodable record other than a torn write (the
 * unterminated final line, or a line a torn-line marker names), or a
 * counter that does not increase, makes the log unusable. Issuing
 * identifiers from a log whose high-water mark is uncertain could hand
 * out a value twice.
 */
export class JsonlCounterLog implements CounterLog {
  private readonly _filePath: string;
  private _last = 0;
  private _needsNewline = false;
  /** Newline-terminated lines in the file */
  private _lines = 0;

  /**
   * @throws IdentifierError("STORAGE_FAILURE") if the log cannot be read
   *   or is corrupt
   */
  constructor(options: JsonlCounterLogOptions) {
    this._filePath = options.filePath;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
    } catch (err) {
      throw new IdentifierError(
        "STORAGE_FAILURE",
        `Cannot create directory for "${this._filePath}"`,
        err,
      );
    }

    this._load();
  }

  lastCounter(): number {
    return this._last;
  }

  append(record: CounterRecord): void {
    assertAdvances(record, this._last);

    const prefix = this._needsNewline
      ? "\n" + encodeTornLineMarker(this._lines + 1) + "\n"
      : "";
    const data = prefix + JSON.stringify(record) + "\n";

    let fd: number | undefined;
    try {
      fd = openSync(this._filePath, "a");
      writeSync(fd, data, null, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      this._needsNewline = true;
      throw new IdentifierError(
        "STORAGE_FAILURE",
        `Durable write to counter log "${this._filePath}" failed`,
        err,
      );
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }

    this._lines += this._needsNewline ? 3 : 1;
    this._needsNewline = false;
    this._last = record.counter;
  }

  get filePath(): string {
    return this._filePath;
  }

  private _load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    let content: string;
    try {
      content = readFileSync(this._filePath, "utf-8");
    } catch (err) {
      throw new IdentifierError(
        "STORAGE_FAILURE",
        `Cannot read counter log "${this._filePath}"`,
        err,
      );
    }

    const torn = content.length > 0 && !content.endsWith("\n");
    this._needsNewline = torn;

    const lines = content.split("\n");
    this._lines = lines.length - 1;

    // An unterminated final line is a write that never completed; its
    // value was never handed out.
    const tornLines = new Set<number>(torn ? [lines.length] : []);
    const undecodable: number[] = [];

    for (let i = 0; i < lines.length; i++) {
      const trimmed = (lines[i] ?? "").trim();
      if (trimmed.length === 0) {
        continue;
      }

      const marked = parseTornLineMarker(trimmed);
      if (marked !== undefined) {
        tornLines.add(marked);
        continue;
      }

      const record = parseCounterLine(trimmed);
      if (record === undefined) {
        undecodable.push(i + 1);
        continue;
      }

      if (record.counter <= this._last) {
        throw new IdentifierError(
          "STORAGE_FAILURE",
          `Counter at line ${i + 1} of "${this._filePath}" does not increase (${record.counter} after ${this._last})`,
        );
      }
      this._last = record.counter;
    }

    const corrupt = undecodable.find((line) => !tornLines.has(line));
    if (corrupt !== undefined) {
      throw new IdentifierError(
        "STORAGE_FAILURE",
        `Corrupt counter record at line ${corrupt} of "${this._filePath}"`,
      );
    }
  }
}

function parseCounterLine(line: string): CounterRecord | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = CounterRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}
