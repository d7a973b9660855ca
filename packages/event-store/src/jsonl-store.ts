/**
 * @shipledger/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - In-memory state is updated only after the write succeeded
 * - Partial writes (torn lines) are detected and skipped on load
 * - A torn trailing line is terminated and marked before the next record is
 *   written, so strict loads tolerate it on every later restart
 * - The file is the source of truth; in-memory state is derived
 *
 * Properties:
 * - Durable: events survive process restart
 * - Append-only: file is never truncated or rewritten
 * - O(1) append (single write + fsync)
 * - O(n) load on startup (sequential read of all lines)
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
import type { PendingEvent } from "@shipledger/types";
import { LogIndex } from "./log-index.js";
import { decodeRecord, encodeRecord } from "./record.js";
import { encodeTornLineMarker, parseTornLineMarker } from "./torn-line.js";
import type {
  AppendOptions,
  AppendResult,
  CorruptRecord,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * Options for creating a JsonlEventStore.
 */
export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;

  /**
   * Throw on the first undecodable line instead of skipping it. Torn writes
   * are skipped in either mode.
   * Default: false
   */
  readonly strict?: boolean;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlEventStore implements EventStore {
  private readonly _filePath: string;
  private readonly _strict: boolean;
  private readonly _index = new LogIndex();
  private readonly _corrupt: CorruptRecord[] = [];

  /** Set when the file does not end in a newline (torn last write) */
  private _needsNewline = false;

  /** Newline-terminated lines in the file */
  private _lines = 0;

  /**
   * Create a new JsonlEventStore.
   *
   * If the file exists, events are loaded from it.
   * If the file does not exist, it will be created on first append.
   * The parent directory is created if it doesn't exist.
   *
   * @throws EventStoreError("STORAGE_FAILURE") if the file cannot be read
   * @throws EventStoreError("CORRUPT_RECORD") in strict mode
   */
  constructor(options: JsonlEventStoreOptions) {
    this._filePath = options.filePath;
    this._strict = options.strict ?? false;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
    } catch (err) {
      throw new EventStoreError(
        "STORAGE_FAILURE",
        `Cannot create directory for "${this._filePath}"`,
        undefined,
        err,
      );
    }

    this._loadFromFile();
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(event: PendingEvent, options?: AppendOptions): AppendResult {
    const prepared = this._index.prepare(event, options);

    if (prepared.kind === "new") {
      const prefix = this._needsNewline
        ? "\n" + encodeTornLineMarker(this._lines + 1) + "\n"
        : "";
      this._writeAndSync(prefix + encodeRecord(prepared.event) + "\n", event.shipmentId);
      this._lines += this._needsNewline ? 3 : 1;
      this._needsNewline = false;
      this._index.commit(prepared.event);
    }

    return {
      eventSeq: prepared.event.eventSeq,
      globalPosition: prepared.event.globalPosition,
      duplicate: prepared.kind === "duplicate",
      event: prepared.event,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readFor(shipmentId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this._index.readFor(shipmentId, options);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return this._index.readAll(options);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  shipmentIds(): readonly string[] {
    return this._index.shipmentIds();
  }

  currentSeq(shipmentId: string): number {
    return this._index.currentSeq(shipmentId);
  }

  globalPosition(): number {
    return this._index.globalPosition();
  }

  findEvent(eventId: string): StoredEvent | undefined {
    return this._index.findEvent(eventId);
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return this._index.verifyIntegrity();
  }

  corruptRecords(): readonly CorruptRecord[] {
    return [...this._corrupt];
  }

  /**
   * Get the file path this store writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    let content: string;
    try {
      content = readFileSync(this._filePath, "utf-8");
    } catch (err) {
      throw new EventStoreError(
        "STORAGE_FAILURE",
        `Cannot read event log "${this._filePath}"`,
        undefined,
        err,
      );
    }

    this._needsNewline = content.length > 0 && !content.endsWith("\n");

    const lines = content.split("\n");
    this._lines = lines.length - 1;

    const tornLines = new Set<number>(this._needsNewline ? [lines.length] : []);
    const skipped: CorruptRecord[] = [];

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

      const decoded = decodeRecord(trimmed);
      if (!decoded.ok) {
        skipped.push({ line: i + 1, reason: decoded.reason });
        continue;
      }

      if (!this._index.restore(decoded.event)) {
        skipped.push({
          line: i + 1,
          reason: `duplicate event_id "${decoded.event.eventId}"`,
        });
      }
    }

    // Markers follow the line they name, so skipped lines are judged once
    // the whole file has been read.
    for (const record of skipped) {
      if (this._strict && !tornLines.has(record.line)) {
        throw new EventStoreError(
          "CORRUPT_RECORD",
          `Corrupt record at line ${record.line} of "${this._filePath}": ${record.reason}`,
        );
      }
      this._corrupt.push(record);
    }
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string, shipmentId: string): void {
    let fd: number | undefined;
    try {
      fd = openSync(this._filePath, "a");
      writeSync(fd, data, null, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      // Part of the line may have reached the file; start the next record on a fresh line.
      this._needsNewline = true;
      throw new EventStoreError(
        "STORAGE_FAILURE",
        `Durable write to "${this._filePath}" failed`,
        shipmentId,
        err,
      );
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }
}
