/**
 * @shipledger/event-store — In-memory log index.
 *
 * Shared by every EventStore implementation. Holds:
 * - Per-shipment arrays (indexed by shipmentId) for shipment reads
 * - A global array for readAll and hash chaining
 * - An eventId index for idempotent appends
 *
 * Appending is split in two steps so a durable store can write the record
 * between them: `prepare` validates and builds the record without touching
 * any state, `commit` makes it visible. If the write fails, nothing was
 * committed.
 */

import type { PendingEvent } from "@shipledger/types";
import { TERMINAL_STATE } from "@shipledger/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import { TimestampSchema } from "./record.js";
import type {
  AppendOptions,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

export type PrepareResult =
  | { readonly kind: "new"; readonly event: StoredEvent }
  | { readonly kind: "duplicate"; readonly event: StoredEvent };

export class LogIndex {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _byEventId = new Map<string, StoredEvent>();
  private _lastHash: string = GENESIS_HASH;
  private _nextGlobalPosition = 1;

  // ─── Append ─────────────────────────────────────────────────────────

  prepare(event: PendingEvent, options?: AppendOptions): PrepareResult {
    if (event.shipmentId.length === 0) {
      throw new EventStoreError("INVALID_EVENT", "Shipment ID must be a non-empty string");
    }
    if (event.eventId.length === 0) {
      throw new EventStoreError(
        "INVALID_EVENT",
        "Event ID must be a non-empty string",
        event.shipmentId,
      );
    }

    const existing = this._byEventId.get(event.eventId);
    if (existing !== undefined) {
      return { kind: "duplicate", event: existing };
    }

    const head = this.head(event.shipmentId);
    const currentSeq = head?.eventSeq ?? 0;

    const expectedSeq = options?.expectedSeq;
    if (expectedSeq !== undefined && expectedSeq !== currentSeq) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Shipment "${event.shipmentId}" is at sequence ${currentSeq}, expected ${expectedSeq}`,
        event.shipmentId,
      );
    }

    if (head !== undefined && head.newState === TERMINAL_STATE) {
      throw new EventStoreError(
        "STREAM_CLOSED",
        `Shipment "${event.shipmentId}" is closed; no further events may be appended`,
        event.shipmentId,
      );
    }

    const headState = head?.newState ?? null;
    if (event.previousState !== headState) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Shipment "${event.shipmentId}" is in state ${headState ?? "(none)"}, event was decided from ${event.previousState ?? "(none)"}`,
        event.shipmentId,
      );
    }

    // Only accept what the record decoder reads back.
    if (!TimestampSchema.safeParse(event.timestamp).success) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Timestamp "${event.timestamp}" is not a valid ISO 8601 instant`,
        event.shipmentId,
      );
    }
    if (head !== undefined && Date.parse(event.timestamp) < Date.parse(head.timestamp)) {
      throw new EventStoreError(
        "NON_MONOTONIC_TIMESTAMP",
        `Timestamp ${event.timestamp} precedes the last event of "${event.shipmentId}" (${head.timestamp})`,
        event.shipmentId,
      );
    }

    const base = {
      eventId: event.eventId,
      shipmentId: event.shipmentId,
      eventSeq: currentSeq + 1,
      eventType: event.eventType,
      previousState: event.previousState,
      newState: event.newState,
      emittingRole: event.emittingRole,
      timestamp: event.timestamp,
      payload: deepFreeze(structuredClone({ ...event.payload })),
      schemaVersion: event.schemaVersion,
      globalPosition: this._nextGlobalPosition,
    };
    const previousHash = this._lastHash;
    const hash = computeEventHash(base, previousHash);

    return {
      kind: "new",
      event: Object.freeze({ ...base, previousHash, hash }),
    };
  }

  commit(event: StoredEvent): void {
    let stream = this._streams.get(event.shipmentId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.shipmentId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);
    this._byEventId.set(event.eventId, event);
    this._lastHash = event.hash;
    if (event.globalPosition >= this._nextGlobalPosition) {
      this._nextGlobalPosition = event.globalPosition + 1;
    }
  }

  /**
   * Add a record read back from durable storage.
   *
   * Records are trusted as written; verifyIntegrity() and the audit
   * verifier check them. Returns false if the event ID is already indexed.
   */
  restore(event: StoredEvent): boolean {
    if (this._byEventId.has(event.eventId)) {
      return false;
    }
    this.commit(Object.freeze({ ...event, payload: deepFreeze({ ...event.payload }) }));
    return true;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readFor(shipmentId: string, options?: ReadOptions): readonly StoredEvent[] {
    const stream = this._streams.get(shipmentId);
    if (stream === undefined) {
      return [];
    }

    const fromSeq = options?.fromSeq ?? 1;
    if (fromSeq < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromSeq must be >= 1, got ${fromSeq}`,
        shipmentId,
      );
    }

    const result = stream.filter((e) => e.eventSeq >= fromSeq);
    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result = this._globalLog.filter((e) => e.globalPosition >= fromPosition);
    return limit(result, options?.maxCount);
  }

  shipmentIds(): readonly string[] {
    return [...this._streams.keys()];
  }

  head(shipmentId: string): StoredEvent | undefined {
    const stream = this._streams.get(shipmentId);
    if (stream === undefined || stream.length === 0) {
      return undefined;
    }
    return stream[stream.length - 1];
  }

  currentSeq(shipmentId: string): number {
    return this.head(shipmentId)?.eventSeq ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  findEvent(eventId: string): StoredEvent | undefined {
    return this._byEventId.get(eventId);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }
}

function limit(
  events: StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  if (maxCount !== undefined && maxCount >= 0) {
    return events.slice(0, maxCount);
  }
  return events;
}

/** Freeze a payload and everything reachable from it. */
function deepFreeze<T extends object>(value: T): Readonly<T> {
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return value;
}
