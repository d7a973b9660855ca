/**
 * @shipledger/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Embedding behind a durable log service that replays into it
 *
 * Not durable (all state lost on process exit).
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Hash-chained like the durable store
 */

import type { PendingEvent } from "@shipledger/types";
import { LogIndex } from "./log-index.js";
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

export class InMemoryEventStore implements EventStore {
  private readonly _index = new LogIndex();

  // ─── Append ─────────────────────────────────────────────────────────

  append(event: PendingEvent, options?: AppendOptions): AppendResult {
    const prepared = this._index.prepare(event, options);

    if (prepared.kind === "new") {
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
    return [];
  }
}
