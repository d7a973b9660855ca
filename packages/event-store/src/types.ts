/**
 * @shipledger/event-store — Core types.
 *
 * Defines the interfaces and types for append-only shipment event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - The log is append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous sequence number within its shipment
 * - Concurrency control via expected sequence (optimistic locking)
 * - Replaying an event ID is a no-op
 */

import type { PendingEvent, ShipmentEvent } from "@shipledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a ShipmentEvent with log-level metadata:
 * - globalPosition: monotonically increasing position across all shipments
 * - previousHash / hash: the tamper-evident chain link
 */
export interface StoredEvent extends ShipmentEvent {
  /** Position across the whole log (1-based, contiguous) */
  readonly globalPosition: number;

  /** Hash of the preceding record, or GENESIS_HASH for position 1 */
  readonly previousHash: string;

  /** SHA-256 over this record's canonical form plus previousHash */
  readonly hash: string;
}

// =============================================================================
// Append
// =============================================================================

/**
 * Options for appending an event.
 */
export interface AppendOptions {
  /**
   * The shipment's current sequence the caller based its decision on.
   * 0 means "the shipment must not exist yet". Omit to skip the check.
   */
  readonly expectedSeq?: number;
}

/**
 * Result of an append operation.
 */
export interface AppendResult {
  /** Sequence assigned to the event (or already held, when duplicate) */
  readonly eventSeq: number;

  readonly globalPosition: number;

  /** True when the event ID was already in the log and nothing was written */
  readonly duplicate: boolean;

  readonly event: StoredEvent;
}

// =============================================================================
// Read Options
// =============================================================================

/**
 * Options for reading one shipment's events.
 */
export interface ReadOptions {
  /** Start reading from this sequence (inclusive, 1-based). Default: 1 */
  readonly fromSeq?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

/**
 * Options for reading events across all shipments.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

// =============================================================================
// Corruption & Integrity
// =============================================================================

/**
 * A log entry that could not be decoded on load.
 */
export interface CorruptRecord {
  /** 1-based line number in the log file */
  readonly line: number;

  readonly reason: string;
}

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last record whose hash verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only shipment event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Per-shipment sequences are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - An event ID is stored at most once
 * - A closed shipment accepts no further events
 */
export interface EventStore {
  /**
   * Append one event to its shipment's history.
   *
   * The store assigns `eventSeq` as one past the shipment's current
   * sequence. An event whose ID is already stored is not written again;
   * the existing record is returned with `duplicate: true`.
   *
   * @throws EventStoreError on a concurrency conflict, a non-monotonic
   *   timestamp, a closed shipment, or a failed durable write
   */
  append(event: PendingEvent, options?: AppendOptions): AppendResult;

  /**
   * Read one shipment's events in sequence order.
   * Returns an empty array for an unknown shipment.
   */
  readFor(shipmentId: string, options?: ReadOptions): readonly StoredEvent[];

  /**
   * Read events across all shipments in global position order.
   */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /**
   * Shipment IDs in order of first appearance.
   */
  shipmentIds(): readonly string[];

  /**
   * Sequence of the shipment's last event, or 0 if it has none.
   */
  currentSeq(shipmentId: string): number;

  /**
   * Position of the last event in the log, or 0 if empty.
   */
  globalPosition(): number;

  /**
   * Look up a stored event by its event ID.
   */
  findEvent(eventId: string): StoredEvent | undefined;

  /**
   * Recompute and check the hash chain over the whole log.
   */
  verifyIntegrity(): EventStoreIntegrityResult;

  /**
   * Entries skipped while loading the log.
   */
  corruptRecords(): readonly CorruptRecord[];
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for EventStore operations.
 */
export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_EVENT"
  | "INVALID_VERSION"
  | "NON_MONOTONIC_TIMESTAMP"
  | "STREAM_CLOSED"
  | "CORRUPT_RECORD"
  | "STORAGE_FAILURE";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly shipmentId?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "EventStoreError";
  }
}
