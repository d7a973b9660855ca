/**
 * Event Types
 *
 * Append-only event architecture.
 * Every shipment state change is captured as a ShipmentEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event names the role that emitted it and the states it bridges
 * - Events are replayable: same events → same projection
 * - No UPDATE, no DELETE — only new events
 */

import type { LifecycleState, Role, ShipmentEventType } from "./lifecycle.js";

/**
 * Opaque key/value data attached to an event.
 * Merged additively into projections; never rewritten in the log.
 */
export type EventPayload = Readonly<Record<string, unknown>>;

/**
 * A shipment lifecycle event as recorded in the log.
 */
export interface ShipmentEvent {
  /** Globally unique event ID (replaying it is a no-op) */
  readonly eventId: string;

  /** The shipment this event belongs to */
  readonly shipmentId: string;

  /** Position within the shipment's history (1-based, no gaps) */
  readonly eventSeq: number;

  readonly eventType: ShipmentEventType;

  /** State before the event; null only for the genesis CREATED event */
  readonly previousState: LifecycleState | null;

  readonly newState: LifecycleState;

  readonly emittingRole: Role;

  /** ISO 8601 UTC timestamp; never earlier than the previous event's */
  readonly timestamp: string;

  readonly payload: EventPayload;

  /** Payload schema version; old versions remain valid forever */
  readonly schemaVersion: number;
}

/**
 * An event proposed for append. The store assigns `eventSeq`.
 */
export type PendingEvent = Omit<ShipmentEvent, "eventSeq">;
