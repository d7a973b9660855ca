/**
 * Projection Types
 *
 * A shipment projection is derived state: it is never stored as truth,
 * only computed by folding the shipment's events in sequence order.
 */

import type { EventPayload } from "./event.js";
import type { LifecycleState, Role, ShipmentEventType } from "./lifecycle.js";

export interface ShipmentProjection {
  readonly shipmentId: string;

  /** `newState` of the last folded event */
  readonly currentState: LifecycleState;

  /** Timestamp of the CREATED event */
  readonly createdAt: string;

  /** Timestamp of the last folded event */
  readonly lastUpdated: string;

  readonly eventCount: number;

  /** `eventSeq` of the last folded event; the optimistic concurrency token */
  readonly lastEventSeq: number;

  /** Event types in sequence order */
  readonly eventSequence: readonly ShipmentEventType[];

  /** Union of all payloads, later keys winning */
  readonly currentPayload: EventPayload;

  /** Distinct emitting roles, in first-seen order */
  readonly rolesInvolved: readonly Role[];

  /** True once the terminal state is reached */
  readonly closed: boolean;
}
