/**
 * @shipledger/types — Shared domain types for the shipment lifecycle engine.
 *
 * These types are used across all Shipledger packages:
 * - Lifecycle vocabulary (states, event types, roles)
 * - Event records
 * - Shipment projections
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Lifecycle vocabulary
export type { LifecycleState, ShipmentEventType, Role } from "./lifecycle.js";
export {
  LIFECYCLE_STATES,
  SHIPMENT_EVENT_TYPES,
  ROLES,
  TERMINAL_STATE,
  GENESIS_EVENT_TYPE,
} from "./lifecycle.js";

// Event types
export type { ShipmentEvent, PendingEvent, EventPayload } from "./event.js";

// Projection types
export type { ShipmentProjection } from "./projection.js";

// Runtime type guards
export {
  isRecord,
  isLifecycleState,
  isShipmentEventType,
  isRole,
  isShipmentEvent,
} from "./guards.js";
