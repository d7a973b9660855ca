/**
 * Lifecycle Types
 *
 * The vocabulary of the shipment lifecycle: the states a shipment can
 * occupy, the event types that move it between them, and the roles that
 * emit those events.
 *
 * These are plain string unions. The rules that connect them (which event
 * leads where, and who may emit it) live in @shipledger/lifecycle.
 */

/**
 * A node in the shipment lifecycle graph.
 */
export type LifecycleState =
  | "CREATED"
  | "MANAGER_ON_HOLD"
  | "MANAGER_APPROVED"
  | "SUPERVISOR_APPROVED"
  | "IN_TRANSIT"
  | "RECEIVER_ACKNOWLEDGED"
  | "WAREHOUSE_INTAKE"
  | "OUT_FOR_DELIVERY"
  | "DELIVERY_FAILED"
  | "DELIVERED"
  | "LIFECYCLE_CLOSED";

/**
 * Canonical event type catalog.
 */
export type ShipmentEventType =
  | "CREATED"
  | "MANAGER_ON_HOLD"
  | "HOLD_RELEASED"
  | "MANAGER_APPROVED"
  | "SUPERVISOR_APPROVED"
  | "DISPATCHED"
  | "RECEIVER_ACKNOWLEDGED"
  | "WAREHOUSE_INTAKE"
  | "OUT_FOR_DELIVERY"
  | "DELIVERY_FAILED"
  | "DELIVERY_RETRIED"
  | "DELIVERED"
  | "LIFECYCLE_CLOSED";

/**
 * An actor capability. Authority is a function of (state, role).
 */
export type Role =
  | "SENDER"
  | "SENDER_MANAGER"
  | "SENDER_SUPERVISOR"
  | "SYSTEM"
  | "RECEIVER_MANAGER"
  | "WAREHOUSE_MANAGER"
  | "CARRIER";

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  "CREATED",
  "MANAGER_ON_HOLD",
  "MANAGER_APPROVED",
  "SUPERVISOR_APPROVED",
  "IN_TRANSIT",
  "RECEIVER_ACKNOWLEDGED",
  "WAREHOUSE_INTAKE",
  "OUT_FOR_DELIVERY",
  "DELIVERY_FAILED",
  "DELIVERED",
  "LIFECYCLE_CLOSED",
];

export const SHIPMENT_EVENT_TYPES: readonly ShipmentEventType[] = [
  "CREATED",
  "MANAGER_ON_HOLD",
  "HOLD_RELEASED",
  "MANAGER_APPROVED",
  "SUPERVISOR_APPROVED",
  "DISPATCHED",
  "RECEIVER_ACKNOWLEDGED",
  "WAREHOUSE_INTAKE",
  "OUT_FOR_DELIVERY",
  "DELIVERY_FAILED",
  "DELIVERY_RETRIED",
  "DELIVERED",
  "LIFECYCLE_CLOSED",
];

export const ROLES: readonly Role[] = [
  "SENDER",
  "SENDER_MANAGER",
  "SENDER_SUPERVISOR",
  "SYSTEM",
  "RECEIVER_MANAGER",
  "WAREHOUSE_MANAGER",
  "CARRIER",
];

/** Once reached, no further events may be appended for the shipment. */
export const TERMINAL_STATE: LifecycleState = "LIFECYCLE_CLOSED";

/** The event type that opens every shipment's history. */
export const GENESIS_EVENT_TYPE: ShipmentEventType = "CREATED";
