/**
 * Runtime Type Guards
 *
 * Narrowing functions for shipment domain types.
 * These enable safe runtime validation at system boundaries
 * (CLI input, deserialized log records, caller-supplied payloads).
 */

import type { ShipmentEvent } from "./event.js";
import type { LifecycleState, Role, ShipmentEventType } from "./lifecycle.js";
import { LIFECYCLE_STATES, ROLES, SHIPMENT_EVENT_TYPES } from "./lifecycle.js";

const STATE_SET = new Set<string>(LIFECYCLE_STATES);
const EVENT_TYPE_SET = new Set<string>(SHIPMENT_EVENT_TYPES);
const ROLE_SET = new Set<string>(ROLES);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Lifecycle vocabulary
// =============================================================================

export function isLifecycleState(value: unknown): value is LifecycleState {
  return typeof value === "string" && STATE_SET.has(value);
}

export function isShipmentEventType(value: unknown): value is ShipmentEventType {
  return typeof value === "string" && EVENT_TYPE_SET.has(value);
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

export function isShipmentEvent(value: unknown): value is ShipmentEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    value.eventId.length > 0 &&
    typeof value.shipmentId === "string" &&
    value.shipmentId.length > 0 &&
    typeof value.eventSeq === "number" &&
    Number.isInteger(value.eventSeq) &&
    value.eventSeq >= 1 &&
    isShipmentEventType(value.eventType) &&
    (value.previousState === null || isLifecycleState(value.previousState)) &&
    isLifecycleState(value.newState) &&
    isRole(value.emittingRole) &&
    typeof value.timestamp === "string" &&
    isRecord(value.payload) &&
    typeof value.schemaVersion === "number" &&
    Number.isInteger(value.schemaVersion) &&
    value.schemaVersion >= 1
  );
}
