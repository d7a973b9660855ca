/**
 * @shipledger/event-store — Shipment Event Definitions.
 *
 * The catalog of every event type in the shipment lifecycle, with the
 * payload shape it accepts.
 *
 * Payloads are open JSON objects: any JSON-serializable keys may be
 * attached, but the keys named below must have the declared type when
 * present.
 */

import { z } from "zod";
import type { ShipmentEventType } from "@shipledger/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payload Schemas
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

/** Any JSON object. Every payload must satisfy this. */
export const JsonPayloadSchema = z.record(JsonValueSchema);

export const CreatedPayloadSchema = z
  .object({
    source: z.string().min(1).optional(),
    destination: z.string().min(1).optional(),
    weight_kg: z.number().positive().optional(),
    delivery_type: z.string().min(1).optional(),
  })
  .passthrough();

export const ReasonPayloadSchema = z
  .object({
    reason: z.string().min(1).optional(),
  })
  .passthrough();

export type CreatedPayload = z.infer<typeof CreatedPayloadSchema>;
export type ReasonPayload = z.infer<typeof ReasonPayloadSchema>;

function accepts(shape: z.ZodTypeAny): (payload: unknown) => boolean {
  return (payload) =>
    JsonPayloadSchema.safeParse(payload).success && shape.safeParse(payload).success;
}

// =============================================================================
// Schemas
// =============================================================================

const SHIPMENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: "CREATED",
    version: 1,
    description: "A shipment was booked by its sender",
    validate: accepts(CreatedPayloadSchema),
  },
  {
    type: "MANAGER_ON_HOLD",
    version: 1,
    description: "The sender's manager put the shipment on hold",
    validate: accepts(ReasonPayloadSchema),
  },
  {
    type: "HOLD_RELEASED",
    version: 1,
    description: "The sender's manager released a held shipment back to CREATED",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "MANAGER_APPROVED",
    version: 1,
    description: "The sender's manager approved the shipment",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "SUPERVISOR_APPROVED",
    version: 1,
    description: "The sender's supervisor approved the shipment for dispatch",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "DISPATCHED",
    version: 1,
    description: "The system dispatched the shipment into transit",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "RECEIVER_ACKNOWLEDGED",
    version: 1,
    description: "The receiving manager acknowledged arrival",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "WAREHOUSE_INTAKE",
    version: 1,
    description: "The warehouse took the shipment in",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "OUT_FOR_DELIVERY",
    version: 1,
    description: "The warehouse handed the shipment to last-mile delivery",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "DELIVERY_FAILED",
    version: 1,
    description: "The carrier could not complete delivery",
    validate: accepts(ReasonPayloadSchema),
  },
  {
    type: "DELIVERY_RETRIED",
    version: 1,
    description: "The system scheduled another delivery attempt",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "DELIVERED",
    version: 1,
    description: "The carrier confirmed delivery",
    validate: accepts(JsonPayloadSchema),
  },
  {
    type: "LIFECYCLE_CLOSED",
    version: 1,
    description: "The system closed the shipment; its history is final",
    validate: accepts(JsonPayloadSchema),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every shipment event type registered
 * at version 1.
 */
export function createShipmentCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SHIPMENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}

