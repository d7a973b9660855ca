/**
 * @shipledger/event-store — Log record codec.
 *
 * One self-contained UTF-8 JSON object per line, with snake_case field
 * names:
 *
 * {"event_id":"...","shipment_id":"SHP-0000000001","event_seq":1,
 *  "event_type":"CREATED","previous_state":null,"new_state":"CREATED",
 *  "emitting_role":"SENDER","timestamp":"...","payload":{...},
 *  "schema_version":1,"global_position":1,"previous_hash":"genesis",
 *  "hash":"..."}
 *
 * Decoding validates every field; a line that fails is reported, not thrown.
 */

import { z } from "zod";
import {
  isLifecycleState,
  isRole,
  isShipmentEventType,
} from "@shipledger/types";
import type { LifecycleState, Role, ShipmentEventType } from "@shipledger/types";
import type { StoredEvent } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const lifecycleState = z.custom<LifecycleState>(isLifecycleState, {
  message: "unknown lifecycle state",
});

/** ISO 8601 instant with a `Z` or numeric offset. */
export const TimestampSchema = z.string().datetime({ offset: true });

export const LogRecordSchema = z.object({
  event_id: z.string().min(1),
  shipment_id: z.string().min(1),
  event_seq: z.number().int().min(1),
  event_type: z.custom<ShipmentEventType>(isShipmentEventType, {
    message: "unknown event type",
  }),
  previous_state: lifecycleState.nullable(),
  new_state: lifecycleState,
  emitting_role: z.custom<Role>(isRole, { message: "unknown role" }),
  timestamp: TimestampSchema,
  payload: z.record(z.unknown()),
  schema_version: z.number().int().min(1),
  global_position: z.number().int().min(1),
  previous_hash: z.string().min(1),
  hash: z.string().min(1),
});

export type LogRecord = z.infer<typeof LogRecordSchema>;

export type DecodeResult =
  | { readonly ok: true; readonly event: StoredEvent }
  | { readonly ok: false; readonly reason: string };

// =============================================================================
// Codec
// =============================================================================

export function toLogRecord(event: StoredEvent): LogRecord {
  return {
    event_id: event.eventId,
    shipment_id: event.shipmentId,
    event_seq: event.eventSeq,
    event_type: event.eventType,
    previous_state: event.previousState,
    new_state: event.newState,
    emitting_role: event.emittingRole,
    timestamp: event.timestamp,
    payload: { ...event.payload },
    schema_version: event.schemaVersion,
    global_position: event.globalPosition,
    previous_hash: event.previousHash,
    hash: event.hash,
  };
}

export function fromLogRecord(record: LogRecord): StoredEvent {
  return {
    eventId: record.event_id,
    shipmentId: record.shipment_id,
    eventSeq: record.event_seq,
    eventType: record.event_type,
    previousState: record.previous_state,
    newState: record.new_state,
    emittingRole: record.emitting_role,
    timestamp: record.timestamp,
    payload: record.payload,
    schemaVersion: record.schema_version,
    globalPosition: record.global_position,
    previousHash: record.previous_hash,
    hash: record.hash,
  };
}

/**
 * Serialize a stored event as one log line (without the trailing newline).
 */
export function encodeRecord(event: StoredEvent): string {
  return JSON.stringify(toLogRecord(event));
}

/**
 * Parse and validate one log line.
 */
export function decodeRecord(line: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `malformed JSON: ${detail}` };
  }

  const parsed = LogRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  return { ok: true, event: fromLogRecord(parsed.data) };
}
