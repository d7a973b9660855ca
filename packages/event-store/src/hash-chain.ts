/**
 * @shipledger/event-store — Hash chain for tamper-evident event logs.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Any modification to any record breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ShipmentEvent } from "@shipledger/types";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first record in the log.
 */
export const GENESIS_HASH = "genesis";

/**
 * The fields that are covered by a record's hash.
 */
export type HashableRecord = ShipmentEvent & { readonly globalPosition: number };

function canonicalRecordContent(record: HashableRecord): string {
  return canonicalize({
    eventId: record.eventId,
    shipmentId: record.shipmentId,
    eventSeq: record.eventSeq,
    eventType: record.eventType,
    previousState: record.previousState,
    newState: record.newState,
    emittingRole: record.emittingRole,
    timestamp: record.timestamp,
    payload: record.payload,
    schemaVersion: record.schemaVersion,
    globalPosition: record.globalPosition,
  });
}

/**
 * Compute the SHA-256 hash of a record given its predecessor's hash.
 *
 * @param previousHash - Hash of the preceding record, or GENESIS_HASH for position 1
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  record: HashableRecord,
  previousHash: string,
): string {
  const input = canonicalRecordContent(record) + previousHash;
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Verify the hash chain of a sequence of records.
 *
 * Records must be in global position order. Verification does not stop
 * at the first break: every link is checked against its predecessor as
 * stored, so an edited record is reported once for its own hash and the
 * chain resumes from the stored value.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    const position = event.globalPosition;

    if (event.previousHash !== previousHash) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${position}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${position}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = position;
    }
    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
