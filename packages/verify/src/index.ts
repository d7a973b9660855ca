/**
 * @shipledger/verify — Audit verification for the shipment event log.
 *
 * Replays every shipment's history against the lifecycle rules and
 * reports every violation found, together with hash chain breaks and
 * undecodable records surfaced by the store.
 *
 * Core exports:
 * - verifyEvents — pure replay of a list of events
 * - AuditVerifier — store-backed audit of the whole log
 */

export { AuditVerifier, verifyEvents, summarize } from "./audit-verifier.js";
export type { AuditVerifierOptions } from "./audit-verifier.js";

export { emptyViolationCounts } from "./types.js";
export type {
  AuditVerdict,
  ViolationKind,
  AuditViolation,
  AuditReport,
} from "./types.js";
