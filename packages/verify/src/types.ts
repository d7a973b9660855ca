/**
 * @shipledger/verify — Types for audit verification.
 *
 * An audit replays the whole log against the lifecycle rules and reports
 * every violation it finds, with enough context to locate the record.
 */

// =============================================================================
// Verdict
// =============================================================================

export type AuditVerdict = "VALID" | "INVALID";

export type ViolationKind =
  | "SEQUENCE_GAP"
  | "SEQUENCE_DUPLICATE"
  | "NON_MONOTONIC_TIMESTAMP"
  | "INVALID_GENESIS"
  | "STATE_DISCONTINUITY"
  | "INVALID_TRANSITION"
  | "UNAUTHORIZED_ROLE"
  | "EVENT_AFTER_TERMINAL"
  | "HASH_CHAIN_BROKEN"
  | "CORRUPT_RECORD";

/** A count of zero for every violation kind */
export function emptyViolationCounts(): Record<ViolationKind, number> {
  return {
    SEQUENCE_GAP: 0,
    SEQUENCE_DUPLICATE: 0,
    NON_MONOTONIC_TIMESTAMP: 0,
    INVALID_GENESIS: 0,
    STATE_DISCONTINUITY: 0,
    INVALID_TRANSITION: 0,
    UNAUTHORIZED_ROLE: 0,
    EVENT_AFTER_TERMINAL: 0,
    HASH_CHAIN_BROKEN: 0,
    CORRUPT_RECORD: 0,
  };
}

// =============================================================================
// Violations
// =============================================================================

/**
 * A single problem found in the log.
 */
export interface AuditViolation {
  readonly kind: ViolationKind;

  /** Absent only for records that could not be decoded */
  readonly shipmentId?: string;

  readonly eventId?: string;

  readonly eventSeq?: number;

  /** Global log position (hash chain violations) */
  readonly position?: number;

  /** 1-based file line (corrupt records) */
  readonly line?: number;

  /** Human-readable description */
  readonly description: string;
}

// =============================================================================
// Report
// =============================================================================

export interface AuditReport {
  readonly verdict: AuditVerdict;

  /** ISO 8601 timestamp of the audit; absent from pure replays */
  readonly checkedAt?: string;

  readonly totalEvents: number;

  readonly totalShipments: number;

  /** Count per kind; zero for kinds that were not found */
  readonly violationCounts: Readonly<Record<ViolationKind, number>>;

  readonly firstViolation: AuditViolation | null;

  readonly violations: readonly AuditViolation[];
}
