/**
 * @shipledger/verify — Full-log audit verification.
 *
 * Replays every shipment's history against the lifecycle graph and the
 * authority matrix, and checks the structural invariants of the log:
 * 1. eventSeq runs 1, 2, 3, ... per shipment (gaps and duplicates)
 * 2. The first event is a CREATED genesis from no state
 * 3. previousState of each event equals newState of the one before
 * 4. (previousState, eventType) → newState is an edge of the graph
 * 5. The emitting role owned previousState
 * 6. Timestamps never go backwards within a shipment
 * 7. Nothing follows LIFECYCLE_CLOSED
 *
 * The store-backed verifier also reports hash chain breaks and records
 * the store could not decode. Verification never stops at the first
 * violation.
 */

import { GENESIS_EVENT_TYPE, TERMINAL_STATE } from "@shipledger/types";
import type { ShipmentEvent } from "@shipledger/types";
import type { EventStore } from "@shipledger/event-store";
import type { AuthorityMatrix, LifecycleGraph } from "@shipledger/lifecycle";
import type { AuditReport, AuditViolation, ViolationKind } from "./types.js";
import { emptyViolationCounts } from "./types.js";

// =============================================================================
// Pure replay
// =============================================================================

function violationAt(
  kind: ViolationKind,
  event: ShipmentEvent,
  description: string,
): AuditViolation {
  return {
    kind,
    shipmentId: event.shipmentId,
    eventId: event.eventId,
    eventSeq: event.eventSeq,
    description,
  };
}

function groupByShipment(
  events: readonly ShipmentEvent[],
): Map<string, ShipmentEvent[]> {
  const groups = new Map<string, ShipmentEvent[]>();
  for (const event of events) {
    const group = groups.get(event.shipmentId);
    if (group === undefined) {
      groups.set(event.shipmentId, [event]);
    } else {
      group.push(event);
    }
  }
  return groups;
}

function checkShipment(
  events: readonly ShipmentEvent[],
  graph: LifecycleGraph,
  authority: AuthorityMatrix,
): AuditViolation[] {
  const violations: AuditViolation[] = [];
  let expectedSeq = 1;
  let prev: ShipmentEvent | undefined;
  let closedBy: ShipmentEvent | undefined;

  for (const event of events) {
    if (closedBy !== undefined) {
      violations.push(
        violationAt(
          "EVENT_AFTER_TERMINAL",
          event,
          `${event.eventType} at seq ${event.eventSeq} follows ${TERMINAL_STATE} at seq ${closedBy.eventSeq}`,
        ),
      );
      continue;
    }

    // ─── Sequence ───
    if (event.eventSeq < expectedSeq) {
      violations.push(
        violationAt(
          "SEQUENCE_DUPLICATE",
          event,
          `eventSeq ${event.eventSeq} repeats or goes back (expected ${expectedSeq})`,
        ),
      );
    } else if (event.eventSeq > expectedSeq) {
      violations.push(
        violationAt(
          "SEQUENCE_GAP",
          event,
          `eventSeq jumps from ${expectedSeq - 1} to ${event.eventSeq}`,
        ),
      );
    }
    expectedSeq = Math.max(expectedSeq, event.eventSeq + 1);

    // ─── Timestamps ───
    if (prev !== undefined && Date.parse(event.timestamp) < Date.parse(prev.timestamp)) {
      violations.push(
        violationAt(
          "NON_MONOTONIC_TIMESTAMP",
          event,
          `timestamp ${event.timestamp} precedes ${prev.timestamp} at seq ${prev.eventSeq}`,
        ),
      );
    }

    // ─── Genesis / continuity ───
    if (prev === undefined) {
      const isGenesis =
        event.eventType === GENESIS_EVENT_TYPE &&
        event.previousState === null &&
        graph.allowed(null, event.eventType) === event.newState;
      if (!isGenesis) {
        violations.push(
          violationAt(
            "INVALID_GENESIS",
            event,
            `history starts with ${event.eventType} (${event.previousState ?? "(none)"} → ${event.newState}), not ${GENESIS_EVENT_TYPE}`,
          ),
        );
        prev = event;
        closedBy = event.newState === TERMINAL_STATE ? event : undefined;
        continue;
      }
    } else if (event.previousState !== prev.newState) {
      violations.push(
        violationAt(
          "STATE_DISCONTINUITY",
          event,
          `previousState ${event.previousState ?? "(none)"} does not match ${prev.newState} at seq ${prev.eventSeq}`,
        ),
      );
    }

    // ─── Graph / authority ───
    const target = graph.allowed(event.previousState, event.eventType);
    if (target !== event.newState) {
      violations.push(
        violationAt(
          "INVALID_TRANSITION",
          event,
          `${event.previousState ?? "(none)"} --${event.eventType}--> ${event.newState} is not a lifecycle edge`,
        ),
      );
    } else if (!authority.permitted(event.previousState, event.emittingRole).has(event.eventType)) {
      const owner = authority.owner(event.previousState);
      violations.push(
        violationAt(
          "UNAUTHORIZED_ROLE",
          event,
          `${event.emittingRole} emitted ${event.eventType} in ${event.previousState ?? "(none)"}` +
            (owner !== undefined ? `, owned by ${owner}` : ""),
        ),
      );
    }

    prev = event;
    if (event.newState === TERMINAL_STATE) {
      closedBy = event;
    }
  }

  return violations;
}

/**
 * Build a report from a list of violations.
 */
export function summarize(
  violations: readonly AuditViolation[],
  totalEvents: number,
  totalShipments: number,
): AuditReport {
  const counts = emptyViolationCounts();
  for (const v of violations) {
    counts[v.kind] += 1;
  }

  return {
    verdict: violations.length === 0 ? "VALID" : "INVALID",
    totalEvents,
    totalShipments,
    violationCounts: counts,
    firstViolation: violations[0] ?? null,
    violations,
  };
}

/**
 * Audit a sequence of events in log order.
 *
 * Events are grouped by shipment, keeping their relative order, and each
 * shipment's history is checked independently.
 */
export function verifyEvents(
  events: readonly ShipmentEvent[],
  graph: LifecycleGraph,
  authority: AuthorityMatrix,
): AuditReport {
  const groups = groupByShipment(events);
  const violations: AuditViolation[] = [];

  for (const history of groups.values()) {
    violations.push(...checkShipment(history, graph, authority));
  }

  return summarize(violations, events.length, groups.size);
}

// =============================================================================
// Store-backed verifier
// =============================================================================

export interface AuditVerifierOptions {
  /** Clock for `checkedAt` */
  readonly now?: () => Date;
}

export class AuditVerifier {
  private readonly _now: () => Date;

  constructor(
    private readonly store: EventStore,
    private readonly graph: LifecycleGraph,
    private readonly authority: AuthorityMatrix,
    options?: AuditVerifierOptions,
  ) {
    this._now = options?.now ?? (() => new Date());
  }

  /**
   * Audit the whole log: undecodable records, the hash chain, then every
   * shipment's history.
   */
  verify(): AuditReport {
    const events = this.store.readAll();
    const violations: AuditViolation[] = [];

    for (const corrupt of this.store.corruptRecords()) {
      violations.push({
        kind: "CORRUPT_RECORD",
        line: corrupt.line,
        description: `line ${corrupt.line}: ${corrupt.reason}`,
      });
    }

    const byPosition = new Map(events.map((e) => [e.globalPosition, e]));
    for (const error of this.store.verifyIntegrity().errors) {
      const event = byPosition.get(error.position);
      violations.push(
        event !== undefined
          ? {
              kind: "HASH_CHAIN_BROKEN",
              shipmentId: event.shipmentId,
              eventId: event.eventId,
              eventSeq: event.eventSeq,
              position: error.position,
              description: error.reason,
            }
          : { kind: "HASH_CHAIN_BROKEN", position: error.position, description: error.reason },
      );
    }

    const replay = verifyEvents(events, this.graph, this.authority);
    violations.push(...replay.violations);

    return {
      ...summarize(violations, replay.totalEvents, replay.totalShipments),
      checkedAt: this._now().toISOString(),
    };
  }
}
