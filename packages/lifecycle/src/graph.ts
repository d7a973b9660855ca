/**
 * Lifecycle Graph — the closed set of legal shipment transitions.
 *
 * Each edge is labeled with the event type that causes it. Any
 * (state, event type) pair not listed is forbidden.
 *
 * Shape:
 * - Linear progress from CREATED to LIFECYCLE_CLOSED
 * - Two controlled cycles: CREATED ⇄ MANAGER_ON_HOLD and
 *   OUT_FOR_DELIVERY ⇄ DELIVERY_FAILED
 * - LIFECYCLE_CLOSED has no outgoing edges
 */

import { GENESIS_EVENT_TYPE, TERMINAL_STATE } from "@shipledger/types";
import type { LifecycleState, ShipmentEventType } from "@shipledger/types";

// =============================================================================
// Error
// =============================================================================

export type LifecycleGraphErrorCode =
  | "DUPLICATE_EDGE"
  | "EDGE_FROM_TERMINAL"
  | "INVALID_GENESIS";

export class LifecycleGraphError extends Error {
  public readonly code: LifecycleGraphErrorCode;
  constructor(code: LifecycleGraphErrorCode, message: string) {
    super(message);
    this.name = "LifecycleGraphError";
    this.code = code;
  }
}

// =============================================================================
// Edges
// =============================================================================

export interface LifecycleEdge {
  /** null: the shipment does not exist yet */
  readonly from: LifecycleState | null;
  readonly eventType: ShipmentEventType;
  readonly to: LifecycleState;
}

export const LIFECYCLE_EDGES: readonly LifecycleEdge[] = [
  { from: null, eventType: "CREATED", to: "CREATED" },
  { from: "CREATED", eventType: "MANAGER_ON_HOLD", to: "MANAGER_ON_HOLD" },
  { from: "CREATED", eventType: "MANAGER_APPROVED", to: "MANAGER_APPROVED" },
  { from: "MANAGER_ON_HOLD", eventType: "HOLD_RELEASED", to: "CREATED" },
  { from: "MANAGER_ON_HOLD", eventType: "MANAGER_APPROVED", to: "MANAGER_APPROVED" },
  { from: "MANAGER_APPROVED", eventType: "SUPERVISOR_APPROVED", to: "SUPERVISOR_APPROVED" },
  { from: "SUPERVISOR_APPROVED", eventType: "DISPATCHED", to: "IN_TRANSIT" },
  { from: "IN_TRANSIT", eventType: "RECEIVER_ACKNOWLEDGED", to: "RECEIVER_ACKNOWLEDGED" },
  { from: "RECEIVER_ACKNOWLEDGED", eventType: "WAREHOUSE_INTAKE", to: "WAREHOUSE_INTAKE" },
  { from: "WAREHOUSE_INTAKE", eventType: "OUT_FOR_DELIVERY", to: "OUT_FOR_DELIVERY" },
  { from: "OUT_FOR_DELIVERY", eventType: "DELIVERY_FAILED", to: "DELIVERY_FAILED" },
  { from: "OUT_FOR_DELIVERY", eventType: "DELIVERED", to: "DELIVERED" },
  { from: "DELIVERY_FAILED", eventType: "DELIVERY_RETRIED", to: "OUT_FOR_DELIVERY" },
  { from: "DELIVERED", eventType: "LIFECYCLE_CLOSED", to: "LIFECYCLE_CLOSED" },
];

function edgeKey(from: LifecycleState | null, eventType: ShipmentEventType): string {
  return `${from ?? "(none)"}|${eventType}`;
}

// =============================================================================
// Graph
// =============================================================================

export class LifecycleGraph {
  private readonly _edges: readonly LifecycleEdge[];
  private readonly _byKey = new Map<string, LifecycleState>();
  private readonly _outgoing = new Map<LifecycleState | null, ShipmentEventType[]>();

  /**
   * @throws LifecycleGraphError if two edges share a (from, event type) key,
   *   an edge leaves the terminal state, or CREATED is used anywhere but
   *   as the genesis edge
   */
  constructor(edges: readonly LifecycleEdge[] = LIFECYCLE_EDGES) {
    for (const edge of edges) {
      const key = edgeKey(edge.from, edge.eventType);
      if (this._byKey.has(key)) {
        throw new LifecycleGraphError(
          "DUPLICATE_EDGE",
          `Duplicate edge ${edge.from ?? "(none)"} --${edge.eventType}-->`,
        );
      }
      if (edge.from === TERMINAL_STATE) {
        throw new LifecycleGraphError(
          "EDGE_FROM_TERMINAL",
          `${TERMINAL_STATE} is terminal; edge --${edge.eventType}--> is not allowed`,
        );
      }
      if ((edge.from === null) !== (edge.eventType === GENESIS_EVENT_TYPE)) {
        throw new LifecycleGraphError(
          "INVALID_GENESIS",
          `${GENESIS_EVENT_TYPE} must be the only event from (none), got ${edge.from ?? "(none)"} --${edge.eventType}-->`,
        );
      }

      this._byKey.set(key, edge.to);
      const outgoing = this._outgoing.get(edge.from) ?? [];
      outgoing.push(edge.eventType);
      this._outgoing.set(edge.from, outgoing);
    }

    this._edges = Object.freeze(edges.map((e) => Object.freeze({ ...e })));
  }

  /**
   * Target state of `eventType` from `from`, or undefined if forbidden.
   */
  allowed(
    from: LifecycleState | null,
    eventType: ShipmentEventType,
  ): LifecycleState | undefined {
    return this._byKey.get(edgeKey(from, eventType));
  }

  /** True if any event leads from `from` to `to` */
  isEdge(from: LifecycleState | null, to: LifecycleState): boolean {
    return this._edges.some((e) => e.from === from && e.to === to);
  }

  eventsFrom(from: LifecycleState | null): readonly ShipmentEventType[] {
    return [...(this._outgoing.get(from) ?? [])];
  }

  isTerminal(state: LifecycleState): boolean {
    return state === TERMINAL_STATE;
  }

  edges(): readonly LifecycleEdge[] {
    return this._edges;
  }
}
