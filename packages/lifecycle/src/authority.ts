/**
 * Authority Matrix — which role may act in which state.
 *
 * Authority is a pure function of the shipment's current state. Each
 * state has exactly one owning role; the owner loses authority the
 * moment the shipment leaves that state, and re-entering a state through
 * a hold or retry cycle restores only that state's owner.
 */

import type { LifecycleState, Role, ShipmentEventType } from "@shipledger/types";
import type { LifecycleGraph } from "./graph.js";

// =============================================================================
// Error
// =============================================================================

export type AuthorityErrorCode =
  | "MULTIPLE_OWNERS"
  | "NOT_AN_EDGE"
  | "UNOWNED_EDGE";

export class AuthorityError extends Error {
  public readonly code: AuthorityErrorCode;
  constructor(code: AuthorityErrorCode, message: string) {
    super(message);
    this.name = "AuthorityError";
    this.code = code;
  }
}

// =============================================================================
// Grants
// =============================================================================

export interface AuthorityGrant {
  /** null: before the shipment exists */
  readonly state: LifecycleState | null;
  readonly role: Role;
  readonly eventTypes: readonly ShipmentEventType[];
}

export const AUTHORITY_GRANTS: readonly AuthorityGrant[] = [
  { state: null, role: "SENDER", eventTypes: ["CREATED"] },
  {
    state: "CREATED",
    role: "SENDER_MANAGER",
    eventTypes: ["MANAGER_ON_HOLD", "MANAGER_APPROVED"],
  },
  {
    state: "MANAGER_ON_HOLD",
    role: "SENDER_MANAGER",
    eventTypes: ["HOLD_RELEASED", "MANAGER_APPROVED"],
  },
  { state: "MANAGER_APPROVED", role: "SENDER_SUPERVISOR", eventTypes: ["SUPERVISOR_APPROVED"] },
  { state: "SUPERVISOR_APPROVED", role: "SYSTEM", eventTypes: ["DISPATCHED"] },
  { state: "IN_TRANSIT", role: "RECEIVER_MANAGER", eventTypes: ["RECEIVER_ACKNOWLEDGED"] },
  { state: "RECEIVER_ACKNOWLEDGED", role: "WAREHOUSE_MANAGER", eventTypes: ["WAREHOUSE_INTAKE"] },
  { state: "WAREHOUSE_INTAKE", role: "WAREHOUSE_MANAGER", eventTypes: ["OUT_FOR_DELIVERY"] },
  {
    state: "OUT_FOR_DELIVERY",
    role: "CARRIER",
    eventTypes: ["DELIVERY_FAILED", "DELIVERED"],
  },
  { state: "DELIVERY_FAILED", role: "SYSTEM", eventTypes: ["DELIVERY_RETRIED"] },
  { state: "DELIVERED", role: "SYSTEM", eventTypes: ["LIFECYCLE_CLOSED"] },
];

const NONE: ReadonlySet<ShipmentEventType> = new Set();

// =============================================================================
// Matrix
// =============================================================================

export class AuthorityMatrix {
  private readonly _owners = new Map<LifecycleState | null, Role>();
  private readonly _permitted = new Map<LifecycleState | null, ReadonlySet<ShipmentEventType>>();

  /**
   * @throws AuthorityError if a state has two owners, a grant names an
   *   event that is not an edge of the graph from that state, or an edge
   *   of the graph is granted to nobody
   */
  constructor(graph: LifecycleGraph, grants: readonly AuthorityGrant[] = AUTHORITY_GRANTS) {
    const permitted = new Map<LifecycleState | null, Set<ShipmentEventType>>();

    for (const grant of grants) {
      const owner = this._owners.get(grant.state);
      if (owner !== undefined && owner !== grant.role) {
        throw new AuthorityError(
          "MULTIPLE_OWNERS",
          `State ${grant.state ?? "(none)"} is owned by ${owner}; cannot also grant it to ${grant.role}`,
        );
      }

      for (const eventType of grant.eventTypes) {
        if (graph.allowed(grant.state, eventType) === undefined) {
          throw new AuthorityError(
            "NOT_AN_EDGE",
            `${eventType} is not a transition out of ${grant.state ?? "(none)"}`,
          );
        }
      }

      this._owners.set(grant.state, grant.role);
      const events = permitted.get(grant.state) ?? new Set<ShipmentEventType>();
      for (const eventType of grant.eventTypes) {
        events.add(eventType);
      }
      permitted.set(grant.state, events);
    }

    for (const edge of graph.edges()) {
      if (!permitted.get(edge.from)?.has(edge.eventType)) {
        throw new AuthorityError(
          "UNOWNED_EDGE",
          `No role may emit ${edge.eventType} from ${edge.from ?? "(none)"}`,
        );
      }
    }

    for (const [state, events] of permitted) {
      this._permitted.set(state, events);
    }
  }

  /**
   * Event types `role` may emit while the shipment is in `state`.
   * Empty for every role but the state's owner.
   */
  permitted(state: LifecycleState | null, role: Role): ReadonlySet<ShipmentEventType> {
    if (this._owners.get(state) !== role) {
      return NONE;
    }
    return this._permitted.get(state) ?? NONE;
  }

  /** The state's owning role, or undefined for the terminal state */
  owner(state: LifecycleState | null): Role | undefined {
    return this._owners.get(state);
  }
}
