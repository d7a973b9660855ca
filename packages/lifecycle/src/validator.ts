/**
 * Transition Validator — graph check first, authority second.
 *
 * Rejections are returned as values. Nothing here touches the log; the
 * caller appends with `previousState = currentState` so the store can
 * refuse a decision made on stale state.
 */

import type { LifecycleState, Role, ShipmentEventType } from "@shipledger/types";
import type { AuthorityMatrix } from "./authority.js";
import type { LifecycleGraph } from "./graph.js";

export type ValidationRejectionCode = "INVALID_TRANSITION" | "UNAUTHORIZED";

export type ValidationResult =
  | { readonly accepted: true; readonly newState: LifecycleState }
  | {
      readonly accepted: false;
      readonly code: ValidationRejectionCode;
      readonly reason: string;
    };

export class TransitionValidator {
  constructor(
    private readonly graph: LifecycleGraph,
    private readonly authority: AuthorityMatrix,
  ) {}

  validate(
    shipmentId: string,
    eventType: ShipmentEventType,
    role: Role,
    currentState: LifecycleState | null,
  ): ValidationResult {
    const from = currentState ?? "(none)";

    const newState = this.graph.allowed(currentState, eventType);
    if (newState === undefined) {
      const options = this.graph.eventsFrom(currentState);
      return {
        accepted: false,
        code: "INVALID_TRANSITION",
        reason:
          `${eventType} is not a valid transition for ${shipmentId} from ${from}` +
          (options.length > 0 ? ` (allowed: ${options.join(", ")})` : " (no transitions allowed)"),
      };
    }

    if (!this.authority.permitted(currentState, role).has(eventType)) {
      const owner = this.authority.owner(currentState);
      return {
        accepted: false,
        code: "UNAUTHORIZED",
        reason:
          `${role} may not emit ${eventType} for ${shipmentId} in ${from}` +
          (owner !== undefined ? ` (owner: ${owner})` : ""),
      };
    }

    return { accepted: true, newState };
  }
}
