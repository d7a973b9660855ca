/**
 * Projector — rebuild a shipment's current state from its events.
 *
 * The projection is never stored. It is a fold over the shipment's
 * events in sequence order, so the same events always give the same
 * projection: no clock, no randomness, no I/O inside the fold.
 */

import { GENESIS_EVENT_TYPE, TERMINAL_STATE } from "@shipledger/types";
import type { Role, ShipmentEvent, ShipmentProjection } from "@shipledger/types";
import type { EventCatalog, EventStore } from "@shipledger/event-store";

// =============================================================================
// Types
// =============================================================================

export type ProjectorErrorCode = "MIXED_SHIPMENTS" | "MISSING_GENESIS";

export class ProjectorError extends Error {
  public readonly code: ProjectorErrorCode;
  constructor(code: ProjectorErrorCode, message: string) {
    super(message);
    this.name = "ProjectorError";
    this.code = code;
  }
}

export interface ProjectionOptions {
  /** Upcasts payloads to their current schema version before merging */
  readonly catalog?: EventCatalog;

  /** Fold only events with eventSeq <= throughSeq */
  readonly throughSeq?: number;

  /** Fold only events with a timestamp at or before this instant */
  readonly asOf?: string;

  /**
   * Fold from the first surviving event when the history does not start
   * with CREATED (its record was lost to corruption) instead of throwing.
   * `createdAt` is then the timestamp of that first surviving event.
   */
  readonly partialHistory?: boolean;
}

/**
 * Fold accumulator. A closed shipment ignores anything after its
 * terminal event; the audit verifier reports such events.
 */
type Accumulator =
  | { readonly kind: "empty" }
  | { readonly kind: "open"; readonly projection: ShipmentProjection }
  | { readonly kind: "closed"; readonly projection: ShipmentProjection };

// =============================================================================
// Fold
// =============================================================================

function step(acc: Accumulator, event: ShipmentEvent, partialHistory: boolean): Accumulator {
  switch (acc.kind) {
    case "empty": {
      if (event.eventType !== GENESIS_EVENT_TYPE && !partialHistory) {
        throw new ProjectorError(
          "MISSING_GENESIS",
          `History of "${event.shipmentId}" starts with ${event.eventType}, not ${GENESIS_EVENT_TYPE}`,
        );
      }
      const projection: ShipmentProjection = {
        shipmentId: event.shipmentId,
        currentState: event.newState,
        createdAt: event.timestamp,
        lastUpdated: event.timestamp,
        eventCount: 1,
        lastEventSeq: event.eventSeq,
        eventSequence: [event.eventType],
        currentPayload: { ...event.payload },
        rolesInvolved: [event.emittingRole],
        closed: event.newState === TERMINAL_STATE,
      };
      return wrap(projection);
    }

    case "open": {
      const prev = acc.projection;
      const rolesInvolved: readonly Role[] = prev.rolesInvolved.includes(event.emittingRole)
        ? prev.rolesInvolved
        : [...prev.rolesInvolved, event.emittingRole];

      return wrap({
        ...prev,
        currentState: event.newState,
        lastUpdated: event.timestamp,
        eventCount: prev.eventCount + 1,
        lastEventSeq: event.eventSeq,
        eventSequence: [...prev.eventSequence, event.eventType],
        currentPayload: { ...prev.currentPayload, ...event.payload },
        rolesInvolved,
        closed: event.newState === TERMINAL_STATE,
      });
    }

    case "closed":
      return acc;
  }
}

function wrap(projection: ShipmentProjection): Accumulator {
  return projection.closed
    ? { kind: "closed", projection }
    : { kind: "open", projection };
}

/**
 * Project one shipment's events.
 *
 * Events are sorted by eventSeq first, so the input order does not
 * matter. Returns undefined when no event survives the filters.
 *
 * @throws ProjectorError if the events belong to more than one shipment,
 *   or if the first event is not CREATED and partialHistory is not set
 */
export function projectEvents(
  events: readonly ShipmentEvent[],
  options?: ProjectionOptions,
): ShipmentProjection | undefined {
  const first = events[0];
  if (first === undefined) {
    return undefined;
  }

  const mixed = events.find((e) => e.shipmentId !== first.shipmentId);
  if (mixed !== undefined) {
    throw new ProjectorError(
      "MIXED_SHIPMENTS",
      `Cannot project "${first.shipmentId}" and "${mixed.shipmentId}" together`,
    );
  }

  const throughSeq = options?.throughSeq;
  const asOf = options?.asOf !== undefined ? Date.parse(options.asOf) : undefined;
  const catalog = options?.catalog;
  const partialHistory = options?.partialHistory ?? false;

  const ordered = [...events]
    .filter((e) => throughSeq === undefined || e.eventSeq <= throughSeq)
    .filter((e) => asOf === undefined || Date.parse(e.timestamp) <= asOf)
    .sort((a, b) => a.eventSeq - b.eventSeq)
    .map((e) => (catalog !== undefined ? catalog.upcast(e) : e));

  let acc: Accumulator = { kind: "empty" };
  for (const event of ordered) {
    acc = step(acc, event, partialHistory);
  }

  return acc.kind === "empty" ? undefined : acc.projection;
}

// =============================================================================
// Projector
// =============================================================================

export class Projector {
  constructor(
    private readonly store: EventStore,
    private readonly catalog?: EventCatalog,
    private readonly defaults: Pick<ProjectionOptions, "partialHistory"> = {},
  ) {}

  project(
    shipmentId: string,
    options?: Omit<ProjectionOptions, "catalog">,
  ): ShipmentProjection | undefined {
    return projectEvents(this.store.readFor(shipmentId), this.withDefaults(options));
  }

  /**
   * Project every shipment in the log, in order of first appearance.
   */
  projectAll(): readonly ShipmentProjection[] {
    const result: ShipmentProjection[] = [];
    for (const shipmentId of this.store.shipmentIds()) {
      const projection = this.project(shipmentId);
      if (projection !== undefined) {
        result.push(projection);
      }
    }
    return result;
  }

  private withDefaults(options?: Omit<ProjectionOptions, "catalog">): ProjectionOptions {
    const base: ProjectionOptions = { ...this.defaults, ...options };
    return this.catalog !== undefined ? { ...base, catalog: this.catalog } : base;
  }
}
