/**
 * ShipmentLifecycleService — Composition root for the lifecycle engine.
 *
 * The only write path into the log. Callers (CLI, UI, seeding tools)
 * never append to the store directly; every event passes through
 * validation here first.
 *
 * Validation and append happen in the same synchronous call, so no other
 * transition on the shipment can interleave between them. Callers that
 * decided on an older projection pass its `lastEventSeq` as
 * `expectedSeq` and get CONCURRENT_CONFLICT if the shipment moved on.
 */

import { randomUUID } from "node:crypto";
import { pino } from "pino";
import type { Logger } from "pino";
import {
  isRecord,
  isRole,
  isShipmentEventType,
  GENESIS_EVENT_TYPE,
} from "@shipledger/types";
import type {
  LifecycleState,
  PendingEvent,
  Role,
  ShipmentEventType,
  ShipmentProjection,
} from "@shipledger/types";
import {
  EventStoreError,
  IdentifierGenerator,
  JsonlCounterLog,
  JsonlEventStore,
  createShipmentCatalog,
} from "@shipledger/event-store";
import type { EventCatalog, EventStore, StoredEvent } from "@shipledger/event-store";
import {
  AuthorityMatrix,
  LifecycleGraph,
  Projector,
  TransitionValidator,
} from "@shipledger/lifecycle";
import { AuditVerifier } from "@shipledger/verify";
import type { ProjectionOptions } from "@shipledger/lifecycle";
import type { AuditReport, AuditViolation } from "@shipledger/verify";
import type { AppConfig } from "../config.js";
import { counterLogPath, eventLogPath } from "../config.js";
import { createRejection } from "../errors.js";
import type { Rejection } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export interface ShipmentServiceDeps {
  readonly store: EventStore;
  readonly identifiers: IdentifierGenerator;
  readonly catalog?: EventCatalog;
  readonly graph?: LifecycleGraph;
  readonly authority?: AuthorityMatrix;

  /** Default: silent */
  readonly logger?: Logger;

  /** Clock for event timestamps */
  readonly now?: () => Date;

  /** Event ID source for calls that do not supply one */
  readonly newEventId?: () => string;
}

export interface CreateOptions {
  /** Reusing an event ID makes a retried create a no-op */
  readonly eventId?: string;
}

export interface TransitionOptions {
  readonly eventId?: string;

  /** `lastEventSeq` of the projection the caller decided on */
  readonly expectedSeq?: number;
}

export type CreateOutcome =
  | {
      readonly accepted: true;
      readonly shipmentId: string;
      readonly duplicate: boolean;
      readonly event: StoredEvent;
    }
  | { readonly accepted: false; readonly rejection: Rejection };

export type TransitionOutcome =
  | {
      readonly accepted: true;
      readonly shipmentId: string;
      readonly eventSeq: number;
      readonly newState: LifecycleState;
      readonly duplicate: boolean;
      readonly event: StoredEvent;
    }
  | { readonly accepted: false; readonly rejection: Rejection };

/** Project history only up to a sequence number or an instant */
export type PointInTime = Omit<ProjectionOptions, "catalog">;

export type IntegrityStatus = "VALID" | "INVALID";

export interface ServiceAuditReport {
  readonly totalEvents: number;
  readonly totalShipments: number;
  readonly integrityStatus: IntegrityStatus;
  readonly eventTypeCounts: Readonly<Partial<Record<ShipmentEventType, number>>>;
  readonly roleCounts: Readonly<Partial<Record<Role, number>>>;
  readonly stateCounts: Readonly<Partial<Record<LifecycleState, number>>>;
  readonly firstEventAt: string | null;
  readonly lastEventAt: string | null;
  readonly violations: readonly AuditViolation[];
}

// =============================================================================
// Service
// =============================================================================

export class ShipmentLifecycleService {
  readonly store: EventStore;
  readonly identifiers: IdentifierGenerator;
  readonly catalog: EventCatalog;
  readonly graph: LifecycleGraph;
  readonly authority: AuthorityMatrix;

  private readonly _validator: TransitionValidator;
  private readonly _projector: Projector;
  private readonly _verifier: AuditVerifier;
  private readonly _logger: Logger;
  private readonly _now: () => Date;
  private readonly _newEventId: () => string;

  constructor(deps: ShipmentServiceDeps) {
    this.store = deps.store;
    this.identifiers = deps.identifiers;
    this.catalog = deps.catalog ?? createShipmentCatalog();
    this.graph = deps.graph ?? new LifecycleGraph();
    this.authority = deps.authority ?? new AuthorityMatrix(this.graph);

    this._validator = new TransitionValidator(this.graph, this.authority);
    // Reads keep working when a corrupt line took a shipment's CREATED record.
    this._projector = new Projector(this.store, this.catalog, { partialHistory: true });
    this._logger = deps.logger ?? pino({ level: "silent" });
    this._now = deps.now ?? (() => new Date());
    this._newEventId = deps.newEventId ?? randomUUID;
    this._verifier = new AuditVerifier(this.store, this.graph, this.authority, {
      now: this._now,
    });

    for (const corrupt of this.store.corruptRecords()) {
      this._logger.warn(
        { line: corrupt.line, reason: corrupt.reason },
        "Skipped corrupt log record",
      );
    }
  }

  /**
   * Open file-backed stores under the configured data directory.
   *
   * @throws EventStoreError if the event log cannot be read, or is
   *   corrupt and STRICT_READS is set
   * @throws IdentifierError if the counter log cannot be read
   */
  static open(config: AppConfig, logger?: Logger): ShipmentLifecycleService {
    const store = new JsonlEventStore({
      filePath: eventLogPath(config),
      strict: config.STRICT_READS,
    });
    const identifiers = new IdentifierGenerator(
      new JsonlCounterLog({ filePath: counterLogPath(config) }),
      { prefix: config.ID_PREFIX, width: config.ID_WIDTH },
    );

    const service = new ShipmentLifecycleService(
      logger !== undefined ? { store, identifiers, logger } : { store, identifiers },
    );
    service._logger.info(
      {
        eventLog: eventLogPath(config),
        events: store.globalPosition(),
        shipments: store.shipmentIds().length,
      },
      "Shipment log opened",
    );
    return service;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * Issue a new shipment identifier and record its CREATED event.
   *
   * The payload is checked before an identifier is issued, so a rejected
   * create consumes no identifier.
   *
   * @throws IdentifierError or EventStoreError on storage failure
   */
  createShipment(initialPayload: unknown = {}, options?: CreateOptions): CreateOutcome {
    if (options?.eventId !== undefined) {
      const existing = this.store.findEvent(options.eventId);
      if (existing !== undefined) {
        if (existing.eventType !== GENESIS_EVENT_TYPE) {
          return this._reject(
            createRejection(
              "DUPLICATE_EVENT",
              `Event ID "${options.eventId}" already records ${existing.eventType} for ${existing.shipmentId}`,
              { eventId: options.eventId, shipmentId: existing.shipmentId },
            ),
          );
        }
        return { accepted: true, shipmentId: existing.shipmentId, duplicate: true, event: existing };
      }
    }

    if (!isRecord(initialPayload) || !this.catalog.validate(GENESIS_EVENT_TYPE, initialPayload)) {
      return this._reject(
        createRejection("INVALID_PAYLOAD", `Invalid ${GENESIS_EVENT_TYPE} payload`),
      );
    }

    let shipmentId: string;
    try {
      shipmentId = this.identifiers.nextId();
    } catch (err) {
      this._logger.error({ err }, "Identifier issuance failed");
      throw err;
    }

    const decision = this._validator.validate(shipmentId, GENESIS_EVENT_TYPE, "SENDER", null);
    if (!decision.accepted) {
      return this._reject(createRejection(decision.code, decision.reason, { shipmentId }));
    }

    const result = this._append(
      {
        eventId: options?.eventId ?? this._newEventId(),
        shipmentId,
        eventType: GENESIS_EVENT_TYPE,
        previousState: null,
        newState: decision.newState,
        emittingRole: "SENDER",
        timestamp: this._now().toISOString(),
        payload: initialPayload,
        schemaVersion: this.catalog.currentVersion(GENESIS_EVENT_TYPE),
      },
      0,
    );
    if (!result.ok) {
      return this._reject(result.rejection);
    }

    return {
      accepted: true,
      shipmentId,
      duplicate: result.duplicate,
      event: result.event,
    };
  }

  /**
   * Move a shipment along one lifecycle edge.
   *
   * Checks, in order: a replayed event ID, the shipment's existence, the
   * caller's version token, the graph, the role's authority, and the
   * payload. Every failure is returned as a rejection and leaves the log
   * untouched.
   *
   * @throws EventStoreError on storage failure
   */
  transitionShipment(
    shipmentId: string,
    eventType: string,
    role: string,
    extraPayload: unknown = {},
    options?: TransitionOptions,
  ): TransitionOutcome {
    if (options?.eventId !== undefined) {
      const existing = this.store.findEvent(options.eventId);
      if (existing !== undefined) {
        if (existing.shipmentId !== shipmentId || existing.eventType !== eventType) {
          return this._reject(
            createRejection(
              "DUPLICATE_EVENT",
              `Event ID "${options.eventId}" already records ${existing.eventType} for ${existing.shipmentId}`,
              { eventId: options.eventId, shipmentId: existing.shipmentId },
            ),
          );
        }
        return accepted(existing, true);
      }
    }

    if (!isShipmentEventType(eventType)) {
      return this._reject(
        createRejection("INVALID_TRANSITION", `Unknown event type "${eventType}"`, { shipmentId }),
      );
    }
    if (!isRole(role)) {
      return this._reject(createRejection("UNAUTHORIZED", `Unknown role "${role}"`, { shipmentId }));
    }

    const projection = this._projector.project(shipmentId);
    if (projection === undefined) {
      return this._reject(
        createRejection("NOT_FOUND", `Shipment ${shipmentId} does not exist`, { shipmentId }),
      );
    }

    const expectedSeq = options?.expectedSeq;
    if (expectedSeq !== undefined && expectedSeq !== projection.lastEventSeq) {
      return this._reject(conflict(shipmentId, expectedSeq, projection.lastEventSeq));
    }

    const decision = this._validator.validate(
      shipmentId,
      eventType,
      role,
      projection.currentState,
    );
    if (!decision.accepted) {
      return this._reject(
        createRejection(decision.code, decision.reason, {
          shipmentId,
          currentState: projection.currentState,
        }),
      );
    }

    if (!isRecord(extraPayload) || !this.catalog.validate(eventType, extraPayload)) {
      return this._reject(
        createRejection("INVALID_PAYLOAD", `Invalid ${eventType} payload`, { shipmentId }),
      );
    }

    // The log requires non-decreasing timestamps per shipment.
    const now = this._now();
    const last = new Date(projection.lastUpdated);
    const timestamp = (now < last ? last : now).toISOString();

    const result = this._append(
      {
        eventId: options?.eventId ?? this._newEventId(),
        shipmentId,
        eventType,
        previousState: projection.currentState,
        newState: decision.newState,
        emittingRole: role,
        timestamp,
        payload: extraPayload,
        schemaVersion: this.catalog.currentVersion(eventType),
      },
      projection.lastEventSeq,
    );
    if (!result.ok) {
      return this._reject(result.rejection);
    }

    return accepted(result.event, result.duplicate);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getShipment(shipmentId: string, at?: PointInTime): ShipmentProjection | undefined {
    return this._projector.project(shipmentId, at);
  }

  /**
   * Shipments currently in `state`, most recently updated first.
   */
  getShipmentsByState(state: LifecycleState): readonly ShipmentProjection[] {
    return this._projector
      .projectAll()
      .filter((p) => p.currentState === state)
      .sort(
        (a, b) =>
          Date.parse(b.lastUpdated) - Date.parse(a.lastUpdated) ||
          a.shipmentId.localeCompare(b.shipmentId),
      );
  }

  listShipments(): readonly ShipmentProjection[] {
    return this._projector.projectAll();
  }

  /**
   * Replay the whole log against the lifecycle rules.
   */
  verifyIntegrity(): AuditReport {
    const report = this._verifier.verify();
    if (report.verdict === "INVALID") {
      this._logger.warn(
        { violations: report.violations.length, first: report.firstViolation },
        "Integrity check failed",
      );
    }
    return report;
  }

  /**
   * Totals, distributions and integrity status of the whole log.
   */
  auditReport(): ServiceAuditReport {
    const events = this.store.readAll();
    const eventTypeCounts: Partial<Record<ShipmentEventType, number>> = {};
    const roleCounts: Partial<Record<Role, number>> = {};
    const stateCounts: Partial<Record<LifecycleState, number>> = {};

    let first: StoredEvent | undefined;
    let last: StoredEvent | undefined;

    for (const event of events) {
      eventTypeCounts[event.eventType] = (eventTypeCounts[event.eventType] ?? 0) + 1;
      roleCounts[event.emittingRole] = (roleCounts[event.emittingRole] ?? 0) + 1;

      const time = Date.parse(event.timestamp);
      if (first === undefined || time < Date.parse(first.timestamp)) {
        first = event;
      }
      if (last === undefined || time > Date.parse(last.timestamp)) {
        last = event;
      }
    }

    for (const projection of this._projector.projectAll()) {
      stateCounts[projection.currentState] = (stateCounts[projection.currentState] ?? 0) + 1;
    }

    const integrity = this.verifyIntegrity();

    return {
      totalEvents: integrity.totalEvents,
      totalShipments: integrity.totalShipments,
      integrityStatus: integrity.verdict,
      eventTypeCounts,
      roleCounts,
      stateCounts,
      firstEventAt: first?.timestamp ?? null,
      lastEventAt: last?.timestamp ?? null,
      violations: integrity.violations,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _append(
    event: PendingEvent,
    expectedSeq: number,
  ):
    | { readonly ok: true; readonly event: StoredEvent; readonly duplicate: boolean }
    | { readonly ok: false; readonly rejection: Rejection } {
    try {
      const result = this.store.append(event, { expectedSeq });
      this._logger.info(
        {
          shipmentId: event.shipmentId,
          eventType: event.eventType,
          eventSeq: result.eventSeq,
          role: event.emittingRole,
          duplicate: result.duplicate,
        },
        "Shipment event appended",
      );
      return { ok: true, event: result.event, duplicate: result.duplicate };
    } catch (err) {
      if (
        err instanceof EventStoreError &&
        (err.code === "CONCURRENCY_CONFLICT" || err.code === "STREAM_CLOSED")
      ) {
        return {
          ok: false,
          rejection: createRejection("CONCURRENT_CONFLICT", err.message, {
            shipmentId: event.shipmentId,
          }),
        };
      }
      this._logger.error(
        { err, shipmentId: event.shipmentId, eventType: event.eventType },
        "Event append failed",
      );
      throw err;
    }
  }

  private _reject(rejection: Rejection): { readonly accepted: false; readonly rejection: Rejection } {
    this._logger.warn({ code: rejection.code, details: rejection.details }, rejection.message);
    return { accepted: false, rejection };
  }
}

function accepted(event: StoredEvent, duplicate: boolean): TransitionOutcome {
  return {
    accepted: true,
    shipmentId: event.shipmentId,
    eventSeq: event.eventSeq,
    newState: event.newState,
    duplicate,
    event,
  };
}

function conflict(shipmentId: string, expected: number, actual: number): Rejection {
  return createRejection(
    "CONCURRENT_CONFLICT",
    `Shipment ${shipmentId} is at sequence ${actual}, expected ${expected}; re-read and retry`,
    { shipmentId, expectedSeq: expected, currentSeq: actual },
  );
}
