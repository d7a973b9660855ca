/**
 * Tests for ShipmentLifecycleService.
 *
 * Verifies:
 * - Full lifecycle walk, including a failed delivery and retry
 * - Rejections: graph, authority, unknown vocabulary, payload, missing shipment
 * - Every rejection leaves the log untouched
 * - Event ID replay is idempotent
 * - Timestamps never run backwards within a shipment
 * - Queries and the audit report
 * - Logging of appends and rejections
 */

import { describe, it, expect, beforeEach } from "vitest";
import { pino } from "pino";
import {
  IdentifierGenerator,
  InMemoryCounterLog,
  InMemoryEventStore,
} from "@shipledger/event-store";
import { ShipmentLifecycleService } from "../src/services/shipment-service.js";

// =============================================================================
// Helpers
// =============================================================================

function ticking(start: string, stepMs = 60_000): () => Date {
  let t = Date.parse(start);
  return () => {
    const d = new Date(t);
    t += stepMs;
    return d;
  };
}

interface Fixture {
  store: InMemoryEventStore;
  identifiers: IdentifierGenerator;
  service: ShipmentLifecycleService;
}

function setup(now: () => Date = ticking("2026-03-01T08:00:00.000Z")): Fixture {
  const store = new InMemoryEventStore();
  const identifiers = new IdentifierGenerator(new InMemoryCounterLog());
  let n = 0;
  const service = new ShipmentLifecycleService({
    store,
    identifiers,
    now,
    newEventId: () => `evt-${++n}`,
  });
  return { store, identifiers, service };
}

function createOne(service: ShipmentLifecycleService): string {
  const outcome = service.createShipment({ source: "Lyon", destination: "Porto" });
  if (!outcome.accepted) {
    throw new Error(outcome.rejection.message);
  }
  return outcome.shipmentId;
}

const WALK: ReadonlyArray<readonly [string, string, Record<string, unknown>]> = [
  ["MANAGER_APPROVED", "SENDER_MANAGER", {}],
  ["SUPERVISOR_APPROVED", "SENDER_SUPERVISOR", {}],
  ["DISPATCHED", "SYSTEM", { vehicle: "TRK-7" }],
  ["RECEIVER_ACKNOWLEDGED", "RECEIVER_MANAGER", {}],
  ["WAREHOUSE_INTAKE", "WAREHOUSE_MANAGER", { bay: 4 }],
  ["OUT_FOR_DELIVERY", "WAREHOUSE_MANAGER", {}],
  ["DELIVERY_FAILED", "CARRIER", { reason: "No one home" }],
  ["DELIVERY_RETRIED", "SYSTEM", {}],
  ["DELIVERED", "CARRIER", { signed_by: "R. Costa" }],
  ["LIFECYCLE_CLOSED", "SYSTEM", {}],
];

let f: Fixture;

beforeEach(() => {
  f = setup();
});

// =============================================================================
// Create
// =============================================================================

describe("createShipment", () => {
  it("issues sequential identifiers and records CREATED", () => {
    const first = f.service.createShipment({ source: "Lyon", weight_kg: 12.5 });
    const second = f.service.createShipment();

    expect(first.accepted).toBe(true);
    expect(second.accepted).toBe(true);
    if (!first.accepted || !second.accepted) return;

    expect(first.shipmentId).toBe("SHP-0000000001");
    expect(second.shipmentId).toBe("SHP-0000000002");
    expect(first.duplicate).toBe(false);
    expect(first.event).toMatchObject({
      eventId: "evt-1",
      eventSeq: 1,
      eventType: "CREATED",
      previousState: null,
      newState: "CREATED",
      emittingRole: "SENDER",
      timestamp: "2026-03-01T08:00:00.000Z",
      payload: { source: "Lyon", weight_kg: 12.5 },
      schemaVersion: 1,
    });
  });

  it("rejects an invalid payload without consuming an identifier", () => {
    const negative = f.service.createShipment({ weight_kg: -3 });
    const array = f.service.createShipment([1, 2]);

    expect(negative).toEqual({
      accepted: false,
      rejection: { code: "INVALID_PAYLOAD", message: "Invalid CREATED payload" },
    });
    expect(array.accepted).toBe(false);
    expect(f.identifiers.issuedCount()).toBe(0);
    expect(f.store.globalPosition()).toBe(0);
  });

  it("returns the original shipment when the event ID is replayed", () => {
    const first = f.service.createShipment({}, { eventId: "create-A" });
    const again = f.service.createShipment({}, { eventId: "create-A" });

    expect(again).toMatchObject({ accepted: true, shipmentId: "SHP-0000000001", duplicate: true });
    expect(first.accepted && again.accepted && again.event.hash === first.event.hash).toBe(true);
    expect(f.identifiers.issuedCount()).toBe(1);
    expect(f.store.globalPosition()).toBe(1);
  });

  it("rejects an event ID that already records a transition", () => {
    const id = createOne(f.service);
    f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { eventId: "ev-approve" });

    const outcome = f.service.createShipment({}, { eventId: "ev-approve" });

    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.rejection.code).toBe("DUPLICATE_EVENT");
    expect(f.identifiers.issuedCount()).toBe(1);
  });
});

// =============================================================================
// Transition
// =============================================================================

describe("transitionShipment", () => {
  it("walks a shipment through its whole lifecycle", () => {
    const id = createOne(f.service);

    let seq = 1;
    for (const [type, role, payload] of WALK) {
      const outcome = f.service.transitionShipment(id, type, role, payload);
      seq++;
      expect(outcome).toMatchObject({ accepted: true, shipmentId: id, eventSeq: seq, duplicate: false });
    }

    const projection = f.service.getShipment(id);
    expect(projection).toMatchObject({
      shipmentId: id,
      currentState: "LIFECYCLE_CLOSED",
      eventCount: 11,
      lastEventSeq: 11,
      closed: true,
      createdAt: "2026-03-01T08:00:00.000Z",
      lastUpdated: "2026-03-01T08:10:00.000Z",
    });
    expect(projection?.currentPayload).toEqual({
      source: "Lyon",
      destination: "Porto",
      vehicle: "TRK-7",
      bay: 4,
      reason: "No one home",
      signed_by: "R. Costa",
    });
    expect(projection?.rolesInvolved).toEqual([
      "SENDER",
      "SENDER_MANAGER",
      "SENDER_SUPERVISOR",
      "SYSTEM",
      "RECEIVER_MANAGER",
      "WAREHOUSE_MANAGER",
      "CARRIER",
    ]);
    expect(f.service.verifyIntegrity().verdict).toBe("VALID");
  });

  it("returns the new state of a retried delivery", () => {
    const id = createOne(f.service);
    for (const [type, role, payload] of WALK.slice(0, 8)) {
      f.service.transitionShipment(id, type, role, payload);
    }

    expect(f.service.getShipment(id)?.currentState).toBe("OUT_FOR_DELIVERY");
    expect(f.service.getShipment(id)?.eventSequence.slice(-3)).toEqual([
      "OUT_FOR_DELIVERY",
      "DELIVERY_FAILED",
      "DELIVERY_RETRIED",
    ]);
  });

  it("supports the hold and release loop", () => {
    const id = createOne(f.service);

    const held = f.service.transitionShipment(id, "MANAGER_ON_HOLD", "SENDER_MANAGER", {
      reason: "Awaiting customs papers",
    });
    const released = f.service.transitionShipment(id, "HOLD_RELEASED", "SENDER_MANAGER");

    expect(held).toMatchObject({ accepted: true, newState: "MANAGER_ON_HOLD" });
    expect(released).toMatchObject({ accepted: true, newState: "CREATED", eventSeq: 3 });
  });

  it("rejects an edge the graph does not have", () => {
    const id = createOne(f.service);

    const outcome = f.service.transitionShipment(id, "DISPATCHED", "SYSTEM");

    expect(outcome).toEqual({
      accepted: false,
      rejection: {
        code: "INVALID_TRANSITION",
        message:
          "DISPATCHED is not a valid transition for SHP-0000000001 from CREATED (allowed: MANAGER_ON_HOLD, MANAGER_APPROVED)",
        details: { shipmentId: "SHP-0000000001", currentState: "CREATED" },
      },
    });
    expect(f.store.currentSeq(id)).toBe(1);
  });

  it("rejects a role that does not own the current state", () => {
    const id = createOne(f.service);

    const outcome = f.service.transitionShipment(id, "MANAGER_APPROVED", "CARRIER");

    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.rejection.code).toBe("UNAUTHORIZED");
    expect(outcome.rejection.message).toBe(
      "CARRIER may not emit MANAGER_APPROVED for SHP-0000000001 in CREATED (owner: SENDER_MANAGER)",
    );
    expect(f.store.currentSeq(id)).toBe(1);
  });

  it("rejects unknown event types and roles", () => {
    const id = createOne(f.service);

    const badType = f.service.transitionShipment(id, "TELEPORTED", "SYSTEM");
    const badRole = f.service.transitionShipment(id, "MANAGER_APPROVED", "INTERN");

    expect(badType).toMatchObject({
      accepted: false,
      rejection: { code: "INVALID_TRANSITION", message: 'Unknown event type "TELEPORTED"' },
    });
    expect(badRole).toMatchObject({
      accepted: false,
      rejection: { code: "UNAUTHORIZED", message: 'Unknown role "INTERN"' },
    });
  });

  it("rejects a shipment that does not exist", () => {
    const outcome = f.service.transitionShipment("SHP-0000000999", "MANAGER_APPROVED", "SENDER_MANAGER");

    expect(outcome).toMatchObject({
      accepted: false,
      rejection: { code: "NOT_FOUND", message: "Shipment SHP-0000000999 does not exist" },
    });
  });

  it("rejects an invalid payload after the edge is accepted", () => {
    const id = createOne(f.service);

    const empty = f.service.transitionShipment(id, "MANAGER_ON_HOLD", "SENDER_MANAGER", { reason: "" });
    const notObject = f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER", "yes");

    expect(empty).toMatchObject({ accepted: false, rejection: { code: "INVALID_PAYLOAD" } });
    expect(notObject).toMatchObject({ accepted: false, rejection: { code: "INVALID_PAYLOAD" } });
    expect(f.store.currentSeq(id)).toBe(1);
  });

  it("accepts nothing after the lifecycle is closed", () => {
    const id = createOne(f.service);
    for (const [type, role, payload] of WALK) {
      f.service.transitionShipment(id, type, role, payload);
    }

    const outcome = f.service.transitionShipment(id, "DELIVERED", "CARRIER");

    expect(outcome).toMatchObject({
      accepted: false,
      rejection: {
        code: "INVALID_TRANSITION",
        message:
          "DELIVERED is not a valid transition for SHP-0000000001 from LIFECYCLE_CLOSED (no transitions allowed)",
      },
    });
    expect(f.store.currentSeq(id)).toBe(11);
  });

  it("treats a replayed event ID as a no-op", () => {
    const id = createOne(f.service);

    const first = f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { eventId: "ev-1" });
    const again = f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { eventId: "ev-1" });

    expect(first).toMatchObject({ accepted: true, eventSeq: 2, duplicate: false });
    expect(again).toMatchObject({ accepted: true, eventSeq: 2, duplicate: true, newState: "MANAGER_APPROVED" });
    expect(f.store.currentSeq(id)).toBe(2);
  });

  it("rejects an event ID reused for a different shipment", () => {
    const a = createOne(f.service);
    const b = createOne(f.service);
    f.service.transitionShipment(a, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { eventId: "ev-1" });

    const outcome = f.service.transitionShipment(b, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { eventId: "ev-1" });

    expect(outcome).toMatchObject({
      accepted: false,
      rejection: {
        code: "DUPLICATE_EVENT",
        details: { eventId: "ev-1", shipmentId: a },
      },
    });
    expect(f.store.currentSeq(b)).toBe(1);
  });

  it("rejects a stale expected sequence", () => {
    const id = createOne(f.service);

    const outcome = f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER", {}, { expectedSeq: 0 });

    expect(outcome).toEqual({
      accepted: false,
      rejection: {
        code: "CONCURRENT_CONFLICT",
        message: "Shipment SHP-0000000001 is at sequence 1, expected 0; re-read and retry",
        details: { shipmentId: id, expectedSeq: 0, currentSeq: 1 },
      },
    });
  });

  it("never timestamps an event before the shipment's last event", () => {
    const times = ["2026-03-01T10:00:00.000Z", "2026-03-01T09:00:00.000Z"];
    const { service } = setup(() => new Date(times.shift() ?? "2026-03-01T12:00:00.000Z"));
    const id = createOne(service);

    const outcome = service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER");

    expect(outcome.accepted && outcome.event.timestamp).toBe("2026-03-01T10:00:00.000Z");
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("queries", () => {
  it("returns undefined for an unknown shipment", () => {
    expect(f.service.getShipment("SHP-0000000042")).toBeUndefined();
  });

  it("projects a shipment as it stood earlier", () => {
    const id = createOne(f.service);
    f.service.transitionShipment(id, "MANAGER_APPROVED", "SENDER_MANAGER");
    f.service.transitionShipment(id, "SUPERVISOR_APPROVED", "SENDER_SUPERVISOR");

    expect(f.service.getShipment(id, { throughSeq: 2 })?.currentState).toBe("MANAGER_APPROVED");
    expect(f.service.getShipment(id, { asOf: "2026-03-01T08:00:30.000Z" })?.currentState).toBe("CREATED");
    expect(f.service.getShipment(id, { asOf: "2026-03-01T07:00:00.000Z" })).toBeUndefined();
  });

  it("lists shipments in a state, most recently updated first", () => {
    const a = createOne(f.service);
    const b = createOne(f.service);
    const c = createOne(f.service);

    expect(f.service.getShipmentsByState("CREATED").map((s) => s.shipmentId)).toEqual([c, b, a]);

    f.service.transitionShipment(a, "MANAGER_APPROVED", "SENDER_MANAGER");

    expect(f.service.getShipmentsByState("CREATED").map((s) => s.shipmentId)).toEqual([c, b]);
    expect(f.service.getShipmentsByState("MANAGER_APPROVED").map((s) => s.shipmentId)).toEqual([a]);
    expect(f.service.getShipmentsByState("DELIVERED")).toEqual([]);
  });

  it("orders shipments updated at the same instant by identifier", () => {
    const { service } = setup(() => new Date("2026-03-01T08:00:00.000Z"));
    createOne(service);
    createOne(service);
    createOne(service);

    expect(service.getShipmentsByState("CREATED").map((s) => s.shipmentId)).toEqual([
      "SHP-0000000001",
      "SHP-0000000002",
      "SHP-0000000003",
    ]);
  });

  it("returns projections whose nested payload values cannot be edited", () => {
    const outcome = f.service.createShipment({ address: { city: "Pune" } });
    if (!outcome.accepted) throw new Error(outcome.rejection.message);

    const address = f.service.getShipment(outcome.shipmentId)?.currentPayload["address"];
    if (typeof address !== "object" || address === null) throw new Error("missing address");

    expect(() => Object.assign(address, { city: "Elsewhere" })).toThrow(TypeError);
    expect(f.service.getShipment(outcome.shipmentId)?.currentPayload).toEqual({
      address: { city: "Pune" },
    });
    expect(f.service.verifyIntegrity().verdict).toBe("VALID");
  });

  it("lists every shipment in order of creation", () => {
    const a = createOne(f.service);
    const b = createOne(f.service);

    expect(f.service.listShipments().map((s) => s.shipmentId)).toEqual([a, b]);
  });
});

// =============================================================================
// Audit
// =============================================================================

describe("auditReport", () => {
  it("reports an empty log as valid", () => {
    const report = f.service.auditReport();

    expect(report).toEqual({
      totalEvents: 0,
      totalShipments: 0,
      integrityStatus: "VALID",
      eventTypeCounts: {},
      roleCounts: {},
      stateCounts: {},
      firstEventAt: null,
      lastEventAt: null,
      violations: [],
    });
  });

  it("counts events, roles and current states", () => {
    const a = createOne(f.service);
    createOne(f.service);
    f.service.transitionShipment(a, "MANAGER_APPROVED", "SENDER_MANAGER");
    f.service.transitionShipment(a, "SUPERVISOR_APPROVED", "CARRIER");

    const report = f.service.auditReport();

    expect(report).toEqual({
      totalEvents: 3,
      totalShipments: 2,
      integrityStatus: "VALID",
      eventTypeCounts: { CREATED: 2, MANAGER_APPROVED: 1 },
      roleCounts: { SENDER: 2, SENDER_MANAGER: 1 },
      stateCounts: { CREATED: 1, MANAGER_APPROVED: 1 },
      firstEventAt: "2026-03-01T08:00:00.000Z",
      lastEventAt: "2026-03-01T08:02:00.000Z",
      violations: [],
    });
  });

  it("orders the first and last event by instant across UTC offsets", () => {
    const created = {
      eventType: "CREATED",
      previousState: null,
      newState: "CREATED",
      emittingRole: "SENDER",
      payload: {},
      schemaVersion: 1,
    } as const;
    f.store.append({
      ...created,
      eventId: "evt-a",
      shipmentId: "SHP-0000000001",
      timestamp: "2026-03-01T09:00:00+02:00",
    });
    f.store.append({
      ...created,
      eventId: "evt-b",
      shipmentId: "SHP-0000000002",
      timestamp: "2026-03-01T08:00:00.000Z",
    });

    const report = f.service.auditReport();

    expect(report.firstEventAt).toBe("2026-03-01T09:00:00+02:00");
    expect(report.lastEventAt).toBe("2026-03-01T08:00:00.000Z");
  });
});

// =============================================================================
// Logging
// =============================================================================

describe("logging", () => {
  it("logs appends at info and rejections at warn", () => {
    const lines: string[] = [];
    const logger = pino({ level: "info" }, { write: (msg: string) => { lines.push(msg); } });
    const service = new ShipmentLifecycleService({
      store: new InMemoryEventStore(),
      identifiers: new IdentifierGenerator(new InMemoryCounterLog()),
      logger,
    });

    const id = createOne(service);
    service.transitionShipment(id, "DISPATCHED", "SYSTEM");

    const entries = lines.map((l) => JSON.parse(l) as Record<string, unknown>);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      level: 30,
      msg: "Shipment event appended",
      shipmentId: id,
      eventType: "CREATED",
      eventSeq: 1,
    });
    expect(entries[1]).toMatchObject({
      level: 40,
      code: "INVALID_TRANSITION",
      details: { shipmentId: id, currentState: "CREATED" },
    });
  });
});
