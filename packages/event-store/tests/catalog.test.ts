/**
 * Tests for EventCatalog, schema versioning, and migration.
 *
 * Verifies:
 * - Schema registration and re-registration
 * - Payload validation against schemas
 * - Schema version migration (v1 → v2 → v3) and read-time upcasting
 * - Shipment catalog factory (all 13 event types)
 */

import { describe, it, expect } from "vitest";
import { SHIPMENT_EVENT_TYPES } from "@shipledger/types";
import type { ShipmentEvent, ShipmentEventType } from "@shipledger/types";
import type { EventSchema } from "../src/catalog.js";
import { EventCatalog, CatalogError } from "../src/catalog.js";
import { createShipmentCatalog } from "../src/shipment-events.js";

// =============================================================================
// Helpers
// =============================================================================

function makeSchema(type: ShipmentEventType, version = 1): EventSchema {
  return {
    type,
    version,
    description: `Test schema for ${type}`,
    validate: (p) => typeof p === "object" && p !== null && "reason" in p,
  };
}

function failedEvent(schemaVersion: number, payload: Record<string, unknown>): ShipmentEvent {
  return {
    eventId: "evt-1",
    shipmentId: "SHP-0000000001",
    eventSeq: 7,
    eventType: "DELIVERY_FAILED",
    previousState: "OUT_FOR_DELIVERY",
    newState: "DELIVERY_FAILED",
    emittingRole: "CARRIER",
    timestamp: "2026-04-01T15:00:00.000Z",
    payload,
    schemaVersion,
  };
}

// =============================================================================
// Registration
// =============================================================================

describe("registration", () => {
  it("registers a schema at its version", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("DELIVERY_FAILED", 2));

    expect(catalog.currentVersion("DELIVERY_FAILED")).toBe(2);
    expect(catalog.validate("DELIVERY_FAILED", { reason: "gate closed" })).toBe(true);
  });

  it("ignores re-registration of the same version", () => {
    const catalog = new EventCatalog();
    const schema = makeSchema("DELIVERY_FAILED");
    catalog.register(schema);
    catalog.register({ ...schema, validate: () => false });

    expect(catalog.validate("DELIVERY_FAILED", { reason: "gate closed" })).toBe(true);
  });

  it("keeps migrations when a newer version replaces the schema", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("DELIVERY_FAILED", 1));
    catalog.registerMigration("DELIVERY_FAILED", 1, (p) => ({ ...p, attempt: 1 }));
    catalog.register(makeSchema("DELIVERY_FAILED", 2));

    expect(catalog.migrate("DELIVERY_FAILED", { reason: "dog" }, 1)).toEqual({
      reason: "dog",
      attempt: 1,
    });
  });

  it("defaults the current version of an unregistered type to 1", () => {
    expect(new EventCatalog().currentVersion("DELIVERED")).toBe(1);
  });

  it("rejects a migration for an unregistered type", () => {
    const catalog = new EventCatalog();
    expect(() => catalog.registerMigration("DELIVERED", 1, (p) => p)).toThrow(CatalogError);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("validation", () => {
  it("delegates to the registered validator", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("DELIVERY_FAILED"));

    expect(catalog.validate("DELIVERY_FAILED", { reason: "gate closed" })).toBe(true);
    expect(catalog.validate("DELIVERY_FAILED", {})).toBe(false);
  });

  it("returns false for an unregistered type", () => {
    expect(new EventCatalog().validate("DELIVERED", {})).toBe(false);
  });
});

// =============================================================================
// Migration
// =============================================================================

describe("migration", () => {
  function catalogAtV3(): EventCatalog {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("DELIVERY_FAILED", 1));
    catalog.registerMigration("DELIVERY_FAILED", 1, (p) => ({ ...p, attempt: 1 }));
    catalog.register(makeSchema("DELIVERY_FAILED", 2));
    catalog.registerMigration("DELIVERY_FAILED", 2, (p) => ({
      ...p,
      reason_code: p["reason"] === "nobody home" ? "ABSENT" : "OTHER",
    }));
    catalog.register(makeSchema("DELIVERY_FAILED", 3));
    return catalog;
  }

  it("chains migrations from v1 to the current version", () => {
    const migrated = catalogAtV3().migrate("DELIVERY_FAILED", { reason: "nobody home" }, 1);
    expect(migrated).toEqual({ reason: "nobody home", attempt: 1, reason_code: "ABSENT" });
  });

  it("applies only the remaining steps from an intermediate version", () => {
    const migrated = catalogAtV3().migrate("DELIVERY_FAILED", { reason: "dog" }, 2);
    expect(migrated).toEqual({ reason: "dog", reason_code: "OTHER" });
  });

  it("returns payloads at or above the current version unchanged", () => {
    const payload = { reason: "late" };
    expect(catalogAtV3().migrate("DELIVERY_FAILED", payload, 3)).toBe(payload);
    expect(catalogAtV3().migrate("DELIVERY_FAILED", payload, 4)).toBe(payload);
  });

  it("throws when a step is missing", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("DELIVERY_FAILED", 2));

    expect(() => catalog.migrate("DELIVERY_FAILED", {}, 1)).toThrow(
      'Missing migration for "DELIVERY_FAILED" from version 1 to 2',
    );
  });

  it("upcasts a stored event without touching the original", () => {
    const original = failedEvent(1, { reason: "nobody home" });
    const upcast = catalogAtV3().upcast(original);

    expect(upcast.schemaVersion).toBe(3);
    expect(upcast.payload).toEqual({ reason: "nobody home", attempt: 1, reason_code: "ABSENT" });
    expect(original.schemaVersion).toBe(1);
    expect(original.payload).toEqual({ reason: "nobody home" });
  });

  it("returns the same object when the event is current", () => {
    const event = failedEvent(3, { reason: "x" });
    expect(catalogAtV3().upcast(event)).toBe(event);
  });
});

// =============================================================================
// Shipment catalog
// =============================================================================

describe("createShipmentCatalog", () => {
  const catalog = createShipmentCatalog();

  it("registers every event type at version 1", () => {
    for (const type of SHIPMENT_EVENT_TYPES) {
      expect(catalog.currentVersion(type)).toBe(1);
      expect(catalog.validate(type, {})).toBe(true);
    }
  });

  it("accepts arbitrary JSON payloads", () => {
    expect(catalog.validate("DISPATCHED", { vehicle: "VAN-7", stops: [1, 2], eta: null })).toBe(
      true,
    );
  });

  it("rejects payloads that are not JSON", () => {
    expect(catalog.validate("DISPATCHED", { at: new Date() })).toBe(false);
    expect(catalog.validate("DISPATCHED", { n: Number.NaN })).toBe(false);
    expect(catalog.validate("DISPATCHED", [])).toBe(false);
  });

  it("checks the declared fields of CREATED", () => {
    expect(catalog.validate("CREATED", { source: "Lyon", weight_kg: 2.5, extra: true })).toBe(
      true,
    );
    expect(catalog.validate("CREATED", { weight_kg: -1 })).toBe(false);
    expect(catalog.validate("CREATED", { source: 42 })).toBe(false);
  });

  it("checks the reason of hold and failure events", () => {
    expect(catalog.validate("MANAGER_ON_HOLD", { reason: "missing invoice" })).toBe(true);
    expect(catalog.validate("DELIVERY_FAILED", { reason: "" })).toBe(false);
  });
});
