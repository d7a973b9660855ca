/**
 * @shipledger/event-store — Event Catalog & Schema Versioning.
 *
 * Formalizes all shipment events into a unified catalog with:
 * - Event definitions (type → description, payload check)
 * - Schema versioning (each event type tracks its current schema version)
 * - Migration hooks (transform v1 payloads to the v2 shape, and so on)
 * - Backward-compatible decoding (old events remain readable forever)
 *
 * Migration is read-time only: stored records are never rewritten.
 */

import type { ShipmentEvent, ShipmentEventType } from "@shipledger/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * Defines a versioned event schema.
 */
export interface EventSchema {
  readonly type: ShipmentEventType;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /**
   * Validate a payload against the current schema version.
   */
  validate(payload: unknown): boolean;
}

/**
 * Transforms a payload one version forward (v → v+1).
 */
export type EventMigration = (
  payload: Record<string, unknown>,
) => Record<string, unknown>;

interface CatalogEntry {
  readonly schema: EventSchema;

  /** Migrations indexed by source version (migrations[1] = v1→v2) */
  readonly migrations: Map<number, EventMigration>;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of shipment event types.
 *
 * Usage:
 * ```ts
 * const catalog = createShipmentCatalog();
 *
 * // After DELIVERY_FAILED moves to version 2:
 * catalog.register({ ...deliveryFailedV2 });
 * catalog.registerMigration("DELIVERY_FAILED", 1, (payload) => ({
 *   ...payload,
 *   reasonCode: "UNSPECIFIED",
 * }));
 * ```
 */
export class EventCatalog {
  private readonly _entries = new Map<ShipmentEventType, CatalogEntry>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a new version replaces
   * the schema and keeps the migrations registered so far.
   */
  register(schema: EventSchema): void {
    const existing = this._entries.get(schema.type);

    if (existing !== undefined) {
      if (existing.schema.version === schema.version) {
        return;
      }
      this._entries.set(schema.type, { schema, migrations: existing.migrations });
      return;
    }

    this._entries.set(schema.type, { schema, migrations: new Map() });
  }

  /**
   * Register a migration from `fromVersion` to `fromVersion + 1`.
   *
   * @throws CatalogError if the event type is not registered
   */
  registerMigration(
    eventType: ShipmentEventType,
    fromVersion: number,
    migration: EventMigration,
  ): void {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      throw new CatalogError(
        `Cannot register migration for unknown event type "${eventType}"`,
      );
    }

    entry.migrations.set(fromVersion, migration);
  }

  /**
   * Current schema version of an event type (1 if unregistered).
   */
  currentVersion(eventType: ShipmentEventType): number {
    return this._entries.get(eventType)?.schema.version ?? 1;
  }

  /**
   * Migrate a payload to the current schema version.
   *
   * Unknown event types and payloads from a newer version are returned
   * as-is.
   *
   * @throws CatalogError if the migration path is incomplete
   */
  migrate(
    eventType: ShipmentEventType,
    payload: Record<string, unknown>,
    fromVersion: number,
  ): Record<string, unknown> {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      return payload;
    }

    const targetVersion = entry.schema.version;
    if (fromVersion >= targetVersion) {
      return payload;
    }

    let current = payload;
    for (let v = fromVersion; v < targetVersion; v++) {
      const migration = entry.migrations.get(v);
      if (migration === undefined) {
        throw new CatalogError(
          `Missing migration for "${eventType}" from version ${v} to ${v + 1}`,
        );
      }
      current = migration(current);
    }

    return current;
  }

  /**
   * Upcast a stored event to its type's current schema version.
   *
   * Returns the same object when no migration applies.
   */
  upcast<T extends ShipmentEvent>(event: T): T {
    const targetVersion = this.currentVersion(event.eventType);
    if (event.schemaVersion >= targetVersion) {
      return event;
    }

    const payload = this.migrate(
      event.eventType,
      { ...event.payload },
      event.schemaVersion,
    );

    return { ...event, payload, schemaVersion: targetVersion };
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns false if invalid or unregistered
   */
  validate(eventType: ShipmentEventType, payload: unknown): boolean {
    const entry = this._entries.get(eventType);
    if (entry === undefined) {
      return false;
    }
    return entry.schema.validate(payload);
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
