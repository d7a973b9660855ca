/**
 * @shipledger/event-store — Append-only shipment event persistence.
 *
 * Provides:
 * - EventStore interface for the append-only shipment log
 * - InMemoryEventStore for tests and embedding
 * - JsonlEventStore for durable file-based persistence
 * - Hash chain for tamper evidence
 * - EventCatalog for schema versioning and migration
 * - IdentifierGenerator backed by an append-only counter log
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  CorruptRecord,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableRecord } from "./hash-chain.js";

// Record codec
export { encodeRecord, decodeRecord, toLogRecord, fromLogRecord, LogRecordSchema } from "./record.js";
export type { LogRecord, DecodeResult } from "./record.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Catalog & schema versioning
export type { EventSchema, EventMigration } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";
export {
  createShipmentCatalog,
  JsonPayloadSchema,
  CreatedPayloadSchema,
  ReasonPayloadSchema,
} from "./shipment-events.js";
export type { JsonValue, CreatedPayload, ReasonPayload } from "./shipment-events.js";

// Identifiers
export type {
  CounterLog,
  CounterRecord,
  JsonlCounterLogOptions,
  IdentifierErrorCode,
} from "./counter-log.js";
export {
  InMemoryCounterLog,
  JsonlCounterLog,
  IdentifierError,
  CounterRecordSchema,
} from "./counter-log.js";
export {
  IdentifierGenerator,
  isShipmentId,
  DEFAULT_ID_PREFIX,
  DEFAULT_ID_WIDTH,
} from "./identifier-generator.js";
export type { IdentifierGeneratorOptions } from "./identifier-generator.js";
