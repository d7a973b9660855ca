/**
 * @shipledger/engine
 *
 * Public API: the lifecycle service, its configuration, the rejection
 * taxonomy and the command runner.
 */

export { ShipmentLifecycleService } from "./services/shipment-service.js";
export type {
  ShipmentServiceDeps,
  CreateOptions,
  TransitionOptions,
  CreateOutcome,
  TransitionOutcome,
  PointInTime,
  IntegrityStatus,
  ServiceAuditReport,
} from "./services/shipment-service.js";

export { loadConfig, ConfigSchema, eventLogPath, counterLogPath } from "./config.js";
export type { AppConfig } from "./config.js";

export { createRejection, describeStorageError } from "./errors.js";
export type { LifecycleErrorCode, Rejection } from "./errors.js";

export { runCommand, USAGE } from "./cli.js";
export type { CliIo } from "./cli.js";
