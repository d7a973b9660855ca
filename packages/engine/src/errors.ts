/**
 * Rejection types for lifecycle operations.
 *
 * Validation failures are returned as values of the shape
 * { code, message, details? }; they are never thrown. Storage failures
 * are thrown by the stores and propagate unchanged.
 */

import { EventStoreError, IdentifierError } from "@shipledger/event-store";

// =============================================================================
// Error Codes
// =============================================================================

export type LifecycleErrorCode =
  | "INVALID_TRANSITION"
  | "UNAUTHORIZED"
  | "DUPLICATE_EVENT"
  | "CONCURRENT_CONFLICT"
  | "CORRUPT_RECORD"
  | "STORAGE_FAILURE"
  | "NOT_FOUND"
  | "INVALID_PAYLOAD";

// =============================================================================
// Rejection
// =============================================================================

export interface Rejection {
  readonly code: LifecycleErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Factory
// =============================================================================

export function createRejection(
  code: LifecycleErrorCode,
  message: string,
  details?: Record<string, unknown>,
): Rejection {
  if (details !== undefined) {
    return { code, message, details };
  }
  return { code, message };
}

// =============================================================================
// Storage errors
// =============================================================================

/**
 * Describe a storage-layer error in rejection form, for display.
 * Returns undefined for errors that did not come from the stores.
 */
export function describeStorageError(err: unknown): Rejection | undefined {
  if (err instanceof EventStoreError) {
    const code: LifecycleErrorCode =
      err.code === "CORRUPT_RECORD" ? "CORRUPT_RECORD" : "STORAGE_FAILURE";
    const details: Record<string, unknown> = { storeCode: err.code };
    if (err.shipmentId !== undefined) {
      details["shipmentId"] = err.shipmentId;
    }
    return createRejection(code, err.message, details);
  }
  if (err instanceof IdentifierError) {
    return createRejection("STORAGE_FAILURE", err.message, { storeCode: err.code });
  }
  return undefined;
}
