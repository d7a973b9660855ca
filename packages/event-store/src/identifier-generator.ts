/**
 * @shipledger/event-store — Shipment identifier generator.
 *
 * Issues sequential, zero-padded identifiers: SHP-0000000001,
 * SHP-0000000002, ... Each issuance is persisted to the counter log
 * before the identifier is returned, so an identifier is never reused,
 * not even after a crash between issuance and use.
 */

import type { CounterLog } from "./counter-log.js";
import { IdentifierError } from "./counter-log.js";

export interface IdentifierGeneratorOptions {
  /** Default: "SHP" */
  readonly prefix?: string;

  /** Number of counter digits. Default: 10 */
  readonly width?: number;

  /** Clock for counter record timestamps */
  readonly now?: () => Date;
}

export const DEFAULT_ID_PREFIX = "SHP";
export const DEFAULT_ID_WIDTH = 10;

export class IdentifierGenerator {
  private readonly _log: CounterLog;
  private readonly _prefix: string;
  private readonly _width: number;
  private readonly _now: () => Date;

  constructor(log: CounterLog, options?: IdentifierGeneratorOptions) {
    this._log = log;
    this._prefix = options?.prefix ?? DEFAULT_ID_PREFIX;
    this._width = options?.width ?? DEFAULT_ID_WIDTH;
    this._now = options?.now ?? (() => new Date());

    if (!/^[A-Z][A-Z0-9]*$/.test(this._prefix)) {
      throw new IdentifierError(
        "INVALID_OPTIONS",
        `Identifier prefix must be uppercase alphanumeric, got "${this._prefix}"`,
      );
    }
    if (!Number.isInteger(this._width) || this._width < 1 || this._width > 15) {
      throw new IdentifierError(
        "INVALID_OPTIONS",
        `Identifier width must be an integer in 1..15, got ${this._width}`,
      );
    }
  }

  /**
   * Issue the next identifier.
   *
   * @throws IdentifierError("STORAGE_FAILURE") if the counter cannot be persisted
   * @throws IdentifierError("EXHAUSTED") if the counter no longer fits the width
   */
  nextId(): string {
    const counter = this._log.lastCounter() + 1;
    if (String(counter).length > this._width) {
      throw new IdentifierError(
        "EXHAUSTED",
        `Counter ${counter} exceeds ${this._width} digits`,
      );
    }

    this._log.append({
      counter,
      timestamp: this._now().toISOString(),
      action: "ID_GENERATED",
    });

    return this.format(counter);
  }

  format(counter: number): string {
    return `${this._prefix}-${String(counter).padStart(this._width, "0")}`;
  }

  /**
   * Extract the counter from an identifier issued by this generator.
   */
  parse(id: string): number | undefined {
    if (!isShipmentId(id, this._prefix, this._width)) {
      return undefined;
    }
    return Number(id.slice(this._prefix.length + 1));
  }

  /** Number of identifiers issued so far */
  issuedCount(): number {
    return this._log.lastCounter();
  }
}

/**
 * Check that a value has the shape `<PREFIX>-<width digits>` with a
 * non-zero counter.
 */
export function isShipmentId(
  value: unknown,
  prefix: string = DEFAULT_ID_PREFIX,
  width: number = DEFAULT_ID_WIDTH,
): value is string {
  if (typeof value !== "string") return false;
  if (value.length !== prefix.length + 1 + width) return false;
  if (!value.startsWith(`${prefix}-`)) return false;
  const digits = value.slice(prefix.length + 1);
  return /^\d+$/.test(digits) && Number(digits) > 0;
}
