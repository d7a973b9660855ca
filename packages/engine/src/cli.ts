/**
 * @shipledger/engine — Command-line front end.
 *
 *   shipledger create [--payload JSON] [--event-id ID]
 *   shipledger transition <shipmentId> <EVENT_TYPE> <ROLE>
 *       [--payload JSON] [--event-id ID] [--expected-seq N]
 *   shipledger show <shipmentId> [--through-seq N] [--as-of ISO]
 *   shipledger list [--state STATE]
 *   shipledger verify
 *   shipledger report
 *
 * Exit codes: 0 success, 1 rejected or invalid, 2 usage error.
 */

import { parseArgs } from "node:util";
import type { ChalkInstance } from "chalk";
import { isLifecycleState } from "@shipledger/types";
import type { ShipmentProjection } from "@shipledger/types";
import type { AuditViolation } from "@shipledger/verify";
import { describeStorageError } from "./errors.js";
import type { Rejection } from "./errors.js";
import type { ShipmentLifecycleService } from "./services/shipment-service.js";

// =============================================================================
// Output
// =============================================================================

export interface CliIo {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  readonly color: ChalkInstance;
}

export const USAGE = [
  "Usage: shipledger <command> [options]",
  "",
  "Commands:",
  "  create [--payload JSON] [--event-id ID]",
  "  transition <shipmentId> <EVENT_TYPE> <ROLE> [--payload JSON] [--event-id ID] [--expected-seq N]",
  "  show <shipmentId> [--through-seq N] [--as-of ISO]",
  "  list [--state STATE]",
  "  verify",
  "  report",
] as const;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

class Printer {
  constructor(private readonly io: CliIo) {}

  ok(msg: string): void {
    this.io.out(this.io.color.green("✓ ") + msg);
  }

  info(label: string, value: string): void {
    this.io.out(this.io.color.gray(label.padEnd(24)) + value);
  }

  line(text: string): void {
    this.io.out(text);
  }

  rejected(rejection: Rejection): void {
    this.io.err(
      this.io.color.red("✗ ") + this.io.color.bold(rejection.code) + ": " + rejection.message,
    );
  }

  fail(msg: string): void {
    this.io.err(this.io.color.red("✗ ") + msg);
  }

  usage(message: string): void {
    this.fail(message);
    for (const line of USAGE) {
      this.io.err(line);
    }
  }

  violation(v: AuditViolation): void {
    const where = [
      v.shipmentId,
      v.eventSeq !== undefined ? `seq ${v.eventSeq}` : undefined,
    ]
      .filter((part) => part !== undefined)
      .join(" ");
    this.io.err(
      "  " + this.io.color.yellow(v.kind) + (where.length > 0 ? ` ${where}` : "") + ": " + v.description,
    );
  }
}

// =============================================================================
// Entry
// =============================================================================

/**
 * Run one command against the service and return its exit code.
 *
 * Storage failures are printed and reported as exit code 1; any other
 * thrown error propagates.
 */
export function runCommand(
  service: ShipmentLifecycleService,
  argv: readonly string[],
  io: CliIo,
): number {
  const printer = new Printer(io);

  try {
    return dispatch(service, argv, printer, io.color);
  } catch (err) {
    if (err instanceof UsageError) {
      printer.usage(err.message);
      return 2;
    }
    const storage = describeStorageError(err);
    if (storage !== undefined) {
      printer.rejected(storage);
      return 1;
    }
    throw err;
  }
}

function dispatch(
  service: ShipmentLifecycleService,
  argv: readonly string[],
  p: Printer,
  color: ChalkInstance,
): number {
  const { values, positionals } = parseCommandLine(argv);
  const [command, ...args] = positionals;

  switch (command) {
    case "create": {
      expectArgs(args, 0, "create");
      const outcome = service.createShipment(
        parsePayload(values.payload),
        values["event-id"] !== undefined ? { eventId: values["event-id"] } : undefined,
      );
      if (!outcome.accepted) {
        p.rejected(outcome.rejection);
        return 1;
      }
      p.ok(
        `${color.bold(outcome.shipmentId)} ${outcome.event.newState}` +
          (outcome.duplicate ? color.gray(" (already recorded)") : ""),
      );
      return 0;
    }

    case "transition": {
      expectArgs(args, 3, "transition");
      const [shipmentId = "", eventType = "", role = ""] = args;
      const outcome = service.transitionShipment(
        shipmentId,
        eventType,
        role,
        parsePayload(values.payload),
        {
          ...(values["event-id"] !== undefined ? { eventId: values["event-id"] } : {}),
          ...(values["expected-seq"] !== undefined
            ? { expectedSeq: parseSeq(values["expected-seq"], "--expected-seq") }
            : {}),
        },
      );
      if (!outcome.accepted) {
        p.rejected(outcome.rejection);
        return 1;
      }
      p.ok(
        `${color.bold(outcome.shipmentId)} ${eventType} → ${outcome.newState} (seq ${outcome.eventSeq})` +
          (outcome.duplicate ? color.gray(" (already recorded)") : ""),
      );
      return 0;
    }

    case "show": {
      expectArgs(args, 1, "show");
      const shipmentId = args[0] ?? "";
      const projection = service.getShipment(shipmentId, {
        ...(values["through-seq"] !== undefined
          ? { throughSeq: parseSeq(values["through-seq"], "--through-seq") }
          : {}),
        ...(values["as-of"] !== undefined ? { asOf: parseInstant(values["as-of"]) } : {}),
      });
      if (projection === undefined) {
        p.rejected({ code: "NOT_FOUND", message: `Shipment ${shipmentId} does not exist` });
        return 1;
      }
      showProjection(projection, p);
      return 0;
    }

    case "list": {
      expectArgs(args, 0, "list");
      let shipments: readonly ShipmentProjection[];
      if (values.state !== undefined) {
        if (!isLifecycleState(values.state)) {
          throw new UsageError(`Unknown state "${values.state}"`);
        }
        shipments = service.getShipmentsByState(values.state);
      } else {
        shipments = service.listShipments();
      }

      if (shipments.length === 0) {
        p.line(color.gray("No shipments"));
        return 0;
      }
      for (const s of shipments) {
        p.line(`${s.shipmentId}  ${s.currentState.padEnd(24)}${s.lastUpdated}`);
      }
      return 0;
    }

    case "verify": {
      expectArgs(args, 0, "verify");
      const report = service.verifyIntegrity();
      if (report.verdict === "VALID") {
        p.ok(
          `${color.green.bold("VALID")} (${report.totalEvents} events, ${report.totalShipments} shipments)`,
        );
        return 0;
      }
      p.fail(`${color.red.bold("INVALID")} (${report.violations.length} violations)`);
      for (const v of report.violations) {
        p.violation(v);
      }
      return 1;
    }

    case "report": {
      expectArgs(args, 0, "report");
      const report = service.auditReport();
      p.info("Events", String(report.totalEvents));
      p.info("Shipments", String(report.totalShipments));
      p.info(
        "Integrity",
        report.integrityStatus === "VALID"
          ? color.green(report.integrityStatus)
          : color.red(report.integrityStatus),
      );
      p.info("First event", report.firstEventAt ?? "-");
      p.info("Last event", report.lastEventAt ?? "-");
      p.line(color.bold("States"));
      for (const [state, count] of Object.entries(report.stateCounts)) {
        p.info(`  ${state}`, String(count));
      }
      p.line(color.bold("Event types"));
      for (const [type, count] of Object.entries(report.eventTypeCounts)) {
        p.info(`  ${type}`, String(count));
      }
      p.line(color.bold("Roles"));
      for (const [role, count] of Object.entries(report.roleCounts)) {
        p.info(`  ${role}`, String(count));
      }
      return report.integrityStatus === "VALID" ? 0 : 1;
    }

    case undefined:
      throw new UsageError("No command given");

    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        payload: { type: "string" },
        "event-id": { type: "string" },
        "expected-seq": { type: "string" },
        state: { type: "string" },
        "through-seq": { type: "string" },
        "as-of": { type: "string" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function expectArgs(args: readonly string[], count: number, command: string): void {
  if (args.length !== count) {
    throw new UsageError(
      `${command} takes ${count} argument${count === 1 ? "" : "s"}, got ${args.length}`,
    );
  }
}

function parsePayload(raw: string | undefined): unknown {
  if (raw === undefined) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new UsageError(`--payload is not valid JSON: ${raw}`);
  }
}

function parseSeq(raw: string, flag: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`${flag} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

function parseInstant(raw: string): string {
  const time = Date.parse(raw);
  if (Number.isNaN(time)) {
    throw new UsageError(`--as-of must be an ISO 8601 instant, got "${raw}"`);
  }
  return new Date(time).toISOString();
}

// ─── Rendering ───────────────────────────────────────────────────────

function showProjection(s: ShipmentProjection, p: Printer): void {
  p.info("Shipment", s.shipmentId);
  p.info("State", s.currentState + (s.closed ? " (closed)" : ""));
  p.info("Created", s.createdAt);
  p.info("Updated", s.lastUpdated);
  p.info("Events", `${s.eventCount} (last seq ${s.lastEventSeq})`);
  p.info("History", s.eventSequence.join(" → "));
  p.info("Roles", s.rolesInvolved.join(", "));
  p.info("Payload", JSON.stringify(s.currentPayload));
}
