/**
 * Tests for the identifier counter logs.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, readFileSync, writeFileSync, rmSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { InMemoryCounterLog, JsonlCounterLog, IdentifierError } from "../src/counter-log.js";

const at = "2026-01-01T00:00:00.000Z";

let testDir: string;
let testFile: string;

beforeEach(() => {
  testDir = join(
    tmpdir(),
    `shipledger-counter-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
  );
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "shipment_counter.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function expectStorageFailure(fn: () => unknown): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(IdentifierError);
    expect((err as IdentifierError).code).toBe("STORAGE_FAILURE");
    return;
  }
  throw new Error("Expected IdentifierError(STORAGE_FAILURE)");
}

describe("InMemoryCounterLog", () => {
  it("starts at zero and tracks the last counter", () => {
    const log = new InMemoryCounterLog();
    expect(log.lastCounter()).toBe(0);

    log.append({ counter: 1, timestamp: at, action: "ID_GENERATED" });
    log.append({ counter: 2, timestamp: at, action: "ID_GENERATED" });

    expect(log.lastCounter()).toBe(2);
    expect(log.records()).toHaveLength(2);
  });

  it("refuses a counter that does not advance", () => {
    const log = new InMemoryCounterLog();
    log.append({ counter: 3, timestamp: at, action: "ID_GENERATED" });

    expectStorageFailure(() => log.append({ counter: 3, timestamp: at, action: "ID_GENERATED" }));
  });
});

describe("JsonlCounterLog", () => {
  it("writes one record per line", () => {
    const log = new JsonlCounterLog({ filePath: testFile });
    log.append({ counter: 1, timestamp: at, action: "ID_GENERATED" });

    expect(readFileSync(testFile, "utf-8")).toBe(
      '{"counter":1,"timestamp":"2026-01-01T00:00:00.000Z","action":"ID_GENERATED"}\n',
    );
  });

  it("resumes from the highest persisted counter", () => {
    const first = new JsonlCounterLog({ filePath: testFile });
    first.append({ counter: 1, timestamp: at, action: "ID_GENERATED" });
    first.append({ counter: 2, timestamp: at, action: "ID_GENERATED" });

    expect(new JsonlCounterLog({ filePath: testFile }).lastCounter()).toBe(2);
  });

  it("ignores a torn final line and terminates it before the next write", () => {
    const first = new JsonlCounterLog({ filePath: testFile });
    first.append({ counter: 1, timestamp: at, action: "ID_GENERATED" });
    appendFileSync(testFile, '{"counter":2,"time');

    const second = new JsonlCounterLog({ filePath: testFile });
    expect(second.lastCounter()).toBe(1);
    second.append({ counter: 2, timestamp: at, action: "ID_GENERATED" });

    expect(new JsonlCounterLog({ filePath: testFile }).lastCounter()).toBe(2);
  });

  it("keeps issuing across restarts after recovering a torn line", () => {
    const first = new JsonlCounterLog({ filePath: testFile });
    first.append({ counter: 1, timestamp: at, action: "ID_GENERATED" });
    appendFileSync(testFile, '{"counter":2,"time');
    new JsonlCounterLog({ filePath: testFile }).append({
      counter: 2,
      timestamp: at,
      action: "ID_GENERATED",
    });

    const third = new JsonlCounterLog({ filePath: testFile });
    third.append({ counter: 3, timestamp: at, action: "ID_GENERATED" });

    expect(new JsonlCounterLog({ filePath: testFile }).lastCounter()).toBe(3);
    expect(readFileSync(testFile, "utf-8").split("\n")[2]).toBe('{"torn_line":2}');
  });

  it("fails on a corrupt record that is neither the torn tail nor marked torn", () => {
    writeFileSync(
      testFile,
      `garbage\n{"counter":1,"timestamp":"${at}","action":"ID_GENERATED"}\n`,
    );
    expectStorageFailure(() => new JsonlCounterLog({ filePath: testFile }));
  });

  it("fails on a counter that goes backwards", () => {
    writeFileSync(
      testFile,
      [
        `{"counter":5,"timestamp":"${at}","action":"ID_GENERATED"}`,
        `{"counter":4,"timestamp":"${at}","action":"ID_GENERATED"}`,
        "",
      ].join("\n"),
    );
    expectStorageFailure(() => new JsonlCounterLog({ filePath: testFile }));
  });

  it("fails when the log path is a directory", () => {
    mkdirSync(testFile);
    expectStorageFailure(() => new JsonlCounterLog({ filePath: testFile }));
  });

  it("fails the write when the log cannot be opened", () => {
    const log = new JsonlCounterLog({ filePath: testFile });
    mkdirSync(testFile);

    expectStorageFailure(() => log.append({ counter: 1, timestamp: at, action: "ID_GENERATED" }));
    expect(log.lastCounter()).toBe(0);
  });
});
