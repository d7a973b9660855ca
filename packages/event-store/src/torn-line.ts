/**
 * @shipledger/event-store — Torn-line markers.
 *
 * A write that fails part way can leave an unterminated fragment at the end
 * of a log. The next append terminates the fragment and writes a marker
 * naming its line before the new record:
 * {"torn_line":2}
 *
 * Loaders tolerate an undecodable line that a marker names, so a recovered
 * log still opens after further restarts.
 */

import { z } from "zod";

const TornLineMarkerSchema = z.object({ torn_line: z.number().int().min(1) }).strict();

const MARKER_PREFIX = '{"torn_line":';

export function encodeTornLineMarker(line: number): string {
  return JSON.stringify({ torn_line: line });
}

/**
 * Line number named by a marker, or undefined if the line is not one.
 */
export function parseTornLineMarker(line: string): number | undefined {
  if (!line.startsWith(MARKER_PREFIX)) {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = TornLineMarkerSchema.safeParse(raw);
  return parsed.success ? parsed.data.torn_line : undefined;
}
