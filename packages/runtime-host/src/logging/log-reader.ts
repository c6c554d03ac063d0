/**
 * Warden Runtime Host — Confinement Log Reader
 *
 * Pure function that turns the raw text of `confinement.jsonl` into
 * validated, deduplicated, time-ordered events.
 *
 * Guarantees:
 * - lines that are not JSON, or not a confinement event with a string
 *   event_id, are dropped and counted in parseErrors
 * - events are deduplicated by event_id; the first occurrence wins
 * - content not ending in '\n' has its last line dropped as a partial write
 * - output is sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain the raw content through StateIO.readLogRaw().
 */

import { isConfinementEventKind, type ConfinementEvent } from '@warden/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A confinement event as persisted by FileLogSink. */
export interface ConfinementLogEntry extends ConfinementEvent {
  /** 26-character ULID; the deduplication key. */
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty complete lines processed. */
  readonly totalLines: number;
  /** Events kept after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  /** True when the content did not end with '\n'. */
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<ConfinementLogEntry>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readConfinementLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (line) => line.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, ConfinementLogEntry>();

  for (const line of lines) {
    const entry = parseEntry(line);
    if (entry === null) {
      parseErrors++;
    } else if (seen.has(entry.event_id)) {
      duplicates++;
    } else {
      seen.set(entry.event_id, entry);
    }
  }

  const events = [...seen.values()].sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseEntry(line: string): ConfinementLogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { event_id, timestamp, event, type, provider, names, detail } = parsed;
  if (
    typeof event_id !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof type !== 'string' ||
    !isConfinementEventKind(event)
  ) {
    return null;
  }
  if (provider !== undefined && typeof provider !== 'string') return null;
  if (names !== undefined && !isStringArray(names)) return null;
  if (detail !== undefined && !isRecord(detail)) return null;

  return { event_id, timestamp, event, type, provider, names, detail };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is ReadonlyArray<string> {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
