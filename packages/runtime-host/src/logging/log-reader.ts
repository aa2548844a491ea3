/**
 * Bastion Runtime Host — JSONL log reader
 *
 * Reads an append-only JSONL log with dedupe-on-read:
 *
 * - Lines are validated against a zod schema; invalid lines are counted and
 *   skipped, never thrown.
 * - The first occurrence of an event_id wins; later copies are duplicates.
 * - A final line without a terminating newline is a write cut short and is
 *   dropped.
 * - Output is sorted by timestamp, then event_id.
 */

import { z } from 'zod';
import { ActionKind, DecisionOutcome, Mode } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import { AUDIT_LOG } from './file-audit-sink.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LogEventBase {
  readonly event_id: string;
  readonly timestamp?: string | undefined;
}

export interface LogReadStats {
  /** Non-empty complete lines seen. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or did not match the schema. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult<T extends LogEventBase> {
  readonly events: ReadonlyArray<T>;
  readonly stats: LogReadStats;
}

export const AuditEntrySchema = z.object({
  event_id: z.string(),
  timestamp: z.string(),
  actor_id: z.string(),
  action_kind: z.nativeEnum(ActionKind),
  decision: z.nativeEnum(DecisionOutcome),
  mode: z.nativeEnum(Mode),
  reason: z.string(),
  input_hash: z.string(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLog<T extends LogEventBase>(
  rawContent: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): LogReadResult<T> {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const events: T[] = [];

  for (const line of lines) {
    const parsed = schema.safeParse(parseJson(line));
    if (!parsed.success) {
      parseErrors++;
      continue;
    }
    if (seen.has(parsed.data.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(parsed.data.event_id);
    events.push(parsed.data);
  }

  events.sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
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

/** The persisted audit log, deduplicated and in time order. */
export function readAuditLog(stateIO: StateIO): LogReadResult<AuditEntry> {
  return readLog(stateIO.readLogRaw(AUDIT_LOG), AuditEntrySchema);
}

/** The last `count` audit entries, oldest first. */
export function tailAuditLog(stateIO: StateIO, count: number): ReadonlyArray<AuditEntry> {
  if (count <= 0) return [];
  return readAuditLog(stateIO).events.slice(-count);
}

function parseJson(line: string): unknown {
  try {
    const value: unknown = JSON.parse(line);
    return value;
  } catch {
    return undefined;
  }
}
