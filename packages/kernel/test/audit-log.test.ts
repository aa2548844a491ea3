/**
 * Bastion Kernel — Audit Log Tests
 *
 * audit/append: records are kept in order and forwarded to the sink
 * audit/suppression: nothing is appended while suppressed; the journal gets it
 * audit/tail: tail(n) returns the last n records, oldest first
 */

import { describe, it, expect } from 'vitest';
import { ActionKind, AuditLog, DecisionOutcome, Mode } from '../src/index.js';
import type { AuditRecord, AuditSink, SandboxJournal } from '../src/index.js';

function record(actorId: string): AuditRecord {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    actor_id: actorId,
    action_kind: ActionKind.ChatTurn,
    decision: DecisionOutcome.Allow,
    mode: Mode.Normal,
    reason: '',
    input_hash: 'abc',
  };
}

class CollectingSink implements AuditSink, SandboxJournal {
  readonly entries: AuditRecord[] = [];
  append(entry: AuditRecord): void {
    this.entries.push(entry);
  }
  record(entry: AuditRecord): void {
    this.entries.push(entry);
  }
}

describe('audit log', () => {
  it('appends in order and forwards to the sink', () => {
    const sink = new CollectingSink();
    const log = new AuditLog({ auditSuppressed: false }, sink);
    expect(log.append(record('a'))).toBe(true);
    expect(log.append(record('b'))).toBe(true);
    expect(log.tail(10).map((r) => r.actor_id)).toEqual(['a', 'b']);
    expect(sink.entries).toHaveLength(2);
  });

  it('appends nothing while suppressed and hands the record to the journal', () => {
    const sink = new CollectingSink();
    const journal = new CollectingSink();
    const log = new AuditLog({ auditSuppressed: true }, sink, journal);
    expect(log.append(record('secret'))).toBe(false);
    expect(log.length).toBe(0);
    expect(sink.entries).toHaveLength(0);
    expect(journal.entries.map((r) => r.actor_id)).toEqual(['secret']);
  });

  it('returns the last n records oldest first', () => {
    const log = new AuditLog({ auditSuppressed: false });
    for (const id of ['a', 'b', 'c', 'd']) log.append(record(id));
    expect(log.tail(2).map((r) => r.actor_id)).toEqual(['c', 'd']);
    expect(log.tail(0)).toEqual([]);
  });
});
