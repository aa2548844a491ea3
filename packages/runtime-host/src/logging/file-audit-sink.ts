/**
 * Bastion Runtime Host — File-backed Audit Sink
 *
 * Implements the kernel's AuditSink by appending one JSONL line per decision
 * to `logs/audit.jsonl`. Each line carries a ULID `event_id` so the reader
 * can drop duplicates left by a retried append.
 *
 * The write is synchronous: the line is on disk before the decision is
 * returned to the caller. Sandbox decisions never reach this sink; the
 * kernel routes them to the encrypted journal instead.
 */

import type { AuditRecord, AuditSink } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const AUDIT_LOG = 'audit.jsonl';

export class FileAuditSink implements AuditSink {
  constructor(private readonly stateIO: StateIO) {}

  append(record: AuditRecord): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: record.timestamp,
      actor_id: record.actor_id,
      action_kind: record.action_kind,
      decision: record.decision,
      mode: record.mode,
      reason: record.reason,
      input_hash: record.input_hash,
    });
    this.stateIO.appendLine(AUDIT_LOG, line);
  }
}
