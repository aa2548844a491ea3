/**
 * Bastion Kernel — Audit Log
 *
 * Append-only record of enforcement decisions. While Sandbox mode is active
 * nothing is appended; the record goes to the Sandbox journal instead, if
 * one is attached.
 */

import type { AuditRecord } from '../types/decision.js';
import type { AuditSink, SandboxJournal } from './audit-sink.js';

/** Read side of the Mode Controller that the log consults on every append. */
export interface AuditSuppression {
  readonly auditSuppressed: boolean;
}

export class AuditLog {
  private readonly records: AuditRecord[] = [];

  constructor(
    private readonly suppression: AuditSuppression,
    private readonly sink: AuditSink | null = null,
    private readonly journal: SandboxJournal | null = null,
  ) {}

  /**
   * Append one record. Returns false when the record was withheld because
   * Sandbox mode is active.
   */
  append(record: AuditRecord): boolean {
    if (this.suppression.auditSuppressed) {
      this.journal?.record(record);
      return false;
    }
    this.records.push(record);
    this.sink?.append(record);
    return true;
  }

  /** Last `n` records, oldest first. */
  tail(n: number): ReadonlyArray<AuditRecord> {
    if (n <= 0) return [];
    return this.records.slice(-n);
  }

  get length(): number {
    return this.records.length;
  }
}
