/**
 * Bastion Kernel — Audit Sink Interfaces
 *
 * The kernel decides what is recorded; the runtime host decides where it
 * goes. Implementations must not silently discard entries.
 */

import type { AuditRecord } from '../types/decision.js';

/** Durable destination for audit records written outside Sandbox mode. */
export interface AuditSink {
  append(record: AuditRecord): void;
}

/**
 * Private destination for decisions made inside a Sandbox session. Never
 * shared with the audit sink. Whatever it writes must be unreadable without
 * the Sandbox passphrase.
 */
export interface SandboxJournal {
  record(record: AuditRecord): void;
}

/**
 * Components that hold Sandbox key material implement this so the runtime
 * can hand them the passphrase on entry and make them drop it on exit.
 */
export interface SandboxSessionHooks {
  onSandboxEnter(passphrase: string): void;
  onSandboxExit(): void;
}

// ---------------------------------------------------------------------------
// Runtime events
// ---------------------------------------------------------------------------

/**
 * Operational events that are not enforcement decisions: store integrity
 * failures and lifecycle changes. Never emitted while in Sandbox mode.
 */
export type RuntimeEvent =
  | {
      readonly type: 'store_integrity_failure';
      readonly timestamp: string;
      readonly actor_id: string;
      readonly code: string;
      readonly message: string;
    }
  | {
      readonly type: 'actor_lifecycle';
      readonly timestamp: string;
      readonly actor_id: string;
      readonly change: 'created' | 'closed' | 'narrowed';
      readonly cancelled_approvals: number;
    }
  | {
      readonly type: 'mode_changed';
      readonly timestamp: string;
      readonly from: string;
      readonly to: string;
      readonly cause: string;
    };

export interface RuntimeEventSink {
  emit(event: RuntimeEvent): void;
}
