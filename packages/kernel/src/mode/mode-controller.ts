/**
 * Bastion Kernel — Mode Controller
 *
 * Owns the single runtime mode and the queue of actions waiting for the
 * user. State changes only inside transition(), which holds one global lock
 * for the duration of the callback, so concurrent requests see each
 * other's effects in a total order.
 *
 *   Normal ──approval requested──▶ ApprovalPending
 *   ApprovalPending ──last approval resolved──▶ Normal
 *   Normal ──enter (authenticated)──▶ Sandbox
 *   Sandbox ──exit──▶ Normal ──held diffs──▶ ApprovalPending
 *
 * Sandbox can only be entered from Normal: entering would otherwise strand
 * the pending approvals behind a mode that cannot resolve them.
 */

import { randomUUID } from 'node:crypto';

import { TransitionRejectedError } from '../errors.js';
import type { Action } from '../types/action.js';
import type { ActionKind } from '../types/action.js';
import type { ApprovalReason } from '../types/decision.js';
import type { ModeTransition, ModeTransitionCause } from '../types/mode.js';
import { Mode } from '../types/mode.js';
import { Mutex } from '../util/mutex.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ApprovalOrigin = 'request' | 'sandbox_diff';

export interface PendingApproval {
  readonly id: string;
  readonly actor_id: string;
  readonly action: Action;
  readonly reason: ApprovalReason;
  readonly origin: ApprovalOrigin;
  /** ISO 8601 time the approval was opened. */
  readonly created_at: string;
}

export interface SandboxSession {
  readonly entered_at: string;
  readonly edits_confirmed: boolean;
  /** Personality and settings edits held for review at exit, in order. */
  readonly diffs: ReadonlyArray<Action>;
}

type ModeState =
  | { readonly mode: Mode.Normal }
  | { readonly mode: Mode.ApprovalPending; readonly pending: ReadonlyMap<string, PendingApproval> }
  | { readonly mode: Mode.Sandbox; readonly session: SandboxSession };

export interface ModeListener {
  (transition: ModeTransition): void;
}

/**
 * The mutation surface handed to a transition() callback. Using it after
 * the callback has returned throws.
 */
export interface ModeTransaction {
  readonly mode: Mode;
  readonly sandboxSession: SandboxSession | null;
  pending(): ReadonlyArray<PendingApproval>;
  pendingKinds(actorId: string): ReadonlySet<ActionKind>;
  /** Park an action. Normal/ApprovalPending → ApprovalPending. */
  openApproval(
    actorId: string,
    action: Action,
    reason: ApprovalReason,
    origin?: ApprovalOrigin,
  ): PendingApproval;
  /** Remove an approval. Returns undefined if it no longer exists. */
  resolveApproval(approvalId: string): PendingApproval | undefined;
  /** Remove every approval belonging to an actor. */
  cancelApprovalsFor(actorId: string): ReadonlyArray<PendingApproval>;
  enterSandbox(editsConfirmed: boolean): void;
  holdSandboxDiff(action: Action): void;
  /** Sandbox → Normal. Returns the held diffs for the caller to queue. */
  exitSandbox(): ReadonlyArray<Action>;
}

export interface ModeControllerOptions {
  readonly clock?: () => string;
  readonly newId?: () => string;
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export class ModeController {
  private state: ModeState = { mode: Mode.Normal };
  private readonly lock = new Mutex();
  private readonly history: ModeTransition[] = [];
  private readonly listeners: ModeListener[] = [];
  private readonly clock: () => string;
  private readonly newId: () => string;

  constructor(options: ModeControllerOptions = {}) {
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.newId = options.newId ?? (() => `apr_${randomUUID().slice(0, 8)}`);
  }

  currentMode(): Mode {
    return this.state.mode;
  }

  /** True exactly while in Sandbox mode. */
  get auditSuppressed(): boolean {
    return this.state.mode === Mode.Sandbox;
  }

  get sandboxSession(): SandboxSession | null {
    return this.state.mode === Mode.Sandbox ? this.state.session : null;
  }

  pendingApprovals(): ReadonlyArray<PendingApproval> {
    return this.state.mode === Mode.ApprovalPending ? [...this.state.pending.values()] : [];
  }

  pendingKinds(actorId: string): ReadonlySet<ActionKind> {
    return new Set(
      this.pendingApprovals()
        .filter((p) => p.actor_id === actorId)
        .map((p) => p.action.kind),
    );
  }

  transitions(): ReadonlyArray<ModeTransition> {
    return [...this.history];
  }

  onTransition(listener: ModeListener): void {
    this.listeners.push(listener);
  }

  /**
   * Run `fn` under the global transition lock. All state changes made
   * through the transaction are visible to the next holder of the lock.
   */
  async transition<T>(fn: (tx: ModeTransaction) => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(async () => {
      const controller = this;
      let open = true;
      const guard = (): void => {
        if (!open) throw new Error('Mode transaction used after it closed');
      };
      const tx: ModeTransaction = {
        get mode() {
          return controller.state.mode;
        },
        get sandboxSession() {
          return controller.sandboxSession;
        },
        pending: () => controller.pendingApprovals(),
        pendingKinds: (actorId) => controller.pendingKinds(actorId),
        openApproval: (actorId, action, reason, origin = 'request') => {
          guard();
          return controller.openApproval(actorId, action, reason, origin);
        },
        resolveApproval: (approvalId) => {
          guard();
          return controller.resolveApproval(approvalId);
        },
        cancelApprovalsFor: (actorId) => {
          guard();
          return controller.cancelApprovalsFor(actorId);
        },
        enterSandbox: (editsConfirmed) => {
          guard();
          controller.enterSandbox(editsConfirmed);
        },
        holdSandboxDiff: (action) => {
          guard();
          controller.holdSandboxDiff(action);
        },
        exitSandbox: () => {
          guard();
          return controller.exitSandbox();
        },
      };
      try {
        return await fn(tx);
      } finally {
        open = false;
      }
    });
  }

  // -------------------------------------------------------------------------
  // State changes (only reachable through a transaction)
  // -------------------------------------------------------------------------

  private openApproval(
    actorId: string,
    action: Action,
    reason: ApprovalReason,
    origin: ApprovalOrigin,
  ): PendingApproval {
    if (this.state.mode === Mode.Sandbox) {
      throw new TransitionRejectedError(
        Mode.Sandbox,
        Mode.ApprovalPending,
        'approvals cannot be requested inside Sandbox',
      );
    }
    const approval: PendingApproval = {
      id: this.newId(),
      actor_id: actorId,
      action,
      reason,
      origin,
      created_at: this.clock(),
    };
    const pending = new Map(this.state.mode === Mode.ApprovalPending ? this.state.pending : []);
    pending.set(approval.id, approval);
    this.setState(
      { mode: Mode.ApprovalPending, pending },
      origin === 'sandbox_diff' ? 'sandbox_diffs_queued' : 'approval_requested',
    );
    return approval;
  }

  private resolveApproval(approvalId: string): PendingApproval | undefined {
    if (this.state.mode !== Mode.ApprovalPending) return undefined;
    const approval = this.state.pending.get(approvalId);
    if (approval === undefined) return undefined;
    this.removePending([approvalId]);
    return approval;
  }

  private cancelApprovalsFor(actorId: string): ReadonlyArray<PendingApproval> {
    const cancelled = this.pendingApprovals().filter((p) => p.actor_id === actorId);
    if (cancelled.length > 0) this.removePending(cancelled.map((p) => p.id));
    return cancelled;
  }

  private removePending(ids: ReadonlyArray<string>): void {
    if (this.state.mode !== Mode.ApprovalPending) return;
    const pending = new Map(this.state.pending);
    for (const id of ids) pending.delete(id);
    if (pending.size === 0) {
      this.setState({ mode: Mode.Normal }, 'approvals_resolved');
    } else {
      this.state = { mode: Mode.ApprovalPending, pending };
    }
  }

  private enterSandbox(editsConfirmed: boolean): void {
    if (this.state.mode !== Mode.Normal) {
      throw new TransitionRejectedError(
        this.state.mode,
        Mode.Sandbox,
        this.state.mode === Mode.Sandbox
          ? 'already in Sandbox'
          : 'resolve pending approvals first',
      );
    }
    this.setState(
      {
        mode: Mode.Sandbox,
        session: { entered_at: this.clock(), edits_confirmed: editsConfirmed, diffs: [] },
      },
      'sandbox_entered',
    );
  }

  private holdSandboxDiff(action: Action): void {
    if (this.state.mode !== Mode.Sandbox) {
      throw new TransitionRejectedError(this.state.mode, Mode.Sandbox, 'no Sandbox session to hold edits');
    }
    const session = this.state.session;
    this.state = {
      mode: Mode.Sandbox,
      session: { ...session, diffs: [...session.diffs, action] },
    };
  }

  private exitSandbox(): ReadonlyArray<Action> {
    if (this.state.mode !== Mode.Sandbox) {
      throw new TransitionRejectedError(this.state.mode, Mode.Normal, 'not in Sandbox');
    }
    const diffs = this.state.session.diffs;
    this.setState({ mode: Mode.Normal }, 'sandbox_exited');
    return diffs;
  }

  private setState(next: ModeState, cause: ModeTransitionCause): void {
    const from = this.state.mode;
    this.state = next;
    if (from === next.mode) return;
    const transition: ModeTransition = { from, to: next.mode, at: this.clock(), cause };
    this.history.push(transition);
    for (const listener of this.listeners) listener(transition);
  }
}
