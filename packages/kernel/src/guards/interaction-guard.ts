/**
 * Bastion Kernel — Interaction Guard
 *
 * The single choke point between actors and everything they can touch.
 * authorize() evaluates an action under the Mode Controller's transition
 * lock, applies the consequences of the decision (token, pending approval,
 * held Sandbox diff, collaboration change), and appends exactly one audit
 * record. The audit log drops the record itself while Sandbox is active.
 */

import type { PermissionEnforcer } from '../enforcement/enforcer.js';
import type { AuditLog } from '../logging/audit-log.js';
import type { ModeController, ModeTransaction, PendingApproval } from '../mode/mode-controller.js';
import type { ActorDirectory } from '../registry/actor-directory.js';
import type { AccessToken, TokenIssuer } from '../store/token-issuer.js';
import type { Action } from '../types/action.js';
import { ActionKind } from '../types/action.js';
import { InternetAccess } from '../types/capability.js';
import type { Authorization, Decision } from '../types/decision.js';
import { DecisionOutcome } from '../types/decision.js';
import { Mode } from '../types/mode.js';
import {
  homePartition,
  HISTORY_KEY,
  partitionId,
  PartitionClass,
  PERSONALITY_KEY,
  SETTINGS_KEY_PREFIX,
} from '../types/partition.js';
import { computeInputHash } from '../util/canonical.js';
import type { AgentCommunicationGuard } from './agent-communication-guard.js';

export interface InteractionGuardDeps {
  readonly actors: ActorDirectory;
  readonly enforcer: PermissionEnforcer;
  readonly modes: ModeController;
  readonly audit: AuditLog;
  readonly tokens: TokenIssuer;
  readonly communication: AgentCommunicationGuard;
  readonly clock?: () => string;
}

export type ApprovalResolution =
  | { readonly status: 'not_found' }
  | { readonly status: 'rejected'; readonly approval: PendingApproval }
  | {
      readonly status: 'replayed';
      readonly approval: PendingApproval;
      readonly authorization: Authorization;
    };

const NO_KINDS: ReadonlySet<ActionKind> = new Set();

export class InteractionGuard {
  private readonly sessionConfirmations = new Map<string, Set<ActionKind>>();
  private readonly clock: () => string;

  constructor(private readonly deps: InteractionGuardDeps) {
    this.clock = deps.clock ?? (() => new Date().toISOString());
  }

  /** Decide one action. Never throws for a denied action; it returns Deny. */
  async authorize(action: Action): Promise<Authorization> {
    return this.deps.modes.transition<Authorization>((tx) => this.decide(tx, action, false));
  }

  /**
   * Resolve a pending approval. Approval replays the parked action with the
   * user's confirmation attached; the replay is decided and audited like any
   * other action. Rejection discards it and records the refusal.
   */
  async resolve(approvalId: string, verdict: 'approve' | 'reject'): Promise<ApprovalResolution> {
    return this.deps.modes.transition<ApprovalResolution>((tx) => {
      const approval = tx.resolveApproval(approvalId);
      if (approval === undefined) return { status: 'not_found' };
      if (verdict === 'reject') {
        this.record(
          approval.action,
          { outcome: DecisionOutcome.Deny, reason: 'rejected_by_user' },
          tx.mode,
        );
        return { status: 'rejected', approval };
      }
      return { status: 'replayed', approval, authorization: this.decide(tx, approval.action, true) };
    });
  }

  /**
   * Forget everything tied to an actor that is going away: its pending
   * approvals, its session confirmations, and its collaboration state.
   * Returns the cancelled approvals.
   */
  async releaseActor(actorId: string): Promise<ReadonlyArray<PendingApproval>> {
    return this.deps.modes.transition((tx) => {
      const cancelled = tx.cancelApprovalsFor(actorId);
      this.sessionConfirmations.delete(actorId);
      this.deps.communication.removeAgent(actorId);
      return cancelled;
    });
  }

  /** Action kinds the user has confirmed for this actor for the rest of the session. */
  sessionConfirmed(actorId: string): ReadonlySet<ActionKind> {
    return this.sessionConfirmations.get(actorId) ?? NO_KINDS;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private decide(tx: ModeTransaction, action: Action, confirmed: boolean): Authorization {
    const modeAtDecision = tx.mode;
    const decision = this.deps.enforcer.evaluate(action, {
      mode: modeAtDecision,
      confirmed,
      sandbox_edits_confirmed: tx.sandboxSession?.edits_confirmed ?? false,
      session_confirmed: this.sessionConfirmed(action.actor_id),
      // A replay is the resolution of a pending item, never blocked by one.
      pending_kinds: confirmed ? NO_KINDS : tx.pendingKinds(action.actor_id),
    });

    let authorization: Authorization;
    switch (decision.outcome) {
      case DecisionOutcome.Allow:
        authorization = {
          outcome: DecisionOutcome.Allow,
          token: this.applyAllow(tx, action, confirmed),
        };
        break;
      case DecisionOutcome.Deny:
        authorization = decision;
        break;
      case DecisionOutcome.RequireApproval: {
        const approval = tx.openApproval(action.actor_id, action, decision.reason);
        authorization = { ...decision, approval_id: approval.id };
        break;
      }
      default: {
        const unhandled: never = decision;
        throw new Error(`Unhandled decision: ${JSON.stringify(unhandled)}`);
      }
    }

    this.record(action, decision, modeAtDecision);
    return authorization;
  }

  /** Consequences of an Allow. Returns the store token, if the action needs one. */
  private applyAllow(tx: ModeTransaction, action: Action, confirmed: boolean): AccessToken | null {
    const { tokens, communication, actors } = this.deps;
    switch (action.kind) {
      case ActionKind.ChatTurn: {
        const actor = actors.require(action.actor_id).actor;
        return tokens.issue({
          operation: 'write',
          partition_id: partitionId(homePartition(actor)),
          key: HISTORY_KEY,
        });
      }
      case ActionKind.MemoryRead:
        return tokens.issue({
          operation: 'read',
          partition_id: partitionId(action.partition),
          key: action.key,
        });
      case ActionKind.MemoryWrite:
        return tokens.issue({
          operation: 'write',
          partition_id: partitionId(action.partition),
          key: action.key,
        });
      case ActionKind.PersonalityWrite: {
        if (tx.mode === Mode.Sandbox) {
          tx.holdSandboxDiff(action);
          return null;
        }
        const target = actors.require(action.target_id).actor;
        return tokens.issue({
          operation: 'write',
          partition_id: partitionId(homePartition(target)),
          key: PERSONALITY_KEY,
        });
      }
      case ActionKind.SettingsWrite: {
        if (tx.mode === Mode.Sandbox) {
          tx.holdSandboxDiff(action);
          return null;
        }
        const primus = actors.primus();
        if (primus === null) return null;
        return tokens.issue({
          operation: 'write',
          partition_id: partitionId({ owner_id: primus.id, class: PartitionClass.Global }),
          key: `${SETTINGS_KEY_PREFIX}${action.setting}`,
        });
      }
      case ActionKind.InternetCall: {
        const grant = actors.require(action.actor_id).grant;
        if (confirmed && grant.internet_access === InternetAccess.TemporarySession) {
          const kinds = this.sessionConfirmations.get(action.actor_id) ?? new Set<ActionKind>();
          kinds.add(ActionKind.InternetCall);
          this.sessionConfirmations.set(action.actor_id, kinds);
        }
        return null;
      }
      case ActionKind.AgentMessage:
        if (confirmed) communication.authorizePair(action.actor_id, action.receiver_id);
        communication.deliver(action.actor_id, action.receiver_id, action.body);
        return null;
      case ActionKind.CollaborationOpen:
        communication.open(action.actor_id, action.partner_id);
        return null;
      case ActionKind.CollaborationJoin:
        communication.join(action.collaboration_id, action.actor_id);
        return null;
      case ActionKind.MemoryShare:
        communication.share(action.actor_id, action.partner_id, action.keys);
        return null;
      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled action: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private record(action: Action, decision: Decision, mode: Mode): void {
    this.deps.audit.append({
      timestamp: this.clock(),
      actor_id: action.actor_id,
      action_kind: action.kind,
      decision: decision.outcome,
      mode,
      reason: decision.outcome === DecisionOutcome.Allow ? '' : decision.reason,
      input_hash: computeInputHash(action),
    });
  }
}
