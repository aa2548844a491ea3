/**
 * Bastion Kernel — Permission Enforcer
 *
 * Pure decision function: (actor, action, context) → Decision. It reads
 * actor and collaboration state through injected lookups and never mutates
 * anything. Every rule runs; the most restrictive outcome wins, and among
 * equally restrictive outcomes the first rule's reason is kept.
 *
 * Rule order:
 *   1. Actor status (unknown, closed, Sandbox actor outside Sandbox mode)
 *   2. Same-kind approval already pending
 *   3. Action-specific rules (partitions, personality, settings, internet,
 *      agent communication)
 *   4. Sandbox mode: internet off, approvals unavailable
 */

import type { ActorEntry, ActorLookup } from '../registry/actor-directory.js';
import type { Actor } from '../types/actor.js';
import { ActorKind } from '../types/actor.js';
import type {
  Action,
  AgentMessageAction,
  CollaborationJoinAction,
  CollaborationOpenAction,
  InternetCallAction,
  MemoryReadAction,
  MemoryShareAction,
  MemoryWriteAction,
  PersonalityWriteAction,
} from '../types/action.js';
import { ActionKind } from '../types/action.js';
import type { CapabilityGrant } from '../types/capability.js';
import { InternetAccess, RagWriteScope } from '../types/capability.js';
import type { Decision } from '../types/decision.js';
import {
  ALLOW,
  DECISION_SEVERITY,
  DecisionOutcome,
  deny,
  requireApproval,
} from '../types/decision.js';
import { Mode } from '../types/mode.js';
import type { PartitionRef } from '../types/partition.js';
import {
  homePartitionClass,
  PartitionClass,
  HISTORY_KEY,
  PERSONALITY_KEY,
  SETTINGS_KEY_PREFIX,
} from '../types/partition.js';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** Mode-dependent facts the caller supplies for one evaluation. */
export interface EvaluationContext {
  readonly mode: Mode;
  /** True only when replaying an action the user has approved. */
  readonly confirmed: boolean;
  /** The user allowed edits when entering the current Sandbox session. */
  readonly sandbox_edits_confirmed: boolean;
  /** Action kinds this actor already had confirmed for the whole session. */
  readonly session_confirmed: ReadonlySet<ActionKind>;
  /** Action kinds this actor has parked in the pending-approval queue. */
  readonly pending_kinds: ReadonlySet<ActionKind>;
}

export interface CollaborationView {
  readonly id: string;
  readonly members: ReadonlyArray<string>;
}

/** Read side of the Agent Communication Guard. */
export interface CollaborationPolicy {
  readonly maxParticipants: number;
  collaborationOf(agentId: string): CollaborationView | undefined;
  collaboration(collaborationId: string): CollaborationView | undefined;
  isPairAuthorized(a: string, b: string): boolean;
  sharedKeys(ownerId: string, readerId: string): ReadonlySet<string>;
}

interface Subject {
  readonly actor: Actor;
  readonly grant: CapabilityGrant;
}

type Rule = (subject: Subject, action: Action, ctx: EvaluationContext) => Decision | null;

// ---------------------------------------------------------------------------
// Enforcer
// ---------------------------------------------------------------------------

export class PermissionEnforcer {
  private readonly rules: ReadonlyArray<Rule>;

  constructor(
    private readonly actors: ActorLookup,
    private readonly collaboration: CollaborationPolicy,
  ) {
    this.rules = [
      (s, _a, ctx) => this.actorStatus(s, ctx),
      (_s, a, ctx) => (ctx.pending_kinds.has(a.kind) ? deny('approval_pending') : null),
      (s, a, ctx) => this.actionRule(s, a, ctx),
    ];
  }

  evaluate(action: Action, ctx: EvaluationContext): Decision {
    const entry = this.actors.get(action.actor_id);
    if (entry === undefined) return deny('actor_unknown');
    if (entry.closed) return deny('actor_closed');

    const subject: Subject = { actor: entry.actor, grant: entry.grant };
    let result: Decision = ALLOW;
    for (const rule of this.rules) {
      const decision = rule(subject, action, ctx);
      if (
        decision !== null &&
        DECISION_SEVERITY[decision.outcome] > DECISION_SEVERITY[result.outcome]
      ) {
        result = decision;
      }
    }

    if (ctx.mode === Mode.Sandbox && result.outcome === DecisionOutcome.RequireApproval) {
      return deny('approval_unavailable_in_sandbox');
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Rules
  // -------------------------------------------------------------------------

  private actorStatus(subject: Subject, ctx: EvaluationContext): Decision | null {
    if (subject.actor.kind === ActorKind.Sandbox && ctx.mode !== Mode.Sandbox) {
      return deny('sandbox_inactive');
    }
    return null;
  }

  private actionRule(subject: Subject, action: Action, ctx: EvaluationContext): Decision | null {
    switch (action.kind) {
      case ActionKind.ChatTurn:
        return null;
      case ActionKind.MemoryRead:
        return this.memoryRead(subject, action, ctx);
      case ActionKind.MemoryWrite:
        return this.memoryWrite(subject, action, ctx);
      case ActionKind.PersonalityWrite:
        return this.personalityWrite(subject, action, ctx);
      case ActionKind.SettingsWrite:
        return this.settingsWrite(subject, ctx);
      case ActionKind.InternetCall:
        return this.internetCall(subject, action, ctx);
      case ActionKind.AgentMessage:
        return this.agentMessage(subject, action, ctx);
      case ActionKind.CollaborationOpen:
        return this.collaborationOpen(subject, action);
      case ActionKind.CollaborationJoin:
        return this.collaborationJoin(subject, action);
      case ActionKind.MemoryShare:
        return this.memoryShare(subject, action);
      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled action: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Checks shared by reads and writes. Returns the owner entry on success. */
  private partitionPreconditions(
    subject: Subject,
    partition: PartitionRef,
    ctx: EvaluationContext,
  ): Decision | ActorEntry {
    if (partition.class === PartitionClass.SandboxPrivate) {
      if (ctx.mode !== Mode.Sandbox || subject.actor.kind !== ActorKind.Sandbox) {
        return deny('sandbox_partition_sealed');
      }
    }
    const owner = this.actors.get(partition.owner_id);
    if (owner === undefined) return deny('partition_owner_unknown');
    if (homePartitionClass(owner.actor.kind) !== partition.class) {
      return deny('partition_class_mismatch');
    }
    return owner;
  }

  private memoryRead(subject: Subject, action: MemoryReadAction, ctx: EvaluationContext): Decision {
    const owner = this.partitionPreconditions(subject, action.partition, ctx);
    if (!('actor' in owner)) return owner;

    const actor = subject.actor;
    if (owner.actor.id === actor.id) return ALLOW;
    if (action.partition.class === PartitionClass.Global) return ALLOW;
    if (action.key === PERSONALITY_KEY && actor.personality?.owner_id === owner.actor.id) {
      return ALLOW;
    }
    if (action.partition.class === PartitionClass.SubChat) {
      return subject.grant.subchat_cross_access ? ALLOW : deny('subchat_cross_access_not_granted');
    }
    if (action.partition.class === PartitionClass.AgentPrivate) {
      return this.collaboration.sharedKeys(owner.actor.id, actor.id).has(action.key)
        ? ALLOW
        : deny('read_not_shared');
    }
    return deny('read_not_shared');
  }

  private memoryWrite(subject: Subject, action: MemoryWriteAction, ctx: EvaluationContext): Decision {
    const owner = this.partitionPreconditions(subject, action.partition, ctx);
    if (!('actor' in owner)) return owner;

    if (subject.grant.rag_write_scope === RagWriteScope.None) return deny('rag_write_not_granted');
    if (owner.actor.id !== subject.actor.id) return deny('write_outside_own_partition');
    if (action.key === PERSONALITY_KEY) return deny('personality_key_reserved');
    if (action.key === HISTORY_KEY) return deny('history_key_reserved');
    if (action.partition.class === PartitionClass.Global && action.key.startsWith(SETTINGS_KEY_PREFIX)) {
      return deny('settings_key_reserved');
    }
    return ALLOW;
  }

  private personalityWrite(
    subject: Subject,
    action: PersonalityWriteAction,
    ctx: EvaluationContext,
  ): Decision {
    const target = this.actors.get(action.target_id);
    if (target === undefined) return deny('target_unknown');
    if (target.closed) return deny('target_closed');
    if (target.actor.kind === ActorKind.SubChat) return deny('personality_alias_read_only');
    if (target.actor.kind === ActorKind.Sandbox) return deny('personality_target_invalid');
    if (!subject.grant.personality_write) return deny('personality_write_not_granted');
    return this.confirmedEdit(subject, ctx, 'personality_change_requires_confirmation')
      ?? deny('personality_write_not_granted');
  }

  private settingsWrite(subject: Subject, ctx: EvaluationContext): Decision {
    if (!subject.grant.settings_write) return deny('settings_write_not_granted');
    return this.confirmedEdit(subject, ctx, 'settings_change_requires_confirmation')
      ?? deny('settings_write_not_granted');
  }

  /**
   * Primus edits need the user's confirmation. Sandbox edits need the
   * session-level permission granted at entry; they are held as diffs.
   */
  private confirmedEdit(
    subject: Subject,
    ctx: EvaluationContext,
    reason: 'personality_change_requires_confirmation' | 'settings_change_requires_confirmation',
  ): Decision | null {
    switch (subject.actor.kind) {
      case ActorKind.Primus:
        return ctx.confirmed ? ALLOW : requireApproval(reason);
      case ActorKind.Sandbox:
        return ctx.sandbox_edits_confirmed ? ALLOW : deny('sandbox_edits_unconfirmed');
      default:
        return null;
    }
  }

  private internetCall(
    subject: Subject,
    _action: InternetCallAction,
    ctx: EvaluationContext,
  ): Decision {
    if (subject.grant.internet_access === InternetAccess.Off) return deny('internet_disabled');
    if (ctx.mode === Mode.Sandbox) return deny('sandbox_offline');
    if (ctx.confirmed) return ALLOW;
    if (
      subject.grant.internet_access === InternetAccess.TemporarySession &&
      ctx.session_confirmed.has(ActionKind.InternetCall)
    ) {
      return ALLOW;
    }
    return requireApproval('internet_requires_confirmation');
  }

  // -------------------------------------------------------------------------
  // Agent communication
  // -------------------------------------------------------------------------

  /** Both ends must be open agents and the actor must hold agent_to_agent. */
  private agentPair(subject: Subject, partnerId: string): Decision | null {
    if (!subject.grant.agent_to_agent) return deny('agent_to_agent_not_granted');
    const partner = this.actors.get(partnerId);
    if (partner === undefined) return deny('target_unknown');
    if (partner.closed) return deny('target_closed');
    if (
      subject.actor.kind !== ActorKind.Agent ||
      partner.actor.kind !== ActorKind.Agent ||
      partner.actor.id === subject.actor.id
    ) {
      return deny('not_an_agent_pair');
    }
    return null;
  }

  private sameCollaboration(a: string, b: string): boolean {
    return this.collaboration.collaborationOf(a)?.members.includes(b) ?? false;
  }

  private agentMessage(
    subject: Subject,
    action: AgentMessageAction,
    ctx: EvaluationContext,
  ): Decision {
    const pair = this.agentPair(subject, action.receiver_id);
    if (pair !== null) return pair;
    if (!this.sameCollaboration(subject.actor.id, action.receiver_id)) {
      return deny('no_collaboration');
    }
    if (ctx.confirmed || this.collaboration.isPairAuthorized(subject.actor.id, action.receiver_id)) {
      return ALLOW;
    }
    return requireApproval('agent_pair_unconfirmed');
  }

  private collaborationOpen(subject: Subject, action: CollaborationOpenAction): Decision {
    const pair = this.agentPair(subject, action.partner_id);
    if (pair !== null) return pair;
    if (
      this.collaboration.collaborationOf(subject.actor.id) !== undefined ||
      this.collaboration.collaborationOf(action.partner_id) !== undefined
    ) {
      return deny('already_collaborating');
    }
    return ALLOW;
  }

  private collaborationJoin(subject: Subject, action: CollaborationJoinAction): Decision {
    if (!subject.grant.agent_to_agent) return deny('agent_to_agent_not_granted');
    if (subject.actor.kind !== ActorKind.Agent) return deny('not_an_agent_pair');
    const target = this.collaboration.collaboration(action.collaboration_id);
    if (target === undefined) return deny('collaboration_unknown');
    if (this.collaboration.collaborationOf(subject.actor.id) !== undefined) {
      return deny('already_collaborating');
    }
    if (target.members.length >= this.collaboration.maxParticipants) {
      return deny('collaboration_full');
    }
    return ALLOW;
  }

  private memoryShare(subject: Subject, action: MemoryShareAction): Decision {
    const pair = this.agentPair(subject, action.partner_id);
    if (pair !== null) return pair;
    if (!this.sameCollaboration(subject.actor.id, action.partner_id)) {
      return deny('no_collaboration');
    }
    const keys = action.keys;
    if (
      keys.length === 0 ||
      new Set(keys).size !== keys.length ||
      keys.some((k) => k === '*' || k === '' || k === PERSONALITY_KEY)
    ) {
      return deny('share_scope_invalid');
    }
    return ALLOW;
  }
}
