/**
 * Bastion Kernel — Decision Types
 *
 * Defines the three enforcement outcomes, the reasons attached to them, and
 * the audit record written for each decision.
 */

import type { AccessToken } from '../store/token-issuer.js';
import type { ActionKind } from './action.js';
import type { Mode } from './mode.js';

// ---------------------------------------------------------------------------
// Decision Outcome
// ---------------------------------------------------------------------------

/**
 * Deny beats RequireApproval beats Allow. When several rules fire, the most
 * restrictive outcome wins.
 */
export enum DecisionOutcome {
  Allow = 'Allow',
  Deny = 'Deny',
  RequireApproval = 'RequireApproval',
}

export const DECISION_SEVERITY: Readonly<Record<DecisionOutcome, number>> = {
  [DecisionOutcome.Allow]: 0,
  [DecisionOutcome.RequireApproval]: 1,
  [DecisionOutcome.Deny]: 2,
};

// ---------------------------------------------------------------------------
// Reasons
// ---------------------------------------------------------------------------

export type DenyReason =
  | 'actor_unknown'
  | 'actor_closed'
  | 'sandbox_inactive'
  | 'approval_pending'
  | 'target_unknown'
  | 'target_closed'
  | 'personality_alias_read_only'
  | 'personality_target_invalid'
  | 'personality_write_not_granted'
  | 'personality_key_reserved'
  | 'history_key_reserved'
  | 'settings_key_reserved'
  | 'settings_write_not_granted'
  | 'sandbox_edits_unconfirmed'
  | 'sandbox_partition_sealed'
  | 'partition_owner_unknown'
  | 'partition_class_mismatch'
  | 'write_outside_own_partition'
  | 'rag_write_not_granted'
  | 'subchat_cross_access_not_granted'
  | 'read_not_shared'
  | 'internet_disabled'
  | 'sandbox_offline'
  | 'agent_to_agent_not_granted'
  | 'not_an_agent_pair'
  | 'no_collaboration'
  | 'already_collaborating'
  | 'collaboration_unknown'
  | 'collaboration_full'
  | 'share_scope_invalid'
  | 'approval_unavailable_in_sandbox'
  | 'rejected_by_user';

export type ApprovalReason =
  | 'personality_change_requires_confirmation'
  | 'settings_change_requires_confirmation'
  | 'internet_requires_confirmation'
  | 'agent_pair_unconfirmed'
  | 'sandbox_diff_review';

// ---------------------------------------------------------------------------
// Decision
// ---------------------------------------------------------------------------

export type Decision =
  | { readonly outcome: DecisionOutcome.Allow }
  | { readonly outcome: DecisionOutcome.Deny; readonly reason: DenyReason }
  | { readonly outcome: DecisionOutcome.RequireApproval; readonly reason: ApprovalReason };

export const ALLOW: Decision = { outcome: DecisionOutcome.Allow };

export function deny(reason: DenyReason): Decision {
  return { outcome: DecisionOutcome.Deny, reason };
}

export function requireApproval(reason: ApprovalReason): Decision {
  return { outcome: DecisionOutcome.RequireApproval, reason };
}

/**
 * What the Interaction Guard hands back to the caller.
 *
 * An Allow for a store operation carries the single-use token the store
 * will accept. A RequireApproval carries the id the user approves or
 * rejects.
 */
export type Authorization =
  | { readonly outcome: DecisionOutcome.Allow; readonly token: AccessToken | null }
  | { readonly outcome: DecisionOutcome.Deny; readonly reason: DenyReason }
  | {
      readonly outcome: DecisionOutcome.RequireApproval;
      readonly reason: ApprovalReason;
      readonly approval_id: string;
    };

/** An Authorization as reported to a front end, without the store token. */
export type Verdict =
  | { readonly outcome: DecisionOutcome.Allow }
  | Exclude<Authorization, { readonly outcome: DecisionOutcome.Allow }>;

// ---------------------------------------------------------------------------
// Audit Record
// ---------------------------------------------------------------------------

/**
 * One entry in the audit log. Records never carry document content.
 */
export interface AuditRecord {
  /** ISO 8601 time of the decision. */
  readonly timestamp: string;
  readonly actor_id: string;
  readonly action_kind: ActionKind;
  readonly decision: DecisionOutcome;
  readonly mode: Mode;
  /** Deny or approval reason; empty string for Allow. */
  readonly reason: string;
  /** SHA-256 of the canonical JSON of the action with content fields removed. */
  readonly input_hash: string;
}
