/**
 * Bastion Kernel — Mode Types
 */

export enum Mode {
  Normal = 'Normal',
  /** At least one action is parked waiting for the user. */
  ApprovalPending = 'ApprovalPending',
  /** Private, offline session. Audit logging is suppressed. */
  Sandbox = 'Sandbox',
}

export interface ModeTransition {
  readonly from: Mode;
  readonly to: Mode;
  /** ISO 8601 time of the transition. */
  readonly at: string;
  readonly cause: ModeTransitionCause;
}

export type ModeTransitionCause =
  | 'approval_requested'
  | 'approvals_resolved'
  | 'sandbox_entered'
  | 'sandbox_exited'
  | 'sandbox_diffs_queued';
