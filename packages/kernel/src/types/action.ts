/**
 * Bastion Kernel — Action Types
 *
 * Every externally observable thing an actor can do is one of these
 * variants. The discriminant is `kind`; switches over it are exhaustive.
 */

import type { PartitionRef } from './partition.js';

export enum ActionKind {
  ChatTurn = 'chat_turn',
  MemoryRead = 'memory_read',
  MemoryWrite = 'memory_write',
  PersonalityWrite = 'personality_write',
  SettingsWrite = 'settings_write',
  InternetCall = 'internet_call',
  AgentMessage = 'agent_message',
  CollaborationOpen = 'collaboration_open',
  CollaborationJoin = 'collaboration_join',
  MemoryShare = 'memory_share',
}

interface ActionBase {
  readonly actor_id: string;
}

export interface ChatTurnAction extends ActionBase {
  readonly kind: ActionKind.ChatTurn;
}

export interface MemoryReadAction extends ActionBase {
  readonly kind: ActionKind.MemoryRead;
  readonly partition: PartitionRef;
  readonly key: string;
}

export interface MemoryWriteAction extends ActionBase {
  readonly kind: ActionKind.MemoryWrite;
  readonly partition: PartitionRef;
  readonly key: string;
}

export interface PersonalityWriteAction extends ActionBase {
  readonly kind: ActionKind.PersonalityWrite;
  /** Actor whose personality document is replaced. */
  readonly target_id: string;
  readonly content: string;
}

export interface SettingsWriteAction extends ActionBase {
  readonly kind: ActionKind.SettingsWrite;
  readonly setting: string;
  readonly value: string;
}

export interface InternetCallAction extends ActionBase {
  readonly kind: ActionKind.InternetCall;
  /** Human-readable description shown when asking the user. */
  readonly purpose: string;
}

export interface AgentMessageAction extends ActionBase {
  readonly kind: ActionKind.AgentMessage;
  readonly receiver_id: string;
  readonly body: string;
}

export interface CollaborationOpenAction extends ActionBase {
  readonly kind: ActionKind.CollaborationOpen;
  readonly partner_id: string;
}

export interface CollaborationJoinAction extends ActionBase {
  readonly kind: ActionKind.CollaborationJoin;
  readonly collaboration_id: string;
}

export interface MemoryShareAction extends ActionBase {
  readonly kind: ActionKind.MemoryShare;
  readonly partner_id: string;
  /** Explicit subset of keys from the actor's own partition. */
  readonly keys: ReadonlyArray<string>;
}

export type Action =
  | ChatTurnAction
  | MemoryReadAction
  | MemoryWriteAction
  | PersonalityWriteAction
  | SettingsWriteAction
  | InternetCallAction
  | AgentMessageAction
  | CollaborationOpenAction
  | CollaborationJoinAction
  | MemoryShareAction;

/** Partition an action targets, if it targets one directly. */
export function targetPartition(action: Action): PartitionRef | null {
  switch (action.kind) {
    case ActionKind.MemoryRead:
    case ActionKind.MemoryWrite:
      return action.partition;
    default:
      return null;
  }
}
