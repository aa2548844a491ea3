/**
 * Bastion Kernel — Partition Types
 */

import { ActorKind } from './actor.js';

export enum PartitionClass {
  /** Owned by Primus. Readable by every actor. */
  Global = 'global',
  /** Owned by one agent. */
  AgentPrivate = 'agent_private',
  /** Owned by one SubChat. */
  SubChat = 'subchat',
  /** Owned by the Sandbox actor. Sealed outside Sandbox mode. */
  SandboxPrivate = 'sandbox_private',
}

export interface PartitionRef {
  readonly owner_id: string;
  readonly class: PartitionClass;
}

/** Reserved key holding an owner's personality document. */
export const PERSONALITY_KEY = 'personality';

/** Reserved key holding an actor's conversation history. */
export const HISTORY_KEY = 'history';

/** Prefix of the keys in the global partition that hold user settings. */
export const SETTINGS_KEY_PREFIX = 'settings/';

/** Stable string form of a partition reference, e.g. `agent_private:a1`. */
export function partitionId(ref: PartitionRef): string {
  return `${ref.class}:${ref.owner_id}`;
}

/** The class of partition an actor of the given kind owns. */
export function homePartitionClass(kind: ActorKind): PartitionClass {
  switch (kind) {
    case ActorKind.Primus:
      return PartitionClass.Global;
    case ActorKind.Agent:
      return PartitionClass.AgentPrivate;
    case ActorKind.SubChat:
      return PartitionClass.SubChat;
    case ActorKind.Sandbox:
      return PartitionClass.SandboxPrivate;
    default: {
      const exhaustive: never = kind;
      throw new Error(`No partition class for actor kind: ${String(exhaustive)}`);
    }
  }
}

export function homePartition(actor: { readonly id: string; readonly kind: ActorKind }): PartitionRef {
  return { owner_id: actor.id, class: homePartitionClass(actor.kind) };
}
