/**
 * Bastion Kernel — Actor Types
 *
 * An actor is anything that can originate an action: the Primus assistant,
 * a spawned agent, a scoped SubChat, or the Sandbox session actor.
 *
 * Actors are immutable once created. Lifecycle state (closed, narrowed
 * grants) lives in the ActorDirectory entry, never on the actor itself.
 */

// ---------------------------------------------------------------------------
// Actor Kind
// ---------------------------------------------------------------------------

export enum ActorKind {
  /** The single top-level assistant. Owns the global partition. */
  Primus = 'primus',
  /** A spawned agent with its own private partition and personality. */
  Agent = 'agent',
  /** A scoped chat opened under Primus or an agent. Inherits personality read-only. */
  SubChat = 'subchat',
  /** The actor behind the Sandbox session. Only active in Sandbox mode. */
  Sandbox = 'sandbox',
}

// ---------------------------------------------------------------------------
// Personality Reference
// ---------------------------------------------------------------------------

/**
 * Where an actor's personality document lives.
 *
 * `owned`: the document is stored in the actor's own partition.
 * `alias`: the document belongs to `owner_id`. Aliases are always
 * read-only and cannot be rebound after the actor is created.
 */
export type PersonalityRef =
  | { readonly kind: 'owned'; readonly owner_id: string }
  | { readonly kind: 'alias'; readonly owner_id: string; readonly read_only: true };

// ---------------------------------------------------------------------------
// Actor
// ---------------------------------------------------------------------------

export interface Actor {
  readonly id: string;
  readonly kind: ActorKind;
  readonly name: string;
  /** Parent actor id. Null for Primus and the Sandbox actor. */
  readonly parent_id: string | null;
  /** Null for the Sandbox actor, which has no personality of its own. */
  readonly personality: PersonalityRef | null;
  /** ISO 8601 creation time. */
  readonly created_at: string;
}
