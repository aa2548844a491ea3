/**
 * Bastion Kernel — Capability Types
 *
 * A CapabilityGrant is the static ceiling of what an actor may do. The
 * registry derives one from the actor kind; runtime narrowing can only
 * lower it.
 */

// ---------------------------------------------------------------------------
// Internet Access
// ---------------------------------------------------------------------------

export enum InternetAccess {
  /** No outbound calls at all. */
  Off = 'off',
  /** Every call needs its own user confirmation. */
  PerCall = 'per_call',
  /** One confirmation covers the rest of the session. */
  TemporarySession = 'temporary_session',
}

/**
 * Ordering used for narrowing: a narrowed grant takes the lower of the two
 * levels.
 */
export const INTERNET_ACCESS_ORDER: Readonly<Record<InternetAccess, number>> = {
  [InternetAccess.Off]: 0,
  [InternetAccess.PerCall]: 1,
  [InternetAccess.TemporarySession]: 2,
};

// ---------------------------------------------------------------------------
// RAG Write Scope
// ---------------------------------------------------------------------------

export enum RagWriteScope {
  /** Writes are allowed into the actor's own partition only. */
  OwnPartition = 'own_partition',
  /** No writes at all. */
  None = 'none',
}

// ---------------------------------------------------------------------------
// Capability Grant
// ---------------------------------------------------------------------------

export interface CapabilityGrant {
  readonly internet_access: InternetAccess;
  readonly agent_to_agent: boolean;
  readonly subchat_cross_access: boolean;
  readonly personality_write: boolean;
  readonly settings_write: boolean;
  readonly rag_write_scope: RagWriteScope;
}

/**
 * A runtime narrowing request. Fields left out keep their current value;
 * fields that would widen the grant are clamped to the template.
 */
export type GrantNarrowing = Partial<CapabilityGrant>;
