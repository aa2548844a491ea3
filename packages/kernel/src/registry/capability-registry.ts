/**
 * Bastion Kernel — Capability Registry
 *
 * Maps each actor kind to its fixed capability template and implements
 * grant narrowing. Templates never change at runtime. Agent and SubChat
 * templates are always subsets of the Primus template.
 */

import { UnknownActorKindError } from '../errors.js';
import { ActorKind } from '../types/actor.js';
import type { CapabilityGrant, GrantNarrowing } from '../types/capability.js';
import { INTERNET_ACCESS_ORDER, InternetAccess, RagWriteScope } from '../types/capability.js';

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

const PRIMUS_TEMPLATE: CapabilityGrant = Object.freeze({
  internet_access: InternetAccess.TemporarySession,
  agent_to_agent: true,
  subchat_cross_access: true,
  personality_write: true,
  settings_write: true,
  rag_write_scope: RagWriteScope.OwnPartition,
});

const AGENT_TEMPLATE: CapabilityGrant = Object.freeze({
  internet_access: InternetAccess.PerCall,
  agent_to_agent: true,
  subchat_cross_access: false,
  personality_write: false,
  settings_write: false,
  rag_write_scope: RagWriteScope.OwnPartition,
});

const SUBCHAT_TEMPLATE: CapabilityGrant = Object.freeze({
  internet_access: InternetAccess.PerCall,
  agent_to_agent: false,
  subchat_cross_access: false,
  personality_write: false,
  settings_write: false,
  rag_write_scope: RagWriteScope.OwnPartition,
});

const SANDBOX_TEMPLATE: CapabilityGrant = Object.freeze({
  internet_access: InternetAccess.Off,
  agent_to_agent: false,
  subchat_cross_access: false,
  personality_write: true,
  settings_write: true,
  rag_write_scope: RagWriteScope.OwnPartition,
});

/**
 * The capability template for an actor kind.
 *
 * @throws {UnknownActorKindError} when `kind` is not an ActorKind (for
 * example a value read back from disk)
 */
export function capabilitiesFor(kind: ActorKind): CapabilityGrant {
  switch (kind) {
    case ActorKind.Primus:
      return PRIMUS_TEMPLATE;
    case ActorKind.Agent:
      return AGENT_TEMPLATE;
    case ActorKind.SubChat:
      return SUBCHAT_TEMPLATE;
    case ActorKind.Sandbox:
      return SANDBOX_TEMPLATE;
    default: {
      const unknownKind: never = kind;
      throw new UnknownActorKindError(String(unknownKind));
    }
  }
}

// ---------------------------------------------------------------------------
// Narrowing
// ---------------------------------------------------------------------------

/** Field-wise minimum of two grants. */
export function intersectGrants(a: CapabilityGrant, b: CapabilityGrant): CapabilityGrant {
  return {
    internet_access:
      INTERNET_ACCESS_ORDER[a.internet_access] <= INTERNET_ACCESS_ORDER[b.internet_access]
        ? a.internet_access
        : b.internet_access,
    agent_to_agent: a.agent_to_agent && b.agent_to_agent,
    subchat_cross_access: a.subchat_cross_access && b.subchat_cross_access,
    personality_write: a.personality_write && b.personality_write,
    settings_write: a.settings_write && b.settings_write,
    rag_write_scope:
      a.rag_write_scope === RagWriteScope.OwnPartition &&
      b.rag_write_scope === RagWriteScope.OwnPartition
        ? RagWriteScope.OwnPartition
        : RagWriteScope.None,
  };
}

/**
 * Apply a narrowing to a grant. Fields that would widen the grant are
 * ignored, so the result is never above `grant`.
 */
export function narrowGrant(grant: CapabilityGrant, narrowing: GrantNarrowing): CapabilityGrant {
  return intersectGrants(grant, { ...grant, ...narrowing });
}

/** True when every field of `inner` is at or below the same field of `outer`. */
export function isSubsetOf(inner: CapabilityGrant, outer: CapabilityGrant): boolean {
  const met = intersectGrants(inner, outer);
  return (
    met.internet_access === inner.internet_access &&
    met.agent_to_agent === inner.agent_to_agent &&
    met.subchat_cross_access === inner.subchat_cross_access &&
    met.personality_write === inner.personality_write &&
    met.settings_write === inner.settings_write &&
    met.rag_write_scope === inner.rag_write_scope
  );
}
