/**
 * Bastion Kernel — Actor Directory
 *
 * Creates, tracks, narrows, and closes actors. There is exactly one Primus
 * and at most one Sandbox actor. SubChats hang off Primus or an agent and
 * alias their parent's personality read-only.
 */

import { randomUUID } from 'node:crypto';

import { ActorInvalidError, ActorNotFoundError } from '../errors.js';
import type { Actor, PersonalityRef } from '../types/actor.js';
import { ActorKind } from '../types/actor.js';
import type { CapabilityGrant, GrantNarrowing } from '../types/capability.js';
import { capabilitiesFor, narrowGrant } from './capability-registry.js';

export interface ActorEntry {
  readonly actor: Actor;
  readonly closed: boolean;
  /** Template after every runtime narrowing applied so far. */
  readonly grant: CapabilityGrant;
}

/** Read-only view the enforcer is given. */
export interface ActorLookup {
  get(actorId: string): ActorEntry | undefined;
}

export interface ActorDirectoryOptions {
  readonly clock?: () => string;
  readonly newId?: (kind: ActorKind) => string;
}

export class ActorDirectory implements ActorLookup {
  private readonly entries = new Map<string, ActorEntry>();
  private readonly clock: () => string;
  private readonly newId: (kind: ActorKind) => string;
  private primusId: string | null = null;
  private sandboxId: string | null = null;

  constructor(options: ActorDirectoryOptions = {}) {
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.newId = options.newId ?? ((kind) => `${kind}_${randomUUID().slice(0, 8)}`);
  }

  get(actorId: string): ActorEntry | undefined {
    return this.entries.get(actorId);
  }

  /** @throws {ActorNotFoundError} */
  require(actorId: string): ActorEntry {
    const entry = this.entries.get(actorId);
    if (entry === undefined) throw new ActorNotFoundError(actorId);
    return entry;
  }

  list(): ReadonlyArray<ActorEntry> {
    return [...this.entries.values()];
  }

  primus(): Actor | null {
    return this.primusId === null ? null : this.require(this.primusId).actor;
  }

  sandbox(): Actor | null {
    return this.sandboxId === null ? null : this.require(this.sandboxId).actor;
  }

  // -------------------------------------------------------------------------
  // Creation
  // -------------------------------------------------------------------------

  createPrimus(name = 'primus'): Actor {
    if (this.primusId !== null) {
      throw new ActorInvalidError('Primus already exists');
    }
    const id = this.newId(ActorKind.Primus);
    const actor = this.register({
      id,
      kind: ActorKind.Primus,
      name,
      parent_id: null,
      personality: { kind: 'owned', owner_id: id },
    });
    this.primusId = actor.id;
    return actor;
  }

  createSandbox(name = 'sandbox'): Actor {
    if (this.sandboxId !== null) {
      throw new ActorInvalidError('Sandbox actor already exists');
    }
    const actor = this.register({
      id: this.newId(ActorKind.Sandbox),
      kind: ActorKind.Sandbox,
      name,
      parent_id: null,
      personality: null,
    });
    this.sandboxId = actor.id;
    return actor;
  }

  spawnAgent(name: string): Actor {
    if (this.primusId === null) {
      throw new ActorInvalidError('Agents are spawned under Primus, which does not exist yet');
    }
    const id = this.newId(ActorKind.Agent);
    return this.register({
      id,
      kind: ActorKind.Agent,
      name,
      parent_id: this.primusId,
      personality: { kind: 'owned', owner_id: id },
    });
  }

  /**
   * Open a SubChat under Primus or an open agent. The SubChat's personality
   * is a read-only alias of the parent's personality document.
   */
  openSubChat(parentId: string, name: string): Actor {
    const parent = this.require(parentId);
    if (parent.closed) {
      throw new ActorInvalidError(`Cannot open a SubChat under closed actor ${parentId}`);
    }
    if (parent.actor.kind !== ActorKind.Primus && parent.actor.kind !== ActorKind.Agent) {
      throw new ActorInvalidError(`SubChats open under Primus or an agent, not ${parent.actor.kind}`);
    }
    const personality: PersonalityRef = Object.freeze({
      kind: 'alias',
      owner_id: parent.actor.personality?.owner_id ?? parent.actor.id,
      read_only: true,
    });
    return this.register({
      id: this.newId(ActorKind.SubChat),
      kind: ActorKind.SubChat,
      name,
      parent_id: parentId,
      personality,
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Close an actor. SubChats under it are closed too. Returns the ids that
   * were closed by this call, the actor itself first. Primus and the
   * Sandbox actor cannot be closed.
   */
  close(actorId: string): ReadonlyArray<string> {
    const entry = this.require(actorId);
    if (entry.actor.kind === ActorKind.Primus || entry.actor.kind === ActorKind.Sandbox) {
      throw new ActorInvalidError(`${entry.actor.kind} cannot be closed`);
    }
    if (entry.closed) return [];
    const closed: string[] = [actorId];
    this.entries.set(actorId, { ...entry, closed: true });
    for (const child of this.entries.values()) {
      if (child.actor.parent_id === actorId && !child.closed) {
        closed.push(...this.close(child.actor.id));
      }
    }
    return closed;
  }

  /**
   * Narrow an actor's grant. Narrowings accumulate; nothing here can
   * widen a grant back up.
   */
  narrow(actorId: string, narrowing: GrantNarrowing): CapabilityGrant {
    const entry = this.require(actorId);
    const grant = narrowGrant(entry.grant, narrowing);
    this.entries.set(actorId, { ...entry, grant });
    return grant;
  }

  private register(fields: Omit<Actor, 'created_at'>): Actor {
    const actor: Actor = Object.freeze({ ...fields, created_at: this.clock() });
    this.entries.set(actor.id, {
      actor,
      closed: false,
      grant: capabilitiesFor(actor.kind),
    });
    return actor;
  }
}
