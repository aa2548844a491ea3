/**
 * Bastion Kernel — Agent Communication Guard
 *
 * Holds collaboration state between agents: which agents collaborate,
 * which pairs the user has authorized to talk, and which keys each agent
 * has shared with its partner. The enforcer reads this state through
 * CollaborationPolicy; the Interaction Guard applies changes only after an
 * Allow.
 *
 * A collaboration never holds more than MAX_PARTICIPANTS agents.
 */

import { randomUUID } from 'node:crypto';

import type { CollaborationPolicy, CollaborationView } from '../enforcement/enforcer.js';

export const MAX_PARTICIPANTS = 2;

export interface AgentMessage {
  readonly sender_id: string;
  readonly receiver_id: string;
  readonly body: string;
  readonly sent_at: string;
}

export interface AgentCommunicationGuardOptions {
  readonly newId?: () => string;
  readonly clock?: () => string;
}

interface Collaboration {
  readonly id: string;
  members: string[];
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

function shareKey(ownerId: string, readerId: string): string {
  return `${ownerId}->${readerId}`;
}

const NO_KEYS: ReadonlySet<string> = new Set();

export class AgentCommunicationGuard implements CollaborationPolicy {
  readonly maxParticipants = MAX_PARTICIPANTS;
  private readonly collaborations = new Map<string, Collaboration>();
  private readonly memberOf = new Map<string, string>();
  private readonly authorizedPairs = new Set<string>();
  private readonly shares = new Map<string, Set<string>>();
  private readonly inboxes = new Map<string, AgentMessage[]>();
  private readonly newId: () => string;
  private readonly clock: () => string;

  constructor(options: AgentCommunicationGuardOptions = {}) {
    this.newId = options.newId ?? (() => `col_${randomUUID().slice(0, 8)}`);
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  // -------------------------------------------------------------------------
  // CollaborationPolicy
  // -------------------------------------------------------------------------

  collaborationOf(agentId: string): CollaborationView | undefined {
    const id = this.memberOf.get(agentId);
    return id === undefined ? undefined : this.collaboration(id);
  }

  collaboration(collaborationId: string): CollaborationView | undefined {
    const found = this.collaborations.get(collaborationId);
    return found === undefined ? undefined : { id: found.id, members: [...found.members] };
  }

  isPairAuthorized(a: string, b: string): boolean {
    return this.authorizedPairs.has(pairKey(a, b));
  }

  sharedKeys(ownerId: string, readerId: string): ReadonlySet<string> {
    return this.shares.get(shareKey(ownerId, readerId)) ?? NO_KEYS;
  }

  // -------------------------------------------------------------------------
  // Changes (applied after an Allow)
  // -------------------------------------------------------------------------

  open(a: string, b: string): CollaborationView {
    const collaboration: Collaboration = { id: this.newId(), members: [a, b] };
    this.collaborations.set(collaboration.id, collaboration);
    this.memberOf.set(a, collaboration.id);
    this.memberOf.set(b, collaboration.id);
    return { id: collaboration.id, members: [a, b] };
  }

  /** Returns false, changing nothing, if the collaboration is unknown or full. */
  join(collaborationId: string, agentId: string): boolean {
    const collaboration = this.collaborations.get(collaborationId);
    if (collaboration === undefined || collaboration.members.length >= this.maxParticipants) {
      return false;
    }
    collaboration.members.push(agentId);
    this.memberOf.set(agentId, collaborationId);
    return true;
  }

  /**
   * Take an agent out of its collaboration. Keys shared between it and the
   * remaining members are withdrawn; an empty collaboration is removed.
   */
  leave(agentId: string): void {
    const id = this.memberOf.get(agentId);
    if (id === undefined) return;
    this.memberOf.delete(agentId);
    const collaboration = this.collaborations.get(id);
    if (collaboration === undefined) return;
    collaboration.members = collaboration.members.filter((m) => m !== agentId);
    for (const other of collaboration.members) {
      this.shares.delete(shareKey(agentId, other));
      this.shares.delete(shareKey(other, agentId));
    }
    if (collaboration.members.length === 0) this.collaborations.delete(id);
  }

  authorizePair(a: string, b: string): void {
    this.authorizedPairs.add(pairKey(a, b));
  }

  revokePair(a: string, b: string): boolean {
    return this.authorizedPairs.delete(pairKey(a, b));
  }

  /** Add keys to what `readerId` may read from `ownerId`'s partition. */
  share(ownerId: string, readerId: string, keys: ReadonlyArray<string>): ReadonlySet<string> {
    const id = shareKey(ownerId, readerId);
    const granted = this.shares.get(id) ?? new Set<string>();
    for (const key of keys) granted.add(key);
    this.shares.set(id, granted);
    return granted;
  }

  /** Drop everything an agent holds: membership, pair approvals, inbox. */
  removeAgent(agentId: string): void {
    this.leave(agentId);
    for (const pair of [...this.authorizedPairs]) {
      if (pair.split('|').includes(agentId)) this.authorizedPairs.delete(pair);
    }
    this.inboxes.delete(agentId);
  }

  // -------------------------------------------------------------------------
  // Delivery
  // -------------------------------------------------------------------------

  deliver(senderId: string, receiverId: string, body: string): AgentMessage {
    const message: AgentMessage = {
      sender_id: senderId,
      receiver_id: receiverId,
      body,
      sent_at: this.clock(),
    };
    const inbox = this.inboxes.get(receiverId) ?? [];
    inbox.push(message);
    this.inboxes.set(receiverId, inbox);
    return message;
  }

  /** Remove and return every message waiting for an agent. */
  drainInbox(agentId: string): ReadonlyArray<AgentMessage> {
    const inbox = this.inboxes.get(agentId) ?? [];
    this.inboxes.delete(agentId);
    return inbox;
  }
}
