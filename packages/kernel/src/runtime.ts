/**
 * Bastion Kernel — Runtime
 *
 * Wires the registry, enforcer, guards, mode controller, store, and audit
 * log into one object the front ends drive. Every store access goes through
 * InteractionGuard.authorize() first; the runtime only redeems the tokens it
 * is handed.
 *
 * Store integrity failures (spent token, missing partition, sealed Sandbox
 * storage) never change the mode. They are reported as a runtime event,
 * except in Sandbox, and surfaced to the caller as `action failed`.
 */

import {
  BastionError,
  SandboxAuthenticationError,
  StoreIntegrityError,
  TokenInvalidError,
  TransitionRejectedError,
} from './errors.js';
import { PermissionEnforcer } from './enforcement/enforcer.js';
import type { AgentMessage } from './guards/agent-communication-guard.js';
import { AgentCommunicationGuard } from './guards/agent-communication-guard.js';
import { InteractionGuard } from './guards/interaction-guard.js';
import type {
  ContextBundle,
  ContextRequest,
  ContextSnippet,
  InferenceBackend,
  WithheldContext,
} from './inference/context-bundle.js';
import type { RedactionRule } from './inference/redaction.js';
import { DEFAULT_REDACTION_RULES, redact } from './inference/redaction.js';
import { AuditLog } from './logging/audit-log.js';
import type {
  AuditSink,
  RuntimeEvent,
  RuntimeEventSink,
  SandboxJournal,
  SandboxSessionHooks,
} from './logging/audit-sink.js';
import type { PendingApproval } from './mode/mode-controller.js';
import { ModeController } from './mode/mode-controller.js';
import type { ActorEntry } from './registry/actor-directory.js';
import { ActorDirectory } from './registry/actor-directory.js';
import type { PartitionBackend } from './store/partition-backend.js';
import { MemoryPartitionBackend } from './store/partition-backend.js';
import { PartitionStore } from './store/partition-store.js';
import type { AccessToken } from './store/token-issuer.js';
import { TokenIssuer } from './store/token-issuer.js';
import type { Actor } from './types/actor.js';
import type { Action } from './types/action.js';
import { ActionKind } from './types/action.js';
import type { CapabilityGrant, GrantNarrowing } from './types/capability.js';
import type {
  ApprovalReason,
  Authorization,
  AuditRecord,
  DenyReason,
  Verdict,
} from './types/decision.js';
import { DecisionOutcome } from './types/decision.js';
import type { ModeTransition } from './types/mode.js';
import { Mode } from './types/mode.js';
import type { PartitionRef } from './types/partition.js';
import {
  homePartition,
  HISTORY_KEY,
  PERSONALITY_KEY,
  SETTINGS_KEY_PREFIX,
} from './types/partition.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Checks the Sandbox passphrase. The runtime host backs this with scrypt. */
export interface SandboxAuthenticator {
  verify(passphrase: string): boolean | Promise<boolean>;
}

export interface RuntimeOptions {
  readonly backend?: PartitionBackend;
  readonly auditSink?: AuditSink;
  readonly journal?: SandboxJournal;
  readonly eventSink?: RuntimeEventSink;
  /** Without one, Sandbox cannot be entered. */
  readonly authenticator?: SandboxAuthenticator;
  /** Told the passphrase on Sandbox entry and told to forget it on exit. */
  readonly sandboxHooks?: ReadonlyArray<SandboxSessionHooks>;
  readonly redaction?: ReadonlyArray<RedactionRule>;
  readonly clock?: () => string;
}

/** Outcome of an action the runtime both authorizes and carries out. */
export type ActionResult<T> =
  | { readonly status: 'done'; readonly value: T }
  | { readonly status: 'denied'; readonly reason: DenyReason }
  | { readonly status: 'pending'; readonly approval_id: string; readonly reason: ApprovalReason }
  | { readonly status: 'failed'; readonly error: 'action failed'; readonly code: string };

/** `held` means a Sandbox edit was kept as a diff for review at exit. */
export type EditOutcome = 'applied' | 'held';

export type ApprovalResult =
  | { readonly ok: true; readonly approval: PendingApproval }
  | { readonly ok: false; readonly error: string };

export interface SandboxEntry {
  readonly passphrase: string;
  /** Let Sandbox edit personality and settings, as diffs reviewed at exit. */
  readonly allowEdits: boolean;
}

export interface HistoryTurn {
  readonly prompt: string;
  readonly reply: string;
  readonly at: string;
}

export interface ChatReply {
  readonly reply: string;
  readonly context: ContextBundle;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export class BastionRuntime {
  readonly actors: ActorDirectory;
  readonly modes: ModeController;
  readonly communication: AgentCommunicationGuard;
  readonly guard: InteractionGuard;
  readonly store: PartitionStore;
  readonly audit: AuditLog;
  readonly tokens: TokenIssuer;

  private readonly events: RuntimeEventSink | null;
  private readonly authenticator: SandboxAuthenticator | null;
  private readonly hooks: ReadonlyArray<SandboxSessionHooks>;
  private readonly redaction: ReadonlyArray<RedactionRule>;
  private readonly clock: () => string;
  private readonly primusActor: Actor;
  private readonly sandboxActor: Actor;

  constructor(options: RuntimeOptions = {}) {
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.events = options.eventSink ?? null;
    this.authenticator = options.authenticator ?? null;
    this.hooks = options.sandboxHooks ?? [];
    this.redaction = options.redaction ?? DEFAULT_REDACTION_RULES;

    const tokens = new TokenIssuer();
    this.tokens = tokens;
    this.actors = new ActorDirectory({ clock: this.clock });
    this.modes = new ModeController({ clock: this.clock });
    this.communication = new AgentCommunicationGuard({ clock: this.clock });
    this.store = new PartitionStore(tokens, options.backend ?? new MemoryPartitionBackend());
    this.audit = new AuditLog(this.modes, options.auditSink ?? null, options.journal ?? null);
    this.guard = new InteractionGuard({
      actors: this.actors,
      enforcer: new PermissionEnforcer(this.actors, this.communication),
      modes: this.modes,
      audit: this.audit,
      tokens,
      communication: this.communication,
      clock: this.clock,
    });

    this.primusActor = this.actors.createPrimus();
    this.sandboxActor = this.actors.createSandbox();
    this.store.provision(homePartition(this.primusActor));
    this.store.provision(homePartition(this.sandboxActor));

    this.modes.onTransition((transition) => this.reportTransition(transition));
  }

  get primus(): Actor {
    return this.primusActor;
  }

  get sandbox(): Actor {
    return this.sandboxActor;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Decision only. The token minted for an Allow is released at once; the
   * operations below authorize and carry out in one step.
   */
  async authorize(action: Action): Promise<Verdict> {
    const authorization = await this.guard.authorize(action);
    if (authorization.outcome !== DecisionOutcome.Allow) return authorization;
    this.release(authorization);
    return { outcome: DecisionOutcome.Allow };
  }

  currentMode(): Mode {
    return this.modes.currentMode();
  }

  auditTail(n: number): ReadonlyArray<AuditRecord> {
    return this.audit.tail(n);
  }

  pendingApprovals(): ReadonlyArray<PendingApproval> {
    return this.modes.pendingApprovals();
  }

  listActors(): ReadonlyArray<ActorEntry> {
    return this.actors.list();
  }

  // -------------------------------------------------------------------------
  // Actor lifecycle
  // -------------------------------------------------------------------------

  spawnAgent(name: string): Actor {
    return this.registered(this.actors.spawnAgent(name));
  }

  openSubChat(parentId: string, name: string): Actor {
    return this.registered(this.actors.openSubChat(parentId, name));
  }

  /**
   * Close an actor and its SubChats. Their pending approvals are cancelled
   * and they leave any collaboration.
   */
  async closeActor(actorId: string): Promise<ReadonlyArray<string>> {
    const closed = this.actors.close(actorId);
    for (const id of closed) {
      const cancelled = await this.guard.releaseActor(id);
      this.emit({
        type: 'actor_lifecycle',
        timestamp: this.clock(),
        actor_id: id,
        change: 'closed',
        cancelled_approvals: cancelled.length,
      });
    }
    return closed;
  }

  narrow(actorId: string, narrowing: GrantNarrowing): CapabilityGrant {
    const grant = this.actors.narrow(actorId, narrowing);
    this.emit({
      type: 'actor_lifecycle',
      timestamp: this.clock(),
      actor_id: actorId,
      change: 'narrowed',
      cancelled_approvals: 0,
    });
    return grant;
  }

  // -------------------------------------------------------------------------
  // Memory
  // -------------------------------------------------------------------------

  async read(
    actorId: string,
    partition: PartitionRef,
    key: string,
  ): Promise<ActionResult<Uint8Array>> {
    const authorization = await this.guard.authorize({
      kind: ActionKind.MemoryRead,
      actor_id: actorId,
      partition,
      key,
    });
    return this.carryOut(actorId, authorization, (token) =>
      this.store.read(partition, key, requireToken(token)),
    );
  }

  async write(
    actorId: string,
    partition: PartitionRef,
    key: string,
    bytes: Uint8Array,
  ): Promise<ActionResult<void>> {
    const authorization = await this.guard.authorize({
      kind: ActionKind.MemoryWrite,
      actor_id: actorId,
      partition,
      key,
    });
    return this.carryOut(actorId, authorization, (token) =>
      this.store.write(partition, key, bytes, requireToken(token)),
    );
  }

  /** Read the personality an actor runs with, following a SubChat's alias. */
  async readPersonality(actorId: string): Promise<ActionResult<string>> {
    const missing = this.unavailable(actorId);
    if (missing !== null) return missing;
    const owner = this.actors.require(actorId).actor.personality?.owner_id;
    if (owner === undefined) return { status: 'denied', reason: 'personality_target_invalid' };
    const ownerActor = this.actors.require(owner).actor;
    const result = await this.read(actorId, homePartition(ownerActor), PERSONALITY_KEY);
    return result.status === 'done' ? { status: 'done', value: decoder.decode(result.value) } : result;
  }

  async writePersonality(
    actorId: string,
    targetId: string,
    content: string,
  ): Promise<ActionResult<EditOutcome>> {
    const action: Action = {
      kind: ActionKind.PersonalityWrite,
      actor_id: actorId,
      target_id: targetId,
      content,
    };
    return this.carryOutEdit(action, await this.guard.authorize(action));
  }

  async writeSetting(
    actorId: string,
    setting: string,
    value: string,
  ): Promise<ActionResult<EditOutcome>> {
    const action: Action = { kind: ActionKind.SettingsWrite, actor_id: actorId, setting, value };
    return this.carryOutEdit(action, await this.guard.authorize(action));
  }

  /** Current value of a setting as stored in the global partition. */
  async readSetting(actorId: string, setting: string): Promise<ActionResult<string>> {
    const key = `${SETTINGS_KEY_PREFIX}${setting}`;
    const result = await this.read(actorId, homePartition(this.primusActor), key);
    return result.status === 'done' ? { status: 'done', value: decoder.decode(result.value) } : result;
  }

  // -------------------------------------------------------------------------
  // Internet and agent communication
  // -------------------------------------------------------------------------

  async requestInternet(actorId: string, purpose: string): Promise<ActionResult<void>> {
    return this.carryOut(
      actorId,
      await this.guard.authorize({ kind: ActionKind.InternetCall, actor_id: actorId, purpose }),
      async () => undefined,
    );
  }

  async openCollaboration(actorId: string, partnerId: string): Promise<ActionResult<string>> {
    return this.carryOut(
      actorId,
      await this.guard.authorize({
        kind: ActionKind.CollaborationOpen,
        actor_id: actorId,
        partner_id: partnerId,
      }),
      async () => this.communication.collaborationOf(actorId)?.id ?? '',
    );
  }

  async joinCollaboration(actorId: string, collaborationId: string): Promise<ActionResult<void>> {
    return this.carryOut(
      actorId,
      await this.guard.authorize({
        kind: ActionKind.CollaborationJoin,
        actor_id: actorId,
        collaboration_id: collaborationId,
      }),
      async () => undefined,
    );
  }

  async sendMessage(senderId: string, receiverId: string, body: string): Promise<ActionResult<void>> {
    return this.carryOut(
      senderId,
      await this.guard.authorize({
        kind: ActionKind.AgentMessage,
        actor_id: senderId,
        receiver_id: receiverId,
        body,
      }),
      async () => undefined,
    );
  }

  async shareMemory(
    ownerId: string,
    partnerId: string,
    keys: ReadonlyArray<string>,
  ): Promise<ActionResult<void>> {
    return this.carryOut(
      ownerId,
      await this.guard.authorize({
        kind: ActionKind.MemoryShare,
        actor_id: ownerId,
        partner_id: partnerId,
        keys,
      }),
      async () => undefined,
    );
  }

  inbox(agentId: string): ReadonlyArray<AgentMessage> {
    return this.communication.drainInbox(agentId);
  }

  /** Withdraw the user's authorization for a pair of agents to talk. */
  revokePair(a: string, b: string): boolean {
    return this.communication.revokePair(a, b);
  }

  // -------------------------------------------------------------------------
  // Approvals
  // -------------------------------------------------------------------------

  async approve(approvalId: string): Promise<ApprovalResult> {
    const resolution = await this.guard.resolve(approvalId, 'approve');
    switch (resolution.status) {
      case 'not_found':
        return { ok: false, error: `No pending approval ${approvalId}` };
      case 'rejected':
        return { ok: false, error: `Approval ${approvalId} was rejected` };
      case 'replayed': {
        const { approval, authorization } = resolution;
        const result = await this.carryOutEdit(approval.action, authorization);
        switch (result.status) {
          case 'done':
            return { ok: true, approval };
          case 'denied':
            return { ok: false, error: `Replay denied: ${result.reason}` };
          case 'pending':
            return { ok: false, error: `Replay parked again as ${result.approval_id}` };
          case 'failed':
            return { ok: false, error: result.error };
          default: {
            const unhandled: never = result;
            throw new Error(`Unhandled result: ${JSON.stringify(unhandled)}`);
          }
        }
      }
      default: {
        const unhandled: never = resolution;
        throw new Error(`Unhandled resolution: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  async reject(approvalId: string): Promise<ApprovalResult> {
    const resolution = await this.guard.resolve(approvalId, 'reject');
    return resolution.status === 'not_found'
      ? { ok: false, error: `No pending approval ${approvalId}` }
      : { ok: true, approval: resolution.approval };
  }

  // -------------------------------------------------------------------------
  // Sandbox
  // -------------------------------------------------------------------------

  /**
   * Enter Sandbox. Only possible from Normal and only with the right
   * passphrase.
   *
   * @throws {TransitionRejectedError} not in Normal mode
   * @throws {SandboxAuthenticationError} wrong passphrase or no authenticator
   */
  async enterSandbox(entry: SandboxEntry): Promise<void> {
    await this.modes.transition(async (tx) => {
      if (tx.mode !== Mode.Normal) {
        throw new TransitionRejectedError(tx.mode, Mode.Sandbox, 'Sandbox is entered from Normal only');
      }
      const verified =
        this.authenticator !== null && (await this.authenticator.verify(entry.passphrase));
      if (!verified) throw new SandboxAuthenticationError();
      for (const hook of this.hooks) hook.onSandboxEnter(entry.passphrase);
      tx.enterSandbox(entry.allowEdits);
    });
  }

  /**
   * Leave Sandbox. Edits held during the session are queued as approvals
   * on behalf of Primus, in the same step, so the user reviews them before
   * anything else can change.
   *
   * @throws {TransitionRejectedError} not in Sandbox
   */
  async exitSandbox(): Promise<ReadonlyArray<PendingApproval>> {
    return this.modes.transition((tx) => {
      const diffs = tx.exitSandbox();
      for (const hook of this.hooks) hook.onSandboxExit();
      return diffs.map((diff) =>
        tx.openApproval(
          this.primusActor.id,
          { ...diff, actor_id: this.primusActor.id },
          'sandbox_diff_review',
          'sandbox_diff',
        ),
      );
    });
  }

  // -------------------------------------------------------------------------
  // Chat
  // -------------------------------------------------------------------------

  /**
   * One conversational turn. Context is gathered through guarded reads,
   * the backend is called with no lock held, and the turn is appended to
   * the actor's own history.
   */
  async chat(
    actorId: string,
    prompt: string,
    requests: ReadonlyArray<ContextRequest>,
    backend: InferenceBackend,
  ): Promise<ActionResult<ChatReply>> {
    if (backend.remote) {
      const network = await this.requestInternet(actorId, 'remote inference');
      if (network.status !== 'done') return network;
    }

    const turn = await this.guard.authorize({ kind: ActionKind.ChatTurn, actor_id: actorId });
    const refused = refusal(turn);
    if (refused !== null) return refused;

    let context: ContextBundle;
    let reply: string;
    try {
      context = await this.gatherContext(actorId, requests, backend.remote);
      reply = await backend.complete({ actor_id: actorId, prompt, context });
    } catch (err) {
      this.release(turn);
      throw err;
    }

    const actor = this.actors.require(actorId).actor;
    const entry: HistoryTurn = { prompt, reply, at: this.clock() };
    const appended = await this.carryOut(actorId, turn, (token) =>
      this.store.update(homePartition(actor), HISTORY_KEY, requireToken(token), (current) =>
        encoder.encode(decoder.decode(current) + JSON.stringify(entry) + '\n'),
      ),
    );
    return appended.status === 'done' ? { status: 'done', value: { reply, context } } : appended;
  }

  /** The actor's own conversation history, oldest first. */
  async history(actorId: string): Promise<ActionResult<ReadonlyArray<HistoryTurn>>> {
    const missing = this.unavailable(actorId);
    if (missing !== null) return missing;
    const partition = homePartition(this.actors.require(actorId).actor);
    const authorization = await this.guard.authorize({
      kind: ActionKind.MemoryRead,
      actor_id: actorId,
      partition,
      key: HISTORY_KEY,
    });
    return this.carryOut(actorId, authorization, async (token) =>
      parseHistory(await this.store.read(partition, HISTORY_KEY, requireToken(token))),
    );
  }

  private async gatherContext(
    actorId: string,
    requests: ReadonlyArray<ContextRequest>,
    remote: boolean,
  ): Promise<ContextBundle> {
    const snippets: ContextSnippet[] = [];
    const withheld: WithheldContext[] = [];
    for (const request of requests) {
      const result = await this.read(actorId, request.partition, request.key);
      switch (result.status) {
        case 'done': {
          const text = decoder.decode(result.value);
          snippets.push({ ...request, text: remote ? redact(text, this.redaction) : text });
          break;
        }
        case 'denied':
          withheld.push({ ...request, reason: result.reason });
          break;
        case 'pending':
          withheld.push({ ...request, reason: 'approval_required' });
          break;
        case 'failed':
          withheld.push({ ...request, reason: 'action_failed' });
          break;
        default: {
          const unhandled: never = result;
          throw new Error(`Unhandled result: ${JSON.stringify(unhandled)}`);
        }
      }
    }
    return { snippets, withheld };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Turn an authorization into a result, running `operation` on Allow.
   * BastionErrors from the store become `failed`; anything else propagates.
   */
  private async carryOut<T>(
    actorId: string,
    authorization: Authorization,
    operation: (token: AccessToken | null) => Promise<T>,
  ): Promise<ActionResult<T>> {
    const refused = refusal(authorization);
    if (refused !== null) return refused;
    const token = authorization.outcome === DecisionOutcome.Allow ? authorization.token : null;
    try {
      return { status: 'done', value: await operation(token) };
    } catch (err) {
      if (!(err instanceof BastionError)) throw err;
      this.emit({
        type: 'store_integrity_failure',
        timestamp: this.clock(),
        actor_id: actorId,
        code: err.code,
        message: err.message,
      });
      return { status: 'failed', error: 'action failed', code: err.code };
    } finally {
      if (token !== null) this.tokens.release(token);
    }
  }

  /** Give back a token the caller will not use. */
  private release(authorization: Authorization): void {
    if (authorization.outcome === DecisionOutcome.Allow && authorization.token !== null) {
      this.tokens.release(authorization.token);
    }
  }

  /**
   * The denial an unknown or closed actor gets, for operations that must
   * look the actor up before they can build their action.
   */
  private unavailable(actorId: string): ActionResult<never> | null {
    const entry = this.actors.get(actorId);
    if (entry === undefined) return { status: 'denied', reason: 'actor_unknown' };
    if (entry.closed) return { status: 'denied', reason: 'actor_closed' };
    return null;
  }

  /**
   * Personality and settings edits: write the content with the token. An
   * Allow without a token is a Sandbox edit held as a diff. Replays of
   * other approved actions have nothing left to apply.
   */
  private async carryOutEdit(
    action: Action,
    authorization: Authorization,
  ): Promise<ActionResult<EditOutcome>> {
    return this.carryOut(action.actor_id, authorization, async (token): Promise<EditOutcome> => {
      switch (action.kind) {
        case ActionKind.PersonalityWrite: {
          if (token === null) return 'held';
          const target = this.actors.require(action.target_id).actor;
          await this.store.write(
            homePartition(target),
            PERSONALITY_KEY,
            encoder.encode(action.content),
            token,
          );
          return 'applied';
        }
        case ActionKind.SettingsWrite:
          if (token === null) return 'held';
          await this.store.write(
            homePartition(this.primusActor),
            `${SETTINGS_KEY_PREFIX}${action.setting}`,
            encoder.encode(action.value),
            token,
          );
          return 'applied';
        default:
          return 'applied';
      }
    });
  }

  private registered(actor: Actor): Actor {
    this.store.provision(homePartition(actor));
    this.emit({
      type: 'actor_lifecycle',
      timestamp: this.clock(),
      actor_id: actor.id,
      change: 'created',
      cancelled_approvals: 0,
    });
    return actor;
  }

  private reportTransition(transition: ModeTransition): void {
    // Entering and leaving Sandbox is itself private.
    if (transition.from === Mode.Sandbox || transition.to === Mode.Sandbox) return;
    this.emit({
      type: 'mode_changed',
      timestamp: transition.at,
      from: transition.from,
      to: transition.to,
      cause: transition.cause,
    });
  }

  private emit(event: RuntimeEvent): void {
    if (this.modes.currentMode() === Mode.Sandbox) return;
    this.events?.emit(event);
  }
}

/** The non-Allow outcomes as results; null for Allow. */
function refusal(authorization: Authorization): ActionResult<never> | null {
  switch (authorization.outcome) {
    case DecisionOutcome.Allow:
      return null;
    case DecisionOutcome.Deny:
      return { status: 'denied', reason: authorization.reason };
    case DecisionOutcome.RequireApproval:
      return {
        status: 'pending',
        approval_id: authorization.approval_id,
        reason: authorization.reason,
      };
    default: {
      const unhandled: never = authorization;
      throw new Error(`Unhandled authorization: ${JSON.stringify(unhandled)}`);
    }
  }
}

/** @throws {TokenInvalidError} an Allow for a store operation arrived without a token */
function requireToken(token: AccessToken | null): AccessToken {
  if (token === null) throw new TokenInvalidError('no token issued for this operation');
  return token;
}

function isHistoryTurn(value: unknown): value is HistoryTurn {
  return (
    typeof value === 'object' &&
    value !== null &&
    'prompt' in value &&
    'reply' in value &&
    'at' in value &&
    typeof value.prompt === 'string' &&
    typeof value.reply === 'string' &&
    typeof value.at === 'string'
  );
}

/** @throws {StoreIntegrityError} a stored line is not a history turn */
function parseHistory(bytes: Uint8Array): ReadonlyArray<HistoryTurn> {
  const turns: HistoryTurn[] = [];
  for (const line of decoder.decode(bytes).split('\n')) {
    if (line.trim() === '') continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new StoreIntegrityError('history line is not JSON');
    }
    if (!isHistoryTurn(parsed)) throw new StoreIntegrityError('history line is not a turn');
    turns.push(parsed);
  }
  return turns;
}
