/**
 * Bastion Kernel — Interaction Guard Tests
 *
 * guard/token: an Allow for a store operation carries a token for exactly
 *   that operation, which the store accepts once
 * guard/audit: every decision appends one record; content never reaches it
 * guard/reject: a rejected approval is discarded and recorded as Deny
 * guard/release: releasing an actor cancels its approvals
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ActionKind,
  ActorDirectory,
  AgentCommunicationGuard,
  AuditLog,
  computeInputHash,
  DecisionOutcome,
  homePartition,
  InteractionGuard,
  MemoryPartitionBackend,
  Mode,
  ModeController,
  PartitionStore,
  PermissionEnforcer,
  TokenInvalidError,
  TokenIssuer,
} from '../src/index.js';
import type { Action, Actor, AuditRecord, AuditSink } from '../src/index.js';

class CollectingSink implements AuditSink {
  readonly records: AuditRecord[] = [];
  append(record: AuditRecord): void {
    this.records.push(record);
  }
}

let directory: ActorDirectory;
let modes: ModeController;
let store: PartitionStore;
let sink: CollectingSink;
let guard: InteractionGuard;
let primus: Actor;
let agent: Actor;

beforeEach(() => {
  directory = new ActorDirectory();
  modes = new ModeController();
  const communication = new AgentCommunicationGuard();
  const tokens = new TokenIssuer();
  store = new PartitionStore(tokens, new MemoryPartitionBackend());
  sink = new CollectingSink();
  guard = new InteractionGuard({
    actors: directory,
    enforcer: new PermissionEnforcer(directory, communication),
    modes,
    audit: new AuditLog(modes, sink),
    tokens,
    communication,
    clock: () => '2026-01-01T00:00:00.000Z',
  });
  primus = directory.createPrimus();
  agent = directory.spawnAgent('worker');
  store.provision(homePartition(primus));
  store.provision(homePartition(agent));
});

describe('interaction guard: tokens', () => {
  it('issues a single-use write token scoped to the allowed key', async () => {
    const auth = await guard.authorize({
      kind: ActionKind.MemoryWrite,
      actor_id: agent.id,
      partition: homePartition(agent),
      key: 'notes',
    });
    if (auth.outcome !== DecisionOutcome.Allow || auth.token === null) {
      throw new Error('expected an Allow with a token');
    }
    const bytes = new TextEncoder().encode('hello');
    await store.write(homePartition(agent), 'notes', bytes, auth.token);
    await expect(store.write(homePartition(agent), 'notes', bytes, auth.token)).rejects.toThrow(
      TokenInvalidError,
    );
  });

  it('issues no token on Deny', async () => {
    const auth = await guard.authorize({
      kind: ActionKind.MemoryWrite,
      actor_id: agent.id,
      partition: homePartition(primus),
      key: 'facts',
    });
    expect(auth).toEqual({ outcome: DecisionOutcome.Deny, reason: 'write_outside_own_partition' });
  });
});

describe('interaction guard: audit', () => {
  it('appends one record per decision with the mode at decision time', async () => {
    const edit: Action = {
      kind: ActionKind.PersonalityWrite,
      actor_id: primus.id,
      target_id: primus.id,
      content: 'very private wording',
    };
    await guard.authorize(edit);
    expect(sink.records).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        actor_id: primus.id,
        action_kind: ActionKind.PersonalityWrite,
        decision: DecisionOutcome.RequireApproval,
        mode: Mode.Normal,
        reason: 'personality_change_requires_confirmation',
        input_hash: computeInputHash(edit),
      },
    ]);
    expect(JSON.stringify(sink.records)).not.toContain('very private wording');
  });

  it('hashes actions identically whatever their content', () => {
    const a: Action = { kind: ActionKind.SettingsWrite, actor_id: 'p', setting: 'theme', value: 'dark' };
    const b: Action = { kind: ActionKind.SettingsWrite, actor_id: 'p', setting: 'theme', value: 'light' };
    expect(computeInputHash(a)).toBe(computeInputHash(b));
    expect(computeInputHash(a)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('interaction guard: approvals', () => {
  it('records a rejection as Deny and returns to Normal', async () => {
    const auth = await guard.authorize({
      kind: ActionKind.InternetCall,
      actor_id: agent.id,
      purpose: 'download',
    });
    if (auth.outcome !== DecisionOutcome.RequireApproval) throw new Error('expected approval');

    const resolution = await guard.resolve(auth.approval_id, 'reject');
    expect(resolution.status).toBe('rejected');
    expect(sink.records.at(-1)).toMatchObject({
      decision: DecisionOutcome.Deny,
      reason: 'rejected_by_user',
      mode: Mode.Normal,
    });
    expect(modes.currentMode()).toBe(Mode.Normal);
  });

  it('replays an approved action with the confirmation attached', async () => {
    const auth = await guard.authorize({
      kind: ActionKind.InternetCall,
      actor_id: agent.id,
      purpose: 'download',
    });
    if (auth.outcome !== DecisionOutcome.RequireApproval) throw new Error('expected approval');

    const resolution = await guard.resolve(auth.approval_id, 'approve');
    expect(resolution).toMatchObject({
      status: 'replayed',
      authorization: { outcome: DecisionOutcome.Allow, token: null },
    });
    // Per-call access: the next call asks again.
    const next = await guard.authorize({ kind: ActionKind.InternetCall, actor_id: agent.id, purpose: 'again' });
    expect(next.outcome).toBe(DecisionOutcome.RequireApproval);
  });

  it('cancels the approvals of a released actor', async () => {
    await guard.authorize({ kind: ActionKind.InternetCall, actor_id: agent.id, purpose: 'x' });
    const cancelled = await guard.releaseActor(agent.id);
    expect(cancelled.map((p) => p.actor_id)).toEqual([agent.id]);
    expect(modes.currentMode()).toBe(Mode.Normal);
  });

  it('reports a resolved approval id as not found the second time', async () => {
    const auth = await guard.authorize({ kind: ActionKind.InternetCall, actor_id: agent.id, purpose: 'x' });
    if (auth.outcome !== DecisionOutcome.RequireApproval) throw new Error('expected approval');
    await guard.resolve(auth.approval_id, 'approve');
    expect(await guard.resolve(auth.approval_id, 'approve')).toEqual({ status: 'not_found' });
  });
});
