/**
 * Bastion CLI — Shell dispatch tests
 *
 * The router runs against an in-memory runtime; every assertion is on the
 * lines the shell would print.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BastionRuntime } from '@bastion/kernel';
import { dispatch } from '../src/tui/dispatch.js';
import type { ShellContext, ShellLine } from '../src/tui/dispatch.js';
import { EchoBackend } from '../src/tui/echo-backend.js';

let ctx: ShellContext;

beforeEach(() => {
  ctx = {
    runtime: new BastionRuntime({ authenticator: { verify: (p) => p === 'test-secret' } }),
    backend: new EchoBackend(),
  };
});

async function run(input: string): Promise<ReadonlyArray<ShellLine>> {
  return (await dispatch(ctx, input)).lines;
}

async function only(input: string): Promise<ShellLine> {
  const lines = await run(input);
  expect(lines).toHaveLength(1);
  const [first] = lines;
  if (first === undefined) throw new Error(`no output for ${input}`);
  return first;
}

function idOf(name: string): string {
  const entry = ctx.runtime.listActors().find((e) => e.actor.name === name);
  if (entry === undefined) throw new Error(`no actor named ${name}`);
  return entry.actor.id;
}

/** The approval id from a "needs approval: <id> (<reason>)" line. */
function approvalId(line: ShellLine): string {
  const match = /^needs approval: (\S+) \(/.exec(line.text);
  if (match?.[1] === undefined) throw new Error(`not an approval line: ${line.text}`);
  return match[1];
}

describe('dispatch basics', () => {
  it('ignores blank input', async () => {
    expect(await dispatch(ctx, '   ')).toEqual({ lines: [], quit: false });
  });

  it('reports unknown commands', async () => {
    expect(await run('launch rockets')).toEqual([
      { tone: 'error', text: 'unknown command: launch' },
      { tone: 'muted', text: "type 'help' for available commands" },
    ]);
  });

  it('does not treat object prototype names as commands', async () => {
    expect((await run('constructor'))[0]).toEqual({ tone: 'error', text: 'unknown command: constructor' });
  });

  it('prints usage for missing arguments', async () => {
    expect(await only('write')).toEqual({ tone: 'error', text: 'usage: write <actor> <key> <text>' });
  });

  it('quits on quit and exit', async () => {
    expect((await dispatch(ctx, 'quit')).quit).toBe(true);
    expect((await dispatch(ctx, 'exit')).quit).toBe(true);
  });

  it('shows status', async () => {
    expect(await run('status')).toEqual([
      { tone: 'info', text: 'mode: Normal' },
      { tone: 'info', text: 'actors: 2 open, 0 closed' },
      { tone: 'info', text: 'pending approvals: 0' },
    ]);
  });
});

describe('actors and memory', () => {
  it('spawns an agent that can write and read its own partition by name', async () => {
    const spawned = await only('spawn alpha');
    expect(spawned).toEqual({ tone: 'ok', text: `spawned ${idOf('alpha')}` });

    expect(await only('write alpha notes hello there')).toEqual({ tone: 'ok', text: 'wrote notes' });
    expect(await only('read alpha alpha agent_private notes')).toEqual({ tone: 'ok', text: 'hello there' });
    expect(await only('read alpha alpha agent_private other')).toEqual({ tone: 'ok', text: '(empty)' });
  });

  it("denies reading another agent's partition", async () => {
    await run('spawn alpha');
    await run('spawn beta');
    await run('write beta plan secret');
    expect(await only('read alpha beta agent_private plan')).toEqual({
      tone: 'error',
      text: 'denied: read_not_shared',
    });
  });

  it('rejects an unknown partition class', async () => {
    await run('spawn alpha');
    expect(await only('read alpha alpha attic notes')).toEqual({
      tone: 'error',
      text: 'unknown partition class: attic (global, agent_private, subchat, sandbox_private)',
    });
  });

  it('closes an agent with its SubChats', async () => {
    await run('spawn alpha');
    await run('subchat alpha');
    const alpha = idOf('alpha');
    const sub = idOf('alpha-chat');
    expect(await only('close alpha')).toEqual({ tone: 'ok', text: `closed ${alpha}, ${sub}` });
    expect((await run('status'))[1]).toEqual({ tone: 'info', text: 'actors: 2 open, 2 closed' });
  });

  it('narrows a capability', async () => {
    await run('spawn alpha');
    await run('narrow alpha internet_access off');
    expect(await only('internet alpha')).toEqual({ tone: 'error', text: 'denied: internet_disabled' });
  });
});

describe('approvals', () => {
  it('parks a Primus personality edit until approved', async () => {
    const pending = await only('personality primus primus be kind');
    expect(pending.tone).toBe('warn');
    expect(pending.text).toMatch(/^needs approval: \S+ \(personality_change_requires_confirmation\)$/);
    const id = approvalId(pending);

    expect((await run('status'))[0]).toEqual({ tone: 'info', text: 'mode: ApprovalPending' });
    expect(await only('pending')).toEqual({
      tone: 'warn',
      text: `${id}  ${idOf('primus')}  personality_write  personality_change_requires_confirmation  (request)`,
    });

    expect(await only(`approve ${id}`)).toEqual({ tone: 'ok', text: `approved ${id} (personality_write)` });
    expect(await only('personality primus')).toEqual({ tone: 'ok', text: 'be kind' });
    expect(await only('pending')).toEqual({ tone: 'muted', text: '(none)' });
  });

  it('reports an unknown approval id', async () => {
    expect(await only('approve nope')).toEqual({ tone: 'error', text: 'No pending approval nope' });
  });

  it('delivers the first message between agents after approval', async () => {
    await run('spawn alpha');
    await run('spawn beta');
    const collab = await only('collab alpha beta');
    expect(collab.text).toMatch(/^collaboration \S+ open$/);

    const id = approvalId(await only('msg alpha beta hi there'));
    expect(await only('inbox beta')).toEqual({ tone: 'muted', text: '(empty)' });

    await run(`approve ${id}`);
    const delivered = await only('inbox beta');
    expect(delivered.text.endsWith(`${idOf('alpha')} → ${idOf('beta')}: hi there`)).toBe(true);

    expect(await only('msg alpha beta again')).toEqual({ tone: 'ok', text: 'delivered' });
  });
});

describe('sandbox', () => {
  it('refuses a wrong passphrase', async () => {
    expect(await only('sandbox enter wrong')).toEqual({ tone: 'error', text: 'Sandbox passphrase rejected' });
  });

  it('enters and leaves', async () => {
    expect(await only('sandbox enter test-secret')).toEqual({ tone: 'ok', text: 'entered Sandbox' });
    expect((await run('status'))[0]).toEqual({ tone: 'info', text: 'mode: Sandbox' });
    expect(await run('sandbox exit')).toEqual([{ tone: 'ok', text: 'left Sandbox' }]);
  });

  it('queues held edits for review on exit', async () => {
    await run('sandbox enter test-secret allow-edits');
    expect(await only('personality sandbox primus quieter')).toEqual({
      tone: 'ok',
      text: 'held for review at Sandbox exit',
    });
    const lines = await run('sandbox exit');
    expect(lines).toHaveLength(2);
    expect(lines[1]?.text).toMatch(/^review \S+: personality_write$/);
  });
});

describe('conversation and audit', () => {
  it('echoes a chat turn and records history', async () => {
    await run('spawn alpha');
    expect(await only('chat alpha hello')).toEqual({
      tone: 'ok',
      text: '(echo) hello [context: 1 shared, 0 withheld]',
    });

    const history = await run('history alpha');
    expect(history).toHaveLength(2);
    expect(history[0]?.text.endsWith('  > hello')).toBe(true);
    expect(history[1]).toEqual({ tone: 'muted', text: '  (echo) hello [context: 1 shared, 0 withheld]' });
  });

  it('tails the session audit', async () => {
    await run('spawn alpha');
    await run('narrow alpha internet_access off');
    await run('internet alpha');
    const [last] = await run('audit 1');
    expect(last?.tone).toBe('error');
    expect(last?.text.endsWith(`  Deny  ${idOf('alpha')}  internet_call  internet_disabled`)).toBe(true);
  });

  it('says when nothing has been audited', async () => {
    expect(await only('audit')).toEqual({ tone: 'muted', text: '(no decisions yet)' });
  });
});
