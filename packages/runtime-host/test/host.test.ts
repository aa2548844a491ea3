/**
 * Bastion Runtime Host — Host assembly tests
 *
 * A runtime opened on a temp home directory:
 *   H-1: Normal decisions reach logs/audit.jsonl
 *   H-2: Sandbox decisions reach only the encrypted journal
 *   H-3: Sandbox partition bytes on disk are ciphertext
 *   H-4: a second host on the same home reads the same audit history
 *   H-5: the journal can be turned off in config
 *   H-6: a collaboration still admits only two agents
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ActionKind, DecisionOutcome, homePartition, Mode } from '@bastion/kernel';
import { parseConfig } from '../src/config.js';
import { openHost } from '../src/host.js';
import type { Host } from '../src/host.js';
import { readAuditLog } from '../src/logging/log-reader.js';
import { SANDBOX_JOURNAL_LOG } from '../src/sandbox/encrypted-journal.js';

const PASSPHRASE = 'test-secret';
const encoder = new TextEncoder();

let home: string;
let host: Host;

function open(journal = true): Host {
  return openHost({
    home,
    config: parseConfig({ scrypt: { N: 1024 }, sandbox: { journal } }, 'config.json'),
  });
}

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), 'bastion-host-'));
  host = open();
  host.credentials.setPassphrase(PASSPHRASE);
});

describe('openHost', () => {
  it('H-1: persists Normal-mode decisions to the audit log', async () => {
    const { runtime } = host;
    const agent = runtime.spawnAgent('alpha');
    await runtime.write(agent.id, homePartition(agent), 'notes', encoder.encode('draft'));

    const entries = readAuditLog(host.stateIO).events;
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      actor_id: agent.id,
      action_kind: ActionKind.MemoryWrite,
      decision: DecisionOutcome.Allow,
      mode: Mode.Normal,
    });
  });

  it('H-2: keeps Sandbox decisions out of the audit log and in the journal', async () => {
    const { runtime } = host;
    await runtime.enterSandbox({ passphrase: PASSPHRASE, allowEdits: false });
    await runtime.write(
      runtime.sandbox.id,
      homePartition(runtime.sandbox),
      'plan',
      encoder.encode('private plan'),
    );
    await runtime.exitSandbox();

    expect(readAuditLog(host.stateIO).events).toEqual([]);
    expect(host.keyring.unlocked).toBe(false);

    const journal = host.journal;
    expect(journal).not.toBeNull();
    const entries = journal?.entries(host.credentials.unlock(PASSPHRASE)) ?? [];
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      actor_id: runtime.sandbox.id,
      action_kind: ActionKind.MemoryWrite,
      decision: DecisionOutcome.Allow,
      mode: Mode.Sandbox,
    });
  });

  it('H-3: writes no plaintext Sandbox data to disk', async () => {
    const { runtime } = host;
    await runtime.enterSandbox({ passphrase: PASSPHRASE, allowEdits: false });
    const result = await runtime.write(
      runtime.sandbox.id,
      homePartition(runtime.sandbox),
      'plan',
      encoder.encode('private plan'),
    );
    await runtime.exitSandbox();
    expect(result).toEqual({ status: 'done', value: undefined });

    const stateDir = join(home, 'state');
    const files = readdirSync(stateDir).filter((f) => f.startsWith('partition.sandbox_private.'));
    expect(files).toHaveLength(1);
    for (const file of files) {
      expect(readFileSync(join(stateDir, file), 'utf-8')).not.toContain('private plan');
    }
    expect(readFileSync(join(home, 'logs', SANDBOX_JOURNAL_LOG), 'utf-8')).not.toContain(
      runtime.sandbox.id,
    );
  });

  it('H-4: shares audit history with a second host on the same home', async () => {
    const agent = host.runtime.spawnAgent('alpha');
    await host.runtime.requestInternet(agent.id, 'lookup');

    const second = open();
    const entries = readAuditLog(second.stateIO).events;
    expect(entries).toHaveLength(1);
    expect(entries[0]?.action_kind).toBe(ActionKind.InternetCall);
    expect(second.credentials.verify(PASSPHRASE)).toBe(true);
  });

  it('H-5: runs without a journal when it is turned off', () => {
    const quiet = open(false);
    expect(quiet.journal).toBeNull();
    expect(quiet.config.sandbox.journal).toBe(false);
  });

  it('H-6: denies a third agent joining a collaboration', async () => {
    const { runtime } = host;
    const a = runtime.spawnAgent('alpha');
    const b = runtime.spawnAgent('beta');
    const c = runtime.spawnAgent('gamma');
    const opened = await runtime.openCollaboration(a.id, b.id);
    if (opened.status !== 'done') throw new Error(`collaboration not opened: ${opened.status}`);

    expect(await runtime.joinCollaboration(c.id, opened.value)).toEqual({
      status: 'denied',
      reason: 'collaboration_full',
    });
  });
});
