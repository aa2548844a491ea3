/**
 * Bastion Runtime Host — Sandbox credential store and keyring tests
 *
 *   SC-1: an unconfigured store verifies nothing
 *   SC-2: the set passphrase verifies; others do not
 *   SC-3: replacing the passphrase requires the current one
 *   SC-4: the data key survives a passphrase change
 *   SC-5: the stored record never contains the passphrase
 *   SC-6: the keyring holds the key only between enter and exit
 */

import { describe, it, expect } from 'vitest';
import { SandboxAuthenticationError, SandboxSealedError } from '@bastion/kernel';
import { SandboxCredentialStore } from '../src/sandbox/credential-store.js';
import { SandboxKeyring } from '../src/sandbox/keyring.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const FAST_COST = { N: 1024, r: 8, p: 1 };

function makeStore(): { io: MemoryStateIO; store: SandboxCredentialStore } {
  const io = new MemoryStateIO();
  return { io, store: new SandboxCredentialStore(io, FAST_COST) };
}

describe('SandboxCredentialStore', () => {
  it('SC-1: rejects every passphrase before one is set', () => {
    const { store } = makeStore();
    expect(store.isConfigured()).toBe(false);
    expect(store.verify('test-secret')).toBe(false);
    expect(() => store.unlock('test-secret')).toThrow(SandboxAuthenticationError);
  });

  it('SC-2: verifies only the passphrase that was set', () => {
    const { store } = makeStore();
    expect(store.setPassphrase('test-secret')).toEqual({ ok: true });
    expect(store.isConfigured()).toBe(true);
    expect(store.verify('test-secret')).toBe(true);
    expect(store.verify('wrong')).toBe(false);
    expect(() => store.unlock('wrong')).toThrow(SandboxAuthenticationError);
  });

  it('refuses an empty passphrase', () => {
    const { store } = makeStore();
    expect(store.setPassphrase('')).toEqual({ ok: false, error: 'Passphrase must not be empty' });
    expect(store.isConfigured()).toBe(false);
  });

  it('SC-3: will not replace a passphrase without the current one', () => {
    const { store } = makeStore();
    store.setPassphrase('test-secret');

    const withoutCurrent = store.setPassphrase('next-secret');
    expect(withoutCurrent.ok).toBe(false);
    const wrongCurrent = store.setPassphrase('next-secret', 'wrong');
    expect(wrongCurrent.ok).toBe(false);
    expect(store.verify('test-secret')).toBe(true);
  });

  it('SC-4: keeps the data key across a passphrase change', () => {
    const { store } = makeStore();
    store.setPassphrase('test-secret');
    const before = store.unlock('test-secret');

    expect(store.setPassphrase('next-secret', 'test-secret')).toEqual({ ok: true });
    expect(store.verify('test-secret')).toBe(false);
    expect(store.unlock('next-secret').equals(before)).toBe(true);
  });

  it('SC-5: stores no plaintext passphrase', () => {
    const { io, store } = makeStore();
    store.setPassphrase('test-secret');
    expect(JSON.stringify(io.readJson('sandbox-credential.json'))).not.toContain('test-secret');
  });
});

describe('SandboxKeyring', () => {
  it('SC-6: exposes the key only during a session', () => {
    const { store } = makeStore();
    store.setPassphrase('test-secret');
    const keyring = new SandboxKeyring(store);

    expect(keyring.unlocked).toBe(false);
    expect(() => keyring.key()).toThrow(SandboxSealedError);

    keyring.onSandboxEnter('test-secret');
    expect(keyring.unlocked).toBe(true);
    expect(keyring.key().equals(store.unlock('test-secret'))).toBe(true);

    keyring.onSandboxExit();
    expect(keyring.unlocked).toBe(false);
    expect(() => keyring.key()).toThrow(SandboxSealedError);
  });
});
