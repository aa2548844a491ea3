/**
 * Bastion Runtime Host — Sandbox keyring
 *
 * Holds the Sandbox data key for the length of one Sandbox session. The
 * runtime hands it the passphrase on entry and tells it to forget the key on
 * exit; the journal and the partition backend borrow the key from here.
 */

import { SandboxSealedError } from '@bastion/kernel';
import type { SandboxSessionHooks } from '@bastion/kernel';
import type { SandboxCredentialStore } from './credential-store.js';

export class SandboxKeyring implements SandboxSessionHooks {
  private dataKey: Buffer | null = null;

  constructor(private readonly credentials: SandboxCredentialStore) {}

  get unlocked(): boolean {
    return this.dataKey !== null;
  }

  onSandboxEnter(passphrase: string): void {
    this.dataKey = this.credentials.unlock(passphrase);
  }

  onSandboxExit(): void {
    this.dataKey?.fill(0);
    this.dataKey = null;
  }

  /**
   * @throws {SandboxSealedError} outside a Sandbox session
   */
  key(): Buffer {
    if (this.dataKey === null) throw new SandboxSealedError();
    return this.dataKey;
  }
}
