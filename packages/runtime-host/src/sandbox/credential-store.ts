/**
 * Bastion Runtime Host — Sandbox credential store
 *
 * Holds what is needed to check the Sandbox passphrase and to recover the
 * Sandbox data key, and nothing that reveals either without the passphrase.
 *
 * Layout of `state/sandbox-credential.json`:
 *
 *   salt        random scrypt salt
 *   scrypt      the cost the record was written with
 *   verifier    first 32 bytes of scrypt(passphrase, salt)
 *   wrapped_key the random data key, sealed with the next 32 bytes
 *
 * The data key is generated once. Changing the passphrase re-wraps it, so
 * the journal and Sandbox partitions stay readable.
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { SandboxAuthenticationError } from '@bastion/kernel';
import type { SandboxAuthenticator } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import type { ScryptCost } from '../crypto/aes-gcm.js';
import { deriveKey, KEY_LEN, open, SALT_LEN, seal, SealedSchema } from '../crypto/aes-gcm.js';

const CREDENTIAL_FILE = 'sandbox-credential.json';
const WRAP_AAD = 'bastion:sandbox-data-key';

const CredentialSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  scrypt: z.object({ N: z.number().int(), r: z.number().int(), p: z.number().int() }),
  verifier: z.string(),
  wrapped_key: SealedSchema,
});

type Credential = z.infer<typeof CredentialSchema>;

export type CredentialResult = { readonly ok: true } | { readonly ok: false; readonly error: string };

export class SandboxCredentialStore implements SandboxAuthenticator {
  constructor(
    private readonly stateIO: StateIO,
    /** Cost for newly written records. Existing records keep their own. */
    private readonly cost: ScryptCost,
  ) {}

  isConfigured(): boolean {
    return this.load() !== null;
  }

  verify(passphrase: string): boolean {
    const credential = this.load();
    if (credential === null) return false;
    return this.check(credential, passphrase) !== null;
  }

  /**
   * The Sandbox data key.
   *
   * @throws {SandboxAuthenticationError} no credential, or wrong passphrase
   */
  unlock(passphrase: string): Buffer {
    const credential = this.load();
    const wrapKey = credential === null ? null : this.check(credential, passphrase);
    if (credential === null || wrapKey === null) {
      throw new SandboxAuthenticationError();
    }
    return open(wrapKey, credential.wrapped_key, WRAP_AAD);
  }

  /**
   * Set the passphrase. Replacing an existing one requires the current
   * passphrase; the data key is carried over.
   */
  setPassphrase(next: string, current?: string): CredentialResult {
    if (next.length === 0) {
      return { ok: false, error: 'Passphrase must not be empty' };
    }

    let dataKey: Buffer;
    if (this.isConfigured()) {
      if (current === undefined || !this.verify(current)) {
        return { ok: false, error: 'Current Sandbox passphrase is required and did not match' };
      }
      dataKey = this.unlock(current);
    } else {
      dataKey = randomBytes(KEY_LEN);
    }

    const salt = randomBytes(SALT_LEN);
    const material = deriveKey(next, salt, this.cost, KEY_LEN * 2);
    const record: Credential = {
      version: 1,
      salt: salt.toString('base64'),
      scrypt: { N: this.cost.N, r: this.cost.r, p: this.cost.p },
      verifier: material.subarray(0, KEY_LEN).toString('base64'),
      wrapped_key: seal(material.subarray(KEY_LEN), dataKey, WRAP_AAD),
    };
    this.stateIO.writeJson(CREDENTIAL_FILE, record);
    dataKey.fill(0);
    return { ok: true };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private load(): Credential | null {
    const parsed = CredentialSchema.safeParse(this.stateIO.readJson(CREDENTIAL_FILE));
    return parsed.success ? parsed.data : null;
  }

  /** The wrapping key when the passphrase matches, otherwise null. */
  private check(credential: Credential, passphrase: string): Buffer | null {
    const material = deriveKey(
      passphrase,
      Buffer.from(credential.salt, 'base64'),
      credential.scrypt,
      KEY_LEN * 2,
    );
    const expected = Buffer.from(credential.verifier, 'base64');
    const actual = material.subarray(0, KEY_LEN);
    if (expected.byteLength !== actual.byteLength || !timingSafeEqual(expected, actual)) {
      return null;
    }
    return material.subarray(KEY_LEN);
  }
}
