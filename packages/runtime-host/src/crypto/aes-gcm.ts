/**
 * Bastion Runtime Host — AES-256-GCM sealing and key derivation
 *
 * Every sealed value carries its own random 12-byte nonce and 16-byte tag.
 * Optional associated data binds a ciphertext to where it is stored, so a
 * sealed value copied to another slot fails to open.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

export const KEY_LEN = 32;
const IV_LEN = 12;
const TAG_LEN = 16;
export const SALT_LEN = 32;

export const SealedSchema = z.object({
  iv: z.string(),
  ciphertext: z.string(),
  tag: z.string(),
});

/** Base64 fields of one sealed value. */
export type Sealed = z.infer<typeof SealedSchema>;

export interface ScryptCost {
  readonly N: number;
  readonly r: number;
  readonly p: number;
}

export const DEFAULT_SCRYPT_COST: ScryptCost = { N: 16384, r: 8, p: 1 };

export function seal(key: Uint8Array, plaintext: Uint8Array, aad?: string): Sealed {
  const iv = randomBytes(IV_LEN);
  const cipher = createCipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_LEN });
  if (aad !== undefined) cipher.setAAD(Buffer.from(aad, 'utf-8'));
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return {
    iv: iv.toString('base64'),
    ciphertext: ciphertext.toString('base64'),
    tag: cipher.getAuthTag().toString('base64'),
  };
}

/**
 * @throws {Error} when the key is wrong or the value was tampered with
 */
export function open(key: Uint8Array, sealed: Sealed, aad?: string): Buffer {
  const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(sealed.iv, 'base64'), {
    authTagLength: TAG_LEN,
  });
  if (aad !== undefined) decipher.setAAD(Buffer.from(aad, 'utf-8'));
  decipher.setAuthTag(Buffer.from(sealed.tag, 'base64'));
  return Buffer.concat([
    decipher.update(Buffer.from(sealed.ciphertext, 'base64')),
    decipher.final(),
  ]);
}

export function deriveKey(
  passphrase: string,
  salt: Uint8Array,
  cost: ScryptCost,
  length: number = KEY_LEN,
): Buffer {
  // maxmem must cover 128 * N * r bytes or scrypt refuses the cost.
  return scryptSync(passphrase, salt, length, {
    N: cost.N,
    r: cost.r,
    p: cost.p,
    maxmem: 256 * cost.N * cost.r,
  });
}

// ---------------------------------------------------------------------------
// Device key
// ---------------------------------------------------------------------------

/**
 * The machine-scoped key for non-Sandbox partitions. Generated on first use
 * and stored base64 with mode 0o600. It never leaves the machine.
 *
 * @throws {Error} if an existing key file has the wrong length
 */
export function loadDeviceKey(deviceKeyPath: string): Buffer {
  if (existsSync(deviceKeyPath)) {
    const key = Buffer.from(readFileSync(deviceKeyPath, 'utf-8').trim(), 'base64');
    if (key.byteLength !== KEY_LEN) {
      throw new Error(
        `Device key at ${deviceKeyPath} has unexpected length ` +
          `(expected ${KEY_LEN} bytes, got ${key.byteLength}). The file may be corrupt.`,
      );
    }
    return key;
  }

  const key = randomBytes(KEY_LEN);
  mkdirSync(dirname(deviceKeyPath), { recursive: true });
  writeFileSync(deviceKeyPath, key.toString('base64'), { encoding: 'utf-8', mode: 0o600 });
  return key;
}
