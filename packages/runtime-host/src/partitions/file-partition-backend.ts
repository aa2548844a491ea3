/**
 * Bastion Runtime Host — Encrypted partition backend
 *
 * One state document per partition, `partition.<class>.<owner>.json`, mapping
 * each key to a sealed value. Sandbox-private partitions are sealed with the
 * Sandbox data key and cannot be opened outside a Sandbox session; every
 * other partition is sealed with the device key.
 *
 * Each value is sealed with `<partition id>#<key>` as associated data, so a
 * value moved to another key or partition fails to open.
 */

import { z } from 'zod';
import { PartitionClass, partitionId, StoreIntegrityError } from '@bastion/kernel';
import type { PartitionBackend, PartitionRef } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import { open, seal, SealedSchema } from '../crypto/aes-gcm.js';
import type { SandboxKeyring } from '../sandbox/keyring.js';

const PartitionDocumentSchema = z.object({
  entries: z.record(z.string(), SealedSchema),
});

type PartitionDocument = z.infer<typeof PartitionDocumentSchema>;

const EMPTY_DOCUMENT: PartitionDocument = { entries: {} };

export class FilePartitionBackend implements PartitionBackend {
  constructor(
    private readonly stateIO: StateIO,
    private readonly deviceKey: Buffer,
    private readonly keyring: SandboxKeyring,
  ) {}

  async load(partition: PartitionRef, key: string): Promise<Uint8Array | undefined> {
    const sealed = this.read(partition).entries[key];
    if (sealed === undefined) return undefined;
    const dataKey = this.keyFor(partition);
    try {
      return open(dataKey, sealed, slot(partition, key));
    } catch {
      throw new StoreIntegrityError(`${slot(partition, key)} did not authenticate`);
    }
  }

  async save(partition: PartitionRef, key: string, bytes: Uint8Array): Promise<void> {
    const document = this.read(partition);
    const sealed = seal(this.keyFor(partition), bytes, slot(partition, key));
    this.stateIO.writeJson(documentName(partition), {
      entries: { ...document.entries, [key]: sealed },
    });
  }

  private read(partition: PartitionRef): PartitionDocument {
    const raw = this.stateIO.readJson(documentName(partition));
    if (raw === undefined) return EMPTY_DOCUMENT;
    const parsed = PartitionDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreIntegrityError(`${partitionId(partition)} document is malformed`);
    }
    return parsed.data;
  }

  /**
   * @throws {SandboxSealedError} for a Sandbox partition outside a session
   */
  private keyFor(partition: PartitionRef): Buffer {
    return partition.class === PartitionClass.SandboxPrivate ? this.keyring.key() : this.deviceKey;
  }
}

function documentName(partition: PartitionRef): string {
  return `partition.${partition.class}.${encodeURIComponent(partition.owner_id)}.json`;
}

function slot(partition: PartitionRef, key: string): string {
  return `${partitionId(partition)}#${key}`;
}
