/**
 * Bastion Kernel — Partition Backend Interface
 *
 * Where partition documents physically live. The kernel ships an in-memory
 * backend; the runtime host supplies an encrypted file backend.
 */

import type { PartitionRef } from '../types/partition.js';
import { partitionId } from '../types/partition.js';

export interface PartitionBackend {
  /** Returns undefined when the key has never been written. */
  load(partition: PartitionRef, key: string): Promise<Uint8Array | undefined>;
  save(partition: PartitionRef, key: string, bytes: Uint8Array): Promise<void>;
}

export class MemoryPartitionBackend implements PartitionBackend {
  private readonly documents = new Map<string, Map<string, Uint8Array>>();

  async load(partition: PartitionRef, key: string): Promise<Uint8Array | undefined> {
    const stored = this.documents.get(partitionId(partition))?.get(key);
    return stored === undefined ? undefined : Uint8Array.from(stored);
  }

  async save(partition: PartitionRef, key: string, bytes: Uint8Array): Promise<void> {
    const id = partitionId(partition);
    let docs = this.documents.get(id);
    if (docs === undefined) {
      docs = new Map();
      this.documents.set(id, docs);
    }
    docs.set(key, Uint8Array.from(bytes));
  }
}
