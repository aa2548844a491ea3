/**
 * Bastion Kernel — Partition Store
 *
 * Holds every actor's documents. Reads and writes are only reachable with a
 * token the Interaction Guard issued for exactly that operation and key.
 *
 * Writes to one partition are serialized. Reads are not locked.
 */

import { PartitionNotFoundError } from '../errors.js';
import type { PartitionRef } from '../types/partition.js';
import { partitionId } from '../types/partition.js';
import { Mutex } from '../util/mutex.js';
import type { PartitionBackend } from './partition-backend.js';
import type { AccessToken, TokenRedeemer } from './token-issuer.js';

export class PartitionStore {
  private readonly provisioned = new Map<string, PartitionRef>();
  private readonly writeLocks = new Map<string, Mutex>();

  constructor(
    private readonly tokens: TokenRedeemer,
    private readonly backend: PartitionBackend,
  ) {}

  /** Register a partition. Idempotent. */
  provision(partition: PartitionRef): void {
    const id = partitionId(partition);
    if (!this.provisioned.has(id)) {
      this.provisioned.set(id, partition);
      this.writeLocks.set(id, new Mutex());
    }
  }

  has(partition: PartitionRef): boolean {
    return this.provisioned.has(partitionId(partition));
  }

  partitions(): ReadonlyArray<PartitionRef> {
    return [...this.provisioned.values()];
  }

  /**
   * Read one document. A key that was never written reads as empty bytes.
   *
   * @throws {PartitionNotFoundError} partition was never provisioned
   * @throws {TokenInvalidError} token missing, spent, or scoped elsewhere
   */
  async read(partition: PartitionRef, key: string, token: AccessToken): Promise<Uint8Array> {
    const id = this.requireProvisioned(partition);
    this.tokens.redeem(token, { operation: 'read', partition_id: id, key });
    return (await this.backend.load(partition, key)) ?? new Uint8Array();
  }

  /**
   * Replace one document.
   *
   * @throws {PartitionNotFoundError}
   * @throws {TokenInvalidError}
   */
  async write(
    partition: PartitionRef,
    key: string,
    bytes: Uint8Array,
    token: AccessToken,
  ): Promise<void> {
    await this.update(partition, key, token, () => bytes);
  }

  /**
   * Read-modify-write one document under the partition's write lock, so
   * concurrent appends to the same history cannot lose each other.
   * Takes a write token.
   */
  async update(
    partition: PartitionRef,
    key: string,
    token: AccessToken,
    change: (current: Uint8Array) => Uint8Array,
  ): Promise<Uint8Array> {
    const id = this.requireProvisioned(partition);
    this.tokens.redeem(token, { operation: 'write', partition_id: id, key });
    const lock = this.writeLocks.get(id) ?? new Mutex();
    return lock.runExclusive(async () => {
      const current = (await this.backend.load(partition, key)) ?? new Uint8Array();
      const next = change(current);
      await this.backend.save(partition, key, next);
      return next;
    });
  }

  private requireProvisioned(partition: PartitionRef): string {
    const id = partitionId(partition);
    if (!this.provisioned.has(id)) {
      throw new PartitionNotFoundError(id);
    }
    return id;
  }
}
