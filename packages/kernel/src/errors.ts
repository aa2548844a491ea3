/**
 * Bastion Kernel — Errors
 *
 * Every error the kernel throws extends BastionError and carries a stable
 * `code` so callers can branch without matching on messages.
 */

import type { Mode } from './types/mode.js';

export type BastionErrorCode =
  | 'TOKEN_INVALID'
  | 'PARTITION_NOT_FOUND'
  | 'TRANSITION_REJECTED'
  | 'UNKNOWN_ACTOR_KIND'
  | 'ACTOR_NOT_FOUND'
  | 'ACTOR_INVALID'
  | 'SANDBOX_AUTHENTICATION_FAILED'
  | 'SANDBOX_SEALED'
  | 'CONFIG_INVALID'
  | 'STORE_INTEGRITY';

export class BastionError extends Error {
  readonly code: BastionErrorCode;

  constructor(code: BastionErrorCode, message: string) {
    super(message);
    this.name = 'BastionError';
    this.code = code;
  }
}

/** A store operation presented a token that is unknown, spent, or scoped elsewhere. */
export class TokenInvalidError extends BastionError {
  constructor(detail: string) {
    super('TOKEN_INVALID', `Access token rejected: ${detail}`);
    this.name = 'TokenInvalidError';
  }
}

export class PartitionNotFoundError extends BastionError {
  readonly partition_id: string;

  constructor(partitionId: string) {
    super('PARTITION_NOT_FOUND', `Partition not found: ${partitionId}`);
    this.name = 'PartitionNotFoundError';
    this.partition_id = partitionId;
  }
}

/** A mode transition was requested from a mode that does not allow it. */
export class TransitionRejectedError extends BastionError {
  readonly from: Mode;
  readonly to: Mode;

  constructor(from: Mode, to: Mode, detail: string) {
    super('TRANSITION_REJECTED', `Cannot move from ${from} to ${to}: ${detail}`);
    this.name = 'TransitionRejectedError';
    this.from = from;
    this.to = to;
  }
}

export class UnknownActorKindError extends BastionError {
  constructor(kind: string) {
    super('UNKNOWN_ACTOR_KIND', `Unknown actor kind: ${kind}`);
    this.name = 'UnknownActorKindError';
  }
}

export class ActorNotFoundError extends BastionError {
  constructor(actorId: string) {
    super('ACTOR_NOT_FOUND', `Actor not found: ${actorId}`);
    this.name = 'ActorNotFoundError';
  }
}

/** An actor lifecycle request that the directory refuses (second Primus, SubChat of a SubChat). */
export class ActorInvalidError extends BastionError {
  constructor(detail: string) {
    super('ACTOR_INVALID', detail);
    this.name = 'ActorInvalidError';
  }
}

export class SandboxAuthenticationError extends BastionError {
  constructor() {
    super('SANDBOX_AUTHENTICATION_FAILED', 'Sandbox passphrase rejected');
    this.name = 'SandboxAuthenticationError';
  }
}

/** Sandbox-private material was touched while no Sandbox session holds its key. */
export class SandboxSealedError extends BastionError {
  constructor() {
    super('SANDBOX_SEALED', 'Sandbox storage is sealed outside a Sandbox session');
    this.name = 'SandboxSealedError';
  }
}

/** Stored bytes failed authentication or no longer parse. */
export class StoreIntegrityError extends BastionError {
  constructor(detail: string) {
    super('STORE_INTEGRITY', `Stored data failed integrity check: ${detail}`);
    this.name = 'StoreIntegrityError';
  }
}
