/**
 * Bastion Kernel — Inference Boundary Types
 *
 * The runtime assembles a ContextBundle from guarded reads and hands it to
 * an InferenceBackend. The kernel never talks to a model itself.
 */

import type { DenyReason } from '../types/decision.js';
import type { PartitionRef } from '../types/partition.js';

export interface ContextRequest {
  readonly partition: PartitionRef;
  readonly key: string;
}

export interface ContextSnippet extends ContextRequest {
  readonly text: string;
}

export interface WithheldContext extends ContextRequest {
  /** Why the read was not allowed. `approval_required` when it was parked. */
  readonly reason: DenyReason | 'approval_required' | 'action_failed';
}

export interface ContextBundle {
  readonly snippets: ReadonlyArray<ContextSnippet>;
  readonly withheld: ReadonlyArray<WithheldContext>;
}

export interface InferenceRequest {
  readonly actor_id: string;
  readonly prompt: string;
  readonly context: ContextBundle;
}

export interface InferenceBackend {
  /** Remote backends need internet access and receive redacted context. */
  readonly remote: boolean;
  complete(request: InferenceRequest): Promise<string>;
}
