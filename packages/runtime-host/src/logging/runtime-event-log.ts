/**
 * Bastion Runtime Host — Runtime event log
 *
 * Operational events (store integrity failures, actor lifecycle, mode
 * changes) go to `logs/runtime-events.jsonl`, separate from the decision
 * audit.
 */

import type { RuntimeEvent, RuntimeEventSink } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const RUNTIME_EVENT_LOG = 'runtime-events.jsonl';

export class FileRuntimeEventSink implements RuntimeEventSink {
  constructor(private readonly stateIO: StateIO) {}

  emit(event: RuntimeEvent): void {
    this.stateIO.appendLine(RUNTIME_EVENT_LOG, JSON.stringify({ event_id: ulid(), ...event }));
  }
}
