/**
 * Bastion Runtime Host — Encrypted Sandbox journal
 *
 * Decisions made in Sandbox mode are sealed with the Sandbox data key and
 * appended to `logs/sandbox-journal.jsonl`. Only the event id and the
 * ciphertext are stored; actor, action and outcome are all inside the seal.
 */

import { z } from 'zod';
import { ActionKind, DecisionOutcome, Mode } from '@bastion/kernel';
import type { AuditRecord, SandboxJournal } from '@bastion/kernel';
import type { StateIO } from '../state/state-io.js';
import { open, seal, SealedSchema } from '../crypto/aes-gcm.js';
import { readLog } from '../logging/log-reader.js';
import { ulid } from '../logging/ulid.js';
import type { SandboxKeyring } from './keyring.js';

export const SANDBOX_JOURNAL_LOG = 'sandbox-journal.jsonl';

const JournalLineSchema = z.object({ event_id: z.string(), sealed: SealedSchema });

const JournalRecordSchema = z.object({
  timestamp: z.string(),
  actor_id: z.string(),
  action_kind: z.nativeEnum(ActionKind),
  decision: z.nativeEnum(DecisionOutcome),
  mode: z.nativeEnum(Mode),
  reason: z.string(),
  input_hash: z.string(),
});

export class EncryptedSandboxJournal implements SandboxJournal {
  constructor(
    private readonly stateIO: StateIO,
    private readonly keyring: SandboxKeyring,
  ) {}

  /**
   * @throws {SandboxSealedError} if no Sandbox session holds the key
   */
  record(record: AuditRecord): void {
    const eventId = ulid();
    const sealed = seal(this.keyring.key(), Buffer.from(JSON.stringify(record), 'utf-8'), eventId);
    this.stateIO.appendLine(SANDBOX_JOURNAL_LOG, JSON.stringify({ event_id: eventId, sealed }));
  }

  /**
   * Decrypt the whole journal with a data key from
   * SandboxCredentialStore.unlock(). Entries come back in event id
   * order, which follows time to the millisecond.
   *
   * @throws {Error} if any entry fails to open under `dataKey`
   */
  entries(dataKey: Buffer): ReadonlyArray<AuditRecord> {
    const lines = readLog(this.stateIO.readLogRaw(SANDBOX_JOURNAL_LOG), JournalLineSchema);
    return lines.events.map((line) =>
      JournalRecordSchema.parse(
        JSON.parse(open(dataKey, line.sealed, line.event_id).toString('utf-8')),
      ),
    );
  }
}
