/**
 * Bastion Runtime Host — Runtime assembly
 *
 * Wires the file-backed implementations into a BastionRuntime for one home
 * directory: audit sink, runtime event log, Sandbox credential store and
 * keyring, encrypted journal, encrypted partition backend, and the
 * configured redaction rules.
 */

import { BastionRuntime } from '@bastion/kernel';
import type { RuntimeOptions } from '@bastion/kernel';
import { loadDeviceKey } from './crypto/aes-gcm.js';
import type { BastionConfig } from './config.js';
import { loadConfig, redactionRules } from './config.js';
import { homePaths } from './home.js';
import type { HomePaths } from './home.js';
import { FileAuditSink } from './logging/file-audit-sink.js';
import { FileRuntimeEventSink } from './logging/runtime-event-log.js';
import { FilePartitionBackend } from './partitions/file-partition-backend.js';
import { SandboxCredentialStore } from './sandbox/credential-store.js';
import { EncryptedSandboxJournal } from './sandbox/encrypted-journal.js';
import { SandboxKeyring } from './sandbox/keyring.js';
import type { StateIO } from './state/state-io.js';
import { FileStateIO } from './state/state-io.js';

export interface HostOptions {
  /** Resolved home directory (see resolveHome). */
  readonly home: string;
  /** Replaces file I/O under the home directory; the device key still lives there. */
  readonly stateIO?: StateIO;
  /** Skips reading `<home>/config.json`. */
  readonly config?: BastionConfig;
  readonly clock?: () => string;
}

export interface Host {
  readonly paths: HomePaths;
  readonly config: BastionConfig;
  readonly stateIO: StateIO;
  readonly credentials: SandboxCredentialStore;
  readonly keyring: SandboxKeyring;
  /** Null when the journal is turned off in config. */
  readonly journal: EncryptedSandboxJournal | null;
  readonly runtime: BastionRuntime;
}

/**
 * @throws {ConfigError} if config.json is present and invalid
 */
export function openHost(options: HostOptions): Host {
  const paths = homePaths(options.home);
  const config = options.config ?? loadConfig(paths.config);
  const stateIO = options.stateIO ?? new FileStateIO(paths.root);

  const credentials = new SandboxCredentialStore(stateIO, config.scrypt);
  const keyring = new SandboxKeyring(credentials);
  const journal = config.sandbox.journal ? new EncryptedSandboxJournal(stateIO, keyring) : null;

  const runtimeOptions: RuntimeOptions = {
    backend: new FilePartitionBackend(stateIO, loadDeviceKey(paths.deviceKey), keyring),
    auditSink: new FileAuditSink(stateIO),
    eventSink: new FileRuntimeEventSink(stateIO),
    authenticator: credentials,
    sandboxHooks: [keyring],
    redaction: redactionRules(config),
    ...(journal !== null ? { journal } : {}),
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  };

  return {
    paths,
    config,
    stateIO,
    credentials,
    keyring,
    journal,
    runtime: new BastionRuntime(runtimeOptions),
  };
}
