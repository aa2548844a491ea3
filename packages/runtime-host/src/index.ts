/**
 * @bastion/runtime-host
 *
 * Side-effectful implementations of the kernel's injected interfaces:
 * state and log files, the JSONL audit sink, the encrypted Sandbox journal
 * and partition backend, the Sandbox credential store, home resolution and
 * configuration.
 */

export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

export type { HomePaths, ResolveHomeOptions } from './home.js';
export { homePaths, resolveHome } from './home.js';

export type { BastionConfig } from './config.js';
export { ConfigError, ConfigSchema, loadConfig, parseConfig, redactionRules } from './config.js';

export type { Sealed, ScryptCost } from './crypto/aes-gcm.js';
export { DEFAULT_SCRYPT_COST, deriveKey, loadDeviceKey, open, seal } from './crypto/aes-gcm.js';

export { ulid } from './logging/ulid.js';
export { AUDIT_LOG, FileAuditSink } from './logging/file-audit-sink.js';
export { FileRuntimeEventSink, RUNTIME_EVENT_LOG } from './logging/runtime-event-log.js';
export type { AuditEntry, LogEventBase, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { AuditEntrySchema, readAuditLog, readLog, tailAuditLog } from './logging/log-reader.js';

export type { CredentialResult } from './sandbox/credential-store.js';
export { SandboxCredentialStore } from './sandbox/credential-store.js';
export { SandboxKeyring } from './sandbox/keyring.js';
export { EncryptedSandboxJournal, SANDBOX_JOURNAL_LOG } from './sandbox/encrypted-journal.js';

export { FilePartitionBackend } from './partitions/file-partition-backend.js';

export type { Host, HostOptions } from './host.js';
export { openHost } from './host.js';
