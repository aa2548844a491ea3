/**
 * @bastion/kernel
 *
 * Policy and isolation core: capability registry, permission enforcer,
 * interaction and agent communication guards, mode controller, partition
 * store, and audit log.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for hashing and random identifiers only.
 *
 * File persistence, encryption, and configuration live in
 * @bastion/runtime-host.
 */

// Types
export type { Actor, PersonalityRef } from './types/actor.js';
export { ActorKind } from './types/actor.js';

export type { CapabilityGrant, GrantNarrowing } from './types/capability.js';
export { INTERNET_ACCESS_ORDER, InternetAccess, RagWriteScope } from './types/capability.js';

export type { PartitionRef } from './types/partition.js';
export {
  HISTORY_KEY,
  homePartition,
  homePartitionClass,
  PartitionClass,
  partitionId,
  PERSONALITY_KEY,
  SETTINGS_KEY_PREFIX,
} from './types/partition.js';

export type { ModeTransition, ModeTransitionCause } from './types/mode.js';
export { Mode } from './types/mode.js';

export type {
  Action,
  AgentMessageAction,
  ChatTurnAction,
  CollaborationJoinAction,
  CollaborationOpenAction,
  InternetCallAction,
  MemoryReadAction,
  MemoryShareAction,
  MemoryWriteAction,
  PersonalityWriteAction,
  SettingsWriteAction,
} from './types/action.js';
export { ActionKind, targetPartition } from './types/action.js';

export type {
  ApprovalReason,
  AuditRecord,
  Authorization,
  Decision,
  DenyReason,
  Verdict,
} from './types/decision.js';
export { DECISION_SEVERITY, DecisionOutcome } from './types/decision.js';

// Errors
export type { BastionErrorCode } from './errors.js';
export {
  ActorInvalidError,
  ActorNotFoundError,
  BastionError,
  PartitionNotFoundError,
  SandboxAuthenticationError,
  SandboxSealedError,
  StoreIntegrityError,
  TokenInvalidError,
  TransitionRejectedError,
  UnknownActorKindError,
} from './errors.js';

// Registry
export {
  capabilitiesFor,
  intersectGrants,
  isSubsetOf,
  narrowGrant,
} from './registry/capability-registry.js';
export type { ActorEntry, ActorLookup } from './registry/actor-directory.js';
export { ActorDirectory } from './registry/actor-directory.js';

// Enforcement
export type {
  CollaborationPolicy,
  CollaborationView,
  EvaluationContext,
} from './enforcement/enforcer.js';
export { PermissionEnforcer } from './enforcement/enforcer.js';

// Mode
export type {
  ApprovalOrigin,
  ModeTransaction,
  PendingApproval,
  SandboxSession,
} from './mode/mode-controller.js';
export { ModeController } from './mode/mode-controller.js';

// Guards
export type { AgentMessage } from './guards/agent-communication-guard.js';
export {
  AgentCommunicationGuard,
  MAX_PARTICIPANTS,
} from './guards/agent-communication-guard.js';
export type { ApprovalResolution } from './guards/interaction-guard.js';
export { InteractionGuard } from './guards/interaction-guard.js';

// Store
export type { AccessToken, TokenScope } from './store/token-issuer.js';
export { TokenIssuer } from './store/token-issuer.js';
export type { PartitionBackend } from './store/partition-backend.js';
export { MemoryPartitionBackend } from './store/partition-backend.js';
export { PartitionStore } from './store/partition-store.js';

// Logging
export type {
  AuditSink,
  RuntimeEvent,
  RuntimeEventSink,
  SandboxJournal,
  SandboxSessionHooks,
} from './logging/audit-sink.js';
export { AuditLog } from './logging/audit-log.js';

// Inference boundary
export type {
  ContextBundle,
  ContextRequest,
  ContextSnippet,
  InferenceBackend,
  InferenceRequest,
  WithheldContext,
} from './inference/context-bundle.js';
export type { RedactionRule } from './inference/redaction.js';
export { DEFAULT_REDACTION_RULES, redact } from './inference/redaction.js';

// Runtime
export type {
  ActionResult,
  ApprovalResult,
  ChatReply,
  EditOutcome,
  HistoryTurn,
  RuntimeOptions,
  SandboxAuthenticator,
  SandboxEntry,
} from './runtime.js';
export { BastionRuntime } from './runtime.js';

export { canonicalJson, computeInputHash } from './util/canonical.js';
export { Mutex } from './util/mutex.js';
