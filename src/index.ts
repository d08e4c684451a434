/**
 * Wallet Version Manager — public API
 */

// Plugin API
export type {
  Capability,
  LifecycleResult,
  LogLevel,
  Logger,
  Plugin,
  PluginConfig,
  PluginContext,
  PluginFactory,
  PluginId,
  PluginManifest,
  SemVer,
  WalletEvent,
} from "./plugins/api.js";
export { ARCHITECTURE_VERSION, PLUGIN_API_VERSION } from "./plugins/api.js";

// Core
export { CoreLoader } from "./core/loader.js";
export type { LoaderOptions, PluginState } from "./core/loader.js";
export { CoreEventBus, matchesTopic, WILDCARD } from "./core/event-bus.js";
export type { EventBus, EventHandler, Unsubscribe } from "./core/event-bus.js";
export { CoreInvariantEngine } from "./core/invariant-engine.js";
export type { Invariant, InvariantEngine, InvariantResult, TransitionVerdict } from "./core/invariant-engine.js";
export { createLogger, parseLogLevel } from "./core/logger.js";

// State
export { AccountStore } from "./state/account-store.js";
export type { AccountStoreSnapshot } from "./state/account-store.js";

// Version manager
export { VersionManager, createVersionManager, VERSION_MANAGER_ID } from "./modules/manager/version-manager.js";
export type { CatalogAppendContext, VersionManagerDeps } from "./modules/manager/version-manager.js";
export { FeatureSetCatalog } from "./modules/manager/feature-set-catalog.js";
export { AuthorizationGate } from "./modules/manager/authorization-gate.js";
export type { AuthorizationResult } from "./modules/manager/authorization-gate.js";
export { UpgradeEngine } from "./modules/manager/upgrade-engine.js";
export type { UpgradeOptions, UpgradeResult, UpgradeTransitionContext } from "./modules/manager/upgrade-engine.js";
export { StorageInvocationGate, callTarget } from "./modules/manager/storage-gate.js";
export { StaticCallRouter } from "./modules/manager/static-call-router.js";
export type { StaticCallResult } from "./modules/manager/static-call-router.js";
export { AuditLog } from "./modules/manager/audit-log.js";
export type { AuditAction, AuditEntry } from "./modules/manager/audit-log.js";
export { WalletCoreError, isWalletCoreError, kindOf, reject } from "./modules/manager/errors.js";
export type { ErrorKind, GateResult, Rejection, RejectionReason } from "./modules/manager/errors.js";
export { UNVERSIONED } from "./modules/manager/types.js";
export type {
  AccountRecord,
  AccountTransition,
  AuthorizationRequest,
  CallContext,
  Feature,
  FeatureDescriptor,
  FeatureSet,
  LockReader,
  ManagerGateway,
  ModuleRegistry,
  OwnershipOracle,
  Restore,
  StorageModule,
  UpgradePlan,
  UpgradeStatus,
  VersionId,
  WalletInvoker,
} from "./modules/manager/types.js";

// Storage modules
export { LockStorage, createLockStorage, LOCK_STORAGE_ABI } from "./modules/storage/lock-storage.js";
export type { Clock, LockRecord } from "./modules/storage/lock-storage.js";

// SDK
export { BasePlugin, ManifestBuilder, validatePlugin } from "./sdk/plugin-sdk.js";
export type { ValidationResult } from "./sdk/plugin-sdk.js";
export { BaseFeature } from "./sdk/feature-sdk.js";
export { aggregateSignatures, computeExecutionDigest } from "./sdk/multisig.js";
export type { ExecutionRequest, SignerSignature } from "./sdk/multisig.js";
