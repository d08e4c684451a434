/**
 * Version Manager Types
 *
 * Feature sets, account records, call classes and the collaborator
 * contracts the manager consumes (module registry, ownership oracle,
 * wallet proxy, features and storage modules).
 */

import type { Address, Hex } from "viem";

// ─── Versions & Feature Sets ────────────────────────────────────────

/** 1-based feature-set version. 0 means "not upgraded yet". */
export type VersionId = number;

export const UNVERSIONED: VersionId = 0;

/** An immutable, numbered bundle of features authorized together */
export interface FeatureSet {
  readonly version: VersionId;
  /** Authorized features, in declaration order */
  readonly features: readonly Address[];
  /** Features whose `initialize` hook runs on first authorization */
  readonly toInitialize: readonly Address[];
  /** 4-byte selector → feature answering that read-only probe */
  readonly staticCallTargets: Readonly<Record<Hex, Address>>;
  /** ISO-8601 timestamp of registration */
  readonly createdAt: string;
}

/** What the catalog needs to know about a feature when a set is declared */
export interface FeatureDescriptor {
  readonly address: Address;
  readonly staticCallSelectors?: readonly Hex[];
}

// ─── Accounts ───────────────────────────────────────────────────────

export type UpgradeStatus = "idle" | "upgrading";

export interface AccountRecord {
  readonly account: Address;
  readonly currentVersion: VersionId;
  readonly updatedAt: string;
}

/** One committed version change of an account */
export interface AccountTransition {
  readonly account: Address;
  readonly fromVersion: VersionId;
  readonly toVersion: VersionId;
  /** Features whose hook ran during this transition */
  readonly initialized: readonly Address[];
  readonly sequence: number;
  readonly timestamp: string;
}

// ─── Calls ──────────────────────────────────────────────────────────

/**
 * Class of an invocation. A module claims a call class; the outermost
 * dispatch layer reports the context the call actually runs in.
 */
export type CallContext = "mutating" | "read-only";

export interface AuthorizationRequest {
  readonly account: Address;
  readonly caller: Address;
  /** What the caller claims the call is */
  readonly callClass: CallContext;
  /** What the execution context actually is */
  readonly context: CallContext;
  /** Also reject while the account is locked */
  readonly requireUnlocked?: boolean;
}

export interface UpgradePlan {
  readonly account: Address;
  readonly fromVersion: VersionId;
  readonly toVersion: VersionId;
  /** Features gaining authorization */
  readonly added: readonly Address[];
  /** Features losing authorization */
  readonly removed: readonly Address[];
  /** Subset of `added` whose hook will run (never initialized before) */
  readonly toInitialize: readonly Address[];
}

// ─── Collaborators ──────────────────────────────────────────────────

/** Global registry of audited, non-revoked modules */
export interface ModuleRegistry {
  isRegisteredModule(address: Address): boolean;
}

/** Answers whether `requester` may act as owner of `account` */
export interface OwnershipOracle {
  isOwnerAuthority(account: Address, requester: Address): boolean;
}

/** The account's forwarding proxy */
export interface WalletInvoker {
  /** Execute a call from the account. Returns the call's return data. */
  invoke(account: Address, to: Address, value: bigint, data: Hex): Hex;
  setOwner(account: Address, newOwner: Address): void;
  /** Capture wallet state so a failed upgrade can undo what its hooks forwarded */
  checkpoint?(): Restore;
}

/** Read access to an account's lock */
export interface LockReader {
  isLocked(account: Address): boolean;
}

/** A capability module as seen by the manager */
export interface Feature extends FeatureDescriptor {
  /**
   * One-time setup for `account`, run by the upgrade engine the first time
   * the feature becomes authorized for it. Throwing aborts the upgrade.
   */
  initialize(account: Address): void;
  /** Answer a routed read-only probe. Required if selectors are declared. */
  handleStaticCall?(account: Address, data: Hex): Hex;
}

/** Puts previously captured state back */
export type Restore = () => void;

/** A storage module reachable through `invokeStorage` */
export interface StorageModule {
  readonly address: Address;
  /** Execute ABI-encoded call data. Throws on failure. */
  invoke(data: Hex): Hex;
  /** Capture current contents so a failed upgrade can undo writes made by its hooks */
  checkpoint?(): Restore;
}

/**
 * The slice of the manager a feature calls back into. Every call names the
 * feature as `caller` and reports the context it runs in.
 */
export interface ManagerGateway {
  invokeWallet(
    account: Address,
    caller: Address,
    to: Address,
    value: bigint,
    data: Hex,
    context: CallContext,
  ): Hex;
  setOwner(account: Address, caller: Address, newOwner: Address, context: CallContext): void;
  invokeStorage(account: Address, caller: Address, storage: Address, data: Hex, context: CallContext): Hex;
  upgradeAccountFromFeature(
    account: Address,
    caller: Address,
    toVersion: VersionId,
    context: CallContext,
  ): AccountTransition;
  isFeatureAuthorised(account: Address, feature: Address): boolean;
}
