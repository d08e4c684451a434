/**
 * Version Manager
 *
 * Composition root of the wallet core. Owns the feature-set catalog and
 * the account store, and fronts the authorization gate, upgrade engine,
 * storage gate and static-call router with the entry points features and
 * owners call.
 *
 * Capabilities: manager
 * Events emitted: manager.ready, manager.featureset.added, manager.storage.added,
 *   manager.account.upgraded, manager.upgrade.failed, manager.auth.rejected,
 *   manager.storage.invoked, manager.wallet.invoked, manager.owner.changed,
 *   manager.static.routed
 * Invariants: catalog.contiguous-versions, accounts.version-exists, accounts.init-once
 */

import { getAddress, isAddress, type Address, type Hex } from "viem";
import type { EventBus } from "../../core/event-bus.js";
import type { InvariantEngine } from "../../core/invariant-engine.js";
import type {
  LifecycleResult,
  Logger,
  Plugin,
  PluginContext,
  PluginManifest,
} from "../../plugins/api.js";
import { AccountStore } from "../../state/account-store.js";
import { AuditLog, type AuditAction } from "./audit-log.js";
import { AuthorizationGate, type AuthorizationResult } from "./authorization-gate.js";
import { WalletCoreError } from "./errors.js";
import { FeatureSetCatalog } from "./feature-set-catalog.js";
import { StaticCallRouter } from "./static-call-router.js";
import { StorageInvocationGate } from "./storage-gate.js";
import {
  UNVERSIONED,
  type AccountTransition,
  type AuthorizationRequest,
  type CallContext,
  type Feature,
  type FeatureSet,
  type LockReader,
  type ManagerGateway,
  type ModuleRegistry,
  type OwnershipOracle,
  type Restore,
  type StorageModule,
  type UpgradePlan,
  type VersionId,
  type WalletInvoker,
} from "./types.js";
import { UpgradeEngine, type UpgradeTransitionContext } from "./upgrade-engine.js";

// ─── Types ──────────────────────────────────────────────────────────

export const VERSION_MANAGER_ID = "version-manager";

export interface VersionManagerDeps {
  readonly registry: ModuleRegistry;
  readonly ownership: OwnershipOracle;
  readonly wallet: WalletInvoker;
  readonly lock?: LockReader;
}

/** Context handed to invariants before a feature set is appended */
export interface CatalogAppendContext {
  readonly kind: "catalog.append";
  readonly entry: FeatureSet;
}

interface Components {
  readonly catalog: FeatureSetCatalog;
  readonly gate: AuthorizationGate;
  readonly engine: UpgradeEngine;
  readonly storageGate: StorageInvocationGate;
  readonly router: StaticCallRouter;
}

function isCatalogAppend(context: unknown): context is CatalogAppendContext {
  return typeof context === "object" && context !== null && "kind" in context && context.kind === "catalog.append";
}

function isAccountUpgrade(context: unknown): context is UpgradeTransitionContext {
  return typeof context === "object" && context !== null && "kind" in context && context.kind === "account.upgrade";
}

// ─── Plugin ─────────────────────────────────────────────────────────

export class VersionManager implements Plugin, ManagerGateway {
  readonly manifest: PluginManifest = {
    id: VERSION_MANAGER_ID,
    name: "Version Manager",
    version: "1.0.0",
    capabilities: ["manager"],
    description: "Versioned feature sets, per-account authorization and upgrades",
  };

  private events!: EventBus;
  private log!: Logger;
  private invariants!: InvariantEngine;
  private components: Components | undefined;
  private readonly accounts = new AccountStore();
  private readonly auditLog = new AuditLog();
  private readonly features = new Map<Address, Feature>();
  private readonly storageModules = new Map<Address, StorageModule>();

  constructor(private readonly deps: VersionManagerDeps) {}

  async init(ctx: PluginContext): Promise<LifecycleResult> {
    this.events = ctx.events;
    this.log = ctx.log;
    this.invariants = ctx.invariants;

    // Catalog owner: the only identity allowed to add feature sets and storages
    const owner = ctx.config.owner;
    if (typeof owner !== "string" || !isAddress(owner)) {
      return { ok: false, message: `config "owner" must be an address, got ${String(owner)}` };
    }

    const catalog = new FeatureSetCatalog(getAddress(owner));
    const resolveFeature = (address: Address) => this.features.get(getAddress(address));
    this.components = {
      catalog,
      gate: new AuthorizationGate({
        catalog,
        accounts: this.accounts,
        registry: this.deps.registry,
        lock: this.deps.lock,
      }),
      engine: new UpgradeEngine({
        catalog,
        accounts: this.accounts,
        ownership: this.deps.ownership,
        resolveFeature,
        invariants: ctx.invariants,
        invariantOwner: this.manifest.id,
        checkpoint: () => this.checkpointExternal(),
      }),
      storageGate: new StorageInvocationGate({
        catalog,
        resolveStorage: (address) => this.storageModules.get(getAddress(address)),
      }),
      router: new StaticCallRouter({ catalog, accounts: this.accounts, resolveFeature }),
    };

    this.registerInvariants(ctx.invariants, catalog);
    this.log.info("Version manager initialized", { owner: catalog.owner });
    return { ok: true };
  }

  async start(): Promise<LifecycleResult> {
    const { catalog } = this.ready();
    this.events.publish("manager.ready", this.manifest.id, {
      owner: catalog.owner,
      lastVersion: catalog.lastVersion(),
    });
    return { ok: true };
  }

  async stop(): Promise<LifecycleResult> {
    return { ok: true };
  }

  // ── Catalog ─────────────────────────────────────────────────────

  addStorage(caller: Address, storage: StorageModule): void {
    const { catalog } = this.ready();
    const key = getAddress(storage.address);
    const result = catalog.addStorage(caller, key);
    if (!result.ok) throw WalletCoreError.from(result);

    this.storageModules.set(key, storage);
    this.publish("manager.storage.added", { storage: key });
    this.recordAudit("storage.added", caller, key);
    this.log.info(`Storage added: ${key}`);
  }

  /** Append a feature set. Returns its version. */
  addFeatureSet(caller: Address, features: readonly Feature[], toInitialize: readonly Address[] = []): VersionId {
    const { catalog } = this.ready();
    if (!catalog.isOwner(caller)) {
      throw new WalletCoreError("NotCatalogOwner", `${caller} is not the catalog owner`);
    }

    for (const feature of features) {
      const bound = this.features.get(getAddress(feature.address));
      if (bound !== undefined && bound !== feature) {
        throw new WalletCoreError(
          "DuplicateStorageOrModule",
          `another implementation is bound to ${getAddress(feature.address)}`,
        );
      }
    }

    const prepared = catalog.prepare(caller, features, toInitialize);
    if (!prepared.ok) throw WalletCoreError.from(prepared);
    const { entry } = prepared;

    const context: CatalogAppendContext = { kind: "catalog.append", entry };
    const verdict = this.invariants.check(context, this.manifest.id);
    if (!verdict.allowed) {
      throw new WalletCoreError(
        "InvariantViolation",
        `feature set ${entry.version} violates ${verdict.violations.map((v) => v.name).join(", ")}`,
      );
    }

    catalog.append(entry);
    for (const feature of features) this.features.set(getAddress(feature.address), feature);

    this.publish("manager.featureset.added", {
      version: entry.version,
      features: entry.features,
      toInitialize: entry.toInitialize,
    });
    this.recordAudit("featureset.added", caller, `featureset-${entry.version}`, { features: entry.features });
    this.log.info(`Feature set ${entry.version} added`, { features: entry.features.length });
    return entry.version;
  }

  getFeatureSet(version: VersionId): FeatureSet | undefined {
    return this.ready().catalog.get(version);
  }

  lastVersion(): VersionId {
    return this.ready().catalog.lastVersion();
  }

  versions(): readonly FeatureSet[] {
    return this.ready().catalog.versions();
  }

  storages(): readonly Address[] {
    return this.ready().catalog.storages();
  }

  // ── Authorization ───────────────────────────────────────────────

  /** Run the authorization gate without side effects */
  authorize(request: AuthorizationRequest): AuthorizationResult {
    return this.ready().gate.authorize(request);
  }

  isFeatureAuthorised(account: Address, feature: Address): boolean {
    return this.ready().gate.isAuthorized(account, feature);
  }

  authorizedFeatures(account: Address): readonly Address[] {
    const version = this.accountVersion(account);
    return this.ready().catalog.get(version)?.features ?? [];
  }

  accountVersion(account: Address): VersionId {
    this.ready();
    return this.accounts.versionOf(account);
  }

  isInitialized(account: Address, feature: Address): boolean {
    this.ready();
    return this.accounts.isInitialized(account, feature);
  }

  isLocked(account: Address): boolean {
    return this.deps.lock?.isLocked(account) ?? false;
  }

  transitions(account?: Address): readonly AccountTransition[] {
    return this.accounts.transitions(account);
  }

  get audit(): AuditLog {
    return this.auditLog;
  }

  // ── Upgrades ────────────────────────────────────────────────────

  plan(account: Address, toVersion: VersionId): UpgradePlan {
    const planned = this.ready().engine.plan(account, toVersion);
    if (!planned.ok) throw WalletCoreError.from(planned);
    return planned.plan;
  }

  /** Upgrade requested by an owner authority of the account */
  upgradeAccount(account: Address, toVersion: VersionId, requester: Address): AccountTransition {
    return this.runUpgrade(account, toVersion, requester, false);
  }

  /** Upgrade requested by a feature currently authorized for the account */
  upgradeAccountFromFeature(
    account: Address,
    caller: Address,
    toVersion: VersionId,
    context: CallContext,
  ): AccountTransition {
    if (this.accounts.statusOf(account) === "upgrading") {
      throw new WalletCoreError("UpgradeInProgress", `${getAddress(account)} is already being upgraded`, { toVersion });
    }
    this.assertAuthorized({ account, caller, callClass: "mutating", context });
    return this.runUpgrade(account, toVersion, caller, true);
  }

  // ── Forwarded calls ─────────────────────────────────────────────

  invokeWallet(
    account: Address,
    caller: Address,
    to: Address,
    value: bigint,
    data: Hex,
    context: CallContext,
  ): Hex {
    this.assertAuthorized({ account, caller, callClass: "mutating", context, requireUnlocked: true });
    const returnData = this.deps.wallet.invoke(getAddress(account), getAddress(to), value, data);

    this.publish("manager.wallet.invoked", { account: getAddress(account), caller: getAddress(caller), to, value });
    this.recordAudit("wallet.invoked", caller, getAddress(account), { to: getAddress(to), value: value.toString() });
    this.log.debug(`Wallet call forwarded for ${getAddress(account)}`, { to });
    return returnData;
  }

  setOwner(account: Address, caller: Address, newOwner: Address, context: CallContext): void {
    this.assertAuthorized({ account, caller, callClass: "mutating", context });
    this.deps.wallet.setOwner(getAddress(account), getAddress(newOwner));

    this.publish("manager.owner.changed", { account: getAddress(account), newOwner: getAddress(newOwner) });
    this.recordAudit("owner.changed", caller, getAddress(account), { newOwner: getAddress(newOwner) });
    this.log.info(`Owner of ${getAddress(account)} changed`, { newOwner });
  }

  invokeStorage(account: Address, caller: Address, storage: Address, data: Hex, context: CallContext): Hex {
    this.assertAuthorized({ account, caller, callClass: "mutating", context });
    const result = this.ready().storageGate.invoke(account, storage, data);
    if (!result.ok) throw WalletCoreError.from(result);

    this.publish("manager.storage.invoked", { account: getAddress(account), storage: getAddress(storage) });
    this.recordAudit("storage.invoked", caller, getAddress(account), { storage: getAddress(storage) });
    return result.returnData;
  }

  /** Route a read-only probe to the feature that answers it */
  staticCall(account: Address, data: Hex, context: CallContext): Hex {
    const result = this.ready().router.route(account, data, context);
    if (!result.ok) throw WalletCoreError.from(result);

    this.publish("manager.static.routed", { account: getAddress(account), feature: result.feature });
    this.recordAudit("static.routed", result.feature, getAddress(account));
    return result.returnData;
  }

  // ── Internal ────────────────────────────────────────────────────

  private ready(): Components {
    if (!this.components) {
      throw new WalletCoreError("NotInitialized", "the version manager has not been initialized");
    }
    return this.components;
  }

  private runUpgrade(
    account: Address,
    toVersion: VersionId,
    requester: Address,
    authorityVerified: boolean,
  ): AccountTransition {
    const key = getAddress(account);
    const result = this.ready().engine.upgrade(key, toVersion, requester, { authorityVerified });

    if (!result.ok) {
      this.publish("manager.upgrade.failed", { account: key, toVersion, reason: result.reason });
      this.recordAudit("upgrade.failed", getAddress(requester), key, { toVersion, reason: result.reason });
      this.log.warn(`Upgrade of ${key} to ${toVersion} failed: ${result.reason}`);
      throw WalletCoreError.from(result);
    }

    const { transition, plan } = result;
    this.publish("manager.account.upgraded", {
      account: key,
      fromVersion: transition.fromVersion,
      toVersion: transition.toVersion,
      added: plan.added,
      removed: plan.removed,
      initialized: transition.initialized,
    });
    this.recordAudit("account.upgraded", getAddress(requester), key, {
      fromVersion: transition.fromVersion,
      toVersion: transition.toVersion,
    });
    this.log.info(`Account ${key} upgraded ${transition.fromVersion} → ${transition.toVersion}`);
    return transition;
  }

  /** Checkpoints of the wallet and every storage that supports one */
  private checkpointExternal(): Restore {
    const restores = [this.deps.wallet, ...this.storageModules.values()].flatMap((target) =>
      target.checkpoint ? [target.checkpoint()] : [],
    );
    return () => {
      for (const restore of restores) restore();
    };
  }

  private assertAuthorized(request: AuthorizationRequest): void {
    const result = this.ready().gate.authorize(request);
    if (result.ok) return;

    const account = getAddress(request.account);
    this.publish("manager.auth.rejected", { account, caller: getAddress(request.caller), reason: result.reason });
    this.recordAudit("auth.rejected", getAddress(request.caller), account, { reason: result.reason });
    this.log.warn(`Rejected ${getAddress(request.caller)} for ${account}: ${result.reason}`);
    throw WalletCoreError.from(result);
  }

  private publish(topic: string, data: Record<string, unknown>): void {
    this.events.publish(topic, this.manifest.id, data);
  }

  private recordAudit(action: AuditAction, actor: Address, entityId: string, details: Record<string, unknown> = {}): void {
    this.auditLog.record(action, actor, entityId, details);
  }

  private registerInvariants(invariants: InvariantEngine, catalog: FeatureSetCatalog): void {
    const owner = this.manifest.id;

    invariants.register({
      name: "catalog.contiguous-versions",
      owner,
      description: "Feature-set versions run 1..last without gaps, and a new set takes last + 1",
      check: (context) => {
        const contiguous = catalog.versions().every((entry, i) => entry.version === i + 1);
        if (!isCatalogAppend(context)) return contiguous;
        return contiguous && context.entry.version === catalog.lastVersion() + 1;
      },
    });

    invariants.register({
      name: "accounts.version-exists",
      owner,
      description: "Every account is unversioned or bound to an existing feature set",
      check: (context) => {
        const accounts = isAccountUpgrade(context) ? [context.account] : this.accounts.accounts();
        return accounts.every((account) => {
          const version = this.accounts.versionOf(account);
          return version === UNVERSIONED || catalog.exists(version);
        });
      },
    });

    invariants.register({
      name: "accounts.init-once",
      owner,
      description: "A feature's initialize hook runs at most once per account",
      check: (context) => {
        const accounts = isAccountUpgrade(context) ? [context.account] : this.accounts.accounts();
        return accounts.every((account) =>
          this.accounts
            .initializedFeatures(account)
            .every((feature) => this.accounts.initCount(account, feature) <= 1),
        );
      },
    });
  }
}

export const createVersionManager = (deps: VersionManagerDeps) => new VersionManager(deps);
