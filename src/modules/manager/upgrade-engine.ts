/**
 * Upgrade Engine
 *
 * Moves an account from its current feature-set version to another one:
 *
 *   1. diff the two feature lists (added / removed)
 *   2. bind the account to the target version, which authorizes the
 *      added features
 *   3. run `initialize` for every added feature in the target's init
 *      subset that was never initialized for this account
 *
 * Hooks run after the bind so a new feature can already act through the
 * manager (write its storage, call the wallet) for the account it sets up.
 *
 * Removed features need no step of their own: authorization is derived
 * from the bound version, so rebinding is the removal.
 *
 * The whole transition commits or reverts as one unit. A failing hook or
 * a violated invariant restores the store snapshot and storage
 * checkpoints taken at entry, undoing whatever the hooks did. The
 * account is flagged "upgrading" for the duration, and a hook that calls
 * back into the engine for the same account is rejected.
 */

import { getAddress, type Address } from "viem";
import type { InvariantEngine } from "../../core/invariant-engine.js";
import type { PluginId } from "../../plugins/api.js";
import type { AccountStore } from "../../state/account-store.js";
import { reject, type GateResult } from "./errors.js";
import type { FeatureSetCatalog } from "./feature-set-catalog.js";
import type {
  AccountTransition,
  Feature,
  OwnershipOracle,
  Restore,
  UpgradePlan,
  VersionId,
} from "./types.js";

export interface UpgradeEngineDeps {
  readonly catalog: FeatureSetCatalog;
  readonly accounts: AccountStore;
  readonly ownership: OwnershipOracle;
  /** Resolves the implementation behind a feature address */
  readonly resolveFeature: (address: Address) => Feature | undefined;
  readonly invariants: InvariantEngine;
  /** Plugin whose invariants gate the commit */
  readonly invariantOwner: PluginId;
  /** Captures state outside the account store that a failed upgrade must undo */
  readonly checkpoint?: () => Restore;
}

export interface UpgradeOptions {
  /**
   * Skip the ownership oracle. Set only by callers that already proved
   * authority another way (an authorized feature of the account).
   */
  readonly authorityVerified?: boolean;
}

/** Context handed to invariants while an upgrade is being committed */
export interface UpgradeTransitionContext {
  readonly kind: "account.upgrade";
  readonly account: Address;
  readonly fromVersion: VersionId;
  readonly toVersion: VersionId;
}

export type UpgradeResult = GateResult<{
  plan: UpgradePlan;
  transition: AccountTransition;
}>;

export class UpgradeEngine {
  constructor(private readonly deps: UpgradeEngineDeps) {}

  /** Compute the authorization delta of an upgrade without executing it */
  plan(account: Address, toVersion: VersionId): GateResult<{ plan: UpgradePlan }> {
    const { catalog, accounts } = this.deps;
    const key = getAddress(account);

    const target = catalog.get(toVersion);
    if (!target) {
      return reject("InvalidVersion", `version ${toVersion} does not exist (last is ${catalog.lastVersion()})`, {
        toVersion,
      });
    }

    const fromVersion = accounts.versionOf(key);
    if (fromVersion === toVersion) {
      return reject("AlreadyOnVersion", `${key} is already on version ${toVersion}`, { toVersion });
    }

    const { added, removed } = catalog.diff(fromVersion, toVersion);
    const toInitialize = added.filter(
      (f) => target.toInitialize.includes(f) && !accounts.isInitialized(key, f),
    );

    return {
      ok: true,
      plan: { account: key, fromVersion, toVersion, added, removed, toInitialize },
    };
  }

  upgrade(
    account: Address,
    toVersion: VersionId,
    requester: Address,
    options: UpgradeOptions = {},
  ): UpgradeResult {
    const { accounts } = this.deps;
    const key = getAddress(account);

    if (!accounts.beginUpgrade(key)) {
      return reject("UpgradeInProgress", `${key} is already being upgraded`, { toVersion });
    }

    try {
      return this.execute(key, toVersion, getAddress(requester), options);
    } finally {
      accounts.endUpgrade(key);
    }
  }

  private execute(
    account: Address,
    toVersion: VersionId,
    requester: Address,
    options: UpgradeOptions,
  ): UpgradeResult {
    const { accounts, ownership, resolveFeature, invariants, invariantOwner } = this.deps;

    if (!options.authorityVerified && !ownership.isOwnerAuthority(account, requester)) {
      return reject("NotOwnerAuthority", `${requester} may not upgrade ${account}`, { requester });
    }

    const planned = this.plan(account, toVersion);
    if (!planned.ok) return planned;
    const { plan } = planned;

    const rollback = this.capture();
    accounts.setVersion(account, toVersion);
    const initialized: Address[] = [];

    for (const address of plan.toInitialize) {
      const feature = resolveFeature(address);
      if (!feature) {
        rollback();
        return reject("InitializationFailed", `no implementation bound to ${address}`, {
          feature: address,
        });
      }

      try {
        feature.initialize(account);
      } catch (err) {
        rollback();
        return reject(
          "InitializationFailed",
          `initialize() of ${address} failed: ${err instanceof Error ? err.message : String(err)}`,
          { feature: address },
          err,
        );
      }

      accounts.markInitialized(account, address);
      initialized.push(address);
    }

    const context: UpgradeTransitionContext = {
      kind: "account.upgrade",
      account,
      fromVersion: plan.fromVersion,
      toVersion,
    };
    const verdict = invariants.check(context, invariantOwner);
    if (!verdict.allowed) {
      rollback();
      return reject(
        "InvariantViolation",
        `upgrade of ${account} violates ${verdict.violations.map((v) => v.name).join(", ")}`,
        { violations: verdict.violations.map((v) => v.name) },
      );
    }

    const transition = accounts.recordTransition(account, plan.fromVersion, toVersion, initialized);
    return { ok: true, plan, transition };
  }

  private capture(): Restore {
    const { accounts, checkpoint } = this.deps;
    const snapshot = accounts.snapshot();
    const restoreExternal = checkpoint?.();
    return () => {
      restoreExternal?.();
      accounts.restore(snapshot);
    };
  }
}
