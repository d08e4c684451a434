/**
 * Authorization Gate
 *
 * The check run by every privileged entry point before it does any work.
 * A caller may act for an account only if it is a registered module AND a
 * member of the feature set bound to the account's current version.
 *
 * Read-only claims are verified against the execution context: a module
 * that claims "read-only" from inside a mutating call is rejected, so an
 * entry point advertised as a side-effect-free probe cannot be used to
 * smuggle a write past the owner's expectations.
 */

import { getAddress, type Address } from "viem";
import type { AccountStore } from "../../state/account-store.js";
import { reject, type GateResult } from "./errors.js";
import type { FeatureSetCatalog } from "./feature-set-catalog.js";
import {
  UNVERSIONED,
  type AuthorizationRequest,
  type LockReader,
  type ModuleRegistry,
  type VersionId,
} from "./types.js";

export interface AuthorizationGateDeps {
  readonly catalog: FeatureSetCatalog;
  readonly accounts: AccountStore;
  readonly registry: ModuleRegistry;
  readonly lock?: LockReader;
}

export type AuthorizationResult = GateResult<{ version: VersionId }>;

export class AuthorizationGate {
  constructor(private readonly deps: AuthorizationGateDeps) {}

  authorize(request: AuthorizationRequest): AuthorizationResult {
    const { catalog, accounts, registry, lock } = this.deps;
    const account = getAddress(request.account);
    const caller = getAddress(request.caller);
    const version = accounts.versionOf(account);

    if (version === UNVERSIONED) {
      return reject("AccountNotUpgraded", `${account} has no feature-set version`, { account });
    }

    if (!registry.isRegisteredModule(caller)) {
      return reject("ModuleNotAuthorized", `${caller} is not a registered module`, {
        account,
        caller,
      });
    }

    if (!catalog.has(version, caller)) {
      return reject("ModuleNotAuthorized", `${caller} is not part of version ${version}`, {
        account,
        caller,
        version,
      });
    }

    if (request.callClass === "read-only" && request.context !== "read-only") {
      return reject("StaticCallRequired", "read-only call class claimed inside a mutating context", {
        account,
        caller,
      });
    }

    if (request.callClass === "mutating" && request.context === "read-only") {
      return reject("ReadOnlyContext", "mutating call attempted inside a read-only context", {
        account,
        caller,
      });
    }

    if (request.requireUnlocked && lock?.isLocked(account)) {
      return reject("AccountLocked", `${account} is locked`, { account, caller });
    }

    return { ok: true, version };
  }

  /** Whether `feature` is authorized for `account` right now */
  isAuthorized(account: Address, feature: Address): boolean {
    const version = this.deps.accounts.versionOf(account);
    return version !== UNVERSIONED && this.deps.catalog.has(version, feature);
  }
}
