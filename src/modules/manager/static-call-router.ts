/**
 * Static Call Router
 *
 * Routes a read-only capability probe sent to an account (e.g. "does this
 * wallet support X?") to the feature that answers it in the account's
 * current version. Routing tables are built per version by the catalog
 * from the selectors each feature declares.
 *
 * Only a read-only execution context may be routed: the probe handler is
 * trusted to be side-effect free precisely because the context forbids
 * writes.
 */

import { getAddress, size, slice, type Address, type Hex } from "viem";
import type { AccountStore } from "../../state/account-store.js";
import { reject, type GateResult } from "./errors.js";
import type { FeatureSetCatalog } from "./feature-set-catalog.js";
import { UNVERSIONED, type CallContext, type Feature } from "./types.js";

export interface StaticCallRouterDeps {
  readonly catalog: FeatureSetCatalog;
  readonly accounts: AccountStore;
  readonly resolveFeature: (address: Address) => Feature | undefined;
}

export type StaticCallResult = GateResult<{ feature: Address; returnData: Hex }>;

export class StaticCallRouter {
  constructor(private readonly deps: StaticCallRouterDeps) {}

  route(account: Address, data: Hex, context: CallContext): StaticCallResult {
    const { catalog, accounts, resolveFeature } = this.deps;
    const key = getAddress(account);

    if (context !== "read-only") {
      return reject("StaticCallRequired", "probe routing is only allowed in a read-only context", {
        account: key,
      });
    }

    const version = accounts.versionOf(key);
    if (version === UNVERSIONED) {
      return reject("AccountNotUpgraded", `${key} has no feature-set version`, { account: key });
    }

    const selector = size(data) >= 4 ? slice(data, 0, 4) : undefined;
    const target = selector === undefined ? undefined : catalog.staticCallTarget(version, selector);
    const feature = target === undefined ? undefined : resolveFeature(target);
    if (target === undefined || !feature?.handleStaticCall) {
      return reject("StaticCallNotSupported", `static call not supported for version ${version}`, {
        account: key,
        selector,
        version,
      });
    }

    return { ok: true, feature: target, returnData: feature.handleStaticCall(key, data) };
  }
}
