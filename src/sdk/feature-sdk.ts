/**
 * Feature SDK
 *
 * Base class for wallet features. A feature is a plugin with an address:
 * the manager authorizes it per account through feature-set membership,
 * runs its `initialize` hook on first authorization and routes the static
 * calls it declares. Every privileged action goes back through the
 * manager with the feature's own address as caller.
 */

import { getAddress, type Address, type Hex } from "viem";
import type {
  AccountTransition,
  CallContext,
  Feature,
  ManagerGateway,
  VersionId,
} from "../modules/manager/types.js";
import { BasePlugin } from "./plugin-sdk.js";

/**
 * Subclasses that answer read-only probes declare `staticCallSelectors`
 * and implement `handleStaticCall`.
 */
export abstract class BaseFeature extends BasePlugin implements Feature {
  readonly address: Address;

  constructor(
    address: Address,
    protected readonly manager: ManagerGateway,
  ) {
    super();
    this.address = getAddress(address);
  }

  initialize(account: Address): void {
    this.onInitialize(account);
  }

  /** Per-account setup. Throw to abort the upgrade that triggered it. */
  protected onInitialize(_account: Address): void {}

  isAuthorised(account: Address): boolean {
    return this.manager.isFeatureAuthorised(account, this.address);
  }

  // ── Calls through the manager ───────────────────────────────────

  protected invokeWallet(
    account: Address,
    to: Address,
    value: bigint,
    data: Hex,
    context: CallContext = "mutating",
  ): Hex {
    return this.manager.invokeWallet(account, this.address, to, value, data, context);
  }

  protected invokeStorage(account: Address, storage: Address, data: Hex, context: CallContext = "mutating"): Hex {
    return this.manager.invokeStorage(account, this.address, storage, data, context);
  }

  protected changeOwner(account: Address, newOwner: Address, context: CallContext = "mutating"): void {
    this.manager.setOwner(account, this.address, newOwner, context);
  }

  protected upgradeWallet(account: Address, toVersion: VersionId, context: CallContext = "mutating"): AccountTransition {
    return this.manager.upgradeAccountFromFeature(account, this.address, toVersion, context);
  }
}
