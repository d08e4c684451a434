/**
 * Example Feature — Lock Manager
 *
 * A complete feature that lets a wallet's owner freeze it for a period:
 * - extends BaseFeature (plugin lifecycle + manager helpers)
 * - writes the lock through the manager's storage gate
 * - listens to upgrade events for the accounts it serves
 *
 * Usage:
 *   const feature = createLockFeature(address, manager, lockStorage.address, wallets);
 *   loader.register(feature);
 *   manager.addFeatureSet(owner, [feature]);
 */

import { encodeFunctionData, getAddress, type Address } from "viem";
import type { ManagerGateway, OwnershipOracle } from "../src/modules/manager/types.js";
import { LOCK_STORAGE_ABI } from "../src/modules/storage/lock-storage.js";
import type { PluginContext } from "../src/plugins/api.js";
import { BaseFeature } from "../src/sdk/feature-sdk.js";

export const DEFAULT_LOCK_PERIOD = 5n * 24n * 60n * 60n;

export class LockFeature extends BaseFeature {
  readonly manifest = {
    id: "lock-feature",
    name: "Lock Feature",
    version: "1.0.0",
    capabilities: ["feature"],
    dependencies: ["version-manager"],
  };

  /** Accounts that gained this feature, in upgrade order */
  readonly enabledFor: Address[] = [];

  constructor(
    address: Address,
    manager: ManagerGateway,
    private readonly lockStorage: Address,
    private readonly ownership: OwnershipOracle,
    private readonly now: () => bigint = () => BigInt(Math.floor(Date.now() / 1000)),
  ) {
    super(address, manager);
  }

  protected async onInit(_ctx: PluginContext): Promise<void> {
    this.on<{ account: Address; added: readonly Address[] }>("manager.account.upgraded", (event) => {
      if (event.data.added.includes(this.address)) this.enabledFor.push(event.data.account);
    });
  }

  lock(account: Address, requester: Address, period = DEFAULT_LOCK_PERIOD): void {
    this.requireOwner(account, requester);
    this.writeLock(account, this.now() + period);
    this.log.info(`Locked ${getAddress(account)} for ${period}s`);
  }

  unlock(account: Address, requester: Address): void {
    this.requireOwner(account, requester);
    this.writeLock(account, 0n);
    this.log.info(`Unlocked ${getAddress(account)}`);
  }

  private writeLock(account: Address, releaseAfter: bigint): void {
    const data = encodeFunctionData({
      abi: LOCK_STORAGE_ABI,
      functionName: "setLock",
      args: [getAddress(account), this.address, releaseAfter],
    });
    this.invokeStorage(account, this.lockStorage, data);
  }

  private requireOwner(account: Address, requester: Address): void {
    if (!this.ownership.isOwnerAuthority(account, requester)) {
      throw new Error(`${getAddress(requester)} is not an owner of ${getAddress(account)}`);
    }
  }
}

export const createLockFeature = (
  address: Address,
  manager: ManagerGateway,
  lockStorage: Address,
  ownership: OwnershipOracle,
  now?: () => bigint,
) => new LockFeature(address, manager, lockStorage, ownership, now);
