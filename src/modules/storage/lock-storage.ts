/**
 * Lock Storage
 *
 * Storage module holding each wallet's lock: who set it and until when it
 * holds. Features write it through the manager's `invokeStorage` with
 * ABI-encoded calls whose first parameter is the wallet; the manager reads
 * it back through `isLocked` to refuse forwarded calls on a locked wallet.
 *
 * Capabilities: storage
 * Events emitted: storage.lock.changed
 */

import {
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  parseAbi,
  zeroAddress,
  type Address,
  type Hex,
} from "viem";
import type { LockReader, Restore, StorageModule } from "../manager/types.js";
import { BasePlugin } from "../../sdk/plugin-sdk.js";

export const LOCK_STORAGE_ABI = parseAbi([
  "function setLock(address wallet, address locker, uint64 releaseAfter)",
  "function getLock(address wallet) view returns (uint64)",
  "function getLocker(address wallet) view returns (address)",
]);

export interface LockRecord {
  readonly locker: Address;
  /** Unix seconds; the lock holds while the clock is strictly below it */
  readonly releaseAfter: bigint;
}

/** Current time in unix seconds */
export type Clock = () => bigint;

const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export class LockStorage extends BasePlugin implements StorageModule, LockReader {
  readonly manifest = {
    id: "lock-storage",
    name: "Lock Storage",
    version: "1.0.0",
    capabilities: ["storage"],
    description: "Per-wallet lock with locker and release time",
  };

  private readonly locks = new Map<Address, LockRecord>();

  constructor(
    readonly address: Address,
    private readonly clock: Clock = systemClock,
  ) {
    super();
  }

  /** Execute an ABI-encoded call. Unknown selectors throw. */
  invoke(data: Hex): Hex {
    const call = decodeFunctionData({ abi: LOCK_STORAGE_ABI, data });

    switch (call.functionName) {
      case "setLock": {
        const [wallet, locker, releaseAfter] = call.args;
        this.setLock(wallet, locker, releaseAfter);
        return "0x";
      }
      case "getLock":
        return encodeFunctionResult({
          abi: LOCK_STORAGE_ABI,
          functionName: "getLock",
          result: this.getLock(call.args[0]).releaseAfter,
        });
      case "getLocker":
        return encodeFunctionResult({
          abi: LOCK_STORAGE_ABI,
          functionName: "getLocker",
          result: this.getLock(call.args[0]).locker,
        });
    }
  }

  getLock(wallet: Address): LockRecord {
    return this.locks.get(getAddress(wallet)) ?? { locker: zeroAddress, releaseAfter: 0n };
  }

  isLocked(wallet: Address): boolean {
    return this.getLock(wallet).releaseAfter > this.clock();
  }

  checkpoint(): Restore {
    const saved = new Map(this.locks);
    return () => {
      this.locks.clear();
      for (const [wallet, record] of saved) this.locks.set(wallet, record);
    };
  }

  private setLock(wallet: Address, locker: Address, releaseAfter: bigint): void {
    const key = getAddress(wallet);
    const record: LockRecord = { locker: getAddress(locker), releaseAfter };
    this.locks.set(key, record);

    // unbooted instances have no bus
    if (this.events) {
      this.emit("storage.lock.changed", { wallet: key, locker: record.locker, releaseAfter });
    }
  }
}

export const createLockStorage = (address: Address, clock?: Clock) => new LockStorage(address, clock);
