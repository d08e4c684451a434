/**
 * Mock: Wallet Proxy
 *
 * Stands in for the accounts' forwarding proxies and their ownership
 * records. Forwarded calls are recorded, not executed; an owner is the
 * only owner authority of its account.
 */

import { getAddress, isAddressEqual, type Address, type Hex } from "viem";
import type { OwnershipOracle, Restore, WalletInvoker } from "../modules/manager/types.js";

export interface ForwardedCall {
  readonly account: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
}

export class InMemoryWalletProxy implements WalletInvoker, OwnershipOracle {
  private readonly owners = new Map<Address, Address>();
  readonly calls: ForwardedCall[] = [];

  /** Data returned by every forwarded call */
  returnData: Hex = "0x";

  createWallet(account: Address, owner: Address): void {
    this.owners.set(getAddress(account), getAddress(owner));
  }

  ownerOf(account: Address): Address | undefined {
    return this.owners.get(getAddress(account));
  }

  isOwnerAuthority(account: Address, requester: Address): boolean {
    const owner = this.ownerOf(account);
    return owner !== undefined && isAddressEqual(owner, requester);
  }

  invoke(account: Address, to: Address, value: bigint, data: Hex): Hex {
    this.calls.push({ account: getAddress(account), to: getAddress(to), value, data });
    return this.returnData;
  }

  setOwner(account: Address, newOwner: Address): void {
    const key = getAddress(account);
    if (!this.owners.has(key)) throw new Error(`Unknown wallet ${key}`);
    this.owners.set(key, getAddress(newOwner));
  }

  checkpoint(): Restore {
    const owners = new Map(this.owners);
    const callCount = this.calls.length;
    return () => {
      this.owners.clear();
      for (const [account, owner] of owners) this.owners.set(account, owner);
      this.calls.length = callCount;
    };
  }
}
