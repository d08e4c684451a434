/**
 * Mock: Module Registry
 *
 * In-memory registry of audited modules. Modules can be revoked, which
 * removes them from every account's effective authorization without a
 * feature-set change.
 */

import { getAddress, type Address } from "viem";
import type { ModuleRegistry } from "../modules/manager/types.js";

export class InMemoryModuleRegistry implements ModuleRegistry {
  private readonly modules = new Set<Address>();

  constructor(initial: readonly Address[] = []) {
    for (const address of initial) this.register(address);
  }

  register(address: Address): void {
    this.modules.add(getAddress(address));
  }

  revoke(address: Address): void {
    this.modules.delete(getAddress(address));
  }

  isRegisteredModule(address: Address): boolean {
    return this.modules.has(getAddress(address));
  }
}
