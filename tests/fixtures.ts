/**
 * Shared wiring for manager tests: a booted loader with the version
 * manager and lock storage, stand-in registry and wallet proxy, and a
 * factory for registered probe features.
 */

import type { Address } from "viem";
import { CoreLoader } from "../src/core/loader.js";
import { WalletCoreError } from "../src/modules/manager/errors.js";
import { VersionManager } from "../src/modules/manager/version-manager.js";
import { LockStorage, type Clock } from "../src/modules/storage/lock-storage.js";
import { InMemoryModuleRegistry } from "../src/mocks/module-registry.js";
import { ProbeFeature, type ProbeFeatureOptions } from "../src/mocks/probe-feature.js";
import { InMemoryWalletProxy } from "../src/mocks/wallet-proxy.js";
import type { Plugin } from "../src/plugins/api.js";

// Digit-only addresses are their own checksummed form
export const OWNER: Address = "0x1000000000000000000000000000000000000001";
export const WALLET_OWNER: Address = "0x1000000000000000000000000000000000000002";
export const STRANGER: Address = "0x1000000000000000000000000000000000000009";

export const FEATURE_A: Address = "0x2000000000000000000000000000000000000001";
export const FEATURE_B: Address = "0x2000000000000000000000000000000000000002";
export const FEATURE_C: Address = "0x2000000000000000000000000000000000000003";
export const FEATURE_D: Address = "0x2000000000000000000000000000000000000004";

export const LOCK_STORAGE: Address = "0x3000000000000000000000000000000000000001";

export const ACCOUNT: Address = "0x4000000000000000000000000000000000000001";
export const ACCOUNT_B: Address = "0x4000000000000000000000000000000000000002";

export const FIXED_NOW = 1_000n;
export const fixedClock: Clock = () => FIXED_NOW;

export interface ManagerHarness {
  loader: CoreLoader;
  manager: VersionManager;
  registry: InMemoryModuleRegistry;
  wallets: InMemoryWalletProxy;
  lockStorage: LockStorage;
  /** New probe feature, already registered in the module registry */
  feature: (address: Address, options?: ProbeFeatureOptions) => ProbeFeature;
}

/** Extra plugins booted alongside the manager, built from the harness parts */
export type ExtraPlugins = (parts: {
  manager: VersionManager;
  registry: InMemoryModuleRegistry;
  wallets: InMemoryWalletProxy;
}) => Plugin[];

export async function bootManager(extraPlugins: ExtraPlugins = () => []): Promise<ManagerHarness> {
  const registry = new InMemoryModuleRegistry();
  const wallets = new InMemoryWalletProxy();
  wallets.createWallet(ACCOUNT, WALLET_OWNER);
  wallets.createWallet(ACCOUNT_B, WALLET_OWNER);

  const lockStorage = new LockStorage(LOCK_STORAGE, fixedClock);
  const manager = new VersionManager({ registry, ownership: wallets, wallet: wallets, lock: lockStorage });

  const loader = new CoreLoader({
    configs: { "version-manager": { owner: OWNER } },
    logLevel: "silent",
  });
  loader.register(manager);
  loader.register(lockStorage);
  for (const plugin of extraPlugins({ manager, registry, wallets })) loader.register(plugin);
  await loader.boot();

  const feature = (address: Address, options?: ProbeFeatureOptions) => {
    registry.register(address);
    return new ProbeFeature(address, manager, options);
  };

  return { loader, manager, registry, wallets, lockStorage, feature };
}

/** Run `fn` and return the WalletCoreError it throws */
export function rejectionOf(fn: () => unknown): WalletCoreError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WalletCoreError) return err;
    throw err;
  }
  throw new Error("expected a WalletCoreError, nothing was thrown");
}
