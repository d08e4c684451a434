/**
 * Mock: Probe Feature
 *
 * Minimal feature that records its initialization calls and answers one
 * read-only probe, `isProbeReady(address)`, with whether it was ever
 * initialized for the wallet. Hooks can be made to fail or to call back
 * into the manager.
 */

import {
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  parseAbi,
  toFunctionSelector,
  type Address,
  type Hex,
} from "viem";
import type { ManagerGateway, VersionId } from "../modules/manager/types.js";
import type { PluginManifest } from "../plugins/api.js";
import { BaseFeature } from "../sdk/feature-sdk.js";
import { ManifestBuilder } from "../sdk/plugin-sdk.js";

export const PROBE_ABI = parseAbi(["function isProbeReady(address wallet) view returns (bool)"]);
export const PROBE_SELECTOR: Hex = toFunctionSelector("isProbeReady(address)");

export interface ProbeFeatureOptions {
  /** Plugin id; defaults to a name derived from the address */
  id?: string;
  /** Declare the probe selector (default false) */
  answersProbe?: boolean;
  /** Called from `initialize`, before it is recorded */
  onInitialize?: (account: Address) => void;
}

export class ProbeFeature extends BaseFeature {
  readonly manifest: PluginManifest;
  readonly staticCallSelectors: readonly Hex[];
  /** Accounts `initialize` ran for, in call order */
  readonly initialized: Address[] = [];
  private readonly hook: ((account: Address) => void) | undefined;

  constructor(address: Address, manager: ManagerGateway, options: ProbeFeatureOptions = {}) {
    super(address, manager);
    this.manifest = ManifestBuilder.create(options.id ?? `probe-${address.slice(-8).toLowerCase()}`)
      .name("Probe Feature")
      .capability("feature")
      .capability("probe")
      .dependency("version-manager")
      .build();
    this.staticCallSelectors = options.answersProbe ? [PROBE_SELECTOR] : [];
    this.hook = options.onInitialize;
  }

  protected onInitialize(account: Address): void {
    this.hook?.(account);
    this.initialized.push(getAddress(account));
  }

  initCount(account: Address): number {
    return this.initialized.filter((a) => a === getAddress(account)).length;
  }

  handleStaticCall(_account: Address, data: Hex): Hex {
    const { args } = decodeFunctionData({ abi: PROBE_ABI, data });
    return encodeFunctionResult({
      abi: PROBE_ABI,
      functionName: "isProbeReady",
      result: this.initCount(args[0]) > 0,
    });
  }

  // Expose the manager helpers to tests

  callWallet(account: Address, to: Address, value: bigint, data: Hex): Hex {
    return this.invokeWallet(account, to, value, data);
  }

  callStorage(account: Address, storage: Address, data: Hex): Hex {
    return this.invokeStorage(account, storage, data);
  }

  transferOwnership(account: Address, newOwner: Address): void {
    this.changeOwner(account, newOwner);
  }

  upgrade(account: Address, toVersion: VersionId): void {
    this.upgradeWallet(account, toVersion);
  }
}
