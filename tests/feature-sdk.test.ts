import { describe, it, expect, beforeEach, vi } from "vitest";
import { decodeFunctionResult, encodeFunctionData, getAddress, type Address, type Hex } from "viem";
import type { AccountTransition, ManagerGateway } from "../src/modules/manager/types.js";
import { PROBE_ABI, PROBE_SELECTOR, ProbeFeature } from "../src/mocks/probe-feature.js";
import { ACCOUNT, ACCOUNT_B, FEATURE_A, LOCK_STORAGE, STRANGER } from "./fixtures.js";

const TRANSITION: AccountTransition = {
  account: ACCOUNT,
  fromVersion: 1,
  toVersion: 2,
  initialized: [],
  sequence: 1,
  timestamp: "2026-01-01T00:00:00.000Z",
};

function createGateway() {
  return {
    invokeWallet: vi.fn((): Hex => "0xbeef"),
    setOwner: vi.fn(),
    invokeStorage: vi.fn((): Hex => "0x"),
    upgradeAccountFromFeature: vi.fn((): AccountTransition => TRANSITION),
    isFeatureAuthorised: vi.fn(() => true),
  } satisfies ManagerGateway;
}

const probeData = (account: Address) =>
  encodeFunctionData({ abi: PROBE_ABI, functionName: "isProbeReady", args: [account] });

describe("BaseFeature", () => {
  let gateway: ReturnType<typeof createGateway>;
  let feature: ProbeFeature;

  beforeEach(() => {
    gateway = createGateway();
    feature = new ProbeFeature(FEATURE_A, gateway);
  });

  it("normalizes its address", () => {
    const lower: Address = "0xabcdef0000000000000000000000000000000001";
    expect(new ProbeFeature(lower, gateway).address).toBe(getAddress(lower));
  });

  it("derives a default id from the address", () => {
    expect(feature.manifest.id).toBe("probe-00000001");
    expect(feature.manifest.dependencies).toEqual(["version-manager"]);
  });

  it("forwards wallet calls with its own address as caller", () => {
    expect(feature.callWallet(ACCOUNT, STRANGER, 5n, "0x12")).toBe("0xbeef");
    expect(gateway.invokeWallet).toHaveBeenCalledWith(ACCOUNT, FEATURE_A, STRANGER, 5n, "0x12", "mutating");
  });

  it("forwards storage calls, owner changes and upgrades", () => {
    feature.callStorage(ACCOUNT, LOCK_STORAGE, "0x");
    feature.transferOwnership(ACCOUNT, STRANGER);
    feature.upgrade(ACCOUNT, 2);

    expect(gateway.invokeStorage).toHaveBeenCalledWith(ACCOUNT, FEATURE_A, LOCK_STORAGE, "0x", "mutating");
    expect(gateway.setOwner).toHaveBeenCalledWith(ACCOUNT, FEATURE_A, STRANGER, "mutating");
    expect(gateway.upgradeAccountFromFeature).toHaveBeenCalledWith(ACCOUNT, FEATURE_A, 2, "mutating");
  });

  it("asks the manager whether it is authorised", () => {
    gateway.isFeatureAuthorised.mockReturnValueOnce(false);
    expect(feature.isAuthorised(ACCOUNT)).toBe(false);
    expect(gateway.isFeatureAuthorised).toHaveBeenCalledWith(ACCOUNT, FEATURE_A);
  });
});

describe("ProbeFeature", () => {
  let gateway: ReturnType<typeof createGateway>;

  beforeEach(() => {
    gateway = createGateway();
  });

  it("declares the probe selector only when asked", () => {
    expect(new ProbeFeature(FEATURE_A, gateway).staticCallSelectors).toEqual([]);
    expect(new ProbeFeature(FEATURE_A, gateway, { answersProbe: true }).staticCallSelectors).toEqual([PROBE_SELECTOR]);
  });

  it("records initialization after the hook succeeds", () => {
    const hook = vi.fn();
    const feature = new ProbeFeature(FEATURE_A, gateway, { onInitialize: hook });

    feature.initialize(ACCOUNT);
    feature.initialize(ACCOUNT);

    expect(hook).toHaveBeenCalledTimes(2);
    expect(feature.initCount(ACCOUNT)).toBe(2);
    expect(feature.initCount(ACCOUNT_B)).toBe(0);
  });

  it("records nothing when the hook throws", () => {
    const feature = new ProbeFeature(FEATURE_A, gateway, {
      onInitialize: () => {
        throw new Error("refused");
      },
    });

    expect(() => feature.initialize(ACCOUNT)).toThrow("refused");
    expect(feature.initialized).toEqual([]);
  });

  it("answers the probe per wallet", () => {
    const feature = new ProbeFeature(FEATURE_A, gateway, { answersProbe: true });
    feature.initialize(ACCOUNT);

    const ready = (account: Address) =>
      decodeFunctionResult({
        abi: PROBE_ABI,
        functionName: "isProbeReady",
        data: feature.handleStaticCall(ACCOUNT, probeData(account)),
      });

    expect(ready(ACCOUNT)).toBe(true);
    expect(ready(ACCOUNT_B)).toBe(false);
  });
});
