import { describe, it, expect, beforeEach } from "vitest";
import { getAddress, type Address, type Hex } from "viem";
import { FeatureSetCatalog } from "../src/modules/manager/feature-set-catalog.js";
import { StaticCallRouter } from "../src/modules/manager/static-call-router.js";
import type { Feature, FeatureDescriptor } from "../src/modules/manager/types.js";
import { AccountStore } from "../src/state/account-store.js";
import { ACCOUNT, ACCOUNT_B, FEATURE_A, FEATURE_B, OWNER } from "./fixtures.js";

const SELECTOR: Hex = "0x1626ba7e";
const OTHER_SELECTOR: Hex = "0xaabbccdd";
const PROBE: Hex = "0x1626ba7e0000000000000000000000000000000000000000000000000000000000000001";

describe("StaticCallRouter", () => {
  let catalog: FeatureSetCatalog;
  let accounts: AccountStore;
  let router: StaticCallRouter;
  let handled: Array<[Address, Hex]>;

  beforeEach(() => {
    catalog = new FeatureSetCatalog(OWNER);
    accounts = new AccountStore();
    handled = [];

    const answering: Feature = {
      address: FEATURE_A,
      staticCallSelectors: [SELECTOR],
      initialize: () => {},
      handleStaticCall: (account, data) => {
        handled.push([account, data]);
        return "0x01";
      },
    };
    // Declares a selector but has no handler
    const silent: Feature = { address: FEATURE_B, staticCallSelectors: [OTHER_SELECTOR], initialize: () => {} };
    const features = new Map<Address, Feature>([
      [FEATURE_A, answering],
      [FEATURE_B, silent],
    ]);

    const add = (descriptors: FeatureDescriptor[]) => {
      const prepared = catalog.prepare(OWNER, descriptors, []);
      if (!prepared.ok) throw new Error(prepared.message);
      catalog.append(prepared.entry);
    };
    add([answering, silent]);
    add([{ address: FEATURE_B }]);

    router = new StaticCallRouter({
      catalog,
      accounts,
      resolveFeature: (address) => features.get(getAddress(address)),
    });
    accounts.setVersion(ACCOUNT, 1);
  });

  it("routes a probe to the feature declaring its selector", () => {
    const result = router.route(ACCOUNT, PROBE, "read-only");

    expect(result).toEqual({ ok: true, feature: FEATURE_A, returnData: "0x01" });
    expect(handled).toEqual([[ACCOUNT, PROBE]]);
  });

  it("only routes inside a read-only context", () => {
    const result = router.route(ACCOUNT, PROBE, "mutating");
    expect(result.ok || result.reason).toBe("StaticCallRequired");
    expect(handled).toEqual([]);
  });

  it("rejects accounts that were never upgraded", () => {
    const result = router.route(ACCOUNT_B, PROBE, "read-only");
    expect(result.ok || result.reason).toBe("AccountNotUpgraded");
  });

  it("rejects selectors nobody declared", () => {
    const result = router.route(ACCOUNT, "0x00000000", "read-only");
    expect(result.ok || result.message).toBe("static call not supported for version 1");
  });

  it("rejects data shorter than a selector", () => {
    const result = router.route(ACCOUNT, "0x1626", "read-only");
    expect(result.ok || result.reason).toBe("StaticCallNotSupported");
  });

  it("rejects a declared selector whose feature has no handler", () => {
    const result = router.route(ACCOUNT, OTHER_SELECTOR, "read-only");
    expect(result.ok || result.reason).toBe("StaticCallNotSupported");
  });

  it("uses the routing table of the account's own version", () => {
    accounts.setVersion(ACCOUNT, 2);
    const result = router.route(ACCOUNT, PROBE, "read-only");
    expect(result.ok || result.details).toEqual({ account: ACCOUNT, selector: SELECTOR, version: 2 });
  });
});
