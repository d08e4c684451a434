/**
 * Storage Invocation Gate
 *
 * Forwards an authorized feature's write to a registered storage module.
 * By convention the first ABI parameter of every storage call is the
 * account it applies to; the gate requires it to equal the account the
 * feature was authorized against, so a feature cannot redirect a write to
 * another wallet's storage slot.
 *
 * The caller path must already have run the authorization gate with a
 * mutating call class; this component does not re-derive it.
 */

import {
  decodeAbiParameters,
  getAddress,
  isAddressEqual,
  size,
  slice,
  type Address,
  type Hex,
} from "viem";
import { reject, type GateResult } from "./errors.js";
import type { FeatureSetCatalog } from "./feature-set-catalog.js";
import type { StorageModule } from "./types.js";

/** 4-byte selector + one 32-byte word */
const MIN_TARGETED_CALL_SIZE = 36;

export interface StorageGateDeps {
  readonly catalog: FeatureSetCatalog;
  readonly resolveStorage: (address: Address) => StorageModule | undefined;
}

/**
 * Decode the account an encoded storage call targets: the first parameter
 * after the selector. Undefined when the data is too short to hold one.
 */
export function callTarget(data: Hex): Address | undefined {
  if (size(data) < MIN_TARGETED_CALL_SIZE) return undefined;
  const [target] = decodeAbiParameters([{ type: "address" }], slice(data, 4, MIN_TARGETED_CALL_SIZE));
  return target;
}

export class StorageInvocationGate {
  constructor(private readonly deps: StorageGateDeps) {}

  invoke(account: Address, storage: Address, data: Hex): GateResult<{ returnData: Hex }> {
    const key = getAddress(account);
    const target = callTarget(data);

    if (target === undefined || !isAddressEqual(target, key)) {
      return reject("TargetMismatch", `call data targets ${target ?? "nothing"}, not ${key}`, {
        account: key,
        target,
      });
    }

    const module = this.deps.catalog.isStorage(storage) ? this.deps.resolveStorage(storage) : undefined;
    if (!module) {
      return reject("UnregisteredStorage", `${getAddress(storage)} is not a registered storage`, {
        storage: getAddress(storage),
      });
    }

    try {
      return { ok: true, returnData: module.invoke(data) };
    } catch (err) {
      return reject(
        "StorageCallFailed",
        `${module.address} rejected the call: ${err instanceof Error ? err.message : String(err)}`,
        { storage: module.address },
        err,
      );
    }
  }
}
