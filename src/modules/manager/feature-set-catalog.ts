/**
 * Feature-Set Catalog
 *
 * Append-only, ordered log of immutable feature sets plus the table of
 * registered storage modules. A single owner identity may append; every
 * entry stays inspectable forever, for audit and for accounts still bound
 * to it.
 *
 * Appending is two-step: `prepare` validates a candidate entry without
 * touching the log, `append` commits it. The manager checks its
 * invariants in between.
 */

import { getAddress, isAddressEqual, type Address, type Hex } from "viem";
import { reject, type GateResult } from "./errors.js";
import type { FeatureDescriptor, FeatureSet, VersionId } from "./types.js";

const SELECTOR_PATTERN = /^0x[0-9a-fA-F]{8}$/;

export class FeatureSetCatalog {
  private entries: readonly FeatureSet[] = [];
  /** version → membership set, built once per (immutable) version */
  private readonly membership = new Map<VersionId, ReadonlySet<Address>>();
  private readonly storageTable = new Set<Address>();

  constructor(readonly owner: Address) {}

  isOwner(caller: Address): boolean {
    return isAddressEqual(caller, this.owner);
  }

  // ── Storage registration ────────────────────────────────────────

  addStorage(caller: Address, storage: Address): GateResult {
    if (!this.isOwner(caller)) {
      return reject("NotCatalogOwner", `${caller} is not the catalog owner`);
    }
    const key = getAddress(storage);
    if (this.storageTable.has(key)) {
      return reject("DuplicateStorageOrModule", `storage ${key} already added`);
    }
    if (this.entries.some((e) => this.has(e.version, key))) {
      return reject("DuplicateStorageOrModule", `${key} is already listed as a feature`);
    }
    this.storageTable.add(key);
    return { ok: true };
  }

  isStorage(address: Address): boolean {
    return this.storageTable.has(getAddress(address));
  }

  storages(): readonly Address[] {
    return [...this.storageTable];
  }

  // ── Feature sets ────────────────────────────────────────────────

  /** Validate a new entry. Nothing is written. */
  prepare(
    caller: Address,
    features: readonly FeatureDescriptor[],
    toInitialize: readonly Address[],
  ): GateResult<{ entry: FeatureSet }> {
    if (!this.isOwner(caller)) {
      return reject("NotCatalogOwner", `${caller} is not the catalog owner`);
    }
    if (features.length === 0) {
      return reject("EmptyFeatureSet", "a feature set needs at least one feature");
    }

    const addresses: Address[] = [];
    for (const feature of features) {
      const key = getAddress(feature.address);
      if (addresses.includes(key)) {
        return reject("DuplicateStorageOrModule", `feature ${key} listed twice`);
      }
      if (this.storageTable.has(key)) {
        return reject("DuplicateStorageOrModule", `${key} is a registered storage`);
      }
      addresses.push(key);
    }

    const initSet: Address[] = [];
    for (const address of toInitialize) {
      const key = getAddress(address);
      if (!addresses.includes(key)) {
        return reject("InvalidInitSubset", `${key} is not part of the feature list`, { feature: key });
      }
      if (!initSet.includes(key)) initSet.push(key);
    }

    const staticCallTargets: Record<Hex, Address> = {};
    for (const feature of features) {
      for (const raw of feature.staticCallSelectors ?? []) {
        if (!SELECTOR_PATTERN.test(raw)) {
          return reject("InvalidSelector", `invalid selector ${raw}`);
        }
        const selector: Hex = `0x${raw.slice(2).toLowerCase()}`;
        const existing = staticCallTargets[selector];
        if (existing !== undefined) {
          return reject(
            "DuplicateStaticCall",
            `selector ${selector} declared by ${existing} and ${getAddress(feature.address)}`,
          );
        }
        staticCallTargets[selector] = getAddress(feature.address);
      }
    }

    const entry: FeatureSet = Object.freeze({
      version: this.lastVersion() + 1,
      features: Object.freeze(addresses),
      toInitialize: Object.freeze(initSet),
      staticCallTargets: Object.freeze(staticCallTargets),
      createdAt: new Date().toISOString(),
    });
    return { ok: true, entry };
  }

  /** Commit a prepared entry. Its version must be the next one. */
  append(entry: FeatureSet): void {
    const expected = this.lastVersion() + 1;
    if (entry.version !== expected) {
      throw new Error(`Feature set version ${entry.version} out of order (expected ${expected})`);
    }
    // New array each time: readers holding `versions()` keep their view
    this.entries = Object.freeze([...this.entries, entry]);
    this.membership.set(entry.version, new Set(entry.features));
  }

  get(version: VersionId): FeatureSet | undefined {
    if (!Number.isInteger(version) || version < 1) return undefined;
    return this.entries[version - 1];
  }

  exists(version: VersionId): boolean {
    return this.get(version) !== undefined;
  }

  lastVersion(): VersionId {
    return this.entries.length;
  }

  versions(): readonly FeatureSet[] {
    return this.entries;
  }

  /** Whether `feature` belongs to `version`. False for unknown versions. */
  has(version: VersionId, feature: Address): boolean {
    return this.membership.get(version)?.has(getAddress(feature)) ?? false;
  }

  /** Features gained and lost moving from one version to another (0 = empty set) */
  diff(from: VersionId, to: VersionId): { added: Address[]; removed: Address[] } {
    const before = this.get(from)?.features ?? [];
    const after = this.get(to)?.features ?? [];
    return {
      added: after.filter((f) => !before.includes(f)),
      removed: before.filter((f) => !after.includes(f)),
    };
  }

  staticCallTarget(version: VersionId, selector: Hex): Address | undefined {
    const entry = this.get(version);
    if (!entry) return undefined;
    const key: Hex = `0x${selector.slice(2).toLowerCase()}`;
    return entry.staticCallTargets[key];
  }
}
