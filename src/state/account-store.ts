/**
 * Account Store
 *
 * Per-account state owned by the version manager: the bound feature-set
 * version, the upgrade status flag and the "ever initialized" record of
 * every (account, feature) pair. Committed version changes are appended to
 * a transition log.
 *
 * Properties:
 * - Records are created implicitly on first write and never deleted
 * - Initialization records are independent of version and never cleared
 * - Snapshots cover the whole store (records, initialization records and
 *   the transition log), which is how an aborted upgrade is rolled back
 */

import { getAddress, type Address } from "viem";
import {
  UNVERSIONED,
  type AccountRecord,
  type AccountTransition,
  type UpgradeStatus,
  type VersionId,
} from "../modules/manager/types.js";

// ─── Types ──────────────────────────────────────────────────────────

/** Point-in-time copy of every account's state */
export interface AccountStoreSnapshot {
  readonly records: ReadonlyMap<Address, AccountRecord>;
  /** account → feature → number of times its hook ran */
  readonly initCounts: ReadonlyMap<Address, ReadonlyMap<Address, number>>;
  readonly logLength: number;
  /** Last transition sequence number at snapshot time */
  readonly sequence: number;
}

// ─── Implementation ─────────────────────────────────────────────────

export class AccountStore {
  private readonly records = new Map<Address, AccountRecord>();
  private readonly initCounts = new Map<Address, Map<Address, number>>();
  private readonly statuses = new Map<Address, UpgradeStatus>();
  private readonly log: AccountTransition[] = [];
  private sequence = 0;

  get(account: Address): AccountRecord | undefined {
    return this.records.get(getAddress(account));
  }

  /** Bound version, 0 for accounts never upgraded */
  versionOf(account: Address): VersionId {
    return this.get(account)?.currentVersion ?? UNVERSIONED;
  }

  setVersion(account: Address, version: VersionId): AccountRecord {
    const key = getAddress(account);
    const record: AccountRecord = {
      account: key,
      currentVersion: version,
      updatedAt: new Date().toISOString(),
    };
    this.records.set(key, record);
    return record;
  }

  accounts(): readonly Address[] {
    return [...this.records.keys()];
  }

  // ── Upgrade status ──────────────────────────────────────────────

  statusOf(account: Address): UpgradeStatus {
    return this.statuses.get(getAddress(account)) ?? "idle";
  }

  /**
   * Move `account` from idle to upgrading. Returns false if it is already
   * upgrading, in which case nothing changes.
   */
  beginUpgrade(account: Address): boolean {
    const key = getAddress(account);
    if (this.statuses.get(key) === "upgrading") return false;
    this.statuses.set(key, "upgrading");
    return true;
  }

  endUpgrade(account: Address): void {
    this.statuses.delete(getAddress(account));
  }

  // ── Initialization record ───────────────────────────────────────

  isInitialized(account: Address, feature: Address): boolean {
    return this.initCount(account, feature) > 0;
  }

  initCount(account: Address, feature: Address): number {
    return this.initCounts.get(getAddress(account))?.get(getAddress(feature)) ?? 0;
  }

  markInitialized(account: Address, feature: Address): void {
    const key = getAddress(account);
    let counts = this.initCounts.get(key);
    if (!counts) {
      counts = new Map();
      this.initCounts.set(key, counts);
    }
    const featureKey = getAddress(feature);
    counts.set(featureKey, (counts.get(featureKey) ?? 0) + 1);
  }

  initializedFeatures(account: Address): readonly Address[] {
    return [...(this.initCounts.get(getAddress(account))?.keys() ?? [])];
  }

  // ── Transition log ──────────────────────────────────────────────

  recordTransition(
    account: Address,
    fromVersion: VersionId,
    toVersion: VersionId,
    initialized: readonly Address[],
  ): AccountTransition {
    const transition: AccountTransition = {
      account: getAddress(account),
      fromVersion,
      toVersion,
      initialized: [...initialized],
      sequence: ++this.sequence,
      timestamp: new Date().toISOString(),
    };
    this.log.push(transition);
    return transition;
  }

  transitions(account?: Address): readonly AccountTransition[] {
    if (account === undefined) return [...this.log];
    const key = getAddress(account);
    return this.log.filter((t) => t.account === key);
  }

  // ── Snapshots ───────────────────────────────────────────────────

  snapshot(): AccountStoreSnapshot {
    const initCounts = new Map<Address, ReadonlyMap<Address, number>>();
    for (const [account, counts] of this.initCounts) initCounts.set(account, new Map(counts));
    return {
      records: new Map(this.records),
      initCounts,
      logLength: this.log.length,
      sequence: this.sequence,
    };
  }

  /**
   * Put every account back to `snapshot`. Upgrade statuses are not part of
   * the snapshot; the engine clears them on its own exit path.
   */
  restore(snapshot: AccountStoreSnapshot): void {
    this.records.clear();
    for (const [account, record] of snapshot.records) this.records.set(account, record);

    this.initCounts.clear();
    for (const [account, counts] of snapshot.initCounts) this.initCounts.set(account, new Map(counts));

    this.log.length = snapshot.logLength;
    this.sequence = snapshot.sequence;
  }
}
