/**
 * Manager Audit Log
 *
 * Append-only record of every decision the version manager takes:
 * catalog changes, upgrades (committed or rolled back), rejected
 * authorizations and forwarded calls.
 */

import { isAddressEqual, type Address } from "viem";

// ─── Types ──────────────────────────────────────────────────────────

export type AuditAction =
  | "featureset.added"
  | "storage.added"
  | "account.upgraded"
  | "upgrade.failed"
  | "auth.rejected"
  | "storage.invoked"
  | "wallet.invoked"
  | "owner.changed"
  | "static.routed";

export interface AuditEntry {
  readonly id: string;
  readonly action: AuditAction;
  /** Identity that triggered the action (owner, feature or requester) */
  readonly actor: Address;
  /** Account or catalog entry the action applies to */
  readonly entityId: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}

// ─── Implementation ─────────────────────────────────────────────────

export class AuditLog {
  private readonly entries: AuditEntry[] = [];
  private counter = 0;

  record(
    action: AuditAction,
    actor: Address,
    entityId: string,
    details: Record<string, unknown> = {},
  ): AuditEntry {
    const entry: AuditEntry = {
      id: `audit-${++this.counter}`,
      action,
      actor,
      entityId,
      details,
      timestamp: new Date().toISOString(),
    };
    this.entries.push(entry);
    return entry;
  }

  all(): readonly AuditEntry[] {
    return [...this.entries];
  }

  byAction(action: AuditAction): readonly AuditEntry[] {
    return this.entries.filter((e) => e.action === action);
  }

  byActor(actor: Address): readonly AuditEntry[] {
    return this.entries.filter((e) => isAddressEqual(e.actor, actor));
  }

  byEntity(entityId: string): readonly AuditEntry[] {
    return this.entries.filter((e) => e.entityId === entityId);
  }

  /** Entries within a time range (ISO-8601 strings, inclusive) */
  byTimeRange(start: string, end: string): readonly AuditEntry[] {
    return this.entries.filter((e) => e.timestamp >= start && e.timestamp <= end);
  }

  recent(count: number): readonly AuditEntry[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }

  get size(): number {
    return this.entries.length;
  }
}
