/**
 * Invariant Engine
 *
 * Fail-closed enforcement of system invariants. Plugins register named
 * predicates; before a state transition is committed the owner of that
 * state asks the engine for a verdict, and any failing predicate rejects
 * the whole transition.
 *
 * Properties:
 * - Fail-closed: a predicate that throws counts as failed
 * - Synchronous: verdicts are computed inside the transition that needs them
 * - Append-only: registrations cannot be removed or replaced
 */

import type { PluginId } from "../plugins/api.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface Invariant {
  /** Unique name (e.g. "catalog.contiguous-versions") */
  readonly name: string;
  readonly owner: PluginId;
  readonly description: string;
  /**
   * Returns true if the invariant holds. `context` describes the transition
   * being checked; predicates that only inspect their owner's state may
   * ignore it.
   */
  check(context: unknown): boolean;
}

export interface InvariantResult {
  readonly name: string;
  readonly owner: PluginId;
  readonly passed: boolean;
}

export interface TransitionVerdict {
  /** True only if every checked invariant passed */
  readonly allowed: boolean;
  readonly results: readonly InvariantResult[];
  readonly violations: readonly InvariantResult[];
  readonly timestamp: string;
}

export interface InvariantEngine {
  /** Register an invariant for the lifetime of the engine */
  register(invariant: Invariant): void;

  /**
   * Check registered invariants against `context`. When `owner` is given,
   * only that plugin's invariants are evaluated.
   */
  check(context: unknown, owner?: PluginId): TransitionVerdict;

  registered(): readonly string[];

  /** Past verdicts, oldest first */
  auditLog(): readonly TransitionVerdict[];
}

// ─── Implementation ─────────────────────────────────────────────────

/** Verdicts kept in memory before the oldest are dropped */
const VERDICT_HISTORY_LIMIT = 1_000;

export class CoreInvariantEngine implements InvariantEngine {
  private readonly invariants: Invariant[] = [];
  private readonly verdicts: TransitionVerdict[] = [];

  register(invariant: Invariant): void {
    const existing = this.invariants.find((i) => i.name === invariant.name);
    if (existing) {
      throw new Error(
        `Invariant "${invariant.name}" is already registered (owner: ${existing.owner}). ` +
        `Invariants are append-only and cannot be replaced.`,
      );
    }
    this.invariants.push(invariant);
  }

  check(context: unknown, owner?: PluginId): TransitionVerdict {
    const selected = owner === undefined
      ? this.invariants
      : this.invariants.filter((i) => i.owner === owner);

    const results: InvariantResult[] = selected.map((inv) => ({
      name: inv.name,
      owner: inv.owner,
      passed: evaluate(inv, context),
    }));

    const violations = results.filter((r) => !r.passed);
    const verdict: TransitionVerdict = {
      allowed: violations.length === 0,
      results,
      violations,
      timestamp: new Date().toISOString(),
    };

    this.verdicts.push(verdict);
    if (this.verdicts.length > VERDICT_HISTORY_LIMIT) this.verdicts.shift();
    return verdict;
  }

  registered(): readonly string[] {
    return this.invariants.map((i) => i.name);
  }

  auditLog(): readonly TransitionVerdict[] {
    return [...this.verdicts];
  }
}

function evaluate(invariant: Invariant, context: unknown): boolean {
  try {
    return invariant.check(context) === true;
  } catch {
    // A predicate that cannot decide rejects the transition
    return false;
  }
}
