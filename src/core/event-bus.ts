/**
 * Event Bus
 *
 * Ordered notification channel for everything the manager decides:
 * feature sets added, accounts upgraded, calls rejected, storage written.
 *
 * Properties:
 * - Ordered: events get monotonic sequence numbers
 * - Synchronous: handlers run inside the publishing call, in
 *   subscription order, so observers see decisions in commit order
 * - Isolated: a throwing handler is reported and never aborts the
 *   publisher or the remaining handlers
 */

import type { PluginId, WalletEvent } from "../plugins/api.js";

// ─── Types ──────────────────────────────────────────────────────────

export type EventHandler<T = unknown> = (event: WalletEvent<T>) => void;

/** Subscription handle — call to unsubscribe */
export type Unsubscribe = () => void;

/** Wildcard topic that receives every event */
export const WILDCARD = "*";

export interface EventBus {
  /** Publish to all matching subscribers. Returns the sequence number. */
  publish<T>(topic: string, source: PluginId, data: T): number;

  /**
   * Subscribe to a topic pattern: "*" for everything, "manager.*" for a
   * prefix, or an exact topic.
   */
  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe;

  /** Ordered event log, optionally filtered by topic pattern */
  history(pattern?: string): readonly WalletEvent[];

  /** Clear the log and all subscriptions. Resets the sequence counter. */
  reset(): void;
}

// ─── Implementation ─────────────────────────────────────────────────

interface Subscription {
  readonly topic: string;
  readonly handler: EventHandler<unknown>;
}

export class CoreEventBus implements EventBus {
  private sequence = 0;
  private readonly log: WalletEvent[] = [];
  private readonly subscriptions: Subscription[] = [];

  constructor(private readonly onHandlerError: (topic: string, err: unknown) => void = reportHandlerError) {}

  publish<T>(topic: string, source: PluginId, data: T): number {
    const event: WalletEvent<T> = {
      topic,
      source,
      timestamp: new Date().toISOString(),
      sequence: ++this.sequence,
      data,
    };

    this.log.push(event);
    this.dispatch(event);
    return event.sequence;
  }

  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe {
    const sub: Subscription = {
      topic,
      handler: (event) => handler(event as WalletEvent<T>),
    };
    this.subscriptions.push(sub);

    return () => {
      const idx = this.subscriptions.indexOf(sub);
      if (idx !== -1) this.subscriptions.splice(idx, 1);
    };
  }

  history(pattern?: string): readonly WalletEvent[] {
    if (pattern === undefined) return [...this.log];
    return this.log.filter((e) => matchesTopic(pattern, e.topic));
  }

  reset(): void {
    this.sequence = 0;
    this.log.length = 0;
    this.subscriptions.length = 0;
  }

  private dispatch(event: WalletEvent): void {
    // Snapshot: handlers may unsubscribe while we iterate
    for (const sub of [...this.subscriptions]) {
      if (!matchesTopic(sub.topic, event.topic)) continue;
      try {
        sub.handler(event);
      } catch (err) {
        this.onHandlerError(event.topic, err);
      }
    }
  }
}

/**
 * Topic matching:
 * - "*" matches everything
 * - "manager.*" matches "manager.account.upgraded", "manager.ready", …
 * - anything else matches exactly
 */
export function matchesTopic(pattern: string, topic: string): boolean {
  if (pattern === WILDCARD) return true;
  if (pattern === topic) return true;
  if (pattern.endsWith(".*")) {
    return topic.startsWith(pattern.slice(0, -1));
  }
  return false;
}

function reportHandlerError(topic: string, err: unknown): void {
  console.error(`[EventBus] handler error for topic "${topic}":`, err);
}
