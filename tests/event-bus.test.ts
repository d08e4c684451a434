import { describe, it, expect, beforeEach } from "vitest";
import { CoreEventBus, WILDCARD, matchesTopic } from "../src/core/event-bus.js";
import type { WalletEvent } from "../src/plugins/api.js";

describe("CoreEventBus", () => {
  let bus: CoreEventBus;
  let handlerErrors: Array<{ topic: string; err: unknown }>;

  beforeEach(() => {
    handlerErrors = [];
    bus = new CoreEventBus((topic, err) => handlerErrors.push({ topic, err }));
  });

  it("assigns monotonic sequence numbers", () => {
    expect(bus.publish("a", "test", {})).toBe(1);
    expect(bus.publish("b", "test", {})).toBe(2);
    expect(bus.publish("c", "test", {})).toBe(3);
  });

  it("delivers events to exact-topic subscribers", () => {
    const received: WalletEvent[] = [];
    bus.subscribe("manager.ready", (e) => received.push(e));

    bus.publish("manager.ready", "version-manager", { lastVersion: 0 });
    bus.publish("manager.auth.rejected", "version-manager", {});

    expect(received).toHaveLength(1);
    expect(received[0].topic).toBe("manager.ready");
    expect(received[0].source).toBe("version-manager");
    expect(received[0].data).toEqual({ lastVersion: 0 });
  });

  it("delivers events to wildcard subscribers", () => {
    const received: WalletEvent[] = [];
    bus.subscribe(WILDCARD, (e) => received.push(e));

    bus.publish("manager.ready", "m", {});
    bus.publish("storage.lock.changed", "lock-storage", {});

    expect(received).toHaveLength(2);
  });

  it("supports prefix-wildcard matching (topic.*)", () => {
    const received: WalletEvent[] = [];
    bus.subscribe("manager.*", (e) => received.push(e));

    bus.publish("manager.account.upgraded", "m", {});
    bus.publish("manager.ready", "m", {});
    bus.publish("storage.lock.changed", "s", {});

    expect(received.map((e) => e.topic)).toEqual(["manager.account.upgraded", "manager.ready"]);
  });

  it("unsubscribe stops delivery", () => {
    const received: WalletEvent[] = [];
    const unsub = bus.subscribe("test", (e) => received.push(e));

    bus.publish("test", "src", { n: 1 });
    unsub();
    bus.publish("test", "src", { n: 2 });

    expect(received).toHaveLength(1);
    expect(received[0].data).toEqual({ n: 1 });
  });

  it("a handler unsubscribing itself does not skip the next handler", () => {
    const order: string[] = [];
    const unsubFirst = bus.subscribe("t", () => {
      order.push("first");
      unsubFirst();
    });
    bus.subscribe("t", () => order.push("second"));

    bus.publish("t", "s", {});
    bus.publish("t", "s", {});

    expect(order).toEqual(["first", "second", "second"]);
  });

  it("handlers run synchronously inside publish", () => {
    let seen = 0;
    bus.subscribe("t", () => seen++);
    bus.publish("t", "s", {});
    expect(seen).toBe(1);
  });

  it("preserves full ordered history and filters it by pattern", () => {
    bus.publish("manager.ready", "m", {});
    bus.publish("core.boot.complete", "core", {});
    bus.publish("manager.featureset.added", "m", {});

    expect(bus.history().map((e) => e.sequence)).toEqual([1, 2, 3]);
    expect(bus.history("manager.*").map((e) => e.topic)).toEqual([
      "manager.ready",
      "manager.featureset.added",
    ]);
  });

  it("reset clears history, subscriptions and sequence", () => {
    let calls = 0;
    bus.subscribe("a", () => calls++);
    bus.publish("a", "s", {});
    bus.reset();

    expect(bus.history()).toHaveLength(0);
    expect(bus.publish("a", "s", {})).toBe(1);
    expect(calls).toBe(1);
  });

  it("reports handler errors without stopping dispatch", () => {
    const received: string[] = [];
    const boom = new Error("boom");

    bus.subscribe("test", () => {
      throw boom;
    });
    bus.subscribe("test", (e) => {
      received.push(e.topic);
    });

    bus.publish("test", "s", {});

    expect(received).toEqual(["test"]);
    expect(handlerErrors).toEqual([{ topic: "test", err: boom }]);
  });

  it("events have ISO-8601 timestamps", () => {
    bus.publish("test", "s", {});
    const event = bus.history()[0];
    expect(new Date(event.timestamp).toISOString()).toBe(event.timestamp);
  });
});

describe("matchesTopic", () => {
  it("matches exact topics, prefixes and the wildcard", () => {
    expect(matchesTopic("*", "anything.at.all")).toBe(true);
    expect(matchesTopic("manager.ready", "manager.ready")).toBe(true);
    expect(matchesTopic("manager.*", "manager.account.upgraded")).toBe(true);
    expect(matchesTopic("manager.*", "managers.ready")).toBe(false);
    expect(matchesTopic("manager.ready", "manager.ready.later")).toBe(false);
  });
});
