import { describe, it, expect } from "vitest";
import { CoreLoader } from "../src/core/loader.js";
import { parseLogLevel } from "../src/core/logger.js";
import { VersionManager } from "../src/modules/manager/version-manager.js";
import { InMemoryModuleRegistry } from "../src/mocks/module-registry.js";
import { ProbeFeature } from "../src/mocks/probe-feature.js";
import { InMemoryWalletProxy } from "../src/mocks/wallet-proxy.js";
import type { Plugin, PluginContext } from "../src/plugins/api.js";
import { FEATURE_A, OWNER } from "./fixtures.js";

// ─── Helper: minimal plugin ─────────────────────────────────────────

function createMinimalPlugin(id: string, deps?: string[], trace?: string[]): Plugin {
  return {
    manifest: {
      id,
      name: id,
      version: "0.1.0",
      capabilities: [],
      ...(deps ? { dependencies: deps } : {}),
    },
    async init() {
      trace?.push(`init:${id}`);
      return { ok: true };
    },
    async start() {
      trace?.push(`start:${id}`);
      return { ok: true };
    },
    async stop() {
      trace?.push(`stop:${id}`);
      return { ok: true };
    },
  };
}

function createManager(): VersionManager {
  const wallets = new InMemoryWalletProxy();
  return new VersionManager({ registry: new InMemoryModuleRegistry(), ownership: wallets, wallet: wallets });
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("CoreLoader", () => {
  it("registers and boots plugins", async () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("solo"));

    await loader.boot();

    expect(loader.getState("solo")).toBe("started");
  });

  it("rejects duplicate plugin registration", () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("solo"));

    expect(() => loader.register(createMinimalPlugin("solo"))).toThrow(/already registered/);
  });

  it("inits every plugin in dependency order before starting any", async () => {
    const trace: string[] = [];
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("top", ["middle"], trace));
    loader.register(createMinimalPlugin("middle", ["base"], trace));
    loader.register(createMinimalPlugin("base", undefined, trace));

    await loader.boot();

    expect(trace).toEqual([
      "init:base",
      "init:middle",
      "init:top",
      "start:base",
      "start:middle",
      "start:top",
    ]);
  });

  it("throws on missing dependency", async () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("feature", ["version-manager"]));

    await expect(loader.boot()).rejects.toThrow(
      'Plugin "feature" depends on "version-manager", which is not registered.',
    );
  });

  it("throws on circular dependency", async () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("plugin-a", ["plugin-b"]));
    loader.register(createMinimalPlugin("plugin-b", ["plugin-a"]));

    await expect(loader.boot()).rejects.toThrow("Circular dependency detected involving: plugin-a, plugin-b");
  });

  it("shuts down in reverse order", async () => {
    const trace: string[] = [];
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("base", undefined, trace));
    loader.register(createMinimalPlugin("middle", ["base"], trace));
    loader.register(createMinimalPlugin("top", ["middle"], trace));

    await loader.boot();
    trace.length = 0;
    await loader.shutdown();

    expect(trace).toEqual(["stop:top", "stop:middle", "stop:base"]);
    expect(loader.getState("base")).toBe("stopped");
    expect(loader.events.history("core.shutdown.complete")).toHaveLength(1);
  });

  it("stops already-started plugins when a start fails", async () => {
    const trace: string[] = [];
    const failing: Plugin = {
      ...createMinimalPlugin("failing", ["base"], trace),
      async start() {
        return { ok: false, message: "port in use" };
      },
    };
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("base", undefined, trace));
    loader.register(failing);

    await expect(loader.boot()).rejects.toThrow('Plugin "failing" failed to start: port in use');
    expect(trace).toContain("stop:base");
    expect(loader.getState("failing")).toBe("error");
    expect(loader.getState("base")).toBe("stopped");
  });

  it("accepts plugin factories", async () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(() => createMinimalPlugin("made"));

    await loader.boot();
    expect(loader.getState("made")).toBe("started");
  });

  it("passes config to plugins via context", async () => {
    let receivedConfig: Record<string, unknown> = {};

    const configSpy: Plugin = {
      ...createMinimalPlugin("spy"),
      async init(ctx: PluginContext) {
        receivedConfig = { ...ctx.config };
        return { ok: true };
      },
    };

    const loader = new CoreLoader({
      configs: { spy: { owner: OWNER, retries: 3 } },
      logLevel: "silent",
    });
    loader.register(configSpy);
    await loader.boot();

    expect(receivedConfig).toEqual({ owner: OWNER, retries: 3 });
  });

  it("publishes core.boot.complete with the boot order", async () => {
    const loader = new CoreLoader({ logLevel: "silent" });
    loader.register(createMinimalPlugin("b", ["a"]));
    loader.register(createMinimalPlugin("a"));
    await loader.boot();

    const [event] = loader.events.history("core.boot.complete");
    expect(event.data).toEqual({ plugins: ["a", "b"] });
  });
});

describe("CoreLoader — version manager and features", () => {
  it("boots features after the manager they depend on", async () => {
    const manager = createManager();
    const feature = new ProbeFeature(FEATURE_A, manager, { id: "probe-a" });

    const loader = new CoreLoader({ configs: { "version-manager": { owner: OWNER } }, logLevel: "silent" });
    loader.register(feature);
    loader.register(manager);
    await loader.boot();

    const [event] = loader.events.history("core.boot.complete");
    expect(event.data).toEqual({ plugins: ["version-manager", "probe-a"] });
    expect(loader.withCapability("feature")).toEqual([feature]);
    expect(loader.withCapability("manager")).toEqual([manager]);
  });

  it("halts the boot when the manager config is invalid", async () => {
    const loader = new CoreLoader({ configs: { "version-manager": { owner: "nobody" } }, logLevel: "silent" });
    loader.register(createManager());

    await expect(loader.boot()).rejects.toThrow(
      'Plugin "version-manager" failed to initialize: config "owner" must be an address, got nobody',
    );
    expect(loader.getState("version-manager")).toBe("error");
  });

  it("registers the manager's invariants with the shared engine", async () => {
    const loader = new CoreLoader({ configs: { "version-manager": { owner: OWNER } }, logLevel: "silent" });
    loader.register(createManager());
    await loader.boot();

    expect(loader.invariants.registered()).toEqual([
      "catalog.contiguous-versions",
      "accounts.version-exists",
      "accounts.init-once",
    ]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back otherwise", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("silent")).toBe("silent");
    expect(parseLogLevel("loud", "warn")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
