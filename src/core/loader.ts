/**
 * Core Loader
 *
 * Hosts every plugin of a manager process: validates registrations, sorts
 * them by dependency, and drives the lifecycle. Features declare a
 * dependency on the version manager so the manager's invariants and event
 * topics exist before any feature initializes.
 *
 * Lifecycle:
 *   register → resolve → init (dependency order) → start → stop → destroy
 *
 * Fail-closed: a plugin that fails init or start halts the boot, and the
 * plugins already started are stopped again in reverse order.
 */

import type {
  Logger,
  LogLevel,
  Plugin,
  PluginConfig,
  PluginContext,
  PluginFactory,
  PluginId,
} from "../plugins/api.js";
import { CoreEventBus, type EventBus } from "./event-bus.js";
import { CoreInvariantEngine, type InvariantEngine } from "./invariant-engine.js";
import { createLogger } from "./logger.js";

// ─── Types ──────────────────────────────────────────────────────────

export type PluginState =
  | "registered"
  | "initialized"
  | "started"
  | "stopped"
  | "error";

interface ManagedPlugin {
  readonly plugin: Plugin;
  state: PluginState;
  readonly config: PluginConfig;
}

export interface LoaderOptions {
  /** Plugin-specific config keyed by plugin ID */
  configs?: Record<PluginId, PluginConfig>;
  /** Threshold for every logger the loader hands out (default: "info") */
  logLevel?: LogLevel;
}

// ─── Core Loader ────────────────────────────────────────────────────

export class CoreLoader {
  private readonly plugins = new Map<PluginId, ManagedPlugin>();
  private readonly eventBus = new CoreEventBus();
  private readonly invariantEngine = new CoreInvariantEngine();
  private readonly configs: Record<PluginId, PluginConfig>;
  private readonly logLevel: LogLevel;
  private readonly log: Logger;
  private bootOrder: PluginId[] = [];

  constructor(options: LoaderOptions = {}) {
    this.configs = options.configs ?? {};
    this.logLevel = options.logLevel ?? "info";
    this.log = createLogger("core", this.logLevel);
  }

  get events(): EventBus {
    return this.eventBus;
  }

  get invariants(): InvariantEngine {
    return this.invariantEngine;
  }

  /** Register a plugin instance (or factory). Does not init it. */
  register(pluginOrFactory: Plugin | PluginFactory): void {
    const plugin =
      typeof pluginOrFactory === "function" ? pluginOrFactory() : pluginOrFactory;
    const id = plugin.manifest.id;

    if (this.plugins.has(id)) {
      throw new Error(`Plugin "${id}" is already registered.`);
    }

    this.plugins.set(id, {
      plugin,
      state: "registered",
      config: this.configs[id] ?? {},
    });
    this.log.debug(`Registered plugin: ${id} v${plugin.manifest.version}`);
  }

  /** Resolve dependency order, init everything, then start everything. */
  async boot(): Promise<void> {
    this.bootOrder = this.resolveDependencies();
    this.log.info(`Booting ${this.bootOrder.length} plugin(s): ${this.bootOrder.join(" → ")}`);

    try {
      for (const id of this.bootOrder) await this.initPlugin(id);
      for (const id of this.bootOrder) await this.startPlugin(id);
    } catch (err) {
      await this.stopStarted();
      throw err;
    }

    this.eventBus.publish("core.boot.complete", "core", { plugins: this.bootOrder });
  }

  /** Stop and destroy in reverse boot order. */
  async shutdown(): Promise<void> {
    await this.stopStarted();

    for (const id of [...this.bootOrder].reverse()) {
      const { plugin } = this.managed(id);
      if (plugin.destroy) await plugin.destroy();
    }

    this.eventBus.publish("core.shutdown.complete", "core", {});
    this.log.info("Shutdown complete.");
  }

  getState(id: PluginId): PluginState | undefined {
    return this.plugins.get(id)?.state;
  }

  pluginIds(): readonly PluginId[] {
    return [...this.plugins.keys()];
  }

  getPlugin(id: PluginId): Plugin | undefined {
    return this.plugins.get(id)?.plugin;
  }

  /** Plugins declaring the given capability, in registration order */
  withCapability(capability: string): readonly Plugin[] {
    return [...this.plugins.values()]
      .map((m) => m.plugin)
      .filter((p) => p.manifest.capabilities.includes(capability));
  }

  // ── Internal Lifecycle ──────────────────────────────────────────

  private managed(id: PluginId): ManagedPlugin {
    const managed = this.plugins.get(id);
    if (!managed) throw new Error(`Plugin "${id}" is not registered.`);
    return managed;
  }

  private async initPlugin(id: PluginId): Promise<void> {
    const managed = this.managed(id);

    const ctx: PluginContext = {
      events: this.eventBus,
      invariants: this.invariantEngine,
      config: managed.config,
      log: createLogger(id, this.logLevel),
    };

    const result = await managed.plugin.init(ctx);
    if (!result.ok) {
      managed.state = "error";
      throw new Error(`Plugin "${id}" failed to initialize: ${result.message ?? "unknown error"}`);
    }
    managed.state = "initialized";
  }

  private async startPlugin(id: PluginId): Promise<void> {
    const managed = this.managed(id);
    if (managed.state !== "initialized") {
      throw new Error(`Cannot start plugin "${id}" in state "${managed.state}"`);
    }

    const result = await managed.plugin.start();
    if (!result.ok) {
      managed.state = "error";
      throw new Error(`Plugin "${id}" failed to start: ${result.message ?? "unknown error"}`);
    }
    managed.state = "started";
  }

  private async stopStarted(): Promise<void> {
    for (const id of [...this.bootOrder].reverse()) {
      const managed = this.managed(id);
      if (managed.state !== "started") continue;

      try {
        const result = await managed.plugin.stop();
        managed.state = "stopped";
        if (!result.ok) {
          this.log.warn(`Plugin "${id}" stop returned not-ok: ${result.message}`);
        }
      } catch (err) {
        managed.state = "error";
        this.log.error(`Plugin "${id}" threw during stop`, { error: String(err) });
      }
    }
  }

  // ── Dependency Resolution ───────────────────────────────────────

  /** Kahn's algorithm; registration order breaks ties. */
  private resolveDependencies(): PluginId[] {
    const ids = [...this.plugins.keys()];
    const inDegree = new Map<PluginId, number>(ids.map((id) => [id, 0]));
    const dependents = new Map<PluginId, PluginId[]>(ids.map((id) => [id, []]));

    for (const [id, { plugin }] of this.plugins) {
      for (const dep of plugin.manifest.dependencies ?? []) {
        const list = dependents.get(dep);
        if (!list) {
          throw new Error(`Plugin "${id}" depends on "${dep}", which is not registered.`);
        }
        list.push(id);
        inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
      }
    }

    const queue = ids.filter((id) => inDegree.get(id) === 0);
    const sorted: PluginId[] = [];

    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      sorted.push(current);
      for (const dependent of dependents.get(current) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) queue.push(dependent);
      }
    }

    if (sorted.length !== ids.length) {
      const cyclic = ids.filter((id) => !sorted.includes(id));
      throw new Error(`Circular dependency detected involving: ${cyclic.join(", ")}`);
    }

    return sorted;
  }
}
