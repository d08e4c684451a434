/**
 * Plugin SDK
 *
 * Base classes, builders and validation for components hosted next to the
 * version manager. Storage modules and features extend `BasePlugin`
 * instead of wiring the plugin context by hand.
 */

import type {
  Capability,
  LifecycleResult,
  Logger,
  Plugin,
  PluginConfig,
  PluginContext,
  PluginManifest,
  WalletEvent,
} from "../plugins/api.js";
import type { EventBus, Unsubscribe } from "../core/event-bus.js";
import type { InvariantEngine } from "../core/invariant-engine.js";

// ─── Base Plugin ────────────────────────────────────────────────────

/**
 * Abstract base class for plugins. Lifecycle methods default to success;
 * an `onInit` that throws turns into a failed `LifecycleResult`.
 */
export abstract class BasePlugin implements Plugin {
  abstract readonly manifest: PluginManifest;

  protected events!: EventBus;
  protected log!: Logger;
  protected invariants!: InvariantEngine;
  protected config: PluginConfig = {};
  private readonly subscriptions: Unsubscribe[] = [];

  async init(ctx: PluginContext): Promise<LifecycleResult> {
    this.events = ctx.events;
    this.log = ctx.log;
    this.invariants = ctx.invariants;
    this.config = ctx.config;

    try {
      await this.onInit(ctx);
    } catch (err) {
      return { ok: false, message: err instanceof Error ? err.message : String(err) };
    }
    return { ok: true };
  }

  async start(): Promise<LifecycleResult> {
    await this.onStart();
    return { ok: true };
  }

  async stop(): Promise<LifecycleResult> {
    for (const unsubscribe of this.subscriptions.splice(0)) unsubscribe();
    await this.onStop();
    return { ok: true };
  }

  async destroy(): Promise<void> {
    await this.onDestroy();
  }

  // Override these in subclasses
  protected async onInit(_ctx: PluginContext): Promise<void> {}
  protected async onStart(): Promise<void> {}
  protected async onStop(): Promise<void> {}
  protected async onDestroy(): Promise<void> {}

  // ── Convenience Methods ─────────────────────────────────────────

  protected emit(topic: string, data: Record<string, unknown> = {}): void {
    this.events.publish(topic, this.manifest.id, data);
  }

  /** Subscribe until the plugin stops */
  protected on<T = unknown>(topic: string, handler: (event: WalletEvent<T>) => void): void {
    this.subscriptions.push(this.events.subscribe(topic, handler));
  }

  protected registerInvariant(name: string, description: string, check: (context: unknown) => boolean): void {
    this.invariants.register({ name, owner: this.manifest.id, description, check });
  }
}

// ─── Manifest Builder ───────────────────────────────────────────────

/**
 * Fluent builder for plugin manifests.
 *
 * @example
 * ```ts
 * const manifest = ManifestBuilder.create("guardian-feature")
 *   .name("Guardian Feature")
 *   .version("1.0.0")
 *   .capability("feature")
 *   .dependency("version-manager")
 *   .build();
 * ```
 */
export class ManifestBuilder {
  private readonly _id: string;
  private _name: string;
  private _version = "1.0.0";
  private _description = "";
  private readonly _capabilities: Capability[] = [];
  private readonly _dependencies: string[] = [];

  private constructor(id: string) {
    this._id = id;
    this._name = id;
  }

  static create(id: string): ManifestBuilder {
    return new ManifestBuilder(id);
  }

  name(name: string): this {
    this._name = name;
    return this;
  }

  version(version: string): this {
    this._version = version;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  capability(cap: Capability): this {
    if (!this._capabilities.includes(cap)) this._capabilities.push(cap);
    return this;
  }

  dependency(dep: string): this {
    if (!this._dependencies.includes(dep)) this._dependencies.push(dep);
    return this;
  }

  build(): PluginManifest {
    return {
      id: this._id,
      name: this._name,
      version: this._version,
      capabilities: [...this._capabilities],
      ...(this._description ? { description: this._description } : {}),
      ...(this._dependencies.length > 0 ? { dependencies: [...this._dependencies] } : {}),
    };
  }
}

// ─── Plugin Validator ───────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate a plugin before registration */
export function validatePlugin(plugin: Plugin): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const m = plugin.manifest;

  if (!m.id) {
    errors.push("Manifest must have a non-empty 'id'");
  } else if (!/^[a-z][a-z0-9-]*$/.test(m.id)) {
    errors.push("Manifest 'id' must be lowercase alphanumeric with hyphens (e.g., 'lock-storage')");
  }
  if (!m.name) {
    warnings.push("Manifest should have a 'name'");
  }
  if (!m.version) {
    errors.push("Manifest must have a 'version'");
  } else if (!/^\d+\.\d+\.\d+/.test(m.version)) {
    warnings.push("Manifest 'version' should follow semver (e.g., '1.0.0')");
  }
  if (m.capabilities.length === 0) {
    warnings.push("Manifest should declare at least one capability");
  }
  if (m.capabilities.includes("feature") && !m.dependencies?.includes("version-manager")) {
    warnings.push("Features should depend on 'version-manager'");
  }
  if (m.dependencies?.includes(m.id)) {
    errors.push("Plugin cannot depend on itself");
  }

  return { valid: errors.length === 0, errors, warnings };
}
