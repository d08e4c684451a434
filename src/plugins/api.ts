/**
 * Wallet Version Manager — Plugin API v1
 *
 * Every component hosted by the manager process is a plugin: the version
 * manager itself, each registered storage module and each wallet feature.
 * Plugins declare their identity and lifecycle hooks; the core loader
 * validates them and orchestrates init/start/stop in dependency order.
 *
 * FROZEN: the shapes below are the v1 contract. Additive changes only.
 */

export const ARCHITECTURE_VERSION = "1.0";
export const PLUGIN_API_VERSION = "1.0";

// ─── Plugin Identity ────────────────────────────────────────────────

/** Semantic version string (e.g. "1.0.0") */
export type SemVer = string;

/** Unique plugin identifier (e.g. "version-manager", "lock-storage") */
export type PluginId = string;

/** Capability tags used for dependency resolution and inspection */
export type Capability =
  | "manager"         // the version manager itself
  | "storage"         // storage module reachable through invokeStorage
  | "feature"         // wallet capability module (guardians, limits…)
  | "probe"           // answers read-only static calls
  | string;           // extensible

/** Metadata every plugin must declare */
export interface PluginManifest {
  readonly id: PluginId;
  readonly name: string;
  readonly version: SemVer;
  readonly capabilities: readonly Capability[];
  /** IDs of plugins this plugin depends on (initialized first) */
  readonly dependencies?: readonly PluginId[];
  readonly description?: string;
}

// ─── Plugin Lifecycle ───────────────────────────────────────────────

/** Result of a lifecycle operation */
export interface LifecycleResult {
  readonly ok: boolean;
  readonly message?: string;
}

/**
 * The core plugin interface.
 *
 * Lifecycle order: manifest → init → start → (running) → stop → destroy
 */
export interface Plugin {
  /** Static metadata — must be available before init */
  readonly manifest: PluginManifest;

  /**
   * Initialize the plugin with the core context. Called once, after every
   * dependency has been initialized.
   */
  init(ctx: PluginContext): Promise<LifecycleResult>;

  /** Start the plugin. Called after all plugins have been initialized. */
  start(): Promise<LifecycleResult>;

  /** Stop the plugin. Called during shutdown in reverse boot order. */
  stop(): Promise<LifecycleResult>;

  /** Release all resources. Optional. */
  destroy?(): Promise<void>;
}

// ─── Plugin Context (injected by core) ──────────────────────────────

import type { EventBus } from "../core/event-bus.js";
import type { InvariantEngine } from "../core/invariant-engine.js";

/** Read-only configuration map */
export type PluginConfig = Readonly<Record<string, unknown>>;

/** Context injected into every plugin during init */
export interface PluginContext {
  readonly events: EventBus;
  readonly invariants: InvariantEngine;
  readonly config: PluginConfig;
  /** Logger scoped to this plugin */
  readonly log: Logger;
}

// ─── Logger ─────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Events ─────────────────────────────────────────────────────────

/** Envelope of every event on the bus */
export interface WalletEvent<T = unknown> {
  /** Dot-delimited topic (e.g. "manager.account.upgraded") */
  readonly topic: string;
  /** ID of the plugin that emitted this event */
  readonly source: PluginId;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  /** Monotonic sequence number assigned by the bus */
  readonly sequence: number;
  readonly data: T;
}

// ─── Plugin Factory ─────────────────────────────────────────────────

export type PluginFactory = () => Plugin;
