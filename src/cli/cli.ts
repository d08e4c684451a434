/**
 * wvm CLI
 *
 * Command dispatcher for offline inspection of a wallet catalog.
 *
 * Commands:
 *   wvm status                    — core and plugin status
 *   wvm catalog <file>            — validate a deployment and list its versions
 *   wvm plan <file> <from> <to>   — features gained, lost and initialized by an upgrade
 *   wvm digest --account … --to … [--value …] [--data …] --nonce …
 *                                 — digest multi-signer owners sign for an execution
 *   wvm help                      — show usage
 */

import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { isAddress, isHex } from "viem";
import { CoreLoader } from "../core/loader.js";
import { parseLogLevel } from "../core/logger.js";
import type { FeatureSetCatalog } from "../modules/manager/feature-set-catalog.js";
import { UNVERSIONED } from "../modules/manager/types.js";
import { ARCHITECTURE_VERSION, PLUGIN_API_VERSION } from "../plugins/api.js";
import { computeExecutionDigest } from "../sdk/multisig.js";
import { buildCatalog, featureName, loadDeployment, type Deployment } from "./deployment.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface CliContext {
  loader: CoreLoader;
  args: string[];
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  /** Reads deployment files */
  readText: (path: string) => Promise<string>;
}

export interface CommandResult {
  exitCode: number;
  output?: string;
}

export type CommandHandler = (ctx: CliContext, subArgs: string[]) => Promise<CommandResult>;

// ─── Command Registry ───────────────────────────────────────────────

const commands = new Map<string, CommandHandler>();

/** Register a CLI command */
export function registerCommand(name: string, handler: CommandHandler): void {
  commands.set(name, handler);
}

// ─── Built-in Commands ──────────────────────────────────────────────

const help: CommandHandler = async (ctx) => {
  ctx.stdout("wvm — Wallet Version Manager\n\n");
  ctx.stdout("Commands:\n");
  ctx.stdout("  status                    Core and plugin status\n");
  ctx.stdout("  catalog <file>            Validate a deployment and list its feature sets\n");
  ctx.stdout("  plan <file> <from> <to>   Show what an upgrade between two versions changes\n");
  ctx.stdout("  digest                    Compute a multi-signer execution digest\n");
  ctx.stdout("                            --account <addr> --to <addr> [--value <wei>] [--data <hex>] --nonce <n>\n");
  ctx.stdout("  help                      Show this help message\n");
  return { exitCode: 0 };
};

registerCommand("help", help);

registerCommand("status", async (ctx) => {
  ctx.stdout(`wvm status (architecture ${ARCHITECTURE_VERSION}, plugin API ${PLUGIN_API_VERSION})\n`);

  const loader = ctx.loader;
  const plugins = loader.pluginIds();

  ctx.stdout(`  Plugins loaded: ${plugins.length}\n`);
  for (const id of plugins) {
    ctx.stdout(`  [${loader.getState(id)}] ${id}\n`);
  }

  ctx.stdout(`  Event history:  ${loader.events.history().length} events\n`);
  ctx.stdout(`  Invariants:     ${loader.invariants.registered().length} registered\n`);
  return { exitCode: 0 };
});

registerCommand("catalog", async (ctx, subArgs) => {
  const [file] = subArgs;
  if (!file) {
    ctx.stderr("Usage: wvm catalog <file>\n");
    return { exitCode: 1 };
  }

  const loaded = await replay(ctx, file);
  if (!loaded) return { exitCode: 1 };
  const { deployment, catalog } = loaded;

  ctx.stdout(`wvm catalog — ${file}\n`);
  ctx.stdout(`  Owner:    ${catalog.owner}\n`);
  ctx.stdout(`  Storages: ${catalog.storages().length}\n`);
  ctx.stdout(`  Versions: ${catalog.lastVersion()}\n`);

  for (const entry of catalog.versions()) {
    const routes = Object.keys(entry.staticCallTargets).length;
    ctx.stdout(`  v${entry.version}: ${entry.features.length} feature(s), ${entry.toInitialize.length} to initialize, ${routes} static call(s)\n`);
    for (const address of entry.features) {
      const marker = entry.toInitialize.includes(address) ? " (init)" : "";
      ctx.stdout(`    • ${featureName(deployment, address)}${marker}\n`);
    }
  }

  return { exitCode: 0 };
});

registerCommand("plan", async (ctx, subArgs) => {
  const [file, fromArg, toArg] = subArgs;
  if (!file || fromArg === undefined || toArg === undefined) {
    ctx.stderr("Usage: wvm plan <file> <from> <to>\n");
    return { exitCode: 1 };
  }

  const from = Number(fromArg);
  const to = Number(toArg);
  if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to < 1) {
    ctx.stderr(`Versions must be integers, <from> ≥ 0 and <to> ≥ 1 (got ${fromArg} → ${toArg})\n`);
    return { exitCode: 1 };
  }

  const loaded = await replay(ctx, file);
  if (!loaded) return { exitCode: 1 };
  const { deployment, catalog } = loaded;

  const target = catalog.get(to);
  if (!target || (from !== UNVERSIONED && !catalog.exists(from))) {
    ctx.stderr(`InvalidVersion: catalog has versions 1..${catalog.lastVersion()}\n`);
    return { exitCode: 1 };
  }
  if (from === to) {
    ctx.stderr(`AlreadyOnVersion: ${from} → ${to} changes nothing\n`);
    return { exitCode: 1 };
  }

  // Offline the init record is unknown: assume nothing was initialized yet
  const { added, removed } = catalog.diff(from, to);
  const toInitialize = added.filter((f) => target.toInitialize.includes(f));

  ctx.stdout(`wvm plan — v${from} → v${to}\n`);
  for (const address of added) {
    ctx.stdout(`  + ${featureName(deployment, address)}${toInitialize.includes(address) ? " (init)" : ""}\n`);
  }
  for (const address of removed) {
    ctx.stdout(`  - ${featureName(deployment, address)}\n`);
  }
  ctx.stdout(`  ${added.length} added, ${removed.length} removed, ${toInitialize.length} to initialize\n`);
  return { exitCode: 0 };
});

registerCommand("digest", async (ctx, subArgs) => {
  let values: Record<string, string | undefined>;
  try {
    ({ values } = parseArgs({
      args: subArgs,
      options: {
        account: { type: "string" },
        to: { type: "string" },
        value: { type: "string", default: "0" },
        data: { type: "string", default: "0x" },
        nonce: { type: "string" },
      },
    }));
  } catch (err) {
    ctx.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return { exitCode: 1 };
  }

  const { account, to, value = "0", data = "0x", nonce } = values;
  if (!account || !isAddress(account) || !to || !isAddress(to)) {
    ctx.stderr("--account and --to must be addresses\n");
    return { exitCode: 1 };
  }
  if (!isHex(data)) {
    ctx.stderr("--data must be 0x-prefixed hex\n");
    return { exitCode: 1 };
  }
  const amount = parseUint(value);
  const nonceValue = nonce === undefined ? undefined : parseUint(nonce);
  if (amount === undefined || nonceValue === undefined) {
    ctx.stderr("--value and --nonce must be non-negative integers\n");
    return { exitCode: 1 };
  }

  const digest = computeExecutionDigest({ account, to, value: amount, data, nonce: nonceValue });
  ctx.stdout(`${digest}\n`);
  return { exitCode: 0, output: digest };
});

// ─── Dispatcher ─────────────────────────────────────────────────────

/** Dispatch a CLI command by name */
export async function dispatch(ctx: CliContext): Promise<CommandResult> {
  const [command, ...subArgs] = ctx.args;

  if (!command || command === "help" || command === "--help") {
    return help(ctx, []);
  }

  const handler = commands.get(command);
  if (!handler) {
    ctx.stderr(`Unknown command: ${command}\nRun "wvm help" for usage.\n`);
    return { exitCode: 1 };
  }

  return handler(ctx, subArgs);
}

/** Get all registered command names */
export function registeredCommands(): readonly string[] {
  return [...commands.keys()];
}

// ─── Utilities ──────────────────────────────────────────────────────

/** Load and replay a deployment, reporting failures on stderr */
async function replay(
  ctx: CliContext,
  file: string,
): Promise<{ deployment: Deployment; catalog: FeatureSetCatalog } | undefined> {
  try {
    const deployment = await loadDeployment(file, ctx.readText);
    return { deployment, catalog: buildCatalog(deployment) };
  } catch (err) {
    ctx.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return undefined;
  }
}

function parseUint(text: string): bigint | undefined {
  return /^\d+$/.test(text) ? BigInt(text) : undefined;
}

// ─── Main Entry Point ───────────────────────────────────────────────

export async function main(argv?: string[]): Promise<number> {
  const args = argv ?? process.argv.slice(2);

  const loader = new CoreLoader({ logLevel: parseLogLevel(process.env.WVM_LOG_LEVEL, "warn") });
  await loader.boot();

  const ctx: CliContext = {
    loader,
    args,
    stdout: (msg) => process.stdout.write(msg),
    stderr: (msg) => process.stderr.write(msg),
    readText: (path) => readFile(path, "utf8"),
  };

  const result = await dispatch(ctx);
  await loader.shutdown();
  return result.exitCode;
}
