/**
 * Deployment files
 *
 * JSON description of a catalog: its owner, the named features and
 * storages, and the ordered feature sets. The CLI validates and replays
 * it offline to inspect versions and upgrade plans before anything is
 * deployed.
 */

import { readFile } from "node:fs/promises";
import { getAddress, isAddress, type Address, type Hex } from "viem";
import { z } from "zod";
import { WalletCoreError } from "../modules/manager/errors.js";
import { FeatureSetCatalog } from "../modules/manager/feature-set-catalog.js";
import type { FeatureDescriptor } from "../modules/manager/types.js";

// ─── Schema ─────────────────────────────────────────────────────────

const AddressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value), { message: "not a valid address" })
  .transform((value) => getAddress(value));

const SelectorSchema = z
  .string()
  .refine((value): value is Hex => /^0x[0-9a-fA-F]{8}$/.test(value), { message: "not a 4-byte selector" });

const FeatureEntrySchema = z.object({
  name: z.string().min(1),
  address: AddressSchema,
  staticCalls: z.array(SelectorSchema).default([]),
});

const StorageEntrySchema = z.object({
  name: z.string().min(1),
  address: AddressSchema,
  kind: z.literal("lock"),
});

const VersionEntrySchema = z.object({
  features: z.array(z.string()).min(1),
  initialize: z.array(z.string()).default([]),
});

export const DeploymentSchema = z
  .object({
    owner: AddressSchema,
    features: z.array(FeatureEntrySchema),
    storages: z.array(StorageEntrySchema).default([]),
    versions: z.array(VersionEntrySchema),
  })
  .superRefine((deployment, ctx) => {
    const names = new Set(deployment.features.map((f) => f.name));
    deployment.versions.forEach((version, i) => {
      for (const name of [...version.features, ...version.initialize]) {
        if (!names.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["versions", i],
            message: `unknown feature "${name}"`,
          });
        }
      }
    });
  });

export type Deployment = z.infer<typeof DeploymentSchema>;

// ─── Loading ────────────────────────────────────────────────────────

export function parseDeployment(raw: unknown, source = "deployment"): Deployment {
  const result = DeploymentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new Error(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return result.data;
}

export async function loadDeployment(
  path: string,
  readText: (path: string) => Promise<string> = (p) => readFile(p, "utf8"),
): Promise<Deployment> {
  const text = await readText(path);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseDeployment(raw, path);
}

// ─── Replay ─────────────────────────────────────────────────────────

/**
 * Replay a deployment into a fresh catalog. Fails with the first
 * rejection the catalog raises.
 */
export function buildCatalog(deployment: Deployment): FeatureSetCatalog {
  const catalog = new FeatureSetCatalog(deployment.owner);
  const byName = new Map(deployment.features.map((f) => [f.name, f]));

  for (const storage of deployment.storages) {
    const added = catalog.addStorage(deployment.owner, storage.address);
    if (!added.ok) throw WalletCoreError.from(added);
  }

  for (const version of deployment.versions) {
    const descriptors: FeatureDescriptor[] = [];
    for (const name of version.features) {
      const feature = byName.get(name);
      if (feature) descriptors.push({ address: feature.address, staticCallSelectors: feature.staticCalls });
    }
    const toInitialize = version.initialize.flatMap((name) => {
      const feature = byName.get(name);
      return feature ? [feature.address] : [];
    });

    const prepared = catalog.prepare(deployment.owner, descriptors, toInitialize);
    if (!prepared.ok) throw WalletCoreError.from(prepared);
    catalog.append(prepared.entry);
  }

  return catalog;
}

/** Feature name for an address, falling back to the address itself */
export function featureName(deployment: Deployment, address: Address): string {
  return deployment.features.find((f) => f.address === getAddress(address))?.name ?? address;
}
