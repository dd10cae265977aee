/**
 * JSON config for networks.
 *
 * Named configs live in `configs/network/<name>.json` at the repo root.
 * A config file may be partial; missing fields take their defaults.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { NetworkConfig } from "@roadnet/types";
import { InvalidSpeedLimitError } from "../errors.js";
import { DEFAULT_SPEED_LIMIT, SPEED_OF_LIGHT } from "../roads/constants.js";
import { buildIdentificationRules } from "../roads/identification.js";

export const DEFAULT_NETWORK_CONFIG: NetworkConfig = {
  identification: {
    extraLengths: [],
    extraCharacters: [],
  },
  defaultSpeedLimit: DEFAULT_SPEED_LIMIT,
};

const networkConfigSchema = z.object({
  identification: z
    .object({
      extraLengths: z.array(z.number()).default([]),
      extraCharacters: z.array(z.string()).default([]),
    })
    .default({}),
  defaultSpeedLimit: z.number().default(DEFAULT_SPEED_LIMIT),
});

/**
 * Validate a raw config object.
 *
 * @throws ZodError if the shape is wrong
 * @throws InvalidLengthError if an extra identification length is out of range
 * @throws InvalidSpeedLimitError if the default speed limit is out of range
 */
export function parseNetworkConfig(raw: unknown): NetworkConfig {
  const config = networkConfigSchema.parse(raw);
  // Fail on bad lengths now rather than when the first network is built
  buildIdentificationRules(config.identification.extraLengths, config.identification.extraCharacters);
  if (!(config.defaultSpeedLimit > 0 && config.defaultSpeedLimit <= SPEED_OF_LIGHT)) {
    throw new InvalidSpeedLimitError(config.defaultSpeedLimit);
  }
  return config;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/network/`.
 * Works from both source (packages/routing/src/config/) and compiled (dist/routing/src/config/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "network");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "network");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load a named network config. Falls back to the defaults when the file does not exist. */
export function loadNetworkConfig(name = "default", configsRoot = findConfigsRoot()): NetworkConfig {
  const filePath = join(configsRoot, `${name}.json`);
  if (!existsSync(filePath)) {
    console.log(`[config] ${filePath} not found, using default network config`);
    return DEFAULT_NETWORK_CONFIG;
  }

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const config = parseNetworkConfig(raw);
  console.log(`[config] Loaded network config "${name}"`);
  return config;
}

/** List the names of all config files in the configs directory. */
export function listNetworkConfigs(configsRoot = findConfigsRoot()): string[] {
  if (!existsSync(configsRoot)) return [];
  return readdirSync(configsRoot)
    .filter((f) => f.endsWith(".json"))
    .map((f) => f.slice(0, -".json".length))
    .sort();
}
