// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for MeshGate.
 * Reads meshgate.yaml from the working directory or ~/.meshgate/config.yaml,
 * validates with Zod, then applies MESHGATE_* environment overrides.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import type { MeshGateConfig } from "../types.js";
import { envPort, envVar } from "../utils/env.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
const DeviceProtocolSchema = z.enum(["meshtastic", "json"]);

const DeviceSchema = z.object({
  host: z.string().min(1).default("meshtastic.local"),
  // Meshtastic firmware listens for API clients on 4403
  port: z.number().int().min(1).max(65_535).default(4403),
  protocol: DeviceProtocolSchema.default("meshtastic"),
  retryIntervalMs: z.number().int().positive().default(1_000),
  connectTimeoutMs: z.number().int().positive().default(10_000),
});

const CacheSchema = z.object({
  messageCapacity: z.number().int().positive().default(100),
});

const ApiSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(1).max(65_535).default(8080),
  prefix: z
    .string()
    .regex(/^\/[\w\-/]*$/, "must start with '/'")
    .default("/api/mesh"),
  swagger: z.boolean().default(true),
});

const LogSchema = z.object({
  level: LogLevelSchema.default("info"),
  pretty: z.boolean().default(false),
});

const ConfigSchema = z.object({
  device: DeviceSchema.default({}),
  cache: CacheSchema.default({}),
  api: ApiSchema.default({}),
  log: LogSchema.default({}),
});

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

// ── Environment overrides ────────────────────────────────────────────────────

function applyEnv(config: MeshGateConfig): MeshGateConfig {
  let protocol = config.device.protocol;
  const rawProtocol = envVar("MESHGATE_DEVICE_PROTOCOL");
  if (rawProtocol) {
    const parsed = DeviceProtocolSchema.safeParse(rawProtocol.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(`MESHGATE_DEVICE_PROTOCOL: unknown protocol '${rawProtocol}'`);
    }
    protocol = parsed.data;
  }

  let level = config.log.level;
  const rawLevel = envVar("MESHGATE_LOG_LEVEL");
  if (rawLevel) {
    const parsed = LogLevelSchema.safeParse(rawLevel.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(`MESHGATE_LOG_LEVEL: unknown level '${rawLevel}'`);
    }
    level = parsed.data;
  }

  try {
    return {
      ...config,
      device: {
        ...config.device,
        host: envVar("MESHGATE_DEVICE_HOST") ?? config.device.host,
        port: envPort("MESHGATE_DEVICE_PORT") ?? config.device.port,
        protocol,
      },
      api: {
        ...config.api,
        port: envPort("MESHGATE_API_PORT") ?? config.api.port,
      },
      log: { ...config.log, level },
    };
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "meshgate.yaml",
  "config/meshgate.yaml",
  join(homedir(), ".meshgate", "config.yaml"),
];

export function loadConfig(configPath?: string): MeshGateConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: '${configPath}'`);
    }
    // No config file — defaults plus whatever the environment sets
    return applyEnv(ConfigSchema.parse({}));
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  // An empty file loads as undefined
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${found}':\n${issues}`);
  }

  return applyEnv(result.data);
}

export const defaultConfig: MeshGateConfig = ConfigSchema.parse({});
