// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Shared configuration types for MeshGate.
 * The bridge, the HTTP layer and the CLI all read these.
 */

/** Wire protocol spoken to the radio: Meshtastic's framed protobuf stream, or a JSON-lines gateway. */
export type DeviceProtocol = "meshtastic" | "json";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface DeviceConfig {
  /** Hostname or IP of the gateway radio. */
  host: string;
  port: number;
  protocol: DeviceProtocol;
  /** Fixed wait between failed connection attempts. */
  retryIntervalMs: number;
  /** How long a connect may take before it counts as failed. */
  connectTimeoutMs: number;
}

export interface CacheConfig {
  /** Maximum number of text messages kept in memory. */
  messageCapacity: number;
}

export interface ApiConfig {
  host: string;
  port: number;
  /** Route prefix, e.g. "/api/mesh". */
  prefix: string;
  swagger: boolean;
}

export interface LogConfig {
  level: LogLevel;
  pretty: boolean;
}

/** Full configuration schema — loaded from meshgate.yaml */
export interface MeshGateConfig {
  device: DeviceConfig;
  cache: CacheConfig;
  api: ApiConfig;
  log: LogConfig;
}
