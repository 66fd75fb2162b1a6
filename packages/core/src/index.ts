// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * MeshGate core: configuration, errors and logging shared by every package.
 */

export { VERSION } from "./version.js";
export type {
  MeshGateConfig,
  DeviceConfig,
  CacheConfig,
  ApiConfig,
  LogConfig,
  LogLevel,
  DeviceProtocol,
} from "./types.js";
export {
  MeshGateError,
  ConfigurationError,
  MissingParameterError,
  InvalidNodeIdError,
  NotFoundError,
  NotConnectedError,
  SendFailedError,
  TransportError,
} from "./exceptions.js";
export type { ErrorCode } from "./exceptions.js";
export { loadConfig, defaultConfig } from "./config/config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { envVar, envPort } from "./utils/env.js";
