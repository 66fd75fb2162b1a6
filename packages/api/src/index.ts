// © 2026 LearnHubPlay BV. All rights reserved.
// packages/api/src/index.ts — public API for @meshgate/api

export { createServer } from "./server.js";
export type {
    ApiServerOptions,
    DeviceTelemetryEntry,
    EnvironmentTelemetryEntry,
    ErrorResponse,
    MessageEntry,
    NodeEntry,
    StatusResponse,
} from "./types.js";
