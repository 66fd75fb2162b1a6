// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Wire shapes for the MeshGate REST API. Field names follow the long-standing
// /api/mesh surface, so existing dashboards keep working.

import type { FastifyBaseLogger } from "fastify";
import type { ApiConfig } from "@meshgate/core";
import type { QueryFacade } from "@meshgate/mesh";

// ── Telemetry ────────────────────────────────────────────────────────────────

export interface DeviceTelemetryEntry {
    time: number;
    deviceMetrics: {
        batteryLevel: number | null;
        voltage: number | null;
        channelUtilization: number | null;
        airUtilTx: number | null;
    };
}

export interface EnvironmentTelemetryEntry {
    time: number;
    environmentMetrics: {
        temperature: number | null;
        relativeHumidity: number | null;
        barometricPressure: number | null;
    };
}

// ── Messages & nodes ─────────────────────────────────────────────────────────

// An array, not an object: numeric-looking ids would be reordered as object keys.
export interface MessageEntry {
    id: string;
    node_id: number;
    message: string;
}

export interface NodeEntry {
    long_id: string;
}

// ── Status ───────────────────────────────────────────────────────────────────

export interface StatusResponse {
    connected: boolean;
    state: "disconnected" | "connecting" | "connected";
    nodeid: string | null;
    /** Seconds since epoch */
    last_connection_time: number | null;
    total_connection_attempts: number;
}

// ── Errors ───────────────────────────────────────────────────────────────────

export interface ErrorResponse {
    error: {
        code: string;
        message: string;
    };
}

// ── Server options ───────────────────────────────────────────────────────────

export interface ApiServerOptions {
    facade: QueryFacade;
    config: ApiConfig;
    /** Shared process logger; Fastify logs through it. */
    logger?: FastifyBaseLogger;
}
