// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/types/state.ts
// Cached records and the connection snapshot exposed to the query layer.

import type { DeviceMetrics, EnvironmentMetrics } from "./packet.js";

export interface DeviceTelemetrySample extends DeviceMetrics {
    nodeId: number;
    time: number;
}

export interface EnvironmentTelemetrySample extends EnvironmentMetrics {
    nodeId: number;
    time: number;
}

export interface StoredMessage {
    /** 10 hex chars, generated locally */
    id: string;
    nodeId: number;
    text: string;
    /** Arrival order, strictly increasing per store */
    seq: number;
    receivedAt: Date;
}

export interface MeshNodeRecord {
    nodeId: number;
    longId: string;
    firstSeenAt: Date;
}

export type LinkState =
    | "disconnected" // no link, waiting to retry
    | "connecting"   // connect() in flight
    | "connected";   // link up, forwarding packets

export interface ConnectionState {
    state: LinkState;
    isConnected: boolean;
    /** Numeric id of the gateway radio itself, once known */
    localNodeId: number | null;
    /** Successful connections since start */
    connectionAttempts: number;
    lastConnectedAt: Date | null;
}
