// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/store/telemetry.ts
// TelemetryStore — latest device and environment readings per node.
// The two caches are independent; a new reading replaces the old one.

import type { DeviceTelemetrySample, EnvironmentTelemetrySample } from "../types/state.js";

export class TelemetryStore {
    private readonly device = new Map<number, DeviceTelemetrySample>();
    private readonly environment = new Map<number, EnvironmentTelemetrySample>();

    upsertDevice(nodeId: number, sample: Omit<DeviceTelemetrySample, "nodeId">): void {
        this.device.set(nodeId, { ...sample, nodeId });
    }

    upsertEnvironment(nodeId: number, sample: Omit<EnvironmentTelemetrySample, "nodeId">): void {
        this.environment.set(nodeId, { ...sample, nodeId });
    }

    /** Copy of the device cache; later upserts do not show through. */
    snapshotDevice(): Map<number, DeviceTelemetrySample> {
        return new Map([...this.device].map(([id, s]) => [id, { ...s }]));
    }

    snapshotEnvironment(): Map<number, EnvironmentTelemetrySample> {
        return new Map([...this.environment].map(([id, s]) => [id, { ...s }]));
    }
}
