// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/telemetry.ts
// get_device_telemetry, get_environment_telemetry — latest reading per node.

import type { FastifyPluginAsync } from "fastify";
import type { QueryFacade } from "@meshgate/mesh";
import type { DeviceTelemetryEntry, EnvironmentTelemetryEntry } from "../types.js";

interface TelemetryRouteOptions {
    facade: QueryFacade;
}

const telemetryRoute: FastifyPluginAsync<TelemetryRouteOptions> = async (fastify, opts) => {
    const { facade } = opts;

    fastify.get(
        "/get_device_telemetry",
        {
            schema: {
                summary: "Latest device metrics per node",
                description: "Battery, voltage and airtime figures, keyed by numeric node id.",
                tags: ["Telemetry"],
            },
        },
        async (): Promise<Record<string, DeviceTelemetryEntry>> =>
            Object.fromEntries(
                [...facade.getDeviceTelemetry()].map(([nodeId, s]) => [
                    String(nodeId),
                    {
                        time: s.time,
                        deviceMetrics: {
                            batteryLevel: s.batteryLevel ?? null,
                            voltage: s.voltage ?? null,
                            channelUtilization: s.channelUtilization ?? null,
                            airUtilTx: s.airUtilTx ?? null,
                        },
                    },
                ]),
            ),
    );

    fastify.get(
        "/get_environment_telemetry",
        {
            schema: {
                summary: "Latest environment metrics per node",
                description: "Temperature, humidity and pressure, keyed by numeric node id.",
                tags: ["Telemetry"],
            },
        },
        async (): Promise<Record<string, EnvironmentTelemetryEntry>> =>
            Object.fromEntries(
                [...facade.getEnvironmentTelemetry()].map(([nodeId, s]) => [
                    String(nodeId),
                    {
                        time: s.time,
                        environmentMetrics: {
                            temperature: s.temperature ?? null,
                            relativeHumidity: s.relativeHumidity ?? null,
                            barometricPressure: s.barometricPressure ?? null,
                        },
                    },
                ]),
            ),
    );
};

export default telemetryRoute;
