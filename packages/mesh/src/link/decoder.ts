// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/decoder.ts
// Turns a raw packet record (Meshtastic host-API layout) into a RadioPacket.
// Records without a numeric sender are dropped. A malformed section is left
// out of the result; the rest of the packet, and the sender, are still kept.

import { z } from "zod";
import type { PacketTelemetry, RadioPacket } from "../types/packet.js";

const metric = z
    .number()
    .nullish()
    .transform((v) => v ?? undefined);

const deviceMetricsSchema = z.object({
    batteryLevel: metric,
    voltage: metric,
    channelUtilization: metric,
    airUtilTx: metric,
});

const environmentMetricsSchema = z.object({
    temperature: metric,
    relativeHumidity: metric,
    barometricPressure: metric,
});

// Each metrics section is validated on its own, so a bad device section
// does not cost the environment readings of the same packet.
const telemetrySchema = z.object({
    time: z.number(),
    deviceMetrics: z.unknown().optional(),
    environmentMetrics: z.unknown().optional(),
});

const envelopeSchema = z.object({
    from: z.number().int().nonnegative(),
    fromId: z.string().min(1).nullish(),
    to: z.number().int().nonnegative().optional(),
    decoded: z
        .object({
            portnum: z.union([z.string(), z.number()]).optional(),
            telemetry: z.unknown().optional(),
            text: z.unknown().optional(),
        })
        .optional(),
});

function section<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T | undefined {
    if (raw === undefined || raw === null) return undefined;
    const parsed = schema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
}

function decodeTelemetry(raw: unknown): PacketTelemetry | undefined {
    const telemetry = section(telemetrySchema, raw);
    if (!telemetry) return undefined;
    return {
        time: telemetry.time,
        device: section(deviceMetricsSchema, telemetry.deviceMetrics),
        environment: section(environmentMetricsSchema, telemetry.environmentMetrics),
    };
}

/** Decode one raw record. Returns null when the record is not a usable packet. */
export function decodePacket(raw: unknown): RadioPacket | null {
    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) return null;

    const { from, fromId, to, decoded } = envelope.data;
    return {
        from,
        fromId: fromId ?? undefined,
        to,
        portnum: decoded?.portnum !== undefined ? String(decoded.portnum) : "UNKNOWN",
        telemetry: decodeTelemetry(decoded?.telemetry),
        text: typeof decoded?.text === "string" ? decoded.text : undefined,
    };
}
