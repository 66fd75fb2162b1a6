// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/types/packet.ts
// Decoded radio packets. Built once at the link boundary by decodePacket();
// everything past the link works on these types only.

export interface DeviceMetrics {
    /** 0–100, 101 means externally powered */
    batteryLevel?: number;
    voltage?: number;
    /** Percent of airtime the node hears in use */
    channelUtilization?: number;
    /** Percent of airtime the node itself transmitted */
    airUtilTx?: number;
}

export interface EnvironmentMetrics {
    /** Celsius */
    temperature?: number;
    relativeHumidity?: number;
    /** hPa */
    barometricPressure?: number;
}

/** Telemetry section of a packet. Either metrics section may be missing. */
export interface PacketTelemetry {
    /** Seconds since epoch, as reported by the sending node */
    time: number;
    device?: DeviceMetrics;
    environment?: EnvironmentMetrics;
}

// A packet can carry any combination of sections; each one that is present
// is handled on its own. Position, routing, admin… carry neither and are not cached.
export interface RadioPacket {
    /** Numeric id of the sending node */
    from: number;
    /** Long-form id of the sender, e.g. "!a1b2c3d4" */
    fromId?: string;
    to?: number;
    /** Application port name, e.g. "TEXT_MESSAGE_APP" */
    portnum: string;
    telemetry?: PacketTelemetry;
    text?: string;
}
