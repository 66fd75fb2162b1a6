// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/link.ts
// RadioLink — the transport contract the bridge is written against.
// A driver opens links; a link yields decoded packets and sends text.

import type { RadioPacket } from "../types/packet.js";

export interface DeviceAddress {
    host: string;
    port: number;
}

export interface RadioLink {
    /** Numeric id of the gateway radio, known once connect() resolves. */
    readonly localNodeId: number;
    /**
     * Decoded inbound packets. Ends when the link closes cleanly,
     * throws when the transport fails.
     */
    readonly packets: AsyncIterable<RadioPacket>;
    /**
     * Send a text message, broadcast when no destination is given.
     * Rejects with InvalidNodeIdError for an unknown destination.
     */
    send(text: string, destinationId?: string): Promise<void>;
    /** Idempotent. Ends `packets`. */
    close(): Promise<void>;
}

export interface RadioDriver {
    /** Open a link, or throw. */
    connect(address: DeviceAddress, signal?: AbortSignal): Promise<RadioLink>;
}
