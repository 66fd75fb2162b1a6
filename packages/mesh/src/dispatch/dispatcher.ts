// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/dispatch/dispatcher.ts
// EventDispatcher — routes each decoded packet into the caches.
// Every rule is checked on its own, so one packet can hit several stores:
// device metrics, environment metrics, text and the sender's long id.

import { silentLogger, type Logger } from "@meshgate/core";
import type { RadioPacket } from "../types/packet.js";
import type { TelemetryStore } from "../store/telemetry.js";
import type { MessageStore } from "../store/messages.js";
import type { NodeRegistry } from "../store/nodes.js";

export interface DispatcherStores {
    telemetry: TelemetryStore;
    messages: MessageStore;
    nodes: NodeRegistry;
}

export class EventDispatcher {
    private readonly log: Logger;

    constructor(
        private readonly stores: DispatcherStores,
        logger?: Logger,
    ) {
        this.log = logger ?? silentLogger();
    }

    onPacket(packet: RadioPacket): void {
        this.log.debug({ from: packet.from, to: packet.to, portnum: packet.portnum }, "packet received");

        const { telemetry, text } = packet;
        if (telemetry?.device) {
            this.stores.telemetry.upsertDevice(packet.from, { time: telemetry.time, ...telemetry.device });
        }
        if (telemetry?.environment) {
            this.stores.telemetry.upsertEnvironment(packet.from, { time: telemetry.time, ...telemetry.environment });
        }
        if (text !== undefined) {
            const id = this.stores.messages.insert(packet.from, text);
            this.log.info({ from: packet.from, id }, "text message cached");
        }

        if (packet.fromId && this.stores.nodes.registerIfAbsent(packet.from, packet.fromId)) {
            this.log.info({ nodeId: packet.from, longId: packet.fromId }, "new node seen");
        }
    }
}
