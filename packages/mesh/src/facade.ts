// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/facade.ts
// QueryFacade — the one surface the API layer talks to.
// Reads return copies; parameters are checked before any store or the link is touched.

import {
    InvalidNodeIdError,
    MissingParameterError,
    NotConnectedError,
    SendFailedError,
} from "@meshgate/core";
import type { ConnectionManager } from "./connection/manager.js";
import type { TelemetryStore } from "./store/telemetry.js";
import type { MessageStore } from "./store/messages.js";
import type { NodeRegistry } from "./store/nodes.js";
import type {
    ConnectionState,
    DeviceTelemetrySample,
    EnvironmentTelemetrySample,
    MeshNodeRecord,
    StoredMessage,
} from "./types/state.js";

export interface Ack {
    status: "success";
    message: string;
}

export type ConnectionHandle = Pick<ConnectionManager, "status" | "send">;

export interface QueryFacadeDeps {
    connection: ConnectionHandle;
    telemetry: TelemetryStore;
    messages: MessageStore;
    nodes: NodeRegistry;
}

export class QueryFacade {
    constructor(private readonly deps: QueryFacadeDeps) { }

    /**
     * Send a text message, broadcast unless a target node id is given.
     * An empty target counts as no target.
     */
    async sendMessage(text: string | null | undefined, targetNodeId?: string | null): Promise<Ack> {
        if (text === undefined || text === null) {
            throw new MissingParameterError("message");
        }

        try {
            await this.deps.connection.send(text, targetNodeId || undefined);
        } catch (err) {
            if (err instanceof NotConnectedError || err instanceof InvalidNodeIdError) throw err;
            throw new SendFailedError(err instanceof Error ? err.message : String(err));
        }
        return { status: "success", message: "Message sent successfully" };
    }

    getDeviceTelemetry(): Map<number, DeviceTelemetrySample> {
        return this.deps.telemetry.snapshotDevice();
    }

    getEnvironmentTelemetry(): Map<number, EnvironmentTelemetrySample> {
        return this.deps.telemetry.snapshotEnvironment();
    }

    /** Cached messages, oldest first. */
    getLastMessages(): Map<string, StoredMessage> {
        return this.deps.messages.snapshot();
    }

    deleteMessage(messageId: string | null | undefined): Ack {
        if (messageId === undefined || messageId === null) {
            throw new MissingParameterError("message_id");
        }
        this.deps.messages.delete(messageId);
        return { status: "success", message: "Message deleted successfully" };
    }

    listNodes(): Map<number, MeshNodeRecord> {
        return this.deps.nodes.snapshot();
    }

    getStatus(): ConnectionState {
        return this.deps.connection.status();
    }
}
