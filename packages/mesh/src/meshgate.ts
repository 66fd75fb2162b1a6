// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/meshgate.ts
// MeshGate — wires the radio bridge together. Stores are built once here and
// shared by the ingestion path and the query facade.
//
// Usage:
//   const gate = new MeshGate({ configPath: "./meshgate.yaml" })
//   gate.start()
//   gate.facade.getLastMessages()
//   await gate.stop()

import { loadConfig, silentLogger, type Logger, type MeshGateConfig } from "@meshgate/core";
import { TelemetryStore } from "./store/telemetry.js";
import { MessageStore } from "./store/messages.js";
import { NodeRegistry } from "./store/nodes.js";
import { EventDispatcher } from "./dispatch/dispatcher.js";
import { ConnectionManager } from "./connection/manager.js";
import { QueryFacade } from "./facade.js";
import { TcpJsonDriver } from "./link/tcp-json.js";
import { MeshtasticDriver } from "./link/meshtastic.js";
import type { RadioDriver } from "./link/link.js";

export interface MeshGateOptions {
    configPath?: string;
    config?: MeshGateConfig;
    /** Transport; defaults to the driver named by `device.protocol`. */
    driver?: RadioDriver;
    logger?: Logger;
}

export class MeshGate {
    readonly config: MeshGateConfig;
    readonly telemetry = new TelemetryStore();
    readonly messages: MessageStore;
    readonly nodes = new NodeRegistry();
    readonly connection: ConnectionManager;
    readonly facade: QueryFacade;

    private readonly log: Logger;
    private abort: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(opts: MeshGateOptions = {}) {
        this.config = opts.config ?? loadConfig(opts.configPath);
        this.log = opts.logger ?? silentLogger();

        this.messages = new MessageStore({ capacity: this.config.cache.messageCapacity });

        const dispatcher = new EventDispatcher(
            { telemetry: this.telemetry, messages: this.messages, nodes: this.nodes },
            this.log.child({ component: "dispatcher" }),
        );

        const driver = opts.driver ?? this.createDriver();

        this.connection = new ConnectionManager({
            driver,
            address: { host: this.config.device.host, port: this.config.device.port },
            dispatcher,
            retryIntervalMs: this.config.device.retryIntervalMs,
            logger: this.log.child({ component: "connection" }),
        });

        this.facade = new QueryFacade({
            connection: this.connection,
            telemetry: this.telemetry,
            messages: this.messages,
            nodes: this.nodes,
        });
    }

    private createDriver(): RadioDriver {
        const driverOpts = {
            connectTimeoutMs: this.config.device.connectTimeoutMs,
            logger: this.log.child({ component: "link" }),
        };
        switch (this.config.device.protocol) {
            case "meshtastic":
                return new MeshtasticDriver(driverOpts);
            case "json":
                return new TcpJsonDriver(driverOpts);
        }
    }

    /** Start the background connect/forward loop. Returns immediately. */
    start(): void {
        if (this.loop) return;
        const abort = new AbortController();
        this.abort = abort;
        this.loop = this.connection.run(abort.signal).catch((err: unknown) => {
            this.log.error({ err }, "Connection loop stopped unexpectedly");
        });
    }

    /** Stop retrying, close the link and wait for the loop to finish. */
    async stop(): Promise<void> {
        if (!this.loop || !this.abort) return;
        this.abort.abort();
        await this.loop;
        this.loop = null;
        this.abort = null;
    }

    isRunning(): boolean {
        return this.loop !== null;
    }
}
