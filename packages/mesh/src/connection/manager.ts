// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/connection/manager.ts
// ConnectionManager — owns the single RadioLink and keeps it alive.
//
// State graph:
//   DISCONNECTED ──(run / retry)──→ CONNECTING
//   CONNECTING ──(connect ok)──→ CONNECTED
//   CONNECTING ──(connect failed)──→ DISCONNECTED ──(retryIntervalMs)──→ CONNECTING
//   CONNECTED ──(link ended or failed)──→ DISCONNECTED ──(retryIntervalMs)──→ CONNECTING
//
// The loop only stops when the signal passed to run() aborts.

import EventEmitter from "events";
import { NotConnectedError, silentLogger, type Logger } from "@meshgate/core";
import type { DeviceAddress, RadioDriver, RadioLink } from "../link/link.js";
import type { EventDispatcher } from "../dispatch/dispatcher.js";
import type { ConnectionState, LinkState } from "../types/state.js";

export interface ConnectionManagerOptions {
    driver: RadioDriver;
    address: DeviceAddress;
    dispatcher: EventDispatcher;
    retryIntervalMs?: number;
    logger?: Logger;
}

export interface ConnectionManagerEvents {
    statusChanged: (status: ConnectionState) => void;
}

export declare interface ConnectionManager {
    on<K extends keyof ConnectionManagerEvents>(event: K, listener: ConnectionManagerEvents[K]): this;
    off<K extends keyof ConnectionManagerEvents>(event: K, listener: ConnectionManagerEvents[K]): this;
    emit<K extends keyof ConnectionManagerEvents>(event: K, ...args: Parameters<ConnectionManagerEvents[K]>): boolean;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) return resolve();
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal.addEventListener("abort", onAbort, { once: true });
    });
}

export class ConnectionManager extends EventEmitter {
    private readonly driver: RadioDriver;
    private readonly address: DeviceAddress;
    private readonly dispatcher: EventDispatcher;
    private readonly retryIntervalMs: number;
    private readonly log: Logger;

    private link: RadioLink | null = null;
    private running = false;
    private state: ConnectionState = {
        state: "disconnected",
        isConnected: false,
        localNodeId: null,
        connectionAttempts: 0,
        lastConnectedAt: null,
    };

    constructor(opts: ConnectionManagerOptions) {
        super();
        this.driver = opts.driver;
        this.address = opts.address;
        this.dispatcher = opts.dispatcher;
        this.retryIntervalMs = opts.retryIntervalMs ?? 1_000;
        this.log = opts.logger ?? silentLogger();
    }

    /** Connect, forward packets, reconnect on failure — until `signal` aborts. */
    async run(signal: AbortSignal): Promise<void> {
        if (this.running) {
            throw new Error("ConnectionManager is already running");
        }
        this.running = true;
        const target = `${this.address.host}:${this.address.port}`;

        try {
            while (!signal.aborted) {
                this.transition("connecting");

                let link: RadioLink;
                try {
                    link = await this.driver.connect(this.address, signal);
                } catch (err) {
                    if (signal.aborted) break;
                    this.log.warn({ err }, `Could not connect to ${target}`);
                    this.transition("disconnected");
                    await sleep(this.retryIntervalMs, signal);
                    continue;
                }

                if (signal.aborted) {
                    await this.closeLink(link);
                    break;
                }

                this.link = link;
                this.state = {
                    ...this.state,
                    localNodeId: link.localNodeId,
                    connectionAttempts: this.state.connectionAttempts + 1,
                    lastConnectedAt: new Date(),
                };
                this.transition("connected");
                this.log.info({ localNodeId: link.localNodeId }, `Connected to radio at ${target}`);

                try {
                    await this.forward(link, signal);
                    if (!signal.aborted) this.log.warn(`Link to ${target} closed by device`);
                } catch (err) {
                    if (!signal.aborted) this.log.warn({ err }, `Link to ${target} failed`);
                } finally {
                    this.link = null;
                    await this.closeLink(link);
                    this.transition("disconnected");
                }

                await sleep(this.retryIntervalMs, signal);
            }
        } finally {
            this.transition("disconnected");
            this.running = false;
        }
    }

    /** Snapshot of the connection state; safe to hold on to. */
    status(): ConnectionState {
        return { ...this.state };
    }

    isConnected(): boolean {
        return this.link !== null;
    }

    /** Send through the live link. Throws NotConnectedError when there is none. */
    async send(text: string, destinationId?: string): Promise<void> {
        const link = this.link;
        if (!link) {
            throw new NotConnectedError();
        }
        await link.send(text, destinationId);
    }

    private async forward(link: RadioLink, signal: AbortSignal): Promise<void> {
        // Closing the link ends the packet stream, which unblocks the loop below.
        const onAbort = () => {
            this.closeLink(link).catch((err: unknown) => this.log.error({ err }, "Error closing link"));
        };
        signal.addEventListener("abort", onAbort, { once: true });

        try {
            for await (const packet of link.packets) {
                if (signal.aborted) break;
                try {
                    this.dispatcher.onPacket(packet);
                } catch (err) {
                    this.log.error({ err, from: packet.from }, "Failed to dispatch packet");
                }
            }
        } finally {
            signal.removeEventListener("abort", onAbort);
        }
    }

    private async closeLink(link: RadioLink): Promise<void> {
        try {
            await link.close();
        } catch (err) {
            this.log.warn({ err }, "Error closing link");
        }
    }

    private transition(next: LinkState): void {
        if (this.state.state === next) return;
        this.state = { ...this.state, state: next, isConnected: next === "connected" };
        this.emit("statusChanged", this.status());
    }
}
