// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/tcp-json.ts
// TcpJsonDriver — RadioDriver for a gateway that speaks newline-delimited JSON over TCP.
// Selected with `device.protocol: json`; radios themselves use MeshtasticDriver.
//
// Gateway → bridge:
//   {"type":"myInfo","myNodeNum":123}                 sent once, right after accept
//   {"type":"packet","packet":{from,fromId,to,decoded}} one per received packet
//   {"type":"ack","id":7}                             sendText #7 went out
//   {"type":"error","id":7,"code":"NODE_NOT_FOUND","message":"…"}
// Bridge → gateway:
//   {"type":"sendText","id":7,"text":"hi","destinationId":"!a1b2c3d4"}

import { createConnection, type Socket } from "net";
import { createInterface } from "readline";
import { z } from "zod";
import { InvalidNodeIdError, TransportError, silentLogger, type Logger } from "@meshgate/core";
import { decodePacket } from "./decoder.js";
import { PacketQueue, waitUntilReady } from "./stream.js";
import type { DeviceAddress, RadioDriver, RadioLink } from "./link.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_SEND_TIMEOUT_MS = 30_000;

const inboundSchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("myInfo"), myNodeNum: z.number().int().nonnegative() }),
    z.object({ type: z.literal("packet"), packet: z.unknown() }),
    z.object({ type: z.literal("ack"), id: z.number().int() }),
    z.object({
        type: z.literal("error"),
        id: z.number().int().optional(),
        code: z.string(),
        message: z.string().optional(),
    }),
]);

type Inbound = z.infer<typeof inboundSchema>;

interface OutboundSendText {
    type: "sendText";
    id: number;
    text: string;
    destinationId?: string;
}

interface PendingSend {
    destinationId?: string;
    resolve: () => void;
    reject: (err: Error) => void;
    timer: NodeJS.Timeout;
}

// ─────────────────────────────────────────────────────────────────────────────
// Link
// ─────────────────────────────────────────────────────────────────────────────

export class TcpJsonLink implements RadioLink {
    readonly packets = new PacketQueue();
    /** Resolves with the gateway's node number once myInfo arrives. */
    readonly ready: Promise<number>;

    private myNodeNum: number | null = null;
    private nextSendId = 1;
    private readonly pending = new Map<number, PendingSend>();
    private socketError: Error | null = null;

    constructor(
        private readonly socket: Socket,
        private readonly log: Logger,
        private readonly sendTimeoutMs: number = DEFAULT_SEND_TIMEOUT_MS,
    ) {
        this.ready = new Promise((resolve, reject) => {
            const readline = createInterface({ input: socket, crlfDelay: Infinity });

            readline.on("line", (line) => {
                const record = this.parse(line);
                if (!record) return;
                if (record.type === "myInfo" && this.myNodeNum === null) {
                    this.myNodeNum = record.myNodeNum;
                    resolve(record.myNodeNum);
                    return;
                }
                this.handle(record);
            });

            socket.on("error", (err) => {
                this.socketError = err;
            });

            socket.on("close", () => {
                readline.close();
                const reason = this.socketError
                    ? new TransportError(`Connection lost: ${this.socketError.message}`)
                    : new TransportError("Connection closed");
                reject(reason);
                for (const [id, send] of this.pending) {
                    clearTimeout(send.timer);
                    send.reject(reason);
                    this.pending.delete(id);
                }
                this.packets.end(this.socketError ? reason : undefined);
            });
        });
    }

    get localNodeId(): number {
        if (this.myNodeNum === null) {
            throw new TransportError("Link is not ready");
        }
        return this.myNodeNum;
    }

    send(text: string, destinationId?: string): Promise<void> {
        if (this.socket.destroyed || !this.socket.writable) {
            return Promise.reject(new TransportError("Connection closed"));
        }

        const id = this.nextSendId++;
        const command: OutboundSendText = { type: "sendText", id, text, destinationId };

        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(id);
                reject(new TransportError(`No reply to sendText #${id} after ${this.sendTimeoutMs}ms`));
            }, this.sendTimeoutMs);
            this.pending.set(id, { destinationId, resolve, reject, timer });
            this.socket.write(JSON.stringify(command) + "\n");
        });
    }

    async close(): Promise<void> {
        if (this.socket.destroyed) return;
        await new Promise<void>((resolve) => {
            this.socket.once("close", () => resolve());
            this.socket.destroy();
        });
    }

    private parse(line: string): Inbound | null {
        if (line.trim().length === 0) return null;
        let json: unknown;
        try {
            json = JSON.parse(line);
        } catch {
            this.log.debug({ line }, "Dropping unparseable line from gateway");
            return null;
        }
        const record = inboundSchema.safeParse(json);
        if (!record.success) {
            this.log.debug({ line }, "Dropping unknown record from gateway");
            return null;
        }
        return record.data;
    }

    private handle(record: Inbound): void {
        switch (record.type) {
            case "packet": {
                const packet = decodePacket(record.packet);
                if (packet) this.packets.push(packet);
                else this.log.debug("Dropping malformed packet");
                break;
            }
            case "ack":
                this.settle(record.id, null);
                break;
            case "error":
                if (record.id === undefined) {
                    this.log.warn({ code: record.code }, record.message ?? "Gateway reported an error");
                    break;
                }
                this.settle(record.id, record);
                break;
            case "myInfo":
                // Duplicate myInfo after the first one carries nothing new
                break;
        }
    }

    private settle(id: number, error: { code: string; message?: string } | null): void {
        const send = this.pending.get(id);
        if (!send) return;
        this.pending.delete(id);
        clearTimeout(send.timer);

        if (!error) {
            send.resolve();
        } else if (error.code === "NODE_NOT_FOUND") {
            send.reject(new InvalidNodeIdError(send.destinationId ?? ""));
        } else {
            send.reject(new TransportError(error.message ?? error.code));
        }
    }
}

// ─────────────────────────────────────────────────────────────────────────────
// Driver
// ─────────────────────────────────────────────────────────────────────────────

export interface TcpJsonDriverOptions {
    connectTimeoutMs?: number;
    sendTimeoutMs?: number;
    logger?: Logger;
}

export class TcpJsonDriver implements RadioDriver {
    private readonly connectTimeoutMs: number;
    private readonly sendTimeoutMs: number;
    private readonly log: Logger;

    constructor(opts: TcpJsonDriverOptions = {}) {
        this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        this.sendTimeoutMs = opts.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
        this.log = opts.logger ?? silentLogger();
    }

    async connect(address: DeviceAddress, signal?: AbortSignal): Promise<RadioLink> {
        if (signal?.aborted) {
            throw new TransportError("Connect aborted");
        }

        const socket = createConnection({ host: address.host, port: address.port });
        const link = new TcpJsonLink(socket, this.log, this.sendTimeoutMs);

        try {
            await waitUntilReady(link.ready, this.connectTimeoutMs, "the gateway", signal);
            return link;
        } catch (err) {
            await link.close();
            throw err;
        }
    }
}
