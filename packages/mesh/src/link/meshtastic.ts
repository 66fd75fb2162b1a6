// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/meshtastic.ts
// MeshtasticDriver — RadioDriver for a Meshtastic radio's TCP stream API (port 4403).
//
// Handshake:
//   bridge → radio   ToRadio { wantConfigId: nonce }
//   radio → bridge   FromRadio { myInfo }, { nodeInfo }…, { configCompleteId: nonce }
// After that every FromRadio { packet } becomes a RadioPacket. Decoded packets are
// rewritten into the host-API record layout and go through decodePacket(), so both
// drivers share one validation path.

import { createConnection, type Socket } from "net";
import { randomInt } from "crypto";
import { create, fromBinary, toBinary } from "@bufbuild/protobuf";
import { Mesh, Portnums, Telemetry } from "@meshtastic/protobufs";
import { InvalidNodeIdError, TransportError, silentLogger, type Logger } from "@meshgate/core";
import { decodePacket } from "./decoder.js";
import { FrameDecoder, encodeFrame } from "./framing.js";
import { PacketQueue, waitUntilReady } from "./stream.js";
import type { DeviceAddress, RadioDriver, RadioLink } from "./link.js";

export const BROADCAST_NUM = 0xffffffff;

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
// The radio drops stream clients it has not heard from in 15 minutes
const DEFAULT_HEARTBEAT_INTERVAL_MS = 300_000;

/** "!0000002a" for node 42. */
export function formatNodeId(nodeNum: number): string {
    return `!${nodeNum.toString(16).padStart(8, "0")}`;
}

/**
 * Resolve a destination to a node number: "!hex", a decimal node number,
 * or "^all" for broadcast. Anything else is an InvalidNodeIdError.
 */
export function parseNodeId(destinationId: string): number {
    if (destinationId === "^all") return BROADCAST_NUM;
    const match = /^!([0-9a-f]{1,8})$/i.exec(destinationId) ?? /^(\d+)$/.exec(destinationId);
    const digits = match?.[1];
    if (digits === undefined) throw new InvalidNodeIdError(destinationId);
    const num = destinationId.startsWith("!") ? parseInt(digits, 16) : Number(digits);
    if (!Number.isSafeInteger(num) || num > BROADCAST_NUM) throw new InvalidNodeIdError(destinationId);
    return num;
}

function telemetryRecord(payload: Uint8Array): unknown {
    const telemetry = fromBinary(Telemetry.TelemetrySchema, payload);
    const { variant } = telemetry;
    return {
        time: telemetry.time,
        deviceMetrics:
            variant.case === "deviceMetrics"
                ? {
                    batteryLevel: variant.value.batteryLevel,
                    voltage: variant.value.voltage,
                    channelUtilization: variant.value.channelUtilization,
                    airUtilTx: variant.value.airUtilTx,
                }
                : undefined,
        environmentMetrics:
            variant.case === "environmentMetrics"
                ? {
                    temperature: variant.value.temperature,
                    relativeHumidity: variant.value.relativeHumidity,
                    barometricPressure: variant.value.barometricPressure,
                }
                : undefined,
    };
}

// ─────────────────────────────────────────────────────────────────────────────
// Link
// ─────────────────────────────────────────────────────────────────────────────

export interface MeshtasticLinkOptions {
    heartbeatIntervalMs?: number;
    /** wantConfigId sent in the handshake; random when omitted. */
    configId?: number;
}

export class MeshtasticLink implements RadioLink {
    readonly packets = new PacketQueue();
    /** Resolves with the radio's node number once its config dump is complete. */
    readonly ready: Promise<number>;

    private myNodeNum: number | null = null;
    private readonly frames = new FrameDecoder();
    private readonly textDecoder = new TextDecoder();
    private readonly textEncoder = new TextEncoder();
    private readonly configId: number;
    private heartbeat: NodeJS.Timeout | null = null;
    private socketError: Error | null = null;

    constructor(
        private readonly socket: Socket,
        private readonly log: Logger,
        opts: MeshtasticLinkOptions = {},
    ) {
        this.configId = opts.configId ?? randomInt(1, 0x7fffffff);
        const heartbeatIntervalMs = opts.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;

        this.ready = new Promise((resolve, reject) => {
            socket.on("data", (chunk: Buffer) => {
                for (const frame of this.frames.push(chunk)) {
                    this.handleFrame(frame, resolve);
                }
            });

            socket.on("error", (err) => {
                this.socketError = err;
            });

            socket.on("close", () => {
                if (this.heartbeat) clearInterval(this.heartbeat);
                const reason = this.socketError
                    ? new TransportError(`Connection lost: ${this.socketError.message}`)
                    : new TransportError("Connection closed");
                reject(reason);
                this.packets.end(this.socketError ? reason : undefined);
            });
        });

        socket.once("connect", () => {
            this.write(create(Mesh.ToRadioSchema, { payloadVariant: { case: "wantConfigId", value: this.configId } }));
            this.heartbeat = setInterval(() => {
                this.write(
                    create(Mesh.ToRadioSchema, {
                        payloadVariant: { case: "heartbeat", value: create(Mesh.HeartbeatSchema, {}) },
                    }),
                );
            }, heartbeatIntervalMs);
            this.heartbeat.unref();
        });
    }

    get localNodeId(): number {
        if (this.myNodeNum === null) {
            throw new TransportError("Link is not ready");
        }
        return this.myNodeNum;
    }

    async send(text: string, destinationId?: string): Promise<void> {
        const to = destinationId === undefined ? BROADCAST_NUM : parseNodeId(destinationId);
        if (this.socket.destroyed || !this.socket.writable) {
            throw new TransportError("Connection closed");
        }

        const packet = create(Mesh.MeshPacketSchema, {
            to,
            id: randomInt(1, 0x7fffffff),
            wantAck: true,
            payloadVariant: {
                case: "decoded",
                value: create(Mesh.DataSchema, {
                    portnum: Portnums.PortNum.TEXT_MESSAGE_APP,
                    payload: this.textEncoder.encode(text),
                }),
            },
        });

        await new Promise<void>((resolve, reject) => {
            this.socket.write(
                encodeFrame(toBinary(Mesh.ToRadioSchema, create(Mesh.ToRadioSchema, { payloadVariant: { case: "packet", value: packet } }))),
                (err) => (err ? reject(new TransportError(`Write failed: ${err.message}`)) : resolve()),
            );
        });
    }

    async close(): Promise<void> {
        if (this.heartbeat) clearInterval(this.heartbeat);
        if (this.socket.destroyed) return;
        await new Promise<void>((resolve) => {
            this.socket.once("close", () => resolve());
            this.socket.destroy();
        });
    }

    private write(message: Mesh.ToRadio): void {
        if (this.socket.destroyed || !this.socket.writable) return;
        this.socket.write(encodeFrame(toBinary(Mesh.ToRadioSchema, message)));
    }

    private handleFrame(frame: Uint8Array, resolve: (nodeNum: number) => void): void {
        let message: Mesh.FromRadio;
        try {
            message = fromBinary(Mesh.FromRadioSchema, frame);
        } catch (err) {
            this.log.debug({ err }, "Dropping undecodable frame from radio");
            return;
        }

        const { payloadVariant } = message;
        switch (payloadVariant.case) {
            case "myInfo":
                this.myNodeNum = payloadVariant.value.myNodeNum;
                break;
            case "configCompleteId":
                if (payloadVariant.value !== this.configId) break;
                if (this.myNodeNum === null) {
                    this.log.warn("Radio finished its config dump without sending myInfo");
                    break;
                }
                resolve(this.myNodeNum);
                break;
            case "packet": {
                const packet = decodePacket(this.toRecord(payloadVariant.value));
                if (packet) this.packets.push(packet);
                break;
            }
            default:
                // nodeInfo, config, channel, queueStatus… carry nothing the bridge caches
                break;
        }
    }

    /** MeshPacket → host-API record layout understood by decodePacket(). */
    private toRecord(packet: Mesh.MeshPacket): unknown {
        const record = { from: packet.from, fromId: formatNodeId(packet.from), to: packet.to };
        const { payloadVariant } = packet;
        if (payloadVariant.case !== "decoded") return record;

        const data = payloadVariant.value;
        const decoded: Record<string, unknown> = { portnum: Portnums.PortNum[data.portnum] ?? data.portnum };

        if (data.portnum === Portnums.PortNum.TEXT_MESSAGE_APP) {
            decoded.text = this.textDecoder.decode(data.payload);
        } else if (data.portnum === Portnums.PortNum.TELEMETRY_APP) {
            try {
                decoded.telemetry = telemetryRecord(data.payload);
            } catch (err) {
                this.log.debug({ err, from: packet.from }, "Dropping undecodable telemetry payload");
            }
        }
        return { ...record, decoded };
    }
}

// ─────────────────────────────────────────────────────────────────────────────
// Driver
// ─────────────────────────────────────────────────────────────────────────────

export interface MeshtasticDriverOptions {
    connectTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    logger?: Logger;
}

export class MeshtasticDriver implements RadioDriver {
    private readonly connectTimeoutMs: number;
    private readonly heartbeatIntervalMs: number;
    private readonly log: Logger;

    constructor(opts: MeshtasticDriverOptions = {}) {
        this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
        this.heartbeatIntervalMs = opts.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
        this.log = opts.logger ?? silentLogger();
    }

    async connect(address: DeviceAddress, signal?: AbortSignal): Promise<RadioLink> {
        if (signal?.aborted) {
            throw new TransportError("Connect aborted");
        }

        const socket = createConnection({ host: address.host, port: address.port });
        const link = new MeshtasticLink(socket, this.log, { heartbeatIntervalMs: this.heartbeatIntervalMs });

        try {
            await waitUntilReady(link.ready, this.connectTimeoutMs, "the radio's config", signal);
            return link;
        } catch (err) {
            await link.close();
            throw err;
        }
    }
}
