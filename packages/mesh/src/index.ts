// © 2026 LearnHubPlay BV. All rights reserved.
// packages/mesh/src/index.ts — public API for @meshgate/mesh

export { MeshGate } from "./meshgate.js";
export { QueryFacade } from "./facade.js";
export { ConnectionManager } from "./connection/manager.js";
export { EventDispatcher } from "./dispatch/dispatcher.js";
export { TelemetryStore } from "./store/telemetry.js";
export { MessageStore, hashMessageId, DEFAULT_MESSAGE_CAPACITY } from "./store/messages.js";
export { NodeRegistry } from "./store/nodes.js";
export { decodePacket } from "./link/decoder.js";
export { TcpJsonDriver, TcpJsonLink } from "./link/tcp-json.js";
export { MeshtasticDriver, MeshtasticLink, BROADCAST_NUM, formatNodeId, parseNodeId } from "./link/meshtastic.js";
export { PacketQueue, waitUntilReady } from "./link/stream.js";
export { FrameDecoder, encodeFrame, MAX_FRAME_PAYLOAD } from "./link/framing.js";
export type { MeshGateOptions } from "./meshgate.js";
export type { Ack, ConnectionHandle, QueryFacadeDeps } from "./facade.js";
export type { ConnectionManagerOptions, ConnectionManagerEvents } from "./connection/manager.js";
export type { DispatcherStores } from "./dispatch/dispatcher.js";
export type { MessageIdGenerator, MessageStoreOptions } from "./store/messages.js";
export type { TcpJsonDriverOptions } from "./link/tcp-json.js";
export type { MeshtasticDriverOptions, MeshtasticLinkOptions } from "./link/meshtastic.js";
export type { DeviceAddress, RadioDriver, RadioLink } from "./link/link.js";
export type { DeviceMetrics, EnvironmentMetrics, PacketTelemetry, RadioPacket } from "./types/packet.js";
export type {
    ConnectionState,
    DeviceTelemetrySample,
    EnvironmentTelemetrySample,
    LinkState,
    MeshNodeRecord,
    StoredMessage,
} from "./types/state.js";
