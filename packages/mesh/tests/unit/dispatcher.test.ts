// © 2026 LearnHubPlay BV. All rights reserved.
// packages/mesh/tests/unit/dispatcher.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import { EventDispatcher } from "../../src/dispatch/dispatcher.js";
import { TelemetryStore } from "../../src/store/telemetry.js";
import { MessageStore } from "../../src/store/messages.js";
import { NodeRegistry } from "../../src/store/nodes.js";
import { packet } from "./fakes.js";

describe("EventDispatcher", () => {
    let telemetry: TelemetryStore;
    let messages: MessageStore;
    let nodes: NodeRegistry;
    let dispatcher: EventDispatcher;

    beforeEach(() => {
        telemetry = new TelemetryStore();
        messages = new MessageStore();
        nodes = new NodeRegistry();
        dispatcher = new EventDispatcher({ telemetry, messages, nodes });
    });

    it("stores device metrics", () => {
        dispatcher.onPacket(
            packet(10, { telemetry: { time: 1700000000, device: { batteryLevel: 77, voltage: 3.9 } } }),
        );

        expect(telemetry.snapshotDevice().get(10)).toEqual({
            nodeId: 10,
            time: 1700000000,
            batteryLevel: 77,
            voltage: 3.9,
        });
        expect(telemetry.snapshotEnvironment().size).toBe(0);
    });

    it("stores environment metrics", () => {
        dispatcher.onPacket(
            packet(10, { telemetry: { time: 5, environment: { temperature: 18.25, barometricPressure: 1013 } } }),
        );

        expect(telemetry.snapshotEnvironment().get(10)).toEqual({
            nodeId: 10,
            time: 5,
            temperature: 18.25,
            barometricPressure: 1013,
        });
        expect(telemetry.snapshotDevice().size).toBe(0);
    });

    it("stores both sections when a packet carries both", () => {
        dispatcher.onPacket(
            packet(3, {
                telemetry: {
                    time: 9,
                    device: { airUtilTx: 1.5 },
                    environment: { relativeHumidity: 55 },
                },
            }),
        );

        expect(telemetry.snapshotDevice().get(3)?.airUtilTx).toBe(1.5);
        expect(telemetry.snapshotEnvironment().get(3)?.relativeHumidity).toBe(55);
    });

    it("caches text messages", () => {
        dispatcher.onPacket(packet(4, { text: "hello mesh" }));

        const cached = [...messages.snapshot().values()];
        expect(cached).toHaveLength(1);
        expect(cached[0]).toMatchObject({ nodeId: 4, text: "hello mesh" });
    });

    it("caches every text packet, even identical ones", () => {
        dispatcher.onPacket(packet(4, { text: "ping" }));
        dispatcher.onPacket(packet(4, { text: "ping" }));

        expect(messages.size).toBe(2);
    });

    it("registers the sender's long id on first sight only", () => {
        dispatcher.onPacket(packet(5, {}, "!00000005"));
        dispatcher.onPacket(packet(5, { text: "hi" }, "!renamed"));

        expect(nodes.size()).toBe(1);
        expect(nodes.get(5)?.longId).toBe("!00000005");
    });

    it("does not register senders without a long id", () => {
        dispatcher.onPacket(packet(6, { text: "anon" }));

        expect(nodes.size()).toBe(0);
        expect(messages.size).toBe(1);
    });

    it("caches the text and the telemetry of a packet that carries both", () => {
        dispatcher.onPacket(
            packet(
                11,
                {
                    telemetry: { time: 42, device: { batteryLevel: 64 }, environment: { temperature: 7.5 } },
                    text: "status report",
                },
                "!0000000b",
            ),
        );

        expect(telemetry.snapshotDevice().get(11)).toEqual({ nodeId: 11, time: 42, batteryLevel: 64 });
        expect(telemetry.snapshotEnvironment().get(11)).toEqual({ nodeId: 11, time: 42, temperature: 7.5 });
        expect([...messages.snapshot().values()].map((m) => m.text)).toEqual(["status report"]);
        expect(nodes.get(11)?.longId).toBe("!0000000b");
    });

    it("caches nothing for a packet without telemetry or text", () => {
        dispatcher.onPacket(packet(8, {}));

        expect(telemetry.snapshotDevice().size).toBe(0);
        expect(telemetry.snapshotEnvironment().size).toBe(0);
        expect(messages.size).toBe(0);
    });
});
