// © 2026 LearnHubPlay BV. All rights reserved.
// packages/mesh/tests/unit/facade.test.ts
// QueryFacade parameter checks and error mapping, plus MeshGate end to end.

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import {
    defaultConfig,
    InvalidNodeIdError,
    MissingParameterError,
    NotConnectedError,
    NotFoundError,
    SendFailedError,
    type MeshGateConfig,
} from "@meshgate/core";
import { QueryFacade, type ConnectionHandle } from "../../src/facade.js";
import { MeshGate } from "../../src/meshgate.js";
import { TelemetryStore } from "../../src/store/telemetry.js";
import { MessageStore } from "../../src/store/messages.js";
import { NodeRegistry } from "../../src/store/nodes.js";
import type { ConnectionState } from "../../src/types/state.js";
import { FakeDriver, packet } from "./fakes.js";

const DISCONNECTED: ConnectionState = {
    state: "disconnected",
    isConnected: false,
    localNodeId: null,
    connectionAttempts: 0,
    lastConnectedAt: null,
};

describe("QueryFacade", () => {
    let send: Mock<(text: string, destinationId?: string) => Promise<void>>;
    let messages: MessageStore;
    let facade: QueryFacade;

    beforeEach(() => {
        send = vi.fn<(text: string, destinationId?: string) => Promise<void>>(async () => { });
        const connection: ConnectionHandle = { status: () => ({ ...DISCONNECTED }), send };
        messages = new MessageStore();
        facade = new QueryFacade({
            connection,
            telemetry: new TelemetryStore(),
            messages,
            nodes: new NodeRegistry(),
        });
    });

    describe("sendMessage()", () => {
        it("requires the message text", async () => {
            await expect(facade.sendMessage(undefined)).rejects.toBeInstanceOf(MissingParameterError);
            await expect(facade.sendMessage(null, "!00000001")).rejects.toThrow("Missing parameters: message");
            expect(send).not.toHaveBeenCalled();
        });

        it("broadcasts when no target is given", async () => {
            const ack = await facade.sendMessage("hi");

            expect(ack).toEqual({ status: "success", message: "Message sent successfully" });
            expect(send).toHaveBeenCalledWith("hi", undefined);
        });

        it("treats an empty target as a broadcast", async () => {
            await facade.sendMessage("hi", "");
            expect(send).toHaveBeenCalledWith("hi", undefined);
        });

        it("passes the target through", async () => {
            await facade.sendMessage("hi", "!a1b2c3d4");
            expect(send).toHaveBeenCalledWith("hi", "!a1b2c3d4");
        });

        it("surfaces an invalid target", async () => {
            send.mockRejectedValueOnce(new InvalidNodeIdError("bogus"));
            await expect(facade.sendMessage("hi", "bogus")).rejects.toBeInstanceOf(InvalidNodeIdError);
        });

        it("surfaces a missing connection", async () => {
            send.mockRejectedValueOnce(new NotConnectedError());
            await expect(facade.sendMessage("hi")).rejects.toBeInstanceOf(NotConnectedError);
        });

        it("wraps any other transport failure", async () => {
            send.mockRejectedValueOnce(new Error("radio busy"));

            const err = await facade.sendMessage("hi").catch((e: unknown) => e);
            expect(err).toBeInstanceOf(SendFailedError);
            expect(err).toMatchObject({ detail: "radio busy", message: "Failed to send message: radio busy" });
        });
    });

    describe("deleteMessage()", () => {
        it("requires the message id", () => {
            expect(() => facade.deleteMessage(undefined)).toThrow("Missing parameters: message_id");
        });

        it("rejects an unknown id", () => {
            expect(() => facade.deleteMessage("0123456789")).toThrow(NotFoundError);
        });

        it("removes a cached message", () => {
            const hello = messages.insert(1, "hello");
            messages.insert(1, "world");

            expect(facade.deleteMessage(hello)).toEqual({ status: "success", message: "Message deleted successfully" });
            expect([...facade.getLastMessages().values()].map((m) => m.text)).toEqual(["world"]);
        });
    });

    it("reports connection status from the connection", () => {
        expect(facade.getStatus()).toEqual(DISCONNECTED);
    });
});

// ── MeshGate wiring ──────────────────────────────────────────────────────────

describe("MeshGate", () => {
    const config: MeshGateConfig = {
        ...defaultConfig,
        device: { ...defaultConfig.device, host: "radio.test", retryIntervalMs: 1 },
        cache: { messageCapacity: 3 },
    };
    let driver: FakeDriver;
    let gate: MeshGate;

    beforeEach(() => {
        driver = new FakeDriver(1, 1234);
        gate = new MeshGate({ config, driver });
    });

    afterEach(async () => {
        await gate.stop();
    });

    it("fails sends before the radio is connected", async () => {
        await expect(gate.facade.sendMessage("hi")).rejects.toBeInstanceOf(NotConnectedError);
    });

    it("connects, ingests packets and answers queries", async () => {
        gate.start();
        await vi.waitFor(() => expect(gate.facade.getStatus().isConnected).toBe(true));

        expect(driver.addresses[0]).toEqual({ host: "radio.test", port: 4403 });
        expect(gate.facade.getStatus()).toMatchObject({ localNodeId: 1234, connectionAttempts: 1 });

        const link = driver.lastLink();
        for (const text of ["one", "two", "three", "four"]) {
            link.deliver(packet(9, { text }, "!00000009"));
        }
        link.deliver(packet(9, { telemetry: { time: 50, environment: { temperature: 4.5 } } }));

        await vi.waitFor(() => expect(gate.facade.getEnvironmentTelemetry().size).toBe(1));
        expect([...gate.facade.getLastMessages().values()].map((m) => m.text)).toEqual(["two", "three", "four"]);
        expect(gate.facade.listNodes().get(9)?.longId).toBe("!00000009");
        expect(gate.facade.getDeviceTelemetry().size).toBe(0);
    });

    it("reports an invalid target from the radio", async () => {
        gate.start();
        await vi.waitFor(() => expect(gate.facade.getStatus().isConnected).toBe(true));
        driver.lastLink().sendImpl = async (_text, destinationId) => {
            throw new InvalidNodeIdError(destinationId ?? "");
        };

        await expect(gate.facade.sendMessage("hi", "bogus")).rejects.toBeInstanceOf(InvalidNodeIdError);
        await expect(gate.facade.sendMessage(undefined, "bogus")).rejects.toBeInstanceOf(MissingParameterError);
    });

    it("closes the link and reports disconnected after stop", async () => {
        gate.start();
        await vi.waitFor(() => expect(gate.isRunning() && gate.facade.getStatus().isConnected).toBe(true));

        await gate.stop();

        expect(gate.isRunning()).toBe(false);
        expect(driver.lastLink().closed).toBe(true);
        expect(gate.facade.getStatus().state).toBe("disconnected");
    });
});
