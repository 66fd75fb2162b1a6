// © 2026 LearnHubPlay BV. All rights reserved.
// packages/cli/tests/unit/serve.test.ts

import { describe, it, expect } from "vitest";
import { defaultConfig } from "@meshgate/core";
import { applyServeOptions } from "../../src/serve.js";

describe("applyServeOptions", () => {
    it("leaves the config alone without flags", () => {
        expect(applyServeOptions(defaultConfig, {})).toEqual(defaultConfig);
    });

    it("overrides the API bind address", () => {
        const config = applyServeOptions(defaultConfig, { host: "127.0.0.1", port: "9000" });

        expect(config.api).toMatchObject({ host: "127.0.0.1", port: 9000, prefix: "/api/mesh" });
    });

    it("takes a device host with a port", () => {
        const config = applyServeOptions(defaultConfig, { device: "10.0.0.7:4500" });

        expect(config.device).toMatchObject({ host: "10.0.0.7", port: 4500 });
    });

    it("keeps the configured device port when only a host is given", () => {
        const config = applyServeOptions(defaultConfig, { device: "radio.lan" });

        expect(config.device).toMatchObject({ host: "radio.lan", port: 4403 });
    });

    it("rejects invalid ports", () => {
        expect(() => applyServeOptions(defaultConfig, { port: "http" })).toThrow("--port: 'http' is not a valid port");
        expect(() => applyServeOptions(defaultConfig, { device: "radio.lan:0" })).toThrow(
            "--device: '0' is not a valid port",
        );
    });

    it("does not mutate the loaded config", () => {
        applyServeOptions(defaultConfig, { device: "radio.lan:4500", port: "9000" });

        expect(defaultConfig.device.host).toBe("meshtastic.local");
        expect(defaultConfig.api.port).toBe(8080);
    });
});
