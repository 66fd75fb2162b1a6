// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  InvalidNodeIdError,
  MeshGateError,
  MissingParameterError,
  NotConnectedError,
  NotFoundError,
  SendFailedError,
  TransportError,
} from "../../src/exceptions.js";
import { createLogger, silentLogger } from "../../src/logger.js";

describe("error hierarchy", () => {
  it.each([
    { error: new MissingParameterError("message"), code: "missing_parameter", statusCode: 400, message: "Missing parameters: message" },
    { error: new InvalidNodeIdError("!ffffffff"), code: "invalid_node_id", statusCode: 404, message: "Invalid node ID: !ffffffff" },
    { error: new NotFoundError("abc123"), code: "not_found", statusCode: 404, message: "Invalid message ID: abc123" },
    { error: new NotConnectedError(), code: "not_connected", statusCode: 503, message: "Mesh interface not initialized" },
    { error: new SendFailedError("timeout"), code: "send_failed", statusCode: 502, message: "Failed to send message: timeout" },
    { error: new TransportError("socket reset"), code: "transport_error", statusCode: 502, message: "socket reset" },
    { error: new ConfigurationError("bad file"), code: "configuration_error", statusCode: 500, message: "bad file" },
  ])("$code answers $statusCode", ({ error, code, statusCode, message }) => {
    expect(error).toBeInstanceOf(MeshGateError);
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(statusCode);
    expect(error.message).toBe(message);
  });

  it("names each subclass", () => {
    expect(new NotFoundError("x").name).toBe("NotFoundError");
    expect(new SendFailedError("x").name).toBe("SendFailedError");
  });
});

describe("loggers", () => {
  it("creates a logger at the configured level", () => {
    expect(createLogger({ level: "warn", pretty: false }).level).toBe("warn");
  });

  it("silences the default logger", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
