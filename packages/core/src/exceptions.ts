// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for MeshGate. */

export type ErrorCode =
  | "configuration_error"
  | "missing_parameter"
  | "invalid_node_id"
  | "not_found"
  | "not_connected"
  | "send_failed"
  | "transport_error";

export class MeshGateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    /** HTTP status the API layer answers with. */
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = "MeshGateError";
  }
}

export class ConfigurationError extends MeshGateError {
  constructor(message: string) {
    super(message, "configuration_error");
    this.name = "ConfigurationError";
  }
}

export class MissingParameterError extends MeshGateError {
  constructor(public readonly parameter: string) {
    super(`Missing parameters: ${parameter}`, "missing_parameter", 400);
    this.name = "MissingParameterError";
  }
}

export class InvalidNodeIdError extends MeshGateError {
  constructor(public readonly nodeId: string) {
    super(`Invalid node ID: ${nodeId}`, "invalid_node_id", 404);
    this.name = "InvalidNodeIdError";
  }
}

export class NotFoundError extends MeshGateError {
  constructor(public readonly messageId: string) {
    super(`Invalid message ID: ${messageId}`, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export class NotConnectedError extends MeshGateError {
  constructor() {
    super("Mesh interface not initialized", "not_connected", 503);
    this.name = "NotConnectedError";
  }
}

export class SendFailedError extends MeshGateError {
  constructor(public readonly detail: string) {
    super(`Failed to send message: ${detail}`, "send_failed", 502);
    this.name = "SendFailedError";
  }
}

export class TransportError extends MeshGateError {
  constructor(message: string) {
    super(message, "transport_error", 502);
    this.name = "TransportError";
  }
}
