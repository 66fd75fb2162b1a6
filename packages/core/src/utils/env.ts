// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Environment variable helpers used by the config loader for MESHGATE_* overrides. */

/**
 * Safely read an environment variable.
 * Returns undefined (not an empty string) if not set.
 */
export function envVar(name: string): string | undefined {
  const val = process.env[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}

/**
 * Read an environment variable as a TCP port.
 * Returns undefined when unset; throws when set to something that is not a port.
 */
export function envPort(name: string): number | undefined {
  const val = envVar(name);
  if (val === undefined) return undefined;
  const port = Number(val);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new Error(`Environment variable '${name}' must be a port number, got '${val}'`);
  }
  return port;
}
