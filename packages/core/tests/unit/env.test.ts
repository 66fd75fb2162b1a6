// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, describe, expect, it, vi } from "vitest";
import { envPort, envVar } from "../../src/utils/env.js";

describe("environment helpers", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("envVar()", () => {
    it("returns the trimmed value", () => {
      vi.stubEnv("MESHGATE_TEST_VALUE", "  radio.lan ");
      expect(envVar("MESHGATE_TEST_VALUE")).toBe("radio.lan");
    });

    it("treats blank as unset", () => {
      vi.stubEnv("MESHGATE_TEST_VALUE", "   ");
      expect(envVar("MESHGATE_TEST_VALUE")).toBeUndefined();
    });
  });

  describe("envPort()", () => {
    it("parses a port", () => {
      vi.stubEnv("MESHGATE_TEST_PORT", "4403");
      expect(envPort("MESHGATE_TEST_PORT")).toBe(4403);
    });

    it("returns undefined when unset", () => {
      vi.stubEnv("MESHGATE_TEST_PORT", "");
      expect(envPort("MESHGATE_TEST_PORT")).toBeUndefined();
    });

    it("rejects values outside 1-65535", () => {
      vi.stubEnv("MESHGATE_TEST_PORT", "65536");
      expect(() => envPort("MESHGATE_TEST_PORT")).toThrow(
        "Environment variable 'MESHGATE_TEST_PORT' must be a port number, got '65536'",
      );
    });
  });
});
