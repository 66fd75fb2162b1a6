// © 2026 LearnHubPlay BV. All rights reserved.
// packages/mesh/tests/unit/framing.test.ts

import { describe, it, expect } from "vitest";
import { FrameDecoder, encodeFrame, MAX_FRAME_PAYLOAD } from "../../src/link/framing.js";

const payload = Uint8Array.from([1, 2, 3]);

describe("encodeFrame", () => {
    it("prefixes the start marker and a big-endian length", () => {
        expect([...encodeFrame(payload)]).toEqual([0x94, 0xc3, 0x00, 0x03, 1, 2, 3]);
    });

    it("rejects payloads over the frame limit", () => {
        expect(() => encodeFrame(new Uint8Array(MAX_FRAME_PAYLOAD + 1))).toThrow(RangeError);
    });
});

describe("FrameDecoder", () => {
    it("returns every frame in one chunk", () => {
        const decoder = new FrameDecoder();
        const frames = decoder.push(Buffer.concat([encodeFrame(payload), encodeFrame(Uint8Array.from([9]))]));

        expect(frames).toEqual([payload, Uint8Array.from([9])]);
    });

    it("skips console output before a frame", () => {
        const decoder = new FrameDecoder();
        const frames = decoder.push(Buffer.concat([Buffer.from("INFO | boot\r\n"), encodeFrame(payload)]));

        expect(frames).toEqual([payload]);
    });

    it("waits for the rest of a split frame", () => {
        const decoder = new FrameDecoder();
        const frame = encodeFrame(payload);

        expect(decoder.push(frame.subarray(0, 5))).toEqual([]);
        expect(decoder.push(frame.subarray(5))).toEqual([payload]);
    });

    it("keeps a start byte that ends a chunk", () => {
        const decoder = new FrameDecoder();

        expect(decoder.push(Buffer.from([0x41, 0x94]))).toEqual([]);
        expect(decoder.push(Buffer.from([0xc3, 0x00, 0x01, 0x09]))).toEqual([Uint8Array.from([9])]);
    });

    it("resyncs after a header with an impossible length", () => {
        const decoder = new FrameDecoder();
        const bogus = Buffer.from([0x94, 0xc3, 0x02, 0x01]);

        expect(decoder.push(Buffer.concat([bogus, encodeFrame(payload)]))).toEqual([payload]);
    });
});
