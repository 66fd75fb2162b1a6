// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/framing.ts
// Meshtastic stream API framing, as used over TCP and serial:
//   0x94 0xc3 <len hi> <len lo> <len bytes of protobuf>
// Anything between frames (the radio's debug console) is skipped.

export const FRAME_START1 = 0x94;
export const FRAME_START2 = 0xc3;
export const FRAME_HEADER_LENGTH = 4;
export const MAX_FRAME_PAYLOAD = 512;

export function encodeFrame(payload: Uint8Array): Buffer {
    if (payload.length > MAX_FRAME_PAYLOAD) {
        throw new RangeError(`Frame payload of ${payload.length} bytes exceeds ${MAX_FRAME_PAYLOAD}`);
    }
    const frame = Buffer.alloc(FRAME_HEADER_LENGTH + payload.length);
    frame[0] = FRAME_START1;
    frame[1] = FRAME_START2;
    frame.writeUInt16BE(payload.length, 2);
    frame.set(payload, FRAME_HEADER_LENGTH);
    return frame;
}

/** Reassembles frames from arbitrary socket chunks. */
export class FrameDecoder {
    private buffer: Buffer = Buffer.alloc(0);

    push(chunk: Buffer): Uint8Array[] {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        const frames: Uint8Array[] = [];

        for (;;) {
            const start = this.findStart();
            if (start < 0) {
                // Keep a trailing START1, its START2 may be in the next chunk
                const last = this.buffer[this.buffer.length - 1];
                this.buffer = last === FRAME_START1 ? this.buffer.subarray(this.buffer.length - 1) : Buffer.alloc(0);
                break;
            }
            this.buffer = this.buffer.subarray(start);
            if (this.buffer.length < FRAME_HEADER_LENGTH) break;

            const length = this.buffer.readUInt16BE(2);
            if (length > MAX_FRAME_PAYLOAD) {
                // Not a real header; resync on the next start marker
                this.buffer = this.buffer.subarray(1);
                continue;
            }
            if (this.buffer.length < FRAME_HEADER_LENGTH + length) break;

            frames.push(Uint8Array.from(this.buffer.subarray(FRAME_HEADER_LENGTH, FRAME_HEADER_LENGTH + length)));
            this.buffer = this.buffer.subarray(FRAME_HEADER_LENGTH + length);
        }

        return frames;
    }

    private findStart(): number {
        for (let i = 0; i + 1 < this.buffer.length; i++) {
            if (this.buffer[i] === FRAME_START1 && this.buffer[i + 1] === FRAME_START2) return i;
        }
        return -1;
    }
}
