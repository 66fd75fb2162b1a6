// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/link/stream.ts
// Pieces shared by the socket drivers: the packet queue behind link.packets
// and the bounded wait for a link's handshake.

import { TransportError } from "@meshgate/core";
import type { RadioPacket } from "../types/packet.js";

// ─────────────────────────────────────────────────────────────────────────────
// Packet queue — push side fed by the socket, pull side is link.packets
// ─────────────────────────────────────────────────────────────────────────────

interface Waiter {
    resolve: (result: IteratorResult<RadioPacket>) => void;
    reject: (err: Error) => void;
}

export class PacketQueue implements AsyncIterable<RadioPacket> {
    private readonly buffer: RadioPacket[] = [];
    private readonly waiters: Waiter[] = [];
    private ended = false;
    private failure: Error | null = null;

    push(packet: RadioPacket): void {
        if (this.ended) return;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve({ value: packet, done: false });
        } else {
            this.buffer.push(packet);
        }
    }

    /** End the stream; with an error, readers see it after the buffered packets. */
    end(err?: Error): void {
        if (this.ended) return;
        this.ended = true;
        this.failure = err ?? null;
        for (const waiter of this.waiters.splice(0)) {
            if (err) waiter.reject(err);
            else waiter.resolve({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<RadioPacket> {
        return {
            next: (): Promise<IteratorResult<RadioPacket>> => {
                const packet = this.buffer.shift();
                if (packet) return Promise.resolve({ value: packet, done: false });
                if (this.ended) {
                    return this.failure
                        ? Promise.reject(this.failure)
                        : Promise.resolve({ value: undefined, done: true });
                }
                return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
            },
        };
    }
}

// ─────────────────────────────────────────────────────────────────────────────
// Handshake wait
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Wait for `ready`, failing with TransportError after `timeoutMs` or when
 * `signal` aborts. The caller closes the link on failure.
 */
export async function waitUntilReady<T>(
    ready: Promise<T>,
    timeoutMs: number,
    what: string,
    signal?: AbortSignal,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TransportError(`Timed out after ${timeoutMs}ms waiting for ${what}`)), timeoutMs);
        onAbort = () => reject(new TransportError("Connect aborted"));
        signal?.addEventListener("abort", onAbort, { once: true });
    });

    try {
        return await Promise.race([ready, cancelled]);
    } finally {
        clearTimeout(timer);
        if (onAbort) signal?.removeEventListener("abort", onAbort);
    }
}
