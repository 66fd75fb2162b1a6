// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/store/messages.ts
// MessageStore — bounded cache of inbound text messages in arrival order.
// Inserting past capacity evicts the oldest message.

import { createHash, randomBytes } from "crypto";
import { NotFoundError } from "@meshgate/core";
import type { StoredMessage } from "../types/state.js";

export const DEFAULT_MESSAGE_CAPACITY = 100;
const ID_LENGTH = 10;

export type MessageIdGenerator = (nodeId: number, text: string) => string;

/** First 10 hex chars of MD5(random ‖ nodeId ‖ text). */
export const hashMessageId: MessageIdGenerator = (nodeId, text) =>
    createHash("md5")
        .update(randomBytes(16))
        .update(String(nodeId))
        .update(text)
        .digest("hex")
        .slice(0, ID_LENGTH);

export interface MessageStoreOptions {
    capacity?: number;
    generateId?: MessageIdGenerator;
}

export class MessageStore {
    readonly capacity: number;
    // Map iteration order is insertion order, and ids are never re-set,
    // so the first key is always the oldest message.
    private readonly messages = new Map<string, StoredMessage>();
    private readonly generateId: MessageIdGenerator;
    private seq = 0;

    constructor(opts: MessageStoreOptions = {}) {
        this.capacity = opts.capacity ?? DEFAULT_MESSAGE_CAPACITY;
        if (!Number.isInteger(this.capacity) || this.capacity < 1) {
            throw new RangeError(`MessageStore capacity must be a positive integer, got ${this.capacity}`);
        }
        this.generateId = opts.generateId ?? hashMessageId;
    }

    /** Store a message and return its generated id. */
    insert(nodeId: number, text: string): string {
        let id = this.generateId(nodeId, text);
        while (this.messages.has(id)) {
            id = this.generateId(nodeId, text);
        }

        this.messages.set(id, { id, nodeId, text, seq: ++this.seq, receivedAt: new Date() });

        if (this.messages.size > this.capacity) {
            const oldest = this.messages.keys().next();
            if (!oldest.done) this.messages.delete(oldest.value);
        }
        return id;
    }

    /** Remove a message. Throws NotFoundError if the id is unknown. */
    delete(id: string): void {
        if (!this.messages.delete(id)) {
            throw new NotFoundError(id);
        }
    }

    get(id: string): StoredMessage | undefined {
        const msg = this.messages.get(id);
        return msg ? { ...msg } : undefined;
    }

    /** Ordered copy, oldest first. */
    snapshot(): Map<string, StoredMessage> {
        return new Map([...this.messages].map(([id, m]) => [id, { ...m }]));
    }

    get size(): number {
        return this.messages.size;
    }
}
