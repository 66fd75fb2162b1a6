// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/mesh/src/store/nodes.ts
// NodeRegistry — every node ever heard on the mesh, keyed by numeric id.
// Entries are never updated or removed; the first long id seen wins.

import type { MeshNodeRecord } from "../types/state.js";

export class NodeRegistry {
    private readonly nodes = new Map<number, MeshNodeRecord>();

    /** Record a node on first sighting. Returns true if it was new. */
    registerIfAbsent(nodeId: number, longId: string): boolean {
        if (this.nodes.has(nodeId)) return false;
        this.nodes.set(nodeId, { nodeId, longId, firstSeenAt: new Date() });
        return true;
    }

    get(nodeId: number): MeshNodeRecord | undefined {
        const node = this.nodes.get(nodeId);
        return node ? { ...node } : undefined;
    }

    snapshot(): Map<number, MeshNodeRecord> {
        return new Map([...this.nodes].map(([id, n]) => [id, { ...n }]));
    }

    size(): number {
        return this.nodes.size;
    }
}
