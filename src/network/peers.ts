export interface PeerRecord {
    address: string;
    name: string;
    lastSeen: number;
}

/**
 * Known peers keyed by network address.
 *
 * Every method runs to completion without yielding, so discovery, the
 * session listeners and the transfer daemon never observe a half-applied
 * update.
 */
export class PeerTable {
    private peers: Map<string, PeerRecord> = new Map();

    public upsert(address: string, name: string, now: number): { record: PeerRecord; isNew: boolean } {
        const isNew = !this.peers.has(address);
        const record: PeerRecord = { address, name, lastSeen: now };
        this.peers.set(address, record);
        return { record: { ...record }, isNew };
    }

    /** Refreshes `lastSeen` of a known peer; returns false for unknown addresses. */
    public touch(address: string, now: number): boolean {
        const peer = this.peers.get(address);
        if (!peer) return false;
        peer.lastSeen = now;
        return true;
    }

    public get(address: string): PeerRecord | undefined {
        const peer = this.peers.get(address);
        return peer ? { ...peer } : undefined;
    }

    public has(address: string): boolean {
        return this.peers.has(address);
    }

    public findByName(name: string): PeerRecord | undefined {
        for (const peer of this.peers.values()) {
            if (peer.name === name) return { ...peer };
        }
        return undefined;
    }

    public list(): PeerRecord[] {
        return Array.from(this.peers.values(), peer => ({ ...peer }));
    }

    public delete(address: string): boolean {
        return this.peers.delete(address);
    }

    public prune(now: number, period: number): PeerRecord[] {
        const removed: PeerRecord[] = [];
        for (const [address, peer] of this.peers.entries()) {
            if (now - peer.lastSeen > period) {
                this.peers.delete(address);
                removed.push({ ...peer });
            }
        }
        return removed;
    }

    public get size(): number {
        return this.peers.size;
    }
}
