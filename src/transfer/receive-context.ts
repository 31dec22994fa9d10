import { type FileChunkMessage, isControlChunk } from '../messaging/types';

/** Inbound state of one (peer, file) transfer. */
export class ReceiveContext {
    private received: Map<number, Buffer> = new Map();
    private expected?: number;

    constructor(readonly peer: string, readonly fileId: string, private readonly window: number) { }

    /** Total chunk count, unknown until the control chunk arrives. */
    public get total(): number | undefined {
        return this.expected;
    }

    public get receivedCount(): number {
        return this.received.size;
    }

    /** Credit advertised in acks: chunks still missing, or the window while N is unknown. */
    public get credit(): number {
        if (this.expected === undefined) return this.window;
        return Math.max(0, this.expected - this.received.size);
    }

    /**
     * Stores a chunk. Duplicates and chunks past the announced total are
     * ignored; returns true only when something new was recorded.
     */
    public accept(message: FileChunkMessage): boolean {
        if (isControlChunk(message)) {
            const changed = this.expected !== message.total;
            this.expected = message.total;
            for (const seq of this.received.keys()) {
                if (seq > message.total) this.received.delete(seq);
            }
            return changed;
        }

        if (this.expected !== undefined && message.seq > this.expected) return false;
        if (this.received.has(message.seq)) return false;

        this.received.set(message.seq, message.payload);
        return true;
    }

    public has(seq: number): boolean {
        return this.received.has(seq);
    }

    public isComplete(): boolean {
        return this.expected !== undefined && this.received.size === this.expected;
    }

    /** Payloads concatenated in sequence order. */
    public assemble(): Buffer {
        const ordered = Array.from(this.received.entries()).sort(([a], [b]) => a - b);
        return Buffer.concat(ordered.map(([, payload]) => payload));
    }
}
