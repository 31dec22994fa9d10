import { type ControlChunkMessage, type DataChunkMessage, type FileChunkMessage, MessageKind } from '../messaging/types';

/**
 * Outbound state of one (peer, file) transfer.
 *
 * Sequence numbers 1..total are data chunks; 0 is the control chunk that
 * announces `total`. A sequence number is either in flight, acknowledged,
 * or not sent yet, never two of these at once.
 */
export class SendContext {
    readonly total: number;
    credit: number;

    private sentAt: Map<number, number> = new Map(); // seq -> last sent at
    private acked: Set<number> = new Set();
    private cursor = 1;
    private controlSentAt: number;
    private lastSentAt: number;
    private controlAcked = false;

    constructor(
        readonly peer: string,
        readonly fileId: string,
        readonly filePath: string,
        private readonly chunks: readonly Buffer[],
        readonly digest: string,
        initialCredit: number,
        now: number,
    ) {
        this.total = chunks.length;
        this.credit = initialCredit;
        this.controlSentAt = now;
        this.lastSentAt = now;
    }

    public get inFlight(): ReadonlyMap<number, number> {
        return this.sentAt;
    }

    public get acknowledged(): ReadonlySet<number> {
        return this.acked;
    }

    /** Next sequence number to transmit for the first time. */
    public get nextSeq(): number {
        return this.cursor;
    }

    public get isControlAcknowledged(): boolean {
        return this.controlAcked;
    }

    public controlChunk(): ControlChunkMessage {
        return { kind: MessageKind.FileChunk, fileId: this.fileId, seq: 0, total: this.total };
    }

    public dataChunk(seq: number): DataChunkMessage {
        const payload = this.chunks[seq - 1];
        if (!payload) {
            throw new RangeError(`No chunk ${seq} in ${this.fileId} (${this.total} chunks)`);
        }
        return { kind: MessageKind.FileChunk, fileId: this.fileId, seq, payload };
    }

    /**
     * One daemon step: re-sends every chunk whose last transmission is older
     * than `timeoutMs`, then admits new chunks in order while the window has
     * room. With a zero window and nothing in flight, the next chunk goes out
     * alone once `timeoutMs` has passed, so its ack can reopen the window.
     * Returns the messages to put on the wire.
     */
    public tick(now: number, timeoutMs: number): FileChunkMessage[] {
        const outgoing: FileChunkMessage[] = [];

        if (!this.controlAcked && now - this.controlSentAt > timeoutMs) {
            this.controlSentAt = now;
            outgoing.push(this.controlChunk());
        }

        for (const [seq, sentAt] of this.sentAt) {
            if (now - sentAt > timeoutMs) {
                this.sentAt.set(seq, now);
                outgoing.push(this.dataChunk(seq));
            }
        }

        while (this.sentAt.size < this.credit && this.cursor <= this.total) {
            outgoing.push(this.admit(now));
        }

        const stalled = this.credit === 0 && this.sentAt.size === 0 && this.cursor <= this.total;
        if (stalled && now - this.lastSentAt > timeoutMs) {
            outgoing.push(this.admit(now));
        }

        if (outgoing.length > 0) this.lastSentAt = now;
        return outgoing;
    }

    /**
     * Applies an acknowledgement. The advertised credit always replaces the
     * current one; the sequence number is recorded once. Returns true when
     * the ack acknowledged something new.
     */
    public onAck(seq: number, advertisedCredit: number): boolean {
        this.credit = Math.max(0, advertisedCredit);

        if (seq === 0) {
            if (this.controlAcked) return false;
            this.controlAcked = true;
            return true;
        }

        if (seq >= this.cursor || this.acked.has(seq)) return false;

        this.sentAt.delete(seq);
        this.acked.add(seq);
        return true;
    }

    public isComplete(): boolean {
        return this.controlAcked && this.acked.size === this.total;
    }

    private admit(now: number): DataChunkMessage {
        const seq = this.cursor++;
        this.sentAt.set(seq, now);
        return this.dataChunk(seq);
    }
}
