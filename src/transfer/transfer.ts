import { promises as fs } from 'fs';
import * as path from 'path';
import { EventEmitter } from 'events';
import type { NodeConfig } from '../core/config';
import {
    AssemblyFailedError,
    NetchatError,
    TransferCancelledError,
    TransferInProgressError,
    UnknownTransferError,
} from '../core/errors';
import { createLogger } from '../core/logger';
import { fileDigest, shortDigest } from '../crypto/digest';
import { type FileAckMessage, type FileChunkMessage, isControlChunk, type Message, MessageKind } from '../messaging/types';
import { loadChunks } from './chunks';
import { ReceiveContext } from './receive-context';
import { SendContext } from './send-context';

const log = createLogger('TRANSFER', 'green');

export type TransferConfig = Pick<
    NodeConfig,
    'batchSize' | 'receiveWindow' | 'packetTimeoutMs' | 'tickIntervalMs' | 'finishedRetentionMs' | 'downloadDir'
>;

/** Outbound paths the engine needs from the node. */
export interface TransferLink {
    sendDatagram(address: string, message: Message): Promise<void>;
    sendStream(address: string, message: Message): Promise<void>;
}

export type Direction = 'send' | 'receive';

export interface TransferSummary {
    peer: string;
    fileId: string;
    direction: Direction;
    total?: number;
    done: number;
}

export interface SentReport {
    peer: string;
    fileId: string;
    filePath: string;
    chunks: number;
    digest: string;
}

export interface ReceivedReport {
    peer: string;
    fileId: string;
    path: string;
    size: number;
    digest: string;
}

export interface FailedReport {
    peer: string;
    fileId: string;
    direction: Direction;
    error: NetchatError;
}

const transferKey = (peer: string, fileId: string): string => `${peer}\u0000${fileId}`;

const describe = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Per-peer send and receive contexts plus the retransmission daemon.
 *
 * Every context map is owned by this class and only changed inside
 * synchronous sections; awaits happen after the state change they follow,
 * never between a lookup and the update that depends on it.
 *
 * Events: `transfer:sent` (SentReport), `transfer:received` (ReceivedReport),
 * `transfer:failed` (FailedReport).
 */
export class TransferManager extends EventEmitter {
    private sends: Map<string, Map<string, SendContext>> = new Map();
    private receives: Map<string, Map<string, ReceiveContext>> = new Map();
    // Recently completed receives: late data chunks get a zero-credit ack, a new announcement starts over.
    private finished: Map<string, number> = new Map();
    private daemon?: NodeJS.Timeout;

    constructor(
        private link: TransferLink,
        private config: TransferConfig,
        private clock: () => number = Date.now,
    ) {
        super();
    }

    public start(): void {
        if (this.daemon) return;
        this.daemon = setInterval(() => {
            this.tick().catch((err) => log.error(`Daemon tick failed: ${describe(err)}`));
        }, this.config.tickIntervalMs);
    }

    public stop(): void {
        if (this.daemon) clearInterval(this.daemon);
        this.daemon = undefined;
    }

    // Sender

    public async startSend(peer: string, filePath: string): Promise<SendContext> {
        const file = await loadChunks(filePath, this.config.batchSize);
        const digest = await fileDigest(file.data);

        if (this.getSend(peer, file.fileId)) {
            throw new TransferInProgressError(peer, file.fileId);
        }

        const ctx = new SendContext(
            peer,
            file.fileId,
            file.path,
            file.chunks,
            digest,
            this.config.receiveWindow,
            this.clock(),
        );
        this.peerMap(this.sends, peer).set(ctx.fileId, ctx);
        log.info(`Sending ${ctx.fileId} to ${peer}: ${ctx.total} chunks of ${this.config.batchSize} bytes`);

        await this.transmit(peer, ctx.controlChunk());
        return ctx;
    }

    /**
     * One daemon step over every send: report and drop completed contexts,
     * retransmit timed-out chunks, admit new chunks while credit allows.
     */
    public async tick(now: number = this.clock()): Promise<void> {
        const outgoing: Array<{ peer: string; message: FileChunkMessage }> = [];

        for (const [peer, contexts] of this.sends) {
            for (const [fileId, ctx] of contexts) {
                if (ctx.isComplete()) {
                    contexts.delete(fileId);
                    log.info(`Sent ${fileId} to ${peer} (${ctx.total} chunks, ${shortDigest(ctx.digest)})`);
                    this.emit('transfer:sent', {
                        peer,
                        fileId,
                        filePath: ctx.filePath,
                        chunks: ctx.total,
                        digest: ctx.digest,
                    } satisfies SentReport);
                    continue;
                }
                for (const message of ctx.tick(now, this.config.packetTimeoutMs)) {
                    outgoing.push({ peer, message });
                }
            }
            if (contexts.size === 0) this.sends.delete(peer);
        }

        for (const [key, finishedAt] of this.finished) {
            if (now - finishedAt > this.config.finishedRetentionMs) this.finished.delete(key);
        }

        await Promise.all(outgoing.map(({ peer, message }) => this.transmit(peer, message)));
    }

    public onAck(peer: string, message: FileAckMessage): void {
        const ctx = this.getSend(peer, message.fileId);
        if (!ctx) {
            log.debug(new UnknownTransferError(peer, message.fileId).message);
            return;
        }
        if (ctx.onAck(message.seq, message.credit)) {
            log.debug(`${message.fileId}: ack ${message.seq} from ${peer}, credit ${message.credit} (${ctx.acknowledged.size}/${ctx.total})`);
        }
    }

    // Receiver

    public async onChunk(peer: string, message: FileChunkMessage): Promise<void> {
        const key = transferKey(peer, message.fileId);
        if (this.finished.has(key)) {
            // A new announcement is a new send of the same name.
            if (!isControlChunk(message)) {
                await this.acknowledge(peer, message.fileId, message.seq, 0);
                return;
            }
            this.finished.delete(key);
        }

        let ctx = this.getReceive(peer, message.fileId);
        if (!ctx) {
            ctx = new ReceiveContext(peer, message.fileId, this.config.receiveWindow);
            this.peerMap(this.receives, peer).set(message.fileId, ctx);
            log.info(`Receiving ${message.fileId} from ${peer}`);
        }

        ctx.accept(message);
        const credit = ctx.credit;
        const complete = ctx.isComplete();
        if (complete) {
            this.dropReceive(peer, message.fileId);
            this.finished.set(key, this.clock());
        }

        await this.acknowledge(peer, message.fileId, message.seq, credit);

        if (complete) {
            await this.complete(ctx);
        }
    }

    // Lifecycle

    /** Drops every context shared with a peer that left the table. */
    public cancelPeer(peer: string, reason: string): void {
        const sends = this.sends.get(peer);
        this.sends.delete(peer);
        for (const ctx of sends?.values() ?? []) {
            log.warn(`Abandoning ${ctx.fileId} to ${peer}: ${reason}`);
            this.emit('transfer:failed', {
                peer,
                fileId: ctx.fileId,
                direction: 'send',
                error: new TransferCancelledError(peer, ctx.fileId, reason),
            } satisfies FailedReport);
        }

        const receives = this.receives.get(peer);
        this.receives.delete(peer);
        for (const ctx of receives?.values() ?? []) {
            log.warn(`Discarding partial ${ctx.fileId} from ${peer}: ${reason}`);
        }
    }

    public getSend(peer: string, fileId: string): SendContext | undefined {
        return this.sends.get(peer)?.get(fileId);
    }

    public getReceive(peer: string, fileId: string): ReceiveContext | undefined {
        return this.receives.get(peer)?.get(fileId);
    }

    public listTransfers(): TransferSummary[] {
        const summaries: TransferSummary[] = [];
        for (const contexts of this.sends.values()) {
            for (const ctx of contexts.values()) {
                summaries.push({ peer: ctx.peer, fileId: ctx.fileId, direction: 'send', total: ctx.total, done: ctx.acknowledged.size });
            }
        }
        for (const contexts of this.receives.values()) {
            for (const ctx of contexts.values()) {
                summaries.push({ peer: ctx.peer, fileId: ctx.fileId, direction: 'receive', total: ctx.total, done: ctx.receivedCount });
            }
        }
        return summaries;
    }

    private async complete(ctx: ReceiveContext): Promise<void> {
        const fileName = path.basename(ctx.fileId);
        const target = path.join(this.config.downloadDir, fileName);

        try {
            if (fileName === '' || fileName === '.' || fileName === '..') {
                throw new Error(`unusable file name "${ctx.fileId}"`);
            }
            const data = ctx.assemble();
            await fs.mkdir(this.config.downloadDir, { recursive: true });
            await fs.writeFile(target, data);
            const digest = await fileDigest(data);

            log.info(`Received ${ctx.fileId} from ${ctx.peer}: ${data.length} bytes saved at ${target} (${shortDigest(digest)})`);
            this.emit('transfer:received', {
                peer: ctx.peer,
                fileId: ctx.fileId,
                path: target,
                size: data.length,
                digest,
            } satisfies ReceivedReport);
        } catch (err) {
            const error = new AssemblyFailedError(ctx.fileId, target, err instanceof Error ? err : undefined);
            log.error(error.toString());
            this.emit('transfer:failed', {
                peer: ctx.peer,
                fileId: ctx.fileId,
                direction: 'receive',
                error,
            } satisfies FailedReport);
        }
    }

    private async acknowledge(peer: string, fileId: string, seq: number, credit: number): Promise<void> {
        try {
            await this.link.sendStream(peer, { kind: MessageKind.FileAck, fileId, seq, credit });
        } catch (err) {
            log.warn(`Ack ${seq} of ${fileId} to ${peer} lost: ${describe(err)}`);
        }
    }

    private async transmit(peer: string, message: FileChunkMessage): Promise<void> {
        try {
            await this.link.sendDatagram(peer, message);
        } catch (err) {
            log.warn(`Chunk ${message.seq} of ${message.fileId} to ${peer} not sent: ${describe(err)}`);
        }
    }

    private dropReceive(peer: string, fileId: string): void {
        const contexts = this.receives.get(peer);
        if (!contexts) return;
        contexts.delete(fileId);
        if (contexts.size === 0) this.receives.delete(peer);
    }

    private peerMap<T>(maps: Map<string, Map<string, T>>, peer: string): Map<string, T> {
        let contexts = maps.get(peer);
        if (!contexts) {
            contexts = new Map();
            maps.set(peer, contexts);
        }
        return contexts;
    }
}
