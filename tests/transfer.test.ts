import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    type FailedReport,
    type ReceivedReport,
    type SentReport,
    type TransferConfig,
    type TransferLink,
    TransferManager,
} from '../src/transfer/transfer';
import { decodeMessage, encodeMessage } from '../src/messaging/codec';
import { type FileAckMessage, type FileChunkMessage, type Message, MessageKind } from '../src/messaging/types';
import {
    AssemblyFailedError,
    FileNotFoundError,
    PeerUnreachableError,
    TransferCancelledError,
    TransferInProgressError,
} from '../src/core/errors';

const SENDER = '10.0.0.1';
const RECEIVER = '10.0.0.2';

const transferConfig = (downloadDir: string): TransferConfig => ({
    batchSize: 1500,
    receiveWindow: 4,
    packetTimeoutMs: 1000,
    tickIntervalMs: 100,
    finishedRetentionMs: 30000,
    downloadDir,
});

const patterned = (size: number): Buffer => Buffer.from(Array.from({ length: size }, (_, i) => i % 251));

// Every message crosses the codec, as it would on the wire.
const asChunk = (message: Message): FileChunkMessage => {
    const decoded = decodeMessage(encodeMessage(message));
    if (decoded.kind !== MessageKind.FileChunk) throw new Error(`expected a file chunk, got ${decoded.kind}`);
    return decoded;
};

const asAck = (message: Message): FileAckMessage => {
    const decoded = decodeMessage(encodeMessage(message));
    if (decoded.kind !== MessageKind.FileAck) throw new Error(`expected an ack, got ${decoded.kind}`);
    return decoded;
};

interface LossPlan {
    dropChunk?: (message: FileChunkMessage, attempt: number) => boolean;
    dropAck?: (message: FileAckMessage, attempt: number) => boolean;
}

const countAttempt = (attempts: Map<number, number>, seq: number): number => {
    const attempt = (attempts.get(seq) ?? 0) + 1;
    attempts.set(seq, attempt);
    return attempt;
};

/** Two engines joined back to back: chunks flow one way, acks the other. */
const connect = (config: TransferConfig, clock: () => number, loss: LossPlan = {}) => {
    const chunkAttempts = new Map<number, number>();
    const ackAttempts = new Map<number, number>();
    const acks: FileAckMessage[] = [];

    const senderLink: TransferLink = {
        sendDatagram: async (address, message) => {
            const chunk = asChunk(message);
            const attempt = countAttempt(chunkAttempts, chunk.seq);
            if (address !== RECEIVER || loss.dropChunk?.(chunk, attempt)) return;
            await receiver.onChunk(SENDER, chunk);
        },
        sendStream: async () => {
            throw new Error('the sending side never acknowledges');
        },
    };

    const receiverLink: TransferLink = {
        sendDatagram: async () => {
            throw new Error('the receiving side never sends chunks');
        },
        sendStream: async (address, message) => {
            const ack = asAck(message);
            const attempt = countAttempt(ackAttempts, ack.seq);
            acks.push(ack);
            if (loss.dropAck?.(ack, attempt)) throw new PeerUnreachableError(address);
            sender.onAck(RECEIVER, ack);
        },
    };

    const sender = new TransferManager(senderLink, config, clock);
    const receiver = new TransferManager(receiverLink, config, clock);
    return { sender, receiver, chunkAttempts, ackAttempts, acks };
};

describe('TransferManager', () => {
    let root: string;
    let sourceDir: string;
    let downloadDir: string;
    let now: number;
    const clock = () => now;

    const drive = async (manager: TransferManager, step: number, limit: number, done: () => boolean) => {
        for (let i = 0; i < limit && !done(); i++) {
            now += step;
            await manager.tick(now);
        }
    };

    const writeSource = async (name: string, data: Buffer | string): Promise<string> => {
        const file = path.join(sourceDir, name);
        await fs.writeFile(file, data);
        return file;
    };

    beforeEach(async () => {
        now = 0;
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'netchat-transfer-'));
        sourceDir = path.join(root, 'source');
        downloadDir = path.join(root, 'downloads');
        await fs.mkdir(sourceDir);
    });

    afterEach(async () => {
        await fs.rm(root, { recursive: true, force: true });
    });

    it('delivers a file byte-for-byte and reports both ends', async () => {
        const original = patterned(3 * 1500 + 17);
        const file = await writeSource('payload.bin', original);
        const { sender, receiver } = connect(transferConfig(downloadDir), clock);

        const sent: SentReport[] = [];
        const received: ReceivedReport[] = [];
        sender.on('transfer:sent', (report: SentReport) => sent.push(report));
        receiver.on('transfer:received', (report: ReceivedReport) => received.push(report));

        const ctx = await sender.startSend(RECEIVER, file);
        expect(ctx.total).toBe(4);
        expect(ctx.isControlAcknowledged).toBe(true);

        await drive(sender, 100, 10, () => sent.length > 0);

        expect(sent).toHaveLength(1);
        expect(sent[0]).toMatchObject({ peer: RECEIVER, fileId: 'payload.bin', chunks: 4 });
        expect(received).toHaveLength(1);
        expect(received[0]).toMatchObject({
            peer: SENDER,
            fileId: 'payload.bin',
            path: path.join(downloadDir, 'payload.bin'),
            size: 4517,
            digest: sent[0].digest,
        });

        const written = await fs.readFile(path.join(downloadDir, 'payload.bin'));
        expect(written.equals(original)).toBe(true);
        expect(sender.getSend(RECEIVER, 'payload.bin')).toBeUndefined();
        expect(receiver.getReceive(SENDER, 'payload.bin')).toBeUndefined();
    });

    it('recovers lost chunks and lost acks by retransmission', async () => {
        const original = patterned(3 * 1500 + 17);
        const file = await writeSource('payload.bin', original);
        const { sender, chunkAttempts, ackAttempts } = connect(transferConfig(downloadDir), clock, {
            dropChunk: (chunk, attempt) => chunk.seq === 2 && attempt <= 3,
            dropAck: (ack, attempt) => ack.seq === 3 && attempt === 1,
        });

        let sent = false;
        sender.on('transfer:sent', () => {
            sent = true;
        });

        await sender.startSend(RECEIVER, file);
        await drive(sender, 600, 40, () => sent);

        expect(sent).toBe(true);
        expect(chunkAttempts.get(2)).toBe(4);
        expect(ackAttempts.get(3)).toBe(2);
        const written = await fs.readFile(path.join(downloadDir, 'payload.bin'));
        expect(written.equals(original)).toBe(true);
    });

    it('acknowledges late duplicates of a finished file with zero credit', async () => {
        const file = await writeSource('small.txt', 'hello world');
        const { sender, receiver, acks } = connect(transferConfig(downloadDir), clock);

        let received = 0;
        receiver.on('transfer:received', () => received++);
        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => received > 0);

        await receiver.onChunk(SENDER, { kind: MessageKind.FileChunk, fileId: 'small.txt', seq: 1, payload: Buffer.from('hello world') });

        expect(acks[acks.length - 1]).toEqual({ kind: MessageKind.FileAck, fileId: 'small.txt', seq: 1, credit: 0 });
        expect(receiver.getReceive(SENDER, 'small.txt')).toBeUndefined();
        expect(received).toBe(1);
    });

    it('starts a fresh receive when a finished file is announced again', async () => {
        const file = await writeSource('small.txt', 'hello world');
        const { sender, receiver, acks } = connect(transferConfig(downloadDir), clock);

        let received = 0;
        receiver.on('transfer:received', () => received++);
        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => received > 0);

        await receiver.onChunk(SENDER, { kind: MessageKind.FileChunk, fileId: 'small.txt', seq: 0, total: 2 });

        expect(receiver.getReceive(SENDER, 'small.txt')?.total).toBe(2);
        expect(acks[acks.length - 1]).toEqual({ kind: MessageKind.FileAck, fileId: 'small.txt', seq: 0, credit: 2 });

        await receiver.onChunk(SENDER, { kind: MessageKind.FileChunk, fileId: 'small.txt', seq: 1, payload: Buffer.from('new') });

        expect(receiver.getReceive(SENDER, 'small.txt')?.receivedCount).toBe(1);
        expect(acks[acks.length - 1]).toEqual({ kind: MessageKind.FileAck, fileId: 'small.txt', seq: 1, credit: 1 });
    });

    it('sends a changed file again under the same name within the retention period', async () => {
        const first = patterned(4000);
        const changed = Buffer.from(Array.from(first, byte => 255 - byte));
        const file = await writeSource('doc.bin', first);
        const { sender, receiver } = connect(transferConfig(downloadDir), clock);

        let sent = 0;
        const received: ReceivedReport[] = [];
        sender.on('transfer:sent', () => sent++);
        receiver.on('transfer:received', (report: ReceivedReport) => received.push(report));

        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => sent === 1);
        expect(sent).toBe(1);

        await fs.writeFile(file, changed);
        now += 1000;
        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => sent === 2);

        expect(sent).toBe(2);
        expect(received).toHaveLength(2);
        expect(received[1].digest).not.toBe(received[0].digest);
        const written = await fs.readFile(path.join(downloadDir, 'doc.bin'));
        expect(written.equals(changed)).toBe(true);
    });

    it('forgets finished files after the retention period', async () => {
        const file = await writeSource('small.txt', 'hello world');
        const { sender, receiver, acks } = connect(transferConfig(downloadDir), clock);

        let received = 0;
        receiver.on('transfer:received', () => received++);
        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => received > 0);

        now += 30001;
        await receiver.tick(now);
        await receiver.onChunk(SENDER, { kind: MessageKind.FileChunk, fileId: 'small.txt', seq: 1, payload: Buffer.from('hello world') });

        expect(receiver.getReceive(SENDER, 'small.txt')?.receivedCount).toBe(1);
        expect(acks[acks.length - 1]).toEqual({ kind: MessageKind.FileAck, fileId: 'small.txt', seq: 1, credit: 4 });
    });

    it('advertises the receive window before the chunk count is known', async () => {
        const acks: FileAckMessage[] = [];
        const receiver = new TransferManager({
            sendDatagram: async () => undefined,
            sendStream: async (_address, message) => {
                acks.push(asAck(message));
            },
        }, transferConfig(downloadDir), clock);

        await receiver.onChunk(SENDER, { kind: MessageKind.FileChunk, fileId: 'a.txt', seq: 2, payload: Buffer.from('b') });

        expect(acks).toEqual([{ kind: MessageKind.FileAck, fileId: 'a.txt', seq: 2, credit: 4 }]);
        expect(receiver.listTransfers()).toEqual([
            { peer: SENDER, fileId: 'a.txt', direction: 'receive', total: undefined, done: 1 },
        ]);
    });

    it('ignores acks for transfers it does not know', () => {
        const { sender } = connect(transferConfig(downloadDir), clock);

        expect(() => sender.onAck(RECEIVER, { kind: MessageKind.FileAck, fileId: 'ghost.bin', seq: 1, credit: 3 })).not.toThrow();
        expect(sender.listTransfers()).toEqual([]);
    });

    it('rejects a missing file without creating a transfer', async () => {
        const { sender } = connect(transferConfig(downloadDir), clock);

        await expect(sender.startSend(RECEIVER, path.join(sourceDir, 'missing.bin'))).rejects.toBeInstanceOf(FileNotFoundError);
        expect(sender.listTransfers()).toEqual([]);
    });

    it('refuses to send the same file to the same peer twice at once', async () => {
        const file = await writeSource('payload.bin', patterned(4000));
        const { sender } = connect(transferConfig(downloadDir), clock);

        await sender.startSend(RECEIVER, file);

        await expect(sender.startSend(RECEIVER, file)).rejects.toBeInstanceOf(TransferInProgressError);
        expect(sender.listTransfers()).toEqual([
            { peer: RECEIVER, fileId: 'payload.bin', direction: 'send', total: 3, done: 0 },
        ]);
    });

    it('abandons every transfer shared with a departed peer', async () => {
        const file = await writeSource('payload.bin', patterned(4000));
        const { sender, receiver } = connect(transferConfig(downloadDir), clock);

        const failures: FailedReport[] = [];
        sender.on('transfer:failed', (report: FailedReport) => failures.push(report));

        await sender.startSend(RECEIVER, file);
        expect(receiver.getReceive(SENDER, 'payload.bin')).toBeDefined();

        sender.cancelPeer(RECEIVER, 'peer pruned');
        receiver.cancelPeer(SENDER, 'peer pruned');

        expect(failures).toHaveLength(1);
        expect(failures[0]).toMatchObject({ peer: RECEIVER, fileId: 'payload.bin', direction: 'send' });
        expect(failures[0].error).toBeInstanceOf(TransferCancelledError);
        expect(sender.getSend(RECEIVER, 'payload.bin')).toBeUndefined();
        expect(receiver.getReceive(SENDER, 'payload.bin')).toBeUndefined();
    });

    it('reports a file that cannot be written and discards it', async () => {
        const blocker = await writeSource('blocker', 'not a directory');
        const file = await writeSource('small.txt', 'hello world');
        const { sender, receiver } = connect(transferConfig(path.join(blocker, 'inbox')), clock);

        const failures: FailedReport[] = [];
        receiver.on('transfer:failed', (report: FailedReport) => failures.push(report));

        await sender.startSend(RECEIVER, file);
        await drive(sender, 100, 10, () => failures.length > 0);

        expect(failures).toHaveLength(1);
        expect(failures[0]).toMatchObject({ peer: SENDER, fileId: 'small.txt', direction: 'receive' });
        expect(failures[0].error).toBeInstanceOf(AssemblyFailedError);
        expect(receiver.getReceive(SENDER, 'small.txt')).toBeUndefined();
    });
});
