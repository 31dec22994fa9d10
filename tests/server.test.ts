import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import WebSocket from 'ws';
import { WebDashboard } from '../src/web/server';
import { NetchatNode } from '../src/core/node';
import { resolveConfig } from '../src/core/config';
import { MemoryNetwork } from '../src/network/memory';
import { encodeMessage } from '../src/messaging/codec';
import { MessageKind } from '../src/messaging/types';

const SELF = '10.0.0.1';
const PEER = '10.0.0.2';

describe('WebDashboard', () => {
    let root: string;
    let network: MemoryNetwork;
    let node: NetchatNode;
    let dashboard: WebDashboard;
    let base: string;

    const post = (route: string, body: unknown) =>
        fetch(`${base}${route}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'netchat-web-'));
        network = new MemoryNetwork();
        node = new NetchatNode(
            resolveConfig({ name: 'A', address: SELF, downloadDir: path.join(root, 'downloads') }),
            network.attach(SELF),
        );
        await node.start();
        dashboard = new WebDashboard(node, 0);
        await dashboard.start();
        base = `http://127.0.0.1:${dashboard.port}`;
    });

    afterEach(async () => {
        await dashboard.stop();
        await node.stop();
        await fs.rm(root, { recursive: true, force: true });
    });

    it('describes the node and its peers', async () => {
        const seen = Date.now();
        node.peers.upsert(PEER, 'B', seen);

        const info = await fetch(`${base}/api/info`);
        expect(info.status).toBe(200);
        expect(await info.json()).toEqual({ name: 'A', address: SELF, peersCount: 1 });

        const peers = await fetch(`${base}/api/peers`);
        expect(await peers.json()).toEqual([{ address: PEER, name: 'B', lastSeen: seen }]);
    });

    it('rejects a request body that fails validation', async () => {
        const res = await post('/api/hello', { ip: 'somewhere' });

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: 'must be an IPv4 address' });
    });

    it('answers 400 when asked to greet its own address', async () => {
        const res = await post('/api/hello', { ip: SELF });

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    it('answers 404 for an unknown peer name', async () => {
        const res = await post('/api/msg', { name: 'Z', content: 'hi' });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'Peer with name "Z" not found', code: 'UNKNOWN_PEER' });
    });

    it('answers 404 for a file that does not exist', async () => {
        node.peers.upsert(PEER, 'B', Date.now());
        const missing = path.join(root, 'missing.bin');

        const res = await post('/api/send', { name: 'B', filePath: missing });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: `File not found: ${missing}`, code: 'FILE_NOT_FOUND' });
    });

    it('starts a transfer and lists it', async () => {
        node.peers.upsert(PEER, 'B', Date.now());
        const file = path.join(root, 'notes.bin');
        await fs.writeFile(file, Buffer.alloc(4000, 7));

        const res = await post('/api/send', { name: 'B', filePath: file });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ success: true, fileId: 'notes.bin', chunks: 3 });

        const transfers = await fetch(`${base}/api/transfers`);
        expect(await transfers.json()).toEqual([
            { peer: PEER, fileId: 'notes.bin', direction: 'send', total: 3, done: 0 },
        ]);
    });

    it('greets WebSocket clients with the node state and forwards events', async () => {
        const seen = Date.now();
        node.peers.upsert(PEER, 'B', seen);
        const received: unknown[] = [];
        const socket = new WebSocket(`ws://127.0.0.1:${dashboard.port}`);
        socket.on('message', (data) => received.push(JSON.parse(data.toString())));

        await vi.waitFor(() => expect(received).toHaveLength(1));
        expect(received[0]).toEqual({
            type: 'INIT',
            me: { name: 'A', address: SELF },
            peers: [{ address: PEER, name: 'B', lastSeen: seen }],
            logs: [],
        });

        await network.sendStream('10.0.0.9', SELF, encodeMessage({ kind: MessageKind.Chat, text: 'psst' }));

        await vi.waitFor(() => expect(received.length).toBeGreaterThanOrEqual(2));
        expect(received[1]).toMatchObject({
            type: 'MESSAGE',
            payload: { address: '10.0.0.9', name: 'UNKNOWN_HOST', text: 'psst' },
        });
        socket.close();
    });
});
