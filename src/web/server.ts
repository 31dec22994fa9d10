import express, { type Response } from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import * as http from 'http';
import { isIPv4 } from 'net';
import { z } from 'zod';
import type { NetchatNode } from '../core/node';
import { NetchatError } from '../core/errors';
import { createLogger } from '../core/logger';
import type { FailedReport } from '../transfer/transfer';

const log = createLogger('WEB UI', 'green');

const HelloBodySchema = z.object({ ip: z.string().refine(isIPv4, 'must be an IPv4 address') });
const MsgBodySchema = z.object({ name: z.string().min(1), content: z.string().min(1) });
const SendBodySchema = z.object({ name: z.string().min(1), filePath: z.string().min(1) });

interface DashboardEvent {
    type: string;
    payload: unknown;
    timestamp: number;
}

const STATUS_BY_CODE: Partial<Record<NetchatError['code'], number>> = {
    UNKNOWN_PEER: 404,
    FILE_NOT_FOUND: 404,
    FILE_UNREADABLE: 422,
    TRANSFER_IN_PROGRESS: 409,
    INVALID_ARGUMENT: 400,
    CONNECTION_REFUSED: 502,
    PEER_UNREACHABLE: 502,
};

const fail = (res: Response, err: unknown) => {
    if (NetchatError.is(err)) {
        res.status(STATUS_BY_CODE[err.code] ?? 500).json({ error: err.message, code: err.code });
    } else {
        res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
};

/** REST + WebSocket view of one node: the command surface over HTTP. */
export class WebDashboard {
    private app = express();
    private server: http.Server;
    private wss: WebSocketServer;
    private clients: Set<WebSocket> = new Set();

    // Replayed to new WebSocket clients
    private logs: DashboardEvent[] = [];

    constructor(private node: NetchatNode, private uiPort: number) {
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupExpress();
        this.setupWebSocket();
        this.hookNodeEvents();
    }

    /** The bound port; differs from the requested one when that was 0. */
    public get port(): number {
        const address = this.server.address();
        return address && typeof address === 'object' ? address.port : this.uiPort;
    }

    public async start() {
        return new Promise<void>((resolve) => {
            this.server.listen(this.uiPort, () => {
                log.info(`Dashboard running at \x1b[4mhttp://localhost:${this.port}\x1b[0m`);
                resolve();
            });
        });
    }

    public async stop() {
        for (const client of this.clients) client.terminate();
        this.clients.clear();
        this.wss.close();
        return new Promise<void>((resolve) => this.server.close(() => resolve()));
    }

    private setupExpress() {
        this.app.use(cors());
        this.app.use(express.json());

        this.app.get('/api/info', (req, res) => {
            const me = this.node.whoami();
            res.json({ name: me.name, address: me.address, peersCount: this.node.getPeers().length });
        });

        this.app.get('/api/peers', (req, res) => {
            res.json(this.node.getPeers());
        });

        this.app.get('/api/transfers', (req, res) => {
            res.json(this.node.listTransfers());
        });

        this.app.post('/api/hello', async (req, res) => {
            const body = HelloBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: body.error.issues[0]?.message });
                return;
            }
            try {
                await this.node.probe(body.data.ip);
                res.json({ success: true });
            } catch (err) {
                fail(res, err);
            }
        });

        this.app.post('/api/msg', async (req, res) => {
            const body = MsgBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: body.error.issues[0]?.message });
                return;
            }
            try {
                await this.node.sendChat(body.data.name, body.data.content);
                res.json({ success: true });
            } catch (err) {
                fail(res, err);
            }
        });

        this.app.post('/api/send', async (req, res) => {
            const body = SendBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ error: body.error.issues[0]?.message });
                return;
            }
            try {
                const ctx = await this.node.sendFile(body.data.name, body.data.filePath);
                res.json({ success: true, fileId: ctx.fileId, chunks: ctx.total });
            } catch (err) {
                fail(res, err);
            }
        });
    }

    private setupWebSocket() {
        this.wss.on('connection', (ws) => {
            this.clients.add(ws);

            ws.send(JSON.stringify({
                type: 'INIT',
                me: this.node.whoami(),
                peers: this.node.getPeers(),
                logs: this.logs
            }));

            ws.on('close', () => this.clients.delete(ws));
        });
    }

    private broadcast(type: string, payload: unknown) {
        const event: DashboardEvent = { type, payload, timestamp: Date.now() };
        const msg = JSON.stringify(event);
        this.logs.push(event);
        if (this.logs.length > 100) this.logs.shift(); // keep last 100

        for (const client of this.clients) {
            if (client.readyState === WebSocket.OPEN) {
                client.send(msg);
            }
        }
    }

    private hookNodeEvents() {
        const forward: Array<[string, string]> = [
            ['peer:new', 'PEER_NEW'],
            ['peer:lost', 'PEER_LOST'],
            ['chat', 'MESSAGE'],
            ['transfer:sent', 'TRANSFER_SENT'],
            ['transfer:received', 'TRANSFER_RECEIVED'],
        ];
        for (const [event, type] of forward) {
            this.node.on(event, (payload: unknown) => this.broadcast(type, payload));
        }

        this.node.on('transfer:failed', (report: FailedReport) => {
            this.broadcast('TRANSFER_FAILED', { peer: report.peer, fileId: report.fileId, error: report.error.message });
        });
    }
}
