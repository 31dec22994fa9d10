import { createServer, type Server, type Socket } from 'net';
import { EventEmitter } from 'events';
import type { NodeConfig } from '../core/config';
import { createLogger } from '../core/logger';
import { type StreamChannel, normalizeAddress } from './channel';
import { TCPClient } from './client';

const log = createLogger('TCP', 'cyan');

// A single message per connection; anything larger is not one of ours.
const MAX_MESSAGE_BYTES = 64 * 1024;

export class TcpChannel extends EventEmitter implements StreamChannel {
    private server: Server;
    private sockets: Set<Socket> = new Set();

    constructor(private config: Pick<NodeConfig, 'port' | 'connectTimeoutMs'>) {
        super();
        this.server = createServer(this.handleConnection.bind(this));
    }

    public async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.server.once('error', onError);
            this.server.listen(this.config.port, () => {
                this.server.off('error', onError);
                log.debug(`Listening on TCP/${this.config.port}`);
                resolve();
            });
        });
    }

    public async stop(): Promise<void> {
        for (const socket of this.sockets) socket.destroy();
        this.sockets.clear();
        return new Promise((resolve) => {
            this.server.close(() => resolve());
        });
    }

    public async send(data: Buffer, address: string): Promise<void> {
        const client = new TCPClient(address, this.config.port, this.config.connectTimeoutMs);
        await client.send(data);
    }

    private handleConnection(socket: Socket) {
        const address = normalizeAddress(socket.remoteAddress);
        const parts: Buffer[] = [];
        let size = 0;
        this.sockets.add(socket);

        socket.on('data', (data: Buffer) => {
            size += data.length;
            if (size > MAX_MESSAGE_BYTES) {
                log.warn(`Dropping oversized message from ${address}`);
                socket.destroy();
                return;
            }
            parts.push(data);
        });

        socket.on('end', () => {
            if (size > 0) {
                this.emit('message', { address, data: Buffer.concat(parts), via: 'stream' });
            }
            socket.end();
        });

        socket.on('close', () => {
            this.sockets.delete(socket);
        });

        socket.on('error', (err) => {
            log.debug(`Connection from ${address} failed: ${err.message}`);
        });
    }
}
