import { createSocket, type RemoteInfo, type Socket } from 'dgram';
import { EventEmitter } from 'events';
import type { NodeConfig } from '../core/config';
import { createLogger } from '../core/logger';
import { PeerUnreachableError } from '../core/errors';
import { type DatagramChannel, normalizeAddress } from './channel';

const log = createLogger('UDP', 'cyan');

export class UdpChannel extends EventEmitter implements DatagramChannel {
    private socket: Socket;

    constructor(private config: Pick<NodeConfig, 'port' | 'broadcastAddress'>) {
        super();
        this.socket = createSocket({ type: 'udp4', reuseAddr: true });
    }

    public async start(): Promise<void> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.socket.once('error', onError);
            this.socket.bind(this.config.port, () => {
                this.socket.off('error', onError);
                this.socket.setBroadcast(true);
                this.socket.on('message', this.handleMessage.bind(this));
                this.socket.on('error', (err) => {
                    log.error(`Socket error: ${err.message}`);
                });
                log.debug(`Bound to UDP/${this.config.port}`);
                resolve();
            });
        });
    }

    public async stop(): Promise<void> {
        return new Promise((resolve) => {
            try {
                this.socket.close(() => resolve());
            } catch (err) {
                // Already closed.
                log.debug(`Close skipped: ${err instanceof Error ? err.message : String(err)}`);
                resolve();
            }
        });
    }

    public async send(data: Buffer, address: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.socket.send(data, this.config.port, address, (err) => {
                if (err) reject(new PeerUnreachableError(address, err));
                else resolve();
            });
        });
    }

    public async broadcast(data: Buffer): Promise<void> {
        return this.send(data, this.config.broadcastAddress);
    }

    private handleMessage(msg: Buffer, rinfo: RemoteInfo): void {
        this.emit('datagram', { address: normalizeAddress(rinfo.address), data: msg, via: 'datagram' });
    }
}
