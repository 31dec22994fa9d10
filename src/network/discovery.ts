import { EventEmitter } from 'events';
import type { NodeConfig } from '../core/config';
import { NetchatError } from '../core/errors';
import { createLogger } from '../core/logger';
import { encodeMessage } from '../messaging/codec';
import { MessageKind } from '../messaging/types';
import type { Channels } from './channel';
import { type PeerRecord, PeerTable } from './peers';

const log = createLogger('DISCOVERY', 'cyan');

export interface NodeIdentity {
    name: string;
    address: string;
}

export type DiscoveryConfig = Pick<NodeConfig, 'broadcastIntervalMs' | 'pruningPeriodMs'>;

/**
 * Beacons, beacon/response handling and pruning.
 *
 * Emits `peer:new` when an address is first registered and `peer:lost` for
 * every record removed by a pruning sweep.
 */
export class DiscoveryService extends EventEmitter {
    private helloInterval?: NodeJS.Timeout;
    private cleanupInterval?: NodeJS.Timeout;

    constructor(
        private self: NodeIdentity,
        private peers: PeerTable,
        private channels: Channels,
        private config: DiscoveryConfig,
        private clock: () => number = Date.now,
    ) {
        super();
    }

    public start(): void {
        const broadcast = () => {
            this.beacon().catch((err) => {
                log.warn(`Broadcast failed: ${err instanceof Error ? err.message : String(err)}`);
            });
        };

        // Broadcast immediately, then on interval
        broadcast();
        this.helloInterval = setInterval(broadcast, this.config.broadcastIntervalMs);
        this.cleanupInterval = setInterval(() => this.prune(), Math.max(1, Math.floor(this.config.pruningPeriodMs / 4)));
    }

    public stop(): void {
        if (this.helloInterval) clearInterval(this.helloInterval);
        if (this.cleanupInterval) clearInterval(this.cleanupInterval);
        this.helloInterval = undefined;
        this.cleanupInterval = undefined;
    }

    public async beacon(): Promise<void> {
        log.info('Broadcasting...');
        await this.channels.datagram.broadcast(encodeMessage({ kind: MessageKind.Hello, name: this.self.name }));
    }

    /** Sends a discovery probe to an explicit address over a connection. */
    public async probe(address: string): Promise<void> {
        if (address === this.self.address) {
            throw new NetchatError('Cannot probe our own address', 'INVALID_ARGUMENT', { address });
        }
        log.info(`Saying 'hello' to ${address}`);
        await this.channels.stream.send(encodeMessage({ kind: MessageKind.Hello, name: this.self.name }), address);
    }

    public async handleHello(address: string, name: string): Promise<void> {
        if (address === this.self.address) return;

        log.info(`${address} reached to say 'hello'`);
        this.register(address, name);

        try {
            await this.channels.stream.send(encodeMessage({ kind: MessageKind.HelloAck, name: this.self.name }), address);
        } catch (err) {
            const reason = NetchatError.is(err) ? err.toString() : String(err);
            log.warn(`Could not answer ${address}: ${reason}`);
        }
    }

    public handleHelloAck(address: string, name: string): void {
        if (address === this.self.address) return;
        log.info(`${address} (${name}) answered`);
        this.register(address, name);
    }

    public prune(now: number = this.clock()): PeerRecord[] {
        const removed = this.peers.prune(now, this.config.pruningPeriodMs);
        for (const peer of removed) {
            log.info(`Pruning peer due to inactivity: ${peer.name}(${peer.address})`);
            this.emit('peer:lost', peer);
        }
        return removed;
    }

    private register(address: string, name: string): void {
        const { record, isNew } = this.peers.upsert(address, name, this.clock());
        if (isNew) {
            this.emit('peer:new', record);
        }
    }
}
