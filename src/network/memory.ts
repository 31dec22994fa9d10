/**
 * In-process network.
 *
 * Nodes attach by address and get a datagram and a stream channel that
 * behave like the socket ones: datagrams may be dropped silently, stream
 * sends to an absent or stopped address are refused, and delivery is always
 * asynchronous. Used by the tests to run several nodes in one process.
 */

import { EventEmitter } from 'events';
import { ConnectionRefusedError, PeerUnreachableError } from '../core/errors';
import type { Channels, DatagramChannel, Inbound, StreamChannel, Via } from './channel';

export interface Packet {
    from: string;
    to: string;
    via: Via;
    data: Buffer;
}

/** Returns true for packets the network should lose. */
export type DropFilter = (packet: Packet) => boolean;

export class MemoryNetwork {
    private datagramChannels: Map<string, MemoryDatagramChannel> = new Map();
    private streamChannels: Map<string, MemoryStreamChannel> = new Map();
    private dropFilter?: DropFilter;

    public delivered = 0;
    public dropped = 0;

    public attach(address: string): Channels {
        const datagram = new MemoryDatagramChannel(this, address);
        const stream = new MemoryStreamChannel(this, address);
        this.datagramChannels.set(address, datagram);
        this.streamChannels.set(address, stream);
        return { datagram, stream };
    }

    public setDropFilter(filter?: DropFilter): void {
        this.dropFilter = filter;
    }

    public sendDatagram(from: string, to: string, data: Buffer): void {
        const target = this.datagramChannels.get(to);
        if (!target || !target.running) return;
        if (this.shouldDrop({ from, to, via: 'datagram', data })) return;
        this.deliver(target, { address: from, data: Buffer.from(data), via: 'datagram' });
    }

    public broadcastDatagram(from: string, data: Buffer): void {
        for (const address of this.datagramChannels.keys()) {
            this.sendDatagram(from, address, data);
        }
    }

    public async sendStream(from: string, to: string, data: Buffer): Promise<void> {
        const target = this.streamChannels.get(to);
        if (!target || !target.running) {
            throw new ConnectionRefusedError(to);
        }
        if (this.shouldDrop({ from, to, via: 'stream', data })) {
            throw new PeerUnreachableError(to, new Error('connection lost'));
        }
        this.deliver(target, { address: from, data: Buffer.from(data), via: 'stream' });
    }

    private shouldDrop(packet: Packet): boolean {
        if (this.dropFilter && this.dropFilter(packet)) {
            this.dropped++;
            return true;
        }
        return false;
    }

    private deliver(target: MemoryDatagramChannel | MemoryStreamChannel, inbound: Inbound): void {
        setImmediate(() => {
            if (!target.running) return;
            this.delivered++;
            target.receive(inbound);
        });
    }
}

export class MemoryDatagramChannel extends EventEmitter implements DatagramChannel {
    public running = false;

    constructor(private network: MemoryNetwork, readonly address: string) {
        super();
    }

    public async start(): Promise<void> {
        this.running = true;
    }

    public async stop(): Promise<void> {
        this.running = false;
    }

    public async send(data: Buffer, address: string): Promise<void> {
        this.network.sendDatagram(this.address, address, data);
    }

    public async broadcast(data: Buffer): Promise<void> {
        this.network.broadcastDatagram(this.address, data);
    }

    public receive(inbound: Inbound): void {
        this.emit('datagram', inbound);
    }
}

export class MemoryStreamChannel extends EventEmitter implements StreamChannel {
    public running = false;

    constructor(private network: MemoryNetwork, readonly address: string) {
        super();
    }

    public async start(): Promise<void> {
        this.running = true;
    }

    public async stop(): Promise<void> {
        this.running = false;
    }

    public async send(data: Buffer, address: string): Promise<void> {
        return this.network.sendStream(this.address, address, data);
    }

    public receive(inbound: Inbound): void {
        this.emit('message', inbound);
    }
}
