/**
 * Transport seams of the node. The real implementations sit on dgram and
 * net (see udp.ts and tcp.ts); tests plug in the in-memory network instead.
 */

export type Via = 'datagram' | 'stream';

export interface Inbound {
    address: string;
    data: Buffer;
    via: Via;
}

/** Connectionless, unordered, lossy: beacons and file chunks. */
export interface DatagramChannel {
    start(): Promise<void>;
    stop(): Promise<void>;
    send(data: Buffer, address: string): Promise<void>;
    broadcast(data: Buffer): Promise<void>;
    on(event: 'datagram', listener: (inbound: Inbound) => void): this;
    off(event: 'datagram', listener: (inbound: Inbound) => void): this;
}

/** Connection oriented, one message per connection: responses, chat, acks. */
export interface StreamChannel {
    start(): Promise<void>;
    stop(): Promise<void>;
    send(data: Buffer, address: string): Promise<void>;
    on(event: 'message', listener: (inbound: Inbound) => void): this;
    off(event: 'message', listener: (inbound: Inbound) => void): this;
}

export interface Channels {
    datagram: DatagramChannel;
    stream: StreamChannel;
}

/** Strips the IPv4-mapped IPv6 prefix Node reports for dual-stack sockets. */
export const normalizeAddress = (address: string | undefined): string => {
    if (!address) return 'unknown';
    return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
};
