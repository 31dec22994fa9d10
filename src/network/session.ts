import { createLogger } from '../core/logger';
import type { Inbound } from './channel';
import { type InboundHandler, Listener } from './listener';

const log = createLogger('SESSION', 'magenta');

/** The two receive loops of one known peer. */
export class PeerSession {
    readonly stream: Listener;
    readonly datagram: Listener;

    constructor(readonly address: string, handler: InboundHandler) {
        this.stream = new Listener(`stream listener ${address}`, handler);
        this.datagram = new Listener(`datagram listener ${address}`, handler);
    }

    public start(): void {
        this.stream.start();
        this.datagram.start();
    }

    public push(inbound: Inbound): void {
        if (inbound.via === 'stream') this.stream.push(inbound);
        else this.datagram.push(inbound);
    }

    public async stop(): Promise<void> {
        await Promise.all([this.stream.stop(), this.datagram.stop()]);
    }
}

/** Supervises one PeerSession per known peer address. */
export class SessionRegistry {
    private sessions: Map<string, PeerSession> = new Map();

    constructor(private handler: InboundHandler) { }

    /** Starts the peer's listeners unless they are already running. */
    public ensure(address: string): PeerSession {
        const existing = this.sessions.get(address);
        if (existing) return existing;

        const session = new PeerSession(address, this.handler);
        this.sessions.set(address, session);
        session.start();
        log.info(`Listening to ${address}`);
        return session;
    }

    public get(address: string): PeerSession | undefined {
        return this.sessions.get(address);
    }

    public has(address: string): boolean {
        return this.sessions.has(address);
    }

    public async retire(address: string): Promise<void> {
        const session = this.sessions.get(address);
        if (!session) return;
        this.sessions.delete(address);
        await session.stop();
        log.info(`${address} listeners closed.`);
    }

    public async stopAll(): Promise<void> {
        const sessions = Array.from(this.sessions.values());
        this.sessions.clear();
        await Promise.all(sessions.map(session => session.stop()));
    }

    public get size(): number {
        return this.sessions.size;
    }
}
