import { EventEmitter } from 'events';
import type { NodeConfig } from './config';
import { MalformedMessageError, UnknownPeerError, UnknownTransferError } from './errors';
import { createLogger } from './logger';
import { decodeMessage, encodeMessage } from '../messaging/codec';
import { type Message, MessageKind } from '../messaging/types';
import type { Channels, Inbound } from '../network/channel';
import { DiscoveryService, type NodeIdentity } from '../network/discovery';
import { Listener } from '../network/listener';
import { type PeerRecord, PeerTable } from '../network/peers';
import { SessionRegistry } from '../network/session';
import { TcpChannel } from '../network/tcp';
import { UdpChannel } from '../network/udp';
import type { SendContext } from '../transfer/send-context';
import { TransferManager, type TransferSummary } from '../transfer/transfer';

const log = createLogger('NODE', 'green');
const chatLog = createLogger('MSG', 'cyan');

export interface ChatEvent {
    address: string;
    name: string;
    text: string;
    receivedAt: number;
}

export const createSocketChannels = (config: NodeConfig): Channels => ({
    datagram: new UdpChannel(config),
    stream: new TcpChannel(config),
});

/**
 * A netchat node: discovery, per-peer session listeners, chat and the
 * reliable file transfer engine on top of one datagram and one stream
 * channel.
 *
 * Events: `peer:new`, `peer:lost` (PeerRecord), `chat` (ChatEvent),
 * `transfer:sent`, `transfer:received`, `transfer:failed`.
 */
export class NetchatNode extends EventEmitter {
    readonly peers: PeerTable = new PeerTable();
    readonly transfers: TransferManager;
    private discovery: DiscoveryService;
    private sessions: SessionRegistry;
    private membership: Listener;
    private started = false;

    private readonly onDatagram = (inbound: Inbound) => this.route(inbound);
    private readonly onStreamMessage = (inbound: Inbound) => this.route(inbound);

    constructor(
        private config: NodeConfig,
        private channels: Channels = createSocketChannels(config),
        private clock: () => number = Date.now,
    ) {
        super();

        this.transfers = new TransferManager({
            sendDatagram: (address, message) => this.channels.datagram.send(encodeMessage(message), address),
            sendStream: (address, message) => this.channels.stream.send(encodeMessage(message), address),
        }, config, clock);

        this.discovery = new DiscoveryService(this.whoami(), this.peers, channels, config, clock);
        this.sessions = new SessionRegistry((inbound) => this.handlePeerTraffic(inbound));
        this.membership = new Listener('membership listener', (inbound) => this.handleMembershipTraffic(inbound));

        this.discovery.on('peer:new', (peer: PeerRecord) => {
            log.info(`Discovered ${peer.name} at ${peer.address}`);
            this.sessions.ensure(peer.address);
            this.emit('peer:new', peer);
        });

        this.discovery.on('peer:lost', (peer: PeerRecord) => {
            log.info(`Lost ${peer.name} (${peer.address})`);
            this.transfers.cancelPeer(peer.address, 'peer pruned');
            this.sessions.retire(peer.address).catch((err) => {
                log.error(`Could not retire ${peer.address}: ${err instanceof Error ? err.message : String(err)}`);
            });
            this.emit('peer:lost', peer);
        });

        for (const event of ['transfer:sent', 'transfer:received', 'transfer:failed']) {
            this.transfers.on(event, (...args: unknown[]) => this.emit(event, ...args));
        }
    }

    public whoami(): NodeIdentity {
        return { name: this.config.name, address: this.config.address };
    }

    public async start(): Promise<void> {
        if (this.started) return;
        this.started = true;

        this.membership.start();
        this.channels.datagram.on('datagram', this.onDatagram);
        this.channels.stream.on('message', this.onStreamMessage);
        await this.channels.stream.start();
        await this.channels.datagram.start();

        this.discovery.start();
        this.transfers.start();
        log.info(`${this.config.name} (${this.config.address}) listening on port ${this.config.port}`);
    }

    /** Global shutdown: timers cleared, every listener aborted, channels closed. */
    public async stop(): Promise<void> {
        if (!this.started) return;
        this.started = false;
        log.info('Terminating...');

        this.discovery.stop();
        this.transfers.stop();
        this.channels.datagram.off('datagram', this.onDatagram);
        this.channels.stream.off('message', this.onStreamMessage);

        await Promise.all([this.sessions.stopAll(), this.membership.stop()]);
        await Promise.all([this.channels.datagram.stop(), this.channels.stream.stop()]);
    }

    public getPeers(): PeerRecord[] {
        return this.peers.list();
    }

    public listTransfers(): TransferSummary[] {
        return this.transfers.listTransfers();
    }

    public async probe(address: string): Promise<void> {
        await this.discovery.probe(address);
    }

    public async sendChat(name: string, text: string): Promise<void> {
        const peer = this.resolvePeer(name);
        await this.channels.stream.send(encodeMessage({ kind: MessageKind.Chat, text }), peer.address);
        log.info(`Message delivered to ${peer.name}`);
    }

    public async sendFile(name: string, filePath: string): Promise<SendContext> {
        const peer = this.resolvePeer(name);
        return this.transfers.startSend(peer.address, filePath);
    }

    private resolvePeer(name: string): PeerRecord {
        const peer = this.peers.findByName(name);
        if (!peer) throw new UnknownPeerError(name);
        return peer;
    }

    private route(inbound: Inbound): void {
        const session = this.sessions.get(inbound.address);
        if (session) session.push(inbound);
        else this.membership.push(inbound);
    }

    private decode(inbound: Inbound): Message | undefined {
        try {
            return decodeMessage(inbound.data);
        } catch (err) {
            if (err instanceof MalformedMessageError) {
                log.warn(`Dropping ${inbound.via} from ${inbound.address}: ${err.message}`);
                return undefined;
            }
            throw err;
        }
    }

    /** Traffic from addresses without a session: beacons, responses, stray chat. */
    private async handleMembershipTraffic(inbound: Inbound): Promise<void> {
        const message = this.decode(inbound);
        if (message) {
            switch (message.kind) {
                case MessageKind.Hello:
                    await this.discovery.handleHello(inbound.address, message.name);
                    break;
                case MessageKind.HelloAck:
                    this.discovery.handleHelloAck(inbound.address, message.name);
                    break;
                case MessageKind.Chat:
                    this.deliverChat(inbound.address, message.text);
                    break;
                case MessageKind.FileChunk:
                case MessageKind.FileAck:
                    log.debug(new UnknownTransferError(inbound.address, message.fileId).message);
                    break;
            }
        }
        this.discovery.prune();
    }

    /** Traffic from a known peer, delivered by that peer's session listeners. */
    private async handlePeerTraffic(inbound: Inbound): Promise<void> {
        const message = this.decode(inbound);
        if (!message) return;

        switch (message.kind) {
            case MessageKind.Hello:
                await this.discovery.handleHello(inbound.address, message.name);
                return;
            case MessageKind.HelloAck:
                this.discovery.handleHelloAck(inbound.address, message.name);
                return;
        }

        this.peers.touch(inbound.address, this.clock());
        switch (message.kind) {
            case MessageKind.Chat:
                this.deliverChat(inbound.address, message.text);
                break;
            case MessageKind.FileChunk:
                await this.transfers.onChunk(inbound.address, message);
                break;
            case MessageKind.FileAck:
                this.transfers.onAck(inbound.address, message);
                break;
        }
    }

    private deliverChat(address: string, text: string): void {
        const name = this.peers.get(address)?.name ?? 'UNKNOWN_HOST';
        const event: ChatEvent = { address, name, text, receivedAt: this.clock() };
        chatLog.info(`[${new Date(event.receivedAt).toISOString()}] FROM: ${name}(${address}): ${text}`);
        this.emit('chat', event);
    }
}
