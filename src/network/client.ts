import { Socket } from 'net';
import { ConnectionRefusedError, NetchatError, PeerUnreachableError } from '../core/errors';

const REFUSED_CODES = new Set(['ECONNREFUSED', 'ECONNRESET']);

const toTransportError = (address: string, err: Error): NetchatError => {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    if (code && REFUSED_CODES.has(code)) {
        return new ConnectionRefusedError(address, err);
    }
    return new PeerUnreachableError(address, err);
};

/**
 * One-shot sender: connect, write one message, half-close, wait for the
 * peer to close.
 */
export class TCPClient {
    private socket: Socket;

    constructor(private peerIp: string, private peerPort: number, private timeoutMs: number) {
        this.socket = new Socket();
    }

    public async send(data: Buffer): Promise<void> {
        return new Promise((resolve, reject) => {
            let settled = false;
            const settle = (err?: NetchatError) => {
                if (settled) return;
                settled = true;
                this.socket.destroy();
                if (err) reject(err);
                else resolve();
            };

            this.socket.setTimeout(this.timeoutMs, () => {
                settle(new PeerUnreachableError(this.peerIp, new Error(`timed out after ${this.timeoutMs} ms`)));
            });

            this.socket.on('error', (err) => settle(toTransportError(this.peerIp, err)));
            this.socket.on('close', () => settle());

            this.socket.connect(this.peerPort, this.peerIp, () => {
                this.socket.end(data);
            });
        });
    }
}
