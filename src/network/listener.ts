import { EventEmitter, once } from 'events';
import { createLogger } from '../core/logger';
import type { Inbound } from './channel';

const log = createLogger('LISTENER', 'cyan');

export type InboundHandler = (inbound: Inbound) => Promise<void>;

/**
 * A receive loop over its own inbox.
 *
 * The loop waits on the inbox with the abort signal attached, so `stop()`
 * interrupts the wait instead of leaving the loop parked until the next
 * packet. A failing handler is logged and the loop moves on.
 */
export class Listener {
    private queue: Inbound[] = [];
    private wakeup = new EventEmitter();
    private controller = new AbortController();
    private loop?: Promise<void>;

    constructor(readonly label: string, private handler: InboundHandler) { }

    public get running(): boolean {
        return this.loop !== undefined && !this.controller.signal.aborted;
    }

    public start(): void {
        if (this.loop) return;
        this.loop = this.run();
    }

    public push(inbound: Inbound): void {
        if (this.controller.signal.aborted) return;
        this.queue.push(inbound);
        this.wakeup.emit('wake');
    }

    public async stop(): Promise<void> {
        this.controller.abort();
        this.queue = [];
        await this.loop;
    }

    private async run(): Promise<void> {
        const { signal } = this.controller;

        while (!signal.aborted) {
            const next = this.queue.shift();
            if (!next) {
                try {
                    await once(this.wakeup, 'wake', { signal });
                } catch (err) {
                    if (!signal.aborted) {
                        log.error(`${this.label} stopped waiting: ${err instanceof Error ? err.message : String(err)}`);
                    }
                    break;
                }
                continue;
            }

            try {
                await this.handler(next);
            } catch (err) {
                log.error(`${this.label}: failed to handle message from ${next.address}: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        log.debug(`${this.label} closed`);
    }
}
