import { isIPv4 } from 'net';
import type { NetchatNode } from '../core/node';
import { NetchatError } from '../core/errors';

export type Command =
    | { kind: 'empty' }
    | { kind: 'whoami' }
    | { kind: 'peers' }
    | { kind: 'transfers' }
    | { kind: 'quit' }
    | { kind: 'hello'; address: string }
    | { kind: 'send'; name: string; text: string }
    | { kind: 'file'; name: string; path: string }
    | { kind: 'invalid'; usage: string }
    | { kind: 'unknown'; input: string };

export const USAGE = {
    hello: 'Usage: :hello <ip>',
    send: 'Usage: :send <name> <message>',
    file: 'Usage: :file <name> <path>',
} as const;

/** Splits `:cmd first rest of line` into its first argument and the remainder. */
const splitArgs = (line: string): [string, string] => {
    const rest = line.replace(/^\S+\s*/, '');
    const match = /^(\S+)\s*([\s\S]*)$/.exec(rest);
    if (!match) return ['', ''];
    return [match[1] ?? '', (match[2] ?? '').trim()];
};

export const parseCommand = (line: string): Command => {
    const input = line.trim();
    if (input === '') return { kind: 'empty' };

    const keyword = input.split(/\s+/, 1)[0];
    switch (keyword) {
        case ':whoami':
            return { kind: 'whoami' };
        case ':peers':
            return { kind: 'peers' };
        case ':transfers':
            return { kind: 'transfers' };
        case ':quit':
            return { kind: 'quit' };
        case ':hello': {
            const [address] = splitArgs(input);
            if (!isIPv4(address)) return { kind: 'invalid', usage: USAGE.hello };
            return { kind: 'hello', address };
        }
        case ':send': {
            const [name, text] = splitArgs(input);
            if (!name || !text) return { kind: 'invalid', usage: USAGE.send };
            return { kind: 'send', name, text };
        }
        case ':file': {
            const [name, path] = splitArgs(input);
            if (!name || !path) return { kind: 'invalid', usage: USAGE.file };
            return { kind: 'file', name, path };
        }
        default:
            return { kind: 'unknown', input };
    }
};

const describe = (err: unknown): string => (NetchatError.is(err) ? err.message : err instanceof Error ? err.message : String(err));

export class CLI {
    constructor(private node: NetchatNode, private print: (line: string) => void = console.log) { }

    /** Runs one command; resolves to false once the node has been asked to quit. */
    public async execute(command: Command): Promise<boolean> {
        switch (command.kind) {
            case 'empty':
                return true;
            case 'whoami':
                this.whoami();
                return true;
            case 'peers':
                this.showPeers();
                return true;
            case 'transfers':
                this.showTransfers();
                return true;
            case 'quit':
                await this.node.stop();
                return false;
            case 'hello':
                await this.report(() => this.node.probe(command.address));
                return true;
            case 'send':
                await this.report(() => this.node.sendChat(command.name, command.text));
                return true;
            case 'file':
                await this.report(async () => {
                    const ctx = await this.node.sendFile(command.name, command.path);
                    this.print(`\x1b[32m[FILE]\x1b[0m Sending ${ctx.fileId} (${ctx.total} chunks)`);
                });
                return true;
            case 'invalid':
                this.print(`\x1b[31m[ERROR]\x1b[0m Invalid command. ${command.usage}`);
                return true;
            case 'unknown':
                this.print(`Command '${command.input}' not recognised. Try :whoami, :peers, :hello, :send, :file, :transfers, :quit`);
                return true;
        }
    }

    public whoami() {
        const me = this.node.whoami();
        this.print(`IP:${me.address}\tName:${me.name}`);
    }

    public showPeers() {
        const peers = this.node.getPeers();
        this.print('IP:\t\tName:');
        for (const peer of peers) {
            this.print(`${peer.address}\t${peer.name}`);
        }
    }

    public showTransfers() {
        const transfers = this.node.listTransfers();
        if (transfers.length === 0) {
            this.print('No transfers in progress.');
            return;
        }
        for (const t of transfers) {
            const arrow = t.direction === 'send' ? '->' : '<-';
            this.print(`${arrow} ${t.peer}\t${t.fileId}\t${t.done}/${t.total ?? '?'}`);
        }
    }

    private async report(action: () => Promise<void>): Promise<void> {
        try {
            await action();
        } catch (err) {
            this.print(`\x1b[31m[ERROR]\x1b[0m ${describe(err)}`);
        }
    }
}
