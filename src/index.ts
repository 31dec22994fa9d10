#!/usr/bin/env node
import * as readline from 'readline';
import { CLI, parseCommand } from './cli/commands';
import { CONFIG, type NodeConfig, resolveConfig } from './core/config';
import { createLogger, isLogLevel, setLogLevel } from './core/logger';
import { NetchatNode } from './core/node';
import { WebDashboard } from './web/server';

const log = createLogger('SYSTEM', 'green');

interface StartOptions {
    overrides: Partial<NodeConfig>;
    uiPort?: number;
    ui: boolean;
}

const parseArgs = (args: string[]): { command: string; options: StartOptions } => {
    const value = (flag: string): string | undefined => {
        const index = args.indexOf(flag);
        return index >= 0 ? args[index + 1] : undefined;
    };
    const numeric = (flag: string): number | undefined => {
        const raw = value(flag);
        return raw === undefined ? undefined : parseInt(raw, 10);
    };

    const flagValues = new Set(['--name', '--port', '--download-dir', '--ui-port'].map(value));
    const command = args.find(a => !a.startsWith('--') && !flagValues.has(a)) || 'start';

    const overrides: { -readonly [K in keyof NodeConfig]?: NodeConfig[K] } = {};
    const name = value('--name');
    const port = numeric('--port');
    const downloadDir = value('--download-dir');
    if (name !== undefined) overrides.name = name;
    if (port !== undefined) overrides.port = port;
    if (downloadDir !== undefined) overrides.downloadDir = downloadDir;

    return {
        command,
        options: { overrides, uiPort: numeric('--ui-port'), ui: !args.includes('--no-ui') },
    };
};

async function bootstrap() {
    const level = process.env.NETCHAT_LOG_LEVEL;
    if (level && isLogLevel(level)) setLogLevel(level);

    const { command, options } = parseArgs(process.argv.slice(2));
    if (command !== 'start') {
        console.log(`\x1b[31m[ERROR]\x1b[0m Unknown startup command: ${command}`);
        process.exit(1);
    }

    const config = resolveConfig(options.overrides);
    const node = new NetchatNode(config);
    const cli = new CLI(node);

    log.info(`Starting netchat node ${config.name} (${config.address})`);
    await node.start();

    let dashboard: WebDashboard | undefined;
    if (options.ui) {
        dashboard = new WebDashboard(node, options.uiPort ?? config.port + CONFIG.UI.PORT_OFFSET);
        await dashboard.start();
    }

    console.log('Discovery started, ready to chat.');

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'netchat> '
    });

    const shutdown = async () => {
        await dashboard?.stop();
        await node.stop();
        process.exit(0);
    };

    rl.prompt();

    rl.on('line', (line) => {
        cli.execute(parseCommand(line))
            .then((keepGoing) => {
                if (keepGoing) rl.prompt();
                else rl.close();
            })
            .catch((err) => log.error(`Command failed: ${err instanceof Error ? err.message : String(err)}`));
    }).on('close', () => {
        shutdown().catch((err) => {
            log.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
            process.exit(1);
        });
    });
}

bootstrap().catch((err) => {
    console.error(err);
    process.exit(1);
});
