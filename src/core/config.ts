import * as os from 'os';

export const CONFIG = {
    NETWORK: {
        PORT: 12345,
        BROADCAST_ADDRESS: '255.255.255.255',
        BROADCAST_INTERVAL_MS: 60000,
        PRUNING_PERIOD_MS: 120000, // 2 missed beacons
        CONNECT_TIMEOUT_MS: 5000,
    },
    TRANSFER: {
        BATCH_SIZE: 1500, // bytes
        RECEIVE_WINDOW: 8,
        PACKET_TIMEOUT_MS: 1000,
        TICK_INTERVAL_MS: 100,
        FINISHED_RETENTION_MS: 30000,
        DOWNLOAD_DIR: 'downloads',
    },
    UI: {
        PORT_OFFSET: 1000,
    }
};

export interface NodeConfig {
    readonly name: string;
    readonly address: string;
    readonly port: number;
    readonly broadcastAddress: string;
    readonly broadcastIntervalMs: number;
    readonly pruningPeriodMs: number;
    readonly connectTimeoutMs: number;
    readonly batchSize: number;
    readonly receiveWindow: number;
    readonly packetTimeoutMs: number;
    readonly tickIntervalMs: number;
    readonly finishedRetentionMs: number;
    readonly downloadDir: string;
}

export const resolveLocalAddress = (): string => {
    const interfaces = os.networkInterfaces();
    for (const name of Object.keys(interfaces)) {
        for (const iface of interfaces[name] || []) {
            if (iface.family === 'IPv4' && !iface.internal) {
                return iface.address;
            }
        }
    }
    return '127.0.0.1';
};

const POSITIVE_INTEGERS = [
    'port',
    'broadcastIntervalMs',
    'pruningPeriodMs',
    'connectTimeoutMs',
    'batchSize',
    'receiveWindow',
    'packetTimeoutMs',
    'tickIntervalMs',
    'finishedRetentionMs',
] as const;

export const resolveConfig = (overrides: Partial<NodeConfig> = {}): NodeConfig => {
    const config: NodeConfig = {
        name: overrides.name ?? os.hostname(),
        address: overrides.address ?? resolveLocalAddress(),
        port: overrides.port ?? CONFIG.NETWORK.PORT,
        broadcastAddress: overrides.broadcastAddress ?? CONFIG.NETWORK.BROADCAST_ADDRESS,
        broadcastIntervalMs: overrides.broadcastIntervalMs ?? CONFIG.NETWORK.BROADCAST_INTERVAL_MS,
        pruningPeriodMs: overrides.pruningPeriodMs ?? CONFIG.NETWORK.PRUNING_PERIOD_MS,
        connectTimeoutMs: overrides.connectTimeoutMs ?? CONFIG.NETWORK.CONNECT_TIMEOUT_MS,
        batchSize: overrides.batchSize ?? CONFIG.TRANSFER.BATCH_SIZE,
        receiveWindow: overrides.receiveWindow ?? CONFIG.TRANSFER.RECEIVE_WINDOW,
        packetTimeoutMs: overrides.packetTimeoutMs ?? CONFIG.TRANSFER.PACKET_TIMEOUT_MS,
        tickIntervalMs: overrides.tickIntervalMs ?? CONFIG.TRANSFER.TICK_INTERVAL_MS,
        finishedRetentionMs: overrides.finishedRetentionMs ?? CONFIG.TRANSFER.FINISHED_RETENTION_MS,
        downloadDir: overrides.downloadDir ?? CONFIG.TRANSFER.DOWNLOAD_DIR,
    };

    for (const key of POSITIVE_INTEGERS) {
        const value = config[key];
        if (!Number.isInteger(value) || value <= 0) {
            throw new Error(`Invalid configuration: ${key} must be a positive integer, got ${value}`);
        }
    }
    if (config.port > 65535) {
        throw new Error(`Invalid configuration: port ${config.port} is out of range`);
    }
    if (config.name.trim() === '' || /\s/.test(config.name)) {
        throw new Error(`Invalid configuration: name must be a single non-empty word`);
    }

    return Object.freeze(config);
};
