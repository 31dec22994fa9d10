/**
 * Error taxonomy of the node.
 *
 * Every failure that crosses a module boundary is a NetchatError with a
 * stable `code`, so listeners and the command layer can decide what to log
 * and what to report without matching on messages.
 */

export type ErrorCode =
    | 'MALFORMED_MESSAGE'
    | 'PEER_UNREACHABLE'
    | 'CONNECTION_REFUSED'
    | 'FILE_NOT_FOUND'
    | 'FILE_UNREADABLE'
    | 'UNKNOWN_TRANSFER'
    | 'UNKNOWN_PEER'
    | 'TRANSFER_IN_PROGRESS'
    | 'ASSEMBLY_FAILED'
    | 'TRANSFER_CANCELLED'
    | 'INVALID_ARGUMENT';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export class NetchatError extends Error {
    public override readonly name: string = 'NetchatError';

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context?: ErrorContext,
        public override readonly cause?: Error,
    ) {
        super(message);
        if (cause?.stack) {
            this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
        }
    }

    public override toString(): string {
        const parts = [`[${this.code}] ${this.message}`];
        if (this.context) {
            parts.push(`Context: ${JSON.stringify(this.context)}`);
        }
        return parts.join(' | ');
    }

    public static wrap(error: unknown, code: ErrorCode, context?: ErrorContext): NetchatError {
        if (error instanceof NetchatError) return error;
        const cause = error instanceof Error ? error : undefined;
        const message = error instanceof Error ? error.message : String(error);
        return new NetchatError(message, code, context, cause);
    }

    public static is(error: unknown, code?: ErrorCode): error is NetchatError {
        return error instanceof NetchatError && (code === undefined || error.code === code);
    }
}

export class MalformedMessageError extends NetchatError {
    public override readonly name = 'MalformedMessageError';

    constructor(reason: string, cause?: Error) {
        super(`Malformed message: ${reason}`, 'MALFORMED_MESSAGE', undefined, cause);
    }
}

export class PeerUnreachableError extends NetchatError {
    public override readonly name = 'PeerUnreachableError';

    constructor(address: string, cause?: Error) {
        super(`Peer ${address} is unreachable`, 'PEER_UNREACHABLE', { address }, cause);
    }
}

export class ConnectionRefusedError extends NetchatError {
    public override readonly name = 'ConnectionRefusedError';

    constructor(address: string, cause?: Error) {
        super(`Peer ${address} refused the connection`, 'CONNECTION_REFUSED', { address }, cause);
    }
}

export class FileNotFoundError extends NetchatError {
    public override readonly name = 'FileNotFoundError';

    constructor(path: string, cause?: Error) {
        super(`File not found: ${path}`, 'FILE_NOT_FOUND', { path }, cause);
    }
}

export class FileUnreadableError extends NetchatError {
    public override readonly name = 'FileUnreadableError';

    constructor(path: string, cause?: Error) {
        super(`File cannot be read: ${path}`, 'FILE_UNREADABLE', { path }, cause);
    }
}

export class UnknownTransferError extends NetchatError {
    public override readonly name = 'UnknownTransferError';

    constructor(peer: string, fileId: string) {
        super(`No transfer of ${fileId} with ${peer}`, 'UNKNOWN_TRANSFER', { peer, fileId });
    }
}

export class UnknownPeerError extends NetchatError {
    public override readonly name = 'UnknownPeerError';

    constructor(name: string) {
        super(`Peer with name "${name}" not found`, 'UNKNOWN_PEER', { name });
    }
}

export class TransferInProgressError extends NetchatError {
    public override readonly name = 'TransferInProgressError';

    constructor(peer: string, fileId: string) {
        super(`${fileId} is already being sent to ${peer}`, 'TRANSFER_IN_PROGRESS', { peer, fileId });
    }
}

export class AssemblyFailedError extends NetchatError {
    public override readonly name = 'AssemblyFailedError';

    constructor(fileId: string, path: string, cause?: Error) {
        super(`Could not write ${fileId} to ${path}`, 'ASSEMBLY_FAILED', { fileId, path }, cause);
    }
}

export class TransferCancelledError extends NetchatError {
    public override readonly name = 'TransferCancelledError';

    constructor(peer: string, fileId: string, reason: string) {
        super(`Transfer of ${fileId} with ${peer} cancelled: ${reason}`, 'TRANSFER_CANCELLED', { peer, fileId });
    }
}
