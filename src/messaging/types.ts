/**
 * Messages exchanged between nodes.
 *
 * One enumeration covers membership, chat and file transfer; the codec maps
 * each kind to its tag on the wire.
 */

export enum MessageKind {
    Hello = 'hello',
    HelloAck = 'hello-ack',
    Chat = 'chat',
    FileChunk = 'file-chunk',
    FileAck = 'file-ack',
}

export interface HelloMessage {
    kind: MessageKind.Hello;
    name: string;
}

export interface HelloAckMessage {
    kind: MessageKind.HelloAck;
    name: string;
}

export interface ChatMessage {
    kind: MessageKind.Chat;
    text: string;
}

/** Sequence 0 of a transfer: announces the total chunk count. */
export interface ControlChunkMessage {
    kind: MessageKind.FileChunk;
    fileId: string;
    seq: 0;
    total: number;
}

export interface DataChunkMessage {
    kind: MessageKind.FileChunk;
    fileId: string;
    seq: number;
    payload: Buffer;
}

export type FileChunkMessage = ControlChunkMessage | DataChunkMessage;

export interface FileAckMessage {
    kind: MessageKind.FileAck;
    fileId: string;
    seq: number;
    credit: number;
}

export type Message =
    | HelloMessage
    | HelloAckMessage
    | ChatMessage
    | FileChunkMessage
    | FileAckMessage;

export const isControlChunk = (message: FileChunkMessage): message is ControlChunkMessage =>
    'total' in message;
