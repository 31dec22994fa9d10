/**
 * Wire codec: UTF-8 JSON objects tagged by `type`.
 *
 *   {type:"hello", myname}          {type:"aleykumselam", myname}
 *   {type:"message", content}
 *   {type:4, name, seq, body}       body = base64 chunk, or the chunk count when seq == 0
 *   {type:5, name, seq, rwnd}
 */

import { z } from 'zod';
import { MalformedMessageError } from '../core/errors';
import { type Message, MessageKind } from './types';

const WIRE_TAGS = {
    [MessageKind.Hello]: 'hello',
    [MessageKind.HelloAck]: 'aleykumselam',
    [MessageKind.Chat]: 'message',
    [MessageKind.FileChunk]: 4,
    [MessageKind.FileAck]: 5,
} as const;

const sequence = z.number().int().nonnegative();

const HelloWireSchema = z.object({
    type: z.literal(WIRE_TAGS[MessageKind.Hello]),
    myname: z.string().min(1),
});

const HelloAckWireSchema = z.object({
    type: z.literal(WIRE_TAGS[MessageKind.HelloAck]),
    myname: z.string().min(1),
});

const ChatWireSchema = z.object({
    type: z.literal(WIRE_TAGS[MessageKind.Chat]),
    content: z.string(),
});

const FileChunkWireSchema = z.object({
    type: z.literal(WIRE_TAGS[MessageKind.FileChunk]),
    name: z.string().min(1),
    seq: sequence,
    body: z.union([z.string().base64(), sequence]),
});

const FileAckWireSchema = z.object({
    type: z.literal(WIRE_TAGS[MessageKind.FileAck]),
    name: z.string().min(1),
    seq: sequence,
    rwnd: z.number().int(),
});

const WireMessageSchema = z.discriminatedUnion('type', [
    HelloWireSchema,
    HelloAckWireSchema,
    ChatWireSchema,
    FileChunkWireSchema,
    FileAckWireSchema,
]);

type WireMessage = z.infer<typeof WireMessageSchema>;

const toWire = (message: Message): WireMessage => {
    switch (message.kind) {
        case MessageKind.Hello:
            return { type: WIRE_TAGS[MessageKind.Hello], myname: message.name };
        case MessageKind.HelloAck:
            return { type: WIRE_TAGS[MessageKind.HelloAck], myname: message.name };
        case MessageKind.Chat:
            return { type: WIRE_TAGS[MessageKind.Chat], content: message.text };
        case MessageKind.FileChunk:
            return {
                type: WIRE_TAGS[MessageKind.FileChunk],
                name: message.fileId,
                seq: message.seq,
                body: 'total' in message ? message.total : message.payload.toString('base64'),
            };
        case MessageKind.FileAck:
            return {
                type: WIRE_TAGS[MessageKind.FileAck],
                name: message.fileId,
                seq: message.seq,
                rwnd: message.credit,
            };
    }
};

const fromWire = (wire: WireMessage): Message => {
    switch (wire.type) {
        case 'hello':
            return { kind: MessageKind.Hello, name: wire.myname };
        case 'aleykumselam':
            return { kind: MessageKind.HelloAck, name: wire.myname };
        case 'message':
            return { kind: MessageKind.Chat, text: wire.content };
        case 4:
            if (wire.seq === 0) {
                if (typeof wire.body !== 'number') {
                    throw new MalformedMessageError('control chunk body must be the chunk count');
                }
                return { kind: MessageKind.FileChunk, fileId: wire.name, seq: 0, total: wire.body };
            }
            if (typeof wire.body !== 'string') {
                throw new MalformedMessageError(`chunk ${wire.seq} body must be base64 data`);
            }
            return {
                kind: MessageKind.FileChunk,
                fileId: wire.name,
                seq: wire.seq,
                payload: Buffer.from(wire.body, 'base64'),
            };
        case 5:
            return { kind: MessageKind.FileAck, fileId: wire.name, seq: wire.seq, credit: wire.rwnd };
    }
};

export const encodeMessage = (message: Message): Buffer => {
    return Buffer.from(JSON.stringify(toWire(message)), 'utf-8');
};

export const decodeMessage = (data: Buffer | string): Message => {
    const text = typeof data === 'string' ? data : data.toString('utf-8');

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new MalformedMessageError('not valid JSON', err instanceof Error ? err : undefined);
    }

    const result = WireMessageSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new MalformedMessageError(`${where}${issue?.message ?? 'invalid structure'}`);
    }

    return fromWire(result.data);
};
