import { Packr } from 'msgpackr';
import { z } from 'zod';
import { MalformedMessage, ProtocolError } from '../../errors';
import type { ImageFrame, SettingValue, SettingsSnapshot } from '../camera/types';

export const MAGIC = 0x4943; // 'IC'
export const VERSION = 1;
export const HEADER_SIZE = 8; // Magic(2) + Version(1) + Tag(1) + Length(4)
export const MAX_PAYLOAD_BYTES = 256 * 1024 * 1024;

export enum MessageTag {
  // client -> server
  ENUMERATE = 0x01,
  OPEN = 0x02,
  CLOSE = 0x03,
  PLAY = 0x04,
  STOP = 0x05,
  SET_SETTING = 0x06,
  SHUTDOWN = 0x07,
  // server -> client
  SERIALS = 0x81,
  SETTINGS = 0x82,
  CAM_OPEN = 0x83,
  CAM_CLOSED = 0x84,
  PLAYING = 0x85,
  IMAGE = 0x86,
  ERROR = 0x87,
  DISCONNECT = 0x88,
}

export type CommandMessage =
  | { type: 'enumerate' }
  | { type: 'open'; serial: string }
  | { type: 'close' }
  | { type: 'play' }
  | { type: 'stop' }
  | { type: 'set_setting'; name: string; value: SettingValue }
  | { type: 'shutdown' };

export type EventMessage =
  | { type: 'serials'; serials: string[] }
  | { type: 'settings'; settings: SettingsSnapshot }
  | { type: 'cam_open' }
  | { type: 'cam_closed' }
  | { type: 'playing'; playing: boolean }
  | ({ type: 'image' } & ImageFrame)
  | { type: 'error'; kind: string; detail: string }
  | { type: 'disconnect'; reason: string };

export type Message = CommandMessage | EventMessage;
export type MessageType = Message['type'];

const settingValue = z.union([z.number(), z.boolean(), z.string()]);

const settingSpec = z.discriminatedUnion('kind', [
  z.object({
    name: z.string(),
    kind: z.literal('numeric'),
    value: z.number(),
    range: z.tuple([z.number(), z.number()]),
    integer: z.boolean(),
  }),
  z.object({ name: z.string(), kind: z.literal('boolean'), value: z.boolean() }),
  z.object({
    name: z.string(),
    kind: z.literal('enumerated'),
    value: z.string(),
    choices: z.array(z.string()),
  }),
]);

const bytes = z.instanceof(Uint8Array).transform((data) =>
  Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength)
);

// Plain MessagePack maps: no record extension, so either side can decode a frame on its own.
const packr = new Packr({ useRecords: false });

// Key order in each schema is the order on the wire. `type` itself travels as the tag.
const MessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('enumerate') }),
  z.object({ type: z.literal('open'), serial: z.string() }),
  z.object({ type: z.literal('close') }),
  z.object({ type: z.literal('play') }),
  z.object({ type: z.literal('stop') }),
  z.object({ type: z.literal('set_setting'), name: z.string(), value: settingValue }),
  z.object({ type: z.literal('shutdown') }),
  z.object({ type: z.literal('serials'), serials: z.array(z.string()) }),
  z.object({ type: z.literal('settings'), settings: z.record(settingSpec) }),
  z.object({ type: z.literal('cam_open') }),
  z.object({ type: z.literal('cam_closed') }),
  z.object({ type: z.literal('playing'), playing: z.boolean() }),
  z.object({
    type: z.literal('image'),
    data: bytes,
    frameCount: z.number().int().nonnegative(),
    queuedCount: z.number().int().nonnegative(),
    timestamp: z.number(),
    width: z.number().int().nonnegative(),
    height: z.number().int().nonnegative(),
    pixelFormat: z.enum(['gray16le', 'bgr48le']),
  }),
  z.object({ type: z.literal('error'), kind: z.string(), detail: z.string() }),
  z.object({ type: z.literal('disconnect'), reason: z.string() }),
]);

const TAGS: Record<MessageType, MessageTag> = {
  enumerate: MessageTag.ENUMERATE,
  open: MessageTag.OPEN,
  close: MessageTag.CLOSE,
  play: MessageTag.PLAY,
  stop: MessageTag.STOP,
  set_setting: MessageTag.SET_SETTING,
  shutdown: MessageTag.SHUTDOWN,
  serials: MessageTag.SERIALS,
  settings: MessageTag.SETTINGS,
  cam_open: MessageTag.CAM_OPEN,
  cam_closed: MessageTag.CAM_CLOSED,
  playing: MessageTag.PLAYING,
  image: MessageTag.IMAGE,
  error: MessageTag.ERROR,
  disconnect: MessageTag.DISCONNECT,
};

const TYPES_BY_TAG = new Map<number, MessageType>(
  MessageSchema.options.map((schema): [number, MessageType] => [TAGS[schema.shape.type.value], schema.shape.type.value])
);

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return `${issue?.message ?? 'unknown issue'}${where}`;
}

function messageFromPayload(type: MessageType, payload: unknown): Message {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedMessage(`Invalid "${type}" payload: expected a map`);
  }
  const parsed = MessageSchema.safeParse({ ...payload, type });
  if (!parsed.success) {
    throw new MalformedMessage(`Invalid "${type}" payload: ${describeIssue(parsed.error)}`);
  }
  const message: Message = parsed.data;
  return message;
}

/**
 * Frames typed messages as `header | msgpack payload`.
 *
 * Header: magic u16 BE, version u8, tag u8, payload length u32 BE.
 */
export class MessageCodec {
  static encode(message: Message): Buffer {
    const canonical = MessageSchema.safeParse(message);
    if (!canonical.success) {
      throw new MalformedMessage(`Cannot encode "${String(message.type)}": ${describeIssue(canonical.error)}`);
    }

    const { type, ...payload } = canonical.data;
    const body = packr.pack(payload);
    const header = Buffer.alloc(HEADER_SIZE);

    header.writeUInt16BE(MAGIC, 0);
    header.writeUInt8(VERSION, 2);
    header.writeUInt8(TAGS[type], 3);
    header.writeUInt32BE(body.length, 4);

    return Buffer.concat([header, body]);
  }

  /**
   * Decodes the first frame in `buffer`, or returns null while it is still
   * incomplete.
   */
  static tryDecode(buffer: Buffer): { message: Message; consumed: number } | null {
    if (buffer.length < HEADER_SIZE) return null;

    const magic = buffer.readUInt16BE(0);
    if (magic !== MAGIC) {
      throw new ProtocolError(`Invalid magic bytes: 0x${magic.toString(16)}`);
    }

    const version = buffer.readUInt8(2);
    if (version !== VERSION) {
      throw new ProtocolError(`Unsupported version: ${version}`);
    }

    const tag = buffer.readUInt8(3);
    const length = buffer.readUInt32BE(4);
    if (length > MAX_PAYLOAD_BYTES) {
      throw new ProtocolError(`Payload too large: ${length} bytes`);
    }

    if (buffer.length < HEADER_SIZE + length) {
      return null; // Not enough data
    }

    const type = TYPES_BY_TAG.get(tag);
    if (!type) {
      throw new MalformedMessage(`Unknown message tag: 0x${tag.toString(16)}`);
    }

    let payload: unknown;
    try {
      payload = packr.unpack(buffer.subarray(HEADER_SIZE, HEADER_SIZE + length));
    } catch (e) {
      throw new MalformedMessage(`Undecodable "${type}" payload`, { cause: e });
    }

    return {
      message: messageFromPayload(type, payload),
      consumed: HEADER_SIZE + length,
    };
  }

  /** Decodes a buffer holding exactly one frame. */
  static decode(frame: Buffer): Message {
    const result = MessageCodec.tryDecode(frame);
    if (!result) {
      throw new ProtocolError(`Incomplete frame (${frame.length} bytes)`);
    }
    if (result.consumed !== frame.length) {
      throw new ProtocolError(`Trailing data after frame: ${frame.length - result.consumed} bytes`);
    }
    return result.message;
  }
}
