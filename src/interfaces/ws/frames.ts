import { createHash } from 'node:crypto';

/**
 * RFC 6455 frame codec for the server side.
 *
 * Client → server frames must be masked (§5.3) and are unmasked on parse.
 * Server → client frames are never masked. Fragmented messages are not
 * reassembled: the stream endpoint only reads control frames from clients.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';

export const OPCODE = {
  CONTINUATION: 0x00,
  TEXT: 0x01,
  BINARY: 0x02,
  CLOSE: 0x08,
  PING: 0x09,
  PONG: 0x0a,
} as const;

export const CLOSE_CODE = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  MESSAGE_TOO_BIG: 1009,
} as const;

/** Inbound payload cap. Clients have nothing large to send. */
export const MAX_INBOUND_PAYLOAD = 64 * 1024;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  /** Offset of the first byte after this frame. */
  nextOffset: number;
}

/** Malformed or disallowed inbound frame. The connection must be dropped. */
export class FrameError extends Error {
  readonly closeCode: number;

  constructor(message: string, closeCode: number = CLOSE_CODE.PROTOCOL_ERROR) {
    super(message);
    this.name = 'FrameError';
    this.closeCode = closeCode;
  }
}

/** `Sec-WebSocket-Accept` value for a client's `Sec-WebSocket-Key`. */
export function acceptKey(key: string): string {
  return createHash('sha1').update(key + WS_GUID).digest('base64');
}

function isControl(opcode: number): boolean {
  return (opcode & 0x08) === 0x08;
}

/**
 * Parses ONE frame from the front of `buf`.
 * Returns null when more bytes are needed; throws FrameError on bad data.
 */
export function tryParseFrame(buf: Buffer, maxPayload: number = MAX_INBOUND_PAYLOAD): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const fin = (b0 & 0x80) === 0x80;
  if ((b0 & 0x70) !== 0) {
    throw new FrameError('Reserved bits set without a negotiated extension');
  }

  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;
  if (!masked) {
    throw new FrameError('Client frames must be masked');
  }

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const length = buf.readBigUInt64BE(offset);
    if (length > BigInt(maxPayload)) {
      throw new FrameError(`Frame payload of ${length} bytes exceeds ${maxPayload}`, CLOSE_CODE.MESSAGE_TOO_BIG);
    }
    payloadLen = Number(length);
    offset += 8;
  }

  if (isControl(opcode) && (payloadLen > 125 || !fin)) {
    throw new FrameError('Control frames must be unfragmented with a payload of at most 125 bytes');
  }
  if (payloadLen > maxPayload) {
    throw new FrameError(`Frame payload of ${payloadLen} bytes exceeds ${maxPayload}`, CLOSE_CODE.MESSAGE_TOO_BIG);
  }

  if (buf.length < offset + 4 + payloadLen) return null;

  const mask = buf.subarray(offset, offset + 4);
  offset += 4;

  const payload = Buffer.from(buf.subarray(offset, offset + payloadLen));
  for (let i = 0; i < payload.length; i++) {
    payload[i] = payload.readUInt8(i) ^ mask.readUInt8(i % 4);
  }

  return { fin, opcode, payload, nextOffset: offset + payloadLen };
}

/** Unmasked, unfragmented frame with the smallest length encoding. */
export function encodeFrame(opcode: number, payload: Buffer): Buffer {
  const len = payload.length;

  let header: Buffer;
  if (len < 126) {
    header = Buffer.alloc(2);
    header.writeUInt8(len, 1);
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header.writeUInt8(126, 1);
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header.writeUInt8(127, 1);
    header.writeBigUInt64BE(BigInt(len), 2);
  }
  header.writeUInt8(0x80 | opcode, 0); // FIN + opcode

  return Buffer.concat([header, payload]);
}

export function encodeTextFrame(data: string): Buffer {
  return encodeFrame(OPCODE.TEXT, Buffer.from(data, 'utf-8'));
}

/** Ping, pong or close. Payloads over 125 bytes are dropped (§5.5). */
export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  return encodeFrame(opcode, payload.length > 125 ? Buffer.alloc(0) : payload);
}

export function encodeCloseFrame(code: number, reason = ''): Buffer {
  const reasonBytes = Buffer.from(reason, 'utf-8').subarray(0, 123);
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return encodeControlFrame(OPCODE.CLOSE, payload);
}
