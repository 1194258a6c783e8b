import * as zlib from 'zlib';
import { Message, MessageType } from '../types';
import { ProtocolError } from '../common/errors';

export interface CodecOptions {
  enableCompression?: boolean;
  compressionThresholdBytes?: number;
  maxFrameSizeBytes?: number;
  /** Upper bound on a decompressed body; defaults to 16x the frame limit */
  maxDecompressedBytes?: number;
}

/** Frame length prefix: unsigned 32-bit little-endian */
export const LENGTH_PREFIX_BYTES = 4;

/** gzip magic number; a frame body starting with it is compressed */
export const COMPRESSION_MAGIC = Buffer.from([0x1f, 0x8b]);

interface WireEnvelope {
  t: MessageType;
  s: number;
  ts: number;
  p?: string;
}

/**
 * Length-prefixed framing with optional gzip compression.
 *
 * Wire layout: `[u32 LE length][body]`, where body is either the raw payload or
 * a gzip stream (which always starts with `1f 8b`). Messages are serialized as a
 * compact JSON envelope before framing, so an uncompressed body starts with `{`.
 *
 * A payload that itself starts with the magic is always compressed, whatever
 * its size, so the tag stays unambiguous.
 */
export class MessageCodec {
  private readonly options: Required<CodecOptions>;

  constructor(options: CodecOptions = {}) {
    const maxFrameSizeBytes = options.maxFrameSizeBytes ?? 64 * 1024;
    this.options = {
      enableCompression: options.enableCompression ?? true,
      compressionThresholdBytes: options.compressionThresholdBytes ?? 512,
      maxFrameSizeBytes,
      maxDecompressedBytes: options.maxDecompressedBytes ?? maxFrameSizeBytes * 16
    };
  }

  get maxFrameSizeBytes(): number {
    return this.options.maxFrameSizeBytes;
  }

  shouldCompress(payloadLength: number): boolean {
    return this.options.enableCompression && payloadLength > this.options.compressionThresholdBytes;
  }

  encodeFrame(payload: Buffer): Buffer {
    const compress = this.shouldCompress(payload.length) || MessageCodec.isCompressed(payload);
    const body = compress ? zlib.gzipSync(payload) : payload;

    if (body.length > this.options.maxFrameSizeBytes) {
      throw new ProtocolError(
        `Frame size ${body.length} exceeds limit ${this.options.maxFrameSizeBytes}`
      );
    }

    const header = Buffer.alloc(LENGTH_PREFIX_BYTES);
    header.writeUInt32LE(body.length, 0);
    return Buffer.concat([header, body]);
  }

  /**
   * Undo compression on a frame body (the bytes after the length prefix)
   */
  decodeFrameBody(body: Buffer): Buffer {
    if (!MessageCodec.isCompressed(body)) {
      return body;
    }

    const limit = this.options.maxDecompressedBytes;
    try {
      return zlib.gunzipSync(body, { maxOutputLength: limit });
    } catch (error) {
      if (error instanceof RangeError) {
        throw new ProtocolError(`Decompressed frame exceeds limit ${limit}`, false, error);
      }
      // Not a gzip stream after all: a raw payload from a peer that does not compress magic-prefixed bodies
      return body;
    }
  }

  /**
   * Full round trip helper: decode a complete frame including its length prefix
   */
  decodeFrame(frame: Buffer): Buffer {
    if (frame.length < LENGTH_PREFIX_BYTES) {
      throw new ProtocolError(`Truncated frame: ${frame.length} bytes`);
    }

    const length = frame.readUInt32LE(0);
    if (length > this.options.maxFrameSizeBytes) {
      throw new ProtocolError(`Declared frame length ${length} exceeds limit ${this.options.maxFrameSizeBytes}`);
    }
    if (frame.length - LENGTH_PREFIX_BYTES !== length) {
      throw new ProtocolError(`Frame length mismatch: declared ${length}, got ${frame.length - LENGTH_PREFIX_BYTES}`);
    }

    return this.decodeFrameBody(frame.subarray(LENGTH_PREFIX_BYTES));
  }

  encodeMessage(message: Message): Buffer {
    return this.encodeFrame(MessageCodec.serialize(message));
  }

  decodeMessage(body: Buffer): Message {
    return MessageCodec.deserialize(this.decodeFrameBody(body));
  }

  static isCompressed(body: Buffer): boolean {
    return body.length >= COMPRESSION_MAGIC.length &&
      body[0] === COMPRESSION_MAGIC[0] &&
      body[1] === COMPRESSION_MAGIC[1];
  }

  static serialize(message: Message): Buffer {
    const envelope: WireEnvelope = {
      t: message.type,
      s: message.sequenceNumber,
      ts: message.timestamp
    };
    if (message.payload !== undefined) {
      envelope.p = message.payload.toString('base64');
    }
    return Buffer.from(JSON.stringify(envelope), 'utf8');
  }

  static deserialize(data: Buffer): Message {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString('utf8'));
    } catch (error) {
      throw new ProtocolError('Malformed message: invalid JSON', false, error instanceof Error ? error : undefined);
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw new ProtocolError('Malformed message: envelope is not an object');
    }

    const type: unknown = Reflect.get(parsed, 't');
    const sequenceNumber: unknown = Reflect.get(parsed, 's');
    const timestamp: unknown = Reflect.get(parsed, 'ts');
    const payload: unknown = Reflect.get(parsed, 'p');

    if (typeof type !== 'string') {
      throw new ProtocolError('Malformed message: missing type');
    }
    if (typeof sequenceNumber !== 'number' || !Number.isInteger(sequenceNumber) ||
        sequenceNumber < 0 || sequenceNumber > 0xffffffff) {
      throw new ProtocolError(`Malformed message: invalid sequence number ${String(sequenceNumber)}`);
    }
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
      throw new ProtocolError('Malformed message: invalid timestamp');
    }
    if (payload !== undefined && typeof payload !== 'string') {
      throw new ProtocolError('Malformed message: payload must be base64 text');
    }

    const message: Message = {
      type: toMessageType(type),
      sequenceNumber,
      timestamp
    };
    if (payload !== undefined) {
      message.payload = Buffer.from(payload, 'base64');
    }
    return message;
  }
}

function toMessageType(value: string): MessageType {
  for (const type of Object.values(MessageType)) {
    if (type === value) return type;
  }
  throw new ProtocolError(`Malformed message: unknown type ${value}`);
}
