import * as zlib from 'zlib';
import { MessageCodec, COMPRESSION_MAGIC, LENGTH_PREFIX_BYTES } from '../../../src/codec/MessageCodec';
import { FrameDecoder } from '../../../src/codec/FrameDecoder';
import { ProtocolError } from '../../../src/common/errors';
import { Message, MessageType } from '../../../src/types';

describe('MessageCodec', () => {
  let codec: MessageCodec;

  beforeEach(() => {
    codec = new MessageCodec({ compressionThresholdBytes: 512, maxFrameSizeBytes: 65536 });
  });

  describe('compression threshold', () => {
    test('should not compress a 511-byte payload', () => {
      const payload = Buffer.alloc(511, 0x61);
      const frame = codec.encodeFrame(payload);

      expect(codec.shouldCompress(511)).toBe(false);
      expect(frame.readUInt32LE(0)).toBe(511);
      expect(frame.subarray(LENGTH_PREFIX_BYTES)).toEqual(payload);
    });

    test('should not compress a payload exactly at the threshold', () => {
      expect(codec.shouldCompress(512)).toBe(false);
    });

    test('should compress a 513-byte payload and tag it with the magic', () => {
      const payload = Buffer.alloc(513, 0x61);
      const frame = codec.encodeFrame(payload);
      const body = frame.subarray(LENGTH_PREFIX_BYTES);

      expect(codec.shouldCompress(513)).toBe(true);
      expect(body[0]).toBe(COMPRESSION_MAGIC[0]);
      expect(body[1]).toBe(COMPRESSION_MAGIC[1]);
      expect(frame.readUInt32LE(0)).toBe(body.length);
      expect(body.length).toBeLessThan(513);
    });

    test('should never compress when compression is disabled', () => {
      const plain = new MessageCodec({ enableCompression: false });
      const frame = plain.encodeFrame(Buffer.alloc(4096, 0x61));

      expect(frame.readUInt32LE(0)).toBe(4096);
    });
  });

  describe('round trip', () => {
    test('should round-trip an uncompressed payload byte for byte', () => {
      const payload = Buffer.from([0x00, 0xff, 0x10, 0x7b, 0x22]);

      expect(codec.decodeFrame(codec.encodeFrame(payload))).toEqual(payload);
    });

    test('should round-trip a compressed payload byte for byte', () => {
      const payload = Buffer.from('abcdefghij'.repeat(200), 'utf8');
      const frame = codec.encodeFrame(payload);

      expect(MessageCodec.isCompressed(frame.subarray(LENGTH_PREFIX_BYTES))).toBe(true);
      expect(codec.decodeFrame(frame)).toEqual(payload);
    });

    test('should round-trip an empty payload', () => {
      const frame = codec.encodeFrame(Buffer.alloc(0));

      expect(frame.length).toBe(LENGTH_PREFIX_BYTES);
      expect(codec.decodeFrame(frame)).toEqual(Buffer.alloc(0));
    });

    test('should compress a small payload that starts with the magic but is not gzip', () => {
      const payload = Buffer.from([0x1f, 0x8b, 0x01, 0x02]);
      const frame = codec.encodeFrame(payload);

      expect(frame.subarray(LENGTH_PREFIX_BYTES)).not.toEqual(payload);
      expect(codec.decodeFrame(frame)).toEqual(payload);
    });

    test('should round-trip a small payload that is itself a gzip stream', () => {
      const payload = zlib.gzipSync(Buffer.from('hi', 'utf8'));

      expect(payload.length).toBe(22);
      expect(codec.decodeFrame(codec.encodeFrame(payload))).toEqual(payload);
    });

    test('should round-trip a gzip-stream payload with compression disabled', () => {
      const plain = new MessageCodec({ enableCompression: false });
      const payload = zlib.gzipSync(Buffer.from('hi', 'utf8'));

      expect(plain.decodeFrame(plain.encodeFrame(payload))).toEqual(payload);
    });

    test('should deliver a received body with the magic but no gzip stream as raw bytes', () => {
      const body = Buffer.from([0x1f, 0x8b, 0x01, 0x02]);

      expect(codec.decodeFrameBody(body)).toEqual(body);
    });

    test('should round-trip a message with a payload', () => {
      const message: Message = {
        type: MessageType.DATA,
        sequenceNumber: 42,
        timestamp: 1700000000000,
        payload: Buffer.from('hello', 'utf8')
      };
      const frame = codec.encodeMessage(message);

      expect(codec.decodeMessage(frame.subarray(LENGTH_PREFIX_BYTES))).toEqual(message);
    });

    test('should round-trip a large message through compression', () => {
      const message: Message = {
        type: MessageType.DATA,
        sequenceNumber: 0xffffffff,
        timestamp: 1,
        payload: Buffer.alloc(2000, 0x42)
      };
      const frame = codec.encodeMessage(message);

      expect(MessageCodec.isCompressed(frame.subarray(LENGTH_PREFIX_BYTES))).toBe(true);
      expect(codec.decodeMessage(frame.subarray(LENGTH_PREFIX_BYTES))).toEqual(message);
    });

    test('should omit the payload field for messages without one', () => {
      const message: Message = { type: MessageType.HEARTBEAT, sequenceNumber: 7, timestamp: 5 };

      expect(MessageCodec.serialize(message).toString('utf8')).toBe('{"t":"heartbeat","s":7,"ts":5}');
      expect(MessageCodec.deserialize(MessageCodec.serialize(message))).toEqual(message);
    });
  });

  describe('limits and malformed input', () => {
    test('should reject a frame that inflates past 16 times the frame limit', () => {
      const body = zlib.gzipSync(Buffer.alloc(2 * 1024 * 1024));
      const frame = Buffer.concat([Buffer.alloc(LENGTH_PREFIX_BYTES), body]);
      frame.writeUInt32LE(body.length, 0);

      expect(body.length).toBeLessThan(65536);
      expect(() => codec.decodeFrame(frame)).toThrow(new ProtocolError('Decompressed frame exceeds limit 1048576'));
    });

    test('should honour a configured decompression limit', () => {
      const strict = new MessageCodec({ maxDecompressedBytes: 1000 });
      const frame = strict.encodeFrame(Buffer.alloc(1000, 0x61));
      const large = Buffer.concat([Buffer.alloc(LENGTH_PREFIX_BYTES), zlib.gzipSync(Buffer.alloc(1001, 0x61))]);
      large.writeUInt32LE(large.length - LENGTH_PREFIX_BYTES, 0);

      expect(strict.decodeFrame(frame)).toEqual(Buffer.alloc(1000, 0x61));
      expect(() => strict.decodeFrame(large)).toThrow(ProtocolError);
    });

    test('should refuse to encode a body larger than the frame limit', () => {
      const small = new MessageCodec({ enableCompression: false, maxFrameSizeBytes: 100 });

      expect(() => small.encodeFrame(Buffer.alloc(101))).toThrow(ProtocolError);
      expect(small.encodeFrame(Buffer.alloc(100)).length).toBe(104);
    });

    test('should reject a frame whose declared length exceeds the limit', () => {
      const frame = Buffer.alloc(8);
      frame.writeUInt32LE(70000, 0);

      expect(() => codec.decodeFrame(frame)).toThrow('Declared frame length 70000 exceeds limit 65536');
    });

    test('should reject a truncated frame', () => {
      expect(() => codec.decodeFrame(Buffer.from([0x01, 0x00]))).toThrow(ProtocolError);
    });

    test('should reject invalid JSON', () => {
      expect(() => MessageCodec.deserialize(Buffer.from('not json'))).toThrow('Malformed message: invalid JSON');
    });

    test('should reject an unknown message type', () => {
      const body = Buffer.from('{"t":"bogus","s":1,"ts":1}');

      expect(() => MessageCodec.deserialize(body)).toThrow('Malformed message: unknown type bogus');
    });

    test('should reject a sequence number outside u32', () => {
      const body = Buffer.from('{"t":"data","s":-1,"ts":1}');

      expect(() => MessageCodec.deserialize(body)).toThrow('Malformed message: invalid sequence number -1');
    });
  });
});

describe('FrameDecoder', () => {
  const codec = new MessageCodec({ compressionThresholdBytes: 512 });

  test('should reassemble a frame split across reads', () => {
    const decoder = new FrameDecoder(65536);
    const frame = codec.encodeFrame(Buffer.from('split payload', 'utf8'));

    expect(decoder.push(frame.subarray(0, 2))).toEqual([]);
    expect(decoder.push(frame.subarray(2, 9))).toEqual([]);
    expect(decoder.bufferedBytes).toBe(5);

    const bodies = decoder.push(frame.subarray(9));
    expect(bodies).toHaveLength(1);
    expect(codec.decodeFrameBody(bodies[0]).toString('utf8')).toBe('split payload');
    expect(decoder.bufferedBytes).toBe(0);
  });

  test('should return several frames from one chunk in order', () => {
    const decoder = new FrameDecoder(65536);
    const chunk = Buffer.concat([
      codec.encodeFrame(Buffer.from('one')),
      codec.encodeFrame(Buffer.from('two')),
      codec.encodeFrame(Buffer.from('three')).subarray(0, 3)
    ]);

    const bodies = decoder.push(chunk);

    expect(bodies.map(body => body.toString('utf8'))).toEqual(['one', 'two']);
    expect(decoder.bufferedBytes).toBe(3);
  });

  test('should fail as soon as a header declares 70000 bytes with a 65536 limit', () => {
    const decoder = new FrameDecoder(65536);
    const header = Buffer.alloc(4);
    header.writeUInt32LE(70000, 0);

    expect(() => decoder.push(header)).toThrow(ProtocolError);
    expect(decoder.bufferedBytes).toBe(0);
  });

  test('should decode compressed frames delivered byte by byte', () => {
    const decoder = new FrameDecoder(65536);
    const payload = Buffer.from('z'.repeat(1000));
    const frame = codec.encodeFrame(payload);
    const bodies: Buffer[] = [];

    for (let i = 0; i < frame.length; i++) {
      bodies.push(...decoder.push(frame.subarray(i, i + 1)));
    }

    expect(bodies).toHaveLength(1);
    expect(codec.decodeFrameBody(bodies[0])).toEqual(payload);
  });
});
