import { ProtocolError } from '../common/errors';
import { LENGTH_PREFIX_BYTES } from './MessageCodec';

/**
 * Reassembles length-prefixed frames from arbitrarily split chunks.
 * Returns frame bodies (without the prefix, still possibly compressed).
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private pendingLength: number | null = null;

  constructor(private readonly maxFrameSizeBytes: number) {}

  /**
   * Feed bytes read from the transport. Throws a ProtocolError as soon as a
   * header declares a body larger than the limit, without waiting for the body.
   */
  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: Buffer[] = [];

    for (;;) {
      if (this.pendingLength === null) {
        if (this.buffer.length < LENGTH_PREFIX_BYTES) break;

        const length = this.buffer.readUInt32LE(0);
        if (length > this.maxFrameSizeBytes) {
          this.reset();
          throw new ProtocolError(`Declared frame length ${length} exceeds limit ${this.maxFrameSizeBytes}`);
        }
        this.pendingLength = length;
        this.buffer = this.buffer.subarray(LENGTH_PREFIX_BYTES);
      }

      if (this.buffer.length < this.pendingLength) break;

      // Copy so the returned body does not pin the accumulated buffer
      frames.push(Buffer.from(this.buffer.subarray(0, this.pendingLength)));
      this.buffer = this.buffer.subarray(this.pendingLength);
      this.pendingLength = null;
    }

    return frames;
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.pendingLength = null;
  }
}
