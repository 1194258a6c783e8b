/**
 * Fixed-capacity ring buffer of latency samples with a running sum,
 * so the rolling average is O(1).
 */
export class LatencyTracker {
  private readonly samples: number[];
  private head = 0;
  private count = 0;
  private sum = 0;

  constructor(private readonly capacity: number = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LatencyTracker capacity must be a positive integer, got ${capacity}`);
    }
    this.samples = new Array<number>(capacity).fill(0);
  }

  record(latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) return;

    if (this.count === this.capacity) {
      // Overwrite the oldest sample
      this.sum -= this.samples[this.head];
    } else {
      this.count++;
    }

    this.samples[this.head] = latencyMs;
    this.sum += latencyMs;
    this.head = (this.head + 1) % this.capacity;
  }

  getAverage(): number {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  /**
   * Samples oldest first
   */
  getSamples(): number[] {
    const start = this.count === this.capacity ? this.head : 0;
    const result: number[] = [];
    for (let i = 0; i < this.count; i++) {
      result.push(this.samples[(start + i) % this.capacity]);
    }
    return result;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.samples.fill(0);
    this.head = 0;
    this.count = 0;
    this.sum = 0;
  }
}
