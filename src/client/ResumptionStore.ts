/**
 * Opaque key-value persistence for resumption tokens. Implementations may be
 * backed by anything (a file, a browser store, a remote cache); the client only
 * reads and writes bytes under its own key.
 */
export interface ResumptionStore {
  load(key: string): Promise<Buffer | undefined>;
  save(key: string, token: Buffer): Promise<void>;
  clear(key: string): Promise<void>;
}

export class InMemoryResumptionStore implements ResumptionStore {
  private readonly tokens = new Map<string, Buffer>();

  async load(key: string): Promise<Buffer | undefined> {
    const token = this.tokens.get(key);
    return token ? Buffer.from(token) : undefined;
  }

  async save(key: string, token: Buffer): Promise<void> {
    this.tokens.set(key, Buffer.from(token));
  }

  async clear(key: string): Promise<void> {
    this.tokens.delete(key);
  }

  get size(): number {
    return this.tokens.size;
  }
}
