import { AsyncMutex, type FileBackend, type Release } from "../storage.js";

// Values are kept serialized so callers never share mutable state with the
// store, as with the filesystem backend.
export class MemoryBackend implements FileBackend {
  private readonly entries = new Map<string, string>();
  private readonly mutex = new AsyncMutex();

  async read(key: string): Promise<unknown | undefined> {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(value);
    return parsed;
  }

  async write(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async lock(): Promise<Release> {
    const release = await this.mutex.acquire();
    return async () => release();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
