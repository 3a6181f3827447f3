// Backends persist JSON documents by key. The master keeps its key store and
// signed metadata in one, the copy keeps its last trusted metadata in another.
// Values are returned unvalidated: callers parse them with their own schema.

export type Release = () => Promise<void>;

export interface FileBackend {
  read(key: string): Promise<unknown | undefined>;
  write(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  /** Serializes writers of one repository; resolves once the lock is held. */
  lock(): Promise<Release>;
}

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async acquire(): Promise<() => void> {
    let release: () => void = () => {};
    // the executor runs synchronously, so release is bound before use
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;
    return release;
  }
}
