import { createHash } from "node:crypto";

import { TransportError } from "../errors.js";
import { type ByteStream, chunksOf, collect } from "../streams.js";
import type { Registry } from "./registry.js";

/**
 * In-process registry. Like a real registry it checks uploaded content against
 * the digest it is stored under; `corruptBlob` and `putMetadata` let tests
 * play the compromised registry.
 */
export class MemoryRegistry implements Registry {
  private readonly blobs = new Map<string, Uint8Array>();
  private readonly metadata = new Map<string, Uint8Array>();

  /** Bytes received by `putBlob`, per digest. */
  readonly uploadedBytes = new Map<string, number>();

  constructor(private readonly chunkSize: number = 4) {}

  async putBlob(digest: string, chunks: ByteStream, size: number): Promise<void> {
    const data = await collect(chunks);
    const actual = createHash("sha256").update(data).digest("hex");
    if (actual !== digest || data.byteLength !== size) {
      throw new TransportError(`Upload of ${digest} does not match its content`, 400);
    }
    this.uploadedBytes.set(
      digest,
      (this.uploadedBytes.get(digest) ?? 0) + data.byteLength,
    );
    this.blobs.set(digest, data);
  }

  async *getBlob(digest: string): ByteStream {
    const data = this.blobs.get(digest);
    if (data === undefined) {
      throw new TransportError(`Blob ${digest} not found`, 404);
    }
    yield* chunksOf(data.slice(), this.chunkSize);
  }

  async deleteBlob(digest: string): Promise<void> {
    this.blobs.delete(digest);
  }

  async blobExists(digest: string): Promise<boolean> {
    return this.blobs.has(digest);
  }

  async putMetadata(name: string, data: Uint8Array): Promise<void> {
    this.metadata.set(name, data.slice());
  }

  async getMetadata(name: string): Promise<Uint8Array | undefined> {
    return this.metadata.get(name)?.slice();
  }

  deleteMetadata(name: string): void {
    this.metadata.delete(name);
  }

  blobDigests(): string[] {
    return [...this.blobs.keys()].sort();
  }

  /** Flips the bits of one stored byte. */
  corruptBlob(digest: string, offset: number = 0): void {
    const data = this.blobs.get(digest);
    if (data === undefined || offset >= data.byteLength) {
      throw new Error(`Cannot corrupt ${digest} at ${offset}`);
    }
    data[offset] ^= 0xff;
  }
}
