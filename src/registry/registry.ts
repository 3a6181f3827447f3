import type { ByteStream } from "../streams.js";

/**
 * The untrusted store blobs and metadata documents are pushed to and pulled
 * from, scoped to one repository. Blobs are addressed by lowercase sha256 hex
 * digest, metadata documents by name (`timestamp.json`, `3.root.json`, ...).
 */
export interface Registry {
  putBlob(digest: string, chunks: ByteStream, size: number): Promise<void>;
  /** Lazy: nothing is fetched until the stream is iterated. */
  getBlob(digest: string): ByteStream;
  /** Deleting an absent blob is not an error. */
  deleteBlob(digest: string): Promise<void>;
  blobExists(digest: string): Promise<boolean>;
  putMetadata(name: string, data: Uint8Array): Promise<void>;
  /** Resolves to undefined when the document does not exist. */
  getMetadata(name: string): Promise<Uint8Array | undefined>;
}

export interface Credentials {
  username?: string;
  password?: string;
}
