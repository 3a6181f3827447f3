import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import { concatUint8Arrays } from "./encoding.js";
import { DigestMismatchError } from "./errors.js";
import type { ProgressCallback } from "./types.js";

/** A lazy, finite, non-restartable sequence of byte chunks. */
export type ByteStream = AsyncIterable<Uint8Array>;

export const DEFAULT_CHUNK_SIZE = 8192;

const EMPTY = new Uint8Array(0);

export async function* chunksOf(
  bytes: Uint8Array,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): ByteStream {
  for (let offset = 0; offset < bytes.byteLength; offset += chunkSize) {
    yield bytes.subarray(offset, offset + chunkSize);
  }
}

/** Regroups a stream into chunks of exactly `size` bytes, the last one shorter. */
export async function* rechunk(stream: ByteStream, size: number): ByteStream {
  let buffered: Uint8Array[] = [];
  let length = 0;

  for await (const chunk of stream) {
    buffered.push(chunk);
    length += chunk.byteLength;
    while (length >= size) {
      const joined = concatUint8Arrays(buffered);
      yield joined.subarray(0, size);
      const rest = joined.subarray(size);
      buffered = rest.byteLength > 0 ? [rest] : [];
      length = rest.byteLength;
    }
  }
  if (length > 0) {
    yield concatUint8Arrays(buffered);
  }
}

export async function* readFileChunks(
  file: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): ByteStream {
  const stream = createReadStream(file, { highWaterMark: chunkSize });
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    }
  }
}

export interface StreamDigest {
  digest: string;
  size: number;
}

export async function digestOf(stream: ByteStream): Promise<StreamDigest> {
  const hash = createHash("sha256");
  let size = 0;
  for await (const chunk of stream) {
    hash.update(chunk);
    size += chunk.byteLength;
  }
  return { digest: hash.digest("hex"), size };
}

export async function collect(stream: ByteStream): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return concatUint8Arrays(chunks);
}

export async function* reportProgress(
  stream: ByteStream,
  digest: string,
  total: number,
  progress?: ProgressCallback,
): ByteStream {
  for await (const chunk of stream) {
    progress?.(digest, chunk, total);
    yield chunk;
  }
  progress?.(digest, EMPTY, total);
}

/**
 * Passes chunks through while hashing them. Fails as soon as more than `size`
 * bytes arrive, and at the end if the digest or length disagree.
 */
export async function* verifyDigest(
  stream: ByteStream,
  digest: string,
  size: number,
): ByteStream {
  const hash = createHash("sha256");
  let received = 0;

  for await (const chunk of stream) {
    received += chunk.byteLength;
    if (received > size) {
      throw new DigestMismatchError(
        digest,
        "unknown",
        `Blob ${digest} is longer than its declared ${size} bytes`,
      );
    }
    hash.update(chunk);
    yield chunk;
  }

  const actual = hash.digest("hex");
  if (received !== size) {
    throw new DigestMismatchError(
      digest,
      actual,
      `Blob ${digest} is ${received} bytes, expected ${size}`,
    );
  }
  if (actual !== digest) {
    throw new DigestMismatchError(digest, actual);
  }
}
