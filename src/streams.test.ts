import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { describe, it, expect } from "vitest";

import { Uint8ArrayToString } from "./encoding.js";
import { DigestMismatchError } from "./errors.js";
import {
  chunksOf,
  collect,
  digestOf,
  readFileChunks,
  rechunk,
  reportProgress,
  verifyDigest,
  type ByteStream,
} from "./streams.js";
import { ABC_DIGEST, bytes, sha256 } from "./testing/fixtures.js";

async function lengths(stream: ByteStream): Promise<number[]> {
  const sizes: number[] = [];
  for await (const chunk of stream) {
    sizes.push(chunk.byteLength);
  }
  return sizes;
}

describe("streams", () => {
  it("should split bytes into chunks", async () => {
    expect(await lengths(chunksOf(bytes("0123456789"), 4))).toEqual([4, 4, 2]);
    expect(await lengths(chunksOf(new Uint8Array(0), 4))).toEqual([]);
  });

  it("should digest and measure a stream", async () => {
    expect(await digestOf(chunksOf(bytes("abc"), 1))).toEqual({
      digest: ABC_DIGEST,
      size: 3,
    });
  });

  it("should regroup a stream into fixed-size chunks", async () => {
    const regrouped = rechunk(chunksOf(bytes("0123456789"), 3), 4);
    const chunks: string[] = [];
    for await (const chunk of regrouped) {
      chunks.push(Uint8ArrayToString(chunk));
    }

    expect(chunks).toEqual(["0123", "4567", "89"]);
    expect(await lengths(rechunk(chunksOf(new Uint8Array(0)), 4))).toEqual([]);
  });

  it("should collect a stream", async () => {
    expect(Uint8ArrayToString(await collect(chunksOf(bytes("hello"), 2)))).toBe("hello");
  });

  it("should read a file in chunks", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "blobtuf-streams-"));
    try {
      const file = path.join(dir, "data");
      await fs.writeFile(file, "0123456789");

      expect(await lengths(readFileChunks(file, 4))).toEqual([4, 4, 2]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("should report every chunk and then completion", async () => {
    const calls: [string, number, number][] = [];
    const data = await collect(
      reportProgress(chunksOf(bytes("hello"), 3), "d", 5, (digest, chunk, total) => {
        calls.push([digest, chunk.byteLength, total]);
      }),
    );

    expect(data.byteLength).toBe(5);
    expect(calls).toEqual([
      ["d", 3, 5],
      ["d", 2, 5],
      ["d", 0, 5],
    ]);
  });

  describe("verifyDigest", () => {
    it("should pass matching content through", async () => {
      const data = await collect(verifyDigest(chunksOf(bytes("abc"), 2), ABC_DIGEST, 3));
      expect(Uint8ArrayToString(data)).toBe("abc");
    });

    it("should fail on different content", async () => {
      const error = await collect(verifyDigest(chunksOf(bytes("abd")), ABC_DIGEST, 3)).then(
        () => undefined,
        (reason: unknown) => reason,
      );

      expect(error).toBeInstanceOf(DigestMismatchError);
      expect(error).toMatchObject({ expected: ABC_DIGEST, actual: sha256("abd") });
    });

    it("should fail on short content", async () => {
      await expect(collect(verifyDigest(chunksOf(bytes("ab")), ABC_DIGEST, 3))).rejects.toThrow(
        `Blob ${ABC_DIGEST} is 2 bytes, expected 3`,
      );
    });

    it("should fail as soon as content runs past its size", async () => {
      const seen: number[] = [];
      const stream = verifyDigest(chunksOf(bytes("abcdef"), 2), ABC_DIGEST, 3);

      await expect(
        (async () => {
          for await (const chunk of stream) {
            seen.push(chunk.byteLength);
          }
        })(),
      ).rejects.toBeInstanceOf(DigestMismatchError);
      expect(seen).toEqual([2]);
    });
  });
});
