import { z } from "zod";

import { InvalidArgumentError, UnknownTargetError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Registry } from "./registry/registry.js";
import type { FileBackend } from "./storage.js";
import {
  type ByteStream,
  chunksOf,
  digestOf,
  readFileChunks,
  reportProgress,
  verifyDigest,
} from "./streams.js";
import {
  type BlobRef,
  type ProgressCallback,
  type TargetEntry,
  targetEntrySchema,
} from "./types.js";

const PENDING_KEY = "pending-targets";

const pendingSchema = z.record(targetEntrySchema);

export type TargetMap = Record<string, TargetEntry>;

/**
 * A blob source for `pushTarget`: a file path, raw bytes, or `@name` to reuse
 * the blobs of another pending target.
 */
export type TargetSource = string | Uint8Array;

interface ResolvedBlob extends BlobRef {
  /** Absent for blobs borrowed from another target: nothing is uploaded. */
  open?: () => ByteStream;
}

export interface PulledBlob {
  digest: string;
  size: number;
  /** Verified while read; raises DigestMismatchError on tampered content. */
  stream: ByteStream;
}

export interface FileCheck {
  file: string;
  digest: string;
  expected?: string;
  ok: boolean;
}

export interface CheckTargetResult {
  /** Every file matches and the counts agree. */
  ok: boolean;
  files: FileCheck[];
}

function totalLength(blobs: BlobRef[]): number {
  return blobs.reduce((sum, blob) => sum + blob.length, 0);
}

function ownEntry(targets: TargetMap, name: string): TargetEntry | undefined {
  return Object.prototype.hasOwnProperty.call(targets, name) ? targets[name] : undefined;
}

/**
 * Master side: the pending target set and its blobs in the registry. Changes
 * reach consumers only once the metadata is pushed.
 */
export class MasterTargetStore {
  private readonly logger: Logger;

  constructor(
    private readonly backend: FileBackend,
    private readonly registry: Registry,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  async pending(): Promise<TargetMap> {
    return pendingSchema.parse((await this.backend.read(PENDING_KEY)) ?? {});
  }

  private async savePending(targets: TargetMap): Promise<void> {
    await this.backend.write(PENDING_KEY, targets);
  }

  async listTargets(): Promise<string[]> {
    return Object.keys(await this.pending()).sort();
  }

  private async resolve(
    source: TargetSource,
    pending: TargetMap,
  ): Promise<ResolvedBlob[]> {
    if (source instanceof Uint8Array) {
      const { digest, size } = await digestOf(chunksOf(source));
      return [{ digest, length: size, open: () => chunksOf(source) }];
    }

    if (source.startsWith("@")) {
      const other = ownEntry(pending, source.slice(1));
      if (other === undefined) {
        throw new InvalidArgumentError(`No target named ${source.slice(1)}`);
      }
      return other.blobs.map((blob) => ({ ...blob }));
    }

    const { digest, size } = await digestOf(readFileChunks(source));
    return [{ digest, length: size, open: () => readFileChunks(source) }];
  }

  private async upload(blob: ResolvedBlob, progress?: ProgressCallback): Promise<void> {
    if (!blob.open) {
      return;
    }
    if (await this.registry.blobExists(blob.digest)) {
      this.logger.debug(`Blob ${blob.digest} already present`);
      progress?.(blob.digest, new Uint8Array(0), blob.length);
      return;
    }
    await this.registry.putBlob(
      blob.digest,
      reportProgress(blob.open(), blob.digest, blob.length, progress),
      blob.length,
    );
    this.logger.info(`Uploaded blob ${blob.digest} (${blob.length} bytes)`);
  }

  /**
   * Uploads the blobs of `sources` that the registry lacks, distinct digests
   * concurrently, then replaces the blob list of `name` in the pending set.
   */
  async pushTarget(
    name: string,
    sources: TargetSource[],
    progress?: ProgressCallback,
  ): Promise<TargetEntry> {
    // __proto__ is dropped when a target map is parsed
    if (!name || name.startsWith("@") || name === "__proto__") {
      throw new InvalidArgumentError(`Invalid target name: ${JSON.stringify(name)}`);
    }
    if (sources.length === 0) {
      throw new InvalidArgumentError(`No blobs given for target ${name}`);
    }

    const pending = await this.pending();
    const blobs: ResolvedBlob[] = [];
    for (const source of sources) {
      blobs.push(...(await this.resolve(source, pending)));
    }

    const uploads = new Map<string, ResolvedBlob>();
    for (const blob of blobs) {
      const seen = uploads.get(blob.digest);
      // a borrowed blob is already in the registry
      if (seen === undefined || !blob.open) {
        uploads.set(blob.digest, blob);
      }
    }
    await Promise.all(
      [...uploads.values()].map((blob) => this.upload(blob, progress)),
    );

    const refs = blobs.map(({ digest, length }) => ({ digest, length }));
    const entry: TargetEntry = { length: totalLength(refs), blobs: refs };
    pending[name] = entry;
    await this.savePending(pending);
    return entry;
  }

  /**
   * Drops targets from the pending set and deletes the blobs no remaining
   * target references. Unknown names are ignored.
   */
  async delTarget(...names: string[]): Promise<void> {
    const pending = await this.pending();
    const candidates = new Set<string>();

    for (const name of names) {
      const entry = ownEntry(pending, name);
      if (entry === undefined) {
        continue;
      }
      for (const blob of entry.blobs) {
        candidates.add(blob.digest);
      }
      delete pending[name];
    }

    for (const entry of Object.values(pending)) {
      for (const blob of entry.blobs) {
        candidates.delete(blob.digest);
      }
    }

    await this.savePending(pending);
    await Promise.all(
      [...candidates].map(async (digest) => {
        await this.registry.deleteBlob(digest);
        this.logger.info(`Deleted blob ${digest}`);
      }),
    );
  }
}

/**
 * Copy side: read-only view over the targets of the last verified metadata.
 */
export class CopyTargetStore {
  constructor(
    private readonly registry: Registry,
    private readonly trustedTargets: () => Promise<TargetMap>,
  ) {}

  private async entry(name: string): Promise<TargetEntry> {
    const entry = ownEntry(await this.trustedTargets(), name);
    if (entry === undefined) {
      throw new UnknownTargetError(name);
    }
    return entry;
  }

  async listTargets(): Promise<string[]> {
    return Object.keys(await this.trustedTargets()).sort();
  }

  async pullTarget(name: string, progress?: ProgressCallback): Promise<PulledBlob[]> {
    const entry = await this.entry(name);
    return entry.blobs.map(({ digest, length }) => ({
      digest,
      size: length,
      stream: verifyDigest(
        reportProgress(this.registry.getBlob(digest), digest, length, progress),
        digest,
        length,
      ),
    }));
  }

  async blobSizes(name: string): Promise<number[]> {
    return (await this.entry(name)).blobs.map((blob) => blob.length);
  }

  async checkTarget(name: string, files: string[]): Promise<CheckTargetResult> {
    const entry = await this.entry(name);

    const checks: FileCheck[] = [];
    for (const [index, file] of files.entries()) {
      const { digest } = await digestOf(readFileChunks(file));
      const expected = entry.blobs[index]?.digest;
      checks.push({ file, digest, expected, ok: digest === expected });
    }

    return {
      ok: files.length === entry.blobs.length && checks.every((check) => check.ok),
      files: checks,
    };
  }
}
