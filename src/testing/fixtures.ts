import { createHash } from "node:crypto";

import { signMetadata } from "../crypto.js";
import { stringToUint8Array, Uint8ArrayToString } from "../encoding.js";
import { encodeMetafile } from "../metadata.js";
import { MemoryRegistry } from "../registry/memory.js";
import { CopyRepository, MasterRepository } from "../repository.js";
import { MemoryBackend } from "../storage/memory.js";
import { collect } from "../streams.js";
import type { PulledBlob } from "../targets.js";
import type { Lifetimes } from "../metadata.js";
import { metadataName, type Roles, type Signed } from "../types.js";

export const START = new Date("2026-01-01T00:00:00Z");

export const ABC_DIGEST =
  "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

export function sha256(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function bytes(text: string): Uint8Array {
  return stringToUint8Array(text);
}

export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = start;
  }

  now = (): Date => this.current;

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

export interface Fixture {
  registry: MemoryRegistry;
  clock: TestClock;
  master: MasterRepository;
  copy: CopyRepository;
  copyBackend: MemoryBackend;
  rootKeyIds: string[];
  /** PEM of the first root key, as a consumer would pin it. */
  rootKey: string;
}

export interface FixtureOptions {
  rootKeys?: number;
  rootThreshold?: number;
  lifetimes?: Partial<Lifetimes>;
}

/** A master with keys and version 1 metadata, and an empty copy. */
export async function createFixture(options: FixtureOptions = {}): Promise<Fixture> {
  const registry = new MemoryRegistry();
  const clock = new TestClock();
  const master = new MasterRepository({
    name: "test/repo",
    backend: new MemoryBackend(),
    registry,
    now: clock.now,
    lifetimes: options.lifetimes,
    kdfIterations: 1000,
  });

  const rootKeyIds = [await master.createRootKey()];
  for (let i = 1; i < (options.rootKeys ?? 1); i++) {
    rootKeyIds.push(await master.addRootKey());
  }
  await master.createMetadataKeys();
  await master.createMetadata({}, { rootThreshold: options.rootThreshold });

  const copyBackend = new MemoryBackend();
  const copy = new CopyRepository({
    name: "test/repo",
    backend: copyBackend,
    registry,
    now: clock.now,
  });

  const [rootKey] = await master.rootPublicKeys();
  return { registry, clock, master, copy, copyBackend, rootKeyIds, rootKey };
}

export async function readBlobs(blobs: PulledBlob[]): Promise<string[]> {
  const contents: string[] = [];
  for (const blob of blobs) {
    contents.push(Uint8ArrayToString(await collect(blob.stream)));
  }
  return contents;
}

export async function readDocument(registry: MemoryRegistry, role: Roles): Promise<unknown> {
  const data = await registry.getMetadata(metadataName(role));
  if (data === undefined) {
    throw new Error(`${role} is not in the registry`);
  }
  return JSON.parse(Uint8ArrayToString(data));
}

/** Signs `signed` with the master's key for `role` and publishes it. */
export async function publishSigned(
  fixture: Fixture,
  role: Roles,
  signed: Signed,
): Promise<void> {
  const signers = await fixture.master.keys.signers(role);
  const metafile = { signed, signatures: await signMetadata(signed, signers) };
  await fixture.registry.putMetadata(metadataName(role), encodeMetafile(metafile));
}
