import { describe, it, expect, beforeEach } from "vitest";

import { InvalidArgumentError, MissingMetadataKeysError, MissingRootKeyError } from "./errors.js";
import { KeyManager } from "./keys.js";
import { DEFAULT_LIFETIMES, MetadataBuilder } from "./metadata.js";
import { MemoryRegistry } from "./registry/memory.js";
import { MemoryBackend } from "./storage/memory.js";
import { MasterTargetStore } from "./targets.js";
import { ABC_DIGEST, bytes, readDocument, sha256, TestClock } from "./testing/fixtures.js";
import {
  metadataName,
  Roles,
  rootMetafileSchema,
  snapshotMetafileSchema,
  targetsMetafileSchema,
  timestampMetafileSchema,
} from "./types.js";

describe("MetadataBuilder", () => {
  let registry: MemoryRegistry;
  let keys: KeyManager;
  let targets: MasterTargetStore;
  let clock: TestClock;
  let builder: MetadataBuilder;

  beforeEach(() => {
    const backend = new MemoryBackend();
    registry = new MemoryRegistry();
    clock = new TestClock();
    keys = new KeyManager(backend, { kdfIterations: 1000 });
    targets = new MasterTargetStore(backend, registry);
    builder = new MetadataBuilder(backend, registry, keys, targets, { now: clock.now });
  });

  async function createKeys(): Promise<void> {
    await keys.createRootKey();
    await keys.createMetadataKeys();
  }

  it("should use the default lifetimes", () => {
    expect(DEFAULT_LIFETIMES).toEqual({
      [Roles.Root]: 365 * 86400,
      [Roles.Targets]: 90 * 86400,
      [Roles.Snapshot]: 7 * 86400,
      [Roles.Timestamp]: 86400,
    });
  });

  it("should require every key before creating metadata", async () => {
    await expect(builder.createMetadata()).rejects.toBeInstanceOf(MissingRootKeyError);

    await keys.createRootKey();
    const error = await builder.createMetadata().then(
      () => undefined,
      (reason: unknown) => reason,
    );
    expect(error).toBeInstanceOf(MissingMetadataKeysError);
    expect(error).toMatchObject({
      roles: [Roles.Targets, Roles.Snapshot, Roles.Timestamp],
    });
  });

  it("should publish version 1 of every role", async () => {
    await createKeys();
    await builder.createMetadata();

    const root = rootMetafileSchema.parse(await readDocument(registry, Roles.Root));
    expect(root.signed.version).toBe(1);
    expect(root.signed.expires).toBe("2027-01-01T00:00:00Z");
    expect(root.signed.consistent_snapshot).toBe(false);
    expect(root.signed.roles[Roles.Root].keyids).toEqual(
      (await keys.publicKeys(Roles.Root)).map((key) => key.keyid),
    );
    expect(await registry.getMetadata(metadataName(Roles.Root, 1))).toEqual(
      await registry.getMetadata(metadataName(Roles.Root)),
    );

    for (const role of [Roles.Targets, Roles.Snapshot, Roles.Timestamp]) {
      expect(await readDocument(registry, role)).toMatchObject({ signed: { version: 1 } });
    }
  });

  it("should refuse to create metadata twice", async () => {
    await createKeys();
    await builder.createMetadata();

    await expect(builder.createMetadata()).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("should reject a root threshold above the number of root keys", async () => {
    await createKeys();

    await expect(builder.createMetadata({}, { rootThreshold: 2 })).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
  });

  it("should re-sign the chain in order, each pinning the previous document", async () => {
    await createKeys();
    await builder.createMetadata();
    await targets.pushTarget("v1", [bytes("abc")]);
    clock.advance(3600);
    await builder.pushMetadata();

    const targetsBytes = await registry.getMetadata(metadataName(Roles.Targets));
    const snapshotBytes = await registry.getMetadata(metadataName(Roles.Snapshot));
    if (targetsBytes === undefined || snapshotBytes === undefined) {
      throw new Error("documents were not pushed");
    }

    const targetsDoc = targetsMetafileSchema.parse(await readDocument(registry, Roles.Targets));
    expect(targetsDoc.signed.version).toBe(2);
    expect(targetsDoc.signed.targets).toEqual({
      v1: { length: 3, blobs: [{ digest: ABC_DIGEST, length: 3 }] },
    });

    const snapshot = snapshotMetafileSchema.parse(await readDocument(registry, Roles.Snapshot));
    expect(snapshot.signed.version).toBe(2);
    expect(snapshot.signed.meta).toEqual({
      "targets.json": {
        version: 2,
        length: targetsBytes.byteLength,
        hashes: { sha256: sha256(targetsBytes) },
      },
    });

    const timestamp = timestampMetafileSchema.parse(
      await readDocument(registry, Roles.Timestamp),
    );
    expect(timestamp.signed.version).toBe(2);
    expect(timestamp.signed.expires).toBe("2026-01-02T01:00:00Z");
    expect(timestamp.signed.meta).toEqual({
      "snapshot.json": {
        version: 2,
        length: snapshotBytes.byteLength,
        hashes: { sha256: sha256(snapshotBytes) },
      },
    });
  });

  it("should leave root untouched on a regular push", async () => {
    await createKeys();
    await builder.createMetadata();
    await builder.pushMetadata();

    expect(await registry.getMetadata(metadataName(Roles.Root, 2))).toBeUndefined();
    expect(await readDocument(registry, Roles.Root)).toMatchObject({ signed: { version: 1 } });
  });

  it("should publish a rotated root with the next push", async () => {
    await createKeys();
    await builder.createMetadata();
    await keys.rotateKey(Roles.Timestamp);

    await expect(builder.pushMetadata()).rejects.toBeInstanceOf(InvalidArgumentError);

    const root = await builder.rotateRoot();
    expect(root.signed.version).toBe(2);
    expect(await registry.getMetadata(metadataName(Roles.Root, 2))).toBeUndefined();

    await builder.pushMetadata();
    expect(await readDocument(registry, Roles.Root)).toMatchObject({ signed: { version: 2 } });
    expect(await registry.getMetadata(metadataName(Roles.Root, 2))).toBeDefined();
    expect(root.signed.roles[Roles.Timestamp].keyids).toEqual(
      (await keys.publicKeys(Roles.Timestamp)).map((key) => key.keyid),
    );
  });

  it("should report the expirations of the local documents", async () => {
    await createKeys();
    expect(await builder.getExpirations()).toEqual({});

    await builder.createMetadata();
    clock.advance(86400);
    await builder.pushMetadata();

    expect(await builder.getExpirations()).toEqual({
      [Roles.Root]: new Date("2027-01-01T00:00:00Z"),
      [Roles.Targets]: new Date("2026-04-02T00:00:00Z"),
      [Roles.Snapshot]: new Date("2026-01-09T00:00:00Z"),
      [Roles.Timestamp]: new Date("2026-01-03T00:00:00Z"),
    });
  });

  it("should apply configured lifetimes", async () => {
    const backend = new MemoryBackend();
    const customKeys = new KeyManager(backend);
    const custom = new MetadataBuilder(
      backend,
      registry,
      customKeys,
      new MasterTargetStore(backend, registry),
      { now: clock.now, lifetimes: { [Roles.Timestamp]: 300 } },
    );
    await customKeys.createRootKey();
    await customKeys.createMetadataKeys();
    await custom.createMetadata();

    const expirations = await custom.getExpirations();
    expect(expirations[Roles.Timestamp]).toEqual(new Date("2026-01-01T00:05:00Z"));
    expect(expirations[Roles.Snapshot]).toEqual(new Date("2026-01-08T00:00:00Z"));
  });
});
