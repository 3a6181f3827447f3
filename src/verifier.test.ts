import { describe, it, expect } from "vitest";

import { generateKeyPair } from "./crypto.js";
import { InvalidArgumentError, MissingMetadataError, TrustChainError } from "./errors.js";
import type { MemoryRegistry } from "./registry/memory.js";
import {
  bytes,
  createFixture,
  publishSigned,
  readDocument,
  sha256,
} from "./testing/fixtures.js";
import {
  metadataName,
  Roles,
  SNAPSHOT_FILE,
  timestampMetafileSchema,
} from "./types.js";
import { rootKeyFromPEM } from "./verifier.js";

async function rejection(promise: Promise<unknown>): Promise<TrustChainError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason,
  );
  if (!(error instanceof TrustChainError)) {
    throw new Error(`expected a TrustChainError, got ${String(error)}`);
  }
  return error;
}

async function saved(registry: MemoryRegistry, role: Roles): Promise<Uint8Array> {
  const data = await registry.getMetadata(metadataName(role));
  if (data === undefined) {
    throw new Error(`${role} is not in the registry`);
  }
  return data;
}

async function currentTimestamp(registry: MemoryRegistry) {
  return timestampMetafileSchema.parse(await readDocument(registry, Roles.Timestamp));
}

describe("TrustVerifier", () => {
  describe("bootstrap", () => {
    it("should require a root key on first use", async () => {
      const { copy } = await createFixture();
      await expect(copy.pullMetadata()).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it("should reject a root that does not list the pinned key", async () => {
      const { copy } = await createFixture();
      const stranger = await generateKeyPair();

      const error = await rejection(copy.pullMetadata(stranger.publicKey.keyval.public));
      expect(error.role).toBe(Roles.Root);
      expect(error.reason).toBe("bad-signature");
      expect(await copy.verifier.trusted()).toBeUndefined();
    });

    it("should accept the pinned key in any PEM layout", async () => {
      const { copy, rootKey } = await createFixture();
      const reflowed = rootKey.replace(/\n/g, "\r\n").trimEnd();

      expect(rootKeyFromPEM(reflowed)).toEqual(rootKeyFromPEM(rootKey));
      const result = await copy.pullMetadata(reflowed);
      expect(result.targets).toEqual([]);
    });

    it("should fail when a document is missing", async () => {
      const { copy, registry, rootKey } = await createFixture();
      registry.deleteMetadata(metadataName(Roles.Timestamp));

      await expect(copy.pullMetadata(rootKey)).rejects.toBeInstanceOf(MissingMetadataError);
    });

    it("should reject a document that is not metadata", async () => {
      const { copy, registry, rootKey } = await createFixture();
      await registry.putMetadata(metadataName(Roles.Timestamp), bytes('{"signed":{}}'));

      const error = await rejection(copy.pullMetadata(rootKey));
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("malformed");
    });
  });

  describe("signatures", () => {
    it("should reject a tampered signature", async () => {
      const { copy, registry, rootKey } = await createFixture();
      const timestamp = await currentTimestamp(registry);
      const [signature] = timestamp.signatures;
      const flipped = (signature.sig[0] === "0" ? "1" : "0") + signature.sig.slice(1);
      await registry.putMetadata(
        metadataName(Roles.Timestamp),
        bytes(JSON.stringify({ ...timestamp, signatures: [{ ...signature, sig: flipped }] })),
      );

      const error = await rejection(copy.pullMetadata(rootKey));
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("bad-signature");
    });

    it("should reject duplicate signatures", async () => {
      const { copy, registry, rootKey } = await createFixture();
      const timestamp = await currentTimestamp(registry);
      await registry.putMetadata(
        metadataName(Roles.Timestamp),
        bytes(
          JSON.stringify({
            ...timestamp,
            signatures: [...timestamp.signatures, ...timestamp.signatures],
          }),
        ),
      );

      const error = await rejection(copy.pullMetadata(rootKey));
      expect(error.reason).toBe("malformed");
    });

    it("should reject a targets rotation signed by 1 of 3 root keys under a threshold of 2", async () => {
      const fixture = await createFixture({ rootKeys: 3, rootThreshold: 2 });
      const { master, copy, rootKey, rootKeyIds } = fixture;
      await master.pushTarget("v1", [bytes("abc")]);
      await master.pushMetadata();
      await copy.pullMetadata(rootKey);

      await master.rotateRoleKey(Roles.Targets, {}, { rootKeyIds: [rootKeyIds[0]] });

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Root);
      expect(error.reason).toBe("threshold");

      const trusted = await copy.verifier.trusted();
      expect(trusted?.root.signed.version).toBe(1);
      expect(trusted?.targets?.signed.version).toBe(2);
    });

    it("should accept a targets rotation signed by 2 of 3 root keys", async () => {
      const { master, copy, rootKey, rootKeyIds } = await createFixture({
        rootKeys: 3,
        rootThreshold: 2,
      });
      await copy.pullMetadata(rootKey);

      await master.rotateRoleKey(Roles.Targets, {}, { rootKeyIds: rootKeyIds.slice(1) });

      const result = await copy.pullMetadata();
      expect(result.updated).toBe(true);
      expect((await copy.verifier.trusted())?.root.signed.version).toBe(2);
    });

    it("should reject a root whose version does not match its name", async () => {
      const { copy, registry, rootKey } = await createFixture();
      await copy.pullMetadata(rootKey);

      const first = await registry.getMetadata(metadataName(Roles.Root, 1));
      expect(first).toBeDefined();
      await registry.putMetadata(metadataName(Roles.Root, 2), first ?? new Uint8Array(0));

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Root);
      expect(error.reason).toBe("inconsistent");
    });
  });

  describe("expiration", () => {
    it("should reject an expired timestamp even when correctly signed", async () => {
      const { copy, clock, rootKey } = await createFixture();
      clock.advance(2 * 24 * 60 * 60);

      const error = await rejection(copy.pullMetadata(rootKey));
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("expired");
      expect(await copy.verifier.trusted()).toBeUndefined();
    });

    it("should check the expiry of documents that did not change", async () => {
      const { copy, clock, rootKey } = await createFixture({
        lifetimes: { [Roles.Targets]: 60 * 60 },
      });
      await copy.pullMetadata(rootKey);

      clock.advance(2 * 60 * 60);

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Targets);
      expect(error.reason).toBe("expired");
    });
  });

  describe("rollback and consistency", () => {
    it("should reject a replayed older timestamp and snapshot", async () => {
      const { master, copy, registry, rootKey } = await createFixture();
      await master.pushMetadata();
      const oldTimestamp = await saved(registry, Roles.Timestamp);
      const oldSnapshot = await saved(registry, Roles.Snapshot);
      await master.pushMetadata();
      await copy.pullMetadata(rootKey);

      await registry.putMetadata(metadataName(Roles.Timestamp), oldTimestamp);
      await registry.putMetadata(metadataName(Roles.Snapshot), oldSnapshot);

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("rollback");
      expect((await copy.verifier.trusted())?.snapshot?.signed.version).toBe(3);
    });

    it("should reject a new timestamp pinning an older snapshot", async () => {
      const fixture = await createFixture();
      const { master, copy, registry, rootKey } = fixture;
      await master.pushMetadata();
      const oldSnapshot = await saved(registry, Roles.Snapshot);
      await master.pushMetadata();
      await copy.pullMetadata(rootKey);

      const timestamp = await currentTimestamp(registry);
      await registry.putMetadata(metadataName(Roles.Snapshot), oldSnapshot);
      await publishSigned(fixture, Roles.Timestamp, {
        ...timestamp.signed,
        version: timestamp.signed.version + 1,
        meta: {
          [SNAPSHOT_FILE]: {
            version: 2,
            length: oldSnapshot.byteLength,
            hashes: { sha256: sha256(oldSnapshot) },
          },
        },
      });

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("rollback");
    });

    it("should reject a snapshot that differs from the one the timestamp pins", async () => {
      const { master, copy, registry, rootKey } = await createFixture();
      await master.pushMetadata();
      await copy.pullMetadata(rootKey);
      const staleSnapshot = await saved(registry, Roles.Snapshot);

      await master.pushMetadata();
      await registry.putMetadata(metadataName(Roles.Snapshot), staleSnapshot);

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Snapshot);
      expect(error.reason).toBe("inconsistent");
      expect((await copy.verifier.trusted())?.timestamp?.signed.version).toBe(2);
    });

    it("should reject a snapshot whose version differs from the pinned version", async () => {
      const fixture = await createFixture();
      const { master, copy, registry, rootKey } = fixture;
      await master.pushMetadata();
      await copy.pullMetadata(rootKey);

      const timestamp = await currentTimestamp(registry);
      const pin = timestamp.signed.meta[SNAPSHOT_FILE];
      await publishSigned(fixture, Roles.Timestamp, {
        ...timestamp.signed,
        version: timestamp.signed.version + 1,
        meta: { [SNAPSHOT_FILE]: { ...pin, version: 99 } },
      });

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Snapshot);
      expect(error.reason).toBe("inconsistent");
    });

    it("should reject a timestamp that reuses its version for another snapshot", async () => {
      const fixture = await createFixture();
      const { copy, registry, rootKey } = fixture;
      await copy.pullMetadata(rootKey);

      const timestamp = await currentTimestamp(registry);
      const pin = timestamp.signed.meta[SNAPSHOT_FILE];
      await publishSigned(fixture, Roles.Timestamp, {
        ...timestamp.signed,
        meta: { [SNAPSHOT_FILE]: { ...pin, version: pin.version + 1 } },
      });

      const error = await rejection(copy.pullMetadata());
      expect(error.role).toBe(Roles.Timestamp);
      expect(error.reason).toBe("inconsistent");
    });
  });
});
