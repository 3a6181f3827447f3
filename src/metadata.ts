import { z } from "zod";

import { canonicalize } from "./canonicalize.js";
import { sha256Hex, signMetadata } from "./crypto.js";
import { stringToUint8Array } from "./encoding.js";
import { InvalidArgumentError } from "./errors.js";
import type { KeyManager, KeyPasswords } from "./keys.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Registry } from "./registry/registry.js";
import type { FileBackend } from "./storage.js";
import type { MasterTargetStore } from "./targets.js";
import {
  type Key,
  type MetaEntry,
  type Metafile,
  METADATA_ROLES,
  metadataName,
  type Role,
  Roles,
  rootMetafileSchema,
  type RootMetafile,
  type RootSigned,
  type Signed,
  SNAPSHOT_FILE,
  snapshotMetafileSchema,
  type SnapshotMetafile,
  SPEC_VERSION,
  TARGETS_FILE,
  targetsMetafileSchema,
  type TargetsMetafile,
  timestampMetafileSchema,
  type TimestampMetafile,
} from "./types.js";

const STATE_KEY = "metadata";

const DAY = 24 * 60 * 60;

/** Seconds each role's documents stay valid once signed. */
export type Lifetimes = Record<Roles, number>;

export const DEFAULT_LIFETIMES: Lifetimes = {
  [Roles.Root]: 365 * DAY,
  [Roles.Targets]: 90 * DAY,
  [Roles.Snapshot]: 7 * DAY,
  [Roles.Timestamp]: DAY,
};

export type Expirations = Partial<Record<Roles, Date>>;

const masterStateSchema = z.object({
  root: rootMetafileSchema.optional(),
  targets: targetsMetafileSchema.optional(),
  snapshot: snapshotMetafileSchema.optional(),
  timestamp: timestampMetafileSchema.optional(),
  // Root versions signed but not yet uploaded, oldest first.
  pendingRoots: z.array(rootMetafileSchema).default([]),
});

type MasterState = z.infer<typeof masterStateSchema>;

export interface MetadataBuilderOptions {
  lifetimes?: Partial<Lifetimes>;
  now?: () => Date;
  logger?: Logger;
}

export interface CreateMetadataOptions {
  /** Root signatures required by consumers; defaults to 1. */
  rootThreshold?: number;
}

export interface RotateRootOptions {
  /** Root keys to sign the new version with; defaults to all of them. */
  rootKeyIds?: string[];
  /** Defaults to the threshold of the current root. */
  rootThreshold?: number;
}

/** The exact bytes stored in the registry for a metadata document. */
export function encodeMetafile(metafile: Metafile): Uint8Array {
  return stringToUint8Array(canonicalize(metafile));
}

export async function metaEntryOf(metafile: Metafile): Promise<MetaEntry> {
  const bytes = encodeMetafile(metafile);
  return {
    version: metafile.signed.version,
    length: bytes.byteLength,
    hashes: { sha256: await sha256Hex(bytes) },
  };
}

/**
 * Signs and publishes the master's metadata chain. Targets, snapshot and
 * timestamp are always re-signed together in that order, since each pins the
 * exact bytes of the one before it.
 */
export class MetadataBuilder {
  private readonly lifetimes: Lifetimes;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly backend: FileBackend,
    private readonly registry: Registry,
    private readonly keys: KeyManager,
    private readonly targets: MasterTargetStore,
    options: MetadataBuilderOptions = {},
  ) {
    this.lifetimes = { ...DEFAULT_LIFETIMES, ...options.lifetimes };
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  private async load(): Promise<MasterState> {
    return masterStateSchema.parse((await this.backend.read(STATE_KEY)) ?? {});
  }

  private async save(state: MasterState): Promise<void> {
    await this.backend.write(STATE_KEY, state);
  }

  private expires(role: Roles): string {
    const at = new Date(this.now().getTime() + this.lifetimes[role] * 1000);
    return at.toISOString().replace(/\.\d{3}Z$/, "Z");
  }

  private async sign<T extends Signed>(
    signed: T,
    role: Roles,
    passwords: KeyPasswords,
    keyids?: string[],
  ): Promise<Metafile<T>> {
    const signers = await this.keys.signers(role, passwords[role], keyids);
    return { signed, signatures: await signMetadata(signed, signers) };
  }

  private async buildRoot(version: number, threshold: number): Promise<RootSigned> {
    const keys: Record<string, Key> = {};

    const role = async (name: Roles, roleThreshold: number): Promise<Role> => {
      const roleKeys = await this.keys.publicKeys(name);
      for (const { keyid, key } of roleKeys) {
        keys[keyid] = key;
      }
      return { keyids: roleKeys.map((k) => k.keyid), threshold: roleThreshold };
    };

    const roles = {
      [Roles.Root]: await role(Roles.Root, threshold),
      [Roles.Targets]: await role(Roles.Targets, 1),
      [Roles.Snapshot]: await role(Roles.Snapshot, 1),
      [Roles.Timestamp]: await role(Roles.Timestamp, 1),
    };
    if (roles[Roles.Root].keyids.length < threshold) {
      throw new InvalidArgumentError(
        `Root threshold ${threshold} exceeds the ${roles[Roles.Root].keyids.length} root key(s)`,
      );
    }

    return {
      _type: Roles.Root,
      spec_version: SPEC_VERSION,
      version,
      expires: this.expires(Roles.Root),
      consistent_snapshot: false,
      keys,
      roles,
    };
  }

  private async signRoot(
    signed: RootSigned,
    passwords: KeyPasswords,
    keyids?: string[],
  ): Promise<RootMetafile> {
    const root = await this.sign(signed, Roles.Root, passwords, keyids);
    const { threshold } = signed.roles[Roles.Root];
    if (root.signatures.length < threshold) {
      this.logger.warn(
        `Root version ${signed.version} carries ${root.signatures.length} of ${threshold} required signatures`,
      );
    }
    return root;
  }

  private async buildChain(
    version: { targets: number; snapshot: number; timestamp: number },
    passwords: KeyPasswords,
  ): Promise<[TargetsMetafile, SnapshotMetafile, TimestampMetafile]> {
    const targets = await this.sign(
      {
        _type: Roles.Targets,
        spec_version: SPEC_VERSION,
        version: version.targets,
        expires: this.expires(Roles.Targets),
        targets: await this.targets.pending(),
      },
      Roles.Targets,
      passwords,
    );

    const snapshot = await this.sign(
      {
        _type: Roles.Snapshot,
        spec_version: SPEC_VERSION,
        version: version.snapshot,
        expires: this.expires(Roles.Snapshot),
        meta: { [TARGETS_FILE]: await metaEntryOf(targets) },
      },
      Roles.Snapshot,
      passwords,
    );

    const timestamp = await this.sign(
      {
        _type: Roles.Timestamp,
        spec_version: SPEC_VERSION,
        version: version.timestamp,
        expires: this.expires(Roles.Timestamp),
        meta: { [SNAPSHOT_FILE]: await metaEntryOf(snapshot) },
      },
      Roles.Timestamp,
      passwords,
    );

    return [targets, snapshot, timestamp];
  }

  private async upload(name: string, metafile: Metafile): Promise<void> {
    await this.registry.putMetadata(name, encodeMetafile(metafile));
    this.logger.info(`Pushed ${name} version ${metafile.signed.version}`);
  }

  private async uploadRoots(roots: RootMetafile[]): Promise<void> {
    for (const root of roots) {
      await this.upload(metadataName(Roles.Root, root.signed.version), root);
    }
    const latest = roots.at(-1);
    if (latest) {
      await this.upload(metadataName(Roles.Root), latest);
    }
  }

  // Rejects signing with role keys the current root does not list, which
  // happens after a key rotation whose root version was never signed.
  private async assertAuthorized(root: RootSigned): Promise<void> {
    for (const role of METADATA_ROLES) {
      const listed = root.roles[role].keyids;
      const held = await this.keys.publicKeys(role);
      if (!held.every(({ keyid }) => listed.includes(keyid))) {
        throw new InvalidArgumentError(
          `The ${role} key is not listed in root version ${root.version}; rotate the root first`,
        );
      }
    }
  }

  /**
   * Signs version 1 of every role and publishes it. The pending target set,
   * usually empty at this point, becomes the first targets document.
   */
  async createMetadata(
    passwords: KeyPasswords = {},
    options: CreateMetadataOptions = {},
  ): Promise<void> {
    await this.keys.requireAll();
    const state = await this.load();
    if (state.root) {
      throw new InvalidArgumentError(
        "Metadata already exists for this repository; use pushMetadata",
      );
    }

    const root = await this.signRoot(
      await this.buildRoot(1, options.rootThreshold ?? 1),
      passwords,
    );
    const [targets, snapshot, timestamp] = await this.buildChain(
      { targets: 1, snapshot: 1, timestamp: 1 },
      passwords,
    );

    await this.uploadRoots([root]);
    await this.upload(metadataName(Roles.Targets), targets);
    await this.upload(metadataName(Roles.Snapshot), snapshot);
    await this.upload(metadataName(Roles.Timestamp), timestamp);

    await this.save({ root, targets, snapshot, timestamp, pendingRoots: [] });
  }

  /**
   * Signs the next root version over the current key set and queues it for
   * the next `pushMetadata`.
   */
  async rotateRoot(
    passwords: KeyPasswords = {},
    options: RotateRootOptions = {},
  ): Promise<RootMetafile> {
    const state = await this.load();
    if (!state.root) {
      throw new InvalidArgumentError("No metadata has been created for this repository");
    }

    const previous = state.root.signed;
    const root = await this.signRoot(
      await this.buildRoot(
        previous.version + 1,
        options.rootThreshold ?? previous.roles[Roles.Root].threshold,
      ),
      passwords,
      options.rootKeyIds,
    );

    state.root = root;
    state.pendingRoots.push(root);
    await this.save(state);
    return root;
  }

  /**
   * Re-signs targets, snapshot and timestamp at their next versions, then
   * publishes pending root versions followed by the three documents.
   */
  async pushMetadata(passwords: KeyPasswords = {}): Promise<void> {
    await this.keys.requireAll();
    const state = await this.load();
    if (!state.root || !state.targets || !state.snapshot || !state.timestamp) {
      throw new InvalidArgumentError("No metadata has been created for this repository");
    }
    await this.assertAuthorized(state.root.signed);

    const [targets, snapshot, timestamp] = await this.buildChain(
      {
        targets: state.targets.signed.version + 1,
        snapshot: state.snapshot.signed.version + 1,
        timestamp: state.timestamp.signed.version + 1,
      },
      passwords,
    );

    await this.uploadRoots(state.pendingRoots);
    await this.upload(metadataName(Roles.Targets), targets);
    await this.upload(metadataName(Roles.Snapshot), snapshot);
    await this.upload(metadataName(Roles.Timestamp), timestamp);

    await this.save({
      root: state.root,
      targets,
      snapshot,
      timestamp,
      pendingRoots: [],
    });
  }

  async getExpirations(): Promise<Expirations> {
    const state = await this.load();
    const expirations: Expirations = {};
    for (const metafile of [state.root, state.targets, state.snapshot, state.timestamp]) {
      if (metafile) {
        expirations[metafile.signed._type] = new Date(metafile.signed.expires);
      }
    }
    return expirations;
  }

  async currentRoot(): Promise<RootMetafile | undefined> {
    return (await this.load()).root;
  }
}
