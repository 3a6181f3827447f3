import { z } from "zod";

import {
  computeKeyId,
  countSignatures,
  DEFAULT_KEYTYPE,
  DEFAULT_SCHEME,
  fromPEM,
  loadKeys,
  sha256Hex,
  toPEM,
} from "./crypto.js";
import { canonicalize } from "./canonicalize.js";
import { Uint8ArrayToString } from "./encoding.js";
import {
  InvalidArgumentError,
  MissingMetadataError,
  TrustChainError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Expirations } from "./metadata.js";
import type { Registry } from "./registry/registry.js";
import type { FileBackend } from "./storage.js";
import type { TargetMap } from "./targets.js";
import {
  type Key,
  type MetaEntry,
  type Metafile,
  metadataName,
  Roles,
  rootMetafileSchema,
  type RootMetafile,
  type RootSigned,
  SNAPSHOT_FILE,
  snapshotMetafileSchema,
  type SnapshotMetafile,
  TARGETS_FILE,
  targetsMetafileSchema,
  type TargetsMetafile,
  timestampMetafileSchema,
  type TimestampMetafile,
} from "./types.js";

const TRUSTED_KEY = "trusted";

const trustedSchema = z.object({
  root: rootMetafileSchema,
  timestamp: timestampMetafileSchema.optional(),
  snapshot: snapshotMetafileSchema.optional(),
  targets: targetsMetafileSchema.optional(),
});

/** The last verified metadata of a copy repository. */
export type TrustedMetadata = z.infer<typeof trustedSchema>;

export interface PullResult {
  /** Names of the now-trusted targets, sorted. */
  targets: string[];
  added: string[];
  changed: string[];
  removed: string[];
  /** Whether any trusted document changed. */
  updated: boolean;
}

// Everything verified so far in one run. Nothing here is persisted until
// Commit.
interface Chain {
  now: Date;
  previous?: TrustedMetadata;
  // Baseline for rollback checks; roles whose keys rotated are dropped.
  baseline: Partial<Omit<TrustedMetadata, "root">>;
  root: RootMetafile;
  keys: Map<string, CryptoKey>;
  timestamp?: TimestampMetafile;
  snapshot?: SnapshotMetafile;
  targets?: TargetsMetafile;
}

type WithTimestamp = Chain & { timestamp: TimestampMetafile };
type WithSnapshot = WithTimestamp & { snapshot: SnapshotMetafile };
type Verified = WithSnapshot & { targets: TargetsMetafile };

export type VerifierState =
  | { kind: "BootstrapRoot"; now: Date; pinnedKey?: Key }
  | { kind: "FetchTimestamp"; chain: Chain }
  | { kind: "FetchSnapshot"; chain: WithTimestamp }
  | { kind: "FetchTargets"; chain: WithSnapshot }
  | { kind: "ReconcileTargets"; chain: Verified }
  | { kind: "Commit"; chain: Verified; result: PullResult }
  | { kind: "Trusted"; result: PullResult }
  | { kind: "Rejected"; error: unknown };

type Terminal = Extract<VerifierState, { kind: "Trusted" | "Rejected" }>;

function isTerminal(state: VerifierState): state is Terminal {
  return state.kind === "Trusted" || state.kind === "Rejected";
}

// Roles in fetch order: a rotated role invalidates itself and the roles
// fetched after it.
const FETCH_ORDER = [Roles.Timestamp, Roles.Snapshot, Roles.Targets] as const;

/**
 * Builds the Key object for a root public key given as PEM, normalizing the
 * armor so that its key id matches the one the master computed.
 */
export function rootKeyFromPEM(pem: string): Key {
  return {
    keytype: DEFAULT_KEYTYPE,
    scheme: DEFAULT_SCHEME,
    keyval: { public: toPEM(fromPEM(pem), "PUBLIC KEY") },
  };
}

function sameRole(a: RootSigned, b: RootSigned, role: Roles): boolean {
  const left = a.roles[role];
  const right = b.roles[role];
  return (
    left.threshold === right.threshold &&
    [...left.keyids].sort().join() === [...right.keyids].sort().join()
  );
}

function sameMeta(a: MetaEntry, b: MetaEntry): boolean {
  return (
    a.version === b.version &&
    a.length === b.length &&
    a.hashes.sha256 === b.hashes.sha256
  );
}

function pinOf(role: Roles, meta: Record<string, MetaEntry>, file: string): MetaEntry {
  const pin = meta[file];
  if (pin === undefined) {
    throw new TrustChainError(role, "malformed", `meta does not list ${file}`);
  }
  return pin;
}

export interface TrustVerifierOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Consumer side of the repository: fetches the signed chain from the registry,
 * verifies it against the last trusted state and commits the result as one
 * write.
 */
export class TrustVerifier {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly backend: FileBackend,
    private readonly registry: Registry,
    options: TrustVerifierOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async trusted(): Promise<TrustedMetadata | undefined> {
    const stored = await this.backend.read(TRUSTED_KEY);
    return stored === undefined ? undefined : trustedSchema.parse(stored);
  }

  async trustedTargets(): Promise<TargetMap> {
    return (await this.trusted())?.targets?.signed.targets ?? {};
  }

  async getExpirations(): Promise<Expirations> {
    const trusted = await this.trusted();
    const expirations: Expirations = {};
    if (trusted === undefined) {
      return expirations;
    }
    for (const metafile of [trusted.root, trusted.timestamp, trusted.snapshot, trusted.targets]) {
      if (metafile) {
        expirations[metafile.signed._type] = new Date(metafile.signed.expires);
      }
    }
    return expirations;
  }

  /**
   * Runs one verification of the registry's metadata. `rootPublicKey` (PEM)
   * is required the first time; later it only matters when it names a key the
   * trusted root no longer lists, which starts trust afresh from it.
   */
  async pull(rootPublicKey?: string): Promise<PullResult> {
    let state: VerifierState = {
      kind: "BootstrapRoot",
      now: this.now(),
      pinnedKey: rootPublicKey === undefined ? undefined : rootKeyFromPEM(rootPublicKey),
    };

    while (!isTerminal(state)) {
      this.logger.debug(`Verifier state ${state.kind}`);
      try {
        state = await this.step(state);
      } catch (error) {
        state = { kind: "Rejected", error };
      }
    }

    if (state.kind === "Rejected") {
      throw state.error;
    }
    return state.result;
  }

  private async step(state: Exclude<VerifierState, Terminal>): Promise<VerifierState> {
    switch (state.kind) {
      case "BootstrapRoot":
        return { kind: "FetchTimestamp", chain: await this.bootstrapRoot(state.now, state.pinnedKey) };
      case "FetchTimestamp":
        return { kind: "FetchSnapshot", chain: await this.fetchTimestamp(state.chain) };
      case "FetchSnapshot":
        return { kind: "FetchTargets", chain: await this.fetchSnapshot(state.chain) };
      case "FetchTargets":
        return { kind: "ReconcileTargets", chain: await this.fetchTargets(state.chain) };
      case "ReconcileTargets":
        return { kind: "Commit", chain: state.chain, result: this.reconcile(state.chain) };
      case "Commit":
        await this.commit(state.chain);
        return { kind: "Trusted", result: state.result };
    }
  }

  private async fetchDocument<T>(
    role: Roles,
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<{ metafile: T; bytes: Uint8Array }> {
    const bytes = await this.registry.getMetadata(name);
    if (bytes === undefined) {
      throw new MissingMetadataError(name);
    }
    return { metafile: this.parseDocument(role, name, bytes, schema), bytes };
  }

  private parseDocument<T>(
    role: Roles,
    name: string,
    bytes: Uint8Array,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T {
    let json: unknown;
    try {
      json = JSON.parse(Uint8ArrayToString(bytes));
    } catch (error) {
      throw new TrustChainError(
        role,
        "malformed",
        `${name} is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TrustChainError(
        role,
        "malformed",
        `${name}: ${issue.path.join(".")} ${issue.message}`,
      );
    }
    return parsed.data;
  }

  private validateMetadata(role: Roles, metadata: Metafile): void {
    const seenKeyIds = new Set<string>();
    for (const sig of metadata.signatures) {
      if (seenKeyIds.has(sig.keyid)) {
        throw new TrustChainError(role, "malformed", `duplicate signature for keyid ${sig.keyid}`);
      }
      seenKeyIds.add(sig.keyid);
    }

    const specVersion = metadata.signed.spec_version;
    const parts = specVersion.split(".");
    if (parts.length < 2 || parts.length > 3 || !parts.every((p) => /^\d+$/.test(p))) {
      throw new TrustChainError(role, "malformed", `invalid spec_version ${specVersion}`);
    }
    if (parts[0] !== "1") {
      throw new TrustChainError(role, "malformed", `unsupported spec_version ${specVersion}`);
    }
  }

  private async loadRootKeys(root: RootSigned): Promise<Map<string, CryptoKey>> {
    try {
      return await loadKeys(root.keys);
    } catch (error) {
      throw new TrustChainError(
        Roles.Root,
        "malformed",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  // `metadata` needs a threshold of valid signatures from the keys `root`
  // authorizes for `role`. A new root is checked this way against the old one.
  private async checkThreshold(
    role: Roles,
    metadata: Metafile,
    root: RootSigned,
    keys: Map<string, CryptoKey>,
  ): Promise<void> {
    const { keyids, threshold } = root.roles[role];
    const { valid, invalid } = await countSignatures(
      keys,
      keyids,
      metadata.signed,
      metadata.signatures,
    );
    if (valid < threshold) {
      throw new TrustChainError(
        metadata.signed._type,
        invalid > 0 ? "bad-signature" : "threshold",
        `${valid} of ${threshold} required signatures from root version ${root.version} are valid`,
      );
    }
  }

  private checkExpiry(metadata: Metafile, now: Date): void {
    if (new Date(metadata.signed.expires) <= now) {
      throw new TrustChainError(
        metadata.signed._type,
        "expired",
        `version ${metadata.signed.version} expired at ${metadata.signed.expires}`,
      );
    }
  }

  private async checkPinned(bytes: Uint8Array, pin: MetaEntry, role: Roles): Promise<void> {
    if (bytes.byteLength !== pin.length) {
      throw new TrustChainError(
        role,
        "inconsistent",
        `length ${bytes.byteLength} does not match the pinned ${pin.length}`,
      );
    }
    if ((await sha256Hex(bytes)) !== pin.hashes.sha256) {
      throw new TrustChainError(role, "inconsistent", "hash does not match the pinned hash");
    }
  }

  // Trust from nothing but a root public key: root.json must list it, be
  // signed by it and meet its own threshold.
  private async bootstrapFromKey(pinnedKey: Key): Promise<RootMetafile> {
    const name = metadataName(Roles.Root);
    const { metafile: root } = await this.fetchDocument(Roles.Root, name, rootMetafileSchema);
    this.validateMetadata(Roles.Root, root);

    const pinnedId = await computeKeyId(pinnedKey);
    if (!root.signed.roles[Roles.Root].keyids.includes(pinnedId)) {
      throw new TrustChainError(
        Roles.Root,
        "bad-signature",
        `the pinned key ${pinnedId} is not a root key of version ${root.signed.version}`,
      );
    }

    const pinnedKeys = await loadKeys({ [pinnedId]: pinnedKey });
    const { valid } = await countSignatures(
      pinnedKeys,
      [pinnedId],
      root.signed,
      root.signatures,
    );
    if (valid === 0) {
      throw new TrustChainError(
        Roles.Root,
        "bad-signature",
        `version ${root.signed.version} is not signed by the pinned key`,
      );
    }

    await this.checkThreshold(Roles.Root, root, root.signed, await this.loadRootKeys(root.signed));
    this.logger.info(`Trusting root version ${root.signed.version} from key ${pinnedId}`);
    return root;
  }

  // Walks <v>.root.json upward from the trusted root. Each version must be
  // signed by a threshold of the previous root's keys and by its own.
  private async walkRoots(trusted: RootMetafile): Promise<RootMetafile> {
    let root = trusted;
    let keys = await this.loadRootKeys(root.signed);

    for (let version = root.signed.version + 1; version < Number.MAX_SAFE_INTEGER; version++) {
      const name = metadataName(Roles.Root, version);
      const bytes = await this.registry.getMetadata(name);
      if (bytes === undefined) {
        break;
      }

      const next = this.parseDocument(Roles.Root, name, bytes, rootMetafileSchema);
      this.validateMetadata(Roles.Root, next);
      if (next.signed.version !== version) {
        throw new TrustChainError(
          Roles.Root,
          "inconsistent",
          `${name} carries version ${next.signed.version}`,
        );
      }

      await this.checkThreshold(Roles.Root, next, root.signed, keys);
      const nextKeys = await this.loadRootKeys(next.signed);
      await this.checkThreshold(Roles.Root, next, next.signed, nextKeys);

      this.logger.info(`Root rotated to version ${version}`);
      root = next;
      keys = nextKeys;
    }
    return root;
  }

  private async bootstrapRoot(now: Date, pinnedKey?: Key): Promise<Chain> {
    let previous = await this.trusted();

    let root: RootMetafile;
    if (previous === undefined) {
      if (pinnedKey === undefined) {
        throw new InvalidArgumentError(
          "No trusted root metadata yet; a root public key is required",
        );
      }
      root = await this.bootstrapFromKey(pinnedKey);
    } else if (
      pinnedKey !== undefined &&
      !previous.root.signed.roles[Roles.Root].keyids.includes(await computeKeyId(pinnedKey))
    ) {
      this.logger.warn("Root public key is not trusted by the stored root; starting trust afresh");
      root = await this.bootstrapFromKey(pinnedKey);
      previous = undefined;
    } else {
      root = await this.walkRoots(previous.root);
    }

    const baseline: Chain["baseline"] = {
      timestamp: previous?.timestamp,
      snapshot: previous?.snapshot,
      targets: previous?.targets,
    };
    const previousRoot = previous?.root.signed;
    if (previousRoot !== undefined) {
      const rotated = FETCH_ORDER.findIndex(
        (role) => !sameRole(previousRoot, root.signed, role),
      );
      if (rotated >= 0) {
        for (const role of FETCH_ORDER.slice(rotated)) {
          this.logger.info(`Keys of ${role} changed; dropping its trusted version`);
          baseline[role] = undefined;
        }
      }
    }

    this.checkExpiry(root, now);
    return {
      now,
      previous,
      baseline,
      root,
      keys: await this.loadRootKeys(root.signed),
    };
  }

  private async fetchTimestamp(chain: Chain): Promise<WithTimestamp> {
    const { metafile: timestamp } = await this.fetchDocument(
      Roles.Timestamp,
      metadataName(Roles.Timestamp),
      timestampMetafileSchema,
    );
    this.validateMetadata(Roles.Timestamp, timestamp);
    await this.checkThreshold(Roles.Timestamp, timestamp, chain.root.signed, chain.keys);

    const pin = pinOf(Roles.Timestamp, timestamp.signed.meta, SNAPSHOT_FILE);
    const trusted = chain.baseline.timestamp;
    if (trusted !== undefined) {
      const trustedPin = pinOf(Roles.Timestamp, trusted.signed.meta, SNAPSHOT_FILE);
      if (timestamp.signed.version < trusted.signed.version) {
        throw new TrustChainError(
          Roles.Timestamp,
          "rollback",
          `version ${timestamp.signed.version} is older than the trusted ${trusted.signed.version}`,
        );
      }
      if (pin.version < trustedPin.version) {
        throw new TrustChainError(
          Roles.Timestamp,
          "rollback",
          `pins snapshot version ${pin.version}, older than the trusted ${trustedPin.version}`,
        );
      }
      if (timestamp.signed.version === trusted.signed.version && !sameMeta(pin, trustedPin)) {
        throw new TrustChainError(
          Roles.Timestamp,
          "inconsistent",
          `version ${timestamp.signed.version} pins a different snapshot than before`,
        );
      }
    }

    this.checkExpiry(timestamp, chain.now);
    return { ...chain, timestamp };
  }

  private async fetchSnapshot(chain: WithTimestamp): Promise<WithSnapshot> {
    const pin = pinOf(Roles.Timestamp, chain.timestamp.signed.meta, SNAPSHOT_FILE);
    const trusted = chain.baseline.snapshot;

    let snapshot: SnapshotMetafile;
    if (trusted !== undefined && trusted.signed.version === pin.version) {
      snapshot = trusted;
    } else {
      const fetched = await this.fetchDocument(
        Roles.Snapshot,
        metadataName(Roles.Snapshot),
        snapshotMetafileSchema,
      );
      snapshot = fetched.metafile;
      await this.checkPinned(fetched.bytes, pin, Roles.Snapshot);
      this.validateMetadata(Roles.Snapshot, snapshot);
      await this.checkThreshold(Roles.Snapshot, snapshot, chain.root.signed, chain.keys);

      if (snapshot.signed.version !== pin.version) {
        throw new TrustChainError(
          Roles.Snapshot,
          "inconsistent",
          `version ${snapshot.signed.version} does not match the pinned ${pin.version}`,
        );
      }
      if (trusted !== undefined) {
        if (snapshot.signed.version < trusted.signed.version) {
          throw new TrustChainError(
            Roles.Snapshot,
            "rollback",
            `version ${snapshot.signed.version} is older than the trusted ${trusted.signed.version}`,
          );
        }
        const trustedPin = pinOf(Roles.Snapshot, trusted.signed.meta, TARGETS_FILE);
        const targetsPin = pinOf(Roles.Snapshot, snapshot.signed.meta, TARGETS_FILE);
        if (targetsPin.version < trustedPin.version) {
          throw new TrustChainError(
            Roles.Snapshot,
            "rollback",
            `pins targets version ${targetsPin.version}, older than the trusted ${trustedPin.version}`,
          );
        }
      }
    }

    pinOf(Roles.Snapshot, snapshot.signed.meta, TARGETS_FILE);
    this.checkExpiry(snapshot, chain.now);
    return { ...chain, snapshot };
  }

  private async fetchTargets(chain: WithSnapshot): Promise<Verified> {
    const pin = pinOf(Roles.Snapshot, chain.snapshot.signed.meta, TARGETS_FILE);
    const trusted = chain.baseline.targets;

    let targets: TargetsMetafile;
    if (trusted !== undefined && trusted.signed.version === pin.version) {
      targets = trusted;
    } else {
      const fetched = await this.fetchDocument(
        Roles.Targets,
        metadataName(Roles.Targets),
        targetsMetafileSchema,
      );
      targets = fetched.metafile;
      await this.checkPinned(fetched.bytes, pin, Roles.Targets);
      this.validateMetadata(Roles.Targets, targets);
      await this.checkThreshold(Roles.Targets, targets, chain.root.signed, chain.keys);

      if (targets.signed.version !== pin.version) {
        throw new TrustChainError(
          Roles.Targets,
          "inconsistent",
          `version ${targets.signed.version} does not match the pinned ${pin.version}`,
        );
      }
      if (trusted !== undefined && targets.signed.version < trusted.signed.version) {
        throw new TrustChainError(
          Roles.Targets,
          "rollback",
          `version ${targets.signed.version} is older than the trusted ${trusted.signed.version}`,
        );
      }
    }

    this.checkExpiry(targets, chain.now);
    return { ...chain, targets };
  }

  private reconcile(chain: Verified): PullResult {
    const before = chain.previous?.targets?.signed.targets ?? {};
    const after = chain.targets.signed.targets;

    const added: string[] = [];
    const changed: string[] = [];
    for (const name of Object.keys(after).sort()) {
      if (!Object.prototype.hasOwnProperty.call(before, name)) {
        added.push(name);
      } else if (canonicalize(before[name]) !== canonicalize(after[name])) {
        changed.push(name);
      }
    }
    const removed = Object.keys(before)
      .filter((name) => !Object.prototype.hasOwnProperty.call(after, name))
      .sort();

    const previous = chain.previous;
    const updated =
      previous === undefined ||
      previous.root.signed.version !== chain.root.signed.version ||
      previous.timestamp?.signed.version !== chain.timestamp.signed.version ||
      previous.snapshot?.signed.version !== chain.snapshot.signed.version ||
      previous.targets?.signed.version !== chain.targets.signed.version;

    return {
      targets: Object.keys(after).sort(),
      added,
      changed,
      removed,
      updated,
    };
  }

  private async commit(chain: Verified): Promise<void> {
    const trusted: TrustedMetadata = {
      root: chain.root,
      timestamp: chain.timestamp,
      snapshot: chain.snapshot,
      targets: chain.targets,
    };
    await this.backend.write(TRUSTED_KEY, trusted);
    this.logger.info(
      `Trusted targets version ${chain.targets.signed.version} (timestamp ${chain.timestamp.signed.version})`,
    );
  }
}
