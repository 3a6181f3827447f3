import * as path from "node:path";

import { InvalidArgumentError } from "./errors.js";
import { KeyManager, type KeyPasswords } from "./keys.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  type CreateMetadataOptions,
  type Expirations,
  type Lifetimes,
  MetadataBuilder,
} from "./metadata.js";
import type { Registry } from "./registry/registry.js";
import type { FileBackend } from "./storage.js";
import { FSBackend } from "./storage/filesystem.js";
import {
  type CheckTargetResult,
  CopyTargetStore,
  MasterTargetStore,
  type PulledBlob,
  type TargetSource,
} from "./targets.js";
import { type ProgressCallback, Roles, type TargetEntry } from "./types.js";
import { type PullResult, TrustVerifier } from "./verifier.js";

/**
 * Everything one repository instance works against. Passed explicitly; no
 * state is shared between repositories.
 */
export interface RepositoryContext {
  /** Repository name in the registry. */
  name: string;
  backend: FileBackend;
  registry: Registry;
  logger?: Logger;
  now?: () => Date;
}

export interface MasterContext extends RepositoryContext {
  lifetimes?: Partial<Lifetimes>;
  /** PBKDF2 iterations for newly encrypted private keys. */
  kdfIterations?: number;
}

export interface RotateOptions {
  /** Root keys that sign the new root version; defaults to all. */
  rootKeyIds?: string[];
}

async function withLock<T>(backend: FileBackend, fn: () => Promise<T>): Promise<T> {
  const release = await backend.lock();
  try {
    return await fn();
  } finally {
    await release();
  }
}

/** Publisher side: holds the private keys and writes to the registry. */
export class MasterRepository {
  readonly keys: KeyManager;
  readonly targets: MasterTargetStore;
  readonly metadata: MetadataBuilder;

  private readonly backend: FileBackend;
  private readonly logger: Logger;

  constructor(context: MasterContext) {
    this.backend = context.backend;
    this.logger = context.logger ?? silentLogger;
    this.keys = new KeyManager(context.backend, {
      kdfIterations: context.kdfIterations,
      logger: this.logger,
    });
    this.targets = new MasterTargetStore(context.backend, context.registry, this.logger);
    this.metadata = new MetadataBuilder(
      context.backend,
      context.registry,
      this.keys,
      this.targets,
      { lifetimes: context.lifetimes, now: context.now, logger: this.logger },
    );
  }

  createRootKey(password?: string): Promise<string> {
    return withLock(this.backend, () => this.keys.createRootKey(password));
  }

  addRootKey(password?: string): Promise<string> {
    return withLock(this.backend, () => this.keys.addRootKey(password));
  }

  /** PEM public keys of the root role, for consumers to pin. */
  async rootPublicKeys(): Promise<string[]> {
    return (await this.keys.publicKeys(Roles.Root)).map(({ key }) => key.keyval.public);
  }

  createMetadataKeys(
    targetsPassword?: string,
    snapshotPassword?: string,
    timestampPassword?: string,
  ): Promise<void> {
    return withLock(this.backend, () =>
      this.keys.createMetadataKeys(targetsPassword, snapshotPassword, timestampPassword),
    );
  }

  createMetadata(
    passwords: KeyPasswords = {},
    options: CreateMetadataOptions = {},
  ): Promise<void> {
    return withLock(this.backend, () => this.metadata.createMetadata(passwords, options));
  }

  /**
   * Regenerates every key and, once metadata exists, publishes a root version
   * signed only by the new root keys. Consumers must pin a new root key.
   */
  resetKeys(passwords: KeyPasswords = {}): Promise<void> {
    return withLock(this.backend, async () => {
      await this.keys.resetKeys(passwords);
      if ((await this.metadata.currentRoot()) === undefined) {
        return;
      }
      await this.metadata.rotateRoot(passwords);
      await this.metadata.pushMetadata(passwords);
      this.logger.warn("All keys were reset; consumers must pin the new root key");
    });
  }

  /** Replaces one metadata role's key and publishes the root that lists it. */
  rotateRoleKey(
    role: Roles,
    passwords: KeyPasswords = {},
    options: RotateOptions = {},
  ): Promise<string> {
    return withLock(this.backend, async () => {
      if ((await this.metadata.currentRoot()) === undefined) {
        throw new InvalidArgumentError("No metadata has been created for this repository");
      }
      // rotateKey discards the old key; the new root must be signable before that
      await this.keys.signers(Roles.Root, passwords[Roles.Root], options.rootKeyIds);
      const keyid = await this.keys.rotateKey(role, passwords[role]);
      await this.metadata.rotateRoot(passwords, { rootKeyIds: options.rootKeyIds });
      await this.metadata.pushMetadata(passwords);
      return keyid;
    });
  }

  pushTarget(
    name: string,
    sources: TargetSource[],
    progress?: ProgressCallback,
  ): Promise<TargetEntry> {
    return withLock(this.backend, () => this.targets.pushTarget(name, sources, progress));
  }

  delTarget(...names: string[]): Promise<void> {
    return withLock(this.backend, () => this.targets.delTarget(...names));
  }

  pushMetadata(passwords: KeyPasswords = {}): Promise<void> {
    return withLock(this.backend, () => this.metadata.pushMetadata(passwords));
  }

  listTargets(): Promise<string[]> {
    return this.targets.listTargets();
  }

  getExpirations(): Promise<Expirations> {
    return this.metadata.getExpirations();
  }
}

/** Consumer side: holds only what it has verified. */
export class CopyRepository {
  readonly verifier: TrustVerifier;
  readonly targets: CopyTargetStore;

  private readonly backend: FileBackend;

  constructor(context: RepositoryContext) {
    this.backend = context.backend;
    this.verifier = new TrustVerifier(context.backend, context.registry, {
      now: context.now,
      logger: context.logger,
    });
    this.targets = new CopyTargetStore(context.registry, () =>
      this.verifier.trustedTargets(),
    );
  }

  pullMetadata(rootPublicKey?: string): Promise<PullResult> {
    return withLock(this.backend, () => this.verifier.pull(rootPublicKey));
  }

  pullTarget(name: string, progress?: ProgressCallback): Promise<PulledBlob[]> {
    return this.targets.pullTarget(name, progress);
  }

  blobSizes(name: string): Promise<number[]> {
    return this.targets.blobSizes(name);
  }

  checkTarget(name: string, files: string[]): Promise<CheckTargetResult> {
    return this.targets.checkTarget(name, files);
  }

  listTargets(): Promise<string[]> {
    return this.targets.listTargets();
  }

  getExpirations(): Promise<Expirations> {
    return this.verifier.getExpirations();
  }
}

/** Local state directories of a repository under `root`. */
export function repositoryDirs(root: string, name: string): { master: string; copy: string } {
  const dir = path.join(root, name);
  return { master: path.join(dir, "master"), copy: path.join(dir, "copy") };
}

export function openMaster(
  root: string,
  context: Omit<MasterContext, "backend">,
): MasterRepository {
  return new MasterRepository({
    ...context,
    backend: new FSBackend(repositoryDirs(root, context.name).master),
  });
}

export function openCopy(
  root: string,
  context: Omit<RepositoryContext, "backend">,
): CopyRepository {
  return new CopyRepository({
    ...context,
    backend: new FSBackend(repositoryDirs(root, context.name).copy),
  });
}
