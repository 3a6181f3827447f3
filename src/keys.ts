import { z } from "zod";

import {
  computeKeyId,
  decryptPrivateKey,
  encryptPrivateKey,
  generateKeyPair,
  importSigningKey,
  type Signer,
} from "./crypto.js";
import { base64ToUint8Array, Uint8ArrayToBase64 } from "./encoding.js";
import {
  InvalidArgumentError,
  KeyExistsError,
  KeyPasswordError,
  MissingMetadataKeysError,
  MissingRootKeyError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FileBackend } from "./storage.js";
import { type Key, keySchema, METADATA_ROLES, Roles } from "./types.js";

const KEYSTORE_KEY = "keys";

export type KeyPasswords = Partial<Record<Roles, string>>;

const privateKeySchema = z.discriminatedUnion("encrypted", [
  z.object({
    encrypted: z.literal(false),
    pkcs8: z.string(),
  }),
  z.object({
    encrypted: z.literal(true),
    salt: z.string(),
    iv: z.string(),
    iterations: z.number().int().positive(),
    ciphertext: z.string(),
  }),
]);

const storedKeySchema = z.object({
  keyid: z.string(),
  public: keySchema,
  private: privateKeySchema,
});

const keyStoreSchema = z.object({
  [Roles.Root]: z.array(storedKeySchema).default([]),
  [Roles.Targets]: z.array(storedKeySchema).default([]),
  [Roles.Snapshot]: z.array(storedKeySchema).default([]),
  [Roles.Timestamp]: z.array(storedKeySchema).default([]),
});

type StoredKey = z.infer<typeof storedKeySchema>;
type KeyStore = z.infer<typeof keyStoreSchema>;

export interface PublicRoleKey {
  keyid: string;
  key: Key;
}

export interface KeyManagerOptions {
  /** PBKDF2 iterations for newly encrypted keys. */
  kdfIterations?: number;
  logger?: Logger;
}

/**
 * Generates, stores and unlocks the role keys of a master repository. Key
 * material only ever goes to the master's private backend.
 */
export class KeyManager {
  private readonly logger: Logger;

  constructor(
    private readonly backend: FileBackend,
    private readonly options: KeyManagerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  private async load(): Promise<KeyStore> {
    return keyStoreSchema.parse((await this.backend.read(KEYSTORE_KEY)) ?? {});
  }

  private async save(store: KeyStore): Promise<void> {
    await this.backend.write(KEYSTORE_KEY, store);
  }

  private async generate(role: Roles, password?: string): Promise<StoredKey> {
    const pair = await generateKeyPair();
    const keyid = await computeKeyId(pair.publicKey);

    let stored: StoredKey["private"];
    if (password) {
      stored = {
        encrypted: true,
        ...(await encryptPrivateKey(
          pair.privateKey,
          password,
          this.options.kdfIterations,
        )),
      };
    } else {
      this.logger.warn(`Storing ${role} private key ${keyid.slice(0, 8)} unencrypted`);
      stored = { encrypted: false, pkcs8: Uint8ArrayToBase64(pair.privateKey) };
    }

    this.logger.info(`Generated ${role} key ${keyid}`);
    return { keyid, public: pair.publicKey, private: stored };
  }

  async hasKeys(role: Roles): Promise<boolean> {
    return (await this.load())[role].length > 0;
  }

  async createRootKey(password?: string): Promise<string> {
    const store = await this.load();
    if (store[Roles.Root].length > 0) {
      throw new KeyExistsError(Roles.Root);
    }
    const key = await this.generate(Roles.Root, password);
    store[Roles.Root].push(key);
    await this.save(store);
    return key.keyid;
  }

  /** Adds another root key, for root metadata signed with a threshold. */
  async addRootKey(password?: string): Promise<string> {
    const store = await this.load();
    if (store[Roles.Root].length === 0) {
      throw new MissingRootKeyError();
    }
    const key = await this.generate(Roles.Root, password);
    store[Roles.Root].push(key);
    await this.save(store);
    return key.keyid;
  }

  async createMetadataKeys(
    targetsPassword?: string,
    snapshotPassword?: string,
    timestampPassword?: string,
  ): Promise<void> {
    const store = await this.load();
    if (store[Roles.Root].length === 0) {
      throw new MissingRootKeyError();
    }

    const passwords: KeyPasswords = {
      [Roles.Targets]: targetsPassword,
      [Roles.Snapshot]: snapshotPassword,
      [Roles.Timestamp]: timestampPassword,
    };
    for (const role of METADATA_ROLES) {
      if (store[role].length > 0) {
        throw new KeyExistsError(role);
      }
    }
    for (const role of METADATA_ROLES) {
      store[role] = [await this.generate(role, passwords[role])];
    }
    await this.save(store);
  }

  /**
   * Replaces every key of every role, keeping the number of root keys. Trust
   * issued under the old keys cannot be carried over: consumers must pin the
   * new root key.
   */
  async resetKeys(passwords: KeyPasswords = {}): Promise<void> {
    const store = await this.load();
    if (store[Roles.Root].length === 0) {
      throw new MissingRootKeyError();
    }

    const next: KeyStore = {
      [Roles.Root]: [],
      [Roles.Targets]: [],
      [Roles.Snapshot]: [],
      [Roles.Timestamp]: [],
    };
    for (let i = 0; i < store[Roles.Root].length; i++) {
      next[Roles.Root].push(await this.generate(Roles.Root, passwords[Roles.Root]));
    }
    for (const role of METADATA_ROLES) {
      next[role] = [await this.generate(role, passwords[role])];
    }
    await this.save(next);
  }

  /** Replaces the key of one metadata role; root keys are left alone. */
  async rotateKey(role: Roles, password?: string): Promise<string> {
    if (role === Roles.Root) {
      throw new InvalidArgumentError("Root keys are rotated with resetKeys");
    }
    const store = await this.load();
    if (store[role].length === 0) {
      throw new MissingMetadataKeysError([role]);
    }
    const key = await this.generate(role, password);
    store[role] = [key];
    await this.save(store);
    return key.keyid;
  }

  async requireAll(): Promise<void> {
    const store = await this.load();
    if (store[Roles.Root].length === 0) {
      throw new MissingRootKeyError();
    }
    const missing = METADATA_ROLES.filter((role) => store[role].length === 0);
    if (missing.length > 0) {
      throw new MissingMetadataKeysError(missing);
    }
  }

  async publicKeys(role: Roles): Promise<PublicRoleKey[]> {
    return (await this.load())[role].map((stored) => ({
      keyid: stored.keyid,
      key: stored.public,
    }));
  }

  /**
   * Unlocks the private keys of a role, optionally only those in `keyids`.
   * Encrypted keys need the role's password.
   */
  async signers(
    role: Roles,
    password?: string,
    keyids?: string[],
  ): Promise<Signer[]> {
    const store = await this.load();
    const selected = store[role].filter(
      (stored) => keyids === undefined || keyids.includes(stored.keyid),
    );
    if (selected.length === 0) {
      if (role === Roles.Root) {
        throw new MissingRootKeyError();
      }
      throw new MissingMetadataKeysError([role]);
    }

    const signers: Signer[] = [];
    for (const stored of selected) {
      signers.push({
        keyid: stored.keyid,
        key: await importSigningKey(await this.unlock(role, stored, password)),
      });
    }
    return signers;
  }

  private async unlock(
    role: Roles,
    stored: StoredKey,
    password?: string,
  ): Promise<Uint8Array> {
    const secret = stored.private;
    if (!secret.encrypted) {
      return base64ToUint8Array(secret.pkcs8);
    }
    if (!password) {
      throw new KeyPasswordError(role, "a password is required");
    }
    try {
      return await decryptPrivateKey(secret, password);
    } catch {
      throw new KeyPasswordError(role, "wrong password");
    }
  }
}
