import { canonicalize } from "./canonicalize.js";
import {
  base64ToUint8Array,
  hexToUint8Array,
  stringToUint8Array,
  toArrayBuffer,
  Uint8ArrayToBase64,
  Uint8ArrayToHex,
} from "./encoding.js";
import type { Key, Signature } from "./types.js";

export enum KeyTypes {
  Ecdsa = "ECDSA",
  Ed25519 = "Ed25519",
}

export enum EcdsaTypes {
  P256 = "P-256",
  P384 = "P-384",
  P521 = "P-521",
}

export enum HashAlgorithms {
  SHA256 = "SHA-256",
  SHA384 = "SHA-384",
  SHA512 = "SHA-512",
}

export const DEFAULT_KEYTYPE = "ecdsa";
export const DEFAULT_SCHEME = "ecdsa-sha2-nistp256";

const PBKDF2_ITERATIONS = 600_000;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;

export interface KeyPair {
  publicKey: Key;
  /** PKCS#8 DER */
  privateKey: Uint8Array;
}

export interface Signer {
  keyid: string;
  key: CryptoKey;
}

export interface EncryptedPrivateKey {
  salt: string;
  iv: string;
  iterations: number;
  ciphertext: string;
}

export function toPEM(der: Uint8Array, label: string): string {
  const body = Uint8ArrayToBase64(der).replace(/(.{64})/g, "$1\n").trimEnd();
  return `-----BEGIN ${label}-----\n${body}\n-----END ${label}-----\n`;
}

export function fromPEM(pem: string): Uint8Array {
  const body = pem
    .replace(/-----(BEGIN|END) [A-Z ]+-----/g, "")
    .replace(/\s+/g, "");
  return base64ToUint8Array(body);
}

export async function sha256Hex(data: Uint8Array): Promise<string> {
  return Uint8ArrayToHex(
    new Uint8Array(
      await crypto.subtle.digest(HashAlgorithms.SHA256, toArrayBuffer(data)),
    ),
  );
}

export async function computeKeyId(key: Key): Promise<string> {
  return sha256Hex(stringToUint8Array(canonicalize(key)));
}

export async function generateKeyPair(): Promise<KeyPair> {
  const keyPair = await crypto.subtle.generateKey(
    { name: KeyTypes.Ecdsa, namedCurve: EcdsaTypes.P256 },
    true,
    ["sign", "verify"],
  );
  const spki = new Uint8Array(
    await crypto.subtle.exportKey("spki", keyPair.publicKey),
  );
  const pkcs8 = new Uint8Array(
    await crypto.subtle.exportKey("pkcs8", keyPair.privateKey),
  );

  return {
    publicKey: {
      keytype: DEFAULT_KEYTYPE,
      scheme: DEFAULT_SCHEME,
      keyval: { public: toPEM(spki, "PUBLIC KEY") },
    },
    privateKey: pkcs8,
  };
}

// Supports ECDSA (256, 384, 521) and Ed25519 public keys in PEM, hex (raw
// point) or bare base64 SPKI encoding.
export async function importKey(
  keytype: string,
  scheme: string,
  key: string,
): Promise<CryptoKey> {
  let format: "raw" | "spki";
  let keyData: ArrayBuffer;
  let algorithm: EcKeyImportParams | Algorithm;

  if (key.includes("BEGIN")) {
    format = "spki";
    keyData = toArrayBuffer(fromPEM(key));
  } else if (/^[0-9A-Fa-f]+$/.test(key)) {
    format = "raw";
    keyData = toArrayBuffer(hexToUint8Array(key));
  } else {
    format = "spki";
    keyData = toArrayBuffer(base64ToUint8Array(key));
  }

  if (keytype.toLowerCase().includes("ecdsa")) {
    if (scheme.includes("256")) {
      algorithm = { name: KeyTypes.Ecdsa, namedCurve: EcdsaTypes.P256 };
    } else if (scheme.includes("384")) {
      algorithm = { name: KeyTypes.Ecdsa, namedCurve: EcdsaTypes.P384 };
    } else if (scheme.includes("521")) {
      algorithm = { name: KeyTypes.Ecdsa, namedCurve: EcdsaTypes.P521 };
    } else {
      throw new Error("Cannot determine ECDSA key size.");
    }
  } else if (keytype.toLowerCase().includes("ed25519")) {
    algorithm = { name: KeyTypes.Ed25519 };
  } else {
    throw new Error(`Unsupported ${keytype}`);
  }

  return await crypto.subtle.importKey(format, keyData, algorithm, true, [
    "verify",
  ]);
}

export async function importSigningKey(pkcs8: Uint8Array): Promise<CryptoKey> {
  return await crypto.subtle.importKey(
    "pkcs8",
    toArrayBuffer(pkcs8),
    { name: KeyTypes.Ecdsa, namedCurve: EcdsaTypes.P256 },
    false,
    ["sign"],
  );
}

function hashForCurve(namedCurve: string): HashAlgorithms {
  if (namedCurve === EcdsaTypes.P384) {
    return HashAlgorithms.SHA384;
  } else if (namedCurve === EcdsaTypes.P521) {
    return HashAlgorithms.SHA512;
  }
  return HashAlgorithms.SHA256;
}

function namedCurveOf(key: CryptoKey): string {
  const algorithm: KeyAlgorithm & { namedCurve?: string } = key.algorithm;
  return algorithm.namedCurve ?? EcdsaTypes.P256;
}

// ECDSA signatures are IEEE P1363 (r || s), which is what WebCrypto produces
// and consumes.
export async function verifySignature(
  key: CryptoKey,
  signed: Uint8Array,
  sig: Uint8Array,
): Promise<boolean> {
  if (key.algorithm.name === KeyTypes.Ecdsa) {
    const options: EcdsaParams = {
      name: KeyTypes.Ecdsa,
      hash: { name: hashForCurve(namedCurveOf(key)) },
    };
    return await crypto.subtle.verify(
      options,
      key,
      toArrayBuffer(sig),
      toArrayBuffer(signed),
    );
  } else if (key.algorithm.name === KeyTypes.Ed25519) {
    return await crypto.subtle.verify(
      { name: KeyTypes.Ed25519 },
      key,
      toArrayBuffer(sig),
      toArrayBuffer(signed),
    );
  } else {
    throw new Error("Unsupported key type!");
  }
}

export async function signMetadata(
  signed: object,
  signers: Signer[],
): Promise<Signature[]> {
  const payload = toArrayBuffer(stringToUint8Array(canonicalize(signed)));
  const signatures: Signature[] = [];

  for (const signer of signers) {
    const sig = await crypto.subtle.sign(
      {
        name: KeyTypes.Ecdsa,
        hash: { name: hashForCurve(namedCurveOf(signer.key)) },
      },
      signer.key,
      payload,
    );
    signatures.push({
      keyid: signer.keyid,
      sig: Uint8ArrayToHex(new Uint8Array(sig)),
    });
  }
  return signatures;
}

// Returns a mapping keyid (hexstring) -> CryptoKey. Every keyid must be the
// sha256 of the canonical form of its key.
export async function loadKeys(
  keys: Record<string, Key>,
): Promise<Map<string, CryptoKey>> {
  const importedKeys: Map<string, CryptoKey> = new Map();
  for (const keyId in keys) {
    const key = keys[keyId];
    const verifiedKeyId = await computeKeyId(key);

    if (importedKeys.has(verifiedKeyId)) {
      throw new Error("Duplicate keyId found!");
    }
    if (verifiedKeyId !== keyId) {
      throw new Error(
        `KeyId ${keyId} does not match the expected ${verifiedKeyId}`,
      );
    }

    importedKeys.set(
      keyId,
      await importKey(key.keytype, key.scheme, key.keyval.public),
    );
  }

  return importedKeys;
}

export interface SignatureCount {
  valid: number;
  invalid: number;
}

/**
 * Counts valid signatures over the canonical form of `signed` made by distinct
 * keys among `roleKeys`. Signatures by keys outside the role are ignored so
 * that a new signer can co-sign without counting toward the threshold.
 */
export async function countSignatures(
  keys: Map<string, CryptoKey>,
  roleKeys: string[],
  signed: object,
  signatures: Signature[],
): Promise<SignatureCount> {
  const keyIds = new Set(roleKeys);
  const signedCanon = stringToUint8Array(canonicalize(signed));

  const count: SignatureCount = { valid: 0, invalid: 0 };
  for (const signature of signatures) {
    if (!keyIds.has(signature.keyid)) {
      continue;
    }

    // A keyid counts at most once, whatever the outcome
    keyIds.delete(signature.keyid);

    const key = keys.get(signature.keyid);
    if (!key) {
      count.invalid++;
      continue;
    }

    let sig: Uint8Array;
    try {
      sig = hexToUint8Array(signature.sig);
    } catch {
      count.invalid++;
      continue;
    }

    if ((await verifySignature(key, signedCanon, sig)) === true) {
      count.valid++;
    } else {
      count.invalid++;
    }
  }

  return count;
}

async function deriveWrappingKey(
  password: string,
  salt: Uint8Array,
  iterations: number,
): Promise<CryptoKey> {
  const passwordKey = await crypto.subtle.importKey(
    "raw",
    toArrayBuffer(stringToUint8Array(password)),
    "PBKDF2",
    false,
    ["deriveKey"],
  );

  return await crypto.subtle.deriveKey(
    {
      name: "PBKDF2",
      salt: toArrayBuffer(salt),
      iterations,
      hash: HashAlgorithms.SHA256,
    },
    passwordKey,
    { name: "AES-GCM", length: 256 },
    false,
    ["encrypt", "decrypt"],
  );
}

export async function encryptPrivateKey(
  privateKey: Uint8Array,
  password: string,
  iterations: number = PBKDF2_ITERATIONS,
): Promise<EncryptedPrivateKey> {
  const salt = crypto.getRandomValues(new Uint8Array(SALT_LENGTH));
  const iv = crypto.getRandomValues(new Uint8Array(IV_LENGTH));
  const wrappingKey = await deriveWrappingKey(password, salt, iterations);

  const ciphertext = await crypto.subtle.encrypt(
    { name: "AES-GCM", iv: toArrayBuffer(iv) },
    wrappingKey,
    toArrayBuffer(privateKey),
  );

  return {
    salt: Uint8ArrayToBase64(salt),
    iv: Uint8ArrayToBase64(iv),
    iterations,
    ciphertext: Uint8ArrayToBase64(new Uint8Array(ciphertext)),
  };
}

// Rejects when the password is wrong: AES-GCM authentication fails.
export async function decryptPrivateKey(
  encrypted: EncryptedPrivateKey,
  password: string,
): Promise<Uint8Array> {
  const wrappingKey = await deriveWrappingKey(
    password,
    base64ToUint8Array(encrypted.salt),
    encrypted.iterations,
  );

  const plaintext = await crypto.subtle.decrypt(
    { name: "AES-GCM", iv: toArrayBuffer(base64ToUint8Array(encrypted.iv)) },
    wrappingKey,
    toArrayBuffer(base64ToUint8Array(encrypted.ciphertext)),
  );
  return new Uint8Array(plaintext);
}
