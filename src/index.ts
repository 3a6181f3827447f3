export {
  CopyRepository,
  MasterRepository,
  openCopy,
  openMaster,
  repositoryDirs,
  type MasterContext,
  type RepositoryContext,
  type RotateOptions,
} from "./repository.js";
export { KeyManager, type KeyManagerOptions, type KeyPasswords, type PublicRoleKey } from "./keys.js";
export {
  CopyTargetStore,
  MasterTargetStore,
  type CheckTargetResult,
  type FileCheck,
  type PulledBlob,
  type TargetMap,
  type TargetSource,
} from "./targets.js";
export {
  DEFAULT_LIFETIMES,
  MetadataBuilder,
  encodeMetafile,
  type CreateMetadataOptions,
  type Expirations,
  type Lifetimes,
  type MetadataBuilderOptions,
  type RotateRootOptions,
} from "./metadata.js";
export {
  TrustVerifier,
  rootKeyFromPEM,
  type PullResult,
  type TrustVerifierOptions,
  type TrustedMetadata,
  type VerifierState,
} from "./verifier.js";
export type { Credentials, Registry } from "./registry/registry.js";
export { MemoryRegistry } from "./registry/memory.js";
export { HttpRegistry, type HttpRegistryOptions } from "./registry/http.js";
export {
  TokenAuthenticator,
  parseChallenge,
  type Authenticator,
  type Challenge,
} from "./registry/auth.js";
export type { FileBackend, Release } from "./storage.js";
export { FSBackend } from "./storage/filesystem.js";
export { MemoryBackend } from "./storage/memory.js";
export { type ByteStream, collect, digestOf } from "./streams.js";
export { loadConfig, parseDuration, type Config } from "./config.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";
export * from "./errors.js";
export * from "./types.js";
