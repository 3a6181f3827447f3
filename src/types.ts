import { z } from "zod";

export enum Roles {
  Root = "root",
  Timestamp = "timestamp",
  Snapshot = "snapshot",
  Targets = "targets",
}

// Signing order for a metadata push: each role pins the one before it.
export const METADATA_ROLES = [Roles.Targets, Roles.Snapshot, Roles.Timestamp] as const;

export const ALL_ROLES = [Roles.Root, ...METADATA_ROLES] as const;

export const SPEC_VERSION = "1.0.0";

export const TARGETS_FILE = "targets.json";
export const SNAPSHOT_FILE = "snapshot.json";

const hex64 = z.string().regex(/^[0-9a-f]{64}$/, "expected a lowercase sha256 hex digest");

export const keySchema = z.object({
  keytype: z.string(),
  scheme: z.string(),
  keyval: z.object({
    public: z.string(),
  }),
});

export const roleSchema = z.object({
  keyids: z.array(z.string()).min(1),
  threshold: z.number().int().positive(),
});

export const signatureSchema = z.object({
  keyid: z.string(),
  sig: z.string(),
});

const signedBase = {
  spec_version: z.string(),
  version: z.number().int().positive().safe(),
  expires: z.string().datetime({ offset: true }),
};

export const rootSignedSchema = z.object({
  _type: z.literal(Roles.Root),
  ...signedBase,
  consistent_snapshot: z.boolean(),
  keys: z.record(keySchema),
  roles: z.object({
    [Roles.Root]: roleSchema,
    [Roles.Targets]: roleSchema,
    [Roles.Snapshot]: roleSchema,
    [Roles.Timestamp]: roleSchema,
  }),
});

export const blobRefSchema = z.object({
  digest: hex64,
  length: z.number().int().nonnegative(),
});

export const targetEntrySchema = z.object({
  length: z.number().int().nonnegative(),
  blobs: z.array(blobRefSchema).min(1),
});

export const targetsSignedSchema = z.object({
  _type: z.literal(Roles.Targets),
  ...signedBase,
  targets: z.record(targetEntrySchema),
});

export const metaEntrySchema = z.object({
  version: z.number().int().positive().safe(),
  length: z.number().int().nonnegative(),
  hashes: z.object({
    sha256: hex64,
  }),
});

export const snapshotSignedSchema = z.object({
  _type: z.literal(Roles.Snapshot),
  ...signedBase,
  meta: z.record(metaEntrySchema),
});

export const timestampSignedSchema = z.object({
  _type: z.literal(Roles.Timestamp),
  ...signedBase,
  meta: z.record(metaEntrySchema),
});

export const signedSchema = z.discriminatedUnion("_type", [
  rootSignedSchema,
  targetsSignedSchema,
  snapshotSignedSchema,
  timestampSignedSchema,
]);

function metafileSchema<T extends z.ZodTypeAny>(signed: T) {
  return z.object({
    signed,
    signatures: z.array(signatureSchema),
  });
}

export const rootMetafileSchema = metafileSchema(rootSignedSchema);
export const targetsMetafileSchema = metafileSchema(targetsSignedSchema);
export const snapshotMetafileSchema = metafileSchema(snapshotSignedSchema);
export const timestampMetafileSchema = metafileSchema(timestampSignedSchema);

export type Key = z.infer<typeof keySchema>;
export type Role = z.infer<typeof roleSchema>;
export type Signature = z.infer<typeof signatureSchema>;
export type BlobRef = z.infer<typeof blobRefSchema>;
export type TargetEntry = z.infer<typeof targetEntrySchema>;
export type MetaEntry = z.infer<typeof metaEntrySchema>;

export type RootSigned = z.infer<typeof rootSignedSchema>;
export type TargetsSigned = z.infer<typeof targetsSignedSchema>;
export type SnapshotSigned = z.infer<typeof snapshotSignedSchema>;
export type TimestampSigned = z.infer<typeof timestampSignedSchema>;

/** The signed payload of any role, discriminated by `_type`. */
export type Signed = z.infer<typeof signedSchema>;

export interface Metafile<T extends Signed = Signed> {
  signed: T;
  signatures: Signature[];
}

export type RootMetafile = Metafile<RootSigned>;
export type TargetsMetafile = Metafile<TargetsSigned>;
export type SnapshotMetafile = Metafile<SnapshotSigned>;
export type TimestampMetafile = Metafile<TimestampSigned>;

/**
 * Name of the registry document holding a role's current metadata.
 * Root versions are additionally stored as `<version>.root.json`.
 */
export function metadataName(role: Roles, version?: number): string {
  return version === undefined ? `${role}.json` : `${version}.${role}.json`;
}

/**
 * Called for every transferred chunk of a blob, then once more with an empty
 * chunk when the blob is complete.
 */
export type ProgressCallback = (
  digest: string,
  chunk: Uint8Array,
  total: number,
) => void;
