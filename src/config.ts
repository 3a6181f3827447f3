import { z } from "zod";

import { InvalidArgumentError } from "./errors.js";
import type { KeyPasswords } from "./keys.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { Lifetimes } from "./metadata.js";
import type { Credentials } from "./registry/registry.js";
import { Roles } from "./types.js";

export const DEFAULT_REPOSITORIES_ROOT = "blobtuf_repos";

const DURATION_UNITS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60,
  w: 7 * 24 * 60 * 60,
  y: 365 * 24 * 60 * 60,
};

const DURATION_RE = /^(\d+)([smhdwy]?)$/;

/** Parses `30s`, `12h`, `7d`, `2w`, `1y` or plain seconds into seconds. */
export function parseDuration(text: string): number {
  const match = DURATION_RE.exec(text.trim());
  if (!match) {
    throw new InvalidArgumentError(`Invalid duration: ${text}`);
  }
  const seconds = Number.parseInt(match[1], 10) * DURATION_UNITS[match[2] || "s"];
  if (seconds <= 0) {
    throw new InvalidArgumentError(`Duration must be positive: ${text}`);
  }
  return seconds;
}

const flag = z
  .enum(["0", "1", "false", "true", "no", "yes"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

const duration = z
  .string()
  .regex(DURATION_RE, "expected a duration such as 12h, 7d or 3600")
  .transform(parseDuration);

const envSchema = z.object({
  BLOBTUF_HOST: z.string().min(1).optional(),
  BLOBTUF_INSECURE: flag.default("0"),
  BLOBTUF_AUTH_HOST: z.string().min(1).optional(),
  BLOBTUF_TOKEN: z.string().min(1).optional(),
  BLOBTUF_USERNAME: z.string().optional(),
  BLOBTUF_PASSWORD: z.string().optional(),
  BLOBTUF_REPOSITORIES_ROOT: z.string().min(1).default(DEFAULT_REPOSITORIES_ROOT),
  BLOBTUF_PROGRESS: flag.optional(),
  BLOBTUF_BLOB_INFO: flag.default("0"),
  BLOBTUF_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  BLOBTUF_ROOT_KEY_PASSWORD: z.string().optional(),
  BLOBTUF_TARGETS_KEY_PASSWORD: z.string().optional(),
  BLOBTUF_SNAPSHOT_KEY_PASSWORD: z.string().optional(),
  BLOBTUF_TIMESTAMP_KEY_PASSWORD: z.string().optional(),
  BLOBTUF_ROOT_LIFETIME: duration.optional(),
  BLOBTUF_TARGETS_LIFETIME: duration.optional(),
  BLOBTUF_SNAPSHOT_LIFETIME: duration.optional(),
  BLOBTUF_TIMESTAMP_LIFETIME: duration.optional(),
});

export interface Config {
  host?: string;
  insecure: boolean;
  authHost?: string;
  token?: string;
  credentials: Credentials;
  repositoriesRoot: string;
  /** Unset means: report progress when stderr is a terminal. */
  progress?: boolean;
  blobInfo: boolean;
  logLevel: LogLevel;
  passwords: KeyPasswords;
  lifetimes: Partial<Lifetimes>;
}

// Unset roles are left out so that spreading the result over defaults keeps
// the defaults.
function byRole<V>(entries: [Roles, V | undefined][]): Partial<Record<Roles, V>> {
  const result: Partial<Record<Roles, V>> = {};
  for (const [role, value] of entries) {
    if (value !== undefined) {
      result[role] = value;
    }
  }
  return result;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    host: e.BLOBTUF_HOST,
    insecure: e.BLOBTUF_INSECURE,
    authHost: e.BLOBTUF_AUTH_HOST,
    token: e.BLOBTUF_TOKEN,
    credentials: { username: e.BLOBTUF_USERNAME, password: e.BLOBTUF_PASSWORD },
    repositoriesRoot: e.BLOBTUF_REPOSITORIES_ROOT,
    progress: e.BLOBTUF_PROGRESS,
    blobInfo: e.BLOBTUF_BLOB_INFO,
    logLevel: e.BLOBTUF_LOG_LEVEL,
    passwords: byRole([
      [Roles.Root, e.BLOBTUF_ROOT_KEY_PASSWORD],
      [Roles.Targets, e.BLOBTUF_TARGETS_KEY_PASSWORD],
      [Roles.Snapshot, e.BLOBTUF_SNAPSHOT_KEY_PASSWORD],
      [Roles.Timestamp, e.BLOBTUF_TIMESTAMP_KEY_PASSWORD],
    ]),
    lifetimes: byRole([
      [Roles.Root, e.BLOBTUF_ROOT_LIFETIME],
      [Roles.Targets, e.BLOBTUF_TARGETS_LIFETIME],
      [Roles.Snapshot, e.BLOBTUF_SNAPSHOT_LIFETIME],
      [Roles.Timestamp, e.BLOBTUF_TIMESTAMP_LIFETIME],
    ]),
  };
}
