import { once } from "node:events";
import * as fs from "node:fs/promises";

import { type Config, loadConfig } from "./config.js";
import { concatUint8Arrays, Uint8ArrayToString } from "./encoding.js";
import { InvalidArgumentError, UnauthorizedError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { Expirations } from "./metadata.js";
import { TokenAuthenticator } from "./registry/auth.js";
import { HttpRegistry } from "./registry/http.js";
import type { Registry } from "./registry/registry.js";
import { openCopy, openMaster } from "./repository.js";
import { ALL_ROLES, type ProgressCallback } from "./types.js";

// EACCES, so scripts can tell a credentials problem from other failures
export const EXIT_UNAUTHORIZED = 13;

const USAGE = `Usage: blobtuf <command> <repo> [args...]

Master commands:
  create-root-key <repo>                  print the new root public key
  create-metadata-keys <repo>
  create-metadata <repo> [root-threshold]
  reset-keys <repo>                       print the new root public key(s)
  push-target <repo> <target> <file|@target>...
  del-target <repo> <target>...
  push-metadata <repo>
  list-master-targets <repo>
  get-master-expirations <repo>

Copy commands:
  pull-metadata <repo> [root-pubkey-file|-]
  pull-target <repo> <target>...          write the blobs to stdout
  blob-sizes <repo> <target>...
  check-target <repo> <target> <file>...
  list-copy-targets <repo>
  get-copy-expirations <repo>

Registry commands:
  auth <repo> <action>...                 print a bearer token
  list-repos

Configuration is read from BLOBTUF_* environment variables.`;

export interface CliIO {
  env: Record<string, string | undefined>;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream & { isTTY?: boolean };
  /** Registry for a repository; defaults to the HTTP registry named by the config. */
  registry?: (repo: string, config: Config, logger: Logger) => Registry;
}

interface Invocation {
  repo: string;
  args: string[];
  config: Config;
  logger: Logger;
  io: CliIO;
  registry: Registry;
}

function httpRegistry(repo: string, config: Config, logger: Logger): HttpRegistry {
  if (!config.host) {
    throw new InvalidArgumentError("BLOBTUF_HOST is not set");
  }
  return new HttpRegistry({
    host: config.host,
    repo,
    insecure: config.insecure,
    token: config.token,
    credentials: config.credentials,
    authenticator: new TokenAuthenticator({
      authHost: config.authHost,
      insecure: config.insecure,
    }),
    logger,
  });
}

function write(io: CliIO, text: string): void {
  io.stdout.write(text);
}

function printExpirations(io: CliIO, expirations: Expirations): void {
  for (const role of ALL_ROLES) {
    const expires = expirations[role];
    if (expires) {
      write(io, `${role}: ${expires.toISOString()}\n`);
    }
  }
}

// One line per completed digest.
function progressReporter(inv: Invocation): ProgressCallback | undefined {
  const enabled = inv.config.progress ?? inv.io.stderr.isTTY === true;
  if (!enabled) {
    return undefined;
  }

  const received = new Map<string, number>();
  return (digest, chunk, total) => {
    const sofar = (received.get(digest) ?? 0) + chunk.byteLength;
    received.set(digest, sofar);
    if (chunk.byteLength === 0) {
      inv.io.stderr.write(`${digest} ${sofar}/${total}\n`);
    }
  };
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? new TextEncoder().encode(chunk) : chunk);
  }
  return Uint8ArrayToString(concatUint8Arrays(chunks));
}

function requireArgs(inv: Invocation, count: number, what: string): void {
  if (inv.args.length < count) {
    throw new InvalidArgumentError(`Missing ${what}`);
  }
}

function limitArgs(inv: Invocation, count: number): void {
  if (inv.args.length > count) {
    throw new InvalidArgumentError("Too many arguments");
  }
}

function master(inv: Invocation) {
  return openMaster(inv.config.repositoriesRoot, {
    name: inv.repo,
    registry: inv.registry,
    logger: inv.logger,
    lifetimes: inv.config.lifetimes,
  });
}

function copy(inv: Invocation) {
  return openCopy(inv.config.repositoriesRoot, {
    name: inv.repo,
    registry: inv.registry,
    logger: inv.logger,
  });
}

type Handler = (inv: Invocation) => Promise<void>;

const COMMANDS: Record<string, Handler> = {
  async auth(inv) {
    if (!(inv.registry instanceof HttpRegistry)) {
      throw new InvalidArgumentError("auth needs an HTTP registry");
    }
    const actions = inv.args.length > 0 ? inv.args : ["pull"];
    const token = await inv.registry.authenticate(inv.config.credentials, actions);
    if (token !== undefined) {
      write(inv.io, `${token}\n`);
    }
  },

  async "create-root-key"(inv) {
    limitArgs(inv, 0);
    const repo = master(inv);
    await repo.createRootKey(inv.config.passwords.root);
    for (const pem of await repo.rootPublicKeys()) {
      write(inv.io, pem);
    }
  },

  async "create-metadata-keys"(inv) {
    limitArgs(inv, 0);
    const { passwords } = inv.config;
    await master(inv).createMetadataKeys(
      passwords.targets,
      passwords.snapshot,
      passwords.timestamp,
    );
  },

  async "create-metadata"(inv) {
    limitArgs(inv, 1);
    const [arg] = inv.args;
    if (arg !== undefined && !/^[1-9]\d*$/.test(arg)) {
      throw new InvalidArgumentError(`Invalid root threshold: ${arg}`);
    }
    await master(inv).createMetadata(inv.config.passwords, {
      rootThreshold: arg === undefined ? undefined : Number.parseInt(arg, 10),
    });
  },

  async "reset-keys"(inv) {
    limitArgs(inv, 0);
    const repo = master(inv);
    await repo.resetKeys(inv.config.passwords);
    for (const pem of await repo.rootPublicKeys()) {
      write(inv.io, pem);
    }
  },

  async "push-target"(inv) {
    requireArgs(inv, 2, "target name and blob sources");
    const [name, ...sources] = inv.args;
    await master(inv).pushTarget(name, sources, progressReporter(inv));
  },

  async "del-target"(inv) {
    requireArgs(inv, 1, "target name");
    await master(inv).delTarget(...inv.args);
  },

  async "push-metadata"(inv) {
    limitArgs(inv, 0);
    await master(inv).pushMetadata(inv.config.passwords);
  },

  async "list-master-targets"(inv) {
    limitArgs(inv, 0);
    for (const name of await master(inv).listTargets()) {
      write(inv.io, `${name}\n`);
    }
  },

  async "get-master-expirations"(inv) {
    limitArgs(inv, 0);
    printExpirations(inv.io, await master(inv).getExpirations());
  },

  async "pull-metadata"(inv) {
    limitArgs(inv, 1);
    let rootPublicKey: string | undefined;
    const source = inv.args[0];
    if (source === "-") {
      rootPublicKey = await readAll(inv.io.stdin);
    } else if (source !== undefined) {
      rootPublicKey = await fs.readFile(source, "utf8");
    }

    const result = await copy(inv).pullMetadata(rootPublicKey);
    for (const name of [...result.added, ...result.changed].sort()) {
      write(inv.io, `${name}\n`);
    }
  },

  async "pull-target"(inv) {
    requireArgs(inv, 1, "target name");
    const repo = copy(inv);
    const progress = progressReporter(inv);
    for (const name of inv.args) {
      for (const blob of await repo.pullTarget(name, progress)) {
        if (inv.config.blobInfo) {
          write(inv.io, `${blob.digest} ${blob.size}\n`);
        }
        for await (const chunk of blob.stream) {
          if (!inv.io.stdout.write(chunk)) {
            await once(inv.io.stdout, "drain");
          }
        }
      }
    }
  },

  async "blob-sizes"(inv) {
    requireArgs(inv, 1, "target name");
    const repo = copy(inv);
    for (const name of inv.args) {
      for (const size of await repo.blobSizes(name)) {
        write(inv.io, `${size}\n`);
      }
    }
  },

  async "check-target"(inv) {
    requireArgs(inv, 2, "target name and files");
    const [name, ...files] = inv.args;
    const result = await copy(inv).checkTarget(name, files);
    for (const file of result.files) {
      write(inv.io, `${file.file}: ${file.ok ? "ok" : "mismatch"}\n`);
    }
    if (!result.ok) {
      throw new InvalidArgumentError(`${name} does not match the given files`);
    }
  },

  async "list-copy-targets"(inv) {
    limitArgs(inv, 0);
    for (const name of await copy(inv).listTargets()) {
      write(inv.io, `${name}\n`);
    }
  },

  async "get-copy-expirations"(inv) {
    limitArgs(inv, 0);
    printExpirations(inv.io, await copy(inv).getExpirations());
  },
};

/**
 * Runs one command and resolves to the process exit code. Errors are reported
 * on stderr, never thrown.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const [command, repo, ...args] = argv;

  if (command === undefined || command === "--help" || command === "-h") {
    io.stderr.write(`${USAGE}\n`);
    return command === undefined ? 1 : 0;
  }

  let config: Config;
  try {
    config = loadConfig(io.env);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
  const logger = createLogger(config.logLevel);

  try {
    if (command === "list-repos") {
      if (repo !== undefined) {
        throw new InvalidArgumentError("Too many arguments");
      }
      for (const name of await httpRegistry("", config, logger).listRepositories()) {
        write(io, `${name}\n`);
      }
      return 0;
    }

    const handler = Object.prototype.hasOwnProperty.call(COMMANDS, command)
      ? COMMANDS[command]
      : undefined;
    if (handler === undefined) {
      throw new InvalidArgumentError(`Unknown command: ${command}`);
    }
    if (!repo) {
      throw new InvalidArgumentError("Missing repository name");
    }

    const registry = (io.registry ?? httpRegistry)(repo, config, logger);
    await handler({ repo, args, config, logger, io, registry });
    return 0;
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return error instanceof UnauthorizedError ? EXIT_UNAUTHORIZED : 1;
  }
}
