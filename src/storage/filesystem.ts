import * as fs from "node:fs/promises";
import * as path from "node:path";

import { AsyncMutex, type FileBackend, type Release } from "../storage.js";

const LOCK_FILE = ".lock";
const LOCK_RETRY_MS = 50;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function processAlive(pid: number): boolean {
  try {
    // signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === "EPERM";
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Stores each key as `<dir>/<key>.json`. Writes go through a temporary file and
 * a rename so a reader never sees a partially written document.
 */
export class FSBackend implements FileBackend {
  private readonly mutex = new AsyncMutex();

  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    if (key.includes("..") || path.isAbsolute(key)) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return path.join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<unknown | undefined> {
    let value: string;
    try {
      value = await fs.readFile(this.pathFor(key), "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(value);
    return parsed;
  }

  async write(key: string, value: unknown): Promise<void> {
    const target = this.pathFor(key);
    await fs.mkdir(path.dirname(target), { recursive: true });

    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(value, null, 2) + "\n", {
      encoding: "utf8",
      mode: 0o600,
    });
    await fs.rename(tmp, target);
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.pathFor(key));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "ENOENT") {
        throw error;
      }
    }
  }

  // Hard-links a file already holding our pid into place, so the lock file
  // never exists without its owner's pid.
  private async tryCreateLock(lockPath: string): Promise<boolean> {
    const tmp = `${lockPath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, String(process.pid), { mode: 0o600 });
    try {
      await fs.link(tmp, lockPath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        return false;
      }
      throw error;
    } finally {
      await fs.rm(tmp, { force: true });
    }
  }

  // In-process callers queue on the mutex; other processes are kept out by a
  // lock file holding the owner's pid. A lock file left by a dead process is
  // reclaimed.
  async lock(): Promise<Release> {
    const releaseMutex = await this.mutex.acquire();
    const lockPath = path.join(this.dir, LOCK_FILE);

    try {
      await fs.mkdir(this.dir, { recursive: true });
      while (!(await this.tryCreateLock(lockPath))) {
        let content: string;
        try {
          content = await fs.readFile(lockPath, "utf8");
        } catch (error) {
          // released meanwhile
          if (isErrnoException(error) && error.code === "ENOENT") {
            continue;
          }
          throw error;
        }

        const owner = Number.parseInt(content, 10);
        if (Number.isNaN(owner) || !processAlive(owner)) {
          await fs.rm(lockPath, { force: true });
          continue;
        }
        await sleep(LOCK_RETRY_MS);
      }
    } catch (error) {
      releaseMutex();
      throw error;
    }

    return async () => {
      try {
        await fs.rm(lockPath, { force: true });
      } finally {
        releaseMutex();
      }
    };
  }
}
