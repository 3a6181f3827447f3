import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { FSBackend } from "./filesystem.js";

describe("FSBackend", () => {
  let dir: string;
  let backend: FSBackend;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "blobtuf-fs-"));
    backend = new FSBackend(path.join(dir, "repo"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should read back what it wrote", async () => {
    await backend.write("metadata", { version: 1, roles: ["root"] });

    expect(await backend.read("metadata")).toEqual({ version: 1, roles: ["root"] });
    const raw = await fs.readFile(path.join(dir, "repo", "metadata.json"), "utf8");
    expect(JSON.parse(raw)).toEqual({ version: 1, roles: ["root"] });
  });

  it("should return undefined for a missing key", async () => {
    expect(await backend.read("nothing")).toBeUndefined();
  });

  it("should delete a key and ignore missing ones", async () => {
    await backend.write("keys", {});
    await backend.delete("keys");
    await backend.delete("keys");

    expect(await backend.read("keys")).toBeUndefined();
  });

  it("should refuse keys that escape its directory", async () => {
    await expect(backend.read("../outside")).rejects.toThrow("Invalid storage key: ../outside");
  });

  it("should hold a lock file with the owner's pid", async () => {
    const lockPath = path.join(dir, "repo", ".lock");
    const release = await backend.lock();

    expect(await fs.readFile(lockPath, "utf8")).toBe(String(process.pid));

    await release();
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it("should create the lock file with its content in one step", async () => {
    const release = await backend.lock();

    expect(await fs.readdir(path.join(dir, "repo"))).toEqual([".lock"]);

    await release();
    expect(await fs.readdir(path.join(dir, "repo"))).toEqual([]);
  });

  it("should wait for a lock file held by a live process", async () => {
    const lockPath = path.join(dir, "repo", ".lock");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, String(process.pid));

    let acquired = false;
    const waiting = backend.lock().then((release) => {
      acquired = true;
      return release;
    });
    await new Promise((resolve) => setTimeout(resolve, 120));
    expect(acquired).toBe(false);

    await fs.rm(lockPath);
    const release = await waiting;
    expect(await fs.readFile(lockPath, "utf8")).toBe(String(process.pid));
    await release();
  });

  it("should reclaim a lock file that names no live process", async () => {
    await fs.mkdir(path.join(dir, "repo"), { recursive: true });
    await fs.writeFile(path.join(dir, "repo", ".lock"), "stale");

    const release = await backend.lock();
    await release();
  });

  it("should queue lockers within one process", async () => {
    const order: string[] = [];
    const first = await backend.lock();

    const second = backend.lock().then(async (release) => {
      order.push("second");
      await release();
    });
    order.push("first");
    await first();
    await second;

    expect(order).toEqual(["first", "second"]);
  });
});
