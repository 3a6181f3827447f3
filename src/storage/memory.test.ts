import { describe, it, expect } from "vitest";

import { MemoryBackend } from "./memory.js";

describe("MemoryBackend", () => {
  it("should not share state with callers", async () => {
    const backend = new MemoryBackend();
    const value = { targets: ["v1"] };

    await backend.write("pending-targets", value);
    value.targets.push("v2");

    expect(await backend.read("pending-targets")).toEqual({ targets: ["v1"] });
    expect(backend.keys()).toEqual(["pending-targets"]);
  });

  it("should forget deleted keys", async () => {
    const backend = new MemoryBackend();
    await backend.write("trusted", { version: 1 });
    await backend.delete("trusted");

    expect(await backend.read("trusted")).toBeUndefined();
  });

  it("should hand the lock to one holder at a time", async () => {
    const backend = new MemoryBackend();
    const events: string[] = [];

    const hold = async (name: string) => {
      const release = await backend.lock();
      events.push(`${name} start`);
      await Promise.resolve();
      events.push(`${name} end`);
      await release();
    };
    await Promise.all([hold("a"), hold("b")]);

    expect(events).toEqual(["a start", "a end", "b start", "b end"]);
  });
});
