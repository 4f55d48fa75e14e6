import { describe, expect, it } from "vitest";

import { MemoryStagingStore, purgeExpiredObjects, silentLogger } from "../src/index";

const body = new TextEncoder().encode("payload");

describe("MemoryStagingStore", () => {
  it("copies bodies so callers cannot mutate stored objects", async () => {
    const store = new MemoryStagingStore();
    const original = new TextEncoder().encode("abc");
    await store.put("ST1/2024-03-01", original);
    original[0] = 0;

    expect(new TextDecoder().decode(await store.get("ST1/2024-03-01"))).toBe("abc");
  });

  it("validates keys like the filesystem store", async () => {
    const store = new MemoryStagingStore();

    await expect(store.put("../outside", body)).rejects.toMatchObject({ code: "StagingError", operation: "put" });
  });
});

describe("purgeExpiredObjects", () => {
  it("removes only objects older than the ttl", async () => {
    let clock = new Date("2024-06-10T00:00:00.000Z");
    const store = new MemoryStagingStore({ now: () => clock });

    await store.put("ST1/2024-06-09", body);
    clock = new Date("2024-06-10T20:00:00.000Z");
    await store.put("ST100/2024-06-10", body);

    const removed = await purgeExpiredObjects(store, {
      ttlMs: 12 * 60 * 60 * 1000,
      now: new Date("2024-06-10T21:00:00.000Z"),
      logger: silentLogger
    });

    expect(removed).toEqual(["ST1/2024-06-09"]);
    expect((await store.list()).map((entry) => entry.key)).toEqual(["ST100/2024-06-10"]);
  });

  it("does nothing for a non-positive ttl", async () => {
    const store = new MemoryStagingStore();
    await store.put("ST1/2024-06-09", body);

    expect(await purgeExpiredObjects(store, { ttlMs: 0, logger: silentLogger })).toEqual([]);
    expect((await store.list()).map((entry) => entry.key)).toEqual(["ST1/2024-06-09"]);
  });
});
