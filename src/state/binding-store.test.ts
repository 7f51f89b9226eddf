import { describe, expect, it } from "vitest";
import { MemoryStorage, fixedClock } from "../testing/fakes.ts";
import { BindingStore } from "./binding-store.ts";

function makeStore(storage = new MemoryStorage()) {
  return { storage, store: new BindingStore(storage, new Map(), fixedClock()) };
}

describe("BindingStore", () => {
  it("sets and gets a binding", async () => {
    const { store, storage } = makeStore();
    const binding = await store.set("c1", "webapp", "develop");

    expect(binding).toEqual({
      channelId: "c1",
      projectId: "webapp",
      branch: "develop",
      boundAt: "2024-05-01T12:00:00.000Z",
    });
    expect(store.get("c1")).toEqual(binding);
    expect(storage.bindings.get("c1")).toEqual(binding);
  });

  it("omits the branch when none is given", async () => {
    const { store } = makeStore();
    const binding = await store.set("c1", "webapp");
    expect(binding).not.toHaveProperty("branch");
  });

  it("replaces the previous binding", async () => {
    const { store } = makeStore();
    await store.set("c1", "webapp", "develop");
    await store.set("c1", "api");
    expect(store.get("c1")).toEqual({ channelId: "c1", projectId: "api", boundAt: "2024-05-01T12:00:00.000Z" });
  });

  it("deletes idempotently", async () => {
    const { store } = makeStore();
    await store.set("c1", "webapp");

    expect(await store.delete("c1")).toBe(true);
    expect(await store.delete("c1")).toBe(false);
    expect(store.get("c1")).toBeUndefined();
  });

  it("keeps the old binding when the write fails", async () => {
    const { store, storage } = makeStore();
    await store.set("c1", "webapp");
    storage.failing.add("saveBinding");

    await expect(store.set("c1", "api")).rejects.toThrow("saveBinding failed");
    expect(store.get("c1")?.projectId).toBe("webapp");
  });

  it("loads initial bindings", () => {
    const storage = new MemoryStorage();
    const initial = new Map([["c9", { channelId: "c9", projectId: "p", boundAt: "x" }]]);
    const store = new BindingStore(storage, initial);
    expect(store.list()).toEqual([{ channelId: "c9", projectId: "p", boundAt: "x" }]);
  });
});
