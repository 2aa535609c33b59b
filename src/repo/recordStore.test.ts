import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonFileStore, KeyedMutex, readJsonFile } from "./recordStore";
import { makeTempDir, removeDir } from "../testing/fixtures";

describe("JsonFileStore", () => {
  let dir: string;
  let store: JsonFileStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new JsonFileStore(dir);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads a missing collection as empty", async () => {
    expect(await store.read("posts")).toEqual({ ok: true, records: [] });
    expect(await store.load("posts")).toEqual([]);
  });

  it("round-trips records as pretty-printed JSON", async () => {
    const records = [{ id: 1, topic: "Café ☕" }, { id: 2, topic: "b" }];
    expect(await store.save("posts", records)).toBe(true);
    expect(await store.load("posts")).toEqual(records);

    const raw = await fs.readFile(path.join(dir, "posts.json"), "utf8");
    expect(raw).toBe(JSON.stringify(records, null, 2) + "\n");
  });

  it("leaves no temp files behind after a save", async () => {
    await store.save("companies", [{ id: 1 }]);
    expect(await fs.readdir(dir)).toEqual(["companies.json"]);
  });

  it("reports a corrupt file on the read channel and loads it as empty", async () => {
    await fs.writeFile(path.join(dir, "auth.json"), "{not json", "utf8");
    const res = await store.read("auth");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason).toBe("CORRUPT");
    expect(await store.load("auth")).toEqual([]);
  });

  it("treats a non-array document as corrupt", async () => {
    await fs.writeFile(path.join(dir, "users.json"), '{"a":1}', "utf8");
    const res = await store.read("users");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason).toBe("CORRUPT");
  });

  it("refuses to update a collection it could not read", async () => {
    const file = path.join(dir, "auth.json");
    await fs.writeFile(file, "{not json", "utf8");
    const res = await store.update("auth", (rows) => ({ records: [...rows, { username: "x" }], value: 1 }));
    expect(res).toEqual({ ok: false, message: "Could not read auth" });
    expect(await fs.readFile(file, "utf8")).toBe("{not json");
  });

  it("skips the write when the mutator returns no records", async () => {
    const res = await store.update("posts", () => ({ value: "unchanged" }));
    expect(res).toEqual({ ok: true, value: "unchanged" });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("serialises concurrent updates to one collection", async () => {
    const appendOne = (n: number) =>
      store.update("posts", async (rows) => {
        await new Promise((r) => setTimeout(r, 1));
        return { records: [...rows, { id: n }], value: n };
      });

    const results = await Promise.all([1, 2, 3, 4, 5].map(appendOne));
    expect(results.every((r) => r.ok)).toBe(true);
    const ids = (await store.load("posts")).map((r) => (typeof r === "object" && r !== null && "id" in r ? r.id : null));
    expect(ids).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("KeyedMutex", () => {
  it("releases the lock when the task throws", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.run("k", async () => "next")).toBe("next");
  });
});

describe("readJsonFile", () => {
  it("distinguishes a missing file", async () => {
    const res = await readJsonFile(path.join("/nonexistent-dir", "nope.json"));
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.reason).toBe("MISSING");
  });
});
