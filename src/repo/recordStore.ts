// src/repo/recordStore.ts
import { promises as fs } from "fs";
import path from "path";
import crypto from "crypto";
import { createLogger } from "../log";
import { errorMessage } from "../errors";

const log = createLogger("store");

export type CollectionName = "auth" | "companies" | "posts" | "users" | "sequences";

export const COLLECTION_FILES: Record<CollectionName, string> = {
  auth: "auth.json",
  companies: "companies.json",
  posts: "posts.json",
  users: "users.json",
  sequences: "sequences.json",
};

/** Explicit read channel: "empty" and "failed to read" are different answers. */
export type StoreRead =
  | { ok: true; records: unknown[] }
  | { ok: false; reason: "CORRUPT" | "IO"; message: string };

/**
 * What a mutator hands back to `update`.
 * Omit `records` to leave the collection untouched (e.g. a duplicate was found).
 */
export type Mutation<R> = { records?: unknown[]; value: R };

export type StoreUpdate<R> = { ok: true; value: R } | { ok: false; message: string };

export interface RecordStore {
  read(collection: CollectionName): Promise<StoreRead>;
  /** Never fails: read errors are logged and degrade to an empty list. */
  load(collection: CollectionName): Promise<unknown[]>;
  /** Overwrites the collection with `records`. */
  save(collection: CollectionName, records: readonly unknown[]): Promise<boolean>;
  /** load → mutate → save with writers to the same collection serialised. */
  update<R>(
    collection: CollectionName,
    mutate: (records: unknown[]) => Mutation<R> | Promise<Mutation<R>>
  ): Promise<StoreUpdate<R>>;
}

/** Promise-chain mutex, one chain per key. */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const next = new Promise<void>((r) => {
      release = r;
    });
    const tail = prev.then(() => next);
    this.tails.set(key, tail);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

function isErrno(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

export async function readJsonFile(file: string): Promise<{ ok: true; value: unknown } | { ok: false; reason: "MISSING" | "CORRUPT" | "IO"; message: string }> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isErrno(e) && e.code === "ENOENT") return { ok: false, reason: "MISSING", message: "not found" };
    return { ok: false, reason: "IO", message: errorMessage(e) };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (e) {
    return { ok: false, reason: "CORRUPT", message: errorMessage(e) };
  }
}

/**
 * Pretty-printed UTF-8 JSON written to a sibling temp file, then renamed over the target.
 * A crash mid-write leaves the previous file intact.
 */
export async function writeJsonAtomic(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  try {
    await fs.writeFile(tmp, JSON.stringify(value, null, 2) + "\n", "utf8");
    await fs.rename(tmp, file);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch((rmErr) => log.warn(`could not remove ${tmp}`, rmErr));
    throw e;
  }
}

/** Collections as JSON array files under one data directory. */
export class JsonFileStore implements RecordStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly dataDir: string) {}

  fileFor(collection: CollectionName): string {
    return path.join(this.dataDir, COLLECTION_FILES[collection]);
  }

  async read(collection: CollectionName): Promise<StoreRead> {
    const file = this.fileFor(collection);
    const res = await readJsonFile(file);
    if (!res.ok) {
      if (res.reason === "MISSING") return { ok: true, records: [] };
      return { ok: false, reason: res.reason, message: `${file}: ${res.message}` };
    }
    if (!Array.isArray(res.value)) {
      return { ok: false, reason: "CORRUPT", message: `${file}: expected a JSON array` };
    }
    return { ok: true, records: res.value };
  }

  async load(collection: CollectionName): Promise<unknown[]> {
    const res = await this.read(collection);
    if (!res.ok) {
      log.error(`load ${collection} failed (${res.reason})`, res.message);
      return [];
    }
    return res.records;
  }

  async save(collection: CollectionName, records: readonly unknown[]): Promise<boolean> {
    try {
      await writeJsonAtomic(this.fileFor(collection), records);
      return true;
    } catch (e) {
      log.error(`save ${collection} failed`, errorMessage(e));
      return false;
    }
  }

  update<R>(
    collection: CollectionName,
    mutate: (records: unknown[]) => Mutation<R> | Promise<Mutation<R>>
  ): Promise<StoreUpdate<R>> {
    return this.mutex.run(collection, async (): Promise<StoreUpdate<R>> => {
      const current = await this.read(collection);
      if (!current.ok) {
        // never overwrite a collection we could not read
        log.error(`update ${collection} refused (${current.reason})`, current.message);
        return { ok: false, message: `Could not read ${collection}` };
      }
      const { records, value } = await mutate(current.records);
      if (records && !(await this.save(collection, records))) {
        return { ok: false, message: `Could not save ${collection}` };
      }
      return { ok: true, value };
    });
  }
}
