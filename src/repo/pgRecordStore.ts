// src/repo/pgRecordStore.ts
import { z } from "zod";
import { query, type ConnectionSource } from "../db";
import { createLogger } from "../log";
import { errorMessage } from "../errors";
import type { CollectionName, Mutation, RecordStore, StoreRead, StoreUpdate } from "./recordStore";

const log = createLogger("store:pg");

const Row = z.object({ records: z.unknown() });

/**
 * Collections as one jsonb array per row:
 *   record_collections(name text primary key, records jsonb, updated_at timestamptz)
 * `update` holds a row lock for the whole load → mutate → save cycle.
 */
export class PgRecordStore implements RecordStore {
  private ready: Promise<void> | null = null;

  constructor(private readonly source: ConnectionSource) {}

  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = query(
        this.source,
        `create table if not exists record_collections (
           name text primary key,
           records jsonb not null default '[]'::jsonb,
           updated_at timestamptz not null default now()
         )`
      ).then(() => undefined);
      // let the next call retry after a failed attempt
      this.ready.catch(() => {
        this.ready = null;
      });
    }
    return this.ready;
  }

  private static toRead(rows: unknown[]): StoreRead {
    if (!rows.length) return { ok: true, records: [] };
    const row = Row.safeParse(rows[0]);
    if (!row.success) return { ok: false, reason: "CORRUPT", message: "unexpected row shape" };
    const records = row.data.records;
    if (!Array.isArray(records)) return { ok: false, reason: "CORRUPT", message: "expected a jsonb array" };
    return { ok: true, records };
  }

  async read(collection: CollectionName): Promise<StoreRead> {
    try {
      await this.ensureTable();
      const res = await query(this.source, "select records from record_collections where name=$1", [collection]);
      return PgRecordStore.toRead(res.rows);
    } catch (e) {
      return { ok: false, reason: "IO", message: errorMessage(e) };
    }
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
      await this.ensureTable();
      await query(this.source, UPSERT, [collection, JSON.stringify(records)]);
      return true;
    } catch (e) {
      log.error(`save ${collection} failed`, errorMessage(e));
      return false;
    }
  }

  async update<R>(
    collection: CollectionName,
    mutate: (records: unknown[]) => Mutation<R> | Promise<Mutation<R>>
  ): Promise<StoreUpdate<R>> {
    try {
      await this.ensureTable();
    } catch (e) {
      log.error(`update ${collection} failed`, errorMessage(e));
      return { ok: false, message: `Could not read ${collection}` };
    }

    const client = await this.source.connect();
    try {
      await client.query("BEGIN");
      // make sure a row exists so FOR UPDATE has something to lock
      await client.query(
        "insert into record_collections(name, records) values($1, '[]'::jsonb) on conflict (name) do nothing",
        [collection]
      );
      const res = await client.query("select records from record_collections where name=$1 for update", [collection]);
      const current = PgRecordStore.toRead(res.rows);
      if (!current.ok) {
        await client.query("ROLLBACK");
        log.error(`update ${collection} refused (${current.reason})`, current.message);
        return { ok: false, message: `Could not read ${collection}` };
      }
      const { records, value } = await mutate(current.records);
      if (records) await client.query(UPSERT, [collection, JSON.stringify(records)]);
      await client.query("COMMIT");
      return { ok: true, value };
    } catch (e) {
      await client.query("ROLLBACK").catch((rbErr) => log.error("rollback failed", errorMessage(rbErr)));
      log.error(`update ${collection} failed`, errorMessage(e));
      return { ok: false, message: `Could not save ${collection}` };
    } finally {
      client.release();
    }
  }
}

const UPSERT = `insert into record_collections(name, records, updated_at)
  values($1, $2::jsonb, now())
  on conflict (name) do update set records=excluded.records, updated_at=now()`;
