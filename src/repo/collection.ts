// src/repo/collection.ts
import { z } from "zod";
import { createLogger } from "../log";
import type { CollectionName, RecordStore, StoreUpdate } from "./recordStore";

const log = createLogger("store");

export type TypedRead<T> = { ok: true; records: T[] } | { ok: false; message: string };

/** A store collection seen through a zod schema. Rows that fail the schema are skipped. */
export class Collection<T> {
  constructor(
    readonly store: RecordStore,
    readonly name: CollectionName,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  parseAll(raw: unknown[]): T[] {
    const out: T[] = [];
    raw.forEach((row, i) => {
      const parsed = this.schema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
      else log.warn(`${this.name}[${i}] skipped: ${parsed.error.issues[0]?.message ?? "invalid record"}`);
    });
    return out;
  }

  async all(): Promise<T[]> {
    return this.parseAll(await this.store.load(this.name));
  }

  async read(): Promise<TypedRead<T>> {
    const res = await this.store.read(this.name);
    if (!res.ok) return { ok: false, message: `Could not read ${this.name}` };
    return { ok: true, records: this.parseAll(res.records) };
  }

  mutate<R>(
    fn: (records: T[]) => { records?: T[]; value: R } | Promise<{ records?: T[]; value: R }>
  ): Promise<StoreUpdate<R>> {
    return this.store.update(this.name, (raw) => fn(this.parseAll(raw)));
  }
}

const SequenceRow = z.object({ name: z.string(), value: z.number().int().min(0) });

/**
 * Hands out the next integer id for `sequence`. The counter is persisted, so ids
 * stay unique after deletions: next = max(counter, max(existingIds)) + 1.
 */
export async function allocateId(
  store: RecordStore,
  sequence: string,
  existingIds: readonly number[]
): Promise<StoreUpdate<number>> {
  const sequences = new Collection(store, "sequences", SequenceRow);
  return sequences.mutate((rows) => {
    const row = rows.find((r) => r.name === sequence);
    const next = existingIds.reduce((m, id) => Math.max(m, id), row?.value ?? 0) + 1;
    const records = row
      ? rows.map((r) => (r.name === sequence ? { ...r, value: next } : r))
      : [...rows, { name: sequence, value: next }];
    return { records, value: next };
  });
}
