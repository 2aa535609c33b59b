// src/repo/configStore.ts
import { promises as fs } from "fs";
import { z } from "zod";
import { createLogger } from "../log";
import { errorMessage } from "../errors";
import { readJsonFile, writeJsonAtomic } from "./recordStore";

const log = createLogger("config");

export const CustomerConfigSchema = z.object({
  customer_name: z.string(),
  background_color: z.string(),
  button_color: z.string(),
  logo_path: z.string(),
});

export type CustomerConfig = z.infer<typeof CustomerConfigSchema>;

export const DEFAULT_CUSTOMER_CONFIG: CustomerConfig = {
  customer_name: "LinkedIn Post Generator",
  background_color: "#E9F7EF",
  button_color: "#17A2B8",
  logo_path: "",
};

const CONFIG_KEYS = ["customer_name", "background_color", "button_color", "logo_path"] as const;

const RawObject = z.record(z.string(), z.unknown());

export type BrandingOverrides = {
  logo_path?: string | null;
  background_color?: string | null;
  button_color?: string | null;
};

type CacheEntry = { value: CustomerConfig; mtimeMs: number; loadedAt: number };

export type ConfigStoreOptions = {
  ttlMs?: number;
  now?: () => number;
};

/** Keeps only known keys with string values; anything else falls back to defaults. */
function pickKnown(raw: unknown): Partial<CustomerConfig> {
  const obj = RawObject.safeParse(raw);
  if (!obj.success) return {};
  const out: Partial<CustomerConfig> = {};
  for (const key of CONFIG_KEYS) {
    const v = obj.data[key];
    if (typeof v === "string") out[key] = v;
  }
  return out;
}

/**
 * Singleton branding config in one JSON file. Reads are cached per instance,
 * keyed by the file mtime and a wall-clock TTL; `save` replaces the cache.
 */
export class ConfigStore {
  private cache: CacheEntry | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly file: string, opts: ConfigStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 60_000;
    this.now = opts.now ?? Date.now;
  }

  private async mtime(): Promise<number | null> {
    try {
      return (await fs.stat(this.file)).mtimeMs;
    } catch {
      return null;
    }
  }

  async load(): Promise<CustomerConfig> {
    const mtimeMs = await this.mtime();
    const c = this.cache;
    if (c && mtimeMs !== null && c.mtimeMs === mtimeMs && this.now() - c.loadedAt < this.ttlMs) {
      return { ...c.value };
    }

    const res = await readJsonFile(this.file);
    if (!res.ok) {
      if (res.reason === "MISSING") {
        await this.save(DEFAULT_CUSTOMER_CONFIG);
        return { ...DEFAULT_CUSTOMER_CONFIG };
      }
      log.error(`load failed (${res.reason})`, res.message);
      return { ...DEFAULT_CUSTOMER_CONFIG };
    }

    const value: CustomerConfig = { ...DEFAULT_CUSTOMER_CONFIG, ...pickKnown(res.value) };
    this.cache = { value, mtimeMs: mtimeMs ?? 0, loadedAt: this.now() };
    return { ...value };
  }

  /** Merges `partial` over the defaults (not over the stored file) and persists it. */
  async save(partial: Partial<CustomerConfig>): Promise<boolean> {
    const value: CustomerConfig = { ...DEFAULT_CUSTOMER_CONFIG, ...pickKnown(partial) };
    try {
      await writeJsonAtomic(this.file, value);
    } catch (e) {
      log.error("save failed", errorMessage(e));
      return false;
    }
    const mtimeMs = (await this.mtime()) ?? 0;
    this.cache = { value, mtimeMs, loadedAt: this.now() };
    return true;
  }

  /** Customer branding with a company's own overrides on top. */
  async brandingFor(company?: BrandingOverrides | null): Promise<CustomerConfig> {
    const base = await this.load();
    if (!company) return base;
    return {
      ...base,
      logo_path: company.logo_path || base.logo_path,
      background_color: company.background_color || base.background_color,
      button_color: company.button_color || base.button_color,
    };
  }
}
