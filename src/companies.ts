// src/companies.ts
import { Collection, allocateId } from "./repo/collection";
import type { RecordStore } from "./repo/recordStore";
import {
  AccountRecord,
  CompanyRecord,
  SUBSCRIPTION_TYPES,
  toAccountView,
  type AccountView,
  type SubscriptionType,
} from "./records";
import { fail, ok, type Result } from "./errors";
import type { CompanyDirectory } from "./accounts";
import type { BrandingOverrides } from "./repo/configStore";
import { createLogger } from "./log";

const log = createLogger("companies");

const DAY_MS = 24 * 60 * 60 * 1000;

export const SUBSCRIPTION_DAYS: Record<SubscriptionType, number> = { monthly: 30, annual: 365 };

export function isSubscriptionType(v: unknown): v is SubscriptionType {
  return SUBSCRIPTION_TYPES.some((t) => t === v);
}

function parseDate(v: string | Date | null | undefined): Date | null {
  if (v === null || v === undefined || v === "") return null;
  const d = v instanceof Date ? v : new Date(v);
  return Number.isNaN(d.getTime()) ? null : d;
}

export type SubscriptionPatch = {
  subscriptionType?: string;
  startDate?: string | Date;
  expirationDate?: string | Date;
};

export class CompanyService implements CompanyDirectory {
  readonly companies: Collection<CompanyRecord>;
  private readonly accounts: Collection<AccountRecord>;

  constructor(private readonly store: RecordStore, private readonly opts: { now?: () => Date } = {}) {
    this.companies = new Collection(store, "companies", CompanyRecord);
    this.accounts = new Collection(store, "auth", AccountRecord);
  }

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  async create(
    name: string,
    subscriptionType: string,
    startDate?: string | Date,
    expirationDate?: string | Date
  ): Promise<Result<number>> {
    const trimmed = String(name ?? "").trim();
    if (!trimmed) return fail("Company name is required", "INVALID");
    if (!isSubscriptionType(subscriptionType)) {
      return fail(`Invalid subscription type '${subscriptionType}'`, "INVALID");
    }
    const start = startDate === undefined ? this.now() : parseDate(startDate);
    if (!start) return fail("Invalid start date", "INVALID");
    const expiration =
      expirationDate === undefined
        ? new Date(start.getTime() + SUBSCRIPTION_DAYS[subscriptionType] * DAY_MS)
        : parseDate(expirationDate);
    if (!expiration) return fail("Invalid expiration date", "INVALID");

    const lower = trimmed.toLowerCase();
    const isDuplicate = (rows: CompanyRecord[]) => rows.some((c) => c.name.toLowerCase() === lower);
    const duplicate = () => fail(`Company '${trimmed}' already exists`, "CONFLICT");

    const existing = await this.companies.all();
    if (isDuplicate(existing)) return duplicate();
    // the sequence bump takes its own store lock, so it runs before the companies update
    const id = await allocateId(this.store, "companies", existing.map((c) => c.id));
    if (!id.ok) return fail(id.message, "STORAGE");

    const record: CompanyRecord = {
      id: id.value,
      name: trimmed,
      subscription_type: subscriptionType,
      start_date: start.toISOString(),
      expiration_date: expiration.toISOString(),
      enabled: true,
      created_date: this.now().toISOString(),
    };
    const res = await this.companies.mutate<boolean>((rows) =>
      isDuplicate(rows) ? { value: false } : { records: [...rows, record], value: true }
    );
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return duplicate();

    log.info(`created company ${record.id} ${trimmed} (${subscriptionType})`);
    return ok(record.id);
  }

  private async patch(id: number, apply: (c: CompanyRecord) => CompanyRecord): Promise<Result<CompanyRecord>> {
    const res = await this.companies.mutate((rows) => {
      const idx = rows.findIndex((c) => c.id === id);
      if (idx < 0) return { value: null };
      const next = rows.slice();
      next[idx] = apply(rows[idx]);
      return { records: next, value: next[idx] };
    });
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return fail(`Company with ID ${id} not found`, "NOT_FOUND");
    return ok(res.value);
  }

  async updateSubscription(id: number, patch: SubscriptionPatch): Promise<Result<CompanyRecord>> {
    const { subscriptionType, startDate, expirationDate } = patch;
    if (subscriptionType !== undefined && !isSubscriptionType(subscriptionType)) {
      return fail(`Invalid subscription type '${subscriptionType}'`, "INVALID");
    }
    const start = startDate === undefined ? undefined : parseDate(startDate);
    if (start === null) return fail("Invalid start date", "INVALID");
    const expiration = expirationDate === undefined ? undefined : parseDate(expirationDate);
    if (expiration === null) return fail("Invalid expiration date", "INVALID");

    return this.patch(id, (c) => ({
      ...c,
      subscription_type: subscriptionType ?? c.subscription_type,
      start_date: start ? start.toISOString() : c.start_date,
      expiration_date: expiration ? expiration.toISOString() : c.expiration_date,
    }));
  }

  setEnabled(id: number, enabled: boolean): Promise<Result<CompanyRecord>> {
    return this.patch(id, (c) => ({ ...c, enabled }));
  }

  /** Empty strings and nulls clear an override. */
  updateBranding(id: number, overrides: BrandingOverrides): Promise<Result<CompanyRecord>> {
    return this.patch(id, (c) => {
      const next = { ...c };
      for (const key of ["logo_path", "background_color", "button_color"] as const) {
        const v = overrides[key];
        if (v !== undefined) next[key] = v ? v : null;
      }
      return next;
    });
  }

  /** Deletes the company and detaches its users (users themselves are kept). */
  async delete(id: number): Promise<Result<{ detachedUsers: number }>> {
    const res = await this.companies.mutate((rows) => {
      const next = rows.filter((c) => c.id !== id);
      return next.length === rows.length ? { value: false } : { records: next, value: true };
    });
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return fail(`Company with ID ${id} not found`, "NOT_FOUND");

    const detach = await this.accounts.mutate((rows) => {
      let count = 0;
      const next = rows.map((a) => {
        if (a.company_id !== id) return a;
        count += 1;
        return { ...a, company_id: null };
      });
      return count ? { records: next, value: count } : { value: 0 };
    });
    if (!detach.ok) {
      log.error(`company ${id} deleted but users were not detached: ${detach.message}`);
      return fail(detach.message, "STORAGE");
    }
    log.info(`deleted company ${id}, detached ${detach.value} user(s)`);
    return ok({ detachedUsers: detach.value });
  }

  async get(id: number): Promise<CompanyRecord | null> {
    return (await this.companies.all()).find((c) => c.id === id) ?? null;
  }

  async exists(id: number): Promise<boolean> {
    return (await this.get(id)) !== null;
  }

  async listAll(): Promise<CompanyRecord[]> {
    return this.companies.all();
  }

  async listUsersOf(id: number): Promise<AccountView[]> {
    return (await this.accounts.all()).filter((a) => a.company_id === id).map(toAccountView);
  }

  /** enabled ∧ now < expiration_date; false for missing companies and unparseable dates. */
  async isSubscriptionActive(id: number): Promise<boolean> {
    const company = await this.get(id);
    return company ? isActive(company, this.now()) : false;
  }
}

export function isActive(company: CompanyRecord, now: Date): boolean {
  if (!company.enabled) return false;
  const expiration = parseDate(company.expiration_date);
  return expiration !== null && now.getTime() < expiration.getTime();
}
