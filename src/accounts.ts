// src/accounts.ts
import { Collection } from "./repo/collection";
import type { RecordStore } from "./repo/recordStore";
import {
  AccountRecord,
  ROLES,
  TIERS,
  UserStatsRecord,
  toAccountView,
  type AccountView,
  type Role,
  type Tier,
} from "./records";
import { fail, ok, type Result } from "./errors";
import { hashPassword, verifyPassword } from "./password";
import { createLogger } from "./log";

const log = createLogger("auth");

/** What the account service needs to know about companies. */
export interface CompanyDirectory {
  exists(id: number): Promise<boolean>;
}

export type CreateUserInput = {
  username: string;
  password: string;
  enabled?: boolean;
  email?: string;
  tier?: string;
  companyId?: number | null;
  role?: string;
};

function isTier(v: unknown): v is Tier {
  return TIERS.some((t) => t === v);
}

function isRole(v: unknown): v is Role {
  return ROLES.some((r) => r === v);
}

export class AccountService {
  readonly accounts: Collection<AccountRecord>;
  private readonly stats: Collection<UserStatsRecord>;

  constructor(
    store: RecordStore,
    private readonly companies: CompanyDirectory,
    private readonly opts: { bcryptRounds: number; now?: () => Date }
  ) {
    this.accounts = new Collection(store, "auth", AccountRecord);
    this.stats = new Collection(store, "users", UserStatsRecord);
  }

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  /** Exact username first, then a case-insensitive match. */
  private static findLogin(accounts: AccountRecord[], username: string): AccountRecord | undefined {
    const lower = username.toLowerCase();
    return accounts.find((a) => a.username === username) ?? accounts.find((a) => a.username.toLowerCase() === lower);
  }

  async authenticate(username: string, password: string): Promise<Result<AccountView>> {
    const u = String(username ?? "").trim();
    const p = String(password ?? "").trim();
    if (!u || !p) return fail("Username and password are required", "INVALID");

    const read = await this.accounts.read();
    if (!read.ok) return fail(read.message, "STORAGE");
    if (read.records.length === 0) return fail("No users exist. Contact your administrator.");

    const account = AccountService.findLogin(read.records, u);
    if (!account) return fail("User not found");
    if (!account.enabled) return fail("Account disabled. Contact your administrator.");
    if (!account.password_hash) {
      log.warn(`login for ${account.username} refused: no password hash on record`);
      return fail("Password reset required. Contact your administrator.");
    }
    if (!(await verifyPassword(p, account.password_hash))) return fail("Incorrect password");

    return ok(toAccountView(account));
  }

  async createUser(input: CreateUserInput): Promise<Result<AccountView>> {
    const username = String(input.username ?? "").trim();
    const password = String(input.password ?? "").trim();
    if (!username) return fail("Username is required", "INVALID");
    if (!password) return fail("Password is required", "INVALID");

    const companyId = input.companyId ?? null;
    if (companyId !== null && !(await this.companies.exists(companyId))) {
      return fail(`Company with ID ${companyId} does not exist`, "NOT_FOUND");
    }

    const password_hash = await hashPassword(password, this.opts.bcryptRounds);
    const record: AccountRecord = {
      username,
      password_hash,
      enabled: input.enabled ?? true,
      email: String(input.email ?? "").trim(),
      tier: isTier(input.tier) ? input.tier : "Basic",
      role: isRole(input.role) ? input.role : "User",
      company_id: companyId,
      created_date: this.now().toISOString(),
      last_login: null,
    };

    const res = await this.accounts.mutate((rows) => {
      if (rows.some((a) => a.username === username)) return { value: false };
      return { records: [...rows, record], value: true };
    });
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return fail(`User '${username}' already exists`, "CONFLICT");

    log.info(`created user ${username} (${record.tier}/${record.role})`);
    return ok(toAccountView(record));
  }

  /** Scan → patch one account → save. */
  private async patch(
    username: string,
    apply: (a: AccountRecord) => AccountRecord
  ): Promise<Result<AccountView>> {
    const res = await this.accounts.mutate((rows) => {
      const idx = rows.findIndex((a) => a.username === username);
      if (idx < 0) return { value: null };
      const next = rows.slice();
      next[idx] = apply(rows[idx]);
      return { records: next, value: next[idx] };
    });
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return fail(`User '${username}' not found`, "NOT_FOUND");
    return ok(toAccountView(res.value));
  }

  updateTier(username: string, tier: string): Promise<Result<AccountView>> {
    if (!isTier(tier)) return Promise.resolve(fail(`Invalid tier '${tier}'`, "INVALID"));
    return this.patch(username, (a) => ({ ...a, tier }));
  }

  updateRole(username: string, role: string): Promise<Result<AccountView>> {
    if (!isRole(role)) return Promise.resolve(fail(`Invalid role '${role}'`, "INVALID"));
    return this.patch(username, (a) => ({ ...a, role }));
  }

  async updateCompany(username: string, companyId: number | null): Promise<Result<AccountView>> {
    if (companyId !== null && !(await this.companies.exists(companyId))) {
      return fail(`Company with ID ${companyId} does not exist`, "NOT_FOUND");
    }
    return this.patch(username, (a) => ({ ...a, company_id: companyId }));
  }

  async updatePassword(username: string, password: string): Promise<Result<AccountView>> {
    const p = String(password ?? "").trim();
    if (!p) return fail("Password is required", "INVALID");
    const password_hash = await hashPassword(p, this.opts.bcryptRounds);
    return this.patch(username, ({ password: _legacy, ...a }) => ({ ...a, password_hash }));
  }

  setEnabled(username: string, enabled: boolean): Promise<Result<AccountView>> {
    return this.patch(username, (a) => ({ ...a, enabled }));
  }

  updateLastLogin(username: string): Promise<Result<AccountView>> {
    const at = this.now().toISOString();
    return this.patch(username, (a) => ({ ...a, last_login: at }));
  }

  /** Removes the account and its post counters. Posts stay (they only reference the username). */
  async deleteUser(username: string): Promise<Result<undefined>> {
    const res = await this.accounts.mutate((rows) => {
      const next = rows.filter((a) => a.username !== username);
      return next.length === rows.length ? { value: false } : { records: next, value: true };
    });
    if (!res.ok) return fail(res.message, "STORAGE");
    if (!res.value) return fail(`User '${username}' not found`, "NOT_FOUND");

    const stats = await this.stats.mutate((rows) => {
      const next = rows.filter((s) => s.user_id !== username);
      return next.length === rows.length ? { value: undefined } : { records: next, value: undefined };
    });
    if (!stats.ok) log.warn(`stats for ${username} not removed: ${stats.message}`);

    log.info(`deleted user ${username}`);
    return ok(undefined);
  }

  async getUser(username: string): Promise<AccountView | null> {
    const found = (await this.accounts.all()).find((a) => a.username === username);
    return found ? toAccountView(found) : null;
  }

  async exists(username: string): Promise<boolean> {
    return (await this.getUser(username)) !== null;
  }

  async listUsers(): Promise<AccountView[]> {
    return (await this.accounts.all()).map(toAccountView);
  }
}
