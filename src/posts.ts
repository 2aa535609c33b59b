// src/posts.ts
import { Collection, allocateId } from "./repo/collection";
import type { RecordStore } from "./repo/recordStore";
import { PostRecord, UserStatsRecord } from "./records";
import { fail, ok, type Result } from "./errors";
import { createLogger } from "./log";

const log = createLogger("posts");

const DAY_MS = 24 * 60 * 60 * 1000;

export type NewPost = Omit<PostRecord, "id" | "user_id" | "date">;

/** Explicit foreign key check from posts/stats to accounts. */
export interface AccountDirectory {
  exists(username: string): Promise<boolean>;
  listUsers(): Promise<unknown[]>;
}

export type DateRange = "all" | "7d" | "30d";

export type PostFilter = { userId?: string; goal?: string; range?: DateRange };

export type PostStats = { totalPosts: number; postsToday: number; postsWeek: number };

export type OverallStats = PostStats & { totalUsers: number };

export type PostAnalytics = {
  countsByGoal: Record<string, number>;
  countsByLength: Record<string, number>;
  countsByTemplate: Record<string, number>;
  countsByDay: Record<string, number>;
  allRecords: PostRecord[];
};

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

function parseDate(s: string): Date | null {
  const d = new Date(s);
  return Number.isNaN(d.getTime()) ? null : d;
}

/** Local calendar day as YYYY-MM-DD. */
export function dayKey(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${mm}-${dd}`;
}

function newestFirst(a: PostRecord, b: PostRecord): number {
  if (a.date === b.date) return b.id - a.id;
  return a.date < b.date ? 1 : -1;
}

function bump(counts: Record<string, number>, key: string | undefined) {
  const k = key && key.trim() ? key : "Unknown";
  counts[k] = (counts[k] ?? 0) + 1;
}

export class PostService {
  readonly posts: Collection<PostRecord>;
  private readonly userStatsRows: Collection<UserStatsRecord>;

  constructor(
    private readonly store: RecordStore,
    private readonly accounts: AccountDirectory,
    private readonly opts: { now?: () => Date } = {}
  ) {
    this.posts = new Collection(store, "posts", PostRecord);
    this.userStatsRows = new Collection(store, "users", UserStatsRecord);
  }

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  async create(userId: string, fields: NewPost): Promise<Result<PostRecord>> {
    if (!(await this.accounts.exists(userId))) return fail(`User '${userId}' not found`, "NOT_FOUND");

    const date = this.now().toISOString();
    // the sequence bump takes its own store lock, so it runs before the posts update
    const id = await allocateId(this.store, "posts", (await this.posts.all()).map((p) => p.id));
    if (!id.ok) return fail(id.message, "STORAGE");
    const record: PostRecord = { ...fields, id: id.value, user_id: userId, date };
    const res = await this.posts.mutate((rows) => ({ records: [...rows, record], value: record }));
    if (!res.ok) return fail(res.message, "STORAGE");

    const counted = await this.userStatsRows.mutate((rows) => {
      const idx = rows.findIndex((s) => s.user_id === userId);
      if (idx < 0) {
        return {
          records: [...rows, { user_id: userId, post_count: 1, created_date: date, last_post_date: date }],
          value: 1,
        };
      }
      const next = rows.slice();
      next[idx] = { ...rows[idx], post_count: rows[idx].post_count + 1, last_post_date: date };
      return { records: next, value: next[idx].post_count };
    });
    if (!counted.ok) log.warn(`post ${record.id} saved but stats not updated: ${counted.message}`);

    return ok(record);
  }

  async listAll(limit?: number): Promise<PostRecord[]> {
    const sorted = (await this.posts.all()).sort(newestFirst);
    return limit === undefined ? sorted : sorted.slice(0, limit);
  }

  async listForUser(userId: string, limit?: number): Promise<PostRecord[]> {
    const sorted = (await this.posts.all()).filter((p) => p.user_id === userId).sort(newestFirst);
    return limit === undefined ? sorted : sorted.slice(0, limit);
  }

  /** Admin post-management filters. Ranges keep posts strictly newer than now − N days. */
  async filter(f: PostFilter): Promise<PostRecord[]> {
    let out = await this.listAll();
    if (f.userId) out = out.filter((p) => p.user_id === f.userId);
    if (f.goal) out = out.filter((p) => p.post_goal === f.goal);
    if (f.range && f.range !== "all") {
      const days = f.range === "7d" ? 7 : 30;
      const cutoff = this.now().getTime() - days * DAY_MS;
      out = out.filter((p) => {
        const d = parseDate(p.date);
        return d !== null && d.getTime() > cutoff;
      });
    }
    return out;
  }

  async get(id: number): Promise<PostRecord | null> {
    return (await this.posts.all()).find((p) => p.id === id) ?? null;
  }

  /** Removes the first post with `id`. An unknown id is not an error. */
  async delete(id: number): Promise<boolean> {
    const res = await this.posts.mutate((rows) => {
      const idx = rows.findIndex((p) => p.id === id);
      const next = idx < 0 ? rows : [...rows.slice(0, idx), ...rows.slice(idx + 1)];
      return { records: next, value: idx >= 0 };
    });
    if (res.ok && res.value) log.info(`deleted post ${id}`);
    return res.ok;
  }

  private countWindows(posts: PostRecord[]): PostStats {
    const today = startOfDay(this.now());
    const weekAgo = new Date(today);
    weekAgo.setDate(today.getDate() - 7);

    let postsToday = 0;
    let postsWeek = 0;
    for (const p of posts) {
      const d = parseDate(p.date);
      if (!d) continue;
      const day = startOfDay(d);
      if (day.getTime() === today.getTime()) postsToday += 1;
      if (day.getTime() >= weekAgo.getTime()) postsWeek += 1;
    }
    return { totalPosts: posts.length, postsToday, postsWeek };
  }

  async stats(userId: string): Promise<PostStats> {
    const posts = (await this.posts.all()).filter((p) => p.user_id === userId);
    return this.countWindows(posts);
  }

  async overallStats(): Promise<OverallStats> {
    const [posts, users] = await Promise.all([this.posts.all(), this.accounts.listUsers()]);
    return { totalUsers: users.length, ...this.countWindows(posts) };
  }

  async analytics(): Promise<PostAnalytics> {
    const allRecords = await this.listAll();
    const out: PostAnalytics = {
      countsByGoal: {},
      countsByLength: {},
      countsByTemplate: {},
      countsByDay: {},
      allRecords,
    };
    for (const p of allRecords) {
      bump(out.countsByGoal, p.post_goal);
      bump(out.countsByLength, p.post_length);
      bump(out.countsByTemplate, p.template_type);
      const d = parseDate(p.date);
      if (d) bump(out.countsByDay, dayKey(d));
    }
    return out;
  }

  /** Stats rows with post_count recomputed from the posts themselves. */
  async userStats(): Promise<{ users: UserStatsRecord[]; activeUsers: number }> {
    const [rows, posts] = await Promise.all([this.userStatsRows.all(), this.posts.all()]);
    const counts = new Map<string, number>();
    for (const p of posts) counts.set(p.user_id, (counts.get(p.user_id) ?? 0) + 1);
    const users = rows.map((s) => ({ ...s, post_count: counts.get(s.user_id) ?? 0 }));
    return { users, activeUsers: users.filter((u) => u.post_count > 0).length };
  }
}
