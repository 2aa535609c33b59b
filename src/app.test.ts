import { once } from "events";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { buildServices, type AppServices } from "./services";
import { FakeCompletionClient, fixedClock, makeTempDir, removeDir } from "./testing/fixtures";

const NOW = new Date(2026, 2, 10, 12);

const TokenBody = z.object({ token: z.string() });

type Reply = { status: number; body: unknown; headers: Headers };

const FORM = {
  topic: "AI in Healthcare",
  purpose: "Raise awareness",
  audience: "Healthcare Professionals",
  message: "AI supports clinicians",
  post_length: "Short",
};

describe("HTTP routes", () => {
  let dir: string;
  let server: Server | undefined;
  let baseUrl: string;
  let client: FakeCompletionClient;
  let services: AppServices;

  async function start(env: Record<string, string>) {
    services = buildServices(
      loadConfig({ DATA_DIR: dir, JWT_SECRET: "test-secret", BCRYPT_ROUNDS: "4", ...env }),
      { completionClient: client, now: fixedClock(NOW).now }
    );
    const srv = createApp(services).listen(0);
    server = srv;
    await once(srv, "listening");
    const addr = srv.address();
    if (addr === null || typeof addr === "string") throw new Error("expected a TCP address");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  }

  async function call(method: string, path: string, opts: { token?: string; body?: unknown; raw?: string } = {}): Promise<Reply> {
    const headers: Record<string, string> = {};
    if (opts.token) headers.authorization = `Bearer ${opts.token}`;
    let payload: string | undefined;
    if (opts.raw !== undefined || opts.body !== undefined) {
      headers["content-type"] = "application/json";
      payload = opts.raw ?? JSON.stringify(opts.body);
    }
    const res = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
    const text = await res.text();
    const isJson = (res.headers.get("content-type") ?? "").includes("application/json");
    return { status: res.status, body: isJson ? JSON.parse(text) : text, headers: res.headers };
  }

  async function adminToken(): Promise<string> {
    const res = await call("POST", "/v1/admin/login", { body: { password: "test-admin" } });
    return TokenBody.parse(res.body).token;
  }

  async function userToken(username: string, password: string): Promise<string> {
    const res = await call("POST", "/v1/auth/login", { body: { username, password } });
    return TokenBody.parse(res.body).token;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    client = new FakeCompletionClient("Healthcare teams are adopting AI. Here is what that means for patients.");
  });

  afterEach(async () => {
    const srv = server;
    server = undefined;
    if (srv) {
      srv.closeAllConnections();
      await new Promise<void>((resolve, reject) => srv.close((err) => (err ? reject(err) : resolve())));
    }
    await removeDir(dir);
  });

  it("answers the health check", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    const res = await call("GET", "/healthz");
    expect(res.status).toBe(200);
    expect(res.body).toBe("ok");
  });

  it("runs the admin → user → generate → history flow", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    const admin = await adminToken();

    const company = await call("POST", "/v1/admin/companies", {
      token: admin,
      body: { name: "Acme", subscription_type: "monthly" },
    });
    expect(company.status).toBe(201);
    expect(company.body).toMatchObject({ ok: true, id: 1, company: { name: "Acme", active: true } });

    const user = await call("POST", "/v1/admin/users", {
      token: admin,
      body: { username: "Alice", password: "test-password", company_id: 1, tier: "Premium" },
    });
    expect(user.status).toBe(201);
    expect(user.body).toMatchObject({ ok: true, user: { username: "Alice", tier: "Premium", company_id: 1 } });

    const login = await call("POST", "/v1/auth/login", { body: { username: "alice", password: "test-password" } });
    expect(login.status).toBe(200);
    expect(login.body).toMatchObject({ ok: true, user: { username: "Alice", last_login: NOW.toISOString() } });
    const token = TokenBody.parse(login.body).token;

    const me = await call("GET", "/v1/me", { token });
    expect(me.body).toMatchObject({ ok: true, user: { username: "Alice" }, company: { id: 1, active: true } });

    const generated = await call("POST", "/v1/posts/generate", { token, body: FORM });
    expect(generated.status).toBe(200);
    expect(generated.body).toMatchObject({
      ok: true,
      status: "SUCCEEDED",
      outputs: { post_id: 1, truncated: false },
    });
    expect(client.calls).toHaveLength(1);

    const history = await call("GET", "/v1/posts/history", { token });
    expect(history.body).toMatchObject({ ok: true, posts: [{ id: 1, user_id: "Alice", post_length: "Short" }] });
    expect((await call("GET", "/v1/posts/history?limit=0", { token })).status).toBe(400);

    const stats = await call("GET", "/v1/posts/stats", { token });
    expect(stats.body).toEqual({ ok: true, stats: { totalPosts: 1, postsToday: 1, postsWeek: 1 } });

    const csv = await call("GET", "/v1/posts/history/export?format=csv", { token });
    expect(csv.status).toBe(200);
    expect(csv.headers.get("content-disposition")).toBe('attachment; filename="linkedin_posts_20260310_120000.csv"');
    expect(String(csv.body).split("\r\n")[0].startsWith("id,user_id,date,topic")).toBe(true);

    const dashboard = await call("GET", "/v1/admin/dashboard", { token: admin });
    expect(dashboard.body).toMatchObject({
      ok: true,
      stats: { totalUsers: 1, totalPosts: 1, postsToday: 1, postsWeek: 1 },
      recent: [{ id: 1 }],
    });
  });

  it("enforces bearer tokens and scopes", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    expect(await call("GET", "/v1/me")).toMatchObject({ status: 401, body: { ok: false, error: "missing_token" } });
    expect(await call("GET", "/v1/me", { token: "garbage" })).toMatchObject({
      status: 401,
      body: { error: "invalid_token" },
    });

    const admin = await adminToken();
    expect((await call("GET", "/v1/me", { token: admin })).status).toBe(403);

    await services.accounts.createUser({ username: "bob", password: "test-password" });
    const user = await userToken("bob", "test-password");
    expect((await call("GET", "/v1/admin/users", { token: user })).status).toBe(403);
  });

  it("rejects bad credentials", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    expect(await call("POST", "/v1/admin/login", { body: { password: "nope" } })).toMatchObject({
      status: 401,
      body: { ok: false, error: "Incorrect password" },
    });

    await services.accounts.createUser({ username: "bob", password: "test-password" });
    expect(await call("POST", "/v1/auth/login", { body: { username: "bob", password: "wrong" } })).toMatchObject({
      status: 401,
      body: { error: "Incorrect password" },
    });
    expect(await call("POST", "/v1/auth/login", { body: { username: "", password: "" } })).toMatchObject({
      status: 400,
      body: { error: "Username and password are required" },
    });
  });

  it("disables admin login without a configured password", async () => {
    await start({});
    expect(await call("POST", "/v1/admin/login", { body: { password: "" } })).toMatchObject({
      status: 403,
      body: { error: "Admin login is disabled" },
    });
  });

  it("blocks generation for a lapsed company subscription", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    const admin = await adminToken();
    await call("POST", "/v1/admin/companies", { token: admin, body: { name: "Acme", subscription_type: "monthly" } });
    await services.accounts.createUser({ username: "bob", password: "test-password", companyId: 1 });

    const patched = await call("PATCH", "/v1/admin/companies/1", {
      token: admin,
      body: { expiration_date: "2020-01-01T00:00:00.000Z" },
    });
    expect(patched.body).toMatchObject({ ok: true, company: { active: false } });

    const token = await userToken("bob", "test-password");
    const res = await call("POST", "/v1/posts/generate", { token, body: FORM });
    expect(res.status).toBe(402);
    expect(res.body).toMatchObject({ ok: false, reason: "subscription_inactive" });
    expect(client.calls).toHaveLength(0);
  });

  it("maps generation failures to 502 and form errors to 400", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    await services.accounts.createUser({ username: "bob", password: "test-password" });
    const token = await userToken("bob", "test-password");

    const missing = await call("POST", "/v1/posts/generate", { token, body: { topic: "Only a topic" } });
    expect(missing.status).toBe(400);

    client.respondWith(new Error("network down"));
    const failed = await call("POST", "/v1/posts/generate", { token, body: FORM });
    expect(failed.status).toBe(502);
    expect(failed.body).toMatchObject({ ok: false, reason: "generation_failed", failure: { kind: "unexpected" } });
  });

  it("signs up only when allowed and reports duplicates", async () => {
    await start({ ALLOW_SIGNUP: "true" });
    const created = await call("POST", "/v1/auth/signup", { body: { username: "carol", password: "test-password" } });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ ok: true, user: { username: "carol", tier: "Basic", role: "User" } });

    const dup = await call("POST", "/v1/auth/signup", { body: { username: "carol", password: "test-password" } });
    expect(dup).toMatchObject({ status: 409, body: { error: "User 'carol' already exists" } });
  });

  it("refuses signup when it is disabled", async () => {
    await start({});
    const res = await call("POST", "/v1/auth/signup", { body: { username: "carol", password: "test-password" } });
    expect(res).toMatchObject({ status: 403, body: { error: "signup_disabled" } });
  });

  it("manages companies, users and posts from the admin routes", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    const admin = await adminToken();
    await call("POST", "/v1/admin/companies", { token: admin, body: { name: "Acme", subscription_type: "annual" } });
    await call("POST", "/v1/admin/users", {
      token: admin,
      body: { username: "bob", password: "test-password", company_id: 1 },
    });

    const dupCompany = await call("POST", "/v1/admin/companies", {
      token: admin,
      body: { name: "acme", subscription_type: "monthly" },
    });
    expect(dupCompany).toMatchObject({ status: 409, body: { error: "Company 'acme' already exists" } });

    const patched = await call("PATCH", "/v1/admin/users/bob", { token: admin, body: { role: "Viewer", enabled: false } });
    expect(patched.body).toMatchObject({ ok: true, user: { role: "Viewer", enabled: false } });
    expect((await call("PATCH", "/v1/admin/users/ghost", { token: admin, body: {} })).status).toBe(404);
    expect((await call("PATCH", "/v1/admin/users/bob", { token: admin, body: { tier: "Gold" } })).status).toBe(400);

    const badCompany = await call("PATCH", "/v1/admin/users/bob", {
      token: admin,
      body: { role: "Admin", company_id: 99 },
    });
    expect(badCompany).toMatchObject({ status: 404, body: { error: "Company with ID 99 does not exist" } });
    expect((await call("GET", "/v1/admin/users/bob", { token: admin })).body).toMatchObject({
      user: { role: "Viewer", company_id: 1 },
    });

    expect(await call("DELETE", "/v1/admin/companies/1", { token: admin })).toMatchObject({
      status: 200,
      body: { ok: true, deleted: 1, detached_users: 1 },
    });
    expect(await call("DELETE", "/v1/admin/companies/1", { token: admin })).toMatchObject({
      status: 404,
      body: { error: "Company with ID 1 not found" },
    });
    expect((await call("GET", "/v1/admin/companies/abc", { token: admin })).status).toBe(400);

    expect((await call("GET", "/v1/admin/posts?range=forever", { token: admin })).status).toBe(400);
    expect((await call("DELETE", "/v1/admin/posts/5", { token: admin })).status).toBe(404);
  });

  it("reads and replaces the customer config", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    const admin = await adminToken();
    const put = await call("PUT", "/v1/admin/config", { token: admin, body: { customer_name: "Acme Studio" } });
    expect(put.body).toMatchObject({ ok: true, config: { customer_name: "Acme Studio", button_color: "#17A2B8" } });

    await services.accounts.createUser({ username: "bob", password: "test-password" });
    const token = await userToken("bob", "test-password");
    expect(await call("GET", "/v1/branding", { token })).toMatchObject({
      status: 200,
      body: { branding: { customer_name: "Acme Studio" } },
    });
  });

  it("answers malformed JSON and unknown routes with JSON errors", async () => {
    await start({ ADMIN_PASSWORD: "test-admin" });
    expect(await call("POST", "/v1/auth/login", { raw: "{oops" })).toMatchObject({
      status: 400,
      body: { ok: false, error: "invalid_json" },
    });
    expect(await call("GET", "/v2/nothing")).toMatchObject({ status: 404, body: { ok: false } });
  });
});
