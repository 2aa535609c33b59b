// src/adminRoute.ts
import { Router } from "express";
import { z } from "zod";
import type { AppServices } from "./services";
import {
  asyncRoute,
  intParam,
  parseBody,
  queryString,
  requireSession,
  sendError,
  sendResult,
} from "./http";
import { safeEqual } from "./password";
import { isActive } from "./companies";
import { postsToCsv, fileStamp } from "./exporter";
import { ROLES, SUBSCRIPTION_TYPES, TIERS, type CompanyRecord } from "./records";
import type { DateRange } from "./posts";
import type { Result } from "./errors";
import { createLogger } from "./log";

const log = createLogger("admin");

const ADMIN_SUBJECT = "admin";

const LoginBody = z.object({ password: z.string().default("") });

const CreateUserBody = z.object({
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
  email: z.string().trim().optional(),
  tier: z.enum(TIERS).optional(),
  role: z.enum(ROLES).optional(),
  company_id: z.number().int().nullable().optional(),
  enabled: z.boolean().optional(),
});

const PatchUserBody = z.object({
  tier: z.enum(TIERS).optional(),
  role: z.enum(ROLES).optional(),
  company_id: z.number().int().nullable().optional(),
  password: z.string().trim().min(1, "Password is required").optional(),
  enabled: z.boolean().optional(),
});

const CreateCompanyBody = z.object({
  name: z.string().trim().min(1, "Company name is required"),
  subscription_type: z.enum(SUBSCRIPTION_TYPES),
  start_date: z.string().optional(),
  expiration_date: z.string().optional(),
});

const PatchCompanyBody = z.object({
  subscription_type: z.enum(SUBSCRIPTION_TYPES).optional(),
  start_date: z.string().optional(),
  expiration_date: z.string().optional(),
  enabled: z.boolean().optional(),
  logo_path: z.string().nullable().optional(),
  background_color: z.string().nullable().optional(),
  button_color: z.string().nullable().optional(),
});

const PostsQuery = z.object({
  user: z.string().optional(),
  goal: z.string().optional(),
  range: z.enum(["all", "7d", "30d"]).default("all"),
});

const ConfigBody = z.object({
  customer_name: z.string().optional(),
  background_color: z.string().optional(),
  button_color: z.string().optional(),
  logo_path: z.string().optional(),
});

export function createAdminRouter(s: AppServices): Router {
  const router = Router();

  const companyView = (c: CompanyRecord) => ({ ...c, active: isActive(c, s.now()) });

  router.post(
    "/login",
    asyncRoute(async (req, res) => {
      const expected = s.config.adminPassword;
      if (!expected) return sendError(res, 403, "Admin login is disabled");
      const { password } = parseBody(LoginBody, req.body);
      if (!password || !safeEqual(password, expected)) {
        log.warn("admin login rejected");
        return sendError(res, 401, "Incorrect password");
      }
      return res.json({ ok: true, token: s.signer.issue(ADMIN_SUBJECT, "admin") });
    })
  );

  router.use(requireSession(s.signer, "admin"));

  router.get(
    "/dashboard",
    asyncRoute(async (_req, res) => {
      const [stats, recent] = await Promise.all([s.posts.overallStats(), s.posts.listAll(10)]);
      return res.json({ ok: true, stats, recent });
    })
  );

  // ===== Users =====

  router.get(
    "/users",
    asyncRoute(async (_req, res) => res.json({ ok: true, users: await s.accounts.listUsers() }))
  );

  router.post(
    "/users",
    asyncRoute(async (req, res) => {
      const body = parseBody(CreateUserBody, req.body);
      const created = await s.accounts.createUser({
        username: body.username,
        password: body.password,
        email: body.email,
        tier: body.tier,
        role: body.role,
        companyId: body.company_id,
        enabled: body.enabled,
      });
      return sendResult(res, created, (user) => ({ user }), 201);
    })
  );

  router.get(
    "/users/:username",
    asyncRoute(async (req, res) => {
      const user = await s.accounts.getUser(req.params.username);
      if (!user) return sendError(res, 404, `User '${req.params.username}' not found`);
      return res.json({ ok: true, user });
    })
  );

  router.patch(
    "/users/:username",
    asyncRoute(async (req, res) => {
      const { username } = req.params;
      const body = parseBody(PatchUserBody, req.body);
      const current = await s.accounts.getUser(username);
      if (!current) return sendError(res, 404, `User '${username}' not found`);

      // a missing company rejects the whole patch
      const { tier, role, company_id, password, enabled } = body;
      if (company_id !== undefined && company_id !== null && !(await s.companies.exists(company_id))) {
        return sendError(res, 404, `Company with ID ${company_id} does not exist`);
      }

      // applied in order; the first failure stops the rest
      const steps: Array<() => Promise<Result<unknown>>> = [];
      if (tier !== undefined) steps.push(() => s.accounts.updateTier(username, tier));
      if (role !== undefined) steps.push(() => s.accounts.updateRole(username, role));
      if (company_id !== undefined) steps.push(() => s.accounts.updateCompany(username, company_id));
      if (password !== undefined) steps.push(() => s.accounts.updatePassword(username, password));
      if (enabled !== undefined) steps.push(() => s.accounts.setEnabled(username, enabled));

      for (const step of steps) {
        const r = await step();
        if (!r.ok) return sendResult(res, r, () => ({}));
      }
      const user = await s.accounts.getUser(username);
      return res.json({ ok: true, user });
    })
  );

  router.delete(
    "/users/:username",
    asyncRoute(async (req, res) => {
      const r = await s.accounts.deleteUser(req.params.username);
      if (r.ok) log.info(`user ${req.params.username} deleted by admin`);
      return sendResult(res, r, () => ({ deleted: req.params.username }));
    })
  );

  router.get(
    "/users/:username/stats",
    asyncRoute(async (req, res) => {
      const { username } = req.params;
      if (!(await s.accounts.exists(username))) return sendError(res, 404, `User '${username}' not found`);
      return res.json({ ok: true, stats: await s.posts.stats(username) });
    })
  );

  router.get(
    "/user-stats",
    asyncRoute(async (_req, res) => res.json({ ok: true, ...(await s.posts.userStats()) }))
  );

  // ===== Companies =====

  router.get(
    "/companies",
    asyncRoute(async (_req, res) => {
      const companies = await s.companies.listAll();
      return res.json({ ok: true, companies: companies.map(companyView) });
    })
  );

  router.post(
    "/companies",
    asyncRoute(async (req, res) => {
      const body = parseBody(CreateCompanyBody, req.body);
      const created = await s.companies.create(body.name, body.subscription_type, body.start_date, body.expiration_date);
      if (!created.ok) return sendResult(res, created, () => ({}));
      const company = await s.companies.get(created.value);
      return res.status(201).json({ ok: true, id: created.value, company: company ? companyView(company) : null });
    })
  );

  router.get(
    "/companies/:id",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      const company = await s.companies.get(id);
      if (!company) return sendError(res, 404, `Company with ID ${id} not found`);
      return res.json({ ok: true, company: companyView(company) });
    })
  );

  router.patch(
    "/companies/:id",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      const body = parseBody(PatchCompanyBody, req.body);

      if (!(await s.companies.exists(id))) return sendError(res, 404, `Company with ID ${id} not found`);

      let result: Result<CompanyRecord> = await s.companies.updateSubscription(id, {
        subscriptionType: body.subscription_type,
        startDate: body.start_date,
        expirationDate: body.expiration_date,
      });
      if (result.ok && body.enabled !== undefined) result = await s.companies.setEnabled(id, body.enabled);
      const branding = {
        logo_path: body.logo_path,
        background_color: body.background_color,
        button_color: body.button_color,
      };
      if (result.ok && Object.values(branding).some((v) => v !== undefined)) {
        result = await s.companies.updateBranding(id, branding);
      }
      return sendResult(res, result, (company) => ({ company: companyView(company) }));
    })
  );

  router.delete(
    "/companies/:id",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      const r = await s.companies.delete(id);
      return sendResult(res, r, ({ detachedUsers }) => ({ deleted: id, detached_users: detachedUsers }));
    })
  );

  router.get(
    "/companies/:id/users",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      if (!(await s.companies.exists(id))) return sendError(res, 404, `Company with ID ${id} not found`);
      return res.json({ ok: true, users: await s.companies.listUsersOf(id) });
    })
  );

  // ===== Posts =====

  router.get(
    "/posts",
    asyncRoute(async (req, res) => {
      const q = parseBody(PostsQuery, {
        user: queryString(req, "user") || undefined,
        goal: queryString(req, "goal") || undefined,
        range: queryString(req, "range") || undefined,
      });
      const range: DateRange = q.range;
      const posts = await s.posts.filter({ userId: q.user, goal: q.goal, range });
      return res.json({ ok: true, posts });
    })
  );

  router.get(
    "/posts/:id",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      const post = await s.posts.get(id);
      if (!post) return sendError(res, 404, `Post ${id} not found`);
      return res.json({ ok: true, post });
    })
  );

  router.delete(
    "/posts/:id",
    asyncRoute(async (req, res) => {
      const id = intParam(req, "id");
      if (!(await s.posts.get(id))) return sendError(res, 404, `Post ${id} not found`);
      if (!(await s.posts.delete(id))) return sendError(res, 500, `Could not delete post ${id}`);
      return res.json({ ok: true, deleted: id });
    })
  );

  // ===== Analytics =====

  router.get(
    "/analytics",
    asyncRoute(async (_req, res) => {
      const { allRecords, ...counts } = await s.posts.analytics();
      return res.json({ ok: true, total: allRecords.length, ...counts });
    })
  );

  router.get(
    "/analytics/export.csv",
    asyncRoute(async (_req, res) => {
      const { allRecords } = await s.posts.analytics();
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="analytics_${fileStamp(s.now())}.csv"`);
      return res.send(postsToCsv(allRecords));
    })
  );

  // ===== Customer config =====

  router.get(
    "/config",
    asyncRoute(async (_req, res) => res.json({ ok: true, config: await s.configStore.load() }))
  );

  router.put(
    "/config",
    asyncRoute(async (req, res) => {
      const body = parseBody(ConfigBody, req.body);
      if (!(await s.configStore.save(body))) return sendError(res, 500, "Could not save configuration");
      log.info("customer config updated");
      return res.json({ ok: true, config: await s.configStore.load() });
    })
  );

  return router;
}
