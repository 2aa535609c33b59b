// src/userRoute.ts
import { Router } from "express";
import { z } from "zod";
import type { AppServices } from "./services";
import { asyncRoute, parseBody, queryString, requireSession, sendError, sessionOf } from "./http";
import { formCatalog } from "./templates";
import { runGeneratePostV1, type FailureReason } from "./workflows/generate_post_v1";
import { exportPosts, fileStamp, isExportFormat } from "./exporter";
import { isActive } from "./companies";
import { createLogger } from "./log";

const log = createLogger("user");

const LoginBody = z.object({
  username: z.string().default(""),
  password: z.string().default(""),
});

const SignupBody = z.object({
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
  email: z.string().trim().default(""),
});

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).default(10),
});

const WORKFLOW_STATUS: Record<FailureReason, number> = {
  invalid_input: 400,
  unknown_user: 404,
  account_disabled: 403,
  subscription_inactive: 402,
  generation_failed: 502,
  save_failed: 500,
};

export function createUserRouter(s: AppServices): Router {
  const router = Router();
  const auth = requireSession(s.signer, "user");

  router.get("/healthz", (_req, res) => res.send("ok"));

  router.post(
    "/v1/auth/login",
    asyncRoute(async (req, res) => {
      const { username, password } = parseBody(LoginBody, req.body);
      const result = await s.accounts.authenticate(username, password);
      if (!result.ok) {
        const status = result.code === "STORAGE" ? 500 : result.code === "INVALID" ? 400 : 401;
        return sendError(res, status, result.message);
      }
      const user = result.value;
      const touched = await s.accounts.updateLastLogin(user.username);
      if (!touched.ok) log.warn(`last login for ${user.username} not recorded: ${touched.message}`);
      log.info(`login ${user.username}`);
      return res.json({
        ok: true,
        token: s.signer.issue(user.username, "user"),
        user: touched.ok ? touched.value : user,
      });
    })
  );

  router.post(
    "/v1/auth/signup",
    asyncRoute(async (req, res) => {
      if (!s.config.allowSignup) return sendError(res, 403, "signup_disabled");
      const body = parseBody(SignupBody, req.body);
      const created = await s.accounts.createUser({ ...body, tier: "Basic", role: "User" });
      if (!created.ok) return sendError(res, created.code === "CONFLICT" ? 409 : 400, created.message);
      return res.status(201).json({
        ok: true,
        token: s.signer.issue(created.value.username, "user"),
        user: created.value,
      });
    })
  );

  router.get(
    "/v1/me",
    auth,
    asyncRoute(async (req, res) => {
      const { sub } = sessionOf(req);
      const user = await s.accounts.getUser(sub);
      if (!user) return sendError(res, 404, `User '${sub}' not found`);
      const company = user.company_id === null ? null : await s.companies.get(user.company_id);
      return res.json({
        ok: true,
        user,
        company: company
          ? {
              id: company.id,
              name: company.name,
              subscription_type: company.subscription_type,
              expiration_date: company.expiration_date,
              active: isActive(company, s.now()),
            }
          : null,
      });
    })
  );

  router.get(
    "/v1/branding",
    auth,
    asyncRoute(async (req, res) => {
      const user = await s.accounts.getUser(sessionOf(req).sub);
      const companyId = user ? user.company_id : null;
      const company = companyId === null ? null : await s.companies.get(companyId);
      return res.json({ ok: true, branding: await s.configStore.brandingFor(company) });
    })
  );

  router.get("/v1/templates", auth, (_req, res) => res.json({ ok: true, ...formCatalog() }));

  router.post(
    "/v1/posts/generate",
    auth,
    asyncRoute(async (req, res) => {
      const out = await runGeneratePostV1(s, sessionOf(req).sub, req.body);
      if (out.status === "FAILED") {
        return res.status(WORKFLOW_STATUS[out.reason]).json({ ok: false, ...out });
      }
      return res.json({ ok: true, id: out.outputs.post_id, ...out });
    })
  );

  router.get(
    "/v1/posts/history",
    auth,
    asyncRoute(async (req, res) => {
      const { limit } = parseBody(HistoryQuery, { limit: queryString(req, "limit") });
      const posts = await s.posts.listForUser(sessionOf(req).sub, limit);
      return res.json({ ok: true, posts });
    })
  );

  router.get(
    "/v1/posts/stats",
    auth,
    asyncRoute(async (req, res) => {
      return res.json({ ok: true, stats: await s.posts.stats(sessionOf(req).sub) });
    })
  );

  router.get(
    "/v1/posts/history/export",
    auth,
    asyncRoute(async (req, res) => {
      const format = queryString(req, "format") ?? "json";
      if (!isExportFormat(format)) return sendError(res, 400, `Unsupported export format '${format}'`);
      const posts = await s.posts.listForUser(sessionOf(req).sub);
      const file = exportPosts(posts, format, fileStamp(s.now()));
      res.setHeader("Content-Type", file.contentType);
      res.setHeader("Content-Disposition", `attachment; filename="${file.filename}"`);
      return res.send(file.body);
    })
  );

  return router;
}
