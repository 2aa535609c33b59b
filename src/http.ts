// src/http.ts
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { HttpError, errorMessage, statusForFailure, type Result } from "./errors";
import type { SessionClaims, SessionScope, SessionSigner } from "./session";
import { createLogger } from "./log";

const log = createLogger("http");

/** Express 4 does not await handlers; rejections are forwarded to the error handler. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function sendError(res: Response, status: number, error: string, extra: Record<string, unknown> = {}) {
  return res.status(status).json({ ok: false, error, ...extra });
}

/** Sends `{ok: true, ...body(value)}` or the failure mapped to its HTTP status. */
export function sendResult<T>(
  res: Response,
  result: Result<T>,
  body: (value: T) => Record<string, unknown>,
  status = 200
) {
  if (!result.ok) return sendError(res, statusForFailure(result.code), result.message);
  return res.status(status).json({ ok: true, ...body(result.value) });
}

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new HttpError(400, issues.join("; "));
  }
  return parsed.data;
}

export function queryString(req: Request, key: string): string | undefined {
  const v = req.query[key];
  return typeof v === "string" ? v : undefined;
}

export function intParam(req: Request, key: string): number {
  const raw = req.params[key] ?? "";
  if (!/^\d+$/.test(raw)) throw new HttpError(400, `${key} must be a positive integer`);
  return Number(raw);
}

// ===== Sessions =====

const sessions = new WeakMap<Request, SessionClaims>();

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization ?? "";
  const m = /^Bearer\s+(.+)$/i.exec(header);
  return m ? m[1].trim() : null;
}

export function requireSession(signer: SessionSigner, scope: SessionScope): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) return sendError(res, 401, "missing_token");
    const claims = signer.verify(token);
    if (!claims) return sendError(res, 401, "invalid_token");
    if (claims.scope !== scope) return sendError(res, 403, "forbidden");
    sessions.set(req, claims);
    next();
  };
}

export function sessionOf(req: Request): SessionClaims {
  const claims = sessions.get(req);
  if (!claims) throw new HttpError(401, "missing_token");
  return claims;
}

// ===== Errors =====

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) return next(err);
  if (err instanceof HttpError) return sendError(res, err.status, err.message);
  if (isBodyParseError(err)) return sendError(res, 400, "invalid_json");
  log.error(`${req.method} ${req.path} failed`, errorMessage(err));
  return sendError(res, 500, "internal_error");
};
