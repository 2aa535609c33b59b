// src/session.ts
import jwt from "jsonwebtoken";
import { z } from "zod";

export type SessionScope = "user" | "admin";

export type SessionClaims = { sub: string; scope: SessionScope };

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  scope: z.enum(["user", "admin"]),
});

const ISSUER = "linkedin-post-studio";

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** "90", "30m", "8h", "7d" → seconds. */
export function parseDurationSeconds(input: string): number {
  const m = /^(\d+)\s*([smhd]?)$/.exec(input.trim());
  if (!m) throw new Error(`invalid duration: ${input}`);
  return Number(m[1]) * (UNIT_SECONDS[m[2] || "s"] ?? 1);
}

export class SessionSigner {
  private readonly ttlSeconds: number;

  constructor(private readonly secret: string, expiresIn: string) {
    this.ttlSeconds = parseDurationSeconds(expiresIn);
  }

  issue(sub: string, scope: SessionScope): string {
    return jwt.sign({ scope }, this.secret, { subject: sub, expiresIn: this.ttlSeconds, issuer: ISSUER });
  }

  verify(token: string): SessionClaims | null {
    try {
      const decoded = jwt.verify(token, this.secret, { issuer: ISSUER });
      const parsed = ClaimsSchema.safeParse(decoded);
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
