// src/config.ts
import crypto from "crypto";
import path from "path";
import { z } from "zod";

const bool = z
  .string()
  .optional()
  .transform((v) => ["1", "true", "yes", "on"].includes(String(v ?? "").trim().toLowerCase()));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  DATA_DIR: z.string().default("./data"),
  STORE_BACKEND: z.enum(["file", "postgres"]).default("file"),
  DATABASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  ADMIN_PASSWORD: z.string().optional(),
  JWT_SECRET: z.string().optional(),
  JWT_EXPIRES_IN: z.string().default("8h"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  ALLOW_SIGNUP: bool,
  CONFIG_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60_000),
});

export type AppConfig = {
  port: number;
  dataDir: string;
  storeBackend: "file" | "postgres";
  databaseUrl?: string;
  openai: { apiKey?: string; model: string; timeoutMs: number; maxRetries: number };
  adminPassword?: string;
  jwt: { secret: string; expiresIn: string };
  bcryptRounds: number;
  allowSignup: boolean;
  configCacheTtlMs: number;
};

/**
 * Reads the process environment into a typed config.
 * Throws on malformed values (e.g. PORT=abc) so the server never starts half-configured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid_config: ${issues}`);
  }
  const e = parsed.data;

  let secret = e.JWT_SECRET?.trim();
  if (!secret) {
    console.warn("[config] JWT_SECRET not set, sessions will not survive a restart");
    secret = crypto.randomBytes(32).toString("hex");
  }
  if (!e.ADMIN_PASSWORD?.trim()) {
    console.warn("[config] ADMIN_PASSWORD not set, admin login is disabled");
  }

  return {
    port: e.PORT,
    dataDir: path.resolve(e.DATA_DIR),
    storeBackend: e.STORE_BACKEND,
    databaseUrl: e.DATABASE_URL,
    openai: {
      apiKey: e.OPENAI_API_KEY?.trim() || undefined,
      model: e.OPENAI_MODEL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
      maxRetries: e.OPENAI_MAX_RETRIES,
    },
    adminPassword: e.ADMIN_PASSWORD?.trim() || undefined,
    jwt: { secret, expiresIn: e.JWT_EXPIRES_IN },
    bcryptRounds: e.BCRYPT_ROUNDS,
    allowSignup: e.ALLOW_SIGNUP,
    configCacheTtlMs: e.CONFIG_CACHE_TTL_MS,
  };
}
