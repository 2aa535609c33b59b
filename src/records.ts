// src/records.ts
import { z } from "zod";

export const TIERS = ["Basic", "Standard", "Premium"] as const;
export const ROLES = ["Admin", "User", "Viewer"] as const;
export const SUBSCRIPTION_TYPES = ["monthly", "annual"] as const;

export type Tier = (typeof TIERS)[number];
export type Role = (typeof ROLES)[number];
export type SubscriptionType = (typeof SUBSCRIPTION_TYPES)[number];

/**
 * Account row in auth.json. Older rows may lack tier/role/company_id; they are
 * backfilled here. A legacy plaintext `password` is read but never compared.
 */
export const AccountRecord = z.object({
  username: z.string().min(1),
  password_hash: z.string().default(""),
  password: z.string().optional(),
  enabled: z.boolean().catch(true),
  email: z.string().catch(""),
  tier: z.enum(TIERS).catch("Basic"),
  role: z.enum(ROLES).catch("User"),
  company_id: z.number().int().nullable().catch(null),
  created_date: z.string().catch(""),
  last_login: z.string().nullable().catch(null),
});
export type AccountRecord = z.infer<typeof AccountRecord>;

export type AccountView = Omit<AccountRecord, "password_hash" | "password">;

export function toAccountView(a: AccountRecord): AccountView {
  const { password_hash: _hash, password: _legacy, ...view } = a;
  return view;
}

export const CompanyRecord = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  subscription_type: z.enum(SUBSCRIPTION_TYPES).catch("monthly"),
  start_date: z.string().nullable().catch(null),
  expiration_date: z.string().nullable().catch(null),
  enabled: z.boolean().catch(true),
  created_date: z.string().catch(""),
  logo_path: z.string().nullable().optional(),
  background_color: z.string().nullable().optional(),
  button_color: z.string().nullable().optional(),
});
export type CompanyRecord = z.infer<typeof CompanyRecord>;

export const PostRecord = z.object({
  id: z.number().int(),
  user_id: z.string(),
  date: z.string(),
  topic: z.string().catch(""),
  purpose: z.string().catch(""),
  audience: z.string().catch(""),
  message: z.string().catch(""),
  tone_intensity: z.string().catch(""),
  language_style: z.string().catch(""),
  post_length: z.string().catch("Unknown"),
  formatting: z.string().catch(""),
  cta: z.string().catch(""),
  post_goal: z.string().catch("Unknown"),
  template_type: z.string().optional(),
  visual_style: z.string().optional(),
  generated_post: z.string().catch(""),
  image_prompt: z.string().optional(),
});
export type PostRecord = z.infer<typeof PostRecord>;

/** Per-user post counters in users.json, keyed by account username. */
export const UserStatsRecord = z.object({
  user_id: z.string(),
  post_count: z.number().int().min(0).catch(0),
  created_date: z.string().catch(""),
  last_post_date: z.string().nullable().catch(null),
});
export type UserStatsRecord = z.infer<typeof UserStatsRecord>;
