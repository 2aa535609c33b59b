// src/workflows/generate_post_v1.ts
import { z } from "zod";
import type { AccountService } from "../accounts";
import type { CompanyService } from "../companies";
import type { PostService } from "../posts";
import { describeFailure, type GenerationFailure, type PostGenerator } from "../generator";
import type { PostRequest } from "../prompts";
import { DEFAULT_TEMPLATE_KEY, DEFAULT_VISUAL_STYLE } from "../templates";
import { createLogger } from "../log";

const log = createLogger("workflow");

const text = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => v || fallback);

/** The post form as it arrives on the wire; selects fall back to the form's defaults. */
export const GeneratePostInputs = z.object({
  topic: text(""),
  purpose: text(""),
  audience: text("Professionals"),
  message: text(""),
  tone_intensity: text("Moderate"),
  language_style: text("Professional"),
  post_length: text("Medium"),
  formatting: text("Bullet Points"),
  cta: text(""),
  post_goal: text("Educate"),
  template_type: text(DEFAULT_TEMPLATE_KEY),
  visual_style: text(DEFAULT_VISUAL_STYLE),
});

export type GeneratePostInputs = z.infer<typeof GeneratePostInputs>;

export type WorkflowDeps = {
  accounts: Pick<AccountService, "getUser">;
  companies: Pick<CompanyService, "isSubscriptionActive">;
  posts: Pick<PostService, "create">;
  generator: Pick<PostGenerator, "generate">;
};

export type FailureReason =
  | "invalid_input"
  | "unknown_user"
  | "account_disabled"
  | "subscription_inactive"
  | "generation_failed"
  | "save_failed";

export type GeneratePostOutputs = {
  post: string;
  image_prompt: string;
  post_id: number;
  truncated: boolean;
};

export type GeneratePostResponse =
  | { status: "SUCCEEDED"; inputs: GeneratePostInputs; outputs: GeneratePostOutputs; created_at: string }
  | {
      status: "FAILED";
      reason: FailureReason;
      error: string;
      failure?: GenerationFailure;
      created_at: string;
    };

function toRequest(i: GeneratePostInputs): PostRequest {
  return {
    topic: i.topic,
    purpose: i.purpose,
    audience: i.audience,
    message: i.message,
    toneIntensity: i.tone_intensity,
    languageStyle: i.language_style,
    postLength: i.post_length,
    formatting: i.formatting,
    cta: i.cta,
    postGoal: i.post_goal,
    templateType: i.template_type,
    visualStyle: i.visual_style,
  };
}

/** form → checks → generate → save. */
export async function runGeneratePostV1(
  deps: WorkflowDeps,
  username: string,
  rawInputs: unknown
): Promise<GeneratePostResponse> {
  const failed = (reason: FailureReason, error: string, failure?: GenerationFailure): GeneratePostResponse => ({
    status: "FAILED",
    reason,
    error,
    failure,
    created_at: new Date().toISOString(),
  });

  const parsed = GeneratePostInputs.safeParse(rawInputs ?? {});
  if (!parsed.success) {
    return failed("invalid_input", parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  const inputs = parsed.data;
  if (!inputs.topic || !inputs.purpose || !inputs.message) {
    return failed("invalid_input", "Please fill in all required fields (topic, purpose, message)");
  }

  const account = await deps.accounts.getUser(username);
  if (!account) return failed("unknown_user", `User '${username}' not found`);
  if (!account.enabled) return failed("account_disabled", "Account disabled. Contact your administrator.");
  if (account.company_id !== null && !(await deps.companies.isSubscriptionActive(account.company_id))) {
    return failed("subscription_inactive", "Your company's subscription is inactive or expired.");
  }

  const result = await deps.generator.generate(toRequest(inputs));
  if (!result.ok) {
    const reason: FailureReason = result.error.kind === "validation" ? "invalid_input" : "generation_failed";
    return failed(reason, describeFailure(result.error), result.error);
  }

  const saved = await deps.posts.create(account.username, {
    topic: inputs.topic,
    purpose: inputs.purpose,
    audience: inputs.audience,
    message: inputs.message,
    tone_intensity: inputs.tone_intensity,
    language_style: inputs.language_style,
    post_length: inputs.post_length,
    formatting: inputs.formatting,
    cta: inputs.cta,
    post_goal: inputs.post_goal,
    template_type: inputs.template_type,
    visual_style: inputs.visual_style,
    generated_post: result.post,
    image_prompt: result.imagePrompt,
  });
  if (!saved.ok) {
    log.error(`generated post for ${account.username} not saved: ${saved.message}`);
    return failed("save_failed", "The post was generated but could not be saved. Please try again.");
  }

  log.info(`post ${saved.value.id} generated for ${account.username}`);
  return {
    status: "SUCCEEDED",
    inputs,
    outputs: {
      post: result.post,
      image_prompt: result.imagePrompt,
      post_id: saved.value.id,
      truncated: result.truncated,
    },
    created_at: saved.value.date,
  };
}
