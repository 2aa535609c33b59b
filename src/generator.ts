// src/generator.ts
import OpenAI from "openai";
import { buildImagePrompt, buildPostPrompt, LINKEDIN_MAX_CHARS, type PostRequest } from "./prompts";
import { createLogger } from "./log";

const log = createLogger("generator");

export type FailureKind = "validation" | "rate_limit" | "connection" | "quota" | "credentials" | "api" | "unexpected";

export type GenerationFailure = { kind: FailureKind; message: string; detail?: string };

export type GenerationResult =
  | { ok: true; post: string; imagePrompt: string; truncated: boolean }
  | { ok: false; error: GenerationFailure };

export type CompletionRequest = { system: string; user: string; model: string; temperature: number };

/** The external text-completion boundary. */
export interface CompletionClient {
  complete(req: CompletionRequest): Promise<string>;
}

export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

export class MissingCredentialsError extends Error {
  constructor() {
    super("OPENAI_API_KEY is not configured");
    this.name = "MissingCredentialsError";
  }
}

/** Chat completions over the OpenAI SDK; the client is built on first use. */
export class OpenAICompletionClient implements CompletionClient {
  private client: OpenAI | null = null;

  constructor(private readonly opts: { apiKey?: string; timeoutMs: number; maxRetries: number }) {}

  private get(): OpenAI {
    if (!this.opts.apiKey) throw new MissingCredentialsError();
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.opts.apiKey,
        maxRetries: this.opts.maxRetries,
        timeout: this.opts.timeoutMs,
      });
    }
    return this.client;
  }

  async complete(req: CompletionRequest): Promise<string> {
    const resp = await this.get().chat.completions.create({
      model: req.model,
      temperature: req.temperature,
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.user },
      ],
    });
    return resp.choices?.[0]?.message?.content?.trim() || "";
  }
}

// ===== Input validation =====

const STRIPPED_CHARS = /[<>"']/g;

export const FIELD_LIMITS = {
  topic: { label: "Topic", max: 200 },
  purpose: { label: "Purpose", max: 300 },
  message: { label: "Message", max: 1000 },
  cta: { label: "Call-to-Action", max: 200 },
} as const;

/** Length in code points, so an emoji counts once. */
export function charCount(text: string): number {
  return [...text].length;
}

/** Cuts to `max` code points, ending in "..." when anything was dropped. */
export function truncateChars(text: string, max: number): { text: string; truncated: boolean } {
  const chars = [...text];
  if (chars.length <= max) return { text, truncated: false };
  return { text: chars.slice(0, max - 3).join("") + "...", truncated: true };
}

export function sanitizeField(text: string, label: string, max: number): string {
  const trimmed = String(text ?? "").trim();
  if (!trimmed) throw new InputValidationError(`${label} cannot be empty`);
  const cleaned = trimmed.replace(STRIPPED_CHARS, "");
  if (charCount(cleaned) > max) throw new InputValidationError(`${label} cannot exceed ${max} characters`);
  return cleaned;
}

/** Cleans the free-text fields; the call-to-action is optional. */
export function sanitizeRequest(req: PostRequest): PostRequest {
  const { topic, purpose, message, cta } = FIELD_LIMITS;
  return {
    ...req,
    topic: sanitizeField(req.topic, topic.label, topic.max),
    purpose: sanitizeField(req.purpose, purpose.label, purpose.max),
    message: sanitizeField(req.message, message.label, message.max),
    cta: req.cta.trim() ? sanitizeField(req.cta, cta.label, cta.max) : "",
  };
}

// ===== Failure classification =====

export function classifyError(e: unknown): GenerationFailure {
  if (e instanceof InputValidationError) return { kind: "validation", message: e.message };
  if (e instanceof MissingCredentialsError) return { kind: "credentials", message: e.message };
  // connection errors (timeouts included) are APIErrors without a status
  if (e instanceof OpenAI.APIConnectionError) return { kind: "connection", message: e.message };
  if (e instanceof OpenAI.APIError) {
    const text = `${e.code ?? ""} ${e.type ?? ""} ${e.message}`.toLowerCase();
    if (text.includes("insufficient_quota") || text.includes("billing")) return { kind: "quota", message: e.message };
    if (e.status === 429) return { kind: "rate_limit", message: e.message };
    if (e.status === 401 || text.includes("invalid_api_key")) return { kind: "credentials", message: e.message };
    return { kind: "api", message: e.message.slice(0, 200), detail: e.type ?? "Unknown" };
  }
  if (e instanceof Error) return { kind: "unexpected", message: e.message, detail: e.name };
  return { kind: "unexpected", message: String(e), detail: typeof e };
}

/** The user-facing text for a failure; every message starts with ⚠️. */
export function describeFailure(f: GenerationFailure): string {
  switch (f.kind) {
    case "validation":
      return `⚠️ **Input Validation Error**\n\n${f.message}\n\nPlease check your input and try again.`;
    case "rate_limit":
      return [
        "⚠️ **Rate Limit Exceeded**",
        "",
        "The AI service is temporarily busy. Please:",
        "• Wait 30-60 seconds and try again",
        "• Check if you have API usage limits",
        "• Contact support if this persists",
      ].join("\n");
    case "connection":
      return [
        "⚠️ **Connection Error**",
        "",
        "Unable to connect to the AI service. Please:",
        "• Check your internet connection",
        "• Verify your network settings",
        "• Try again in a few moments",
      ].join("\n");
    case "quota":
      return [
        "⚠️ **API Quota Exceeded**",
        "",
        "The API quota has been exceeded. Please:",
        "• Check your OpenAI account billing",
        "• Contact your administrator",
        "• Try again later",
      ].join("\n");
    case "credentials":
      return [
        "⚠️ **API Configuration Error**",
        "",
        "The API key is invalid or missing. Please:",
        "• Contact your administrator",
        "• Verify API configuration",
      ].join("\n");
    case "api":
      return [
        "⚠️ **API Error**",
        "",
        `An error occurred: ${f.message}`,
        "",
        `Error Type: ${f.detail ?? "Unknown"}`,
        "Please try again or contact support if the issue persists.",
      ].join("\n");
    case "unexpected":
      return [
        "⚠️ **Unexpected Error**",
        "",
        "An unexpected error occurred while generating your post.",
        "",
        "Please:",
        "• Try again in a moment",
        "• Check that all required fields are filled",
        "• Contact support if the problem continues",
        "",
        `Error details: ${f.detail ?? "Error"}`,
      ].join("\n");
  }
}

// ===== Generator =====

export type GeneratorOptions = { model: string; temperature?: number };

export class PostGenerator {
  constructor(private readonly client: CompletionClient, private readonly opts: GeneratorOptions) {}

  async generate(input: PostRequest): Promise<GenerationResult> {
    let req: PostRequest;
    try {
      req = sanitizeRequest(input);
    } catch (e) {
      const error = classifyError(e);
      log.warn(`input rejected: ${error.message}`);
      return { ok: false, error };
    }

    const prompt = buildPostPrompt(req);
    let post: string;
    try {
      post = await this.client.complete({
        system: prompt.system,
        user: prompt.user,
        model: this.opts.model,
        temperature: this.opts.temperature ?? 0.7,
      });
    } catch (e) {
      const error = classifyError(e);
      log.error(`completion failed (${error.kind})`, error.message);
      return { ok: false, error };
    }

    if (!post) {
      log.error("completion returned no text");
      return { ok: false, error: { kind: "api", message: "The AI service returned an empty response", detail: "empty_response" } };
    }

    const length = charCount(post);
    const cut = truncateChars(post, LINKEDIN_MAX_CHARS);
    if (cut.truncated) log.warn(`post exceeds ${LINKEDIN_MAX_CHARS} characters (${length}), truncating`);
    else if (length < 50) log.warn(`post is very short (${length} chars)`);

    return { ok: true, post: cut.text, imagePrompt: buildImagePrompt(req), truncated: cut.truncated };
  }
}
