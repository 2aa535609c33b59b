// src/testing/fixtures.ts
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { JsonFileStore } from "../repo/recordStore";
import { AccountService } from "../accounts";
import { CompanyService } from "../companies";
import { PostService, type NewPost } from "../posts";
import type { CompletionClient, CompletionRequest } from "../generator";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "post-studio-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** A settable clock; defaults to local noon so day windows are unambiguous. */
export function fixedClock(start = new Date(2026, 2, 10, 12)) {
  let current = start;
  return {
    now: () => new Date(current.getTime()),
    set: (d: Date) => {
      current = d;
    },
  };
}

export function makeServices(dataDir: string, now: () => Date) {
  const store = new JsonFileStore(dataDir);
  const companies = new CompanyService(store, { now });
  const accounts = new AccountService(store, companies, { bcryptRounds: 4, now });
  const posts = new PostService(store, accounts, { now });
  return { store, companies, accounts, posts };
}

export function samplePost(overrides: Partial<NewPost> = {}): NewPost {
  return {
    topic: "Remote onboarding",
    purpose: "Share lessons",
    audience: "Professionals",
    message: "Write things down",
    tone_intensity: "Moderate",
    language_style: "Professional",
    post_length: "Medium",
    formatting: "Bullet Points",
    cta: "",
    post_goal: "Educate",
    template_type: "professional",
    visual_style: "photo_realistic",
    generated_post: "A post body.",
    ...overrides,
  };
}

/** Records every request and answers with `reply` (or throws it). */
export class FakeCompletionClient implements CompletionClient {
  readonly calls: CompletionRequest[] = [];

  constructor(private reply: string | Error = "Generated post text that is long enough to pass the length check.") {}

  respondWith(reply: string | Error) {
    this.reply = reply;
  }

  async complete(req: CompletionRequest): Promise<string> {
    this.calls.push(req);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}
