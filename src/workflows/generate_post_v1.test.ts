import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PostGenerator } from "../generator";
import { runGeneratePostV1 } from "./generate_post_v1";
import { FakeCompletionClient, fixedClock, makeServices, makeTempDir, removeDir } from "../testing/fixtures";

const NOW = new Date(2026, 2, 10, 12);
const DAY_MS = 24 * 60 * 60 * 1000;

const FORM = {
  topic: "AI in Healthcare",
  purpose: "Raise awareness",
  audience: "Healthcare Professionals",
  message: "AI supports clinicians",
  post_length: "Short",
  post_goal: "Educate",
};

describe("runGeneratePostV1", () => {
  let dir: string;
  let client: FakeCompletionClient;
  let deps: ReturnType<typeof makeServices> & { generator: PostGenerator };
  const clock = fixedClock(NOW);

  beforeEach(async () => {
    dir = await makeTempDir();
    clock.set(NOW);
    client = new FakeCompletionClient("Healthcare teams are adopting AI. Here is what that means for patients and staff.");
    deps = { ...makeServices(dir, clock.now), generator: new PostGenerator(client, { model: "test-model" }) };
    await deps.accounts.createUser({ username: "alice", password: "pw" });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("generates, saves and returns the post", async () => {
    const out = await runGeneratePostV1(deps, "alice", FORM);

    expect(out.status).toBe("SUCCEEDED");
    if (out.status !== "SUCCEEDED") return;
    expect(out.outputs.post_id).toBe(1);
    expect(out.outputs.truncated).toBe(false);
    expect(out.outputs.image_prompt).toContain("Color Palette: blue and white, professional, clean");
    expect(out.inputs.tone_intensity).toBe("Moderate");
    expect(out.inputs.template_type).toBe("professional");

    expect(client.calls).toHaveLength(1);
    const prompt = client.calls[0].user;
    for (const value of [
      "AI in Healthcare",
      "Raise awareness",
      "Healthcare Professionals",
      "AI supports clinicians",
      "Educate",
      "300-800 characters",
    ]) {
      expect(prompt).toContain(value);
    }

    const [latest] = await deps.posts.listAll();
    expect(latest.id).toBe(1);
    expect(latest.user_id).toBe("alice");
    expect(latest.post_length).toBe("Short");
    expect(latest.post_goal).toBe("Educate");
    expect(latest.generated_post).toBe(out.outputs.post);
    expect(latest.image_prompt).toBe(out.outputs.image_prompt);
  });

  it("requires topic, purpose and message", async () => {
    const out = await runGeneratePostV1(deps, "alice", { ...FORM, message: "   " });
    expect(out.status).toBe("FAILED");
    if (out.status === "FAILED") {
      expect(out.reason).toBe("invalid_input");
      expect(out.error).toBe("Please fill in all required fields (topic, purpose, message)");
    }
    expect(client.calls).toHaveLength(0);
  });

  it("rejects non-string fields", async () => {
    const out = await runGeneratePostV1(deps, "alice", { ...FORM, topic: 42 });
    expect(out.status === "FAILED" && out.reason).toBe("invalid_input");
  });

  it("reports validation failures from the generator without saving", async () => {
    const out = await runGeneratePostV1(deps, "alice", { ...FORM, topic: "t".repeat(250) });
    expect(out.status === "FAILED" && out.reason).toBe("invalid_input");
    expect(out.status === "FAILED" && out.error).toContain("Topic cannot exceed 200 characters");
    expect(client.calls).toHaveLength(0);
    expect(await deps.posts.listAll()).toEqual([]);
  });

  it("refuses users whose company subscription has lapsed", async () => {
    await deps.companies.create("Acme", "monthly", new Date(NOW.getTime() - 40 * DAY_MS));
    await deps.accounts.createUser({ username: "bob", password: "pw", companyId: 1 });

    const out = await runGeneratePostV1(deps, "bob", FORM);
    expect(out.status === "FAILED" && out.reason).toBe("subscription_inactive");
    expect(client.calls).toHaveLength(0);
  });

  it("refuses disabled and unknown accounts", async () => {
    await deps.accounts.setEnabled("alice", false);
    expect((await runGeneratePostV1(deps, "alice", FORM)).status === "FAILED").toBe(true);
    const ghost = await runGeneratePostV1(deps, "ghost", FORM);
    expect(ghost.status === "FAILED" && ghost.reason).toBe("unknown_user");
  });

  it("passes generation failures through with the warning text", async () => {
    client.respondWith(new Error("network down"));
    const out = await runGeneratePostV1(deps, "alice", FORM);
    expect(out.status).toBe("FAILED");
    if (out.status === "FAILED") {
      expect(out.reason).toBe("generation_failed");
      expect(out.failure?.kind).toBe("unexpected");
      expect(out.error.startsWith("⚠️ **Unexpected Error**")).toBe(true);
    }
    expect(await deps.posts.listAll()).toEqual([]);
  });
});
