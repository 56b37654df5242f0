import { describe, expect, it, vi } from "vitest";
import type { CurrentTarget } from "@cf-deploy/shared-types";
import { resolveTarget, type PromptFn, type PromptRequest } from "../src/target-resolver.js";

const current: CurrentTarget = {
  apiUrl: "https://api.x.com",
  user: "a",
  org: "o1",
  space: "s1"
};

/** Accepts every default; the password prompt answers with `password`. */
function echoDefaults(password = "") {
  return vi.fn<PromptFn>(async (request: PromptRequest) => (request.secret ? password : request.defaultValue));
}

describe("resolveTarget", () => {
  it("uses every override as-is and never prompts when all fields are supplied", async () => {
    const prompt = echoDefaults();
    const requested = {
      apiUrl: "https://api.y.com",
      user: "b",
      password: "secret",
      org: "o2",
      space: "s2"
    };

    const decision = await resolveTarget(current, requested, prompt);

    expect(decision.params).toEqual(requested);
    expect(prompt).not.toHaveBeenCalled();
  });

  it("requires login and target whenever a password is supplied", async () => {
    const decision = await resolveTarget(
      current,
      { ...current, password: "p" },
      echoDefaults()
    );

    expect(decision.loginRequired).toBe(true);
    expect(decision.targetRequired).toBe(true);
  });

  it("requires nothing when the request matches the session and the password is empty", async () => {
    const decision = await resolveTarget(current, { ...current }, echoDefaults(""));

    expect(decision.loginRequired).toBe(false);
    expect(decision.targetRequired).toBe(false);
    expect(decision.params.password).toBe("");
  });

  it.each([
    ["org", { org: "o2" }],
    ["space", { space: "s2" }]
  ])("requires only a retarget when the %s changes", async (_field, change) => {
    const decision = await resolveTarget(current, { ...current, ...change }, echoDefaults(""));

    expect(decision.loginRequired).toBe(false);
    expect(decision.targetRequired).toBe(true);
  });

  it.each([
    ["apiUrl", { apiUrl: "https://api.other.com" }],
    ["user", { user: "someone-else" }]
  ])("requires login when the %s changes even without a password", async (_field, change) => {
    const decision = await resolveTarget(current, { ...current, ...change }, echoDefaults(""));

    expect(decision.loginRequired).toBe(true);
    expect(decision.targetRequired).toBe(true);
  });

  it("fills blank overrides from prompts seeded with the session values", async () => {
    const prompt = echoDefaults("p");

    const decision = await resolveTarget(
      current,
      { apiUrl: "", user: "", password: "p", org: "", space: "" },
      prompt
    );

    expect(decision).toEqual({
      params: { apiUrl: "https://api.x.com", user: "a", password: "p", org: "o1", space: "s1" },
      loginRequired: true,
      targetRequired: true
    });
    expect(prompt.mock.calls.map(([request]) => request)).toEqual([
      { field: "apiUrl", defaultValue: "https://api.x.com", secret: false },
      { field: "user", defaultValue: "a", secret: false },
      { field: "org", defaultValue: "o1", secret: false },
      { field: "space", defaultValue: "s1", secret: false }
    ]);
  });

  it("asks for the password exactly once, concealed and without a default", async () => {
    const prompt = echoDefaults("typed");

    const decision = await resolveTarget(current, {}, prompt);

    const secretCalls = prompt.mock.calls.filter(([request]) => request.secret);
    expect(secretCalls).toEqual([[{ field: "password", defaultValue: "", secret: true }]]);
    expect(decision.params.password).toBe("typed");
    expect(prompt).toHaveBeenCalledTimes(5);
  });

  it("forces login and target when there is no active session", async () => {
    const decision = await resolveTarget(
      undefined,
      { apiUrl: "https://api.x.com", user: "a", org: "o1", space: "s1" },
      echoDefaults("")
    );

    expect(decision.loginRequired).toBe(true);
    expect(decision.targetRequired).toBe(true);
  });

  it("seeds prompts with empty defaults when there is no active session", async () => {
    const prompt = echoDefaults("");

    await resolveTarget(undefined, {}, prompt);

    expect(prompt.mock.calls.every(([request]) => request.defaultValue === "")).toBe(true);
  });

  it("never returns a decision that logs in without retargeting", async () => {
    const sessions: Array<CurrentTarget | undefined> = [undefined, current];
    const requests = [
      {},
      { ...current },
      { ...current, password: "p" },
      { ...current, org: "o9" },
      { ...current, user: "z" },
      { apiUrl: "https://api.q.com" }
    ];

    for (const session of sessions) {
      for (const request of requests) {
        const decision = await resolveTarget(session, request, echoDefaults(""));
        if (decision.loginRequired) {
          expect(decision.targetRequired).toBe(true);
        }
      }
    }
  });
});
