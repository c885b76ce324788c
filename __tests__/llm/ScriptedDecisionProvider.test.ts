import { describe, it, expect } from "vitest";
import type { DecisionRequest } from "../../src/llm/DecisionProvider.js";
import { ScriptedDecisionProvider } from "../../src/llm/ScriptedDecisionProvider.js";

function request(step: number): DecisionRequest {
  return {
    sessionId: "s1",
    step,
    messages: [{ role: "user", content: `step ${step}` }],
    tools: [],
    signal: new AbortController().signal,
  };
}

describe("ScriptedDecisionProvider", () => {
  it("replays replies in order and records requests", async () => {
    const provider = new ScriptedDecisionProvider(["first", "second"]);

    expect(await provider.decide(request(0))).toBe("first");
    expect(await provider.decide(request(1))).toBe("second");
    expect(provider.requests.map((r) => r.step)).toEqual([0, 1]);
    expect(provider.remaining).toBe(0);
  });

  it("throws scripted errors", async () => {
    const provider = new ScriptedDecisionProvider([new Error("boom"), "after"]);

    await expect(provider.decide(request(0))).rejects.toThrow("boom");
    expect(await provider.decide(request(0))).toBe("after");
  });

  it("calls reply functions with the request", async () => {
    const provider = new ScriptedDecisionProvider().push((req) => `seen ${req.messages.length}`);
    expect(await provider.decide(request(0))).toBe("seen 1");
  });

  it("fails with script_exhausted when empty", async () => {
    const provider = new ScriptedDecisionProvider();
    await expect(provider.decide(request(0))).rejects.toMatchObject({
      kind: "script_exhausted",
      message: "No scripted decision left",
    });
  });
});
