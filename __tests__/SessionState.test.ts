import { describe, it, expect, beforeEach } from "vitest";
import { createPolicySnapshot } from "../src/core/PolicyGate.js";
import { resolveRunConfig } from "../src/core/RunConfig.js";
import { SessionState } from "../src/core/SessionState.js";

describe("SessionState", () => {
  let state: SessionState;

  beforeEach(() => {
    state = new SessionState(
      "s1",
      "Add numbers",
      resolveRunConfig({ maxSteps: 2 }),
      createPolicySnapshot({ workspaceRoot: "/srv/ws" }),
      () => new Date("2026-03-01T12:00:00Z"),
    );
  });

  it("starts running at step 0", () => {
    const session = state.snapshot();
    expect(session.status).toBe("running");
    expect(session.step).toBe(0);
    expect(session.startedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(session.endedAt).toBeUndefined();
  });

  it("appends frozen messages in order", () => {
    state.appendSystem("sys");
    state.appendUser("Add numbers");
    state.appendAssistant('{"action":"final","content":"3"}', { type: "final", content: "3" }, "");
    expect(state.transcript.map((m) => m.role)).toEqual(["system", "user", "assistant"]);
    expect(state.transcript.every((m) => Object.isFrozen(m))).toBe(true);
  });

  it("remembers the latest non-empty prose", () => {
    const action = { type: "tool_call", toolName: "calc", arguments: {} } as const;
    state.appendAssistant("raw", action, "  First thought ");
    state.appendAssistant("raw", action, "");
    expect(state.bestEffortText).toBe("First thought");
    state.appendAssistant("raw", action, "Second thought");
    expect(state.bestEffortText).toBe("Second thought");
  });

  it("never counts past maxSteps", () => {
    state.completeStep();
    state.completeStep();
    expect(() => state.completeStep()).toThrow("Session s1 already used 2 steps");
    expect(state.step).toBe(2);
  });

  it("is terminal after finish", () => {
    state.finish("completed", "final_answer", { finalAnswer: "3" });
    const session = state.snapshot();
    expect(session.status).toBe("completed");
    expect(session.terminationReason).toBe("final_answer");
    expect(session.finalAnswer).toBe("3");
    expect(session.endedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(() => state.appendUser("more")).toThrow("Session s1 is completed");
    expect(() => state.finish("failed", "internal_error")).toThrow("Session s1 is completed");
  });

  it("hands out snapshots that later appends do not change", () => {
    state.appendSystem("sys");
    const before = state.snapshot();
    state.appendUser("task");
    expect(before.transcript).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.transcript)).toBe(true);
  });
});
