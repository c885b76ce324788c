import { describe, it, expect } from "vitest";
import { AgentRuntime } from "../../src/core/AgentRuntime.js";
import type { DecisionRequest, PromptMessage } from "../../src/llm/DecisionProvider.js";
import { extractExpression, MockDecisionProvider } from "../../src/llm/MockDecisionProvider.js";
import { TraceLog } from "../../src/observability/TraceLog.js";
import { ToolRegistry } from "../../src/registry/ToolRegistry.js";
import { registerBuiltinTools } from "../../src/tools/BuiltinToolsModule.js";
import type { ToolCatalogEntry } from "../../src/types/ToolSpec.js";

const calculator: ToolCatalogEntry = {
  name: "calculator",
  description: "Evaluate arithmetic",
  riskClass: "pure",
  inputSchema: {},
};

function request(messages: PromptMessage[], tools: ToolCatalogEntry[] = [calculator]): DecisionRequest {
  return { sessionId: "s1", step: 0, messages, tools, signal: new AbortController().signal };
}

describe("extractExpression", () => {
  it.each([
    ["What is 23*19?", "23*19"],
    ["Compute (2+3)*4 please", "(2+3)*4"],
    ["How much is 2 ^ 10", "2 ^ 10"],
  ])("finds the expression in %s", (text, expected) => {
    expect(extractExpression(text)).toBe(expected);
  });

  it.each(["Tell me a joke", "Call 555 1234", "Version 2 of the doc"])(
    "finds nothing in %s",
    (text) => {
      expect(extractExpression(text)).toBeUndefined();
    },
  );
});

describe("MockDecisionProvider", () => {
  const provider = new MockDecisionProvider();
  const system: PromptMessage = { role: "system", content: "You are an agent." };

  it("calls the calculator for arithmetic", async () => {
    const decision = await provider.decide(
      request([system, { role: "user", content: "What is 23*19?" }]),
    );
    expect(decision).toBe('{"action":"tool","tool":"calculator","args":{"expression":"23*19"}}');
  });

  it("answers directly without a calculator", async () => {
    const decision = await provider.decide(
      request([system, { role: "user", content: "What is 23*19? " }], []),
    );
    expect(decision).toBe('{"action":"final","content":"No tool is needed for this task: What is 23*19?"}');
  });

  it("turns a successful observation into the answer", async () => {
    const decision = await provider.decide(
      request([
        system,
        { role: "user", content: "What is 23*19?" },
        { role: "user", content: "[observation tool=calculator outcome=success]\n437" },
      ]),
    );
    expect(decision).toBe('{"action":"final","content":"The answer is 437."}');
  });

  it("reports a failed observation", async () => {
    const decision = await provider.decide(
      request([
        system,
        { role: "user", content: "What is 1/0?" },
        { role: "user", content: "[observation tool=calculator outcome=error]\nDivision by zero" },
      ]),
    );
    expect(decision).toBe(
      '{"action":"final","content":"The calculator tool could not complete the request: Division by zero"}',
    );
  });

  it("drives a full session through the calculator", async () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, { workspaceRoot: "/srv/ws", enabled: ["calculator"] });
    const traceLog = new TraceLog();
    const runtime = new AgentRuntime({
      registry,
      decisionProvider: new MockDecisionProvider(),
      traceSink: traceLog,
      debug: { enabled: false },
    });

    const { finalAnswer, session } = await runtime.run("What is 23*19?", { sessionId: "mock-run" });

    expect(finalAnswer).toBe("The answer is 437.");
    expect(session.status).toBe("completed");
    expect(traceLog.forSession("mock-run").map((e) => e.kind)).toContain("tool_executed");
  });
});
