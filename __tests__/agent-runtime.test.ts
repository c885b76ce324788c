import { describe, it, expect, vi, afterEach } from "vitest";
import path from "node:path";
import { readFile, rm, writeFile } from "node:fs/promises";
import {
  createAgent,
  createAgentFromConfig,
  createDecisionProvider,
} from "../src/agent-runtime.js";
import { parseAgentConfig } from "../src/config/AgentConfig.js";
import { MockDecisionProvider } from "../src/llm/MockDecisionProvider.js";
import { OpenAICompatibleProvider } from "../src/llm/OpenAICompatibleClient.js";
import { ScriptedDecisionProvider } from "../src/llm/ScriptedDecisionProvider.js";
import { finalReply, tempWorkspace } from "./fixtures/index.js";

describe("createDecisionProvider", () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it("builds the mock provider", () => {
    expect(createDecisionProvider({ type: "mock" })).toBeInstanceOf(MockDecisionProvider);
  });

  it("reads the API key from the named environment variable", async () => {
    global.fetch = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ choices: [{ message: { content: "done" } }] }), { status: 200 }),
    );
    const provider = createDecisionProvider(
      {
        type: "openai-compatible",
        baseUrl: "https://llm.example.com/v1",
        model: "test-model",
        apiKeyEnv: "TEST_LLM_KEY",
      },
      { TEST_LLM_KEY: "test-secret" },
    );

    expect(provider).toBeInstanceOf(OpenAICompatibleProvider);
    const decision = await provider.decide({
      sessionId: "s1",
      step: 0,
      messages: [{ role: "user", content: "hi" }],
      tools: [],
      signal: new AbortController().signal,
    });
    expect(decision).toBe("done");
    const init = vi.mocked(global.fetch).mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
  });
});

describe("createAgent", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("wires the enabled tools and answers with the mock provider", async () => {
    const agent = createAgent(parseAgentConfig({ tools: { enabled: ["calculator"] } }, "/srv/app"));

    expect(agent.registry.list()).toEqual(["calculator"]);
    expect(agent.memory).toBeUndefined();
    expect(agent.traceFile).toBeUndefined();

    const { finalAnswer, session } = await agent.runtime.run("What is 23*19?");
    expect(finalAnswer).toBe("The answer is 437.");
    expect(agent.traceLog.forSession(session.id)[0]?.kind).toBe("session_started");
  });

  it("applies workspace, step and provider overrides", async () => {
    dir = await tempWorkspace("agent-test-");
    const provider = new ScriptedDecisionProvider([finalReply("scripted")]);
    const agent = createAgent(parseAgentConfig({}, "/srv/app"), {
      workspace: dir,
      maxSteps: 2,
      decisionProvider: provider,
    });

    expect(agent.config.workspace).toBe(dir);
    expect(agent.config.runtime.maxSteps).toBe(2);
    expect(agent.policy.snapshot().workspaceRoot).toBe(dir);

    const { finalAnswer, session } = await agent.runtime.run("anything");
    expect(finalAnswer).toBe("scripted");
    expect(session.config.maxSteps).toBe(2);
  });

  it("writes the trace file and stores turns in memory", async () => {
    dir = await tempWorkspace("agent-test-");
    const agent = createAgent(
      parseAgentConfig(
        { trace: { file: "traces/run.jsonl" }, memory: { enabled: true }, tools: { enabled: ["calculator"] } },
        dir,
      ),
    );

    const { session } = await agent.runtime.run("What is 23*19?");
    await agent.flush();

    const lines = (await readFile(path.join(dir, "traces", "run.jsonl"), "utf-8")).trim().split("\n");
    const kinds = lines.map((line) => JSON.parse(line).kind);
    expect(kinds).toEqual(agent.traceLog.forSession(session.id).map((e) => e.kind));
    expect(kinds[0]).toBe("session_started");
    expect(kinds[kinds.length - 1]).toBe("session_ended");
    expect(agent.memory?.size).toBe(4);
  });
});

describe("createAgentFromConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads the config file and builds the agent", async () => {
    dir = await tempWorkspace("agent-test-");
    const configPath = path.join(dir, "agent.yaml");
    await writeFile(
      configPath,
      ["workspace: .", "policy:", "  allowWrites: true", "tools:", "  enabled: [file_write]", ""].join("\n"),
    );

    const agent = await createAgentFromConfig(configPath);

    expect(agent.config.workspace).toBe(dir);
    expect(agent.registry.list()).toEqual(["file_write"]);
    expect(agent.policy.snapshot().allowWrites).toBe(true);
  });
});
