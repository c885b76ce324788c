#!/usr/bin/env node
/**
 * CLI for the gated agent runtime: run a task, list tools, run eval cases.
 * Usage: gated-agent <command> [options]
 * Commands: run | tools | eval | help
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "node:fs/promises";
import {
  DEFAULT_CONFIG_FILE,
  loadAgentConfig,
  parseAgentConfig,
  type AgentConfig,
} from "./config/AgentConfig.js";
import { createAgent, type Agent } from "./agent-runtime.js";
import { loadEvalCases, runEval } from "./eval/EvalHarness.js";
import type { SessionStatus } from "./types/Session.js";

type Command = "run" | "tools" | "eval" | "help";

interface CliArgs {
  command: Command;
  positional: string[];
  /** Explicit --config; must exist */
  configPath?: string;
  workspace?: string;
  maxSteps?: number;
  json: boolean;
  help: boolean;
  errors: string[];
}

const COMMANDS: readonly Command[] = ["run", "tools", "eval", "help"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const parsed: CliArgs = { command: "help", positional: [], json: false, help: false, errors: [] };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--json") {
      parsed.json = true;
    } else if (arg === "--config" || arg === "-c") {
      parsed.configPath = path.resolve(process.cwd(), args[++i] ?? "");
    } else if (arg === "--workspace" || arg === "-w") {
      parsed.workspace = args[++i];
    } else if (arg === "--max-steps") {
      const raw = args[++i] ?? "";
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 1) {
        parsed.errors.push(`--max-steps must be a positive integer, got "${raw}"`);
      } else {
        parsed.maxSteps = value;
      }
    } else if (arg.startsWith("-")) {
      parsed.errors.push(`Unknown option: ${arg}`);
    } else if (!commandSeen) {
      commandSeen = true;
      if (isCommand(arg)) parsed.command = arg;
      else parsed.errors.push(`Unknown command: ${arg}`);
    } else {
      parsed.positional.push(arg);
    }
  }
  return parsed;
}

function printHelp(): void {
  const bin = "gated-agent";
  process.stdout.write(`
Usage: ${bin} <command> [options]

Commands:
  run <task>         Run one task and print the final answer.
  tools              List registered tools.
  eval <cases.jsonl> Run evaluation cases; exit with code 1 if any fail.
  help               Show this help.

Options:
  --config, -c <path>     Config file (default: ./${DEFAULT_CONFIG_FILE} if present).
  --workspace, -w <path>  Workspace directory (overrides config).
  --max-steps <n>         Step budget per task (overrides config).
  --json                  Machine-readable output.
  --help, -h              Show this help.

Exit codes: 0 completed, 1 error or failed evals, 2 step limit reached.

Examples:
  ${bin} run "What is 23*19?"
  ${bin} tools --json
  ${bin} eval eval/cases.jsonl -c ./agent.yaml
`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function resolveConfig(args: CliArgs): Promise<AgentConfig> {
  if (args.configPath) {
    return (await loadAgentConfig(args.configPath)).config;
  }
  const fallback = path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  if (await fileExists(fallback)) {
    return (await loadAgentConfig(fallback)).config;
  }
  return parseAgentConfig({}, process.cwd());
}

function exitCodeFor(status: SessionStatus): number {
  if (status === "completed") return 0;
  if (status === "step_limit_reached") return 2;
  return 1;
}

async function cmdRun(agent: Agent, args: CliArgs): Promise<number> {
  const task = args.positional.join(" ").trim();
  if (!task) {
    process.stderr.write("Error: run needs a task, e.g. gated-agent run \"What is 2+2?\"\n");
    return 1;
  }
  const { finalAnswer, session } = await agent.runtime.run(task);
  await agent.flush();

  if (args.json) {
    process.stdout.write(
      JSON.stringify(
        {
          sessionId: session.id,
          status: session.status,
          reason: session.terminationReason,
          steps: session.step,
          finalAnswer,
          ...(session.error ? { error: session.error } : {}),
        },
        null,
        2,
      ) + "\n",
    );
  } else if (session.status === "failed") {
    process.stderr.write(
      `Session failed (${session.terminationReason ?? "unknown"}): ${session.error?.message ?? ""}\n`,
    );
  } else {
    process.stdout.write(finalAnswer + "\n");
  }
  return exitCodeFor(session.status);
}

function cmdTools(agent: Agent, args: CliArgs): number {
  const catalog = agent.registry.catalog();
  if (args.json) {
    process.stdout.write(JSON.stringify(catalog, null, 2) + "\n");
    return 0;
  }
  process.stdout.write("name\trisk\tdescription\n");
  for (const tool of catalog) {
    process.stdout.write(`${tool.name}\t${tool.riskClass}\t${tool.description}\n`);
  }
  return 0;
}

async function cmdEval(agent: Agent, args: CliArgs): Promise<number> {
  const file = args.positional[0];
  if (!file) {
    process.stderr.write("Error: eval needs a cases file (JSONL)\n");
    return 1;
  }
  const cases = await loadEvalCases(path.resolve(process.cwd(), file));
  const summary = await runEval(agent.runtime, cases);
  await agent.flush();

  if (args.json) {
    process.stdout.write(JSON.stringify(summary, null, 2) + "\n");
  } else {
    process.stdout.write(`Passed ${summary.passed}/${summary.total}\n`);
    for (const r of summary.results) {
      const detail = r.ok ? r.final : r.failures.join("; ");
      process.stdout.write(`- ${r.ok ? "OK" : "FAIL"} ${r.id}: ${detail}\n`);
    }
  }
  return summary.failed > 0 ? 1 : 0;
}

async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgv(argv);

  if (args.errors.length > 0) {
    for (const e of args.errors) process.stderr.write(`Error: ${e}\n`);
    return 1;
  }
  if (args.help || args.command === "help") {
    printHelp();
    return 0;
  }

  if (args.configPath && !(await fileExists(args.configPath))) {
    process.stderr.write(`Error: config file not found: ${args.configPath}\n`);
    return 1;
  }

  try {
    const config = await resolveConfig(args);
    const agent = createAgent(config, { workspace: args.workspace, maxSteps: args.maxSteps });

    switch (args.command) {
      case "run":
        return await cmdRun(agent, args);
      case "tools":
        return cmdTools(agent, args);
      case "eval":
        return await cmdEval(agent, args);
      default:
        printHelp();
        return 1;
    }
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[]): Promise<number> {
  return main(argv);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      process.exit(1);
    });
}
