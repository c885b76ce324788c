import fs from "node:fs/promises";
import { z } from "zod";
import type { AgentRuntime } from "../core/AgentRuntime.js";
import type { RunConfig, SessionStatus } from "../types/Session.js";

const EvalCaseSchema = z.object({
  id: z.string().min(1),
  task: z.string().min(1),
  expect: z
    .object({
      /** Substrings the final answer must contain (case-insensitive) */
      contains: z.union([z.string(), z.array(z.string())]).optional(),
      status: z.enum(["completed", "failed", "step_limit_reached"]).optional(),
    })
    .default({}),
  maxSteps: z.number().int().min(1).optional(),
});

export type EvalCase = z.infer<typeof EvalCaseSchema>;

export interface EvalResult {
  id: string;
  ok: boolean;
  final: string;
  status: SessionStatus;
  steps: number;
  /** Why the case failed; empty when ok */
  failures: string[];
  durationMs: number;
}

export interface EvalSummary {
  total: number;
  passed: number;
  failed: number;
  results: EvalResult[];
}

/**
 * Raised for a malformed cases file; names the offending line.
 */
export class EvalCaseError extends Error {
  public readonly kind = "invalid_eval_case";

  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(message);
    this.name = "EvalCaseError";
  }
}

/**
 * Parse JSONL eval cases. Blank lines and lines starting with "#" are skipped.
 */
export function parseEvalCases(content: string): EvalCase[] {
  const cases: EvalCase[] = [];
  const seen = new Set<string>();
  content.split(/\r?\n/).forEach((text, index) => {
    const line = index + 1;
    const trimmed = text.trim();
    if (trimmed === "" || trimmed.startsWith("#")) return;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      throw new EvalCaseError(
        `Line ${line}: invalid JSON (${err instanceof Error ? err.message : String(err)})`,
        line,
      );
    }
    const parsed = EvalCaseSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "case"}: ${i.message}`);
      throw new EvalCaseError(`Line ${line}: ${issues.join("; ")}`, line);
    }
    if (seen.has(parsed.data.id)) {
      throw new EvalCaseError(`Line ${line}: duplicate case id "${parsed.data.id}"`, line);
    }
    seen.add(parsed.data.id);
    cases.push(parsed.data);
  });
  return cases;
}

export async function loadEvalCases(filePath: string): Promise<EvalCase[]> {
  return parseEvalCases(await fs.readFile(filePath, "utf-8"));
}

/**
 * Run cases one after another and check each against its expectations.
 * A case without expectations passes when the session completes.
 */
export async function runEval(
  runtime: Pick<AgentRuntime, "run">,
  cases: readonly EvalCase[],
  config: Partial<RunConfig> = {},
): Promise<EvalSummary> {
  const results: EvalResult[] = [];
  for (const testCase of cases) {
    const started = Date.now();
    const { finalAnswer, session } = await runtime.run(testCase.task, {
      ...config,
      ...(testCase.maxSteps ? { maxSteps: testCase.maxSteps } : {}),
    });
    const failures = checkExpectations(testCase, finalAnswer, session.status);
    results.push({
      id: testCase.id,
      ok: failures.length === 0,
      final: finalAnswer,
      status: session.status,
      steps: session.step,
      failures,
      durationMs: Date.now() - started,
    });
  }

  const passed = results.filter((r) => r.ok).length;
  return { total: results.length, passed, failed: results.length - passed, results };
}

function checkExpectations(
  testCase: EvalCase,
  finalAnswer: string,
  status: SessionStatus,
): string[] {
  const failures: string[] = [];
  const expectedStatus = testCase.expect.status ?? "completed";
  if (status !== expectedStatus) {
    failures.push(`expected status ${expectedStatus}, got ${status}`);
  }
  const contains = testCase.expect.contains;
  const needles = contains === undefined ? [] : Array.isArray(contains) ? contains : [contains];
  const haystack = finalAnswer.toLowerCase();
  for (const needle of needles) {
    if (!haystack.includes(needle.toLowerCase())) {
      failures.push(`final answer does not contain "${needle}"`);
    }
  }
  return failures;
}
