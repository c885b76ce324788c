import { formatAction } from "../core/ActionParser.js";
import { parseObservation } from "../core/Transcript.js";
import type { DecisionProvider, DecisionRequest } from "./DecisionProvider.js";

const EXPRESSION = /[-(]*\d[\d\s.+\-*/%^()]*[\d)]/g;
const OPERATOR = /\d\s*\)*\s*[-+*/%^]\s*\(*\s*-?\d/;

/**
 * Offline decision provider for demos and smoke tests.
 * Arithmetic in the task goes through the calculator tool; anything else is
 * answered directly.
 */
export class MockDecisionProvider implements DecisionProvider {
  readonly name = "mock";

  async decide(request: DecisionRequest): Promise<string> {
    const last = request.messages[request.messages.length - 1];
    const observation = last?.role === "user" ? parseObservation(last.content) : undefined;

    if (observation) {
      if (observation.outcome === "success") {
        return formatAction({
          action: "final",
          content: `The answer is ${observation.content.trim()}.`,
        });
      }
      return formatAction({
        action: "final",
        content: `The ${observation.toolName} tool could not complete the request: ${observation.content}`,
      });
    }

    const task =
      request.messages.find((m) => m.role === "user" && !parseObservation(m.content))?.content ?? "";
    const expression = extractExpression(task);
    const hasCalculator = request.tools.some((t) => t.name === "calculator");
    if (expression && hasCalculator) {
      return formatAction({ action: "tool", tool: "calculator", args: { expression } });
    }

    return formatAction({
      action: "final",
      content: `No tool is needed for this task: ${task.trim()}`,
    });
  }
}

/**
 * First arithmetic expression in free text, e.g. "23*19" or "(2+3)*4".
 */
export function extractExpression(text: string): string | undefined {
  for (const match of text.matchAll(EXPRESSION)) {
    const candidate = match[0].trim();
    if (OPERATOR.test(candidate) && balanced(candidate)) return candidate;
  }
  return undefined;
}

function balanced(text: string): boolean {
  let depth = 0;
  for (const ch of text) {
    if (ch === "(") depth++;
    else if (ch === ")" && --depth < 0) return false;
  }
  return depth === 0;
}
