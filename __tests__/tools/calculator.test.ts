import { describe, it, expect } from "vitest";
import {
  calculatorTool,
  evaluateExpression,
  formatNumber,
} from "../../src/tools/math/calculator.js";
import { DEFAULT_BUILTIN_TOOLS_CONFIG } from "../../src/tools/types.js";

describe("calculator", () => {
  describe("evaluateExpression", () => {
    it.each([
      ["23*19", 437],
      ["2+3*4", 14],
      ["(2+3)*4", 20],
      ["2^3^2", 512],
      ["-2^2", -4],
      ["2^-1", 0.5],
      ["10 % 4", 2],
      ["7 - -3", 10],
      ["1.5e2 / 3", 50],
    ])("evaluates %s", (expression, expected) => {
      expect(evaluateExpression(expression)).toBe(expected);
    });

    it.each([
      ["1/0", "division_by_zero", "Division by zero"],
      ["5 % 0", "division_by_zero", "Division by zero"],
      ["2+", "invalid_expression", "Unexpected end of expression"],
      ["(1+2", "invalid_expression", "Missing closing parenthesis"],
      ["2 3", "invalid_expression", "Unexpected trailing input"],
      ["abs(2)", "invalid_expression", 'Unexpected character "a" at position 0'],
      ["  ", "invalid_expression", "Empty expression"],
      ["9^999", "invalid_expression", "Result is not a finite number"],
    ])("rejects %s", (expression, kind, message) => {
      expect(() => evaluateExpression(expression)).toThrow(expect.objectContaining({ kind, message }));
    });
  });

  describe("formatNumber", () => {
    it("prints integers as-is and rounds the rest to 12 significant digits", () => {
      expect(formatNumber(437)).toBe("437");
      expect(formatNumber(0.1 + 0.2)).toBe("0.3");
      expect(formatNumber(1 / 3)).toBe("0.333333333333");
      expect(formatNumber(-0)).toBe("0");
    });
  });

  describe("executor", () => {
    it("returns the formatted result", async () => {
      const execute = calculatorTool.create({ ...DEFAULT_BUILTIN_TOOLS_CONFIG, workspaceRoot: "/srv/ws" });
      const ctx = { sessionId: "s1", step: 0, signal: new AbortController().signal };
      expect(await execute({ expression: "6*7" }, ctx)).toBe("42");
    });
  });
});
