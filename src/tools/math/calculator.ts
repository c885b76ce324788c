import type { BuiltinTool } from "../types.js";
import { stringArg } from "../types.js";
import { createTaggedError } from "../../core/Retry.js";

export const calculatorInputSchema = {
  type: "object",
  properties: {
    expression: {
      type: "string",
      minLength: 1,
      maxLength: 500,
      description: "Arithmetic expression, e.g. (2+3)*4. Supports + - * / % ^ and parentheses",
    },
  },
  required: ["expression"],
  additionalProperties: false,
} as const;

export const calculatorTool: BuiltinTool = {
  name: "calculator",
  definition: {
    description: "Evaluate an arithmetic expression",
    inputSchema: calculatorInputSchema,
    riskClass: "pure",
  },
  create: () => (args) => formatNumber(evaluateExpression(stringArg(args, "expression"))),
};

type Token =
  | { type: "number"; value: number }
  | { type: "op"; value: "+" | "-" | "*" | "/" | "%" | "^" }
  | { type: "paren"; value: "(" | ")" };

/**
 * Evaluate an arithmetic expression.
 * Precedence: parentheses, ^ (right-assoc), unary minus, * / %, + -.
 */
export function evaluateExpression(expression: string): number {
  const parser = new ExpressionParser(tokenize(expression));
  const value = parser.parse();
  if (!Number.isFinite(value)) {
    throw createTaggedError("invalid_expression", "Result is not a finite number");
  }
  return value;
}

/**
 * Integers print as-is; other values are rounded to 12 significant digits.
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return "0";
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(12)));
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < expression.length) {
    const ch = expression.charAt(i);
    if (/\s/.test(ch)) {
      i++;
    } else if (/[\d.]/.test(ch)) {
      const match = /^\d*\.?\d+(?:[eE][-+]?\d+)?|^\d+\.?/.exec(expression.slice(i));
      const text = match?.[0] ?? "";
      const value = Number(text);
      if (text === "" || Number.isNaN(value)) {
        throw createTaggedError("invalid_expression", `Invalid number at position ${i}`);
      }
      tokens.push({ type: "number", value });
      i += text.length;
    } else if (ch === "+" || ch === "-" || ch === "*" || ch === "/" || ch === "%" || ch === "^") {
      tokens.push({ type: "op", value: ch });
      i++;
    } else if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", value: ch });
      i++;
    } else {
      throw createTaggedError("invalid_expression", `Unexpected character "${ch}" at position ${i}`);
    }
  }
  return tokens;
}

class ExpressionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw createTaggedError("invalid_expression", "Empty expression");
    }
    const value = this.additive();
    if (this.pos < this.tokens.length) {
      throw createTaggedError("invalid_expression", "Unexpected trailing input");
    }
    return value;
  }

  private additive(): number {
    let left = this.multiplicative();
    for (let op = this.peekOp("+", "-"); op; op = this.peekOp("+", "-")) {
      this.pos++;
      const right = this.multiplicative();
      left = op === "+" ? left + right : left - right;
    }
    return left;
  }

  private multiplicative(): number {
    let left = this.unary();
    for (let op = this.peekOp("*", "/", "%"); op; op = this.peekOp("*", "/", "%")) {
      this.pos++;
      const right = this.unary();
      if ((op === "/" || op === "%") && right === 0) {
        throw createTaggedError("division_by_zero", "Division by zero");
      }
      left = op === "*" ? left * right : op === "/" ? left / right : left % right;
    }
    return left;
  }

  private unary(): number {
    const op = this.peekOp("+", "-");
    if (op) {
      this.pos++;
      const value = this.unary();
      return op === "-" ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp("^")) {
      this.pos++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw createTaggedError("invalid_expression", "Unexpected end of expression");
    }
    if (token.type === "number") {
      this.pos++;
      return token.value;
    }
    if (token.type === "paren" && token.value === "(") {
      this.pos++;
      const value = this.additive();
      const close = this.tokens[this.pos];
      if (!close || close.type !== "paren" || close.value !== ")") {
        throw createTaggedError("invalid_expression", "Missing closing parenthesis");
      }
      this.pos++;
      return value;
    }
    throw createTaggedError("invalid_expression", `Unexpected token "${token.value}"`);
  }

  private peekOp<T extends string>(...ops: T[]): T | undefined {
    const token = this.tokens[this.pos];
    if (token?.type !== "op") return undefined;
    return ops.find((op) => op === token.value);
  }
}
