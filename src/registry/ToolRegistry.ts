import type { ErrorObject } from "ajv";
import { SchemaValidator } from "../core/SchemaValidator.js";
import type {
  RiskClass,
  Tool,
  ToolCatalogEntry,
  ToolDefinition,
  ToolExecutor,
  ValidatedArgs,
} from "../types/ToolSpec.js";
import { RISK_CLASSES } from "../types/ToolSpec.js";
import {
  DuplicateToolError,
  InvalidToolDefinitionError,
  UnknownToolError,
} from "./errors.js";

/**
 * Search query for tools.
 */
export interface ToolSearchQuery {
  /** Text search in name/description */
  text?: string;
  riskClass?: RiskClass;
}

/**
 * Structured schema violation.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

export type ArgsValidation =
  | { ok: true; args: ValidatedArgs }
  | { ok: false; error: { message: string; issues: ValidationIssue[] } };

/**
 * Read-only view of a registry, taken once per session.
 */
export interface ToolView {
  resolve(name: string): Tool;
  has(name: string): boolean;
  validate(tool: Tool, rawArgs: unknown): ArgsValidation;
  catalog(): readonly ToolCatalogEntry[];
}

const TOOL_NAME = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Tool Registry: name → (definition, executor).
 * Registration order is preserved. Mutations replace the backing map so that
 * snapshots handed to running sessions never change underneath them.
 */
export class ToolRegistry implements ToolView {
  private tools: ReadonlyMap<string, Tool> = new Map();
  private catalogCache: readonly ToolCatalogEntry[] | undefined;
  private readonly validator: SchemaValidator;

  constructor(validator: SchemaValidator = new SchemaValidator()) {
    this.validator = validator;
  }

  /**
   * Register a tool. Compiles the input schema up front.
   */
  register(name: string, definition: ToolDefinition, executor: ToolExecutor): Tool {
    if (this.tools.has(name)) throw new DuplicateToolError(name);
    this.validateDefinition(name, definition);

    const tool: Tool = Object.freeze({
      ...definition,
      name,
      description: definition.description ?? "",
      execute: executor,
    });
    const next = new Map(this.tools);
    next.set(name, tool);
    this.tools = next;
    this.catalogCache = undefined;
    return tool;
  }

  /**
   * Remove a tool. Running sessions keep the snapshot they started with.
   */
  unregister(name: string): boolean {
    if (!this.tools.has(name)) return false;
    const next = new Map(this.tools);
    next.delete(name);
    this.tools = next;
    this.catalogCache = undefined;
    return true;
  }

  resolve(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name);
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Structural validation of raw arguments (types, required, enums,
   * additional properties). Returns coerced arguments with defaults applied.
   */
  validate(tool: Tool, rawArgs: unknown): ArgsValidation {
    const result = this.validator.validate(tool.inputSchema, rawArgs);
    if (result.valid) {
      return { ok: true, args: Object.freeze(result.data) };
    }
    return {
      ok: false,
      error: { message: result.message, issues: result.errors.map(toIssue) },
    };
  }

  /**
   * Registration-ordered catalog for prompt assembly.
   */
  catalog(): readonly ToolCatalogEntry[] {
    if (!this.catalogCache) {
      this.catalogCache = Object.freeze(
        [...this.tools.values()].map((tool) =>
          Object.freeze({
            name: tool.name,
            description: tool.description ?? "",
            riskClass: tool.riskClass,
            inputSchema: tool.inputSchema,
          }),
        ),
      );
    }
    return this.catalogCache;
  }

  /**
   * Immutable view of the current tools.
   */
  snapshot(): ToolView {
    const tools = this.tools;
    const catalog = this.catalog();
    return {
      resolve: (name) => {
        const tool = tools.get(name);
        if (!tool) throw new UnknownToolError(name);
        return tool;
      },
      has: (name) => tools.has(name),
      validate: (tool, rawArgs) => this.validate(tool, rawArgs),
      catalog: () => catalog,
    };
  }

  search(query: ToolSearchQuery): Tool[] {
    let candidates = [...this.tools.values()];
    if (query.riskClass) {
      candidates = candidates.filter((t) => t.riskClass === query.riskClass);
    }
    if (query.text) {
      const lower = query.text.toLowerCase();
      candidates = candidates.filter(
        (t) =>
          t.name.toLowerCase().includes(lower) ||
          t.description?.toLowerCase().includes(lower),
      );
    }
    return candidates;
  }

  list(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  private validateDefinition(name: string, definition: ToolDefinition): void {
    if (!TOOL_NAME.test(name)) {
      throw new InvalidToolDefinitionError(name, "name must match " + TOOL_NAME.source);
    }
    if (!RISK_CLASSES.includes(definition.riskClass)) {
      throw new InvalidToolDefinitionError(
        name,
        `unknown risk class "${String(definition.riskClass)}"`,
      );
    }
    const schemaType = definition.inputSchema["type"];
    if (schemaType !== undefined && schemaType !== "object") {
      throw new InvalidToolDefinitionError(name, "inputSchema must describe an object");
    }
    try {
      this.validator.compile(definition.inputSchema);
    } catch (err) {
      throw new InvalidToolDefinitionError(
        name,
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}

function toIssue(e: ErrorObject): ValidationIssue {
  return { path: e.instancePath || "/", message: e.message ?? "is invalid" };
}
