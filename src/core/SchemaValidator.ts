import AjvModule, { type ValidateFunction, type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Schema validation result.
 */
export type ValidationResult =
  | { valid: true; data: Record<string, unknown> }
  | { valid: false; errors: ErrorObject[]; message: string };

/**
 * AJV-based JSON Schema validator with coercion and default enrichment.
 * Compiled schemas are cached by their normalized JSON form.
 */
export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly cache = new Map<string, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      coerceTypes: true,
      useDefaults: true,
      strict: false,
    });
    addFormats(this.ajv);
  }

  /**
   * Compile a schema ahead of use. Throws when the schema is malformed.
   */
  compile(schema: object): void {
    this.getOrCompile(schema);
  }

  /**
   * Validate arguments against a JSON Schema.
   * Works on a clone; coerced values and defaults appear in `data`.
   */
  validate(schema: object, data: unknown): ValidationResult {
    const validate = this.getOrCompile(schema);
    const cloned: unknown = structuredClone(data);
    if (validate(cloned) && isPlainObject(cloned)) {
      return { valid: true, data: cloned };
    }

    const errors: ErrorObject[] = validate.errors ? [...validate.errors] : [];
    const message =
      errors.length > 0
        ? errors.map(formatError).join("; ")
        : "/ must be object";
    return { valid: false, errors, message };
  }

  private getOrCompile(schema: object): ValidateFunction {
    const normalized = normalizeSchema(schema);
    const key = JSON.stringify(normalized);
    let cached = this.cache.get(key);
    if (!cached) {
      cached = this.ajv.compile(normalized);
      this.cache.set(key, cached);
    }
    return cached;
  }
}

function formatError(e: ErrorObject): string {
  if (e.keyword === "additionalProperties") {
    const extra = e.params["additionalProperty"];
    return `${e.instancePath || "/"} must NOT have additional property '${String(extra)}'`;
  }
  return `${e.instancePath || "/"} ${e.message ?? "is invalid"}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Ensure schema is AJV-compatible (required = string[], nullable folded into type). */
function normalizeSchema(schema: object): Record<string, unknown> {
  return normalizeSchemaRec(isPlainObject(schema) ? schema : {});
}

function normalizeSchemaRec(s: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(s)) {
    if (key === "required") {
      out.required = Array.isArray(value)
        ? value.filter((x): x is string => typeof x === "string")
        : typeof value === "string"
          ? [value]
          : [];
      continue;
    }
    if (key === "nullable") continue;
    if (key === "properties" && isPlainObject(value)) {
      const props: Record<string, unknown> = {};
      for (const [pk, pv] of Object.entries(value)) {
        props[pk] = isPlainObject(pv) ? normalizeSchemaRec(pv) : pv;
      }
      out.properties = props;
      continue;
    }
    if ((key === "items" || key === "additionalProperties") && isPlainObject(value)) {
      out[key] = normalizeSchemaRec(value);
      continue;
    }
    if ((key === "oneOf" || key === "anyOf" || key === "allOf") && Array.isArray(value)) {
      out[key] = value.map((item: unknown) =>
        isPlainObject(item) ? normalizeSchemaRec(item) : item,
      );
      continue;
    }
    out[key] = value;
  }

  // AJV: "nullable" requires "type". Convert nullable to type including "null".
  if (s.nullable === true) {
    const existingType = out.type;
    if (existingType === undefined) {
      out.type = "object";
    } else if (Array.isArray(existingType)) {
      if (!existingType.includes("null")) out.type = [...existingType, "null"];
    } else {
      out.type = [existingType, "null"];
    }
  }
  return out;
}
