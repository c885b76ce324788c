import { describe, it, expect } from "vitest";
import { SchemaValidator } from "../src/core/SchemaValidator.js";

describe("SchemaValidator", () => {
  const validator = new SchemaValidator();

  const schema = {
    type: "object",
    properties: {
      name: { type: "string" },
      age: { type: "number", default: 25 },
      email: { type: "string", format: "email" },
    },
    required: ["name"],
    additionalProperties: false,
  };

  describe("validate", () => {
    it("should validate correct data", () => {
      const result = validator.validate(schema, { name: "Alice", age: 30 });
      expect(result).toEqual({ valid: true, data: { name: "Alice", age: 30 } });
    });

    it("should apply defaults without touching the input", () => {
      const input = { name: "Bob" };
      const result = validator.validate(schema, input);
      expect(result.valid && result.data["age"]).toBe(25);
      expect(input).toEqual({ name: "Bob" });
    });

    it("should coerce types", () => {
      const result = validator.validate(schema, { name: "Charlie", age: "30" });
      expect(result.valid && result.data["age"]).toBe(30);
    });

    it("should reject missing required fields with a readable message", () => {
      const result = validator.validate(schema, { age: 30 });
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.message).toBe("/ must have required property 'name'");
      }
    });

    it("should name additional properties", () => {
      const result = validator.validate(schema, { name: "Dave", nickname: "D" });
      expect(!result.valid && result.message).toBe("/ must NOT have additional property 'nickname'");
    });

    it("should report every violation", () => {
      const result = validator.validate(schema, { email: "not-an-email" });
      expect(!result.valid && result.message).toBe(
        "/ must have required property 'name'; /email must match format \"email\"",
      );
    });

    it("should reject values that are not objects", () => {
      const result = validator.validate(schema, "text");
      expect(!result.valid && result.message).toBe("/ must be object");
    });

    it("should reject arrays even when the schema has no type", () => {
      const result = validator.validate({}, [1]);
      expect(!result.valid && result.message).toBe("/ must be object");
    });

    it("should accept null for nullable properties", () => {
      const nullable = {
        type: "object",
        properties: { note: { type: "string", nullable: true } },
      };
      expect(validator.validate(nullable, { note: null }).valid).toBe(true);
    });
  });

  describe("compile", () => {
    it("should throw for a malformed schema", () => {
      expect(() =>
        validator.compile({ type: "object", properties: { a: { type: "nope" } } }),
      ).toThrow();
    });
  });
});
