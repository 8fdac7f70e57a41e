import { describe, test, expect } from "vitest";
import {
  extractBalancedJsonObject,
  extractFencedJson,
  extractJsonValue,
  extractStructuredOutput,
  requireOutputText,
  validateJsonSchema,
} from "../../src/utils/structured-output.js";
import { OutputSpec } from "../../src/types/output-spec.js";
import { ResponseFormatError, StructuredOutputError } from "../../src/types/errors.js";

const intSpec = OutputSpec.intValue();

describe("extractStructuredOutput", () => {
  test("parses the whole text as JSON", () => {
    expect(extractStructuredOutput('{"value":42}', intSpec)).toBe(42);
  });

  test("parses a ```json fenced block", () => {
    expect(extractStructuredOutput('```json\n{"value":99}\n```', intSpec)).toBe(99);
  });

  test("finds the first balanced object in surrounding prose", () => {
    expect(extractStructuredOutput('intro {"value":7} outro', intSpec)).toBe(7);
  });

  test("raises ResponseFormatError when no JSON is present", () => {
    expect(() => extractStructuredOutput("not json", intSpec)).toThrow(ResponseFormatError);
  });

  test("raises StructuredOutputError on a shape mismatch", () => {
    try {
      extractStructuredOutput('{"value":"x"}', intSpec);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(StructuredOutputError);
      if (error instanceof StructuredOutputError) {
        expect(error.schemaName).toBe("IntValue");
        expect(error.errors).toEqual(["Expected integer at $.value, got string"]);
        expect(error.rawText).toBe('{"value":"x"}');
      }
    }
  });

  test("never calls fromJson on an invalid value", () => {
    let calls = 0;
    const spec: OutputSpec<number> = {
      name: "Counted",
      jsonSchema: {
        type: "object",
        properties: { n: { type: "number" } },
        required: ["n"],
      },
      fromJson: () => {
        calls++;
        return 0;
      },
    };
    expect(() => extractStructuredOutput('{"m": 1}', spec)).toThrow(StructuredOutputError);
    expect(calls).toBe(0);
  });

  test("wraps a throwing fromJson in StructuredOutputError", () => {
    const spec: OutputSpec<number> = {
      name: "Broken",
      jsonSchema: { type: "object" },
      fromJson: () => {
        throw new Error("cannot decode");
      },
    };
    expect(() => extractStructuredOutput("{}", spec)).toThrow(
      "Structured output does not match schema: cannot decode",
    );
  });
});

describe("extractJsonValue", () => {
  test("ignores braces inside string literals while scanning", () => {
    expect(extractJsonValue('Result: {"note": "use } and {", "n": 1} done')).toEqual({
      note: "use } and {",
      n: 1,
    });
  });

  test("handles escaped quotes inside strings", () => {
    expect(extractJsonValue('x {"q": "say \\"}\\" now"} y')).toEqual({ q: 'say "}" now' });
  });

  test("prefers the fenced block over a later object", () => {
    expect(extractJsonValue('```json\n{"a": 1}\n```\nand {"a": 2}')).toEqual({ a: 1 });
  });

  test("keeps the raw text on the format error", () => {
    try {
      extractJsonValue("intro { broken");
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ResponseFormatError);
      if (error instanceof ResponseFormatError) {
        expect(error.message).toBe("Failed to parse structured JSON output");
        expect(error.rawText).toBe("intro { broken");
      }
    }
  });
});

describe("extractFencedJson", () => {
  test("returns the fence interior without surrounding whitespace", () => {
    expect(extractFencedJson('text\n```json\n  {"a": 1}  \n```\n')).toBe('{"a": 1}');
  });

  test("returns undefined without a json fence", () => {
    expect(extractFencedJson("```\n{}\n```")).toBeUndefined();
  });
});

describe("extractBalancedJsonObject", () => {
  test("returns the first balanced object", () => {
    expect(extractBalancedJsonObject('a {"x": {"y": 2}} b {"z": 3}')).toBe('{"x": {"y": 2}}');
  });

  test("returns undefined when braces never balance", () => {
    expect(extractBalancedJsonObject('a {"x": {"y": 2}')).toBeUndefined();
  });
});

describe("validateJsonSchema", () => {
  const schema = {
    type: "object",
    properties: {
      name: { type: "string" },
      tags: { type: "array", items: { type: "string" } },
      level: { type: "string", enum: ["low", "high"] },
    },
    required: ["name", "tags"],
  };

  test("accepts a conforming value", () => {
    expect(validateJsonSchema({ name: "a", tags: ["x"], level: "low" }, schema)).toEqual([]);
  });

  test("reports every mismatch with its path", () => {
    expect(validateJsonSchema({ tags: ["x", 2], level: "mid" }, schema)).toEqual([
      'Missing required property "name" at $',
      "Expected string at $.tags[1], got integer",
      'Expected one of ["low","high"] at $.level, got "mid"',
    ]);
  });

  test("distinguishes integers from other numbers", () => {
    expect(validateJsonSchema(1.5, { type: "integer" })).toEqual([
      "Expected integer at $, got number",
    ]);
    expect(validateJsonSchema(2, { type: "integer" })).toEqual([]);
  });

  test("ignores properties inherited from the object prototype", () => {
    const withBuiltinNames = {
      type: "object",
      properties: { a: { type: "integer" }, constructor: { type: "string" } },
      required: ["toString"],
    };
    expect(validateJsonSchema({ a: 1 }, withBuiltinNames)).toEqual([
      'Missing required property "toString" at $',
    ]);
    expect(validateJsonSchema({ a: 1, toString: "x" }, withBuiltinNames)).toEqual([]);
  });

  test("reports a non-object root", () => {
    expect(validateJsonSchema([1], { type: "object" })).toEqual([
      "Expected object at $, got array",
    ]);
  });
});

describe("requireOutputText", () => {
  test("rejects empty text", () => {
    expect(() => requireOutputText("  ")).toThrow(
      "Structured output is empty or missing JSON content",
    );
    expect(() => requireOutputText(undefined)).toThrow(ResponseFormatError);
  });

  test("returns non-empty text unchanged", () => {
    expect(requireOutputText(" {} ")).toBe(" {} ");
  });
});
