import type { ZodType, ZodTypeDef } from "zod";
import type { JsonObject, JsonValue } from "./json.js";
import { StructuredOutputError } from "./errors.js";
import { arr, bool, field, num, objOrEmpty, str } from "../utils/extract.js";

/**
 * Declares the shape of a structured answer and how to decode it.
 * `fromJson` is only called with a value that satisfies `jsonSchema`.
 */
export interface OutputSpec<T> {
  readonly name: string;
  readonly description?: string;
  readonly jsonSchema: JsonObject;
  fromJson(value: JsonValue): T;
}

export interface ObjectOutputOptions<T> {
  name: string;
  description?: string;
  properties: JsonObject;
  required?: string[];
  fromJson: (value: JsonObject) => T;
}

function wrapped<T>(
  name: string,
  valueSchema: JsonObject,
  decode: (value: JsonValue | undefined) => T,
  description?: string,
): OutputSpec<T> {
  return {
    name,
    description,
    jsonSchema: {
      type: "object",
      properties: { value: valueSchema },
      required: ["value"],
    },
    fromJson: (json) => decode(field(json, "value")),
  };
}

export namespace OutputSpec {
  export function object<T>(options: ObjectOutputOptions<T>): OutputSpec<T> {
    return {
      name: options.name,
      description: options.description,
      jsonSchema: {
        type: "object",
        properties: options.properties,
        required: options.required ?? [],
      },
      fromJson: (json) => options.fromJson(objOrEmpty(json)),
    };
  }

  /** `{"value": "<string>"}` */
  export function stringValue(name = "StringValue", description?: string): OutputSpec<string> {
    return wrapped(name, { type: "string" }, (value) => str(value), description);
  }

  /** `{"value": <integer>}` */
  export function intValue(name = "IntValue", description?: string): OutputSpec<number> {
    return wrapped(name, { type: "integer" }, (value) => num(value), description);
  }

  /** `{"value": <number>}` */
  export function numberValue(name = "NumberValue", description?: string): OutputSpec<number> {
    return wrapped(name, { type: "number" }, (value) => num(value), description);
  }

  /** `{"value": <boolean>}` */
  export function boolValue(name = "BoolValue", description?: string): OutputSpec<boolean> {
    return wrapped(name, { type: "boolean" }, (value) => bool(value), description);
  }

  /** `{"items": [...]}`, each item decoded by `item`. */
  export function listOf<T>(item: OutputSpec<T>, name = `${item.name}List`): OutputSpec<T[]> {
    return {
      name,
      description: item.description,
      jsonSchema: {
        type: "object",
        properties: { items: { type: "array", items: item.jsonSchema } },
        required: ["items"],
      },
      fromJson: (json) => arr(field(json, "items")).map((entry) => item.fromJson(entry)),
    };
  }

  /**
   * Decode through a zod schema after the JSON-schema check. zod v3 does not
   * emit JSON Schema, so the schema sent to the model is supplied separately.
   */
  export function zod<T>(
    name: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    jsonSchema: JsonObject,
    description?: string,
  ): OutputSpec<T> {
    return {
      name,
      description,
      jsonSchema,
      fromJson: (json) => {
        const result = schema.safeParse(json);
        if (!result.success) {
          throw new StructuredOutputError(
            name,
            result.error.issues.map(
              (issue) => `${issue.message} at $${issue.path.map((p) => `.${p}`).join("")}`,
            ),
          );
        }
        return result.data;
      },
    };
  }
}
