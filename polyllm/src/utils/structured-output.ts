import type { JsonObject, JsonValue } from "../types/json.js";
import { isJsonObject } from "../types/json.js";
import type { OutputSpec } from "../types/output-spec.js";
import {
  ResponseFormatError,
  SDKError,
  StructuredOutputError,
  errorMessage,
} from "../types/errors.js";
import { safeJsonParse } from "./json.js";

const JSON_FENCE = /```json\s*([\s\S]*?)\s*```/;

/**
 * Recover a JSON value from model text. Tries, in order: the whole text,
 * the first ```json fenced block, the first balanced `{...}` object.
 */
export function extractJsonValue(rawText: string): JsonValue {
  const direct = safeJsonParse(rawText.trim());
  if (direct.success) return direct.value;

  const fenced = extractFencedJson(rawText);
  if (fenced !== undefined) {
    const parsed = safeJsonParse(fenced);
    if (parsed.success) return parsed.value;
  }

  const balanced = extractBalancedJsonObject(rawText);
  if (balanced !== undefined) {
    const parsed = safeJsonParse(balanced);
    if (parsed.success) return parsed.value;
  }

  throw new ResponseFormatError(
    "Failed to parse structured JSON output",
    rawText,
  );
}

export function extractFencedJson(text: string): string | undefined {
  const match = JSON_FENCE.exec(text);
  return match?.[1];
}

/**
 * First `{...}` substring whose braces balance, ignoring braces that
 * appear inside string literals.
 */
export function extractBalancedJsonObject(text: string): string | undefined {
  const start = text.indexOf("{");
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return undefined;
}

function describeType(value: JsonValue | undefined): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "number";
  }
  return typeof value;
}

/**
 * Check `value` against the subset of JSON Schema used for structured
 * output: primitive types, arrays with `items`, objects with `properties`
 * and `required`, and `enum`. Returns one message per mismatch.
 */
export function validateJsonSchema(
  value: JsonValue | undefined,
  schema: JsonObject,
  path = "$",
): string[] {
  const errors: string[] = [];
  validateAt(value, schema, path, errors);
  return errors;
}

function validateAt(
  value: JsonValue | undefined,
  schema: JsonObject,
  path: string,
  errors: string[],
): void {
  const allowed = schema["enum"];
  if (Array.isArray(allowed)) {
    const encoded = JSON.stringify(value);
    if (!allowed.some((candidate) => JSON.stringify(candidate) === encoded)) {
      errors.push(`Expected one of ${JSON.stringify(allowed)} at ${path}, got ${encoded}`);
    }
  }

  const type = schema["type"];
  const mismatch = () =>
    errors.push(`Expected ${String(type)} at ${path}, got ${describeType(value)}`);

  switch (type) {
    case "string":
      if (typeof value !== "string") mismatch();
      break;
    case "number":
      if (typeof value !== "number") mismatch();
      break;
    case "integer":
      if (typeof value !== "number" || !Number.isInteger(value)) mismatch();
      break;
    case "boolean":
      if (typeof value !== "boolean") mismatch();
      break;
    case "null":
      if (value !== null) mismatch();
      break;
    case "array": {
      if (!Array.isArray(value)) {
        mismatch();
        break;
      }
      const items = schema["items"];
      if (isJsonObject(items)) {
        value.forEach((item, index) =>
          validateAt(item, items, `${path}[${index}]`, errors),
        );
      }
      break;
    }
    case "object": {
      if (!isJsonObject(value)) {
        mismatch();
        break;
      }
      const required = schema["required"];
      if (Array.isArray(required)) {
        for (const prop of required) {
          if (typeof prop === "string" && !Object.hasOwn(value, prop)) {
            errors.push(`Missing required property "${prop}" at ${path}`);
          }
        }
      }
      const properties = schema["properties"];
      if (isJsonObject(properties)) {
        for (const [prop, propSchema] of Object.entries(properties)) {
          if (!isJsonObject(propSchema) || !Object.hasOwn(value, prop)) continue;
          validateAt(value[prop], propSchema, `${path}.${prop}`, errors);
        }
      }
      break;
    }
    default:
      break;
  }
}

/**
 * Extract, validate and decode structured output. `spec.fromJson` only
 * ever sees a value that passed schema validation.
 */
export function extractStructuredOutput<T>(
  rawText: string,
  spec: OutputSpec<T>,
): T {
  const value = extractJsonValue(rawText);
  return decodeStructuredOutput(value, spec, rawText);
}

export function decodeStructuredOutput<T>(
  value: JsonValue,
  spec: OutputSpec<T>,
  rawText?: string,
): T {
  const errors = validateJsonSchema(value, spec.jsonSchema);
  if (errors.length > 0) {
    throw new StructuredOutputError(spec.name, errors, rawText);
  }
  try {
    return spec.fromJson(value);
  } catch (error) {
    if (error instanceof SDKError) throw error;
    throw new StructuredOutputError(spec.name, [errorMessage(error)], rawText, {
      cause: error,
    });
  }
}

/**
 * The text to extract from, or ResponseFormatError when the model
 * produced nothing.
 */
export function requireOutputText(text: string | undefined): string {
  if (text === undefined || text.trim() === "") {
    throw new ResponseFormatError(
      "Structured output is empty or missing JSON content",
      text ?? "",
    );
  }
  return text;
}
