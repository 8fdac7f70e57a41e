/**
 * Type-safe extraction helpers for decoded JSON.
 * These replace `as` casts when reading values that were already
 * validated against a schema.
 */
import type { JsonObject, JsonValue } from "../types/json.js";
import { isJsonObject } from "../types/json.js";

export function str(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function num(value: unknown, fallback = 0): number {
  return typeof value === "number" ? value : fallback;
}

export function bool(value: unknown, fallback = false): boolean {
  return typeof value === "boolean" ? value : fallback;
}

export function obj(value: JsonValue | undefined): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function objOrEmpty(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function arr(value: JsonValue | undefined): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

/** Read `value[key]` when value is an object. */
export function field(
  value: JsonValue | undefined,
  key: string,
): JsonValue | undefined {
  return obj(value)?.[key];
}
