import type { ToolDefinition } from "../types/tool.js";
import { isJsonObject } from "../types/json.js";
import { ConfigurationError } from "../types/errors.js";

const TOOL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;
const MAX_TOOL_NAME_LENGTH = 64;

export function validateToolName(name: string): string | undefined {
  if (name.length === 0) return "name is empty";
  if (name.length > MAX_TOOL_NAME_LENGTH) {
    return `name exceeds ${MAX_TOOL_NAME_LENGTH} characters`;
  }
  if (!TOOL_NAME_PATTERN.test(name)) {
    return "name must start with a letter and contain only letters, digits, '_' or '-'";
  }
  return undefined;
}

export function validateToolDefinitions(tools?: readonly ToolDefinition[]): void {
  if (!tools) {
    return;
  }

  const seen = new Set<string>();
  for (const tool of tools) {
    const nameError = validateToolName(tool.name);
    if (nameError) {
      throw new ConfigurationError(`Invalid tool name "${tool.name}": ${nameError}`);
    }
    if (seen.has(tool.name)) {
      throw new ConfigurationError(`Duplicate tool name "${tool.name}"`);
    }
    seen.add(tool.name);

    if (!isJsonObject(tool.parameters) || tool.parameters["type"] !== "object") {
      throw new ConfigurationError(
        `Tool "${tool.name}" parameters must have "type": "object" at the root`,
      );
    }
  }
}
