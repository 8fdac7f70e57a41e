import type { ZodType, ZodTypeDef } from "zod";
import type {
  StructuredToolHandler,
  ToolDefinition,
  ToolExecutionContext,
  ToolHandler,
  ToolHandlers,
} from "../types/tool.js";
import { ConfigurationError } from "../types/errors.js";
import type { ApprovalCheck } from "./approval.js";

interface BaseToolSpec {
  name: string;
  description: string;
  /** JSON Schema for the arguments, sent to the model as-is. */
  parameters: Record<string, unknown>;
  /** `true` always asks; a function decides per call. */
  needsApproval?: boolean | ApprovalCheck;
}

export interface PlainToolSpec extends BaseToolSpec {
  execute(args: Record<string, unknown>, context: ToolExecutionContext): unknown;
}

export interface SchemaToolSpec<T> extends BaseToolSpec {
  /** Validates parsed arguments before `execute` sees them. */
  schema: ZodType<T, ZodTypeDef, unknown>;
  execute(args: T, context: ToolExecutionContext): unknown;
}

export interface DefinedTool {
  readonly definition: ToolDefinition;
  readonly handler: ToolHandler;
  readonly approvalCheck?: ApprovalCheck;
}

function approvalCheckFor(spec: BaseToolSpec): ApprovalCheck | undefined {
  const { needsApproval } = spec;
  if (needsApproval === undefined || needsApproval === false) return undefined;
  if (needsApproval === true) return () => true;
  return needsApproval;
}

export function defineTool(spec: PlainToolSpec): DefinedTool;
export function defineTool<T>(spec: SchemaToolSpec<T>): DefinedTool;
export function defineTool<T>(spec: PlainToolSpec | SchemaToolSpec<T>): DefinedTool {
  const definition: ToolDefinition = {
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
  };

  let handler: StructuredToolHandler;
  if ("schema" in spec) {
    const schemaSpec = spec;
    handler = {
      parseArguments: true,
      execute: (args, context) => {
        const parsed = schemaSpec.schema.safeParse(args);
        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
          throw new Error(`Invalid arguments for tool "${schemaSpec.name}": ${issues}`);
        }
        return schemaSpec.execute(parsed.data, context);
      },
    };
  } else {
    const plainSpec = spec;
    handler = {
      parseArguments: true,
      execute: (args, context) => plainSpec.execute(args, context),
    };
  }

  return { definition, handler, approvalCheck: approvalCheckFor(spec) };
}

/**
 * Catalog, handler registry and scoped approval checks for a set of tools,
 * ready to spread into tool loop options.
 */
export interface ToolSet {
  readonly tools: ToolDefinition[];
  readonly toolHandlers: ToolHandlers;
  readonly toolApprovalChecks: Readonly<Record<string, ApprovalCheck>>;
}

export function createToolSet(tools: readonly DefinedTool[]): ToolSet {
  const definitions: ToolDefinition[] = [];
  const handlers: Record<string, ToolHandler> = {};
  const checks: Record<string, ApprovalCheck> = {};

  for (const tool of tools) {
    const name = tool.definition.name;
    if (Object.hasOwn(handlers, name)) {
      throw new ConfigurationError(`Duplicate tool name "${name}"`);
    }
    definitions.push(tool.definition);
    handlers[name] = tool.handler;
    if (tool.approvalCheck) {
      checks[name] = tool.approvalCheck;
    }
  }

  return { tools: definitions, toolHandlers: handlers, toolApprovalChecks: checks };
}
