import { z } from "zod";
import { ConfigurationError } from "../types/errors.js";
import type { Logger } from "./logger.js";
import { ConsoleLogger, LogLevel, silentLogger } from "./logger.js";

export const DEFAULT_MAX_STEPS = 10;

export const ToolExecutionModeEnum = z.enum(["parallel", "sequential"]);

export type ToolExecutionMode = z.infer<typeof ToolExecutionModeEnum>;

export const LogLevelEnum = z.enum([
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SILENT,
]);

export const ToolLoopSettingsSchema = z.object({
  maxSteps: z.number().int().min(1, "maxSteps must be >= 1").default(DEFAULT_MAX_STEPS),
  toolExecution: ToolExecutionModeEnum.default("parallel"),
  maxToolRetries: z.number().int().min(0, "maxToolRetries must be >= 0").default(0),
});

export type ToolLoopSettings = z.infer<typeof ToolLoopSettingsSchema>;
export type ToolLoopSettingsInput = z.input<typeof ToolLoopSettingsSchema>;

const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

export const EnvConfigSchema = z.object({
  POLYLLM_MAX_STEPS: optionalEnv(z.coerce.number().int().min(1)),
  POLYLLM_TOOL_EXECUTION: optionalEnv(ToolExecutionModeEnum),
  POLYLLM_MAX_TOOL_RETRIES: optionalEnv(z.coerce.number().int().min(0)),
  POLYLLM_LOG_LEVEL: optionalEnv(LogLevelEnum),
});

export interface PolyllmConfig {
  toolLoop: ToolLoopSettings;
  logLevel: LogLevel;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate tool loop settings and fill in defaults.
 */
export function resolveToolLoopSettings(
  input: ToolLoopSettingsInput = {},
): ToolLoopSettings {
  const result = ToolLoopSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid tool loop options: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Read defaults from POLYLLM_* environment variables. Unset or empty
 * variables fall back to the built-in defaults.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): PolyllmConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`, issues);
  }
  const parsed = result.data;
  return {
    toolLoop: resolveToolLoopSettings({
      maxSteps: parsed.POLYLLM_MAX_STEPS,
      toolExecution: parsed.POLYLLM_TOOL_EXECUTION,
      maxToolRetries: parsed.POLYLLM_MAX_TOOL_RETRIES,
    }),
    logLevel: parsed.POLYLLM_LOG_LEVEL ?? LogLevel.SILENT,
  };
}

export function createLogger(config: Pick<PolyllmConfig, "logLevel">): Logger {
  if (config.logLevel === LogLevel.SILENT) return silentLogger;
  return new ConsoleLogger({ level: config.logLevel, context: { lib: "polyllm" } });
}
