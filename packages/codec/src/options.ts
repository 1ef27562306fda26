import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { FieldScope } from "./expression";
import { NOOP_LOGGER } from "./logger";
import type { CodecLogger } from "./types";

export const DEFAULT_MAX_VARINT_BYTES = 10;

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

function isCodecLogger(value: unknown): value is CodecLogger {
  if (typeof value !== "object" || value === null) return false;
  return LOG_LEVELS.every((level) => typeof Reflect.get(value, level) === "function");
}

const optionsSchema = z
  .object({
    context: z.unknown(),
    logger: z.custom<CodecLogger>(isCodecLogger, "logger must provide debug, info, warn and error functions").optional(),
    exact: z.boolean().optional(),
    maxVarintBytes: z.number().int().positive().optional(),
    lastField: z.string().min(1).optional(),
    count: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine((options) => options.lastField === undefined || options.count === undefined, {
    message: "Pass either lastField or count, not both",
  });

export interface ResolvedOptions {
  context: unknown;
  logger: CodecLogger;
  exact?: boolean;
  maxVarintBytes: number;
  lastField?: string;
  count?: number;
}

/** State threaded through one load or dump operation. */
export interface CodecState {
  readonly context: unknown;
  readonly logger: CodecLogger;
  readonly maxVarintBytes: number;
  readonly scope: FieldScope;
}

export function resolveOptions(options: unknown, operation: string): ResolvedOptions {
  const result = optionsSchema.safeParse(options ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigurationError(`Invalid options for ${operation}: ${issues.join("; ")}`, { issues });
  }
  const parsed = result.data;
  return {
    context: parsed.context,
    logger: parsed.logger ?? NOOP_LOGGER,
    exact: parsed.exact,
    maxVarintBytes: parsed.maxVarintBytes ?? DEFAULT_MAX_VARINT_BYTES,
    lastField: parsed.lastField,
    count: parsed.count,
  };
}

export function createState(options: ResolvedOptions, scope: FieldScope = { values: {} }): CodecState {
  return { context: options.context, logger: options.logger, maxVarintBytes: options.maxVarintBytes, scope };
}

export function withScope(state: CodecState, scope: FieldScope): CodecState {
  return { ...state, scope };
}
