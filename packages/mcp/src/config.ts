/**
 * Server configuration from the environment.
 */

import { z } from "zod";
import { LogLevel, parseLogLevel } from "@shapekit/core";

const envSchema = z.object({
  SHAPEKIT_LOG_LEVEL: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return LogLevel.WARN;
      const level = parseLogLevel(value);
      if (level === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected one of debug, info, warn, error; got '${value}'`,
        });
        return z.NEVER;
      }
      return level;
    }),
  SHAPEKIT_PACKAGE_PATH: z.string().optional().default(""),
});

export interface Config {
  logLevel: LogLevel;
  /** Directories searched for package:// URIs. */
  packagePath: string[];
}

export function loadConfig(env: Record<string, string | undefined> = process.env, separator = ":"): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    logLevel: parsed.data.SHAPEKIT_LOG_LEVEL,
    packagePath: parsed.data.SHAPEKIT_PACKAGE_PATH.split(separator).filter((dir) => dir.length > 0),
  };
}
