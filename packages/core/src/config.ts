/**
 * Shell configuration: zod schema, defaults and resolution from argv/env.
 */

import { ShellConfigurationError } from "@dbnav/errors";
import { z } from "zod";
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONNECTION_STRING,
  DEFAULT_LIST_LIMIT,
  DEFAULT_LIST_TIMEOUT_MS,
  DEFAULT_RESOLVE_TIMEOUT_MS,
} from "./types.js";

/** Environment variable consulted when no connection string is given */
export const CONNECTION_STRING_ENV = "DBNAV_URI";

export const ShellConfigSchema = z.object({
  connectionString: z
    .string()
    .regex(/^mongodb(\+srv)?:\/\/\S+$/, "must start with mongodb:// or mongodb+srv://")
    .default(DEFAULT_CONNECTION_STRING),
  listLimit: z.number().int().min(1).default(DEFAULT_LIST_LIMIT),
  resolveTimeoutMs: z.number().int().min(1).default(DEFAULT_RESOLVE_TIMEOUT_MS),
  listTimeoutMs: z.number().int().min(1).default(DEFAULT_LIST_TIMEOUT_MS),
  connectTimeoutMs: z.number().int().min(1).default(DEFAULT_CONNECT_TIMEOUT_MS),
});

export type ShellConfig = z.infer<typeof ShellConfigSchema>;

export interface ShellConfigSources {
  /** Positional argument from the command line */
  readonly connectionString?: string | undefined;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Positional argument first, then `DBNAV_URI`, then the local default.
 *
 * @throws ShellConfigurationError listing every failed field
 */
export function resolveShellConfig(sources: ShellConfigSources = {}): ShellConfig {
  const fromEnv = sources.env?.[CONNECTION_STRING_ENV];
  const connectionString =
    sources.connectionString ?? (fromEnv !== undefined && fromEnv !== "" ? fromEnv : undefined);

  const parsed = ShellConfigSchema.safeParse({ connectionString });
  if (!parsed.success) {
    throw new ShellConfigurationError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join(".") || "(root)",
        message: issue.message,
        code: issue.code,
      })),
    );
  }
  return parsed.data;
}
