/**
 * CLI pipeline: parse args -> resolve config -> connect -> REPL -> close.
 */

import {
  createShellSession,
  type DataSource,
  type DocumentRenderer,
  logWarn,
  resolveShellConfig,
  type ShellConfig,
} from "@dbnav/core";
import { getErrorMessage, ShellConfigurationError } from "@dbnav/errors";
import { connectMongo, MongoDataSource, renderMongoDocument } from "@dbnav/mongodb";
import pc from "picocolors";
import { parseArgv } from "./args.js";
import { runRepl } from "./repl.js";
import { type Colors, renderError } from "./view.js";

export interface CliArgs {
  readonly connectionString: string | undefined;
}

/**
 * Connected server handed to the session.
 */
export interface Backend {
  readonly dataSource: DataSource;
  readonly renderDocument?: DocumentRenderer;
  close(): Promise<void>;
}

export type BackendFactory = (config: ShellConfig) => Promise<Backend>;

export interface MainOptions {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  readonly errorOutput?: NodeJS.WritableStream;
  /** Line editing and key handling; defaults to whether `input` is a TTY */
  readonly terminal?: boolean;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly openBackend?: BackendFactory;
  readonly colors?: Colors;
}

export const USAGE = "Usage: dbnav [connection-string]\n";

/**
 * @throws ShellConfigurationError for any option or a second positional
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, options } = parseArgv(argv);

  const issues = [
    ...options.map((option) => ({
      field: "argv",
      message: `unknown option '${option}'`,
      code: "unknown_option",
    })),
    ...positionals.slice(1).map((extra) => ({
      field: "argv",
      message: `unexpected argument '${extra}'`,
      code: "unexpected_argument",
    })),
  ];
  if (issues.length > 0) {
    throw new ShellConfigurationError(issues);
  }

  return { connectionString: positionals[0] };
}

export function isInteractive(stream: NodeJS.ReadableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

export async function openMongoBackend(config: ShellConfig): Promise<Backend> {
  const client = await connectMongo(config.connectionString, {
    timeoutMs: config.connectTimeoutMs,
  });
  return {
    dataSource: new MongoDataSource(client),
    renderDocument: renderMongoDocument,
    close: () => client.close(),
  };
}

/**
 * @returns The process exit code: 0 after a normal quit, 1 when startup failed
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const colors = options.colors ?? pc;
  const openBackend = options.openBackend ?? openMongoBackend;

  let config: ShellConfig;
  try {
    const args = parseArgs(argv);
    config = resolveShellConfig({
      connectionString: args.connectionString,
      env: options.env ?? process.env,
    });
  } catch (error) {
    errorOutput.write(renderError(error, colors));
    errorOutput.write(USAGE);
    return 1;
  }

  let backend: Backend;
  try {
    backend = await openBackend(config);
  } catch (error) {
    errorOutput.write(renderError(error, colors));
    return 1;
  }

  try {
    const session = createShellSession(backend.dataSource, {
      config,
      renderDocument: backend.renderDocument,
    });
    await runRepl({
      session,
      input,
      output,
      terminal: options.terminal ?? isInteractive(input),
      colors,
    });
  } finally {
    await backend.close().catch((error: unknown) => {
      logWarn("cli", `Failed to close connection: ${getErrorMessage(error)}`);
    });
  }

  return 0;
}
