/**
 * Global CLI options shared by every command.
 */

import { getOutputMode, type OutputMode, type TerminalLike } from "./output/mode.js";
import {
  consoleWriter,
  createLogger,
  resolveLogLevel,
  type Logger,
  type LogLevel,
  type LogWriter,
} from "./logger.js";

export type GlobalOptions = {
  /** Output JSON instead of human-readable text */
  json?: boolean;
  /** Suppress progress indicators and info logs */
  quiet?: boolean;
  /** Debug logging */
  verbose?: boolean;
};

export interface CLIContext {
  mode: OutputMode;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Resolve the context for one command invocation.
 * JSON mode implies quiet.
 */
export function createContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  stream: TerminalLike = process.stderr
): CLIContext {
  const mode = getOutputMode({ json: options.json }, env, stream);
  return {
    mode,
    quiet: Boolean(options.quiet) || mode === "json",
    verbose: Boolean(options.verbose),
  };
}

/** Keeps stdout free for the JSON document */
const stderrWriter: LogWriter = (line) => console.error(line);

/**
 * Logger for a command, honouring --verbose/--quiet over the configured level.
 */
export function createCommandLogger(
  context: CLIContext,
  logging: { level: LogLevel; json: boolean },
  write?: LogWriter
): Logger {
  return createLogger({
    level: resolveLogLevel(context, logging.level),
    json: logging.json,
    write: write ?? (context.mode === "json" ? stderrWriter : consoleWriter),
  });
}
