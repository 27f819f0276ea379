/**
 * Output mode detection for deciding how progress and results are rendered.
 */

export type OutputMode = "tui" | "static" | "json";

export interface OutputFlags {
  json?: boolean;
}

/** The part of a stream that capability detection looks at */
export interface TerminalLike {
  isTTY?: boolean;
}

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal, animated progress
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  flags: OutputFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  stream: TerminalLike = process.stderr
): OutputMode {
  if (flags.json || env.CIF_HARVESTER_JSON === "1" || env.CIF_HARVESTER_JSON === "true") {
    return "json";
  }

  // CI environment
  if (env.CI || env.CIF_HARVESTER_NON_INTERACTIVE) {
    return "static";
  }

  // Progress goes to stderr; a redirected stderr can't animate
  if (!stream.isTTY) {
    return "static";
  }

  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}

/**
 * Read --json out of a raw argv, for errors raised before commander has
 * parsed anything.
 */
export function outputModeFromArgv(argv: string[]): OutputMode {
  return getOutputMode({ json: argv.includes("--json") });
}
