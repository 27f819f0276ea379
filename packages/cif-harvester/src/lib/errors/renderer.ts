import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import type { OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines;
}

/**
 * Build the styled lines for an error block.
 */
export function formatStaticError(error: CLIError, width = Math.min(getTerminalWidth(), 80)): string[] {
  const output: string[] = [""];

  const [first = "", ...rest] = wrapText(error.message, width - 4);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, width - 4)) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const [head = "", ...tail] = wrapText(error.suggestion, width - 4);
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`    ${line}`);
    }
  }

  const examples = error.examples ?? [];
  if (examples.length === 1) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    output.push("");
    output.push(`  ${chalk.dim("Examples:")}`);
    for (const ex of examples.slice(0, 3)) {
      output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
    }
  }

  output.push("");
  return output;
}

/**
 * Build the JSON document for an error.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    examples: error.examples,
    details: error.details,
  };

  return Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );
}

/**
 * Render an error to stderr based on the output mode.
 */
export function renderError(error: CLIError, mode: OutputMode): void {
  if (mode === "json") {
    console.error(JSON.stringify(formatJsonError(error), null, 2));
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}

export { CLIError, isCLIError };
