/**
 * Progress reporting for fetch runs.
 * The engine only sees ProgressReporter; which one is active depends on
 * the output mode.
 */

import ora, { type Ora } from "ora";
import type { OutputMode } from "./output/mode.js";
import { consoleWriter, type LogLevel, type LogWriter } from "./logger.js";
import type { AttemptOutcome, FetchSummary } from "./fetch-engine.js";

export interface ProgressCounts {
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface ProgressEvent extends ProgressCounts {
  outcome: AttemptOutcome;
}

export interface ProgressReporter {
  start(total: number): void;
  advance(event: ProgressEvent): void;
  /** Print a log line without tearing the progress display */
  log(line: string, level: LogLevel): void;
  finish(summary: FetchSummary): void;
}

/** Plain reporters print every this many completions */
export const PLAIN_REPORT_EVERY = 10;

export function formatProgressText(counts: ProgressCounts): string {
  return `Fetching ${counts.completed}/${counts.total} · ${counts.succeeded} ok · ${counts.failed} failed`;
}

/**
 * No-op reporter for quiet/JSON mode.
 * Log lines go to stderr so stdout stays machine-readable.
 */
export class SilentProgressReporter implements ProgressReporter {
  constructor(private readonly write: LogWriter = (line) => console.error(line)) {}

  start(_total: number): void {}

  advance(_event: ProgressEvent): void {}

  log(line: string, level: LogLevel): void {
    this.write(line, level);
  }

  finish(_summary: FetchSummary): void {}
}

/**
 * Periodic plain lines for CI logs and pipes.
 */
export class PlainProgressReporter implements ProgressReporter {
  constructor(
    private readonly write: (line: string) => void = (line) => {
      process.stderr.write(`${line}\n`);
    },
    private readonly every: number = PLAIN_REPORT_EVERY,
    private readonly logWriter: LogWriter = consoleWriter
  ) {}

  start(total: number): void {
    if (total > 0) {
      this.write(`Fetching ${total} identifier${total === 1 ? "" : "s"}`);
    }
  }

  advance(event: ProgressEvent): void {
    if (event.completed % this.every === 0 || event.completed === event.total) {
      this.write(formatProgressText(event));
    }
  }

  log(line: string, level: LogLevel): void {
    this.logWriter(line, level);
  }

  finish(_summary: FetchSummary): void {}
}

/**
 * Spinner for interactive terminals.
 */
export class OraProgressReporter implements ProgressReporter {
  constructor(
    private readonly spinner: Ora = ora({ stream: process.stderr }),
    private readonly logWriter: LogWriter = consoleWriter
  ) {}

  start(total: number): void {
    if (total === 0) return;
    this.spinner.text = formatProgressText({ completed: 0, total, succeeded: 0, failed: 0 });
    this.spinner.start();
  }

  advance(event: ProgressEvent): void {
    this.spinner.text = formatProgressText(event);
  }

  log(line: string, level: LogLevel): void {
    if (!this.spinner.isSpinning) {
      this.logWriter(line, level);
      return;
    }
    this.spinner.clear();
    this.logWriter(line, level);
    this.spinner.render();
  }

  finish(summary: FetchSummary): void {
    if (!this.spinner.isSpinning) return;
    const done = `${summary.succeeded}/${summary.dispatched} fetched`;
    if (summary.interrupted) {
      this.spinner.warn(`Interrupted: ${done}`);
    } else if (summary.failed > 0) {
      this.spinner.warn(`${done}, ${summary.failed} failed`);
    } else {
      this.spinner.succeed(done);
    }
  }
}

/**
 * Pick the reporter for the detected output mode.
 */
export function selectProgressReporter(
  mode: OutputMode,
  options: { quiet?: boolean } = {}
): ProgressReporter {
  if (mode === "json" || options.quiet) {
    return new SilentProgressReporter();
  }
  if (mode === "tui") {
    return new OraProgressReporter();
  }
  return new PlainProgressReporter();
}
