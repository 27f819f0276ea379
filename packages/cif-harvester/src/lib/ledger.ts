import { z } from "zod";
import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";
import { errorMessage, isErrnoException } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LedgerLineSchema = z.object({
  id: z.string().min(1),
  outcome: z.enum(["success", "failed"]),
  detail: z.string(),
  status: z.number().int().nullable(),
  timestamp: z.string(),
  attempt: z.number().int().min(1),
  runId: z.string().optional(),
});

export type LedgerEntry = z.infer<typeof LedgerLineSchema>;
export type LedgerOutcome = LedgerEntry["outcome"];

export type AppendFn = (path: string, data: string) => Promise<void>;
export type ReadFn = (path: string) => Promise<string>;

export interface LedgerOptions {
  path: string;
  logger: Logger;
  /** Tagged onto every entry this process writes */
  runId?: string;
  clock?: Clock;
  append?: AppendFn;
  read?: ReadFn;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const defaultAppend: AppendFn = async (path, data) => {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, data, "utf-8");
};

const defaultRead: ReadFn = (path) => readFile(path, "utf-8");

/**
 * Append-only JSON Lines record of fetch outcomes, keyed by identifier.
 *
 * The in-memory view is updated as soon as `record` is called; the file
 * append happens behind it on a single promise chain so lines never
 * interleave.
 */
export class ProgressLedger {
  private readonly path: string;
  private readonly logger: Logger;
  private readonly runId?: string;
  private readonly clock: Clock;
  private readonly append: AppendFn;
  private readonly read: ReadFn;

  private readonly current = new Map<string, LedgerEntry>();
  private readonly histories = new Map<string, LedgerEntry[]>();
  private tail: Promise<void> = Promise.resolve();
  private needsLeadingNewline = false;
  private malformed = 0;

  constructor(options: LedgerOptions) {
    this.path = options.path;
    this.logger = options.logger.child({ component: "ledger" });
    this.runId = options.runId;
    this.clock = options.clock ?? systemClock;
    this.append = options.append ?? defaultAppend;
    this.read = options.read ?? defaultRead;
  }

  /** Lines skipped by the last load() */
  get malformedLines(): number {
    return this.malformed;
  }

  /**
   * Read the persisted log. A missing file is an empty ledger; bad lines
   * are counted and skipped.
   */
  async load(): Promise<Map<string, LedgerEntry>> {
    this.current.clear();
    this.histories.clear();
    this.malformed = 0;
    this.needsLeadingNewline = false;

    let content: string;
    try {
      content = await this.read(this.path);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return this.entries();
      }
      this.logger.warn("Ledger unreadable, starting empty", {
        path: this.path,
        error: errorMessage(error),
      });
      return this.entries();
    }

    this.needsLeadingNewline = content.length > 0 && !content.endsWith("\n");

    const lines = content.split("\n");
    lines.forEach((line, index) => {
      if (line.trim() === "") return;
      const entry = parseLine(line);
      if (!entry) {
        this.malformed++;
        this.logger.warn("Skipping malformed ledger line", {
          path: this.path,
          line: index + 1,
        });
        return;
      }
      this.remember(entry);
    });

    this.logger.debug("Ledger loaded", {
      identifiers: this.current.size,
      malformed: this.malformed,
    });
    return this.entries();
  }

  /** True when the most recent entry for the identifier is a success */
  isDone(id: string): boolean {
    return this.current.get(id)?.outcome === "success";
  }

  /** Current entry per identifier */
  entries(): Map<string, LedgerEntry> {
    return new Map(this.current);
  }

  /** Every entry for an identifier, oldest first */
  history(id: string): LedgerEntry[] {
    return [...(this.histories.get(id) ?? [])];
  }

  /**
   * Record an outcome. Resolves once the line is on disk or has been
   * dropped after a retry; never rejects.
   */
  record(
    id: string,
    outcome: LedgerOutcome,
    detail: string,
    status: number | null = null
  ): Promise<void> {
    const entry: LedgerEntry = {
      id,
      outcome,
      detail,
      status,
      timestamp: this.clock.isoNow(),
      attempt: (this.histories.get(id)?.length ?? 0) + 1,
      ...(this.runId !== undefined && { runId: this.runId }),
    };
    this.remember(entry);

    const next = this.tail.then(() => this.write(entry));
    this.tail = next;
    return next;
  }

  /** Resolves when every pending append has settled */
  flush(): Promise<void> {
    return this.tail;
  }

  private remember(entry: LedgerEntry): void {
    this.current.set(entry.id, entry);
    const list = this.histories.get(entry.id);
    if (list) {
      list.push(entry);
    } else {
      this.histories.set(entry.id, [entry]);
    }
  }

  private async write(entry: LedgerEntry): Promise<void> {
    const prefix = this.needsLeadingNewline ? "\n" : "";
    const line = `${prefix}${JSON.stringify(entry)}\n`;

    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        await this.append(this.path, line);
        this.needsLeadingNewline = false;
        return;
      } catch (error) {
        if (attempt === 2) {
          this.logger.warn("Ledger append failed, entry dropped", {
            id: entry.id,
            error: errorMessage(error),
          });
          return;
        }
        this.logger.debug("Ledger append failed, retrying", {
          id: entry.id,
          error: errorMessage(error),
        });
      }
    }
  }
}

function parseLine(line: string): LedgerEntry | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = LedgerLineSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}
