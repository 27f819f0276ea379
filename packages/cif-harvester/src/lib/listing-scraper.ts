import { appendFile, readFile } from "fs/promises";
import type { Logger } from "./logger.js";
import type { DelayFn } from "./ports/timer.js";
import type { ResourceFetcher } from "./ports/resource-fetcher.js";
import { realDelay } from "./adapters/real-timers.js";
import { buildListingUrl, parseListingPage } from "./listing-parser.js";
import { parseIdentifierList } from "./id-list.js";
import {
  emptyBody,
  failureReason,
  inputNotReadable,
  listingUnexpected,
  unexpectedStatus,
} from "./errors/catalog.js";
import { errorMessage, isErrnoException } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScrapeConfig {
  sid: number;
  /** Identifier list the scrape appends to */
  outputPath: string;
  listingUrlTemplate: string;
  /** Pause between pages and before retrying a failed page */
  intervalMs: number;
  /** Attempts per page before the scrape gives up */
  maxAttempts: number;
  maxPages?: number;
  timeoutMs: number;
  userAgent: string;
}

export type ScrapeStopReason = "no-rows" | "no-links" | "last-page" | "max-pages" | "interrupted";

export interface ScrapeSummary {
  pagesFetched: number;
  added: number;
  totalKnown: number;
  stopReason: ScrapeStopReason;
}

export interface ScraperDeps {
  fetcher: ResourceFetcher;
  logger: Logger;
  delay?: DelayFn;
  signal?: AbortSignal;
  append?: (path: string, data: string) => Promise<void>;
  read?: (path: string) => Promise<string>;
}

const SNIPPET_LENGTH = 200;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

async function readExisting(path: string, read: (path: string) => Promise<string>): Promise<string> {
  try {
    return await read(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return "";
    throw inputNotReadable(path, errorMessage(error));
  }
}

/**
 * Walk the listing table page by page, appending ids not already in the
 * output file. Progress is on disk after every page, so an interrupted
 * scrape resumes where it left off.
 */
export async function scrapeListing(config: ScrapeConfig, deps: ScraperDeps): Promise<ScrapeSummary> {
  const { fetcher, signal } = deps;
  const delay = deps.delay ?? realDelay;
  const append = deps.append ?? ((path: string, data: string) => appendFile(path, data, "utf-8"));
  const logger = deps.logger.child({ component: "scraper", sid: config.sid });

  const existing = await readExisting(config.outputPath, deps.read ?? ((path: string) => readFile(path, "utf-8")));
  const known = new Set(parseIdentifierList(existing));
  let needsLeadingNewline = existing.length > 0 && !existing.endsWith("\n");

  if (known.size > 0) {
    logger.info("Resuming with known ids", { path: config.outputPath, known: known.size });
  }

  async function fetchPage(url: string): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      try {
        const { status, statusText, body } = await fetcher.get(url, {
          timeoutMs: config.timeoutMs,
          headers: { "User-Agent": config.userAgent },
        });
        if (status !== 200) throw unexpectedStatus(url, status, statusText);
        if (body.length === 0) throw emptyBody(url);
        return body.toString("utf-8");
      } catch (error) {
        if (attempt >= config.maxAttempts || signal?.aborted) throw error;
        logger.warn("Listing page failed, retrying", {
          url,
          attempt,
          reason: failureReason(error),
        });
        await delay(config.intervalMs, signal);
      }
    }
  }

  let page = 0;
  let pagesFetched = 0;
  let added = 0;
  let stopReason: ScrapeStopReason;

  for (;;) {
    if (signal?.aborted) {
      stopReason = "interrupted";
      break;
    }

    const url = buildListingUrl(config.listingUrlTemplate, config.sid, page);
    const html = await fetchPage(url);
    pagesFetched++;

    const listing = parseListingPage(html);
    if (listing.rowCount === 0) {
      if (page === 0) {
        throw listingUnexpected(url, "no table rows", html.slice(0, SNIPPET_LENGTH));
      }
      stopReason = "no-rows";
      break;
    }
    if (listing.ids.length === 0) {
      stopReason = "no-links";
      break;
    }

    const fresh: string[] = [];
    for (const id of listing.ids) {
      if (known.has(id)) continue;
      known.add(id);
      fresh.push(id);
    }
    if (fresh.length > 0) {
      await append(config.outputPath, `${needsLeadingNewline ? "\n" : ""}${fresh.join("\n")}\n`);
      needsLeadingNewline = false;
      added += fresh.length;
    }

    logger.info("Listing page scraped", {
      page,
      found: listing.ids.length,
      added: fresh.length,
      known: known.size,
    });

    if (!listing.hasNext) {
      stopReason = "last-page";
      break;
    }
    if (config.maxPages !== undefined && pagesFetched >= config.maxPages) {
      stopReason = "max-pages";
      break;
    }

    page++;
    await delay(config.intervalMs, signal);
  }

  return { pagesFetched, added, totalKnown: known.size, stopReason };
}
