/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import type { ScrapeStopReason } from "./listing-scraper.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    runId?: string;
    durationMs?: number;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface FetchResultJson {
  summary: {
    total: number;
    dispatched: number;
    succeeded: number;
    failed: number;
    skipped: number;
    duplicates: number;
    cancelled: number;
  };
  interrupted: boolean;
  failures: Array<{ id: string; reason: string }>;
  outputDir: string;
  ledgerPath: string;
}

export interface ScrapeResultJson {
  sid: number;
  pagesFetched: number;
  added: number;
  totalKnown: number;
  stopReason: ScrapeStopReason;
  outputPath: string;
}

export interface DedupResultJson {
  path: string;
  backupPath?: string;
  kept: number;
  removedDuplicates: number;
  removedBlank: number;
  changed: boolean;
}

export interface ReconcileResultJson {
  expected: number;
  present: number;
  missing: string[];
  extra: string[];
  missingPath: string;
}

export interface StatusResultJson {
  ledgerPath: string;
  identifiers: number;
  succeeded: number;
  failed: number;
  entries: number;
  malformedLines: number;
  failures: Array<{ id: string; detail: string; attempts: number; timestamp: string }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}
