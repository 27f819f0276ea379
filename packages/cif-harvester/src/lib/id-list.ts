import { readFile } from "fs/promises";
import { inputNotFound, inputNotReadable } from "./errors/catalog.js";
import { errorMessage, isErrnoException } from "./errors/types.js";

/**
 * Parse an identifier list: one per line, trimmed, with blank lines and
 * `#` comments dropped. Order and duplicates are kept.
 */
export function parseIdentifierList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/**
 * Read a list file as text.
 * Missing or unreadable files raise CLIErrors before any work starts.
 */
export async function readListFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw inputNotFound(path);
    }
    throw inputNotReadable(path, errorMessage(error));
  }
}

/** Read and parse an identifier list file */
export async function readIdentifierList(path: string): Promise<string[]> {
  return parseIdentifierList(await readListFile(path));
}

export interface UniqueIdentifiers {
  ids: string[];
  duplicates: number;
}

/** Collapse duplicates to their first occurrence */
export function uniqueIdentifiers(ids: readonly string[]): UniqueIdentifiers {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const id of ids) {
    if (seen.has(id)) continue;
    seen.add(id);
    unique.push(id);
  }
  return { ids: unique, duplicates: ids.length - unique.length };
}

export interface DedupeResult {
  lines: string[];
  removedDuplicates: number;
  removedBlank: number;
}

/**
 * Line-level dedup for list files. Comment lines pass through untouched;
 * every other line is trimmed and kept on its first occurrence.
 */
export function dedupeLines(content: string): DedupeResult {
  const seen = new Set<string>();
  const lines: string[] = [];
  let removedDuplicates = 0;
  let removedBlank = 0;

  const raw = content.split(/\r?\n/);
  if (raw.length > 0 && raw[raw.length - 1] === "") raw.pop();

  for (const line of raw) {
    const value = line.trim();
    if (value === "") {
      removedBlank++;
      continue;
    }
    if (value.startsWith("#")) {
      lines.push(line);
      continue;
    }
    if (seen.has(value)) {
      removedDuplicates++;
      continue;
    }
    seen.add(value);
    lines.push(value);
  }

  return { lines, removedDuplicates, removedBlank };
}
