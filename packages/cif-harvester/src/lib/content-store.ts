import { createHash } from "crypto";
import { readdir, rename, rm, writeFile } from "fs/promises";
import { basename, join } from "path";
import type { Logger } from "./logger.js";
import { errorMessage, isErrnoException } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ARTIFACT_EXTENSION = ".cif";
export const TEMP_SUFFIX = ".part";
const CASEFIX_MARKER = "__casefix-";

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/**
 * Name used when an identifier's exact name is already claimed by another
 * identifier that differs only in letter case.
 */
export function casefixName(id: string): string {
  const digest = createHash("sha1").update(id).digest("hex").slice(0, 8);
  return `${id}${CASEFIX_MARKER}${digest}${ARTIFACT_EXTENSION}`;
}

/**
 * Map a file name in the store back to its identifier.
 * Returns undefined for anything that isn't an artifact.
 */
export function identifierFromArtifactName(name: string): string | undefined {
  if (!name.toLowerCase().endsWith(ARTIFACT_EXTENSION)) return undefined;
  const stem = name.slice(0, -ARTIFACT_EXTENSION.length);
  const marker = stem.lastIndexOf(CASEFIX_MARKER);
  const id = marker >= 0 && /^[0-9a-f]{8}$/.test(stem.slice(marker + CASEFIX_MARKER.length))
    ? stem.slice(0, marker)
    : stem;
  return id.length > 0 ? id : undefined;
}

/**
 * Identifiers become file names; reject anything that would escape the
 * output directory.
 */
export function isSafeIdentifier(id: string): boolean {
  return id.length > 0 && id !== "." && id !== ".." && !/[/\\\0]/.test(id);
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface ContentStoreOptions {
  dir: string;
  logger: Logger;
}

/**
 * Directory of `<id>.cif` artifacts.
 *
 * Exact names go to the first identifier that claims them
 * (case-insensitively); a later identifier colliding on case gets its
 * casefix name instead, so two workers never write the same file.
 */
export class ContentStore {
  readonly dir: string;
  private readonly logger: Logger;
  private readonly present = new Set<string>();
  private readonly claimsByLowerName = new Map<string, string>();

  constructor(options: ContentStoreOptions) {
    this.dir = options.dir;
    this.logger = options.logger.child({ component: "store" });
  }

  /**
   * Index existing artifacts and remove temp files left by an earlier run.
   */
  async scan(): Promise<void> {
    this.present.clear();
    this.claimsByLowerName.clear();

    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return;
      throw error;
    }

    let removed = 0;
    for (const name of names) {
      if (name.endsWith(TEMP_SUFFIX)) {
        await rm(join(this.dir, name), { force: true });
        removed++;
        continue;
      }
      this.present.add(name);
      const id = identifierFromArtifactName(name);
      if (id !== undefined && name === `${id}${ARTIFACT_EXTENSION}`) {
        const key = name.toLowerCase();
        if (!this.claimsByLowerName.has(key)) {
          this.claimsByLowerName.set(key, id);
        }
      }
    }

    if (removed > 0) {
      this.logger.info("Removed stale temp files", { count: removed });
    }
    this.logger.debug("Store scanned", { files: this.present.size });
  }

  /** Whether an artifact for this identifier is already on disk */
  has(id: string): boolean {
    return (
      this.present.has(`${id}${ARTIFACT_EXTENSION}`) || this.present.has(casefixName(id))
    );
  }

  /**
   * Final path for an identifier's artifact, reserving its name.
   * Stable for repeated calls with the same identifier.
   */
  pathFor(id: string): string {
    const exact = `${id}${ARTIFACT_EXTENSION}`;
    const key = exact.toLowerCase();
    const owner = this.claimsByLowerName.get(key);

    if (owner === undefined) {
      this.claimsByLowerName.set(key, id);
      return join(this.dir, exact);
    }
    if (owner === id) {
      return join(this.dir, exact);
    }

    const alternate = casefixName(id);
    this.logger.debug("Case collision, using alternate name", { id, owner, name: alternate });
    return join(this.dir, alternate);
  }

  /**
   * Write an artifact through a temp file and rename it into place.
   * Nothing is left at the final path if the write fails.
   */
  async write(id: string, data: Buffer): Promise<string> {
    const finalPath = this.pathFor(id);
    const tempPath = `${finalPath}${TEMP_SUFFIX}`;

    try {
      await writeFile(tempPath, data);
      await rename(tempPath, finalPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn("Could not remove temp file", {
          path: tempPath,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }

    this.present.add(basename(finalPath));
    return finalPath;
  }
}
