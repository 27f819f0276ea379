import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { dedupFile, formatDedupResult, runDedup } from "./dedup.js";

describe("dedup", () => {
  let root: string;
  let listPath: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "dedup-test-"));
    listPath = join(root, "ids.txt");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it("rewrites the file and keeps a backup of the original", async () => {
    const original = "# sid 7\nA\n\nB\nA\n  B  \nC\n";
    writeFileSync(listPath, original);

    const result = await dedupFile(listPath);

    expect(result).toEqual({
      path: listPath,
      backupPath: `${listPath}.bak`,
      kept: 4,
      removedDuplicates: 2,
      removedBlank: 1,
      changed: true,
    });
    expect(readFileSync(listPath, "utf-8")).toBe("# sid 7\nA\nB\nC\n");
    expect(readFileSync(`${listPath}.bak`, "utf-8")).toBe(original);
  });

  it("leaves a clean file untouched", async () => {
    writeFileSync(listPath, "A\nB\n");

    const result = await dedupFile(listPath);

    expect(result).toEqual({ path: listPath, kept: 2, removedDuplicates: 0, removedBlank: 0, changed: false });
    expect(existsSync(`${listPath}.bak`)).toBe(false);
  });

  it("adds the missing final newline", async () => {
    writeFileSync(listPath, "A\nB");

    const result = await dedupFile(listPath);

    expect(result.changed).toBe(true);
    expect(readFileSync(listPath, "utf-8")).toBe("A\nB\n");
  });

  it("fails on a missing file", async () => {
    await expect(dedupFile(join(root, "absent.txt"))).rejects.toMatchObject({ code: "INPUT_NOT_FOUND" });
  });

  it("summarises a change", () => {
    expect(
      formatDedupResult({
        path: "ids.txt",
        backupPath: "ids.txt.bak",
        kept: 3,
        removedDuplicates: 2,
        removedBlank: 1,
        changed: true,
      })
    ).toEqual(["✓ Removed 2 duplicate and 1 blank line(s), kept 3", "Original saved as ids.txt.bak"]);
  });

  it("prints JSON in json mode", async () => {
    writeFileSync(listPath, "A\nA\n");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await runDedup(listPath, { mode: "json", quiet: true, verbose: false });

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: {
        path: listPath,
        backupPath: `${listPath}.bak`,
        kept: 1,
        removedDuplicates: 1,
        removedBlank: 0,
        changed: true,
      },
    });
  });
});
