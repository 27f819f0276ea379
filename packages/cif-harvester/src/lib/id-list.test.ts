import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { dedupeLines, parseIdentifierList, readIdentifierList, uniqueIdentifiers } from "./id-list.js";
import { CLIError } from "./errors/types.js";

describe("parseIdentifierList", () => {
  it("trims lines and drops blanks and comments", () => {
    const content = "# materials\nA\n\n  B  \r\n#C\nA\n";

    expect(parseIdentifierList(content)).toEqual(["A", "B", "A"]);
  });

  it("returns an empty list for an empty file", () => {
    expect(parseIdentifierList("")).toEqual([]);
  });
});

describe("readIdentifierList", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ids-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads identifiers from disk", async () => {
    const path = join(dir, "ids.txt");
    writeFileSync(path, "A\nB\nC\n");

    await expect(readIdentifierList(path)).resolves.toEqual(["A", "B", "C"]);
  });

  it("raises INPUT_NOT_FOUND for a missing file", async () => {
    const path = join(dir, "missing.txt");

    const error = await readIdentifierList(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toMatchObject({ code: "INPUT_NOT_FOUND", message: `Can't find "${path}"` });
  });

  it("raises INPUT_NOT_READABLE when the path is a directory", async () => {
    const path = join(dir, "a-directory");
    mkdirSync(path);

    const error = await readIdentifierList(path).catch((e: unknown) => e);

    expect(error).toMatchObject({ code: "INPUT_NOT_READABLE" });
  });
});

describe("uniqueIdentifiers", () => {
  it("keeps first occurrences and counts the rest", () => {
    expect(uniqueIdentifiers(["A", "B", "A", "C", "B"])).toEqual({
      ids: ["A", "B", "C"],
      duplicates: 2,
    });
  });
});

describe("dedupeLines", () => {
  it("keeps order and comment lines", () => {
    const result = dedupeLines("# header\nB\nA\n\nB\n# header\n A \n");

    expect(result).toEqual({
      lines: ["# header", "B", "A", "# header"],
      removedDuplicates: 2,
      removedBlank: 1,
    });
  });

  it("reports nothing removed for a clean list", () => {
    expect(dedupeLines("A\nB\n")).toEqual({ lines: ["A", "B"], removedDuplicates: 0, removedBlank: 0 });
  });
});
