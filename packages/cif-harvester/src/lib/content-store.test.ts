import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { createHash } from "crypto";
import { tmpdir } from "os";
import { join } from "path";
import {
  ContentStore,
  casefixName,
  identifierFromArtifactName,
  isSafeIdentifier,
} from "./content-store.js";
import type { Logger } from "./logger.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

const sha8 = (value: string) => createHash("sha1").update(value).digest("hex").slice(0, 8);

describe("casefixName", () => {
  it("appends the first eight hex digits of the identifier's sha1", () => {
    expect(casefixName("AbC")).toBe(`AbC__casefix-${sha8("AbC")}.cif`);
  });
});

describe("identifierFromArtifactName", () => {
  it("strips the extension case-insensitively", () => {
    expect(identifierFromArtifactName("Fe2O3-1.cif")).toBe("Fe2O3-1");
    expect(identifierFromArtifactName("Fe2O3-1.CIF")).toBe("Fe2O3-1");
  });

  it("strips the casefix suffix", () => {
    expect(identifierFromArtifactName(casefixName("abc"))).toBe("abc");
  });

  it("ignores other files", () => {
    expect(identifierFromArtifactName("notes.txt")).toBeUndefined();
    expect(identifierFromArtifactName(".cif")).toBeUndefined();
  });
});

describe("isSafeIdentifier", () => {
  it("rejects path separators and dot names", () => {
    expect(isSafeIdentifier("C2H6O-abc123")).toBe(true);
    expect(isSafeIdentifier("../etc")).toBe(false);
    expect(isSafeIdentifier("a\\b")).toBe(false);
    expect(isSafeIdentifier(".")).toBe(false);
    expect(isSafeIdentifier("..")).toBe(false);
    expect(isSafeIdentifier("")).toBe(false);
  });
});

describe("ContentStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "store-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reports artifacts found by scan", async () => {
    writeFileSync(join(dir, "A.cif"), "data_A\n");
    const store = new ContentStore({ dir, logger: createMockLogger() });

    await store.scan();

    expect(store.has("A")).toBe(true);
    expect(store.has("B")).toBe(false);
  });

  it("removes stale temp files on scan", async () => {
    writeFileSync(join(dir, "B.cif.part"), "half");
    const logger = createMockLogger();
    const store = new ContentStore({ dir, logger });

    await store.scan();

    expect(readdirSync(dir)).toEqual([]);
    expect(store.has("B")).toBe(false);
    expect(logger.info).toHaveBeenCalledWith("Removed stale temp files", { count: 1 });
  });

  it("treats a missing directory as empty", async () => {
    const store = new ContentStore({ dir: join(dir, "absent"), logger: createMockLogger() });

    await expect(store.scan()).resolves.toBeUndefined();
    expect(store.has("A")).toBe(false);
  });

  it("writes through a temp file and leaves only the final artifact", async () => {
    const store = new ContentStore({ dir, logger: createMockLogger() });
    await store.scan();

    const path = await store.write("A", Buffer.from("data_A\n"));

    expect(path).toBe(join(dir, "A.cif"));
    expect(readFileSync(path, "utf-8")).toBe("data_A\n");
    expect(readdirSync(dir)).toEqual(["A.cif"]);
    expect(store.has("A")).toBe(true);
  });

  it("removes the temp file and rethrows when the write fails", async () => {
    const store = new ContentStore({ dir, logger: createMockLogger() });
    await store.scan();
    mkdirSync(join(dir, "A.cif"));

    await expect(store.write("A", Buffer.from("data"))).rejects.toThrow();

    expect(existsSync(join(dir, "A.cif.part"))).toBe(false);
  });

  it("gives case-colliding identifiers distinct paths", async () => {
    const store = new ContentStore({ dir, logger: createMockLogger() });
    await store.scan();

    const first = store.pathFor("abc");
    const second = store.pathFor("ABC");

    expect(first).toBe(join(dir, "abc.cif"));
    expect(second).toBe(join(dir, casefixName("ABC")));
    expect(store.pathFor("abc")).toBe(first);
  });

  it("keeps the exact name for the identifier already on disk", async () => {
    writeFileSync(join(dir, "abc.cif"), "data");
    const store = new ContentStore({ dir, logger: createMockLogger() });
    await store.scan();

    expect(store.pathFor("ABC")).toBe(join(dir, casefixName("ABC")));
    expect(store.pathFor("abc")).toBe(join(dir, "abc.cif"));
  });

  it("recognises a casefix artifact as present", async () => {
    writeFileSync(join(dir, casefixName("ABC")), "data");
    const store = new ContentStore({ dir, logger: createMockLogger() });

    await store.scan();

    expect(store.has("ABC")).toBe(true);
  });
});
