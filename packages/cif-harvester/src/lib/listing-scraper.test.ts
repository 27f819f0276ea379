import { describe, it, expect, vi } from "vitest";
import { scrapeListing, type ScrapeConfig, type ScraperDeps } from "./listing-scraper.js";
import type { Logger } from "./logger.js";
import type { FetchedResource, ResourceFetcher } from "./ports/resource-fetcher.js";

const config: ScrapeConfig = {
  sid: 7,
  outputPath: "ids.txt",
  listingUrlTemplate: "https://example.test/table?sid={sid}&page={page}",
  intervalMs: 5000,
  maxAttempts: 3,
  timeoutMs: 30_000,
  userAgent: "test-agent/1.0",
};

const row = (id: string) => `<tr><th><a href="/material/${id}">${id}</a></th><td>0.1</td></tr>`;
const next = `<li class="page-item"><a class="page-link" href="#">&gt;</a></li>`;
const disabledNext = `<li class="page-item disabled"><a class="page-link" href="#">&gt;</a></li>`;

function listing(rows: string, pagination = ""): FetchedResource {
  const html = `<table><tbody>${rows}</tbody></table><ul class="pagination">${pagination}</ul>`;
  return { status: 200, statusText: "OK", body: Buffer.from(html) };
}

const createMockLogger = (): Logger => {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
};

function createFetcher(pages: Array<FetchedResource | ((attempt: number) => FetchedResource)>) {
  const attempts = new Map<number, number>();
  const get = vi.fn<ResourceFetcher["get"]>(async (url) => {
    const page = Number(new URL(url).searchParams.get("page"));
    const attempt = (attempts.get(page) ?? 0) + 1;
    attempts.set(page, attempt);
    const response = pages[page];
    if (response === undefined) throw new Error(`unexpected page ${page}`);
    return typeof response === "function" ? response(attempt) : response;
  });
  return { get };
}

function createFile(initial: string) {
  const file = { content: initial };
  const deps: Pick<ScraperDeps, "read" | "append"> = {
    read: vi.fn(async () => {
      if (file.content === "") {
        throw Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
      }
      return file.content;
    }),
    append: vi.fn(async (_path: string, data: string) => {
      file.content += data;
    }),
  };
  return { file, deps };
}

describe("scrapeListing", () => {
  it("walks pages until the next link is disabled", async () => {
    const fetcher = createFetcher([listing(row("A") + row("B"), next), listing(row("C"), disabledNext)]);
    const { file, deps } = createFile("");
    const delay = vi.fn(async () => {});

    const summary = await scrapeListing(config, { fetcher, logger: createMockLogger(), delay, ...deps });

    expect(summary).toEqual({ pagesFetched: 2, added: 3, totalKnown: 3, stopReason: "last-page" });
    expect(file.content).toBe("A\nB\nC\n");
    expect(fetcher.get.mock.calls.map(([url]) => url)).toEqual([
      "https://example.test/table?sid=7&page=0",
      "https://example.test/table?sid=7&page=1",
    ]);
    expect(fetcher.get).toHaveBeenCalledWith("https://example.test/table?sid=7&page=0", {
      timeoutMs: 30_000,
      headers: { "User-Agent": "test-agent/1.0" },
    });
    expect(delay).toHaveBeenCalledTimes(1);
    expect(delay).toHaveBeenCalledWith(5000, undefined);
  });

  it("appends only ids missing from an existing file", async () => {
    const fetcher = createFetcher([listing(row("A") + row("B") + row("C"))]);
    const { file, deps } = createFile("A\nB");

    const summary = await scrapeListing(config, {
      fetcher,
      logger: createMockLogger(),
      delay: async () => {},
      ...deps,
    });

    expect(summary).toEqual({ pagesFetched: 1, added: 1, totalKnown: 3, stopReason: "last-page" });
    expect(file.content).toBe("A\nB\nC\n");
  });

  it("does not append when a page has nothing new", async () => {
    const fetcher = createFetcher([listing(row("A"))]);
    const { deps } = createFile("A\n");

    await scrapeListing(config, { fetcher, logger: createMockLogger(), delay: async () => {}, ...deps });

    expect(deps.append).not.toHaveBeenCalled();
  });

  it("stops when a later page has no rows", async () => {
    const fetcher = createFetcher([listing(row("A"), next), listing("", next)]);
    const { deps } = createFile("");

    const summary = await scrapeListing(config, {
      fetcher,
      logger: createMockLogger(),
      delay: async () => {},
      ...deps,
    });

    expect(summary).toEqual({ pagesFetched: 2, added: 1, totalKnown: 1, stopReason: "no-rows" });
  });

  it("stops when rows carry no material links", async () => {
    const fetcher = createFetcher([listing("<tr><th>none</th></tr>", next)]);
    const { deps } = createFile("");

    const summary = await scrapeListing(config, {
      fetcher,
      logger: createMockLogger(),
      delay: async () => {},
      ...deps,
    });

    expect(summary.stopReason).toBe("no-links");
    expect(summary.added).toBe(0);
  });

  it("treats an empty first page as an unexpected layout", async () => {
    const fetcher = createFetcher([listing("")]);
    const { deps } = createFile("");

    await expect(
      scrapeListing(config, { fetcher, logger: createMockLogger(), delay: async () => {}, ...deps })
    ).rejects.toMatchObject({
      code: "LISTING_UNEXPECTED",
      message: "Listing page https://example.test/table?sid=7&page=0: no table rows",
    });
  });

  it("honours the page limit", async () => {
    const fetcher = createFetcher([listing(row("A"), next), listing(row("B"), next)]);
    const { deps } = createFile("");
    const delay = vi.fn(async () => {});

    const summary = await scrapeListing(
      { ...config, maxPages: 1 },
      { fetcher, logger: createMockLogger(), delay, ...deps }
    );

    expect(summary).toEqual({ pagesFetched: 1, added: 1, totalKnown: 1, stopReason: "max-pages" });
    expect(fetcher.get).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
  });

  it("retries a failed page after the interval", async () => {
    const fetcher = createFetcher([
      (attempt) =>
        attempt === 1
          ? { status: 503, statusText: "Service Unavailable", body: Buffer.alloc(0) }
          : listing(row("A")),
    ]);
    const { file, deps } = createFile("");
    const logger = createMockLogger();
    const delay = vi.fn(async () => {});

    const summary = await scrapeListing(config, { fetcher, logger, delay, ...deps });

    expect(summary.added).toBe(1);
    expect(file.content).toBe("A\n");
    expect(fetcher.get).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(5000, undefined);
    expect(logger.warn).toHaveBeenCalledWith("Listing page failed, retrying", {
      url: "https://example.test/table?sid=7&page=0",
      attempt: 1,
      reason: "HTTP 503 Service Unavailable",
    });
  });

  it("gives up after the configured attempts", async () => {
    const fetcher = createFetcher([() => ({ status: 500, statusText: "", body: Buffer.alloc(0) })]);
    const { deps } = createFile("");
    const delay = vi.fn(async () => {});

    await expect(
      scrapeListing(config, { fetcher, logger: createMockLogger(), delay, ...deps })
    ).rejects.toMatchObject({ code: "HTTP_STATUS", message: "Request failed (HTTP 500)" });
    expect(fetcher.get).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledTimes(2);
  });

  it("stops between pages once interrupted", async () => {
    const controller = new AbortController();
    const fetcher = createFetcher([listing(row("A"), next), listing(row("B"))]);
    const { file, deps } = createFile("");

    const summary = await scrapeListing(config, {
      fetcher,
      logger: createMockLogger(),
      delay: async () => controller.abort(),
      signal: controller.signal,
      ...deps,
    });

    expect(summary).toEqual({ pagesFetched: 1, added: 1, totalKnown: 1, stopReason: "interrupted" });
    expect(file.content).toBe("A\n");
  });

  it("reports an unreadable output file", async () => {
    const fetcher = createFetcher([]);

    await expect(
      scrapeListing(config, {
        fetcher,
        logger: createMockLogger(),
        read: async () => {
          throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
        },
      })
    ).rejects.toMatchObject({ code: "INPUT_NOT_READABLE", details: "EACCES: permission denied" });
    expect(fetcher.get).not.toHaveBeenCalled();
  });
});
