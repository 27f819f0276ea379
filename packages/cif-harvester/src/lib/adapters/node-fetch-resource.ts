import fetch from "node-fetch";
import type { FetchRequest, FetchedResource, ResourceFetcher } from "../ports/resource-fetcher.js";
import { networkError, requestTimeout } from "../errors/catalog.js";

export interface NodeFetchResourceOptions {
  fetchImpl?: typeof fetch;
  /** Sent with every request unless the caller sets its own */
  userAgent?: string;
}

/**
 * ResourceFetcher backed by node-fetch.
 * The whole body is buffered; every HTTP status resolves.
 */
export function createNodeFetchResourceFetcher({
  fetchImpl = fetch,
  userAgent,
}: NodeFetchResourceOptions = {}): ResourceFetcher {
  async function get(url: string, request: FetchRequest): Promise<FetchedResource> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);

    const forwardAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    const headers: Record<string, string> = { ...request.headers };
    if (userAgent && !Object.keys(headers).some((name) => name.toLowerCase() === "user-agent")) {
      headers["User-Agent"] = userAgent;
    }

    try {
      const response = await fetchImpl(url, {
        method: "GET",
        headers,
        signal: controller.signal,
      });
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, statusText: response.statusText, body };
    } catch (error) {
      if (timedOut) {
        throw requestTimeout(url, request.timeoutMs);
      }
      throw networkError(url, error);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  return { get };
}
