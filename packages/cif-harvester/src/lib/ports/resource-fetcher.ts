/**
 * Abstraction over the HTTP client used to pull remote resources.
 * Allows testing the fetch pipeline without network access.
 */
export interface FetchRequest {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Cancels the request when aborted */
  signal?: AbortSignal;
}

export interface FetchedResource {
  status: number;
  statusText: string;
  body: Buffer;
}

export interface ResourceFetcher {
  /**
   * Issue a GET and buffer the whole body.
   * Resolves for every HTTP status; rejects with a CLIError
   * (NETWORK_TIMEOUT or NETWORK_ERROR) when no response arrives.
   */
  get(url: string, request: FetchRequest): Promise<FetchedResource>;
}
