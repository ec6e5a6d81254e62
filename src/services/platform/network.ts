/**
 * Network layer interface and implementation.
 *
 * HttpClient is the single seam every HTTP request goes through, so catalog
 * lookups and artifact downloads can be tested without a network.
 */

import type { Logger } from "../logging";
import { getErrorMessage } from "../errors";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /**
   * Time in milliseconds to wait for the response headers. Default: 5000.
   * Reading the body is not covered; pass a signal to bound it.
   */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const controller = new AbortController();
   * const response = await httpClient.fetch(url, {
   *   timeout: 10000,
   *   signal: controller.signal,
   *   headers: { Accept: "application/json" },
   * });
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
  /** Headers sent with every request, merged under per-request headers */
  readonly defaultHeaders?: Readonly<Record<string, string>>;
}

/**
 * HttpClient on top of the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
      defaultHeaders: config.defaultHeaders ?? {},
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET" });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    // The body stays tied to the controller, so an external abort that
    // arrives while the body is being read must still reach it.
    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort, { once: true });
      }
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { ...this.config.defaultHeaders, ...options?.headers },
        redirect: "follow",
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      externalSignal?.removeEventListener("abort", onExternalAbort);
      this.logger.warn("Fetch failed", { url, error: getErrorMessage(error) });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
