/**
 * HTTP transport for keys and segments
 */

import { NetworkError } from "@tsgrab/streaming";
import { env } from "../utils/env";

export interface HttpGetOptions {
  signal?: AbortSignal;
}

/** Minimal GET client the pipeline depends on */
export interface HttpClient {
  get(url: string, options?: HttpGetOptions): Promise<Buffer>;
}

export interface FetchHttpClientConfig {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * `HttpClient` on the global fetch. Non-2xx responses, timeouts and aborts
 * all surface as `NetworkError`.
 */
export class FetchHttpClient implements HttpClient {
  private timeoutMs: number;
  private headers: Record<string, string>;

  constructor(config: FetchHttpClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? env.TSGRAB_REQUEST_TIMEOUT_MS;
    this.headers = config.headers ?? {};
  }

  async get(url: string, options: HttpGetOptions = {}): Promise<Buffer> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new NetworkError(url, "aborted before start");
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel().catch(() => {});
        throw new NetworkError(url, `HTTP ${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }

      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }
      if (timedOut) {
        throw new NetworkError(url, `timed out after ${this.timeoutMs / 1000}s`, undefined, error);
      }
      if (controller.signal.aborted) {
        throw new NetworkError(url, "aborted", undefined, error);
      }
      throw new NetworkError(
        url,
        error instanceof Error ? error.message : "Unknown error",
        undefined,
        error
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
