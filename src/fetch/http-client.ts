import { Agent, request, type Dispatcher } from "undici";
import { FetchError } from "../utils/errors.js";

/**
 * Shared network context: one connection pool used by every worker of a run.
 */
export interface HttpClient {
  fetch(locator: string, options: FetchOptions): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface FetchOptions {
  timeoutMs: number;
}

export interface HttpClientOptions {
  /**
   * Dispatcher to send requests through. When omitted the client owns an
   * undici Agent and closes it on close().
   */
  dispatcher?: Dispatcher;
  connectionsPerOrigin?: number;
  headers?: Record<string, string>;
}

const DEFAULT_HEADERS = {
  accept: "text/csv, text/plain;q=0.9, */*;q=0.8",
  "user-agent": "tabfetch/1.0",
};

class PooledHttpClient implements HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly headers: Record<string, string>;
  private isClosed = false;

  constructor(options: HttpClientOptions) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ??
      new Agent({ connections: options.connectionsPerOrigin ?? 10 });
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
  }

  async fetch(locator: string, options: FetchOptions): Promise<Uint8Array> {
    if (this.isClosed) {
      throw FetchError.transport(locator, new Error("HTTP client is closed"));
    }

    let url: URL;
    try {
      url = new URL(locator);
    } catch (error) {
      throw FetchError.transport(locator, error);
    }

    const signal = AbortSignal.timeout(options.timeoutMs);
    const deadline = new Promise<never>((_resolve, reject) => {
      signal.addEventListener(
        "abort",
        () => reject(FetchError.timeout(locator, options.timeoutMs)),
        { once: true },
      );
    });

    try {
      return await Promise.race([this.download(url, locator, signal), deadline]);
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (signal.aborted) {
        throw FetchError.timeout(locator, options.timeoutMs);
      }
      throw FetchError.transport(locator, error);
    }
  }

  private async download(
    url: URL,
    locator: string,
    signal: AbortSignal,
  ): Promise<Uint8Array> {
    const { statusCode, body } = await request(url, {
      method: "GET",
      headers: this.headers,
      dispatcher: this.dispatcher,
      signal,
    });

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw FetchError.transport(locator, undefined, statusCode);
    }

    return new Uint8Array(await body.arrayBuffer());
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new PooledHttpClient(options);
}
