import { toSearchParams } from "../request";
import type { FilteredParameters, GieSession, Json } from "../types";

export interface FetchSessionOptions {
  headers: Record<string, string>;
  transport?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Session over a `fetch`-compatible function. The body is decoded with
 * `response.json()` whatever the status, so an error page surfaces as the
 * decode error it produces.
 */
export class FetchSession implements GieSession {
  private readonly headers: Readonly<Record<string, string>>;
  private readonly transport: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: FetchSessionOptions) {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(options.headers)) {
      headers[name.toLowerCase()] = value;
    }
    this.headers = headers;
    this.transport = options.transport ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  async get<T = Json>(url: URL, params: FilteredParameters): Promise<T> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(toSearchParams(params))) {
      target.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.transport(target, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });
      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}
