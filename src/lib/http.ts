/**
 * Signal Digest — Page-Fetch Transport
 *
 * Generic HTTP GET shared by source adapters and the content enricher:
 * custom user agent, per-call timeout, redirects followed.
 */

import { withDeadline } from './deadline';
import { HttpError } from './errors';

export interface HttpRequestOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export interface PageResponse {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

/**
 * Build a URL with query parameters appended.
 */
export function withQuery(base: string, params: Record<string, string | number>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a URL and read its body as text. Throws HttpError on non-2xx.
 */
export async function fetchPage(url: string, options: HttpRequestOptions): Promise<PageResponse> {
  return withDeadline(
    async (signal) => {
      const res = await fetch(url, {
        headers: { 'User-Agent': options.userAgent, ...options.headers },
        redirect: 'follow',
        signal,
      });

      if (!res.ok) {
        throw new HttpError(res.status, url);
      }

      return {
        url: res.url || url,
        status: res.status,
        contentType: res.headers.get('content-type') ?? '',
        body: await res.text(),
      };
    },
    options.timeoutMs,
    options.signal
  );
}

/**
 * GET a URL and parse the body as JSON. The value is untyped until the
 * caller validates it.
 */
export async function fetchJson(url: string, options: HttpRequestOptions): Promise<unknown> {
  const page = await fetchPage(url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers },
  });
  const parsed: unknown = JSON.parse(page.body);
  return parsed;
}
