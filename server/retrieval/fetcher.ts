import { TextDecoder } from 'node:util';
import { findUrlPolicyViolation } from './urlPolicy';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_CONTENT_LENGTH = 5 * 1024 * 1024;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; LinkPreviewer/1.0; +https://link-previewer.dev/bot)';

const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const ACCEPT_LANGUAGE_HEADER = 'en-US,en;q=0.5';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 20;

export type FetchFailure =
  | { kind: 'timeout' }
  | { kind: 'http_status'; status: number }
  | { kind: 'network'; cause: string }
  | { kind: 'too_large'; size: number }
  | { kind: 'not_html'; contentType: string }
  | { kind: 'blocked'; reason: string };

export type FetchFailureKind = FetchFailure['kind'];

export const describeFetchFailure = (url: string, failure: FetchFailure): string => {
  switch (failure.kind) {
    case 'timeout':
      return `Request timed out while fetching ${url}`;
    case 'http_status':
      return `HTTP error ${failure.status} while fetching ${url}`;
    case 'network':
      return `Failed to connect to ${url}: ${failure.cause}`;
    case 'too_large':
      return `Content too large: ${failure.size} bytes (${url})`;
    case 'not_html':
      return `Not HTML content: ${failure.contentType || 'missing content type'} (${url})`;
    case 'blocked':
      return `Refusing to fetch ${url}: ${failure.reason}`;
  }
};

export class FetchError extends Error {
  readonly url: string;
  readonly failure: FetchFailure;

  constructor(url: string, failure: FetchFailure) {
    super(describeFetchFailure(url, failure));
    this.name = 'FetchError';
    this.url = url;
    this.failure = failure;
  }

  get kind(): FetchFailureKind {
    return this.failure.kind;
  }
}

export interface FetcherOptions {
  timeoutMs?: number;
  maxContentLength?: number;
  userAgent?: string;
  blockPrivateHosts?: boolean;
}

export interface Fetcher {
  /** Resolves with the page's HTML text or rejects with a {@link FetchError}. */
  fetchHtml: (url: string) => Promise<string>;
}

const isHtmlContentType = (contentType: string): boolean => {
  const normalized = contentType.toLowerCase();
  return normalized.includes('text/html') || normalized.includes('application/xhtml');
};

const parseContentLength = (value: string | null): number | null => {
  if (value == null || !/^\s*\d+\s*$/.test(value)) return null;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : null;
};

const createDecoder = (contentType: string): TextDecoder => {
  const charset = contentType.match(/charset\s*=\s*["']?([^;"'\s]+)/i)?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
    }
  }
  return new TextDecoder('utf-8');
};

const describeTransportCause = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  if (cause instanceof Error) {
    return cause.message || cause.name;
  }
  return error.message || error.name;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');

export const createFetcher = (options: FetcherOptions = {}): Fetcher => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxContentLength = options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const blockPrivateHosts = options.blockPrivateHosts ?? true;

  // Counts bytes as they arrive so a missing or false Content-Length cannot exceed the cap.
  const readBody = async (url: string, response: Response, contentType: string): Promise<string> => {
    if (!response.body) return '';
    const decoder = createDecoder(contentType);
    const reader = response.body.getReader();
    let received = 0;
    let text = '';
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      const chunk: Uint8Array = value;
      received += chunk.byteLength;
      if (received > maxContentLength) {
        throw new FetchError(url, { kind: 'too_large', size: received });
      }
      text += decoder.decode(chunk, { stream: true });
    }
    return text + decoder.decode();
  };

  const assertAllowed = (url: string, target: string) => {
    const violation = findUrlPolicyViolation(target, { blockPrivateHosts });
    if (violation) {
      throw new FetchError(url, { kind: 'blocked', reason: violation });
    }
  };

  // Redirects are followed by hand so every hop passes the host policy.
  const fetchFollowingRedirects = async (url: string, signal: AbortSignal): Promise<Response> => {
    let target = url;
    for (let hops = 0; ; hops += 1) {
      assertAllowed(url, target);
      const response = await fetch(target, {
        method: 'GET',
        headers: {
          'User-Agent': userAgent,
          Accept: ACCEPT_HEADER,
          'Accept-Language': ACCEPT_LANGUAGE_HEADER,
        },
        redirect: 'manual',
        signal,
      });

      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        if (response.url) assertAllowed(url, response.url);
        return response;
      }

      await response.body?.cancel();
      if (hops >= MAX_REDIRECTS) {
        throw new FetchError(url, { kind: 'network', cause: 'too many redirects' });
      }
      target = new URL(location, target).toString();
    }
  };

  const fetchHtml = async (url: string): Promise<string> => {
    assertAllowed(url, url);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetchFollowingRedirects(url, controller.signal);

      if (!response.ok) {
        throw new FetchError(url, { kind: 'http_status', status: response.status });
      }

      const declaredLength = parseContentLength(response.headers.get('content-length'));
      if (declaredLength !== null && declaredLength > maxContentLength) {
        throw new FetchError(url, { kind: 'too_large', size: declaredLength });
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!isHtmlContentType(contentType)) {
        throw new FetchError(url, { kind: 'not_html', contentType });
      }

      return await readBody(url, response, contentType);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (timedOut || isAbortError(error)) {
        throw new FetchError(url, { kind: 'timeout' });
      }
      throw new FetchError(url, { kind: 'network', cause: describeTransportCause(error) });
    } finally {
      clearTimeout(timer);
      // Releases the connection when the body was left unread.
      controller.abort();
    }
  };

  return { fetchHtml };
};
