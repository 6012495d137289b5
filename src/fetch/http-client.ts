/**
 * axios-backed HTTP client for page and robots.txt fetches.
 * Every status is returned as a response; only transport failures throw.
 */
import axios, { type AxiosResponse } from 'axios';
import { FetchError } from '../errors.js';
import { logger } from '../logger.js';
import type { FetchRequestOptions, HttpFetcher, HttpResponse } from './types.js';

export interface HttpClientOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  maxResponseBytes?: number;
}

/** Configuration defaults */
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_REDIRECTS = 5;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/** URL after redirects, as reported by Node's http adapter. */
function finalUrl(response: AxiosResponse<unknown>, requested: string): string {
  const redirected: unknown = response.request?.res?.responseUrl;
  return typeof redirected === 'string' && redirected ? redirected : requested;
}

/** Map anything axios throws onto the FetchError taxonomy. */
export function toFetchError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) return error;
  if (axios.isCancel(error)) return new FetchError('aborted', url, { cause: error });

  if (axios.isAxiosError(error)) {
    const code = error.code;
    if (code === 'ERR_CANCELED') return new FetchError('aborted', url, { cause: error });
    if (code && TIMEOUT_CODES.has(code)) return new FetchError('timeout', url, { cause: error });
    if (error.message.includes('maxContentLength')) {
      return new FetchError('too_large', url, { cause: error });
    }
    return new FetchError('network', url, { detail: code ?? 'unknown', cause: error });
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new FetchError('network', url, { detail, cause: error });
}

export function createHttpClient(options: HttpClientOptions = {}): HttpFetcher {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  const client = axios.create({
    timeout: timeoutMs,
    maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    maxContentLength: options.maxResponseBytes ?? MAX_RESPONSE_SIZE,
    responseType: 'text',
    validateStatus: () => true,
    transitional: { clarifyTimeoutError: true },
    headers: {
      Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en;q=0.9,*;q=0.5',
      'Cache-Control': 'no-cache',
    },
  });

  return {
    async get(url: string, { userAgent, signal }: FetchRequestOptions): Promise<HttpResponse> {
      const startedAt = Date.now();
      try {
        const response = await client.get<unknown>(url, {
          headers: { 'User-Agent': userAgent },
          signal,
        });
        const body = typeof response.data === 'string' ? response.data : String(response.data ?? '');

        logger.debug(
          {
            url,
            statusCode: response.status,
            bodyLength: body.length,
            latencyMs: Date.now() - startedAt,
          },
          'HTTP request complete'
        );

        return {
          url: finalUrl(response, url),
          statusCode: response.status,
          contentType: headerValue(response.headers['content-type']),
          body,
        };
      } catch (error) {
        const fetchError = toFetchError(error, url);
        logger.debug({ url, reason: fetchError.reason }, 'HTTP request failed');
        throw fetchError;
      }
    },
  };
}
