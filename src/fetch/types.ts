/**
 * Shared types for the fetch module
 */

export type ValidationError = 'http_status_error' | 'wrong_content_type';

export interface ValidationResult {
  valid: boolean;
  error?: ValidationError;
  /** Failure reason recorded on the frontier, e.g. `http_404`. */
  reason?: string;
  errorDetails?: {
    statusCode?: number;
    contentType?: string;
  };
}

export interface FetchRequestOptions {
  userAgent: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  /** URL after redirects. */
  url: string;
  statusCode: number;
  contentType: string | undefined;
  body: string;
}

/** Outbound GET boundary used by the crawler and the robots policy. */
export interface HttpFetcher {
  get(url: string, options: FetchRequestOptions): Promise<HttpResponse>;
}
