/**
 * Response classification before any parsing happens
 */
import type { ValidationResult } from './types.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Accept 2xx responses with an HTML content type. A response without a
 * Content-Type header is given the benefit of the doubt.
 */
export function validateResponse(
  statusCode: number,
  contentType?: string | string[]
): ValidationResult {
  if (statusCode < 200 || statusCode >= 300) {
    return {
      valid: false,
      error: 'http_status_error',
      reason: `http_${statusCode}`,
      errorDetails: { statusCode },
    };
  }

  // Handle both string and array (HTTP headers can be arrays)
  const ctValue = Array.isArray(contentType) ? contentType[0] : contentType;
  if (ctValue) {
    const mediaType = ctValue.split(';')[0].trim().toLowerCase();
    if (!HTML_CONTENT_TYPES.includes(mediaType)) {
      return {
        valid: false,
        error: 'wrong_content_type',
        reason: `non_html:${mediaType || 'unknown'}`,
        errorDetails: { contentType: ctValue },
      };
    }
  }

  return { valid: true };
}
