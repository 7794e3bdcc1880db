/**
 * CORS headers for browser clients of the API
 */

export const ALLOWED_METHODS = 'GET, POST, OPTIONS';

export interface CorsRequest {
  /** Origin header, if any */
  origin?: string;
  /** True for an OPTIONS preflight */
  preflight: boolean;
  /** Access-Control-Request-Headers of a preflight */
  requestHeaders?: string;
}

/**
 * Headers to add to a response. Empty when the origin is not allowed.
 */
export function buildCorsHeaders(
  request: CorsRequest,
  allowedOrigins: readonly string[]
): Record<string, string> {
  const { origin } = request;
  if (!origin || !allowedOrigins.includes(origin)) {
    return {};
  }

  const headers: Record<string, string> = {
    'Access-Control-Allow-Origin': origin,
    'Access-Control-Allow-Credentials': 'true',
    Vary: 'Origin',
  };

  if (request.preflight) {
    headers['Access-Control-Allow-Methods'] = ALLOWED_METHODS;
    headers['Access-Control-Max-Age'] = '600';
    if (request.requestHeaders) {
      headers['Access-Control-Allow-Headers'] = request.requestHeaders;
    }
  }

  return headers;
}
