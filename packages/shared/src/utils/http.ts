import {
  AuthenticationError,
  NetworkError,
  TimeoutError,
  errorMessage,
  type Capability,
} from './errors.js';
import { sliceChars } from './text.js';

export interface HttpRequestOptions {
  capability: Capability;
  timeoutMs: number;
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * fetch bounded by a timeout, with failures mapped onto the error taxonomy:
 * 401/403 become AuthenticationError, other non-2xx and transport failures
 * NetworkError, an expired timer TimeoutError.
 */
export async function requestJson(url: string, options: HttpRequestOptions): Promise<unknown> {
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
  let body: string | undefined;
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(options.body);
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? (body ? 'POST' : 'GET'),
      headers,
      body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw transportError(err, options);
  }

  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationError(options.capability, `HTTP ${response.status} from ${new URL(url).host}`);
  }
  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw new NetworkError(
      options.capability,
      `HTTP ${response.status}${detail ? `: ${sliceChars(detail, 200)}` : ''}`,
    );
  }

  // The timeout signal also bounds reading the body.
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    throw transportError(err, options);
  }
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new NetworkError(options.capability, 'response was not valid JSON', { cause: err });
  }
}

function transportError(err: unknown, options: HttpRequestOptions): NetworkError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new TimeoutError(options.capability, options.timeoutMs, { cause: err });
  }
  return new NetworkError(options.capability, errorMessage(err), { cause: err });
}
