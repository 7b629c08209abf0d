/**
 * JSON over HTTP for the external services, with a per-request timeout.
 */

import { ExternalServiceError, errorMessage, type ExternalServiceName } from './errors.js';

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Aborts the request early, e.g. when its connection closes */
  signal?: AbortSignal;
}

function failureCode(service: ExternalServiceName): string {
  return service === 'index' ? 'INDEX_REQUEST_FAILED' : 'EMBEDDING_REQUEST_FAILED';
}

/**
 * Send a request and parse the JSON response.
 *
 * Non-2xx answers, network failures and timeouts become ExternalServiceError.
 */
export async function requestJson(
  url: string,
  service: ExternalServiceName,
  options: JsonRequestOptions,
): Promise<unknown> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  const headers: Record<string, string> = { accept: 'application/json', ...options.headers };
  if (options.body !== undefined) headers['content-type'] = 'application/json';

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
    });
  } catch (error) {
    if (timeout.aborted) {
      throw new ExternalServiceError(
        `${service} service timed out after ${options.timeoutMs}ms`,
        'SERVICE_TIMEOUT',
        service,
        error,
      );
    }
    throw new ExternalServiceError(
      `${service} service unreachable: ${errorMessage(error)}`,
      failureCode(service),
      service,
      error,
    );
  }

  const text = await response.text();
  if (!response.ok) {
    throw new ExternalServiceError(
      `${service} service answered ${response.status}: ${text.slice(0, 200)}`,
      failureCode(service),
      service,
    );
  }

  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ExternalServiceError(
      `${service} service returned invalid JSON`,
      failureCode(service),
      service,
      error,
    );
  }
}
