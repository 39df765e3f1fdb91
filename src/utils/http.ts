/**
 * fetch helpers shared by the REST-backed providers (Ollama, AssemblyAI)
 */

import { createComponentLogger } from './logger.js';
import { createNetworkError, createSizeLimitError, TimeoutError } from '../core/errors.js';

const logger = createComponentLogger('http');

export const DEFAULT_MAX_RESPONSE_BYTES = 10 * 1024 * 1024; // 10MB

export interface HttpRequest {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

export interface FetchOptions {
  /** Service name used in errors and logs */
  service: string;
  timeoutMs: number;
  maxResponseBytes?: number;
}

/**
 * Read response body with size limit to prevent memory exhaustion
 */
export async function readResponseWithLimit(
  response: Response,
  maxSizeBytes: number,
  abortController: AbortController
): Promise<string> {
  const reader = response.body?.getReader();
  if (!reader) {
    return '';
  }

  const decoder = new TextDecoder();
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytes += value.byteLength;

      if (totalBytes > maxSizeBytes) {
        abortController.abort();
        throw createSizeLimitError('response', maxSizeBytes, totalBytes, 'bytes');
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }

    // Flush any remaining bytes
    chunks.push(decoder.decode());
    return chunks.join('');
  } finally {
    reader.releaseLock();
  }
}

/**
 * fetch with a hard timeout and a bounded response body.
 * Non-2xx responses reject with a network error carrying the status.
 */
export async function fetchWithTimeout(
  url: string,
  request: HttpRequest,
  options: FetchOptions
): Promise<string> {
  const abortController = new AbortController();
  const timeoutId = setTimeout(() => abortController.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: abortController.signal,
    });

    const responseText = await readResponseWithLimit(
      response,
      options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES,
      abortController
    );

    if (!response.ok) {
      logger.debug(
        { service: options.service, status: response.status, body: responseText.slice(0, 200) },
        'Request returned error status'
      );
      throw createNetworkError(options.service, `${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    return responseText;
  } catch (error) {
    if (abortController.signal.aborted && isAbortError(error)) {
      throw new TimeoutError(`${options.service} request`, options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Parse a JSON response body, rejecting with a network error when it is not JSON
 */
export function parseJsonResponse(service: string, responseText: string): unknown {
  try {
    return JSON.parse(responseText);
  } catch {
    logger.warn({ service, responseText: responseText.slice(0, 200) }, 'Response is not JSON');
    throw createNetworkError(service, 'invalid JSON response');
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
