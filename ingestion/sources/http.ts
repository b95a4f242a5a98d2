/**
 * HTTP helpers shared by the sources: polite PDF downloads and error classification.
 */

import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { FetchError } from '../shared/errors';
import type { HttpOptions } from './types';

const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 405, 410, 451]);

export const throttle = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createHttpClient(options: HttpOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    headers: { 'User-Agent': options.userAgent },
  });
}

/**
 * Map a failed request onto a FetchError.
 *
 * 4xx responses that will not change on retry are permanent. Server errors,
 * rate limiting, timeouts and network failures are transient.
 */
export function toFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status ?? null;
    if (status !== null) {
      const kind = PERMANENT_STATUSES.has(status) ? 'permanent' : 'transient';
      return new FetchError(url, kind, `HTTP ${status}`, status);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new FetchError(url, 'transient', 'request timed out');
    }
    if (error.code === 'ERR_INVALID_URL') {
      return new FetchError(url, 'permanent', 'invalid URL');
    }
    return new FetchError(url, 'transient', error.message);
  }

  return new FetchError(url, 'transient', String(error));
}

/**
 * Download a document as raw bytes, waiting `delayMs` first so consecutive
 * calls never hit the site back to back.
 */
export async function downloadDocument(
  http: AxiosInstance,
  url: string,
  delayMs: number
): Promise<Buffer> {
  if (delayMs > 0) {
    await throttle(delayMs);
  }

  try {
    const response = await http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    const body = Buffer.from(response.data);

    if (body.length === 0) {
      throw new FetchError(url, 'transient', 'empty response body', response.status);
    }

    return body;
  } catch (error) {
    throw toFetchError(url, error);
  }
}
