// src/processing/fetcher.ts
import { collectCauses, FetchError, getErrorMessage, ReadError } from '../errors.js';

export interface FetcherOptions {
  userAgent: string;
  timeoutMs: number;
}

export interface Fetcher {
  fetchHtml(url: string, signal?: AbortSignal): Promise<string>;
}

function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Single GET per call; no retries. Transport and status failures surface as
 * FetchError, a body that cannot be read as ReadError.
 */
export function createFetcher(options: FetcherOptions): Fetcher {
  async function fetchHtml(url: string, signal?: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': options.userAgent },
        redirect: 'follow',
        signal: requestSignal(options.timeoutMs, signal),
      });
    } catch (error) {
      throw new FetchError(getErrorMessage(error), collectCauses(error));
    }

    if (!response.ok) {
      const statusText = response.statusText ? ` ${response.statusText}` : '';
      throw new FetchError(`HTTP ${response.status}${statusText}`, [], response.status);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new ReadError(getErrorMessage(error));
    }
  }

  return { fetchHtml };
}
