import { describeError, NetworkError } from './errors';
import type { FetchLike } from './types';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/87.0.4280.88 Safari/537.36';

export const DEFAULT_TIMEOUT_MS = 3000;

export const fetchText = async (
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<string> => {
  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new NetworkError(url, `Request to ${url} failed: ${describeError(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new NetworkError(url, `Request to ${url} failed: ${response.status} ${response.statusText}`, {
      status: response.status
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new NetworkError(url, `Failed to read response from ${url}: ${describeError(error)}`, { cause: error });
  }
};
