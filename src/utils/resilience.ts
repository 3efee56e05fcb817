/**
 * Bookshelf DB HTTP helpers
 * Fetch timeouts and a plain sleep. Lookups are single attempts: there is no
 * retry or backoff here.
 */

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// =============================================================================
// Fetch with Timeout
// =============================================================================

/**
 * Wrapper around fetch() with an AbortController timeout.
 * Prevents a hung HTTP connection from stalling the batch.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number; fetchImpl?: FetchLike } = {}
): Promise<Response> {
  const { timeout = 15000, fetchImpl = fetch, ...fetchOptions } = options;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetchImpl(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeout}ms`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** One-line description of anything thrown, for log output */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
