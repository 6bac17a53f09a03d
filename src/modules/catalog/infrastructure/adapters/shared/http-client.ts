export class HttpTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request exceeded ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

/**
 * `fetch` bounded by `timeoutMs`. The timer covers the body read as well,
 * so a stalled download is aborted too. Rejects with HttpTimeoutError on timeout.
 */
export async function fetchTextWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
): Promise<{ response: Response; body: string }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    const body = await response.text();
    return { response, body };
  } catch (error: unknown) {
    if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
      throw new HttpTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
