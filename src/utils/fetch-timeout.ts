/**
 * Fetch wrapper that adds timeout support via AbortController.
 *
 * @param timeoutMs - Timeout in milliseconds
 * @param fetchFn - The fetch implementation to use (defaults to global fetch)
 * @throws AbortError if the request times out
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  fetchFn: typeof fetch = fetch,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1, timeoutMs));
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetches and parses a JSON body, turning non-2xx answers into errors that
 * carry the status and a short excerpt of the body.
 */
export async function fetchJsonWithTimeout(params: {
  url: string;
  init?: RequestInit;
  timeoutMs: number;
  label: string;
  fetchFn?: typeof fetch;
}): Promise<unknown> {
  const res = await fetchWithTimeout(params.url, params.init ?? {}, params.timeoutMs, params.fetchFn);
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    const excerpt = text.trim().slice(0, 200);
    throw new Error(`${params.label} HTTP ${res.status}${excerpt ? `: ${excerpt}` : ""}`);
  }
  return (await res.json()) as unknown;
}
