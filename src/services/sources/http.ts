import { FetchError } from "../errors.js";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  signal?: AbortSignal;
}

export function buildUrl(base: string, query: Record<string, string | number> = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/** GET a text body. Every failure (network, timeout, non-2xx, empty body) is a FetchError. */
export async function requestText(base: string, options: RequestOptions): Promise<string> {
  const url = buildUrl(base, options.query);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: options.headers ?? {},
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? options.signal?.aborted
          ? "Request aborted"
          : `Request timed out after ${options.timeoutMs}ms`
        : `Request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new FetchError(reason, { url, cause: error });
    }

    if (!response.ok) {
      throw new FetchError(`Request failed: ${response.status}`, { url, status: response.status });
    }
    const text = await response.text();
    if (!text.trim()) {
      throw new FetchError("Empty response", { url, status: response.status });
    }
    return text;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

/** First number in the text, thousands separators removed; 0 when there is none. */
export function parsePrice(text: string): number {
  const match = text.replace(/[，\s]/g, "").match(/\d[\d,]*/);
  if (!match) return 0;
  const parsed = Number.parseInt(match[0].replace(/,/g, ""), 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function ensureAbsoluteUrl(url: string | undefined, fallbackBase: string): string | undefined {
  if (!url) {
    return undefined;
  }
  try {
    return new URL(url, fallbackBase).toString();
  } catch {
    return undefined;
  }
}
