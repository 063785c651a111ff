export const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export function parseRetryAfterMs(value: string | null, now = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number.parseFloat(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const dateMs = Date.parse(value);
  if (!Number.isFinite(dateMs)) {
    return null;
  }
  return Math.max(0, dateMs - now);
}

export function computeBackoffMs(
  attempt: number,
  retryAfterMs: number | null,
  baseMs: number,
  random: () => number = Math.random
): number {
  const base = baseMs * 2 ** attempt;
  const jitter = baseMs * 0.3 * random();
  return Math.max(base, retryAfterMs ?? 0) + jitter;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new DOMException("The operation was aborted.", "AbortError"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new DOMException("The operation was aborted.", "AbortError"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function safeReadText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}

export function snippet(text: string, maxLength = 300): string {
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned.length > maxLength ? `${cleaned.slice(0, maxLength)}…` : cleaned;
}
