const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const MAX_DELAY_MS = 30_000;
const JITTER_FACTOR = 0.2;

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

function isRetryable(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

export function getRetryDelay(attempt: number, retryAfterHeader: string | null, baseDelayMs = BASE_DELAY_MS): number {
  if (retryAfterHeader) {
    const seconds = Number(retryAfterHeader);
    if (!Number.isNaN(seconds) && seconds > 0) {
      return Math.min(seconds * 1000, MAX_DELAY_MS);
    }
  }

  const exponential = baseDelayMs * 2 ** attempt;
  const capped = Math.min(exponential, MAX_DELAY_MS);
  const jitter = capped * JITTER_FACTOR * (Math.random() * 2 - 1);
  return Math.max(0, capped + jitter);
}

function sleep(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function fetchWithRetry(
  url: string,
  init?: RequestInit,
  options: RetryOptions = {},
): Promise<Response> {
  const maxRetries = options.maxRetries ?? MAX_RETRIES;

  for (let attempt = 0; ; attempt++) {
    const response = await fetch(url, init);

    if (!isRetryable(response.status) || attempt >= maxRetries) {
      return response;
    }

    const retryAfter = response.headers.get('retry-after');
    const delay = getRetryDelay(attempt, retryAfter, options.baseDelayMs);

    console.warn(
      `[fetchWithRetry] ${response.status} from ${url}, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRetries})`,
    );

    await sleep(delay, init?.signal);
  }
}
