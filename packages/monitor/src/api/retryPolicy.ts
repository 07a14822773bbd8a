export type StatusClass = "retry" | "unauthorized" | "not-found" | "rejected";

export function classifyFailedStatus(statusCode: number): StatusClass {
  if (isRetriableStatus(statusCode)) {
    return "retry";
  }

  if (statusCode === 401 || statusCode === 403) {
    return "unauthorized";
  }

  if (statusCode === 404) {
    return "not-found";
  }

  return "rejected";
}

export function isRetriableStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 429 || statusCode >= 500;
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

// attempt is 1-based: the first retry waits baseDelayMs plus jitter.
export function computeBackoffMs(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  randomFn: () => number
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(randomFn() * (Math.floor(exponential * 0.2) + 1));

  return Math.min(max, exponential + jitter);
}
