/**
 * Error Classification
 *
 * Classifies mirror fetch errors so the log says why a mirror was skipped
 * (timeout, rate limit, HTTP error, unreachable host).
 *
 * @module error-classification
 */

export type FetchErrorCategory = "timeout" | "rate_limit" | "http_error" | "network" | "unknown";

export type ClassifiedFetchError = {
  category: FetchErrorCategory;
  mirror: string | null;
  status: number | null;
  message: string;
  retriable: boolean;
};

/**
 * A mirror answered, but not with a usable page.
 */
export class MirrorFetchError extends Error {
  constructor(
    public readonly mirror: string,
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "MirrorFetchError";
  }
}

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
];

const NETWORK_PATTERNS = [
  /fetch failed/i,
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /socket hang up/i,
  /certificate/i,
];

function classifyStatus(status: number): { category: FetchErrorCategory; retriable: boolean } {
  if (status === 429) return { category: "rate_limit", retriable: true };
  if (status >= 500) return { category: "http_error", retriable: true };
  return { category: "http_error", retriable: false };
}

/** Shape-check for MirrorFetchError across module boundaries */
function isMirrorFetchErrorShape(
  error: unknown,
): error is { name: string; mirror: string; status: number; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  return (
    "name" in error &&
    error.name === "MirrorFetchError" &&
    "mirror" in error &&
    typeof error.mirror === "string" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function causeMessage(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (cause && typeof cause === "object" && "code" in cause) return String(cause.code);
  return "";
}

export function classifyFetchError(error: unknown): ClassifiedFetchError {
  if (error instanceof MirrorFetchError || isMirrorFetchErrorShape(error)) {
    const { category, retriable } = classifyStatus(error.status);
    return {
      category,
      mirror: error.mirror,
      status: error.status,
      message: typeof error.message === "string" ? error.message : String(error),
      retriable,
    };
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";
  // undici reports "fetch failed" and hides the errno in `cause`
  const detail = error instanceof Error ? `${msg} ${causeMessage(error)}` : msg;

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(detail))) {
    return { category: "timeout", mirror: null, status: null, message: msg, retriable: true };
  }

  if (NETWORK_PATTERNS.some((p) => p.test(detail))) {
    return { category: "network", mirror: null, status: null, message: detail.trim(), retriable: true };
  }

  return { category: "unknown", mirror: null, status: null, message: msg, retriable: false };
}
