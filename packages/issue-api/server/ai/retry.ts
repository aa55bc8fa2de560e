export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

/* -----------------------------
   Error introspection
----------------------------- */

function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

export function errorStatus(err: unknown): number | undefined {
  const status = field(err, "status") ?? field(err, "statusCode");
  return typeof status === "number" ? status : undefined;
}

export function errorMessage(err: unknown): string {
  const msg = field(err, "message");
  return typeof msg === "string" ? msg : "";
}

export function errorCode(err: unknown): string {
  const code = field(err, "code");
  return typeof code === "string" ? code : "";
}

/** Reads `retry-after` (seconds) off an SDK error, whatever shape its headers take. */
export function retryAfterMs(err: unknown): number | undefined {
  const headers = field(err, "headers");
  let raw: unknown;
  if (headers instanceof Headers) raw = headers.get("retry-after");
  else if (typeof headers === "object" && headers !== null) raw = field(headers, "retry-after");

  const seconds = Number(raw);
  return raw != null && Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

export function isRetryableError(err: unknown): boolean {
  const status = errorStatus(err);
  return (
    status === 429 ||
    (typeof status === "number" && status >= 500) ||
    /timed out/i.test(errorMessage(err)) ||
    /ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN/i.test(errorCode(err))
  );
}

/* -----------------------------
   Retry + timeout
----------------------------- */

export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: {
    retries?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (err: unknown) => boolean;
  }
): Promise<T> {
  const retries = opts?.retries ?? 2; // total attempts = 1 + retries
  const baseDelayMs = opts?.baseDelayMs ?? 300;
  const maxDelayMs = opts?.maxDelayMs ?? 2000;
  const shouldRetry = opts?.shouldRetry ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= 1 + retries || !shouldRetry(err)) throw err;

      const delay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
      await sleep(delay);
    }
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
