import type {
  EventData,
  EventSummary,
  ExceptionValue,
  SummaryException,
  SummaryFrame
} from "./types";

export const MAX_STACKTRACE_FRAMES = 30;

// These vary between events of the same issue and say nothing the model can use.
export const BLOCKED_TAGS: ReadonlySet<string> = new Set([
  "user",
  "server_name",
  "release",
  "handled",
  "client_os",
  "client_os.name",
  "browser",
  "browser.name",
  "environment",
  "runtime",
  "device",
  "device.family",
  "gpu",
  "gpu.name",
  "gpu.vendor",
  "url",
  "trace",
  "otel"
]);

/* -----------------------------
   Frame trimming
----------------------------- */

/** Keeps the first and last `Math.floor(allowance / 2)` items. */
function keepEnds<T>(items: T[], allowance: number): T[] {
  const half = Math.floor(Math.max(allowance, 0) / 2);
  if (items.length <= half * 2) return items;
  return [...items.slice(0, half), ...items.slice(items.length - half)];
}

/**
 * Cuts a stack down to `allowance` frames by dropping the middle of it.
 * System frames go first; app frames are only trimmed when there are more
 * of them than the allowance.
 */
export function trimFrames<T extends { in_app?: boolean | null }>(
  frames: T[],
  allowance: number = MAX_STACKTRACE_FRAMES
): T[] {
  if (frames.length <= allowance) return frames;

  const appFrames: T[] = [];
  const systemFrames: T[] = [];
  for (const frame of frames) {
    if (frame.in_app) appFrames.push(frame);
    else systemFrames.push(frame);
  }

  const systemAllowance = Math.max(allowance - appFrames.length, 0);
  const keptSystem = systemAllowance > 0 ? keepEnds(systemFrames, systemAllowance) : [];

  let keptApp = appFrames;
  if (keptApp.length + keptSystem.length > allowance) {
    keptApp = keepEnds(appFrames, allowance - keptSystem.length);
  }

  const kept = new Set<T>([...keptSystem, ...keptApp]);
  return frames.filter((frame) => kept.has(frame));
}

/* -----------------------------
   Event summary
----------------------------- */

function describeFrames(exc: ExceptionValue): SummaryFrame[] {
  const frames = exc.stacktrace?.frames ?? [];
  const stacktrace: SummaryFrame[] = [];
  let seenInApp = false;

  // most recent call first
  for (const frame of [...frames].reverse()) {
    const out: SummaryFrame = {
      func: frame.function ?? null,
      module: frame.module ?? null,
      file: frame.filename ?? null,
      line: frame.lineno ?? null
    };

    if (frame.in_app) {
      out.in_app = true;
      if (!seenInApp) {
        out.crashed_here = true;
        seenInApp = true;
      }
      const code = (frame.context_line ?? "").trim();
      if (code) out.code = code;
    }

    stacktrace.push(out);
  }

  return stacktrace;
}

function describeException(exc: ExceptionValue, idx: number): SummaryException {
  const exception: SummaryException = {
    ...(idx > 0 ? { raised_during_handling_of_previous_exception: true as const } : {}),
    number: idx + 1,
    type: exc.type ?? null,
    message: exc.value ?? null
  };

  const mechanism = exc.mechanism ?? {};
  if (mechanism.meta && Object.keys(mechanism.meta).length > 0) {
    exception.meta = mechanism.meta;
  }
  if (mechanism.handled === false) exception.unhandled = true;

  const stacktrace = describeFrames(exc);
  if (stacktrace.length > 0) exception.stacktrace = trimFrames(stacktrace);

  return exception;
}

function compareTags(a: [string, string], b: [string, string]): number {
  if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
  if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
  return 0;
}

/**
 * Reduces a stored event to the part worth showing a language model:
 * stable tags, the exception chain (outermost first) and the message.
 */
export function describeEventForAi(data: EventData): EventSummary {
  // Integer-like keys ("9", "10") still enumerate first, in numeric order.
  const tags: Record<string, string> = {};
  for (const [key, value] of [...data.tags].sort(compareTags)) {
    if (!BLOCKED_TAGS.has(key)) tags[key] = value;
  }

  const values = (data.exception?.values ?? []).slice(0, MAX_STACKTRACE_FRAMES);
  const exceptions = [...values].reverse().map(describeException);

  const summary: EventSummary = { tags, exceptions };
  if (data.message) summary.message = data.message;

  return summary;
}
