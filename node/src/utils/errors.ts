// src/utils/errors.ts: error types raised across the pipeline boundary

/** Agent configuration failed schema validation (e.g. weights not summing to 1.0). */
export class ConfigValidationError extends Error {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, issues: Array<{ path: string; message: string }> = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class LlmTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'LlmTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The caller aborted the request; no partial outcome may be persisted. */
export class PipelineAbortedError extends Error {
  constructor(message = 'Pipeline aborted by caller') {
    super(message);
    this.name = 'PipelineAbortedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new PipelineAbortedError();
}

/**
 * Races `promise` against a timer. On expiry the optional controller is aborted
 * (cancelling the in-flight call) and the returned promise rejects with LlmTimeoutError.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  controller?: AbortController,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new LlmTimeoutError(label, timeoutMs));
      controller?.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
