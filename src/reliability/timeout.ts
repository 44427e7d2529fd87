export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  run: (signal: AbortSignal) => Promise<T>;
  signal?: AbortSignal;
}

/**
 * Races `run` against a timer. On expiry the signal handed to `run` is
 * aborted so the task can stop before doing any more work. Aborting the
 * parent signal cancels the race the same way, and an already aborted
 * parent means `run` is never called.
 */
export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  if (input.signal?.aborted) {
    throw input.signal.reason;
  }
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(input.label, input.timeoutMs);
          controller.abort(error);
          reject(error);
        }, input.timeoutMs);

        const parent = input.signal;
        if (parent) {
          onParentAbort = () => {
            controller.abort(parent.reason);
            reject(parent.reason);
          };
          if (parent.aborted) {
            onParentAbort();
          } else {
            parent.addEventListener("abort", onParentAbort, { once: true });
          }
        }
      }),
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    if (onParentAbort && input.signal) {
      input.signal.removeEventListener("abort", onParentAbort);
    }
  }
}
