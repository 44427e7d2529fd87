import { ResultAsync, errAsync, okAsync } from "neverthrow";
import type { Result } from "neverthrow";
import type { Logger } from "pino";
import { Errors, messageOf, type RecorderError } from "../core/errors";
import { EmptyCaptureError, type CaptureAdapter } from "../capture/adapter";
import type { Exchange, SyncIssue } from "../store/store";
import { RetryExhaustedError, retryWithBackoff } from "./retry";
import { TimeoutError, withTimeout } from "./timeout";

export interface MonitorOptions {
  operationTimeoutMs: number;
  captureTimeoutMs: number;
  captureRetries: number;
  captureBackoffMs: number;
}

export interface SaveVerifier {
  getLastExchange(sessionId: string): Promise<Exchange | null>;
  verifySync(): Promise<SyncIssue[]>;
}

type Task<T> = (
  signal: AbortSignal,
) => ResultAsync<T, RecorderError> | Promise<Result<T, RecorderError>>;

function toCaptureError(error: unknown): RecorderError {
  const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;

  if (cause instanceof TimeoutError) {
    return Errors.captureFailed("timeout", attempts, cause.message);
  }
  if (cause instanceof EmptyCaptureError) {
    return Errors.captureFailed("empty", attempts, cause.message);
  }
  return Errors.captureFailed("adapter", attempts, messageOf(cause));
}

/**
 * Timeout boundary, capture retry and post-write checks shared by every
 * engine operation. Holds configuration only.
 */
export class ReliabilityMonitor {
  constructor(
    private readonly options: MonitorOptions,
    private readonly logger: Logger,
  ) {}

  run<T>(label: string, task: Task<T>): ResultAsync<T, RecorderError> {
    const timeoutMs = this.options.operationTimeoutMs;
    return ResultAsync.fromPromise(
      withTimeout({
        label,
        timeoutMs,
        run: async (signal) => task(signal),
      }),
      (error) => {
        if (error instanceof TimeoutError) {
          this.logger.error({ operation: label, timeoutMs }, "Operation timed out");
          return Errors.timeout(label, timeoutMs);
        }
        this.logger.error({ err: error, operation: label }, "Operation failed unexpectedly");
        return Errors.internal(messageOf(error));
      },
    ).andThen((result) => result);
  }

  capture(
    adapter: CaptureAdapter,
    signal?: AbortSignal,
  ): ResultAsync<string, RecorderError> {
    const { captureTimeoutMs, captureRetries, captureBackoffMs } = this.options;
    const attempt = async (): Promise<string> => {
      const text = await withTimeout({
        label: `${adapter.name} capture`,
        timeoutMs: captureTimeoutMs,
        run: (attemptSignal) =>
          adapter.captureLastResponse({
            timeoutMs: captureTimeoutMs,
            signal: attemptSignal,
          }),
        ...(signal ? { signal } : {}),
      });
      if (text.trim().length === 0) {
        throw new EmptyCaptureError(adapter.name);
      }
      return text;
    };

    return ResultAsync.fromPromise(
      retryWithBackoff({
        run: attempt,
        maxRetries: captureRetries,
        baseDelayMs: captureBackoffMs,
        onRetry: (error, attemptNumber, delayMs) => {
          this.logger.warn(
            { err: error, attempt: attemptNumber, delayMs, adapter: adapter.name },
            "Capture attempt failed, retrying",
          );
        },
        ...(signal ? { signal } : {}),
      }),
      toCaptureError,
    );
  }

  /**
   * A save only counts once the new id reads back as the session's newest
   * exchange and the index has no desynchronized entries.
   */
  validateSave(
    verifier: SaveVerifier,
    sessionId: string,
    exchangeId: string,
  ): ResultAsync<void, RecorderError> {
    return ResultAsync.fromPromise(
      Promise.all([verifier.getLastExchange(sessionId), verifier.verifySync()]),
      (error) => Errors.syncValidation(exchangeId, messageOf(error)),
    ).andThen(([last, issues]) => {
      if (!last || last.exchangeId !== exchangeId) {
        return errAsync(
          Errors.syncValidation(
            exchangeId,
            `newest exchange reads back as ${last ? last.exchangeId : "nothing"}`,
          ),
        );
      }
      if (issues.length > 0) {
        const ids = issues.map((issue) => `${issue.id} (${issue.problem})`).join(", ");
        this.logger.error({ exchangeId, issues }, "Search index out of sync after save");
        return errAsync(
          Errors.syncValidation(exchangeId, `${issues.length} index issue(s): ${ids}`),
        );
      }
      return okAsync(undefined);
    });
  }
}
