export type SaveStep =
  | "session"
  | "privacy"
  | "capture"
  | "allocate"
  | "link"
  | "store"
  | "validate";

export type WriteOutcome = "nothing" | "unknown" | "unverified";

export type RecorderError =
  | {
      type: "recording_disabled";
      message: string;
      reason: "opted-out" | "off-the-record";
      step?: SaveStep;
    }
  | {
      type: "capture_failed";
      message: string;
      attempts: number;
      reason: "timeout" | "empty" | "adapter";
      step?: SaveStep;
    }
  | {
      type: "store_write";
      message: string;
      written: WriteOutcome;
      step?: SaveStep;
    }
  | {
      type: "sync_validation";
      message: string;
      written: WriteOutcome;
      exchangeId: string;
      step?: SaveStep;
    }
  | { type: "not_found"; message: string; step?: SaveStep }
  | { type: "already_started"; message: string; projectName: string; step?: SaveStep }
  | { type: "session_not_started"; message: string; step?: SaveStep }
  | { type: "invalid_input"; message: string; step?: SaveStep }
  | { type: "timeout"; message: string; timeoutMs: number; step?: SaveStep }
  | { type: "internal"; message: string; step?: SaveStep };

export type RecorderErrorType = RecorderError["type"];

export const Errors = {
  recordingDisabled(
    reason: "opted-out" | "off-the-record",
  ): RecorderError {
    const message =
      reason === "off-the-record"
        ? "Off the record mode is on"
        : "Recording is disabled for this session";
    return { type: "recording_disabled", message, reason };
  },
  captureFailed(
    reason: "timeout" | "empty" | "adapter",
    attempts: number,
    message: string,
  ): RecorderError {
    return { type: "capture_failed", message, attempts, reason };
  },
  storeWrite(message: string, written: WriteOutcome = "nothing"): RecorderError {
    return { type: "store_write", message, written };
  },
  syncValidation(exchangeId: string, message: string): RecorderError {
    return {
      type: "sync_validation",
      message,
      exchangeId,
      written: "unverified",
    };
  },
  notFound(message: string): RecorderError {
    return { type: "not_found", message };
  },
  alreadyStarted(projectName: string): RecorderError {
    return {
      type: "already_started",
      message: `A session for "${projectName}" is already active`,
      projectName,
    };
  },
  sessionNotStarted(): RecorderError {
    return {
      type: "session_not_started",
      message: "No active session",
    };
  },
  invalidInput(message: string): RecorderError {
    return { type: "invalid_input", message };
  },
  internal(message: string): RecorderError {
    return { type: "internal", message };
  },
  timeout(label: string, timeoutMs: number): RecorderError {
    return {
      type: "timeout",
      message: `${label} timed out after ${timeoutMs}ms`,
      timeoutMs,
    };
  },
};

export function atStep(error: RecorderError, step: SaveStep): RecorderError {
  return error.step ? error : { ...error, step };
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * User-facing rendering of an error, one wording per kind.
 */
export function describeError(error: RecorderError): string {
  const where = error.step ? ` (step: ${error.step})` : "";
  switch (error.type) {
    case "recording_disabled":
      return error.reason === "off-the-record"
        ? "Off the record mode is on. Call off_the_record with enable=false to save again."
        : "Recording is disabled for this session. Call set_recording with enabled=true first.";
    case "capture_failed":
      return `Could not capture the last response after ${error.attempts} attempt(s): ${error.message}${where}. Copy the response manually and try save_this again.`;
    case "store_write":
      return error.written === "nothing"
        ? `Save failed, nothing was written: ${error.message}${where}. It is safe to retry.`
        : `Save failed and the store state is unknown: ${error.message}${where}. Run verify_sync before retrying.`;
    case "sync_validation":
      return `Exchange ${error.exchangeId} was written but could not be verified: ${error.message}${where}. Run verify_sync with repair=true.`;
    case "not_found":
      return error.message;
    case "already_started":
      return `${error.message}. Pass override=true to replace it.`;
    case "session_not_started":
      return "No active session. Call start_session first.";
    case "invalid_input":
      return `Invalid input: ${error.message}`;
    case "timeout":
      return `${error.message}${where}. Nothing was left half-written; try again.`;
    case "internal":
      return `Unexpected failure: ${error.message}${where}`;
  }
}
