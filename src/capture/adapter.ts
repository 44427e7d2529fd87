export interface CaptureRequest {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Supplies the text of the assistant's most recent response. Implementations
 * are best effort: they may hang, fail, or hand back stale or empty text.
 */
export interface CaptureAdapter {
  readonly name: string;
  captureLastResponse(request: CaptureRequest): Promise<string>;
}

export class EmptyCaptureError extends Error {
  public constructor(adapter: string) {
    super(`${adapter} returned no text`);
    this.name = "EmptyCaptureError";
  }
}
