import { randomBytes } from "node:crypto";
import { ResultAsync, err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import {
  Errors,
  atStep,
  messageOf,
  type RecorderError,
} from "../core/errors";
import type { CaptureAdapter } from "../capture/adapter";
import type { Linker } from "../linker/linker";
import type { ReliabilityMonitor } from "../reliability/monitor";
import { SerialQueue } from "../reliability/serial-queue";
import { TimeoutError } from "../reliability/timeout";
import { PrivacyGate } from "../session/privacy-gate";
import {
  createSession,
  type PrivacyState,
  type Session,
  type SessionStatus,
} from "../session/session";
import { extractTerms } from "../store/fts";
import {
  StoreWriteFailure,
  type CaptureMethod,
  type ContentStore,
  type Discussion,
  type DiscussionKind,
  type Exchange,
  type ExchangeMatch,
  type LinkedRecord,
  type LinkState,
  type ReconcileReport,
  type SyncIssue,
} from "../store/store";

export const MAX_SEARCH_RESULTS = 50;

export interface EngineDeps {
  store: ContentStore;
  capture: CaptureAdapter;
  linker: Linker;
  monitor: ReliabilityMonitor;
  logger: Logger;
}

export interface EngineOptions {
  linkLimit: number;
  maxResponseChars: number;
}

export interface RelinkReport {
  relinked: number;
  stillPending: number;
}

export function allocateExchangeId(): string {
  return `exch-${randomBytes(16).toString("hex")}`;
}

function cancelled(signal: AbortSignal): RecorderError {
  const reason: unknown = signal.reason;
  return reason instanceof TimeoutError
    ? Errors.timeout("save_this", reason.timeoutMs)
    : Errors.internal(messageOf(reason));
}

// Never splits a surrogate pair.
function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const last = text.charCodeAt(maxChars - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxChars - 1 : maxChars;
  return text.slice(0, end);
}

/**
 * Orchestrates a recording session: privacy gating, capture, the single
 * store transaction, linking and post-write validation. Every public
 * operation runs under the reliability monitor; saves are serialized.
 */
export class RecordingEngine {
  private session: Session | null = null;
  private gate = new PrivacyGate();
  private readonly writes = new SerialQueue();

  constructor(
    private readonly deps: EngineDeps,
    private readonly options: EngineOptions,
  ) {}

  startSession(
    projectName: string,
    options: { optOut?: boolean; override?: boolean } = {},
  ): ResultAsync<SessionStatus, RecorderError> {
    return this.deps.monitor.run("start_session", async () => {
      const name = projectName.trim();
      if (name.length === 0) {
        return err(Errors.invalidInput("project_name is required"));
      }
      const previous = this.session;
      if (previous && options.override !== true) {
        return err(Errors.alreadyStarted(previous.projectName));
      }

      // Off the record engaged before the first session stays engaged; only
      // replacing a session starts from a clean gate.
      const offTheRecord = previous ? false : this.gate.snapshot().offTheRecord;
      const session: Session = {
        ...createSession(name, { optOut: options.optOut === true }),
        offTheRecord,
      };
      const recorded = await ResultAsync.fromPromise(
        this.deps.store.recordSession(session),
        (error) => Errors.storeWrite(messageOf(error)),
      );
      if (recorded.isErr()) {
        this.deps.logger.error({ err: recorded.error }, "Failed to record session");
        return err(recorded.error);
      }

      if (previous) {
        this.deps.logger.info(
          { previous: previous.sessionId, next: session.sessionId },
          "Replacing active session",
        );
      }
      this.session = session;
      this.gate = new PrivacyGate({ optOut: options.optOut === true });
      this.gate.setOffTheRecord(offTheRecord);
      this.deps.logger.info(
        {
          sessionId: session.sessionId,
          projectName: session.projectName,
          recordingEnabled: session.recordingEnabled,
          offTheRecord,
        },
        "Session started",
      );
      return this.buildStatus();
    });
  }

  saveExchange(
    note = "",
    options: { captureMethod?: CaptureMethod } = {},
  ): ResultAsync<Exchange, RecorderError> {
    const captureMethod = options.captureMethod ?? "manual";
    return this.deps.monitor.run("save_this", (signal) =>
      this.writes.enqueue(() => this.performSave(note, captureMethod, signal)),
    );
  }

  getLastExchange(): ResultAsync<Exchange, RecorderError> {
    return this.deps.monitor.run("replay", async () => {
      const session = this.session;
      if (!session) {
        return err(Errors.notFound("No exchanges recorded yet."));
      }
      const last = await ResultAsync.fromPromise(
        this.deps.store.getLastExchange(session.sessionId),
        (error) => Errors.internal(messageOf(error)),
      );
      return last.andThen((exchange) =>
        exchange
          ? ok(exchange)
          : err(Errors.notFound("No exchanges recorded yet.")),
      );
    });
  }

  resolveLinks(exchangeId: string): ResultAsync<LinkedRecord[], RecorderError> {
    return this.deps.monitor.run("resolve_links", () =>
      ResultAsync.fromPromise(
        this.deps.store.resolveLinks(exchangeId),
        (error) => Errors.internal(messageOf(error)),
      ),
    );
  }

  getStatus(): ResultAsync<SessionStatus, RecorderError> {
    return this.deps.monitor.run("session_status", () => this.buildStatus());
  }

  setOffTheRecord(enable = true): ResultAsync<PrivacyState, RecorderError> {
    return this.deps.monitor.run("off_the_record", async () => {
      const state = this.gate.setOffTheRecord(enable);
      this.applyPrivacy(state);
      return ok(state);
    });
  }

  setRecording(enabled: boolean): ResultAsync<PrivacyState, RecorderError> {
    return this.deps.monitor.run("set_recording", async () => {
      const state = this.gate.setRecording(enabled);
      this.applyPrivacy(state);
      return ok(state);
    });
  }

  verifySync(): ResultAsync<SyncIssue[], RecorderError> {
    return this.deps.monitor.run("verify_sync", () =>
      ResultAsync.fromPromise(this.deps.store.verifySync(), (error) =>
        Errors.internal(messageOf(error)),
      ),
    );
  }

  reconcile(): ResultAsync<ReconcileReport, RecorderError> {
    return this.deps.monitor.run("reconcile", () =>
      this.writes.enqueue(
        async (): Promise<Result<ReconcileReport, RecorderError>> =>
          ResultAsync.fromPromise(this.deps.store.reconcile(), (error) =>
            Errors.storeWrite(messageOf(error), "unknown"),
          ),
      ),
    );
  }

  /**
   * Recomputes links for exchanges saved while the linker was failing.
   * Links are replaced wholesale, so running it twice is harmless.
   */
  relinkPending(): ResultAsync<RelinkReport, RecorderError> {
    return this.deps.monitor.run("relink_pending", () =>
      this.writes.enqueue(async (): Promise<Result<RelinkReport, RecorderError>> => {
        const pending = await ResultAsync.fromPromise(
          this.deps.store.listLinkPending(),
          (error) => Errors.internal(messageOf(error)),
        );
        if (pending.isErr()) {
          return err(pending.error);
        }

        let relinked = 0;
        for (const exchange of pending.value) {
          try {
            const linkedIds = await this.deps.linker.findCandidates(
              `${exchange.responseText}\n${exchange.userNote}`,
              this.options.linkLimit,
            );
            await this.deps.store.replaceLinks(exchange.exchangeId, linkedIds);
            relinked += 1;
          } catch (error) {
            this.deps.logger.warn(
              { err: error, exchangeId: exchange.exchangeId },
              "Relink failed, exchange stays link-pending",
            );
          }
        }
        return ok({ relinked, stillPending: pending.value.length - relinked });
      }),
    );
  }

  searchExchanges(
    query: string,
    limit = 10,
  ): ResultAsync<ExchangeMatch[], RecorderError> {
    return this.deps.monitor.run("search_exchanges", async () => {
      const terms = extractTerms(query);
      if (terms.length === 0) {
        return err(Errors.invalidInput("query has no searchable terms"));
      }
      const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_SEARCH_RESULTS);
      return ResultAsync.fromPromise(
        this.deps.store.searchExchanges(terms, bounded),
        (error) => Errors.internal(messageOf(error)),
      );
    });
  }

  addDiscussion(input: {
    text: string;
    kind?: DiscussionKind;
    tags?: string[];
  }): ResultAsync<Discussion, RecorderError> {
    return this.deps.monitor.run("add_discussion", async () => {
      const text = input.text.trim();
      if (text.length === 0) {
        return err(Errors.invalidInput("text is required"));
      }
      const tags = (input.tags ?? []).map((tag) => tag.trim()).filter(Boolean);
      return ResultAsync.fromPromise(
        this.deps.store.insertDiscussion({
          kind: input.kind ?? "discussion",
          text,
          tags,
        }),
        (error) => Errors.storeWrite(messageOf(error)),
      );
    });
  }

  private async performSave(
    note: string,
    captureMethod: CaptureMethod,
    signal: AbortSignal,
  ): Promise<Result<Exchange, RecorderError>> {
    const { store, capture, monitor, logger } = this.deps;

    const session = this.session;
    if (!session) {
      return err(atStep(Errors.sessionNotStarted(), "session"));
    }
    const denied = this.gate.denialReason();
    if (denied) {
      return err(atStep(Errors.recordingDisabled(denied), "privacy"));
    }

    // A save that timed out while queued must not touch the desktop app.
    if (signal.aborted) {
      return err(atStep(cancelled(signal), "capture"));
    }
    const captured = await monitor.capture(capture, signal);
    if (captured.isErr()) {
      logger.warn({ err: captured.error }, "Capture failed");
      return err(atStep(captured.error, "capture"));
    }

    // Nothing may be written once the caller has given up or the user went
    // off the record while the capture was in flight.
    if (signal.aborted) {
      return err(atStep(cancelled(signal), "capture"));
    }
    const deniedAfterCapture = this.gate.denialReason();
    if (deniedAfterCapture) {
      return err(atStep(Errors.recordingDisabled(deniedAfterCapture), "privacy"));
    }

    const responseText = truncate(captured.value.trim(), this.options.maxResponseChars);
    const userNote = note.trim();
    const exchangeId = allocateExchangeId();
    const { linkedIds, linkState } = await this.computeLinks(
      `${responseText}\n${userNote}`,
    );

    if (signal.aborted) {
      return err(atStep(cancelled(signal), "link"));
    }

    const stored = await ResultAsync.fromPromise(
      store.insertExchange({
        exchangeId,
        sessionId: session.sessionId,
        projectName: session.projectName,
        responseText,
        userNote,
        captureMethod,
        recordingEnabled: this.gate.snapshot().recordingEnabled,
        linkedIds,
        linkState,
      }),
      (error) =>
        Errors.storeWrite(
          messageOf(error),
          error instanceof StoreWriteFailure ? error.written : "unknown",
        ),
    );
    if (stored.isErr()) {
      logger.error({ err: stored.error, exchangeId }, "Exchange write failed");
      return err(atStep(stored.error, "store"));
    }

    const validated = await monitor.validateSave(store, session.sessionId, exchangeId);
    if (validated.isErr()) {
      return err(atStep(validated.error, "validate"));
    }

    logger.info(
      {
        exchangeId,
        chars: responseText.length,
        links: stored.value.linkedIds.length,
        linkState,
        captureMethod,
      },
      "Exchange saved",
    );
    return ok(stored.value);
  }

  private async computeLinks(
    text: string,
  ): Promise<{ linkedIds: string[]; linkState: LinkState }> {
    try {
      const linkedIds = await this.deps.linker.findCandidates(
        text,
        this.options.linkLimit,
      );
      return { linkedIds, linkState: "linked" };
    } catch (error) {
      this.deps.logger.warn(
        { err: error },
        "Linker failed, saving exchange as link-pending",
      );
      return { linkedIds: [], linkState: "link-pending" };
    }
  }

  private applyPrivacy(state: PrivacyState): void {
    if (this.session) {
      this.session = {
        ...this.session,
        recordingEnabled: state.recordingEnabled,
        offTheRecord: state.offTheRecord,
      };
    }
    if (state.changed) {
      this.deps.logger.info(
        {
          recordingEnabled: state.recordingEnabled,
          offTheRecord: state.offTheRecord,
        },
        "Privacy state changed",
      );
    }
  }

  private async buildStatus(): Promise<Result<SessionStatus, RecorderError>> {
    const gate = this.gate.snapshot();
    const session = this.session;
    const base = {
      recordingEnabled: gate.recordingEnabled,
      offTheRecord: gate.offTheRecord,
      writeAllowed: gate.writeAllowed,
      databasePath: this.deps.store.location,
    };
    if (!session) {
      return ok({
        ...base,
        started: false,
        sessionId: null,
        projectName: null,
        startedAt: null,
        lastExchangeId: null,
      });
    }

    const last = await ResultAsync.fromPromise(
      this.deps.store.getLastExchange(session.sessionId),
      (error) => Errors.internal(messageOf(error)),
    );
    return last.map((exchange) => ({
      ...base,
      started: true,
      sessionId: session.sessionId,
      projectName: session.projectName,
      startedAt: session.startedAt,
      lastExchangeId: exchange ? exchange.exchangeId : null,
    }));
  }
}
