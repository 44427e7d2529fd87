import type { Session } from "../session/session";

export type CaptureMethod = "manual" | "automatic";
export type LinkState = "linked" | "link-pending";
export type DiscussionKind = "discussion" | "decision";

export interface Exchange {
  exchangeId: string;
  sessionId: string;
  projectName: string;
  responseText: string;
  userNote: string;
  captureMethod: CaptureMethod;
  recordingEnabled: boolean;
  createdAt: Date;
  linkedIds: string[];
  linkState: LinkState;
}

export type NewExchange = Omit<Exchange, "createdAt">;

export interface Discussion {
  id: string;
  kind: DiscussionKind;
  text: string;
  tags: string[];
  createdAt: Date;
}

export interface NewDiscussion {
  kind: DiscussionKind;
  text: string;
  tags: string[];
  createdAt?: Date;
}

export interface DiscussionMatch {
  id: string;
  createdAt: Date;
  relevance: number;
}

export interface ExchangeMatch {
  exchange: Exchange;
  relevance: number;
}

export interface LinkedRecord {
  id: string;
  discussion: Discussion | null;
}

export type SyncTable = "exchanges" | "discussions";
export type SyncProblem =
  | "missing-index"
  | "orphan-index"
  | "duplicate-index"
  | "pending";

export interface SyncIssue {
  id: string;
  table: SyncTable;
  problem: SyncProblem;
}

export interface ReconcileReport {
  issues: SyncIssue[];
  repaired: number;
}

/**
 * Durable storage for sessions, exchanges, discussions and links, with the
 * search index kept in step with the rows it mirrors.
 */
export interface ContentStore {
  readonly location: string;
  recordSession(session: Session): Promise<void>;
  insertExchange(exchange: NewExchange): Promise<Exchange>;
  getExchange(id: string): Promise<Exchange | null>;
  getLastExchange(sessionId: string): Promise<Exchange | null>;
  listLinkPending(): Promise<Exchange[]>;
  replaceLinks(exchangeId: string, linkedIds: string[]): Promise<void>;
  resolveLinks(exchangeId: string): Promise<LinkedRecord[]>;
  searchExchanges(terms: string[], limit: number): Promise<ExchangeMatch[]>;
  insertDiscussion(discussion: NewDiscussion): Promise<Discussion>;
  deleteDiscussion(id: string): Promise<void>;
  searchDiscussions(terms: string[], limit: number): Promise<DiscussionMatch[]>;
  verifySync(): Promise<SyncIssue[]>;
  reconcile(): Promise<ReconcileReport>;
  close(): void;
}

/**
 * Raised when a write unit fails. `written` tells whether the transaction is
 * known to have rolled back or whether the outcome could not be determined.
 */
export class StoreWriteFailure extends Error {
  public readonly written: "nothing" | "unknown";

  public constructor(
    message: string,
    written: "nothing" | "unknown",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreWriteFailure";
    this.written = written;
  }
}
