import { mkdirSync } from "node:fs";
import { randomBytes } from "node:crypto";
import path from "node:path";
import Database from "better-sqlite3";
import type { Logger } from "pino";
import { z } from "zod";
import type { Session } from "../session/session";
import { toMatchExpression } from "./fts";
import { DISCUSSION_TRIGGERS_SQL, SCHEMA_SQL, SCHEMA_VERSION } from "./schema";
import type {
  CaptureMethod,
  ContentStore,
  Discussion,
  DiscussionKind,
  DiscussionMatch,
  Exchange,
  ExchangeMatch,
  LinkedRecord,
  LinkState,
  NewDiscussion,
  NewExchange,
  ReconcileReport,
  SyncIssue,
  SyncProblem,
  SyncTable,
} from "./store";
import { StoreWriteFailure } from "./store";

interface ExchangeRow {
  exchange_id: string;
  session_id: string;
  project_name: string;
  response_text: string;
  user_note: string;
  capture_method: CaptureMethod;
  recording_enabled: number;
  created_at: number;
  link_state: LinkState;
}

interface DiscussionRow {
  id: string;
  kind: DiscussionKind;
  text: string;
  tags: string;
  created_at: number;
}

interface LinkRow {
  exchange_id: string;
  target_id: string;
}

type LinkTargetRow = { target_id: string } & {
  [K in keyof DiscussionRow]: DiscussionRow[K] | null;
};

const tagsSchema = z.array(z.string());

// Failures after which SQLite cannot promise the transaction rolled back.
const UNCERTAIN_OUTCOME_CODES = /^SQLITE_(IOERR|FULL|CORRUPT|NOTADB|CANTOPEN)/;

function toWriteFailure(error: unknown): StoreWriteFailure {
  const uncertain =
    error instanceof Database.SqliteError &&
    UNCERTAIN_OUTCOME_CODES.test(error.code);
  const message = error instanceof Error ? error.message : String(error);
  return new StoreWriteFailure(message, uncertain ? "unknown" : "nothing", {
    cause: error,
  });
}

const EXCHANGE_COLUMNS = `e.exchange_id, e.session_id, e.project_name, e.response_text,
  e.user_note, e.capture_method, e.recording_enabled, e.created_at, e.link_state`;

export class SqliteContentStore implements ContentStore {
  static open(location: string, logger: Logger): SqliteContentStore {
    if (location !== ":memory:") {
      mkdirSync(path.dirname(location), { recursive: true });
    }
    return new SqliteContentStore(new Database(location), logger, location);
  }

  constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger,
    readonly location: string,
  ) {
    if (location !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
    this.db.exec(DISCUSSION_TRIGGERS_SQL);
    this.db
      .prepare("INSERT OR IGNORE INTO meta(key, value) VALUES (?, ?)")
      .run("schemaVersion", String(SCHEMA_VERSION));
  }

  async recordSession(session: Session): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO sessions(session_id, project_name, started_at, recording_enabled, off_the_record)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        session.sessionId,
        session.projectName,
        session.startedAt,
        session.recordingEnabled ? 1 : 0,
        session.offTheRecord ? 1 : 0,
      );
  }

  /**
   * Writes the row, its index entry and its links as one unit. The row is
   * marked indexed only after the index entry is in, inside the same
   * transaction, so a committed `pending` row means the index was lost.
   */
  async insertExchange(exchange: NewExchange): Promise<Exchange> {
    const latest = this.db
      .prepare<[], { latest: number | null }>(
        "SELECT MAX(created_at) AS latest FROM exchanges",
      );
    const insertRow = this.db.prepare(
      `INSERT INTO exchanges(exchange_id, session_id, project_name, response_text, user_note,
         capture_method, recording_enabled, created_at, index_state, link_state)
       VALUES (@exchangeId, @sessionId, @projectName, @responseText, @userNote,
         @captureMethod, @recordingEnabled, @createdAt, 'pending', @linkState)`,
    );
    const insertIndex = this.db.prepare(
      "INSERT INTO exchanges_fts(exchange_id, response_text, user_note) VALUES (?, ?, ?)",
    );
    const markIndexed = this.db.prepare(
      "UPDATE exchanges SET index_state = 'indexed' WHERE exchange_id = ?",
    );
    const insertLink = this.db.prepare(
      "INSERT OR IGNORE INTO exchange_links(exchange_id, target_id, position) VALUES (?, ?, ?)",
    );

    const linkedIds = [...new Set(exchange.linkedIds)];

    const tx = this.db.transaction((): number => {
      const previous = latest.get()?.latest ?? 0;
      const createdAt = Math.max(Date.now(), previous + 1);
      insertRow.run({
        exchangeId: exchange.exchangeId,
        sessionId: exchange.sessionId,
        projectName: exchange.projectName,
        responseText: exchange.responseText,
        userNote: exchange.userNote,
        captureMethod: exchange.captureMethod,
        recordingEnabled: exchange.recordingEnabled ? 1 : 0,
        createdAt,
        linkState: exchange.linkState,
      });
      insertIndex.run(
        exchange.exchangeId,
        exchange.responseText,
        exchange.userNote,
      );
      markIndexed.run(exchange.exchangeId);
      linkedIds.forEach((targetId, position) => {
        insertLink.run(exchange.exchangeId, targetId, position);
      });
      return createdAt;
    });

    let createdAt: number;
    try {
      createdAt = tx();
    } catch (error) {
      throw toWriteFailure(error);
    }
    this.logger.debug(
      { exchangeId: exchange.exchangeId, links: linkedIds.length },
      "Exchange committed",
    );
    return { ...exchange, linkedIds, createdAt: new Date(createdAt) };
  }

  async getExchange(id: string): Promise<Exchange | null> {
    const row = this.db
      .prepare<[string], ExchangeRow>(
        `SELECT ${EXCHANGE_COLUMNS} FROM exchanges e WHERE e.exchange_id = ?`,
      )
      .get(id);
    return row ? this.withLinks([row])[0] ?? null : null;
  }

  async getLastExchange(sessionId: string): Promise<Exchange | null> {
    const row = this.db
      .prepare<[string], ExchangeRow>(
        `SELECT ${EXCHANGE_COLUMNS} FROM exchanges e
         WHERE e.session_id = ?
         ORDER BY e.created_at DESC, e.rowid DESC
         LIMIT 1`,
      )
      .get(sessionId);
    return row ? this.withLinks([row])[0] ?? null : null;
  }

  async listLinkPending(): Promise<Exchange[]> {
    const rows = this.db
      .prepare<[], ExchangeRow>(
        `SELECT ${EXCHANGE_COLUMNS} FROM exchanges e
         WHERE e.link_state = 'link-pending'
         ORDER BY e.created_at ASC`,
      )
      .all();
    return this.withLinks(rows);
  }

  async replaceLinks(exchangeId: string, linkedIds: string[]): Promise<void> {
    const clear = this.db.prepare(
      "DELETE FROM exchange_links WHERE exchange_id = ?",
    );
    const insertLink = this.db.prepare(
      "INSERT OR IGNORE INTO exchange_links(exchange_id, target_id, position) VALUES (?, ?, ?)",
    );
    const markLinked = this.db.prepare(
      "UPDATE exchanges SET link_state = 'linked' WHERE exchange_id = ?",
    );

    const tx = this.db.transaction(() => {
      const updated = markLinked.run(exchangeId);
      if (updated.changes === 0) {
        throw new Error(`Exchange ${exchangeId} not found`);
      }
      clear.run(exchangeId);
      linkedIds.forEach((targetId, position) => {
        insertLink.run(exchangeId, targetId, position);
      });
    });
    tx();
  }

  async resolveLinks(exchangeId: string): Promise<LinkedRecord[]> {
    const rows = this.db
      .prepare<[string], LinkTargetRow>(
        `SELECT l.target_id, d.id, d.kind, d.text, d.tags, d.created_at
         FROM exchange_links l
         LEFT JOIN discussions d ON d.id = l.target_id
         WHERE l.exchange_id = ?
         ORDER BY l.position ASC`,
      )
      .all(exchangeId);
    return rows.map((row) => {
      const { id, kind, text, tags, created_at } = row;
      if (
        id === null ||
        kind === null ||
        text === null ||
        tags === null ||
        created_at === null
      ) {
        return { id: row.target_id, discussion: null };
      }
      return {
        id: row.target_id,
        discussion: this.rowToDiscussion({ id, kind, text, tags, created_at }),
      };
    });
  }

  async searchExchanges(terms: string[], limit: number): Promise<ExchangeMatch[]> {
    if (terms.length === 0) {
      return [];
    }
    const rows = this.db
      .prepare<[string, number], ExchangeRow & { score: number }>(
        `SELECT ${EXCHANGE_COLUMNS}, bm25(exchanges_fts) AS score
         FROM exchanges_fts
         JOIN exchanges e ON e.exchange_id = exchanges_fts.exchange_id
         WHERE exchanges_fts MATCH ?
         ORDER BY score ASC, e.created_at DESC
         LIMIT ?`,
      )
      .all(toMatchExpression(terms), limit);
    const exchanges = this.withLinks(rows);
    return exchanges.map((exchange, index) => ({
      exchange,
      relevance: -(rows[index]?.score ?? 0),
    }));
  }

  async insertDiscussion(discussion: NewDiscussion): Promise<Discussion> {
    const prefix = discussion.kind === "decision" ? "dec" : "disc";
    const record: Discussion = {
      id: `${prefix}-${randomBytes(8).toString("hex")}`,
      kind: discussion.kind,
      text: discussion.text,
      tags: discussion.tags,
      createdAt: discussion.createdAt ?? new Date(),
    };
    this.db
      .prepare(
        "INSERT INTO discussions(id, kind, text, tags, created_at) VALUES (?, ?, ?, ?, ?)",
      )
      .run(
        record.id,
        record.kind,
        record.text,
        JSON.stringify(record.tags),
        record.createdAt.getTime(),
      );
    return record;
  }

  // Links pointing at the deleted record are left in place as weak references.
  async deleteDiscussion(id: string): Promise<void> {
    this.db.prepare("DELETE FROM discussions WHERE id = ?").run(id);
  }

  async searchDiscussions(
    terms: string[],
    limit: number,
  ): Promise<DiscussionMatch[]> {
    if (terms.length === 0) {
      return [];
    }
    const rows = this.db
      .prepare<[string, number], { id: string; created_at: number; score: number }>(
        `SELECT d.id, d.created_at, bm25(discussions_fts) AS score
         FROM discussions_fts
         JOIN discussions d ON d.id = discussions_fts.discussion_id
         WHERE discussions_fts MATCH ?
         ORDER BY score ASC, d.created_at DESC, d.id ASC
         LIMIT ?`,
      )
      .all(toMatchExpression(terms), limit);
    return rows.map((row) => ({
      id: row.id,
      createdAt: new Date(row.created_at),
      relevance: -row.score,
    }));
  }

  async verifySync(): Promise<SyncIssue[]> {
    return [
      ...this.findIssues("exchanges", "missing-index",
        `SELECT e.exchange_id AS id FROM exchanges e
         WHERE NOT EXISTS (SELECT 1 FROM exchanges_fts f WHERE f.exchange_id = e.exchange_id)
         ORDER BY id`),
      ...this.findIssues("exchanges", "orphan-index",
        `SELECT DISTINCT f.exchange_id AS id FROM exchanges_fts f
         WHERE NOT EXISTS (SELECT 1 FROM exchanges e WHERE e.exchange_id = f.exchange_id)
         ORDER BY id`),
      ...this.findIssues("exchanges", "duplicate-index",
        `SELECT exchange_id AS id FROM exchanges_fts
         GROUP BY exchange_id HAVING COUNT(*) > 1
         ORDER BY id`),
      ...this.findIssues("exchanges", "pending",
        `SELECT exchange_id AS id FROM exchanges WHERE index_state = 'pending' ORDER BY id`),
      ...this.findIssues("discussions", "missing-index",
        `SELECT d.id AS id FROM discussions d
         WHERE NOT EXISTS (SELECT 1 FROM discussions_fts f WHERE f.discussion_id = d.id)
         ORDER BY id`),
      ...this.findIssues("discussions", "orphan-index",
        `SELECT DISTINCT f.discussion_id AS id FROM discussions_fts f
         WHERE NOT EXISTS (SELECT 1 FROM discussions d WHERE d.id = f.discussion_id)
         ORDER BY id`),
      ...this.findIssues("discussions", "duplicate-index",
        `SELECT discussion_id AS id FROM discussions_fts
         GROUP BY discussion_id HAVING COUNT(*) > 1
         ORDER BY id`),
    ];
  }

  /**
   * Rebuilds the index entry of every record named by verifySync: stale
   * entries are dropped, and records that still exist are indexed again.
   */
  async reconcile(): Promise<ReconcileReport> {
    const issues = await this.verifySync();
    if (issues.length === 0) {
      return { issues, repaired: 0 };
    }

    const dropExchange = this.db.prepare(
      "DELETE FROM exchanges_fts WHERE exchange_id = ?",
    );
    const reindexExchange = this.db.prepare(
      `INSERT INTO exchanges_fts(exchange_id, response_text, user_note)
       SELECT exchange_id, response_text, user_note FROM exchanges WHERE exchange_id = ?`,
    );
    const markIndexed = this.db.prepare(
      "UPDATE exchanges SET index_state = 'indexed' WHERE exchange_id = ?",
    );
    const dropDiscussion = this.db.prepare(
      "DELETE FROM discussions_fts WHERE discussion_id = ?",
    );
    const reindexDiscussion = this.db.prepare(
      `INSERT INTO discussions_fts(discussion_id, text, tags)
       SELECT id, text, (SELECT group_concat(value, ' ') FROM json_each(tags))
       FROM discussions WHERE id = ?`,
    );

    const exchangeIds = new Set(
      issues.filter((i) => i.table === "exchanges").map((i) => i.id),
    );
    const discussionIds = new Set(
      issues.filter((i) => i.table === "discussions").map((i) => i.id),
    );

    const tx = this.db.transaction(() => {
      for (const id of exchangeIds) {
        dropExchange.run(id);
        reindexExchange.run(id);
        markIndexed.run(id);
      }
      for (const id of discussionIds) {
        dropDiscussion.run(id);
        reindexDiscussion.run(id);
      }
    });
    tx();

    const repaired = exchangeIds.size + discussionIds.size;
    this.logger.info({ repaired, issues: issues.length }, "Search index reconciled");
    return { issues, repaired };
  }

  close(): void {
    this.db.close();
  }

  private findIssues(
    table: SyncTable,
    problem: SyncProblem,
    sql: string,
  ): SyncIssue[] {
    return this.db
      .prepare<[], { id: string }>(sql)
      .all()
      .map((row) => ({ id: row.id, table, problem }));
  }

  private withLinks(rows: ExchangeRow[]): Exchange[] {
    if (rows.length === 0) {
      return [];
    }
    const ids = rows.map((row) => row.exchange_id);
    const placeholders = ids.map(() => "?").join(", ");
    const links = this.db
      .prepare<string[], LinkRow>(
        `SELECT exchange_id, target_id FROM exchange_links
         WHERE exchange_id IN (${placeholders})
         ORDER BY position ASC`,
      )
      .all(...ids);

    const byExchange = new Map<string, string[]>();
    for (const link of links) {
      const list = byExchange.get(link.exchange_id) ?? [];
      list.push(link.target_id);
      byExchange.set(link.exchange_id, list);
    }

    return rows.map((row) => ({
      exchangeId: row.exchange_id,
      sessionId: row.session_id,
      projectName: row.project_name,
      responseText: row.response_text,
      userNote: row.user_note,
      captureMethod: row.capture_method,
      recordingEnabled: row.recording_enabled === 1,
      createdAt: new Date(row.created_at),
      linkedIds: byExchange.get(row.exchange_id) ?? [],
      linkState: row.link_state,
    }));
  }

  private rowToDiscussion(row: DiscussionRow): Discussion {
    return {
      id: row.id,
      kind: row.kind,
      text: row.text,
      tags: tagsSchema.parse(JSON.parse(row.tags)),
      createdAt: new Date(row.created_at),
    };
  }
}
