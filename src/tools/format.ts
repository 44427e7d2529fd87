import { DateTime } from "luxon";
import type { Result } from "neverthrow";
import type { Logger } from "pino";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError, type RecorderError } from "../core/errors";
import type { PrivacyState, SessionStatus } from "../session/session";
import type {
  Discussion,
  Exchange,
  ExchangeMatch,
  LinkedRecord,
  ReconcileReport,
  SyncIssue,
} from "../store/store";

export const REPLAY_PREVIEW_CHARS = 500;

export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(error: RecorderError): CallToolResult {
  return {
    content: [{ type: "text", text: `❌ ${describeError(error)}` }],
    isError: true,
  };
}

/**
 * Turns an engine result into a tool result. Failures are logged here so
 * each tool does not have to.
 */
export function respond<T>(
  logger: Logger,
  tool: string,
  result: Result<T, RecorderError>,
  render: (value: T) => string,
): CallToolResult {
  return result.match(
    (value) => textResult(render(value)),
    (error) => {
      logger.warn({ err: error, tool }, "Tool call failed");
      return errorResult(error);
    },
  );
}

export function shortId(id: string): string {
  return id.slice(0, 13);
}

function isoTimestamp(date: Date): string {
  return DateTime.fromJSDate(date).toUTC().toISO() ?? date.toISOString();
}

export function formatSessionStarted(status: SessionStatus): string {
  const project = status.projectName ?? "unnamed";
  if (!status.recordingEnabled) {
    return [
      `🔴 Session started: ${project}`,
      "",
      "Recording is disabled (opted out). Nothing will be saved.",
      "Call set_recording with enabled=true to start recording later.",
    ].join("\n");
  }
  return [
    `🎯 Session started: ${project}`,
    "",
    "Conversations are being recorded.",
    "",
    "Available commands:",
    "• save_this - save the last response",
    "• replay - show the last recorded exchange",
    "• off_the_record - pause recording",
    "• session_status - check recording status",
  ].join("\n");
}

function describeLinks(exchange: Exchange): string {
  if (exchange.linkState === "link-pending") {
    return "links pending";
  }
  const count = exchange.linkedIds.length;
  return count === 0 ? "no links" : `${count} link(s)`;
}

export function formatSaved(exchange: Exchange): string {
  return `✅ Done. Saved ${shortId(exchange.exchangeId)} (${describeLinks(exchange)}).`;
}

function describeResolvedLinks(exchange: Exchange, links: LinkedRecord[]): string {
  if (links.length === 0) {
    return describeLinks(exchange);
  }
  return links
    .map((link) => (link.discussion ? link.id : `${link.id} (deleted)`))
    .join(", ");
}

export function formatReplay(exchange: Exchange, links: LinkedRecord[]): string {
  const text = exchange.responseText;
  const preview =
    text.length > REPLAY_PREVIEW_CHARS
      ? `${text.slice(0, REPLAY_PREVIEW_CHARS)}...`
      : text;
  return [
    "🔄 Last recorded exchange",
    "",
    `ID: ${shortId(exchange.exchangeId)}`,
    `Timestamp: ${isoTimestamp(exchange.createdAt)}`,
    `Method: ${exchange.captureMethod}`,
    `Links: ${describeResolvedLinks(exchange, links)}`,
    "",
    "Response:",
    preview,
    "",
    `Note: ${exchange.userNote || "None"}`,
  ].join("\n");
}

export function formatPrivacy(state: PrivacyState): string {
  const lines: string[] = [];
  if (state.offTheRecord) {
    lines.push(
      "🔴 Off the record mode enabled.",
      "Exchanges will not be saved until you call off_the_record with enable=false.",
    );
  } else if (!state.recordingEnabled) {
    lines.push(
      "🔴 Recording disabled.",
      "Call set_recording with enabled=true to resume.",
    );
  } else {
    lines.push("🟢 Recording resumed.", "Exchanges will be saved again.");
  }
  if (!state.changed) {
    lines.push("(No change.)");
  }
  return lines.join("\n");
}

export function formatStatus(status: SessionStatus): string {
  const emoji = status.writeAllowed ? "🟢" : "🔴";
  return [
    `${emoji} Session status`,
    "",
    `Project: ${status.projectName ?? "Not set"}`,
    `Recording: ${status.recordingEnabled ? "Enabled" : "Disabled"}`,
    `Mode: ${status.offTheRecord ? "OFF THE RECORD" : "RECORDING"}`,
    `Last exchange: ${status.lastExchangeId ? shortId(status.lastExchangeId) : "None"}`,
    "",
    `Database: ${status.databasePath}`,
    `Session started: ${status.started ? "Yes" : "No"}`,
  ].join("\n");
}

function formatIssueLines(issues: SyncIssue[]): string[] {
  return issues.map((issue) => `- ${issue.table} ${issue.id}: ${issue.problem}`);
}

export function formatSyncIssues(issues: SyncIssue[]): string {
  if (issues.length === 0) {
    return "✅ Search index is in sync.";
  }
  return [
    `⚠️ ${issues.length} sync issue(s) found. Run verify_sync with repair=true.`,
    ...formatIssueLines(issues),
  ].join("\n");
}

export function formatReconcile(report: ReconcileReport): string {
  if (report.issues.length === 0) {
    return "✅ Search index is in sync. Nothing to repair.";
  }
  return [
    `🔧 Repaired ${report.repaired} record(s) for ${report.issues.length} issue(s).`,
    ...formatIssueLines(report.issues),
  ].join("\n");
}

export interface SerializedExchange {
  id: string;
  session_id: string;
  project_name: string;
  response_text: string;
  user_note: string;
  capture_method: string;
  timestamp: string;
  recording_enabled: boolean;
  linked_ids: string[];
  link_state: string;
}

export function serializeExchange(exchange: Exchange): SerializedExchange {
  return {
    id: exchange.exchangeId,
    session_id: exchange.sessionId,
    project_name: exchange.projectName,
    response_text: exchange.responseText,
    user_note: exchange.userNote,
    capture_method: exchange.captureMethod,
    timestamp: isoTimestamp(exchange.createdAt),
    recording_enabled: exchange.recordingEnabled,
    linked_ids: exchange.linkedIds,
    link_state: exchange.linkState,
  };
}

export function formatMatches(matches: ExchangeMatch[]): string {
  return JSON.stringify(
    {
      matches: matches.map((match) => ({
        relevance: Number(match.relevance.toFixed(4)),
        exchange: serializeExchange(match.exchange),
      })),
    },
    null,
    2,
  );
}

export function formatDiscussion(discussion: Discussion): string {
  const tags = discussion.tags.length > 0 ? ` [${discussion.tags.join(", ")}]` : "";
  return `📝 Recorded ${discussion.kind} ${discussion.id}${tags}`;
}
