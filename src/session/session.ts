import { randomUUID } from "node:crypto";
import { DateTime } from "luxon";

export interface Session {
  sessionId: string;
  projectName: string;
  startedAt: string;
  recordingEnabled: boolean;
  offTheRecord: boolean;
}

export interface PrivacyState {
  recordingEnabled: boolean;
  offTheRecord: boolean;
  writeAllowed: boolean;
  changed: boolean;
}

export interface SessionStatus {
  started: boolean;
  sessionId: string | null;
  projectName: string | null;
  startedAt: string | null;
  recordingEnabled: boolean;
  offTheRecord: boolean;
  writeAllowed: boolean;
  lastExchangeId: string | null;
  databasePath: string;
}

export function createSession(
  projectName: string,
  options: { optOut?: boolean; now?: DateTime } = {},
): Session {
  const startedAt = options.now ?? DateTime.utc();
  return {
    sessionId: `sess-${randomUUID()}`,
    projectName,
    startedAt: startedAt.toUTC().toISO() ?? new Date().toISOString(),
    recordingEnabled: options.optOut !== true,
    offTheRecord: false,
  };
}
