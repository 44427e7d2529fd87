import type { Tool } from "../core/runtime";
import { AddDiscussionTool } from "./add-discussion";
import { OffTheRecordTool } from "./off-the-record";
import { ReplayTool } from "./replay";
import { SaveThisTool } from "./save-this";
import { SearchExchangesTool } from "./search-exchanges";
import { SessionStatusTool } from "./session-status";
import { SetRecordingTool } from "./set-recording";
import { StartSessionTool } from "./start-session";
import { VerifySyncTool } from "./verify-sync";

export function createTools(): Tool[] {
  return [
    new StartSessionTool(),
    new SaveThisTool(),
    new ReplayTool(),
    new OffTheRecordTool(),
    new SetRecordingTool(),
    new SessionStatusTool(),
    new VerifySyncTool(),
    new SearchExchangesTool(),
    new AddDiscussionTool(),
  ];
}
