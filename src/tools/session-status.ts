import type { Tool, RuntimeContext } from "../core/runtime";
import { formatStatus, respond } from "./format";

export class SessionStatusTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "session_status",
      "Check current recording status and session info",
      async () => {
        const result = await this.ctx.engine.getStatus();
        return respond(this.ctx.logger, "session_status", result, formatStatus);
      },
    );
  }
}
