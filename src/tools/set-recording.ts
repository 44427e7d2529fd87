import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatPrivacy, respond } from "./format";

export class SetRecordingTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "set_recording",
      "Turn recording on or off for the current session",
      {
        enabled: z.boolean().describe("Whether exchanges may be saved"),
      },
      async ({ enabled }) => {
        const result = await this.ctx.engine.setRecording(enabled);
        return respond(this.ctx.logger, "set_recording", result, formatPrivacy);
      },
    );
  }
}
