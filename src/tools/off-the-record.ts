import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatPrivacy, respond } from "./format";

export class OffTheRecordTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "off_the_record",
      "Toggle off-the-record mode (stops recording)",
      {
        enable: z
          .boolean()
          .default(true)
          .describe("True to go off the record, false to resume recording"),
      },
      async ({ enable }) => {
        const result = await this.ctx.engine.setOffTheRecord(enable);
        return respond(this.ctx.logger, "off_the_record", result, formatPrivacy);
      },
    );
  }
}
