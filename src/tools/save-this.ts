import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatSaved, respond } from "./format";

export class SaveThisTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "save_this",
      "Manually save the current exchange to memory bank",
      {
        note: z
          .string()
          .default("")
          .describe("Optional note about why this exchange is important"),
      },
      async ({ note }) => {
        const result = await this.ctx.engine.saveExchange(note, {
          captureMethod: "manual",
        });
        return respond(this.ctx.logger, "save_this", result, formatSaved);
      },
    );
  }
}
