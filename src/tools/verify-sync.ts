import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatReconcile, formatSyncIssues, respond } from "./format";

export class VerifySyncTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "verify_sync",
      "Check that the search index mirrors stored records, optionally repairing it",
      {
        repair: z
          .boolean()
          .default(false)
          .describe("Rebuild index entries for every issue found"),
      },
      async ({ repair }) => {
        if (repair) {
          const result = await this.ctx.engine.reconcile();
          return respond(this.ctx.logger, "verify_sync", result, formatReconcile);
        }
        const result = await this.ctx.engine.verifySync();
        return respond(this.ctx.logger, "verify_sync", result, formatSyncIssues);
      },
    );
  }
}
