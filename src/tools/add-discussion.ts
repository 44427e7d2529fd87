import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatDiscussion, respond } from "./format";

export class AddDiscussionTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "add_discussion",
      "Record a discussion or decision that later exchanges can link to",
      {
        text: z.string().describe("What was discussed or decided"),
        kind: z.enum(["discussion", "decision"]).default("discussion"),
        tags: z.array(z.string()).default([]).describe("Extra search keywords"),
      },
      async ({ text, kind, tags }) => {
        const result = await this.ctx.engine.addDiscussion({ text, kind, tags });
        return respond(this.ctx.logger, "add_discussion", result, formatDiscussion);
      },
    );
  }
}
