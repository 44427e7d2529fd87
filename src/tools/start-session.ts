import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { formatSessionStarted, respond } from "./format";

export class StartSessionTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "start_session",
      "Initialize session recording for a project",
      {
        project_name: z.string().describe("Name of the project for this session"),
        opt_out: z
          .boolean()
          .default(false)
          .describe("Set to true to opt out of recording"),
        override: z
          .boolean()
          .default(false)
          .describe("Replace a session that is already active"),
      },
      async ({ project_name, opt_out, override }) => {
        const result = await this.ctx.engine.startSession(project_name, {
          optOut: opt_out,
          override,
        });
        return respond(this.ctx.logger, "start_session", result, formatSessionStarted);
      },
    );
  }
}
