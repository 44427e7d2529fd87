import { z } from "zod";
import type { Tool, RuntimeContext } from "../core/runtime";
import { MAX_SEARCH_RESULTS } from "../recorder/engine";
import { formatMatches, respond } from "./format";

export class SearchExchangesTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "search_exchanges",
      "Full-text search over recorded exchanges",
      {
        query: z.string().describe("Words to look for"),
        limit: z
          .number()
          .int()
          .min(1)
          .max(MAX_SEARCH_RESULTS)
          .default(10)
          .describe("Maximum number of matches"),
      },
      async ({ query, limit }) => {
        const result = await this.ctx.engine.searchExchanges(query, limit);
        return respond(this.ctx.logger, "search_exchanges", result, formatMatches);
      },
    );
  }
}
