import type { Tool, RuntimeContext } from "../core/runtime";
import { formatReplay, respond, textResult } from "./format";

export class ReplayTool implements Tool {
  private ctx!: RuntimeContext;

  register(context: RuntimeContext): void {
    this.ctx = context;
    context.server.tool(
      "replay",
      "Show the last recorded exchange from memory bank",
      async () => {
        const { engine } = this.ctx;
        const result = await engine
          .getLastExchange()
          .andThen((exchange) =>
            engine.resolveLinks(exchange.exchangeId).map((links) => ({ exchange, links })),
          );
        if (result.isErr() && result.error.type === "not_found") {
          return textResult(`📭 ${result.error.message}`);
        }
        return respond(this.ctx.logger, "replay", result, ({ exchange, links }) =>
          formatReplay(exchange, links),
        );
      },
    );
  }
}
