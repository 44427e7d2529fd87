import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Logger } from "pino";

export const SERVER_NAME = "memory-bank-recorder";
export const SERVER_VERSION = "0.1.0";

export class RecorderServer {
  public readonly server: McpServer;

  constructor(private readonly logger: Logger) {
    this.server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  }

  async start(transport: Transport = new StdioServerTransport()) {
    transport.onerror = (error) => {
      this.logger.error({ err: error }, "MCP transport error");
    };
    await this.server.connect(transport);
    this.logger.info({ server: SERVER_NAME }, "MCP server connected");
  }

  async stop() {
    await this.server.close();
    this.logger.info("MCP server closed");
  }
}
