import type { Logger } from "pino";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AppConfig } from "./config";
import type { RecordingEngine } from "../recorder/engine";

export interface RuntimeContext {
  config: AppConfig;
  logger: Logger;
  server: McpServer;
  engine: RecordingEngine;
}

export interface Tool {
  register(context: RuntimeContext): void;
}
