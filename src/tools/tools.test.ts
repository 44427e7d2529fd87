import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createTools } from ".";
import { loadConfig } from "../core/config";
import { createLogger } from "../core/logger";
import { Linker } from "../linker/linker";
import { RecorderServer } from "../mcp/server";
import { RecordingEngine } from "../recorder/engine";
import { ReliabilityMonitor } from "../reliability/monitor";
import { SqliteContentStore } from "../store/sqlite-store";
import { ScriptedCaptureAdapter } from "../testing/scripted-capture";

const logger = createLogger("silent");
const config = loadConfig({ CAPTURE_TIMEOUT_MS: "50", CAPTURE_RETRIES: "0" });

const SearchOutput = z.object({
  matches: z.array(
    z.object({
      relevance: z.number(),
      exchange: z.object({
        id: z.string(),
        response_text: z.string(),
        user_note: z.string(),
        link_state: z.string(),
      }),
    }),
  ),
});

describe("MCP tools", () => {
  let db: Database.Database;
  let store: SqliteContentStore;
  let capture: ScriptedCaptureAdapter;
  let recorder: RecorderServer;
  let client: Client;

  beforeEach(async () => {
    db = new Database(":memory:");
    store = new SqliteContentStore(db, logger, ":memory:");
    capture = new ScriptedCaptureAdapter(["captured text"]);
    const engine = new RecordingEngine(
      {
        store,
        capture,
        linker: new Linker(store, logger),
        monitor: new ReliabilityMonitor(config, logger),
        logger,
      },
      { linkLimit: config.linkLimit, maxResponseChars: config.maxResponseChars },
    );
    recorder = new RecorderServer(logger);
    const runtime = { config, logger, server: recorder.server, engine };
    createTools().forEach((tool) => tool.register(runtime));

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await recorder.start(serverTransport);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await recorder.stop();
    store.close();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(
      await client.callTool({ name, arguments: args }),
    );
    const [first] = result.content;
    return {
      text: first?.type === "text" ? first.text : "",
      isError: result.isError === true,
    };
  }

  it("lists every recorder tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "add_discussion",
      "off_the_record",
      "replay",
      "save_this",
      "search_exchanges",
      "session_status",
      "set_recording",
      "start_session",
      "verify_sync",
    ]);
  });

  it("runs a session through save, replay and off the record", async () => {
    const started = await call("start_session", { project_name: "demo" });
    expect(started.isError).toBe(false);
    expect(started.text.split("\n")[0]).toBe("🎯 Session started: demo");

    const saved = await call("save_this", { note: "x" });
    expect(saved.text).toMatch(/^✅ Done\. Saved exch-[0-9a-f]{8} \(no links\)\.$/);

    const replay = await call("replay");
    const lines = replay.text.split("\n");
    expect(lines[0]).toBe("🔄 Last recorded exchange");
    expect(lines).toContain("captured text");
    expect(lines).toContain("Note: x");
    expect(lines).toContain("Method: manual");

    const offRecord = await call("off_the_record");
    expect(offRecord.text).toBe(
      "🔴 Off the record mode enabled.\nExchanges will not be saved until you call off_the_record with enable=false.",
    );

    const blocked = await call("save_this");
    expect(blocked).toEqual({
      isError: true,
      text: "❌ Off the record mode is on. Call off_the_record with enable=false to save again.",
    });

    const resumed = await call("off_the_record", { enable: false });
    expect(resumed.text).toBe("🟢 Recording resumed.\nExchanges will be saved again.");

    const again = await call("save_this", { note: "y" });
    expect(again.isError).toBe(false);
    expect(again.text).not.toBe(saved.text);
  });

  it("reports an empty replay without flagging an error", async () => {
    await call("start_session", { project_name: "demo" });
    expect(await call("replay")).toEqual({
      isError: false,
      text: "📭 No exchanges recorded yet.",
    });
  });

  it("truncates long responses in replay", async () => {
    capture.steps = ["a".repeat(600)];
    await call("start_session", { project_name: "demo" });
    await call("save_this");

    const replay = await call("replay");
    expect(replay.text.split("\n")).toContain(`${"a".repeat(500)}...`);
  });

  it("shows the status before any session", async () => {
    expect((await call("session_status")).text).toBe(
      [
        "🟢 Session status",
        "",
        "Project: Not set",
        "Recording: Enabled",
        "Mode: RECORDING",
        "Last exchange: None",
        "",
        "Database: :memory:",
        "Session started: No",
      ].join("\n"),
    );
  });

  it("explains typed failures", async () => {
    expect(await call("save_this")).toEqual({
      isError: true,
      text: "❌ No active session. Call start_session first.",
    });

    await call("start_session", { project_name: "demo" });
    expect(await call("start_session", { project_name: "other" })).toEqual({
      isError: true,
      text: '❌ A session for "demo" is already active. Pass override=true to replace it.',
    });

    capture.steps = [""];
    const failed = await call("save_this");
    expect(failed).toEqual({
      isError: true,
      text: "❌ Could not capture the last response after 1 attempt(s): scripted returned no text (step: capture). Copy the response manually and try save_this again.",
    });
  });

  it("gates saves on the recording flag", async () => {
    await call("start_session", { project_name: "demo", opt_out: true });
    expect((await call("save_this")).text).toBe(
      "❌ Recording is disabled for this session. Call set_recording with enabled=true first.",
    );

    expect((await call("set_recording", { enabled: true })).text).toBe(
      "🟢 Recording resumed.\nExchanges will be saved again.",
    );
    expect((await call("save_this")).isError).toBe(false);
  });

  it("verifies and repairs the search index", async () => {
    await call("start_session", { project_name: "demo" });
    await call("save_this");
    const id = db
      .prepare<[], { exchange_id: string }>("SELECT exchange_id FROM exchanges")
      .get()?.exchange_id;
    db.prepare("DELETE FROM exchanges_fts WHERE exchange_id = ?").run(id);

    expect((await call("verify_sync")).text).toBe(
      `⚠️ 1 sync issue(s) found. Run verify_sync with repair=true.\n- exchanges ${id}: missing-index`,
    );
    expect((await call("verify_sync", { repair: true })).text).toBe(
      `🔧 Repaired 1 record(s) for 1 issue(s).\n- exchanges ${id}: missing-index`,
    );
    expect((await call("verify_sync")).text).toBe("✅ Search index is in sync.");
  });

  it("searches exchanges and returns them in the export shape", async () => {
    capture.steps = ["The retry policy uses exponential backoff", "Something else entirely"];
    await call("start_session", { project_name: "demo" });
    await call("save_this", { note: "retry" });
    await call("save_this");

    const result = await call("search_exchanges", { query: "exponential", limit: 5 });
    const { matches } = SearchOutput.parse(JSON.parse(result.text));
    expect(matches).toHaveLength(1);
    expect(matches[0]?.exchange).toMatchObject({
      response_text: "The retry policy uses exponential backoff",
      user_note: "retry",
      link_state: "linked",
    });
  });

  it("records discussions that later saves link to", async () => {
    const added = await call("add_discussion", {
      text: "Use exponential backoff for capture retries",
      kind: "decision",
      tags: ["reliability"],
    });
    expect(added.text).toMatch(/^📝 Recorded decision dec-[0-9a-f]{16} \[reliability\]$/);

    capture.steps = ["Capture retries now use exponential backoff"];
    await call("start_session", { project_name: "demo" });
    expect((await call("save_this")).text).toMatch(/\(1 link\(s\)\)\.$/);

    const decisionId = added.text.split(" ")[3];
    const replay = await call("replay");
    expect(replay.text.split("\n")).toContain(`Links: ${decisionId}`);
  });

  it("keeps going off the record across the first session start", async () => {
    await call("off_the_record");
    const started = await call("start_session", { project_name: "demo" });
    expect(started.isError).toBe(false);

    expect(await call("save_this")).toEqual({
      isError: true,
      text: "❌ Off the record mode is on. Call off_the_record with enable=false to save again.",
    });
    expect(capture.calls).toBe(0);
  });
});
