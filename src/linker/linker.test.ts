import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { DateTime } from "luxon";
import { Linker, recencyWeight } from "./linker";
import { SqliteContentStore } from "../store/sqlite-store";
import { createLogger } from "../core/logger";

const logger = createLogger("silent");
const NOW = DateTime.fromISO("2026-03-01T12:00:00Z");

function daysAgo(days: number): Date {
  return NOW.minus({ days }).toJSDate();
}

describe("Linker", () => {
  let store: SqliteContentStore;
  let linker: Linker;

  beforeEach(() => {
    store = new SqliteContentStore(new Database(":memory:"), logger, ":memory:");
    linker = new Linker(store, logger, () => NOW);
  });

  afterEach(() => {
    store.close();
  });

  it("returns nothing for an empty store", async () => {
    expect(await linker.findCandidates("sqlite index design", 5)).toEqual([]);
  });

  it("returns nothing when the text has no usable terms", async () => {
    await store.insertDiscussion({ kind: "discussion", text: "the and for", tags: [] });
    expect(await linker.findCandidates("the and of it", 5)).toEqual([]);
  });

  it("ranks records sharing more terms first", async () => {
    const partial = await store.insertDiscussion({
      kind: "discussion",
      text: "sqlite garden",
      tags: [],
      createdAt: daysAgo(1),
    });
    const full = await store.insertDiscussion({
      kind: "decision",
      text: "sqlite index transaction",
      tags: [],
      createdAt: daysAgo(1),
    });
    await store.insertDiscussion({
      kind: "discussion",
      text: "weather report",
      tags: [],
      createdAt: daysAgo(1),
    });

    expect(await linker.findCandidates("How should the sqlite index work?", 5)).toEqual([
      full.id,
      partial.id,
    ]);
  });

  it("prefers the more recent of two equally relevant records", async () => {
    const older = await store.insertDiscussion({
      kind: "decision",
      text: "Decided to use FTS5 for search",
      tags: [],
      createdAt: daysAgo(90),
    });
    const newer = await store.insertDiscussion({
      kind: "decision",
      text: "Decided to use FTS5 for search",
      tags: [],
      createdAt: daysAgo(2),
    });

    expect(await linker.findCandidates("FTS5 search", 5)).toEqual([newer.id, older.id]);
  });

  it("honours the limit and is repeatable", async () => {
    for (let i = 0; i < 4; i += 1) {
      await store.insertDiscussion({
        kind: "discussion",
        text: `capture retry note ${i}`,
        tags: [],
        createdAt: daysAgo(i),
      });
    }

    const first = await linker.findCandidates("capture retry", 2);
    const second = await linker.findCandidates("capture retry", 2);
    expect(first).toHaveLength(2);
    expect(second).toEqual(first);
    expect(await linker.findCandidates("capture retry", 0)).toEqual([]);
  });
});

describe("recencyWeight", () => {
  it("halves the recency bonus every thirty days", () => {
    expect(recencyWeight(0)).toBe(1);
    expect(recencyWeight(30)).toBe(0.75);
    expect(recencyWeight(-5)).toBe(1);
  });
});
