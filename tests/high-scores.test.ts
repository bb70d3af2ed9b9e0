// ─── High score tests ───────────────────────────────────────────────────────

import { mkdtempSync, readFileSync, rmSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  FileScoreStorage,
  HighScoreManager,
  MemoryScoreStorage,
  parseScores,
  serializeScores,
} from "../src/engine/index";
import type { ScoreStorage } from "../src/engine/index";

const WHEN = new Date("2026-10-18T09:30:00.000Z");

function memoryManager(maxScores?: number, data: string | null = null): HighScoreManager {
  return new HighScoreManager({ maxScores, storage: new MemoryScoreStorage(data) });
}

function times(manager: HighScoreManager): number[] {
  return manager.getScores().map((s) => s.completionTime);
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Ranking ────────────────────────────────────────────────────────────────

describe("HighScoreManager - ranking", () => {
  it("keeps scores sorted fastest first", () => {
    const manager = memoryManager();
    manager.addScore("Bob", 30, WHEN);
    manager.addScore("Ada", 12.5, WHEN);
    manager.addScore("Cy", 45, WHEN);
    expect(manager.getScores().map((s) => s.playerName)).toEqual(["Ada", "Bob", "Cy"]);
  });

  it("drops the slowest entry once the list is full", () => {
    const manager = memoryManager(3);
    expect(manager.addScore("A", 30, WHEN)).toBe(true);
    expect(manager.addScore("B", 10, WHEN)).toBe(true);
    expect(manager.addScore("C", 20, WHEN)).toBe(true);
    expect(manager.addScore("D", 40, WHEN)).toBe(false);
    expect(times(manager)).toEqual([10, 20, 30]);

    expect(manager.addScore("E", 5, WHEN)).toBe(true);
    expect(times(manager)).toEqual([5, 10, 20]);
  });

  it("a full list only admits strictly faster times", () => {
    const manager = memoryManager(2);
    manager.addScore("A", 10, WHEN);
    manager.addScore("B", 20, WHEN);
    expect(manager.qualifiesForHighScore(20)).toBe(false);
    expect(manager.qualifiesForHighScore(19)).toBe(true);
  });

  it("any time qualifies while the list has room", () => {
    const manager = memoryManager(3);
    manager.addScore("A", 10, WHEN);
    expect(manager.qualifiesForHighScore(9999)).toBe(true);
  });

  it("ties keep the order they were recorded in", () => {
    const manager = memoryManager();
    manager.addScore("First", 15, WHEN);
    manager.addScore("Second", 15, WHEN);
    expect(manager.getScores().map((s) => s.playerName)).toEqual(["First", "Second"]);
  });

  it("hands out copies", () => {
    const manager = memoryManager();
    manager.addScore("Ada", 12, WHEN);
    manager.getScores()[0].playerName = "Mallory";
    expect(manager.getScores()[0].playerName).toBe("Ada");
  });

  it("rejects a non-positive capacity", () => {
    expect(() => memoryManager(0)).toThrow(RangeError);
  });
});

// ─── Persistence ────────────────────────────────────────────────────────────

describe("HighScoreManager - persistence", () => {
  it("stores snake_case records with an ISO date", () => {
    const storage = new MemoryScoreStorage();
    const manager = new HighScoreManager({ storage });
    manager.addScore("Ada", 12.5, WHEN);
    expect(JSON.parse(storage.read() ?? "null")).toEqual([
      { player_name: "Ada", completion_time: 12.5, date_achieved: "2026-10-18T09:30:00.000Z" },
    ]);
  });

  it("a second manager on the same storage sees saved scores", () => {
    const storage = new MemoryScoreStorage();
    new HighScoreManager({ storage }).addScore("Ada", 12.5, WHEN);
    const other = new HighScoreManager({ storage });
    expect(other.getScores()).toEqual([
      { playerName: "Ada", completionTime: 12.5, dateAchieved: "2026-10-18T09:30:00.000Z" },
    ]);
  });

  it("addScore re-reads storage before ranking", () => {
    const storage = new MemoryScoreStorage();
    const a = new HighScoreManager({ storage, maxScores: 1 });
    const b = new HighScoreManager({ storage, maxScores: 1 });
    a.addScore("Ada", 10, WHEN);
    expect(b.addScore("Bob", 20, WHEN)).toBe(false);
    expect(b.getScores().map((s) => s.playerName)).toEqual(["Ada"]);
  });

  it("loads at most maxScores entries, fastest first", () => {
    const data = serializeScores([
      { playerName: "C", completionTime: 30, dateAchieved: WHEN.toISOString() },
      { playerName: "A", completionTime: 10, dateAchieved: WHEN.toISOString() },
      { playerName: "D", completionTime: 40, dateAchieved: WHEN.toISOString() },
      { playerName: "B", completionTime: 20, dateAchieved: WHEN.toISOString() },
    ]);
    const manager = memoryManager(2, data);
    expect(manager.getScores().map((s) => s.playerName)).toEqual(["A", "B"]);
  });

  it("clearScores empties the list and the storage", () => {
    const storage = new MemoryScoreStorage();
    const manager = new HighScoreManager({ storage });
    manager.addScore("Ada", 12, WHEN);
    manager.clearScores();
    expect(manager.getScores()).toEqual([]);
    expect(storage.read()).toBe("[]");
  });

  it("blank storage means no scores", () => {
    expect(memoryManager(10, "  \n").getScores()).toEqual([]);
  });
});

// ─── Failure handling ───────────────────────────────────────────────────────

describe("HighScoreManager - failures", () => {
  it("treats unparseable data as empty and warns", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const manager = memoryManager(10, "{not json");
    expect(manager.getScores()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("[HighScoreManager] Ignoring corrupt score data"));
  });

  it("rejects a document that is not an array", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    memoryManager(10, '{"player_name":"Ada"}');
    expect(warn).toHaveBeenCalledWith(
      "[HighScoreManager] Ignoring corrupt score data: score file must contain a JSON array",
    );
  });

  it("rejects a malformed record", () => {
    expect(() => parseScores('[{"player_name":"Ada","completion_time":"fast","date_achieved":"x"}]')).toThrow(
      "malformed score record at index 0",
    );
  });

  it("survives a storage that cannot be read", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const broken: ScoreStorage = {
      name: "broken",
      read() {
        throw new Error("disk gone");
      },
      write() {
        return;
      },
    };
    const manager = new HighScoreManager({ storage: broken });
    expect(manager.getScores()).toEqual([]);
    expect(warn).toHaveBeenCalledWith("[HighScoreManager] Could not read scores from broken storage: disk gone");
  });

  it("keeps a score in memory when saving fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const readOnly: ScoreStorage = {
      name: "read-only",
      read: () => null,
      write() {
        throw new Error("permission denied");
      },
    };
    const manager = new HighScoreManager({ storage: readOnly });
    expect(manager.addScore("Ada", 12, WHEN)).toBe(true);
    expect(times(manager)).toEqual([12]);
    expect(manager.saveScores()).toBe(false);
    expect(warn).toHaveBeenCalledWith(
      "[HighScoreManager] Could not save scores to read-only storage: permission denied",
    );

    expect(manager.addScore("Bob", 20, WHEN)).toBe(true);
    expect(manager.qualifiesForHighScore(5)).toBe(true);
    expect(manager.getScores().map((s) => s.playerName)).toEqual(["Ada", "Bob"]);
  });

  it("re-reads storage again once a save succeeds", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    let failing = true;
    let stored: string | null = null;
    const flaky: ScoreStorage = {
      name: "flaky",
      read: () => stored,
      write(data) {
        if (failing) throw new Error("disk full");
        stored = data;
      },
    };
    const manager = new HighScoreManager({ storage: flaky, maxScores: 2 });
    manager.addScore("Ada", 12, WHEN);

    failing = false;
    expect(manager.saveScores()).toBe(true);
    stored = serializeScores([
      { playerName: "Cy", completionTime: 3, dateAchieved: WHEN.toISOString() },
      { playerName: "Di", completionTime: 4, dateAchieved: WHEN.toISOString() },
    ]);
    expect(manager.qualifiesForHighScore(10)).toBe(false);
    expect(manager.getScores().map((s) => s.playerName)).toEqual(["Cy", "Di"]);
  });
});

// ─── File storage ───────────────────────────────────────────────────────────

describe("FileScoreStorage", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "minesweeper-scores-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads null before anything is saved", () => {
    expect(new FileScoreStorage(join(dir, "scores.json")).read()).toBeNull();
  });

  it("creates missing directories on save", () => {
    const path = join(dir, "nested", "deeper", "highscores.json");
    const manager = new HighScoreManager({ storage: new FileScoreStorage(path) });
    manager.addScore("Ada", 42, WHEN);

    expect(existsSync(path)).toBe(true);
    expect(JSON.parse(readFileSync(path, "utf8"))).toEqual([
      { player_name: "Ada", completion_time: 42, date_achieved: "2026-10-18T09:30:00.000Z" },
    ]);
    expect(new HighScoreManager({ storage: new FileScoreStorage(path) }).getScores()).toHaveLength(1);
  });
});
