/**
 * Bounded leaderboard of fastest wins.
 *
 * Scores live behind a small synchronous storage backend: a JSON file under
 * the user's home directory by default, or memory (tests, throwaway
 * sessions). Storage failures are logged and degrade to "no scores" on read
 * and "save skipped" on write; they never reach the game controller.
 */

import { mkdirSync, readFileSync, writeFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import type { HighScoreEntry } from "./types";

// ── Storage backends ───────────────────────────────────────

export interface ScoreStorage {
  readonly name: string;
  /** Raw stored document, or null when nothing has been saved yet. */
  read(): string | null;
  write(data: string): void;
}

export const DEFAULT_SCORES_FILE = join(homedir(), ".minesweeper", "highscores.json");

export class FileScoreStorage implements ScoreStorage {
  readonly name = "file";

  constructor(readonly path: string = DEFAULT_SCORES_FILE) {}

  read(): string | null {
    if (!existsSync(this.path)) return null;
    return readFileSync(this.path, "utf8");
  }

  write(data: string): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, data, "utf8");
  }
}

export class MemoryScoreStorage implements ScoreStorage {
  readonly name = "memory";

  constructor(private data: string | null = null) {}

  read(): string | null {
    return this.data;
  }

  write(data: string): void {
    this.data = data;
  }
}

// ── Serialization ──────────────────────────────────────────

interface StoredScore {
  player_name: string;
  completion_time: number;
  date_achieved: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntry(value: unknown): HighScoreEntry | null {
  if (!isRecord(value)) return null;
  const { player_name, completion_time, date_achieved } = value;
  if (
    typeof player_name !== "string" ||
    typeof completion_time !== "number" ||
    !Number.isFinite(completion_time) ||
    typeof date_achieved !== "string"
  ) {
    return null;
  }
  return { playerName: player_name, completionTime: completion_time, dateAchieved: date_achieved };
}

/** @throws When the document is not a JSON array of score records. */
export function parseScores(raw: string): HighScoreEntry[] {
  const data: unknown = JSON.parse(raw);
  if (!Array.isArray(data)) {
    throw new TypeError("score file must contain a JSON array");
  }
  return data.map((item, i) => {
    const entry = toEntry(item);
    if (!entry) throw new TypeError(`malformed score record at index ${i}`);
    return entry;
  });
}

export function serializeScores(scores: readonly HighScoreEntry[]): string {
  const stored: StoredScore[] = scores.map((s) => ({
    player_name: s.playerName,
    completion_time: s.completionTime,
    date_achieved: s.dateAchieved,
  }));
  return JSON.stringify(stored, null, 2);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Manager ────────────────────────────────────────────────

export interface HighScoreOptions {
  /** Maximum number of entries kept. Defaults to 10. */
  maxScores?: number;
  /** Defaults to a FileScoreStorage at DEFAULT_SCORES_FILE. */
  storage?: ScoreStorage;
}

const DEFAULT_MAX_SCORES = 10;

export class HighScoreManager {
  readonly maxScores: number;
  readonly storage: ScoreStorage;
  private scores: HighScoreEntry[] = [];
  // Set while the in-memory list holds entries the last save could not write.
  private unsaved = false;

  constructor(options: HighScoreOptions = {}) {
    const maxScores = options.maxScores ?? DEFAULT_MAX_SCORES;
    if (!Number.isInteger(maxScores) || maxScores < 1) {
      throw new RangeError(`maxScores must be a positive integer, got ${maxScores}`);
    }
    this.maxScores = maxScores;
    this.storage = options.storage ?? new FileScoreStorage();
    this.loadScores();
  }

  /** Re-read storage. Unreadable or corrupt data yields an empty list. */
  loadScores(): HighScoreEntry[] {
    this.unsaved = false;
    let raw: string | null;
    try {
      raw = this.storage.read();
    } catch (err) {
      console.warn(`[HighScoreManager] Could not read scores from ${this.storage.name} storage: ${describe(err)}`);
      this.scores = [];
      return [];
    }
    if (raw === null || raw.trim() === "") {
      this.scores = [];
      return [];
    }
    try {
      this.scores = this.sortAndTrim(parseScores(raw));
    } catch (err) {
      console.warn(`[HighScoreManager] Ignoring corrupt score data: ${describe(err)}`);
      this.scores = [];
    }
    return this.getScores();
  }

  saveScores(): boolean {
    try {
      this.storage.write(serializeScores(this.scores));
      this.unsaved = false;
      return true;
    } catch (err) {
      console.warn(`[HighScoreManager] Could not save scores to ${this.storage.name} storage: ${describe(err)}`);
      this.unsaved = true;
      return false;
    }
  }

  /**
   * Record a completed game. Returns true when the time made the list;
   * the entry is kept in memory even if saving fails.
   */
  addScore(playerName: string, completionTime: number, achievedAt: Date = new Date()): boolean {
    this.refresh();
    if (!this.fits(completionTime)) return false;

    const entry: HighScoreEntry = {
      playerName,
      completionTime,
      dateAchieved: achievedAt.toISOString(),
    };
    this.scores = this.sortAndTrim([...this.scores, entry]);
    this.saveScores();
    return true;
  }

  qualifiesForHighScore(completionTime: number): boolean {
    this.refresh();
    return this.fits(completionTime);
  }

  getScores(): HighScoreEntry[] {
    return this.scores.map((s) => ({ ...s }));
  }

  clearScores(): void {
    this.scores = [];
    this.saveScores();
  }

  // Pick up writes from other sessions unless that would drop unsaved entries.
  private refresh(): void {
    if (!this.unsaved) this.loadScores();
  }

  private fits(completionTime: number): boolean {
    if (this.scores.length < this.maxScores) return true;
    return completionTime < this.scores[this.scores.length - 1].completionTime;
  }

  // Array.prototype.sort is stable, so ties keep insertion order.
  private sortAndTrim(scores: HighScoreEntry[]): HighScoreEntry[] {
    return scores
      .slice()
      .sort((a, b) => a.completionTime - b.completionTime)
      .slice(0, this.maxScores);
  }
}
