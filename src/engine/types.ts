export enum GameState {
  New = "new",
  InProgress = "in_progress",
  Won = "won",
  Lost = "lost",
}

export interface Pos {
  row: number;
  col: number;
}

export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  // omitted → seeded from the clock
  seed?: number;
}

export type Difficulty = "beginner" | "intermediate" | "expert";

export const DIFFICULTY_PRESETS: Record<Difficulty, GameConfig> = {
  beginner:     { rows: 9,  cols: 9,  minesTotal: 10 },
  intermediate: { rows: 16, cols: 16, minesTotal: 40 },
  expert:       { rows: 16, cols: 30, minesTotal: 99 },
};

/** Default config */
export const DEFAULT_CONFIG: GameConfig = DIFFICULTY_PRESETS.intermediate;

export interface RevealedCell {
  row: number;
  col: number;
  isMine: boolean;
  adjacentMines: number;
}

export interface RevealOutcome {
  gameState: GameState;
  revealedCells: RevealedCell[];
  minesRemaining: number;
  elapsedTime: number;
  // only ever true on the move that wins the game
  qualifiesForHighScore: boolean;
}

export interface FlagOutcome {
  gameState: GameState;
  flaggedCell: { row: number; col: number; isFlagged: boolean };
  minesRemaining: number;
  elapsedTime: number;
}

// Read-only cell snapshot for the UI layer
export interface CellView {
  row: number;
  col: number;
  revealed: boolean;
  flagged: boolean;
  adjacentMines: number | null; // visible once revealed
  mine: boolean | null;         // known when revealed or after a loss
  exploded: boolean;            // the mine that ended the game
  wrongFlag: boolean;           // flag on a safe cell, shown on loss
}

export interface HighScoreEntry {
  playerName: string;
  completionTime: number; // seconds
  dateAchieved: string;   // ISO 8601
}
