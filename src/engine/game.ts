import { Board, posKey } from "./board";
import type { Cell } from "./cell";
import { HighScoreManager, MemoryScoreStorage } from "./high-scores";
import { createRng } from "./rng";
import { DEFAULT_CONFIG, GameState } from "./types";
import type {
  CellView,
  FlagOutcome,
  GameConfig,
  HighScoreEntry,
  Pos,
  RevealedCell,
  RevealOutcome,
} from "./types";

export interface GameControllerOptions {
  /** Leaderboard for won games. Defaults to an in-memory one. */
  highScores?: HighScoreManager;
  /** Overrides the seeded generator built from `config.seed`. */
  rng?: () => number;
}

function validateConfig(config: GameConfig): void {
  const { rows, cols, minesTotal } = config;
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
    throw new RangeError(`Board must be at least 1x1, got ${rows}x${cols}`);
  }
  if (!Number.isInteger(minesTotal) || minesTotal < 0 || minesTotal >= rows * cols) {
    throw new RangeError(
      `minesTotal must be an integer in 0..${rows * cols - 1} for a ${rows}x${cols} board, got ${minesTotal}`,
    );
  }
}

/**
 * One play session on top of a Board: timing, flag counting, chorded
 * reveal and the handoff of wins to the leaderboard.
 *
 * The flag counter is owned here and updated from each cell's flag state
 * before and after a toggle; flags set directly on the Board bypass it.
 */
export class GameController {
  readonly config: GameConfig;
  readonly highScores: HighScoreManager;
  private readonly rng: () => number;
  private currentBoard: Board;
  private state: GameState = GameState.New;
  private startTime = 0;
  private elapsedTime = 0;
  private flags = 0;
  private explodedPos: Pos | null = null;

  constructor(config: Partial<GameConfig> = {}, options: GameControllerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    validateConfig(this.config);
    this.rng = options.rng ?? createRng(this.config.seed ?? Date.now());
    this.highScores = options.highScores ?? new HighScoreManager({ storage: new MemoryScoreStorage() });
    this.currentBoard = new Board(this.config.rows, this.config.cols, this.rng);
  }

  get board(): Board {
    return this.currentBoard;
  }

  get gameState(): GameState {
    return this.state;
  }

  get rows(): number {
    return this.config.rows;
  }

  get cols(): number {
    return this.config.cols;
  }

  get totalMines(): number {
    return this.config.minesTotal;
  }

  get flagsPlaced(): number {
    return this.flags;
  }

  getCell(row: number, col: number): Cell | null {
    return this.currentBoard.getCell(row, col);
  }

  /** Place mines and start the clock. Does nothing once the game has started. */
  startGame(): boolean {
    if (this.state !== GameState.New) return false;
    // False when the board was armed beforehand through placeMinesAt; its mines are kept.
    this.currentBoard.placeMines(this.config.minesTotal);
    this.startTime = Date.now();
    this.state = GameState.InProgress;
    return true;
  }

  // Lazy: the next reveal or flag places the mines.
  restartGame(): void {
    this.currentBoard = new Board(this.config.rows, this.config.cols, this.rng);
    this.state = GameState.New;
    this.startTime = 0;
    this.elapsedTime = 0;
    this.flags = 0;
    this.explodedPos = null;
  }

  /** Whole seconds since the first move; frozen once the game is over. */
  getElapsedTime(): number {
    switch (this.state) {
      case GameState.New:
        return 0;
      case GameState.Won:
      case GameState.Lost:
        return this.elapsedTime;
      case GameState.InProgress:
        return Math.max(0, Math.floor((Date.now() - this.startTime) / 1000));
    }
  }

  // Negative when the player has placed more flags than there are mines.
  getRemainingMines(): number {
    return this.config.minesTotal - this.flags;
  }

  private isPlayable(): boolean {
    return this.state === GameState.New || this.state === GameState.InProgress;
  }

  revealCell(row: number, col: number): RevealOutcome | null {
    if (!this.isPlayable()) return null;
    if (!this.currentBoard.inBounds(row, col)) return null;
    if (this.state === GameState.New) this.startGame();

    const before = this.currentBoard.revealedPositions();
    if (!this.currentBoard.revealCell(row, col)) return null;

    const revealed = this.newlyRevealed(before);
    const qualifies = this.settle({ row, col });
    return this.revealOutcome(revealed, qualifies);
  }

  toggleFlag(row: number, col: number): FlagOutcome | null {
    if (!this.isPlayable()) return null;
    const cell = this.currentBoard.getCell(row, col);
    if (!cell) return null;
    if (this.state === GameState.New) this.startGame();

    const wasFlagged = cell.isFlagged;
    if (!this.currentBoard.toggleFlag(row, col)) return null;
    if (cell.isFlagged !== wasFlagged) this.flags += cell.isFlagged ? 1 : -1;

    return {
      gameState: this.state,
      flaggedCell: { row, col, isFlagged: cell.isFlagged },
      minesRemaining: this.getRemainingMines(),
      elapsedTime: this.getElapsedTime(),
    };
  }

  /**
   * Reveal every hidden, unflagged neighbour of a revealed number once the
   * flags around it match the number. A flag on the wrong cell means one of
   * those neighbours is a mine: the batch stops there and the game is lost.
   */
  chordReveal(row: number, col: number): RevealOutcome | null {
    if (this.state !== GameState.InProgress) return null;
    const cell = this.currentBoard.getCell(row, col);
    if (!cell || !cell.isRevealed || cell.adjacentMines === 0) return null;

    const nbrs = this.currentBoard.getNeighbors(row, col);
    const flagged = nbrs.filter((n) => n.isFlagged).length;
    if (flagged !== cell.adjacentMines) return null;

    const before = this.currentBoard.revealedPositions();
    let last: Pos = { row, col };
    for (const n of nbrs) {
      if (n.isRevealed || n.isFlagged) continue;
      if (!this.currentBoard.revealCell(n.row, n.col)) continue;
      last = { row: n.row, col: n.col };
      if (n.isMine) break;
    }

    const revealed = this.newlyRevealed(before);
    const qualifies = this.settle(last);
    return this.revealOutcome(revealed, qualifies);
  }

  /** Record the frozen time of a won game. */
  addHighScore(playerName: string): boolean {
    if (this.state !== GameState.Won) return false;
    return this.highScores.addScore(playerName, this.elapsedTime);
  }

  getHighScores(): HighScoreEntry[] {
    return this.highScores.getScores();
  }

  // Promote the board's outcome to the session. Returns whether a win made the leaderboard.
  private settle(lastRevealed: Pos): boolean {
    if (this.currentBoard.gameState === GameState.Lost) {
      this.explodedPos = lastRevealed;
      this.finish(GameState.Lost);
      return false;
    }
    if (this.currentBoard.allSafeCellsRevealed()) {
      this.finish(GameState.Won);
      return this.highScores.qualifiesForHighScore(this.elapsedTime);
    }
    return false;
  }

  private finish(state: GameState.Won | GameState.Lost): void {
    this.elapsedTime = this.getElapsedTime();
    this.state = state;
  }

  private newlyRevealed(before: Set<string>): RevealedCell[] {
    const out: RevealedCell[] = [];
    for (const row of this.currentBoard.grid) {
      for (const c of row) {
        if (c.isRevealed && !before.has(posKey(c))) {
          out.push({ row: c.row, col: c.col, isMine: c.isMine, adjacentMines: c.adjacentMines });
        }
      }
    }
    return out;
  }

  private revealOutcome(revealedCells: RevealedCell[], qualifiesForHighScore: boolean): RevealOutcome {
    return {
      gameState: this.state,
      revealedCells,
      minesRemaining: this.getRemainingMines(),
      elapsedTime: this.getElapsedTime(),
      qualifiesForHighScore,
    };
  }

  cellView(row: number, col: number): CellView | null {
    const c = this.currentBoard.getCell(row, col);
    if (!c) return null;
    const lost = this.state === GameState.Lost;
    const exploded =
      lost &&
      this.explodedPos !== null &&
      this.explodedPos.row === row &&
      this.explodedPos.col === col;

    return {
      row,
      col,
      revealed: c.isRevealed,
      flagged: c.isFlagged,
      adjacentMines: c.isRevealed && !c.isMine ? c.adjacentMines : null,
      mine: c.isRevealed || lost ? c.isMine : null,
      exploded,
      wrongFlag: lost && c.isFlagged && !c.isMine,
    };
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        const view = this.cellView(r, c);
        if (view) row.push(view);
      }
      out.push(row);
    }
    return out;
  }
}
