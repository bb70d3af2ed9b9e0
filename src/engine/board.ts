import { Cell } from "./cell";
import { sampleWithoutReplacement } from "./rng";
import { GameState } from "./types";
import type { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

// Bounds-clipped 8-neighbourhood: 3 at a corner, 5 on an edge, 8 inside.
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r < 0 || r >= rows || c < 0 || c >= cols) continue;
      result.push({ row: r, col: c });
    }
  }
  return result;
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

export class Board {
  readonly rows: number;
  readonly cols: number;
  readonly grid: Cell[][];
  gameState: GameState = GameState.New;
  private mines = 0;

  constructor(rows: number, cols: number, private readonly rng: () => number = Math.random) {
    assertDimension("rows", rows);
    assertDimension("cols", cols);
    this.rows = rows;
    this.cols = cols;
    this.grid = [];
    for (let r = 0; r < rows; r++) {
      const row: Cell[] = [];
      for (let c = 0; c < cols; c++) row.push(new Cell(r, c));
      this.grid.push(row);
    }
  }

  get mineCount(): number {
    return this.mines;
  }

  inBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.rows && col >= 0 && col < this.cols
    );
  }

  getCell(row: number, col: number): Cell | null {
    return this.inBounds(row, col) ? this.grid[row][col] : null;
  }

  getNeighbors(row: number, col: number): Cell[] {
    if (!this.inBounds(row, col)) return [];
    return neighbours(row, col, this.rows, this.cols).map((p) => this.grid[p.row][p.col]);
  }

  /** Place `count` mines uniformly at random. Only a fresh board accepts mines. */
  placeMines(count: number): boolean {
    const total = this.rows * this.cols;
    if (!Number.isInteger(count) || count < 0 || count > total) {
      throw new RangeError(`Cannot place ${count} mines on a ${this.rows}x${this.cols} board`);
    }
    if (this.gameState !== GameState.New) return false;

    const all: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) all.push({ row: r, col: c });
    }
    return this.arm(sampleWithoutReplacement(all, count, this.rng));
  }

  /** Place mines at known positions (fixture boards, replays). */
  placeMinesAt(positions: readonly Pos[]): boolean {
    for (const p of positions) {
      if (!this.inBounds(p.row, p.col)) {
        throw new RangeError(`Mine position (${p.row}, ${p.col}) is outside the ${this.rows}x${this.cols} board`);
      }
    }
    if (this.gameState !== GameState.New) return false;
    const unique = new Map<string, Pos>();
    for (const p of positions) unique.set(posKey(p), p);
    return this.arm([...unique.values()]);
  }

  private arm(positions: Pos[]): boolean {
    for (const p of positions) this.grid[p.row][p.col].isMine = true;
    this.mines = positions.length;
    this.computeAdjacency();
    this.gameState = GameState.InProgress;
    return true;
  }

  private computeAdjacency(): void {
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell.isMine) continue;
        let count = 0;
        for (const n of this.getNeighbors(cell.row, cell.col)) {
          if (n.isMine) count++;
        }
        cell.adjacentMines = count;
      }
    }
  }

  revealCell(row: number, col: number): boolean {
    if (this.gameState !== GameState.InProgress) return false;
    const cell = this.getCell(row, col);
    if (!cell || cell.isRevealed || cell.isFlagged) return false;

    if (cell.reveal()) {
      this.gameState = GameState.Lost;
      return true;
    }

    if (cell.adjacentMines === 0) {
      // Zero cells expand; numbered cells form the border and stop.
      const stack: Cell[] = this.getNeighbors(row, col);
      while (stack.length > 0) {
        const next = stack.pop();
        if (!next || next.isRevealed || next.isFlagged || next.isMine) continue;
        next.reveal();
        if (next.adjacentMines === 0) {
          stack.push(...this.getNeighbors(next.row, next.col));
        }
      }
    }

    this.checkWinCondition();
    return true;
  }

  toggleFlag(row: number, col: number): boolean {
    const cell = this.getCell(row, col);
    if (!cell || cell.isRevealed) return false;
    return cell.toggleFlag();
  }

  /** True when every non-mine cell is revealed. Flags on mines are not required. */
  allSafeCellsRevealed(): boolean {
    for (const row of this.grid) {
      for (const cell of row) {
        if (!cell.isMine && !cell.isRevealed) return false;
      }
    }
    return true;
  }

  private checkWinCondition(): void {
    if (this.gameState === GameState.InProgress && this.allSafeCellsRevealed()) {
      this.gameState = GameState.Won;
    }
  }

  revealedPositions(): Set<string> {
    const out = new Set<string>();
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell.isRevealed) out.add(posKey(cell));
      }
    }
    return out;
  }

  minePositions(): Pos[] {
    const out: Pos[] = [];
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell.isMine) out.push({ row: cell.row, col: cell.col });
      }
    }
    return out;
  }

  flaggedCount(): number {
    let n = 0;
    for (const row of this.grid) {
      for (const cell of row) {
        if (cell.isFlagged) n++;
      }
    }
    return n;
  }
}
