export class Cell {
  isMine = false;
  isRevealed = false;
  isFlagged = false;
  adjacentMines = 0; // 0..8, never consulted for mines

  constructor(
    readonly row: number,
    readonly col: number,
  ) {}

  /** Returns whether the cell is a mine. A flagged cell stays hidden and reports false. */
  reveal(): boolean {
    if (this.isFlagged) return false;
    this.isRevealed = true;
    return this.isMine;
  }

  toggleFlag(): boolean {
    if (this.isRevealed) return false;
    this.isFlagged = !this.isFlagged;
    return true;
  }
}
