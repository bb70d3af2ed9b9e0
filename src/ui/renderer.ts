import type { CellView, GameController, HighScoreEntry } from "../engine/index";
import { drawSmiley, smileyFor } from "./smiley";

export const GLYPHS = {
  hidden: "#",
  flag: "F",
  mine: "*",
  exploded: "X",
  wrongFlag: "x",
  empty: ".",
} as const;

const COUNTER_MAX = 999;
const COUNTER_MIN = -99;

export function renderCell(view: CellView): string {
  if (view.exploded) return GLYPHS.exploded;
  if (view.wrongFlag) return GLYPHS.wrongFlag;
  if (view.flagged) return GLYPHS.flag;
  if (view.mine) return GLYPHS.mine;
  if (!view.revealed) return GLYPHS.hidden;
  if (view.adjacentMines === null || view.adjacentMines === 0) return GLYPHS.empty;
  return String(view.adjacentMines);
}

/** Three-character LED-style counter, e.g. `040`, `-05`. */
export function renderCounter(value: number): string {
  const v = Math.max(COUNTER_MIN, Math.min(COUNTER_MAX, Math.trunc(value)));
  if (v < 0) return `-${String(-v).padStart(2, "0")}`;
  return String(v).padStart(3, "0");
}

export function renderStatus(controller: GameController): string {
  const face = drawSmiley(smileyFor(controller.gameState));
  return `${renderCounter(controller.getRemainingMines())}  ${face}  ${renderCounter(controller.getElapsedTime())}`;
}

export function renderBoard(controller: GameController): string[] {
  const cells = controller.visibleCells();
  const lines: string[] = [];
  const header = Array.from({ length: controller.cols }, (_, c) => String(c).padStart(2)).join(" ");
  lines.push(`    ${header}`);
  lines.push(`   +${"-".repeat(controller.cols * 3 - 1)}`);
  cells.forEach((row, r) => {
    const body = row.map((v) => renderCell(v).padStart(2)).join(" ");
    lines.push(`${String(r).padStart(2)} |${body}`);
  });
  return lines;
}

export function renderScores(scores: readonly HighScoreEntry[]): string[] {
  if (scores.length === 0) return ["No high scores yet."];
  const width = Math.max(6, ...scores.map((s) => s.playerName.length));
  return scores.map((s, i) => {
    const rank = `#${i + 1}`.padEnd(4);
    const name = s.playerName.padEnd(width);
    const time = `${s.completionTime.toFixed(1)}s`.padStart(7);
    return `${rank}${name} ${time}  ${s.dateAchieved.slice(0, 10)}`;
  });
}
