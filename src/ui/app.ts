import { GameState } from "../engine/index";
import type { GameController, RevealOutcome } from "../engine/index";
import { HELP_TEXT, parseCommand } from "./input";
import type { Command } from "./input";
import { renderBoard, renderScores, renderStatus } from "./renderer";

export interface AppIO {
  write(line: string): void;
  /** Prompt for one line of input; resolves to "" when input has ended. */
  ask(question: string): Promise<string>;
}

const ANONYMOUS = "Anonymous";
const MAX_NAME_LENGTH = 20;

/** Line-oriented front end: one command in, board and status out. */
export class App {
  constructor(
    private readonly controller: GameController,
    private readonly io: AppIO,
  ) {}

  start(): void {
    this.io.write("Ready. r <row> <col> to reveal, f <row> <col> to flag, h for help.");
    this.draw();
  }

  /** Returns false once the player quits. */
  async handle(line: string): Promise<boolean> {
    const command = parseCommand(line);
    switch (command.kind) {
      case "quit":
        return false;
      case "help":
        HELP_TEXT.forEach((l) => this.io.write(l));
        return true;
      case "scores":
        this.io.write("High scores:");
        renderScores(this.controller.getHighScores()).forEach((l) => this.io.write(l));
        return true;
      case "restart":
        this.controller.restartGame();
        this.io.write("Game restarted");
        this.draw();
        return true;
      case "invalid":
        this.io.write(`Error: ${command.reason}. Type h for help.`);
        return true;
      default:
        await this.play(command);
        return true;
    }
  }

  private async play(command: Extract<Command, { row: number }>): Promise<void> {
    const { row, col } = command;
    if (command.kind === "flag") {
      const outcome = this.controller.toggleFlag(row, col);
      if (!outcome) {
        this.io.write(`Cannot flag (${row}, ${col}).`);
        return;
      }
      this.draw();
      return;
    }

    const outcome =
      command.kind === "reveal"
        ? this.controller.revealCell(row, col)
        : this.controller.chordReveal(row, col);
    if (!outcome) {
      this.io.write(
        command.kind === "reveal"
          ? `Cannot reveal (${row}, ${col}).`
          : `Cannot chord at (${row}, ${col}): it needs a revealed number with exactly that many flags around it.`,
      );
      return;
    }
    this.draw();
    await this.afterReveal(outcome);
  }

  private async afterReveal(outcome: RevealOutcome): Promise<void> {
    if (outcome.gameState === GameState.Lost) {
      this.io.write("Game over! You hit a mine. Type n for a new game.");
      return;
    }
    if (outcome.gameState !== GameState.Won) return;

    this.io.write(`Game won in ${outcome.elapsedTime}s! Congratulations!`);
    if (!outcome.qualifiesForHighScore) return;

    const answer = (await this.io.ask("New high score! Enter your name: ")).trim();
    const name = answer === "" ? ANONYMOUS : answer.slice(0, MAX_NAME_LENGTH);
    if (this.controller.addHighScore(name)) {
      this.io.write("High scores:");
      renderScores(this.controller.getHighScores()).forEach((l) => this.io.write(l));
    }
  }

  private draw(): void {
    this.io.write(renderStatus(this.controller));
    renderBoard(this.controller).forEach((l) => this.io.write(l));
  }
}
