import { parseArgs } from "node:util";
import { DEFAULT_CONFIG, DEFAULT_SCORES_FILE, DIFFICULTY_PRESETS } from "../engine/index";
import type { Difficulty, GameConfig } from "../engine/index";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  config: GameConfig;
  scoresFile: string;
  maxScores: number;
  help: boolean;
}

export const USAGE = `Usage: minesweeper [options]

Options:
  -d, --difficulty <name>   beginner | intermediate | expert (default: intermediate)
      --rows <n>            board rows
      --cols <n>            board columns
  -m, --mines <n>           number of mines
      --seed <n>            seed for mine placement
      --scores-file <path>  high score file (default: ${DEFAULT_SCORES_FILE})
      --max-scores <n>      leaderboard size (default: 10)
  -h, --help                show this help`;

function isDifficulty(value: string): value is Difficulty {
  return Object.prototype.hasOwnProperty.call(DIFFICULTY_PRESETS, value);
}

function parseInteger(flag: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value)) throw new UsageError(`--${flag} expects an integer, got "${value}"`);
  const n = Number(value);
  if (n < min) throw new UsageError(`--${flag} must be at least ${min}, got ${n}`);
  return n;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        difficulty: { type: "string", short: "d" },
        rows: { type: "string" },
        cols: { type: "string" },
        mines: { type: "string", short: "m" },
        seed: { type: "string" },
        "scores-file": { type: "string" },
        "max-scores": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** @throws UsageError on unknown flags or bad values. */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const values = readFlags(argv);

  let base: GameConfig = DEFAULT_CONFIG;
  if (values.difficulty !== undefined) {
    if (!isDifficulty(values.difficulty)) {
      throw new UsageError(`unknown difficulty "${values.difficulty}"`);
    }
    base = DIFFICULTY_PRESETS[values.difficulty];
  }

  const config: GameConfig = {
    rows: parseInteger("rows", values.rows, 1) ?? base.rows,
    cols: parseInteger("cols", values.cols, 1) ?? base.cols,
    minesTotal: parseInteger("mines", values.mines, 0) ?? base.minesTotal,
  };
  const seed = parseInteger("seed", values.seed, Number.MIN_SAFE_INTEGER);
  if (seed !== undefined) config.seed = seed;

  if (config.minesTotal >= config.rows * config.cols) {
    throw new UsageError(
      `a ${config.rows}x${config.cols} board holds at most ${config.rows * config.cols - 1} mines, got ${config.minesTotal}`,
    );
  }

  return {
    config,
    scoresFile: values["scores-file"] ?? env.MINESWEEPER_SCORES_FILE ?? DEFAULT_SCORES_FILE,
    maxScores: parseInteger("max-scores", values["max-scores"], 1) ?? 10,
    help: values.help ?? false,
  };
}
