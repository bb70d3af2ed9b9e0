#!/usr/bin/env node
import { createInterface } from "node:readline";
import { FileScoreStorage, GameController, HighScoreManager } from "./engine/index";
import { App } from "./ui/app";
import { parseCliArgs, USAGE, UsageError } from "./ui/options";
import type { CliOptions } from "./ui/options";

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`minesweeper: ${err.message}`);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const highScores = new HighScoreManager({
    maxScores: options.maxScores,
    storage: new FileScoreStorage(options.scoresFile),
  });
  const controller = new GameController(options.config, { highScores });

  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const next = async (prompt: string): Promise<string | null> => {
    process.stdout.write(prompt);
    const result = await lines.next();
    return result.done ? null : result.value;
  };

  const app = new App(controller, {
    write: (line) => process.stdout.write(`${line}\n`),
    ask: async (question) => (await next(question)) ?? "",
  });

  app.start();
  try {
    for (;;) {
      const line = await next("> ");
      if (line === null || !(await app.handle(line))) break;
    }
  } finally {
    rl.close();
  }
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error("[minesweeper] Unexpected error:", err);
      process.exitCode = 1;
    },
  );
}
