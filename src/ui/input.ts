export type CellAction = "reveal" | "flag" | "chord";

export type Command =
  | { kind: CellAction; row: number; col: number }
  | { kind: "restart" }
  | { kind: "scores" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "invalid"; reason: string };

const CELL_ACTIONS = new Map<string, CellAction>([
  ["r", "reveal"],
  ["reveal", "reveal"],
  ["f", "flag"],
  ["flag", "flag"],
  ["c", "chord"],
  ["chord", "chord"],
]);

const SIMPLE = new Map<string, Command>([
  ["n", { kind: "restart" }],
  ["new", { kind: "restart" }],
  ["restart", { kind: "restart" }],
  ["s", { kind: "scores" }],
  ["scores", { kind: "scores" }],
  ["h", { kind: "help" }],
  ["help", { kind: "help" }],
  ["?", { kind: "help" }],
  ["q", { kind: "quit" }],
  ["quit", { kind: "quit" }],
  ["exit", { kind: "quit" }],
]);

export const HELP_TEXT = [
  "Commands:",
  "  r <row> <col>   reveal a cell",
  "  f <row> <col>   toggle a flag",
  "  c <row> <col>   reveal around a number whose flags are all placed",
  "  n               new game",
  "  s               high scores",
  "  h               this help",
  "  q               quit",
];

function parseIndex(token: string | undefined): number | null {
  if (token === undefined || !/^\d+$/.test(token)) return null;
  return Number(token);
}

export function parseCommand(line: string): Command {
  const tokens = line.trim().toLowerCase().split(/\s+/).filter((t) => t !== "");
  if (tokens.length === 0) return { kind: "invalid", reason: "empty command" };

  const [verb, ...args] = tokens;
  const action = CELL_ACTIONS.get(verb);
  if (action) {
    const row = parseIndex(args[0]);
    const col = parseIndex(args[1]);
    if (row === null || col === null || args.length !== 2) {
      return { kind: "invalid", reason: `usage: ${verb} <row> <col>` };
    }
    return { kind: action, row, col };
  }

  const simple = SIMPLE.get(verb);
  if (simple && args.length === 0) return simple;
  return { kind: "invalid", reason: `unknown command "${line.trim()}"` };
}
