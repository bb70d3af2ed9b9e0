export { GameController } from "./game";
export type { GameControllerOptions } from "./game";
export { Board, neighbours, posKey } from "./board";
export { Cell } from "./cell";
export { createRng, sampleWithoutReplacement } from "./rng";
export {
  HighScoreManager,
  FileScoreStorage,
  MemoryScoreStorage,
  DEFAULT_SCORES_FILE,
  parseScores,
  serializeScores,
} from "./high-scores";
export type { ScoreStorage, HighScoreOptions } from "./high-scores";
export type {
  GameConfig,
  Difficulty,
  Pos,
  CellView,
  RevealedCell,
  RevealOutcome,
  FlagOutcome,
  HighScoreEntry,
} from "./types";
export { GameState, DEFAULT_CONFIG, DIFFICULTY_PRESETS } from "./types";
