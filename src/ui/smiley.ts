import { GameState } from "../engine/index";

export enum SmileyState {
  Happy,
  Cool,
  Dead,
}

const FACES: Record<SmileyState, string> = {
  [SmileyState.Happy]: ":)",
  [SmileyState.Cool]: "B)",
  [SmileyState.Dead]: "X(",
};

export function smileyFor(state: GameState): SmileyState {
  switch (state) {
    case GameState.Won:
      return SmileyState.Cool;
    case GameState.Lost:
      return SmileyState.Dead;
    default:
      return SmileyState.Happy;
  }
}

export function drawSmiley(state: SmileyState): string {
  return FACES[state];
}
