import { GameStatus } from "../engine/types";

export enum SmileyState {
  Happy,
  Cool,
  Dead,
}

const FACES: Record<SmileyState, string> = {
  [SmileyState.Happy]: ":)",
  [SmileyState.Cool]: "8)",
  [SmileyState.Dead]: "X(",
};

export function smileyState(status: GameStatus): SmileyState {
  switch (status) {
    case GameStatus.Active: return SmileyState.Happy;
    case GameStatus.Won: return SmileyState.Cool;
    case GameStatus.Lost: return SmileyState.Dead;
  }
}

export function smileyFor(status: GameStatus): string {
  return FACES[smileyState(status)];
}
