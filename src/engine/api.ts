import { Game } from "./game";
import { Annotation, GameStatus, Pos, RevealResult } from "./types";
import { Rng } from "./rng";

// Functional surface for the presentation layer. The Game is the board handle.

export function newGame(rows: number, cols: number, mines: number, rng?: Rng): Game {
  return new Game({ rows, cols, mines }, rng);
}

export function reveal(game: Game, row: number, col: number): RevealResult {
  return game.reveal(row, col);
}

export function toggleFlag(game: Game, row: number, col: number): Annotation {
  return game.toggleFlag(row, col);
}

export function chordReveal(game: Game, row: number, col: number): RevealResult {
  return game.chordReveal(row, col);
}

export function gameState(game: Game): GameStatus {
  return game.status;
}

export function mineLocations(game: Game): Pos[] {
  return game.mineLocations();
}
