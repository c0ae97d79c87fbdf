export type Difficulty = "easy" | "medium" | "hard";

export interface GameConfig {
  rows: number;
  cols: number;
  mines: number;
  seed: number;
}

export interface Cell {
  isMine: boolean;
  isRevealed: boolean;
  isFlagged: boolean;
  isQuestioned: boolean;
}

export enum GameStatus {
  Active = "active",
  Won = "won",
  Lost = "lost",
}

// Right-click cycle: None → Flagged → Questioned → None
export enum Annotation {
  None = "none",
  Flagged = "flagged",
  Questioned = "questioned",
}

export interface Pos {
  row: number;
  col: number;
}

export interface RevealedCell extends Pos {
  adjacentMines: number;
  isMine: boolean;
}

export interface RevealResult {
  stateChanged: boolean;
  newlyRevealed: RevealedCell[];
  status: GameStatus;
}

// Read-only cell snapshot for the UI layer
export interface CellView {
  row: number;
  col: number;
  revealed: boolean;
  annotation: Annotation;
  adjacentMines: number | null; // visible when revealed or game over
  isMine: boolean | null;       // visible when revealed or game over
  exploded: boolean;            // the mine the player hit
  wrongFlag: boolean;           // flag on a safe cell, shown after a loss
}

export const PRESETS: Record<Difficulty, Omit<GameConfig, "seed">> = {
  easy:   { rows: 9,  cols: 9,  mines: 10 },
  medium: { rows: 16, cols: 16, mines: 40 },
  hard:   { rows: 16, cols: 30, mines: 99 },
};

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  ...PRESETS.easy,
  seed: Date.now(),
};
