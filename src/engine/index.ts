export { Game } from "./game";
export {
  Board,
  createEmptyGrid,
  neighbours,
  posKey,
  validateDimensions,
} from "./board";
export { createRng, randomInt } from "./rng";
export type { Rng } from "./rng";
export {
  newGame,
  reveal,
  toggleFlag,
  chordReveal,
  gameState,
  mineLocations,
} from "./api";
export {
  MinesweeperError,
  InvalidConfigurationError,
  OutOfBoundsError,
  InvalidStateError,
} from "./errors";
export type { MinesweeperErrorCode } from "./errors";
export type {
  GameConfig,
  Cell,
  CellView,
  Difficulty,
  Pos,
  RevealedCell,
  RevealResult,
} from "./types";
export { GameStatus, Annotation, DEFAULT_CONFIG, PRESETS } from "./types";
