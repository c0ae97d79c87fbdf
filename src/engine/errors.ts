export type MinesweeperErrorCode =
  | "INVALID_CONFIGURATION"
  | "OUT_OF_BOUNDS"
  | "INVALID_STATE";

export class MinesweeperError extends Error {
  constructor(message: string, public code: MinesweeperErrorCode) {
    super(message);
    this.name = "MinesweeperError";
  }
}

// Rejected board dimensions or mine count; shown to the player.
export class InvalidConfigurationError extends MinesweeperError {
  constructor(message: string) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

// A coordinate outside the grid: a caller bug, not a player mistake.
export class OutOfBoundsError extends MinesweeperError {
  constructor(public row: number, public col: number, rows: number, cols: number) {
    super(`Cell (${row}, ${col}) is outside the ${rows}x${cols} board`, "OUT_OF_BOUNDS");
    this.name = "OutOfBoundsError";
  }
}

export class InvalidStateError extends MinesweeperError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "InvalidStateError";
  }
}
