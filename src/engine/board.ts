import { Cell, Pos } from "./types";
import { InvalidConfigurationError, InvalidStateError, OutOfBoundsError } from "./errors";
import { Rng, createRng, randomInt } from "./rng";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

// Clamped 8-neighbourhood, row-major order
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r < 0 || r >= rows || c < 0 || c >= cols) continue;
      result.push({ row: r, col: c });
    }
  }
  return result;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ isMine: false, isRevealed: false, isFlagged: false, isQuestioned: false });
    }
    grid.push(row);
  }
  return grid;
}

/**
 * Throws InvalidConfigurationError unless rows, cols and mines are positive
 * integers leaving at least one safe tile.
 */
export function validateDimensions(rows: number, cols: number, mines: number): void {
  for (const [name, value] of [["rows", rows], ["cols", cols], ["mines", mines]] as const) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
  }
  if (mines >= rows * cols) {
    throw new InvalidConfigurationError(
      `${mines} mines do not fit on a ${rows}x${cols} board (at most ${rows * cols - 1})`,
    );
  }
}

export class Board {
  readonly rows: number;
  readonly cols: number;
  readonly mineCount: number;
  private readonly grid: Cell[][];
  private readonly mines: Pos[] = [];
  private active = true;
  private remaining: number;

  constructor(rows: number, cols: number, mineCount: number, rng: Rng = createRng(Date.now())) {
    validateDimensions(rows, cols, mineCount);
    this.rows = rows;
    this.cols = cols;
    this.mineCount = mineCount;
    this.remaining = rows * cols - mineCount;
    this.grid = createEmptyGrid(rows, cols);

    // Sample uniformly, retry on collision
    while (this.mines.length < mineCount) {
      const row = randomInt(rng, rows);
      const col = randomInt(rng, cols);
      const cell = this.grid[row][col];
      if (cell.isMine) continue;
      cell.isMine = true;
      this.mines.push({ row, col });
    }
  }

  /** Board with a fixed mine layout instead of a random one. */
  static fromMines(rows: number, cols: number, mines: Pos[]): Board {
    validateDimensions(rows, cols, mines.length);
    const seen = new Set<string>();
    for (const m of mines) {
      if (!Number.isInteger(m.row) || !Number.isInteger(m.col) ||
          m.row < 0 || m.row >= rows || m.col < 0 || m.col >= cols) {
        throw new InvalidConfigurationError(`mine at (${m.row}, ${m.col}) is off the board`);
      }
      const key = posKey(m);
      if (seen.has(key)) {
        throw new InvalidConfigurationError(`duplicate mine at (${m.row}, ${m.col})`);
      }
      seen.add(key);
    }

    // Replay the layout through the sampling loop: one row draw, then one col draw per mine
    const draws = mines.flatMap((m) => [(m.row + 0.5) / rows, (m.col + 0.5) / cols]);
    let next = 0;
    return new Board(rows, cols, mines.length, () => draws[next++]);
  }

  private inBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.rows && col >= 0 && col < this.cols
    );
  }

  cellAt(row: number, col: number): Cell {
    if (!this.inBounds(row, col)) {
      throw new OutOfBoundsError(row, col, this.rows, this.cols);
    }
    return this.grid[row][col];
  }

  neighbours(row: number, col: number): Pos[] {
    if (!this.inBounds(row, col)) {
      throw new OutOfBoundsError(row, col, this.rows, this.cols);
    }
    return neighbours(row, col, this.rows, this.cols);
  }

  adjacentMineCount(row: number, col: number): number {
    let n = 0;
    for (const p of this.neighbours(row, col)) {
      if (this.grid[p.row][p.col].isMine) n++;
    }
    return n;
  }

  adjacentFlagCount(row: number, col: number): number {
    let n = 0;
    for (const p of this.neighbours(row, col)) {
      if (this.grid[p.row][p.col].isFlagged) n++;
    }
    return n;
  }

  isActive(): boolean {
    return this.active;
  }

  setActive(active: boolean): void {
    this.active = active;
  }

  remainingSafeTiles(): number {
    return this.remaining;
  }

  // Call once per cell that becomes revealed and is not a mine
  decrementRemaining(): number {
    if (this.remaining === 0) {
      throw new InvalidStateError("every safe tile is already revealed");
    }
    return --this.remaining;
  }

  mineLocations(): Pos[] {
    return this.mines.map((m) => ({ ...m }));
  }
}
