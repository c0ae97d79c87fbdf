import {
  Annotation,
  Cell,
  CellView,
  GameConfig,
  GameStatus,
  Pos,
  RevealResult,
  RevealedCell,
  DEFAULT_CONFIG,
} from "./types";
import { Board } from "./board";
import { Rng, createRng } from "./rng";

export class Game {
  readonly config: GameConfig;
  readonly board: Board;
  explodedPos: Pos | null = null;

  /**
   * Without an explicit board, mines are placed from `config.seed`
   * (or `rng` when given).
   */
  constructor(config: Partial<GameConfig> = {}, source?: Rng | Board) {
    if (source instanceof Board) {
      this.board = source;
      this.config = {
        rows: source.rows,
        cols: source.cols,
        mines: source.mineCount,
        seed: config.seed ?? DEFAULT_CONFIG.seed,
      };
      return;
    }
    this.config = { ...DEFAULT_CONFIG, ...config };
    const { rows, cols, mines, seed } = this.config;
    this.board = new Board(rows, cols, mines, source ?? createRng(seed));
  }

  get rows(): number {
    return this.board.rows;
  }

  get cols(): number {
    return this.board.cols;
  }

  get status(): GameStatus {
    if (this.board.isActive()) return GameStatus.Active;
    return this.board.remainingSafeTiles() === 0 ? GameStatus.Won : GameStatus.Lost;
  }

  get flagsRemaining(): number {
    let flags = 0;
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.board.cellAt(r, c).isFlagged) flags++;
      }
    }
    return this.board.mineCount - flags;
  }

  mineLocations(): Pos[] {
    return this.board.mineLocations();
  }

  reveal(row: number, col: number): RevealResult {
    const cell = this.board.cellAt(row, col);
    if (!this.board.isActive() || cell.isRevealed || cell.isFlagged || cell.isQuestioned) {
      return this.unchanged();
    }

    cell.isRevealed = true;

    if (cell.isMine) {
      this.explodedPos = { row, col };
      this.board.setActive(false);
      const newlyRevealed = this.mineLocations().map((m) => ({
        ...m,
        adjacentMines: this.board.adjacentMineCount(m.row, m.col),
        isMine: true,
      }));
      return { stateChanged: true, newlyRevealed, status: this.status };
    }

    const newlyRevealed: RevealedCell[] = [];
    const first = this.markSafe({ row, col }, newlyRevealed);

    // Flood fill over zero cells; the revealed flag doubles as the visited set
    const stack: Pos[] = [];
    if (first.adjacentMines === 0) stack.push({ row, col });
    while (stack.length > 0) {
      const p = stack.pop();
      if (!p) break;
      for (const n of this.board.neighbours(p.row, p.col)) {
        const nc = this.board.cellAt(n.row, n.col);
        if (nc.isRevealed || nc.isFlagged || nc.isQuestioned || nc.isMine) continue;
        nc.isRevealed = true;
        const revealed = this.markSafe(n, newlyRevealed);
        if (revealed.adjacentMines === 0) stack.push(n);
      }
    }

    if (this.board.remainingSafeTiles() === 0) {
      this.board.setActive(false);
    }
    return { stateChanged: true, newlyRevealed, status: this.status };
  }

  /** Right-click: None → Flagged → Questioned → None */
  toggleFlag(row: number, col: number): Annotation {
    const cell = this.board.cellAt(row, col);
    if (this.board.isActive() && !cell.isRevealed) {
      cycleAnnotation(cell);
    }
    return annotationOf(cell.isFlagged, cell.isQuestioned);
  }

  // Reveal unannotated neighbours once the flags around a number match it
  chordReveal(row: number, col: number): RevealResult {
    const cell = this.board.cellAt(row, col);
    if (!this.board.isActive() || !cell.isRevealed || cell.isMine) return this.unchanged();

    const hint = this.board.adjacentMineCount(row, col);
    if (hint === 0 || this.board.adjacentFlagCount(row, col) !== hint) return this.unchanged();

    const newlyRevealed: RevealedCell[] = [];
    for (const n of this.board.neighbours(row, col)) {
      if (!this.board.isActive()) break;
      const result = this.reveal(n.row, n.col);
      newlyRevealed.push(...result.newlyRevealed);
    }
    return { stateChanged: newlyRevealed.length > 0, newlyRevealed, status: this.status };
  }

  cellView(row: number, col: number): CellView {
    const c = this.board.cellAt(row, col);
    const lost = this.status === GameStatus.Lost;
    const gameOver = this.status !== GameStatus.Active;
    const visible = c.isRevealed || gameOver;
    const exploded =
      lost &&
      this.explodedPos !== null &&
      this.explodedPos.row === row &&
      this.explodedPos.col === col;

    return {
      row,
      col,
      revealed: c.isRevealed,
      annotation: annotationOf(c.isFlagged, c.isQuestioned),
      adjacentMines: visible ? this.board.adjacentMineCount(row, col) : null,
      isMine: visible ? c.isMine : null,
      exploded,
      wrongFlag: lost && c.isFlagged && !c.isMine,
    };
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        row.push(this.cellView(r, c));
      }
      out.push(row);
    }
    return out;
  }

  private markSafe(pos: Pos, out: RevealedCell[]): RevealedCell {
    this.board.decrementRemaining();
    const revealed = {
      row: pos.row,
      col: pos.col,
      adjacentMines: this.board.adjacentMineCount(pos.row, pos.col),
      isMine: false,
    };
    out.push(revealed);
    return revealed;
  }

  private unchanged(): RevealResult {
    return { stateChanged: false, newlyRevealed: [], status: this.status };
  }
}

function cycleAnnotation(cell: Cell): void {
  if (cell.isFlagged) {
    cell.isFlagged = false;
    cell.isQuestioned = true;
  } else if (cell.isQuestioned) {
    cell.isQuestioned = false;
  } else {
    cell.isFlagged = true;
  }
}

function annotationOf(flagged: boolean, questioned: boolean): Annotation {
  if (flagged) return Annotation.Flagged;
  if (questioned) return Annotation.Questioned;
  return Annotation.None;
}
