import { Annotation, CellView, GameStatus, Pos } from "../engine/types";
import { Game } from "../engine/game";
import { smileyFor } from "./smiley";

export const GLYPH_HIDDEN = "#";
export const GLYPH_FLAG = "F";
export const GLYPH_QUESTION = "?";
export const GLYPH_MINE = "*";
export const GLYPH_EXPLODED = "X";
export const GLYPH_WRONG_FLAG = "x";
export const GLYPH_EMPTY = ".";

const RESET = "\x1b[0m";
const INVERSE = "\x1b[7m";

// Classic palette, indexed by adjacent mine count
const NUMBER_COLORS = [
  "",
  "\x1b[94m", // 1 - blue
  "\x1b[32m", // 2 - green
  "\x1b[91m", // 3 - red
  "\x1b[34m", // 4 - dark blue
  "\x1b[31m", // 5 - dark red
  "\x1b[36m", // 6 - cyan
  "\x1b[97m", // 7 - white
  "\x1b[90m", // 8 - gray
];

const GLYPH_COLORS: Record<string, string> = {
  [GLYPH_HIDDEN]: "\x1b[2m",
  [GLYPH_FLAG]: "\x1b[1;93m",
  [GLYPH_QUESTION]: "\x1b[1;95m",
  [GLYPH_MINE]: "\x1b[1;91m",
  [GLYPH_EXPLODED]: "\x1b[1;41;97m",
  [GLYPH_WRONG_FLAG]: "\x1b[1;31m",
  [GLYPH_EMPTY]: "\x1b[2m",
};

export interface BoardRenderOptions {
  color: boolean;
  cursor: Pos | null;
}

export function cellGlyph(view: CellView): string {
  if (view.exploded) return GLYPH_EXPLODED;
  if (view.annotation === Annotation.Flagged) {
    return view.wrongFlag ? GLYPH_WRONG_FLAG : GLYPH_FLAG;
  }
  if (view.isMine) return GLYPH_MINE;
  if (view.revealed) {
    return view.adjacentMines ? String(view.adjacentMines) : GLYPH_EMPTY;
  }
  if (view.annotation === Annotation.Questioned) return GLYPH_QUESTION;
  return GLYPH_HIDDEN;
}

function colorFor(glyph: string): string {
  const n = Number(glyph);
  if (Number.isInteger(n) && n > 0) return NUMBER_COLORS[n];
  return GLYPH_COLORS[glyph] ?? "";
}

/** One line per board row; every cell is three columns wide, the cursor cell bracketed. */
export function renderBoard(game: Game, options: BoardRenderOptions): string[] {
  const lines: string[] = [];
  for (const row of game.visibleCells()) {
    let line = "";
    for (const view of row) {
      const glyph = cellGlyph(view);
      const isCursor =
        options.cursor !== null &&
        options.cursor.row === view.row &&
        options.cursor.col === view.col;
      const text = isCursor ? `[${glyph}]` : ` ${glyph} `;
      if (!options.color) {
        line += text;
      } else if (isCursor) {
        line += `${INVERSE}${colorFor(glyph)}${text}${RESET}`;
      } else {
        line += `${colorFor(glyph)}${text}${RESET}`;
      }
    }
    lines.push(line);
  }
  return lines;
}

export function boardInfo(rows: number, cols: number, mines: number): string {
  return `${rows} x ${cols} | ${mines} mines`;
}

export function statusLine(game: Game): string {
  const { rows, cols } = game;
  return `${boardInfo(rows, cols, game.board.mineCount)}   Flags left: ${game.flagsRemaining}   ${smileyFor(game.status)}`;
}

export function gameOverMessage(status: GameStatus): string | null {
  switch (status) {
    case GameStatus.Won: return "You cleared the field! Press r to play again, m for the menu.";
    case GameStatus.Lost: return "Boom. Press r to try again, m for the menu.";
    case GameStatus.Active: return null;
  }
}

export function renderMenu(title: string, items: string[], selected: number, color: boolean): string[] {
  const lines = [title, ""];
  items.forEach((item, i) => {
    if (i !== selected) {
      lines.push(`   ${item}`);
    } else {
      lines.push(color ? `${INVERSE} > ${item} ${RESET}` : ` > ${item}`);
    }
  });
  return lines;
}
