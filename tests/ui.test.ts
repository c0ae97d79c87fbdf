// ─── Terminal UI tests ──────────────────────────────────────────────────────

import { EventEmitter } from "node:events";
import { describe, it, expect, vi } from "vitest";
import { Annotation, Board, Game, GameStatus } from "../src/engine/index";
import type { CellView } from "../src/engine/index";
import { cellGlyph, gameOverMessage, renderBoard, renderMenu, statusLine } from "../src/ui/renderer";
import { smileyFor } from "../src/ui/smiley";
import { InputHandler, KeyPress, boardActionFor, menuActionFor } from "../src/ui/input";
import { App } from "../src/ui/app";

function view(overrides: Partial<CellView>): CellView {
  return {
    row: 0,
    col: 0,
    revealed: false,
    annotation: Annotation.None,
    adjacentMines: null,
    isMine: null,
    exploded: false,
    wrongFlag: false,
    ...overrides,
  };
}

function key(name: string, extra: Partial<KeyPress> = {}): KeyPress {
  return { name, sequence: name.length === 1 ? name : undefined, ...extra };
}

function makeApp(seed = 1) {
  const chunks: string[] = [];
  const onExit = vi.fn();
  const app = new App({
    output: { write: (chunk: string) => chunks.push(chunk) },
    color: false,
    clearScreen: false,
    seed,
    onExit,
  });
  const press = (...names: string[]) => names.forEach((n) => app.handleKey(key(n)));
  return { app, chunks, onExit, press };
}

// ─── Renderer ───────────────────────────────────────────────────────────────

describe("cellGlyph", () => {
  it.each([
    [view({}), "#"],
    [view({ annotation: Annotation.Flagged }), "F"],
    [view({ annotation: Annotation.Questioned }), "?"],
    [view({ revealed: true, adjacentMines: 0, isMine: false }), "."],
    [view({ revealed: true, adjacentMines: 3, isMine: false }), "3"],
    [view({ isMine: true, adjacentMines: 1 }), "*"],
    [view({ revealed: true, isMine: true, exploded: true }), "X"],
    [view({ annotation: Annotation.Flagged, wrongFlag: true, isMine: false }), "x"],
    [view({ annotation: Annotation.Flagged, isMine: true }), "F"],
    [view({ annotation: Annotation.Questioned, isMine: true }), "*"],
  ])("%o → %s", (v, glyph) => {
    expect(cellGlyph(v)).toBe(glyph);
  });
});

describe("renderBoard", () => {
  it("brackets the cursor cell", () => {
    const game = new Game({}, Board.fromMines(1, 2, [{ row: 0, col: 1 }]));
    expect(renderBoard(game, { color: false, cursor: { row: 0, col: 0 } })).toEqual(["[#] # "]);
  });

  it("shows counts and mines after the game ends", () => {
    const game = new Game({}, Board.fromMines(1, 2, [{ row: 0, col: 1 }]));
    game.reveal(0, 0);
    expect(renderBoard(game, { color: false, cursor: null })).toEqual([" 1  * "]);
  });

  it("colours cells and inverts the cursor", () => {
    const game = new Game({}, Board.fromMines(1, 2, [{ row: 0, col: 1 }]));
    expect(renderBoard(game, { color: true, cursor: { row: 0, col: 0 } })).toEqual([
      "\x1b[7m\x1b[2m[#]\x1b[0m\x1b[2m # \x1b[0m",
    ]);
  });

  it("renders one line per row", () => {
    const game = new Game({}, Board.fromMines(3, 2, [{ row: 2, col: 1 }]));
    game.reveal(0, 0);
    expect(renderBoard(game, { color: false, cursor: null })).toEqual([
      " .  . ",
      " 1  1 ",
      " #  # ",
    ]);
  });
});

describe("status text", () => {
  it("summarises the board", () => {
    const game = new Game({}, Board.fromMines(1, 2, [{ row: 0, col: 1 }]));
    expect(statusLine(game)).toBe("1 x 2 | 1 mines   Flags left: 1   :)");
  });

  it("picks a face per status", () => {
    expect(smileyFor(GameStatus.Active)).toBe(":)");
    expect(smileyFor(GameStatus.Won)).toBe("8)");
    expect(smileyFor(GameStatus.Lost)).toBe("X(");
  });

  it("only has a game-over message when the game is over", () => {
    expect(gameOverMessage(GameStatus.Active)).toBeNull();
    expect(gameOverMessage(GameStatus.Won)).toMatch(/^You cleared the field!/);
  });

  it("marks the selected menu entry", () => {
    expect(renderMenu("Title", ["One", "Two"], 1, false)).toEqual(["Title", "", "   One", " > Two"]);
  });
});

// ─── Input ──────────────────────────────────────────────────────────────────

describe("key mapping", () => {
  it("maps board keys", () => {
    expect(boardActionFor(key("left"))).toEqual({ type: "move", dr: 0, dc: -1 });
    expect(boardActionFor(key("s"))).toEqual({ type: "move", dr: 1, dc: 0 });
    expect(boardActionFor(key("space"))).toEqual({ type: "reveal" });
    expect(boardActionFor(key("f"))).toEqual({ type: "flag" });
    expect(boardActionFor(key("c", { ctrl: true }))).toEqual({ type: "quit" });
    expect(boardActionFor(key("z"))).toBeNull();
  });

  it("maps menu keys", () => {
    expect(menuActionFor(key("2"))).toEqual({ type: "pick", index: 1 });
    expect(menuActionFor(key("return"))).toEqual({ type: "confirm" });
    expect(menuActionFor(key("escape"))).toEqual({ type: "back" });
    expect(menuActionFor(key("x"))).toBeNull();
  });
});

describe("InputHandler", () => {
  it("forwards keypress events until detached", () => {
    const source = new EventEmitter();
    const onKey = vi.fn();
    const handler = new InputHandler(source, onKey);

    source.emit("keypress", "f", { name: "f", sequence: "f" });
    source.emit("keypress", "1", undefined);
    handler.detach();
    source.emit("keypress", "g", { name: "g", sequence: "g" });

    expect(onKey).toHaveBeenCalledTimes(2);
    expect(onKey).toHaveBeenNthCalledWith(1, { name: "f", sequence: "f" });
    expect(onKey).toHaveBeenNthCalledWith(2, { name: "1", sequence: "1" });
  });
});

// ─── App screens ────────────────────────────────────────────────────────────

describe("App - start screen", () => {
  it("lists presets, custom and quit", () => {
    const { app, chunks } = makeApp();
    app.start();
    expect(app.frame()).toEqual([
      "Minesweeper",
      "",
      " > Easy (9x9)",
      "   Medium (16x16)",
      "   Hard (16x30)",
      "   Custom",
      "   Quit",
      "",
      "Arrows to choose, Enter to start, 1-5 as shortcuts",
    ]);
    expect(chunks).toEqual([`${app.frame().join("\n")}\n`]);
  });

  it("starts the chosen preset", () => {
    const { app, press } = makeApp();
    app.start();
    press("down", "return");
    expect(app.currentScreen).toBe("game");
    expect(app.currentGame?.board.mineCount).toBe(40);
    expect(app.currentGame?.rows).toBe(16);
  });

  it("starts a preset from its number", () => {
    const { app, press } = makeApp();
    app.start();
    press("3");
    expect(app.currentGame?.cols).toBe(30);
  });

  it("quits", () => {
    const { app, chunks, onExit, press } = makeApp();
    app.start();
    press("q");
    expect(onExit).toHaveBeenCalledTimes(1);
    press("1");
    expect(chunks).toHaveLength(1);
    expect(app.currentGame).toBeNull();
  });
});

describe("App - custom size", () => {
  it("shows placeholders", () => {
    const { app, press } = makeApp();
    app.start();
    press("4");
    expect(app.currentScreen).toBe("custom");
    expect(app.frame().slice(0, 5)).toEqual([
      "Custom game",
      "",
      " > Rows: (rows)",
      "   Cols: (cols)",
      "   Mines: (mines)",
    ]);
  });

  it("reports an impossible board, then starts once corrected", () => {
    const { app, press } = makeApp();
    app.start();
    press("4", "2", "tab", "2", "return", "4", "return");
    expect(app.currentScreen).toBe("custom");
    expect(app.frame()).toEqual([
      "Custom game",
      "",
      "   Rows: 2",
      "   Cols: 2",
      " > Mines: 4",
      "",
      "Invalid input",
      "",
      "Tab/Enter next field, Enter on Mines to start, Esc to go back",
    ]);

    press("backspace", "3", "return");
    expect(app.currentScreen).toBe("game");
    expect(app.currentGame?.board.mineCount).toBe(3);
  });

  it("asks for numbers when the text is not one", () => {
    const { app, press } = makeApp();
    app.start();
    press("4", "x", "return", "5", "return", "3", "return");
    expect(app.frame()).toContain("Please enter valid numbers for size and mines.");
  });

  it("goes back on escape", () => {
    const { app, press } = makeApp();
    app.start();
    press("4", "escape");
    expect(app.currentScreen).toBe("start");
  });
});

describe("App - board", () => {
  it("keeps the cursor on the board", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    press("left", "up");
    expect(app.cursorPos).toEqual({ row: 0, col: 0 });
    press("right", "right", "right", "right", "right", "down");
    expect(app.cursorPos).toEqual({ row: 1, col: 2 });
  });

  it("flags the cell under the cursor", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    press("f");
    expect(app.currentGame?.board.cellAt(0, 0).isFlagged).toBe(true);
    expect(app.frame()[2]).toBe("[F] #  # ");
  });

  it("ends the game and restarts on r", () => {
    const { app, press } = makeApp();
    app.start({ rows: 1, cols: 2, mines: 1 });
    const first = app.currentGame;
    press("space");
    const status = first?.status ?? GameStatus.Active;
    expect(status).not.toBe(GameStatus.Active);
    const frame = app.frame();
    expect(frame[frame.length - 1]).toBe(gameOverMessage(status));

    press("r");
    expect(app.currentGame).not.toBe(first);
    expect(app.currentGame?.status).toBe(GameStatus.Active);
  });

  it("ignores restart while playing", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    const first = app.currentGame;
    press("r");
    expect(app.currentGame).toBe(first);
  });

  it("quits on ctrl+c", () => {
    const { app, onExit } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    app.handleKey(key("c", { ctrl: true }));
    expect(onExit).toHaveBeenCalledTimes(1);
  });
});

describe("App - menu", () => {
  it("shows the board info and entries", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    press("m");
    expect(app.currentScreen).toBe("menu");
    expect(app.frame()).toEqual([
      "3 x 3 | 1 mines",
      "",
      " > Restart",
      "   Resume",
      "   New Game",
      "   Quit",
    ]);
  });

  it("resumes the same game", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    press("f", "m", "down", "return");
    expect(app.currentScreen).toBe("game");
    expect(app.currentGame?.board.cellAt(0, 0).isFlagged).toBe(true);
  });

  it("restarts with the same size", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    const first = app.currentGame;
    press("f", "m", "return");
    expect(app.currentGame).not.toBe(first);
    expect(app.currentGame?.board.cellAt(0, 0).isFlagged).toBe(false);
    expect(app.currentGame?.board.mineCount).toBe(1);
  });

  it("returns to the start screen", () => {
    const { app, press } = makeApp();
    app.start({ rows: 3, cols: 3, mines: 1 });
    press("m", "3");
    expect(app.currentScreen).toBe("start");
    expect(app.currentGame).toBeNull();
  });
});
