import { Game } from "../engine/game";
import { GameConfig, GameStatus, PRESETS, Pos } from "../engine/types";
import { DIFFICULTIES, parseCustomConfig, presetLabel } from "../config";
import { KeyPress, boardActionFor, isInterrupt, menuActionFor } from "./input";
import {
  boardInfo,
  gameOverMessage,
  renderBoard,
  renderMenu,
  statusLine,
} from "./renderer";

export const TITLE = "Minesweeper";

export type Screen = "start" | "custom" | "game" | "menu";

type BoardSize = Omit<GameConfig, "seed">;

const START_ITEMS = [...DIFFICULTIES.map(presetLabel), "Custom", "Quit"];
const CUSTOM_INDEX = DIFFICULTIES.length;
const QUIT_INDEX = DIFFICULTIES.length + 1;

const MENU_ITEMS = ["Restart", "Resume", "New Game", "Quit"];
const CUSTOM_FIELDS = ["Rows", "Cols", "Mines"];

const CLEAR = "\x1b[2J\x1b[H";
const BOARD_HELP = "Arrows/WASD move  Space reveal  f flag  c chord  m menu";

export interface Output {
  write(chunk: string): unknown;
}

export interface AppOptions {
  output: Output;
  color: boolean;
  clearScreen: boolean;
  // Fixed seed for the first game; later games count up from it
  seed: number | null;
  onExit: () => void;
}

export class App {
  private screen: Screen = "start";
  private game: Game | null = null;
  private cursor: Pos = { row: 0, col: 0 };
  private startSelection = 0;
  private menuSelection = 0;
  private customValues = ["", "", ""];
  private customField = 0;
  private customError: string | null = null;
  private gamesStarted = 0;
  private readonly baseSeed: number;
  private exited = false;

  constructor(private options: AppOptions) {
    this.baseSeed = options.seed ?? Date.now();
  }

  get currentScreen(): Screen {
    return this.screen;
  }

  get currentGame(): Game | null {
    return this.game;
  }

  get cursorPos(): Pos {
    return { ...this.cursor };
  }

  start(config: BoardSize | null = null): void {
    if (config) this.newGame(config);
    this.render();
  }

  private newGame(config: BoardSize): void {
    this.game = new Game({ ...config, seed: this.baseSeed + this.gamesStarted++ });
    this.cursor = { row: 0, col: 0 };
    this.screen = "game";
  }

  handleKey(key: KeyPress): void {
    if (this.exited) return;
    switch (this.screen) {
      case "start": this.onStartKey(key); break;
      case "custom": this.onCustomKey(key); break;
      case "game": this.onBoardKey(key); break;
      case "menu": this.onMenuKey(key); break;
    }
    if (!this.exited) this.render();
  }

  frame(): string[] {
    const { color } = this.options;
    switch (this.screen) {
      case "start":
        return [
          ...renderMenu(TITLE, START_ITEMS, this.startSelection, color),
          "",
          `Arrows to choose, Enter to start, 1-${START_ITEMS.length} as shortcuts`,
        ];
      case "custom":
        return this.customFrame();
      case "game":
        return this.boardFrame();
      case "menu": {
        const game = this.requireGame();
        return renderMenu(
          boardInfo(game.rows, game.cols, game.board.mineCount),
          MENU_ITEMS,
          this.menuSelection,
          color,
        );
      }
    }
  }

  private render(): void {
    const prefix = this.options.clearScreen ? CLEAR : "";
    this.options.output.write(`${prefix}${this.frame().join("\n")}\n`);
  }

  private exit(): void {
    this.exited = true;
    this.options.onExit();
  }

  private requireGame(): Game {
    if (!this.game) throw new Error(`no game in progress on the ${this.screen} screen`);
    return this.game;
  }

  // ─── Start screen ──────────────────────────────────────────────────────────

  private onStartKey(key: KeyPress): void {
    const action = menuActionFor(key);
    if (!action) return;
    switch (action.type) {
      case "up":
        this.startSelection = (this.startSelection - 1 + START_ITEMS.length) % START_ITEMS.length;
        break;
      case "down":
        this.startSelection = (this.startSelection + 1) % START_ITEMS.length;
        break;
      case "pick":
        if (action.index < START_ITEMS.length) {
          this.startSelection = action.index;
          this.chooseStartItem(action.index);
        }
        break;
      case "confirm":
        this.chooseStartItem(this.startSelection);
        break;
      case "back":
        break;
      case "quit":
        this.exit();
        break;
    }
  }

  private chooseStartItem(index: number): void {
    if (index < DIFFICULTIES.length) {
      this.newGame(PRESETS[DIFFICULTIES[index]]);
    } else if (index === CUSTOM_INDEX) {
      this.customValues = ["", "", ""];
      this.customField = 0;
      this.customError = null;
      this.screen = "custom";
    } else if (index === QUIT_INDEX) {
      this.exit();
    }
  }

  // ─── Custom size form ──────────────────────────────────────────────────────

  private onCustomKey(key: KeyPress): void {
    if (isInterrupt(key)) {
      this.exit();
      return;
    }
    switch (key.name) {
      case "escape":
        this.screen = "start";
        return;
      case "backspace":
        this.customValues[this.customField] = this.customValues[this.customField].slice(0, -1);
        return;
      case "up":
        this.customField = Math.max(0, this.customField - 1);
        return;
      case "tab":
      case "down":
        this.customField = Math.min(CUSTOM_FIELDS.length - 1, this.customField + 1);
        return;
      case "return":
      case "enter":
        if (this.customField < CUSTOM_FIELDS.length - 1) {
          this.customField++;
        } else {
          this.submitCustom();
        }
        return;
    }
    const ch = key.sequence;
    if (ch !== undefined && ch.length === 1 && ch >= " " && ch <= "~" && !key.ctrl && !key.meta) {
      this.customValues[this.customField] += ch;
      this.customError = null;
    }
  }

  private submitCustom(): void {
    const [rows, cols, mines] = this.customValues;
    const result = parseCustomConfig(rows, cols, mines);
    if (result.ok) {
      this.newGame(result.config);
    } else {
      this.customError = result.error;
    }
  }

  private customFrame(): string[] {
    const lines = ["Custom game", ""];
    CUSTOM_FIELDS.forEach((label, i) => {
      const value = this.customValues[i];
      const marker = i === this.customField ? ">" : " ";
      lines.push(` ${marker} ${label}: ${value === "" ? `(${label.toLowerCase()})` : value}`);
    });
    lines.push("");
    if (this.customError) lines.push(this.customError, "");
    lines.push("Tab/Enter next field, Enter on Mines to start, Esc to go back");
    return lines;
  }

  // ─── Board ─────────────────────────────────────────────────────────────────

  private onBoardKey(key: KeyPress): void {
    const game = this.requireGame();
    const action = boardActionFor(key);
    if (!action) return;
    const over = game.status !== GameStatus.Active;
    const { row, col } = this.cursor;

    switch (action.type) {
      case "move":
        this.cursor = {
          row: Math.max(0, Math.min(game.rows - 1, row + action.dr)),
          col: Math.max(0, Math.min(game.cols - 1, col + action.dc)),
        };
        break;
      case "reveal":
        // Space on an already revealed number chords, like a middle click
        if (game.board.cellAt(row, col).isRevealed) {
          game.chordReveal(row, col);
        } else {
          game.reveal(row, col);
        }
        break;
      case "flag":
        game.toggleFlag(row, col);
        break;
      case "chord":
        game.chordReveal(row, col);
        break;
      case "menu":
        this.menuSelection = 0;
        this.screen = "menu";
        break;
      case "restart":
        if (over) this.restart();
        break;
      case "quit":
        if (over || isInterrupt(key)) this.exit();
        break;
    }
  }

  private restart(): void {
    const game = this.requireGame();
    this.newGame({ rows: game.rows, cols: game.cols, mines: game.board.mineCount });
  }

  private boardFrame(): string[] {
    const game = this.requireGame();
    const over = game.status !== GameStatus.Active;
    return [
      statusLine(game),
      "",
      ...renderBoard(game, { color: this.options.color, cursor: over ? null : this.cursor }),
      "",
      gameOverMessage(game.status) ?? BOARD_HELP,
    ];
  }

  // ─── Pause menu ────────────────────────────────────────────────────────────

  private onMenuKey(key: KeyPress): void {
    const action = menuActionFor(key);
    if (!action) return;
    switch (action.type) {
      case "up":
        this.menuSelection = (this.menuSelection - 1 + MENU_ITEMS.length) % MENU_ITEMS.length;
        break;
      case "down":
        this.menuSelection = (this.menuSelection + 1) % MENU_ITEMS.length;
        break;
      case "pick":
        if (action.index < MENU_ITEMS.length) this.chooseMenuItem(action.index);
        break;
      case "confirm":
        this.chooseMenuItem(this.menuSelection);
        break;
      case "back":
        this.screen = "game";
        break;
      case "quit":
        this.exit();
        break;
    }
  }

  private chooseMenuItem(index: number): void {
    switch (MENU_ITEMS[index]) {
      case "Restart":
        this.restart();
        break;
      case "Resume":
        this.screen = "game";
        break;
      case "New Game":
        this.game = null;
        this.startSelection = 0;
        this.screen = "start";
        break;
      case "Quit":
        this.exit();
        break;
    }
  }
}
