import { parseArgs } from "node:util";
import { Difficulty, GameConfig, PRESETS } from "./engine/types";
import { validateDimensions } from "./engine/board";
import { MinesweeperError } from "./engine/errors";

export const DIFFICULTIES: Difficulty[] = ["easy", "medium", "hard"];

export const PRESET_LABELS: Record<Difficulty, string> = {
  easy: "Easy",
  medium: "Medium",
  hard: "Hard",
};

export const INVALID_NUMBER_MESSAGE = "Please enter valid numbers for size and mines.";
export const INVALID_INPUT_MESSAGE = "Invalid input";

// Largest board the terminal renderer lays out; each cell is three columns wide
export const MAX_ROWS = 99;
export const MAX_COLS = 99;

export type CustomConfigResult =
  | { ok: true; config: Omit<GameConfig, "seed"> }
  | { ok: false; error: string };

export function presetLabel(difficulty: Difficulty): string {
  const { rows, cols } = PRESETS[difficulty];
  return `${PRESET_LABELS[difficulty]} (${rows}x${cols})`;
}

function parseIntStrict(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}

// Raw text from the custom-size form
export function parseCustomConfig(rows: string, cols: string, mines: string): CustomConfigResult {
  const r = parseIntStrict(rows);
  const c = parseIntStrict(cols);
  const m = parseIntStrict(mines);
  if (r === null || c === null || m === null) {
    return { ok: false, error: INVALID_NUMBER_MESSAGE };
  }
  if (r > MAX_ROWS || c > MAX_COLS) return { ok: false, error: INVALID_INPUT_MESSAGE };
  try {
    validateDimensions(r, c, m);
  } catch (err) {
    if (err instanceof MinesweeperError) return { ok: false, error: INVALID_INPUT_MESSAGE };
    throw err;
  }
  return { ok: true, config: { rows: r, cols: c, mines: m } };
}

export function hashString(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(31, h) + s.charCodeAt(i)) | 0;
  }
  return h;
}

export function parseSeedInput(seedStr: string): number {
  const numeric = Number(seedStr);
  if (seedStr.trim() !== "" && Number.isInteger(numeric)) return numeric;
  return hashString(seedStr);
}

export interface CliOptions {
  // Set when the command line fully determines the board; skips the start screen
  config: Omit<GameConfig, "seed"> | null;
  seed: number | null;
  color: boolean;
  help: boolean;
}

export class CliUsageError extends MinesweeperError {
  constructor(message: string) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage: minesweeper [options]",
  "",
  "  --preset <easy|medium|hard>  start straight into a preset board",
  "  --rows <n> --cols <n> --mines <n>  start straight into a custom board",
  "  --seed <value>               seed for mine placement",
  "  --no-color                   plain glyphs without ANSI colours",
  "  -h, --help                   show this message",
].join("\n");

function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        preset: { type: "string" },
        rows: { type: "string" },
        cols: { type: "string" },
        mines: { type: "string" },
        seed: { type: "string" },
        "no-color": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);

  const options: CliOptions = {
    config: null,
    seed: values.seed === undefined ? null : parseSeedInput(values.seed),
    color: !values["no-color"],
    help: values.help === true,
  };

  const custom = [values.rows, values.cols, values.mines];
  if (values.preset !== undefined) {
    if (custom.some((v) => v !== undefined)) {
      throw new CliUsageError("--preset cannot be combined with --rows/--cols/--mines");
    }
    if (!isDifficulty(values.preset)) {
      throw new CliUsageError(`unknown preset "${values.preset}" (expected ${DIFFICULTIES.join(", ")})`);
    }
    options.config = { ...PRESETS[values.preset] };
  } else if (custom.some((v) => v !== undefined)) {
    const [rows, cols, mines] = custom;
    if (rows === undefined || cols === undefined || mines === undefined) {
      throw new CliUsageError("--rows, --cols and --mines must be given together");
    }
    const parsed = parseCustomConfig(rows, cols, mines);
    if (!parsed.ok) throw new CliUsageError(parsed.error);
    options.config = parsed.config;
  }

  return options;
}
