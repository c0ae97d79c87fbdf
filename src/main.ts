import { emitKeypressEvents } from "node:readline";
import { App } from "./ui/app";
import { InputHandler } from "./ui/input";
import { CliOptions, CliUsageError, USAGE, parseCliArgs } from "./config";

const ALT_SCREEN_ON = "\x1b[?1049h\x1b[?25l";
const ALT_SCREEN_OFF = "\x1b[?25h\x1b[?1049l";

function readOptions(argv: string[]): CliOptions | null {
  try {
    return parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`minesweeper: ${err.message}\n\n${USAGE}`);
    process.exitCode = 1;
    return null;
  }
}

function main(argv: string[]): void {
  const options = readOptions(argv);
  if (!options) return;
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const { stdin, stdout } = process;
  const interactive = stdin.isTTY === true && stdout.isTTY === true;
  if (!interactive) {
    console.warn("stdin is not a terminal; keys are read as they arrive, without raw mode.");
  }

  emitKeypressEvents(stdin);
  if (stdin.isTTY) stdin.setRawMode(true);
  if (interactive) stdout.write(ALT_SCREEN_ON);

  let input: InputHandler | null = null;
  let closed = false;
  const shutdown = (): void => {
    if (closed) return;
    closed = true;
    input?.detach();
    if (stdin.isTTY) stdin.setRawMode(false);
    if (interactive) stdout.write(ALT_SCREEN_OFF);
    stdin.pause();
  };

  const app = new App({
    output: stdout,
    color: options.color && stdout.isTTY === true,
    clearScreen: interactive,
    seed: options.seed,
    onExit: shutdown,
  });

  const guarded = (run: () => void): void => {
    try {
      run();
    } catch (err) {
      shutdown();
      console.error("minesweeper: internal error", err);
      process.exitCode = 1;
    }
  };

  input = new InputHandler(stdin, (key) => guarded(() => app.handleKey(key)));
  stdin.on("end", shutdown);

  guarded(() => app.start(options.config));
}

main(process.argv.slice(2));
