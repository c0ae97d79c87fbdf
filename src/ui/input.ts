import type { EventEmitter } from "node:events";

// Shape of the events readline.emitKeypressEvents produces
export interface KeyPress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type BoardAction =
  | { type: "move"; dr: number; dc: number }
  | { type: "reveal" }
  | { type: "flag" }
  | { type: "chord" }
  | { type: "menu" }
  | { type: "restart" }
  | { type: "quit" };

export type MenuAction =
  | { type: "up" }
  | { type: "down" }
  | { type: "confirm" }
  | { type: "back" }
  | { type: "pick"; index: number }
  | { type: "quit" };

export function isInterrupt(key: KeyPress): boolean {
  return key.ctrl === true && key.name === "c";
}

export function boardActionFor(key: KeyPress): BoardAction | null {
  if (isInterrupt(key)) return { type: "quit" };
  switch (key.name) {
    case "up": case "w": case "k": return { type: "move", dr: -1, dc: 0 };
    case "down": case "s": case "j": return { type: "move", dr: 1, dc: 0 };
    case "left": case "a": case "h": return { type: "move", dr: 0, dc: -1 };
    case "right": case "d": case "l": return { type: "move", dr: 0, dc: 1 };
    case "space": case "return": case "enter": return { type: "reveal" };
    case "f": return { type: "flag" };
    case "c": return { type: "chord" };
    case "m": case "escape": return { type: "menu" };
    case "r": return { type: "restart" };
    case "q": return { type: "quit" };
    default: return null;
  }
}

export function menuActionFor(key: KeyPress): MenuAction | null {
  if (isInterrupt(key)) return { type: "quit" };
  const digit = key.sequence !== undefined && /^[1-9]$/.test(key.sequence) ? Number(key.sequence) : 0;
  if (digit > 0) return { type: "pick", index: digit - 1 };
  switch (key.name) {
    case "up": case "w": case "k": return { type: "up" };
    case "down": case "s": case "j": return { type: "down" };
    case "space": case "return": case "enter": return { type: "confirm" };
    case "escape": return { type: "back" };
    case "q": return { type: "quit" };
    default: return null;
  }
}

export class InputHandler {
  constructor(
    private source: EventEmitter,
    private onKey: (key: KeyPress) => void,
  ) {
    this.attach();
  }

  private attach(): void {
    this.source.on("keypress", this.onKeypress);
  }

  detach(): void {
    this.source.off("keypress", this.onKeypress);
  }

  private onKeypress = (chunk: string | undefined, key: KeyPress | undefined): void => {
    // Printable characters without a name (digits on some terminals) arrive as the chunk only
    this.onKey(key ?? { sequence: chunk, name: chunk });
  };
}
