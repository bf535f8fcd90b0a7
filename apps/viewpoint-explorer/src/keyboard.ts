import { on } from "node:events";
import { emitKeypressEvents } from "node:readline";

export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

interface KeyPress {
  key: string;
  ctrl: boolean;
}

function toKeyPress(args: unknown): KeyPress | null {
  if (!Array.isArray(args)) return null;
  const [str, key]: unknown[] = args;
  const info: object = typeof key === "object" && key !== null ? key : {};
  const name = "name" in info && typeof info.name === "string" ? info.name : undefined;
  const ctrl = "ctrl" in info && info.ctrl === true;
  const value = typeof str === "string" && str.length ? str : name;
  return value === undefined ? null : { key: ctrl && name ? name : value, ctrl };
}

/**
 * Yields one string per keypress on `input`. Ends on `q` (either case) or Ctrl-C, restoring
 * the terminal mode.
 */
export async function* keypresses(input: KeyInput = process.stdin): AsyncGenerator<string> {
  emitKeypressEvents(input);
  const raw = Boolean(input.isTTY && input.setRawMode);
  if (raw) input.setRawMode?.(true);
  input.resume();

  try {
    for await (const args of on(input, "keypress")) {
      const press = toKeyPress(args);
      if (!press) continue;
      const key = press.key.toLowerCase();
      if (key === "q" || (press.ctrl && key === "c")) return;
      yield press.key;
    }
  } finally {
    if (raw) input.setRawMode?.(false);
    input.pause();
  }
}
