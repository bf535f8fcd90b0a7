import { UnsupportedEventError } from "./errors";

export type SessionEvent =
  | { type: "ROTATE_UP" }
  | { type: "ROTATE_DOWN" }
  | { type: "ROTATE_LEFT" }
  | { type: "ROTATE_RIGHT" }
  | { type: "ZOOM_IN" }
  | { type: "ZOOM_OUT" }
  | { type: "NEXT_EXAMPLE" }
  | { type: "NEXT_MODEL" }
  | { type: "DUMP_FRAME" }
  | { type: "NO_OP" };

export type SessionEventType = SessionEvent["type"];

export type KeyMap = Record<string, SessionEventType>;

export const DEFAULT_KEYMAP: KeyMap = {
  f: "ROTATE_UP",
  d: "ROTATE_DOWN",
  s: "ROTATE_RIGHT",
  a: "ROTATE_LEFT",
  h: "ZOOM_OUT",
  g: "ZOOM_IN",
  " ": "NEXT_EXAMPLE",
  n: "NEXT_MODEL",
  x: "DUMP_FRAME",
  // Swallow the renderer's own reset key.
  r: "NO_OP",
};

export function eventFromKey(key: string, keymap: KeyMap = DEFAULT_KEYMAP): SessionEvent {
  const type = keymap[key.toLowerCase()];
  if (!type) {
    throw new UnsupportedEventError(`key ${JSON.stringify(key)}`);
  }
  return { type };
}

export function describeEvent(event: unknown): string {
  if (typeof event === "object" && event !== null && "type" in event) {
    return String(event.type);
  }
  return JSON.stringify(event) ?? String(event);
}
