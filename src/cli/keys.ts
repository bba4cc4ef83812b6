import type { KeyCode } from "../lib/commandTree.js";

export type MouseButton = "left" | "right" | "wheelUp" | "wheelDown";

export type InputEvent =
  | { kind: "key"; key: KeyCode }
  | { kind: "mouse"; button: MouseButton; row: number; column: number };

// SGR extended mouse report: ESC [ < button ; column ; row (M press, m release)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI = /^\x1b\[[0-9;?]*[ -/]*[@-~]/;
const SS3 = /^\x1bO[A-Za-z]/;

const ESCAPE_SEQUENCES = new Map<string, KeyCode>([
  ["\x1b[A", "Up"],
  ["\x1b[B", "Down"],
  ["\x1b[C", "Right"],
  ["\x1b[D", "Left"],
  ["\x1bOA", "Up"],
  ["\x1bOB", "Down"],
  ["\x1bOC", "Right"],
  ["\x1bOD", "Left"],
  ["\x1b[H", "Home"],
  ["\x1b[F", "End"],
  ["\x1b[5~", "PageUp"],
  ["\x1b[6~", "PageDown"],
  ["\x1b[Z", "BackTab"],
]);

const NAMED_CHARACTERS = new Map<string, KeyCode>([
  ["\r", "Enter"],
  ["\n", "Enter"],
  ["\t", "Tab"],
  ["\x1b", "Esc"],
  ["\x7f", "Backspace"],
]);

function mouseButton(code: number, pressed: boolean): MouseButton | undefined {
  if (code & 64) {
    return code & 1 ? "wheelDown" : "wheelUp";
  }
  // motion and releases are not used
  if (!pressed || code & 32) return undefined;
  switch (code & 3) {
    case 0:
      return "left";
    case 2:
      return "right";
    default:
      return undefined;
  }
}

function characterKey(char: string): KeyCode {
  const named = NAMED_CHARACTERS.get(char);
  if (named) return named;

  const code = char.charCodeAt(0);
  if (code >= 1 && code <= 26) {
    return `Ctrl-${String.fromCharCode(code + 96)}`;
  }
  return char;
}

/**
 * Split a chunk of raw terminal input into key and mouse events. Escape
 * sequences that name no key are dropped.
 */
export function parseInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let rest = data;

  while (rest.length > 0) {
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse) {
      const button = mouseButton(Number(mouse[1]), mouse[4] === "M");
      if (button) {
        events.push({
          kind: "mouse",
          button,
          column: Number(mouse[2]) - 1,
          row: Number(mouse[3]) - 1,
        });
      }
      rest = rest.slice(mouse[0].length);
      continue;
    }

    const sequence = CSI.exec(rest) ?? SS3.exec(rest);
    if (sequence) {
      const key = ESCAPE_SEQUENCES.get(sequence[0]);
      if (key) events.push({ kind: "key", key });
      rest = rest.slice(sequence[0].length);
      continue;
    }

    const char = String.fromCodePoint(rest.codePointAt(0) ?? 0);
    events.push({ kind: "key", key: characterKey(char) });
    rest = rest.slice(char.length);
  }

  return events;
}
