import type { TerminalHandoff } from "../lib/logModel.js";

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const MOUSE_ON = "\x1b[?1000h\x1b[?1006h";
const MOUSE_OFF = "\x1b[?1006l\x1b[?1000l";
const CLEAR_LINE = "\x1b[K";
const CLEAR_BELOW = "\x1b[J";
const HOME = "\x1b[H";

export interface ScreenSize {
  rows: number;
  columns: number;
}

/**
 * Full-screen raw-mode terminal with mouse reporting. Leaving restores the
 * normal screen so child processes (editor, pager) can use it.
 */
export class Terminal implements TerminalHandoff {
  private active = false;

  constructor(
    readonly input: NodeJS.ReadStream = process.stdin,
    readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  size(): ScreenSize {
    return { rows: this.output.rows || 24, columns: this.output.columns || 80 };
  }

  enter(): void {
    if (this.active) return;
    this.active = true;
    this.input.setRawMode(true);
    this.input.setEncoding("utf8");
    this.input.resume();
    this.output.write(ALT_SCREEN_ON + HIDE_CURSOR + MOUSE_ON);
  }

  leave(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(MOUSE_OFF + SHOW_CURSOR + ALT_SCREEN_OFF);
    this.input.setRawMode(false);
    this.input.pause();
  }

  relinquish(): void {
    this.leave();
  }

  takeover(): void {
    this.enter();
  }

  draw(lines: readonly string[]): void {
    this.output.write(
      `${HOME}${lines.map((line) => `${line}\x1b[0m${CLEAR_LINE}`).join("\r\n")}${CLEAR_BELOW}`,
    );
  }
}
