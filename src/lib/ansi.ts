const STYLE_SEQUENCE = /\x1b\[[0-9;]*m/g;
const NON_STYLE_SEQUENCE =
  /\x1b(\[[0-9;?]*[ -/]*([@-l]|[n-~])|\].*?(\x07|\x1b\\)|P.*?\x1b\\)/g;

export function stripAnsi(text: string): string {
  return text.replace(STYLE_SEQUENCE, "");
}

/**
 * Remove cursor movement, OSC and DCS sequences, keeping colours.
 */
export function stripNonStyleAnsi(text: string): string {
  return text.replace(NON_STYLE_SEQUENCE, "");
}

export function visibleLength(text: string): number {
  return [...stripAnsi(text)].length;
}

function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let last = 0;
  for (const match of text.matchAll(STYLE_SEQUENCE)) {
    const index = match.index ?? 0;
    tokens.push(...text.slice(last, index));
    tokens.push(match[0]);
    last = index + match[0].length;
  }
  tokens.push(...text.slice(last));
  return tokens;
}

const isStyle = (token: string) => token.startsWith("\x1b[");

/**
 * Drop the first `count` visible characters, keeping every style sequence.
 */
export function dropVisible(text: string, count: number): string {
  let remaining = count;
  let result = "";
  for (const token of tokenize(text)) {
    if (isStyle(token)) {
      result += token;
    } else if (remaining > 0) {
      remaining--;
    } else {
      result += token;
    }
  }
  return result;
}

/**
 * Cut a line to `width` visible characters.
 */
export function truncateVisible(text: string, width: number): string {
  let remaining = width;
  let result = "";
  for (const token of tokenize(text)) {
    if (isStyle(token)) {
      result += token;
    } else if (remaining > 0) {
      result += token;
      remaining--;
    }
  }
  return result;
}
