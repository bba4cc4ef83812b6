export const DEFAULT_INFO_PANEL_SIZE = 5;

export interface InfoMessage {
  text: string;
  isError: boolean;
}

/**
 * Rolling list of the most recent messages shown under the log. A message
 * identical to the previous one is not added again.
 */
export class InfoPanel {
  private entries: InfoMessage[] = [];

  constructor(readonly maxMessages = DEFAULT_INFO_PANEL_SIZE) {}

  get messages(): readonly InfoMessage[] {
    return this.entries;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  push(text: string): void {
    this.add({ text, isError: false });
  }

  pushError(text: string): void {
    this.add({ text, isError: true });
  }

  clear(): void {
    this.entries = [];
  }

  private add(message: InfoMessage): void {
    const last = this.entries.at(-1);
    if (last && last.text === message.text && last.isError === message.isError) {
      return;
    }
    this.entries.push(message);
    if (this.entries.length > this.maxMessages) {
      this.entries = this.entries.slice(-this.maxMessages);
    }
  }
}
