import { createInterface, type Interface } from "node:readline";

export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Line-oriented terminal for the chat loop: echo text, prompt for a line.
 */
export interface Terminal {
  /** Write text without a trailing newline. */
  write(text: string): void;
  /** Write text followed by a newline. */
  line(text?: string): void;
  /** Show the prompt and read the next line; null at end of input. */
  prompt(label: string): Promise<string | null>;
  close(): void;
}

export interface StreamTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: TextSink;
}

export class StreamTerminal implements Terminal {
  private readonly output: TextSink;
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(options: StreamTerminalOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({ input: options.input ?? process.stdin, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.output.write(text);
  }

  line(text = ""): void {
    this.output.write(`${text}\n`);
  }

  async prompt(label: string): Promise<string | null> {
    if (this.closed) return null;
    this.output.write(label);
    const next = await this.lines.next();
    if (next.done) {
      // End the dangling prompt line unless close() was called from outside.
      if (!this.closed) this.output.write("\n");
      return null;
    }
    return next.value;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rl.close();
  }
}
