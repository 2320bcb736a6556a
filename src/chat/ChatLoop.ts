import { describeError } from "../core/errors.js";
import type { Logger } from "../observability/Logger.js";
import { parseSessionInput } from "./SessionCommand.js";
import type { Terminal } from "./Terminal.js";

/**
 * One conversation strategy (stateless completions or stateful responses).
 * The loop owns input handling; a mode owns its conversation state.
 */
export interface ChatMode {
  /** Drop the conversation context. Returns the confirmation to print. */
  clear(): string;
  /** Lines describing the current mode and context size. Must not touch the network. */
  status(): string[];
  /**
   * Run one exchange, echoing the reply to the terminal. Throws on failure,
   * after restoring the conversation state it had before the call.
   */
  send(text: string, signal?: AbortSignal): Promise<void>;
}

export interface ChatLoopOptions {
  terminal: Terminal;
  signal?: AbortSignal;
  logger?: Logger;
}

export type ChatLoopOutcome = "exit" | "end-of-input" | "interrupted";

export const INTERRUPT_FAREWELL = "\n\nChat session ended.";

/**
 * Read lines until an exit command, end of input or an interrupt.
 * A failed exchange is reported inline and the loop keeps going.
 */
export async function runChatLoop(mode: ChatMode, options: ChatLoopOptions): Promise<ChatLoopOutcome> {
  const { terminal, signal, logger } = options;

  for (;;) {
    const raw = await terminal.prompt("You: ");
    if (signal?.aborted) return interrupted(terminal);
    if (raw === null) return "end-of-input";

    const command = parseSessionInput(raw);
    switch (command.kind) {
      case "empty":
        break;
      case "exit":
        terminal.line("Goodbye!");
        return "exit";
      case "clear":
        terminal.line(mode.clear());
        terminal.line();
        break;
      case "status":
        for (const line of mode.status()) terminal.line(line);
        terminal.line();
        break;
      case "message":
        terminal.line();
        terminal.write("Assistant: ");
        try {
          await mode.send(command.text, signal);
        } catch (err) {
          if (signal?.aborted) return interrupted(terminal);
          logger?.debug("chat turn failed", { error: describeError(err) });
          terminal.line(`\nError: ${describeError(err)}`);
        }
        terminal.line();
        break;
    }
  }
}

function interrupted(terminal: Terminal): ChatLoopOutcome {
  terminal.line(INTERRUPT_FAREWELL);
  return "interrupted";
}
