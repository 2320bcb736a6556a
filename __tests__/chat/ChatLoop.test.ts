import { describe, it, expect, vi } from "vitest";
import { runChatLoop, type ChatMode } from "../../src/chat/ChatLoop.js";
import { RecordingTerminal } from "../fixtures/index.js";

function stubMode(overrides: Partial<ChatMode> = {}): ChatMode {
  return {
    clear: vi.fn(() => "Cleared."),
    status: vi.fn(() => ["Mode: stub"]),
    send: vi.fn(async () => {}),
    ...overrides,
  };
}

describe("runChatLoop", () => {
  it("prints a farewell and stops on an exit command", async () => {
    const terminal = new RecordingTerminal(["/Q", "never read"]);
    const mode = stubMode();

    const outcome = await runChatLoop(mode, { terminal });

    expect(outcome).toBe("exit");
    expect(terminal.output).toBe("You: Goodbye!\n");
    expect(mode.send).not.toHaveBeenCalled();
  });

  it("ends quietly at end of input", async () => {
    const terminal = new RecordingTerminal([]);
    const outcome = await runChatLoop(stubMode(), { terminal });

    expect(outcome).toBe("end-of-input");
    expect(terminal.output).toBe("You: ");
  });

  it("skips blank lines without calling the mode", async () => {
    const terminal = new RecordingTerminal(["", "   ", "/quit"]);
    const mode = stubMode();

    await runChatLoop(mode, { terminal });

    expect(terminal.output).toBe("You: You: You: Goodbye!\n");
    expect(mode.send).not.toHaveBeenCalled();
  });

  it("prints clear confirmation and status lines", async () => {
    const terminal = new RecordingTerminal(["/clear", "/status", "/quit"]);
    await runChatLoop(stubMode(), { terminal });

    expect(terminal.output).toBe("You: Cleared.\n\nYou: Mode: stub\n\nYou: Goodbye!\n");
  });

  it("frames each message turn with a blank line and an assistant label", async () => {
    const terminal = new RecordingTerminal(["hello", "/quit"]);
    const mode = stubMode({
      send: vi.fn(async () => {
        terminal.line("Hi!");
      }),
    });

    await runChatLoop(mode, { terminal });

    expect(mode.send).toHaveBeenCalledWith("hello", undefined);
    expect(terminal.output).toBe("You: \nAssistant: Hi!\n\nYou: Goodbye!\n");
  });

  it("reports a failed turn inline and keeps reading", async () => {
    const terminal = new RecordingTerminal(["first", "second", "/quit"]);
    const send = vi
      .fn<(text: string) => Promise<void>>()
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockResolvedValueOnce(undefined);

    const outcome = await runChatLoop(stubMode({ send }), { terminal });

    expect(outcome).toBe("exit");
    expect(send).toHaveBeenCalledTimes(2);
    expect(terminal.output).toBe(
      "You: \nAssistant: \nError: connection reset\n\nYou: \nAssistant: \nYou: Goodbye!\n",
    );
  });

  it("stops with the interrupt farewell when the signal fires during a turn", async () => {
    const controller = new AbortController();
    const terminal = new RecordingTerminal(["hello", "/status"]);
    const mode = stubMode({
      send: vi.fn(async () => {
        controller.abort();
        throw new Error("Request was aborted.");
      }),
    });

    const outcome = await runChatLoop(mode, { terminal, signal: controller.signal });

    expect(outcome).toBe("interrupted");
    expect(terminal.output).toBe("You: \nAssistant: \n\nChat session ended.\n");
    expect(mode.status).not.toHaveBeenCalled();
  });
});
