import { describe, it, expect, beforeEach } from "vitest";
import { runChatLoop } from "../../src/chat/ChatLoop.js";
import { CompletionsChat } from "../../src/chat/CompletionsChat.js";
import { FakeGateway, RecordingTerminal } from "../fixtures/index.js";

const SYSTEM = { role: "system", content: "Be brief." } as const;

function createChat(gateway: FakeGateway, terminal: RecordingTerminal, stream = true): CompletionsChat {
  return new CompletionsChat({
    gateway,
    terminal,
    model: "test-model",
    systemPrompt: "Be brief.",
    stream,
  });
}

describe("CompletionsChat", () => {
  let gateway: FakeGateway;
  let terminal: RecordingTerminal;

  beforeEach(() => {
    gateway = new FakeGateway();
    terminal = new RecordingTerminal();
  });

  it("starts with only the system message", () => {
    const chat = createChat(gateway, terminal);
    expect(chat.history).toEqual([SYSTEM]);
  });

  it("streams deltas to the terminal and records the assembled reply", async () => {
    gateway.chatStreams.push(["Hel", "lo", "!"]);
    const chat = createChat(gateway, terminal);

    await chat.send("hi");

    expect(terminal.output).toBe("Hello!\n");
    expect(chat.history).toEqual([
      SYSTEM,
      { role: "user", content: "hi" },
      { role: "assistant", content: "Hello!" },
    ]);
    expect(gateway.calls).toEqual([
      {
        method: "streamChat",
        request: { model: "test-model", messages: [SYSTEM, { role: "user", content: "hi" }] },
      },
    ]);
  });

  it("sends the whole history on every turn", async () => {
    gateway.chatReplies.push("One.", "Two.");
    const chat = createChat(gateway, terminal, false);

    await chat.send("first");
    await chat.send("second");

    expect(terminal.output).toBe("One.\nTwo.\n");
    const second = gateway.calls[1];
    expect(second).toEqual({
      method: "completeChat",
      request: {
        model: "test-model",
        messages: [
          SYSTEM,
          { role: "user", content: "first" },
          { role: "assistant", content: "One." },
          { role: "user", content: "second" },
        ],
      },
    });
  });

  it("rolls back the user message when the call fails", async () => {
    gateway.chatReplies.push("Fine.", new Error("503 Service Unavailable"));
    const chat = createChat(gateway, terminal, false);
    await chat.send("first");
    const before = chat.history.length;

    await expect(chat.send("second")).rejects.toThrow("503 Service Unavailable");

    expect(chat.history.length).toBe(before);
    expect(chat.history.at(-1)).toEqual({ role: "assistant", content: "Fine." });
  });

  it("rolls back when a stream breaks part way through", async () => {
    gateway.chatStreams.push(["partial", new Error("stream reset")]);
    const chat = createChat(gateway, terminal);

    await expect(chat.send("hi")).rejects.toThrow("stream reset");

    expect(terminal.output).toBe("partial");
    expect(chat.history).toEqual([SYSTEM]);
  });

  it("resets to the system message on clear, whatever the history length", async () => {
    gateway.chatReplies.push("a", "b", "c");
    const chat = createChat(gateway, terminal, false);
    await chat.send("1");
    await chat.send("2");
    await chat.send("3");

    expect(chat.clear()).toBe("Conversation cleared.");
    expect(chat.history).toEqual([SYSTEM]);
    expect(chat.clear()).toBe("Conversation cleared.");
    expect(chat.history).toEqual([SYSTEM]);
  });

  it("reports mode, model and history size", async () => {
    gateway.chatReplies.push("ok");
    const chat = createChat(gateway, terminal, false);
    await chat.send("hi");

    expect(chat.status()).toEqual([
      "API: Chat Completions (stateless)",
      "Model: test-model",
      "Messages in history: 3",
    ]);
  });

  it("stays interactive after a failed turn inside the loop", async () => {
    gateway.chatReplies.push(new Error("boom"), "Recovered.");
    terminal = new RecordingTerminal(["one", "two", "/status", "/quit"]);
    const chat = createChat(gateway, terminal, false);

    const outcome = await runChatLoop(chat, { terminal });

    expect(outcome).toBe("exit");
    expect(chat.history).toEqual([
      SYSTEM,
      { role: "user", content: "two" },
      { role: "assistant", content: "Recovered." },
    ]);
    expect(terminal.output).toContain("\nError: boom\n");
    expect(terminal.output).toContain("Messages in history: 3\n");
    expect(gateway.remoteCallCount).toBe(2);
  });
});
