import { describe, it, expect } from "vitest";
import { parseSessionInput } from "../../src/chat/SessionCommand.js";

describe("parseSessionInput", () => {
  it.each(["/quit", "/q", "/exit", "/e", "/QUIT", "/Q", "  /Exit  ", "/E"])(
    "treats %j as an exit command",
    (input) => {
      expect(parseSessionInput(input)).toEqual({ kind: "exit" });
    },
  );

  it("recognizes /clear and /status regardless of case", () => {
    expect(parseSessionInput("/clear")).toEqual({ kind: "clear" });
    expect(parseSessionInput("/CLEAR")).toEqual({ kind: "clear" });
    expect(parseSessionInput("/Status")).toEqual({ kind: "status" });
  });

  it("ignores blank lines", () => {
    expect(parseSessionInput("")).toEqual({ kind: "empty" });
    expect(parseSessionInput("   \t ")).toEqual({ kind: "empty" });
  });

  it("treats anything else as a message, trimmed", () => {
    expect(parseSessionInput("  hello there  ")).toEqual({ kind: "message", text: "hello there" });
    expect(parseSessionInput("/quitting")).toEqual({ kind: "message", text: "/quitting" });
    expect(parseSessionInput("quit")).toEqual({ kind: "message", text: "quit" });
  });
});
