/**
 * What a line typed at the chat prompt asks for.
 */
export type SessionCommand =
  | { kind: "empty" }
  | { kind: "exit" }
  | { kind: "clear" }
  | { kind: "status" }
  | { kind: "message"; text: string };

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["/quit", "/q", "/exit", "/e"]);

/** Classify a raw input line. Commands match case-insensitively after trimming. */
export function parseSessionInput(raw: string): SessionCommand {
  const text = raw.trim();
  if (!text) return { kind: "empty" };

  const lowered = text.toLowerCase();
  if (EXIT_COMMANDS.has(lowered)) return { kind: "exit" };
  if (lowered === "/clear") return { kind: "clear" };
  if (lowered === "/status") return { kind: "status" };
  return { kind: "message", text };
}
