import { z } from "zod";
import { ResponseDecodeError } from "./errors.js";
import type { ResponseSnapshot, ResponseStreamEvent } from "./types.js";

const ResponseShape = z.object({
  id: z.string(),
  status: z.string().nullish(),
  output_text: z.unknown().optional(),
  output: z.unknown().optional(),
});

const OutputItemShape = z.object({
  content: z.array(z.unknown()),
});

const TextPartShape = z.object({
  text: z.string(),
});

const TypedEventShape = z.object({
  type: z.string(),
  delta: z.unknown().optional(),
  response: z.unknown().optional(),
});

const IdShape = z.object({ id: z.string() });
const DeltaShape = z.object({ delta: z.string() });

/**
 * Decode a Responses API response object into a snapshot.
 * Throws ResponseDecodeError when the payload has no id.
 */
export function decodeResponse(raw: unknown): ResponseSnapshot {
  const parsed = ResponseShape.safeParse(raw);
  if (!parsed.success) {
    throw new ResponseDecodeError(
      "response",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  const { id, status, output_text, output } = parsed.data;
  return {
    id,
    status: status ?? "unknown",
    text: extractResponseText(output_text, output),
  };
}

/**
 * Text of a response: the aggregated `output_text` when present, else every text
 * fragment under `output[].content[]`, else the string form of `output`.
 */
export function extractResponseText(outputText: unknown, output: unknown): string {
  if (typeof outputText === "string") return outputText;

  if (Array.isArray(output) && output.length > 0) {
    const parts: string[] = [];
    for (const item of output) {
      const parsedItem = OutputItemShape.safeParse(item);
      if (!parsedItem.success) continue;
      for (const content of parsedItem.data.content) {
        const part = TextPartShape.safeParse(content);
        if (part.success) parts.push(part.data.text);
      }
    }
    if (parts.length > 0) return parts.join("");
  }

  return String(output);
}

/**
 * Decode one streamed event. Never throws: unknown shapes become `ignored`.
 */
export function decodeStreamEvent(raw: unknown): ResponseStreamEvent {
  const typed = TypedEventShape.safeParse(raw);
  if (typed.success) {
    const { type, delta, response } = typed.data;
    switch (type) {
      case "response.output_text.delta":
        return typeof delta === "string" ? { kind: "text_delta", delta } : { kind: "ignored", type };
      case "response.completed": {
        const completed = IdShape.safeParse(response);
        return completed.success
          ? { kind: "completed", responseId: completed.data.id }
          : { kind: "completed" };
      }
      case "response.queued":
        return { kind: "queued" };
      case "response.in_progress":
        return { kind: "in_progress" };
      default:
        return { kind: "ignored", type };
    }
  }

  const bareDelta = DeltaShape.safeParse(raw);
  if (bareDelta.success) return { kind: "text_delta", delta: bareDelta.data.delta };

  const bareId = IdShape.safeParse(raw);
  if (bareId.success) return { kind: "response_id", id: bareId.data.id };

  return { kind: "ignored" };
}
