import { isRecord } from "../util/guards";
import type { CompletionOutcome } from "./types";

export const UNEXPECTED_RESPONSE_TEXT = "Received an unexpected response from the API.";

function readErrorText(raw: unknown): string | null {
  if (typeof raw === "string") return raw;
  // Provider-native envelope: { error: { message } }
  if (isRecord(raw) && typeof raw.message === "string") return raw.message;
  if (raw === undefined || raw === null) return null;
  return "Unknown error";
}

function readFirstChoice(raw: unknown): string | null {
  if (!Array.isArray(raw) || raw.length === 0) return null;
  const first: unknown = raw[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === "string" ? content : null;
}

function readToolName(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  return typeof raw.name === "string" ? raw.name : undefined;
}

/**
 * Turn whatever the relay answered with into a tagged outcome. The order is
 * fixed: an `error` field wins over `choices`, which win over `response`.
 */
export function decodeCompletion(body: unknown): CompletionOutcome {
  if (!isRecord(body)) return { kind: "unexpected" };

  const error = readErrorText(body.error);
  if (error !== null) return { kind: "error", message: error };

  const html = readFirstChoice(body.choices);
  if (html !== null) {
    const toolName = readToolName(body.function_executed);
    return toolName ? { kind: "choice", html, toolName } : { kind: "choice", html };
  }

  if (typeof body.response === "string") return { kind: "text", text: body.response };

  return { kind: "unexpected" };
}

export type RenderedReply = {
  content: string;
  isHtml: boolean;
  failed: boolean;
  toolName?: string;
};

export function renderOutcome(outcome: CompletionOutcome): RenderedReply {
  switch (outcome.kind) {
    case "error":
      return { content: `Error: ${outcome.message}`, isHtml: false, failed: true };
    case "choice":
      return outcome.toolName
        ? { content: outcome.html, isHtml: true, failed: false, toolName: outcome.toolName }
        : { content: outcome.html, isHtml: true, failed: false };
    case "text":
      return { content: outcome.text, isHtml: false, failed: false };
    case "unexpected":
      return { content: UNEXPECTED_RESPONSE_TEXT, isHtml: false, failed: true };
    default: {
      const exhaustive: never = outcome;
      return exhaustive;
    }
  }
}
