export type ChatRole = "system" | "user" | "assistant";

/**
 * `loading` marks the transient placeholder shown while a turn is pending;
 * `error` marks a turn that ended in an error message rather than a completion.
 */
export type ChatMessageKind = "message" | "loading" | "error";

export type ChatMessage = {
  id: string;
  role: ChatRole;
  content: string;
  // true only for server-rendered completion HTML
  isHtml: boolean;
  kind: ChatMessageKind;
  createdAt: number;
  // tool the relay ran before answering
  toolName?: string;
};

export type CompletionRequest = {
  prompt: string;
  model: string;
  quick_mode?: boolean;
};

/**
 * Decoded form of a relay response, checked in priority order
 * error → choice → text → unexpected.
 */
export type CompletionOutcome =
  | { kind: "error"; message: string }
  | { kind: "choice"; html: string; toolName?: string }
  | { kind: "text"; text: string }
  | { kind: "unexpected" };
