import type { ChatMessage } from "./types";

export type PendingTurn = {
  turnId: string;
  placeholderId: string;
};

export type ChatState = {
  messages: ChatMessage[];
  // at most one turn in flight
  pending: PendingTurn | null;
  lastError?: string;
};

export type ChatAction =
  | { type: "turn_started"; turnId: string; user: ChatMessage; placeholder: ChatMessage }
  | { type: "turn_settled"; turnId: string; reply: ChatMessage }
  | { type: "cleared" };

export function createInitialChatState(): ChatState {
  return { messages: [], pending: null };
}

export function isAwaitingReply(state: ChatState): boolean {
  return state.pending !== null;
}

/**
 * The only place chat state changes. Actions that do not apply to the current
 * state (a second start while pending, a settle for a stale turn) return the
 * state unchanged.
 */
export function reduceChat(state: ChatState, action: ChatAction): ChatState {
  switch (action.type) {
    case "turn_started": {
      if (state.pending) return state;
      return {
        messages: [...state.messages, action.user, action.placeholder],
        pending: { turnId: action.turnId, placeholderId: action.placeholder.id },
        lastError: undefined
      };
    }
    case "turn_settled": {
      const pending = state.pending;
      if (!pending || pending.turnId !== action.turnId) return state;
      return {
        messages: [
          ...state.messages.filter((m) => m.id !== pending.placeholderId),
          action.reply
        ],
        pending: null,
        lastError: action.reply.kind === "error" ? action.reply.content : undefined
      };
    }
    case "cleared": {
      if (state.pending) return state;
      return createInitialChatState();
    }
    default: {
      const exhaustive: never = action;
      return exhaustive;
    }
  }
}
