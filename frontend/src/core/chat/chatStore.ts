import { useEffect, useState } from "preact/hooks";
import { createReducerStore } from "../state/store";
import { createInitialChatState, reduceChat, type ChatAction, type ChatState } from "./chatState";

// One conversation per page session; nothing is persisted.
export const chatStore = createReducerStore<ChatState, ChatAction>(
  createInitialChatState(),
  reduceChat
);

export function useChatState(): ChatState {
  const [state, setState] = useState(chatStore.get());
  useEffect(() => chatStore.subscribe(() => setState(chatStore.get())), []);
  return state;
}
