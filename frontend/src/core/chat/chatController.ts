import { ApiError, errorMessage } from "../api/errors";
import type { ReducerStore } from "../state/store";
import { emitClientEvent } from "../../telemetry/clientEvents";
import { requestCompletion } from "./chatApi";
import type { ChatAction, ChatState } from "./chatState";
import { isAwaitingReply } from "./chatState";
import { decodeCompletion, renderOutcome, type RenderedReply } from "./completion";
import type { ChatMessage, CompletionRequest } from "./types";

export const LOADING_TEXT = "Thinking…";

export type SendOptions = {
  model: string;
  quickMode?: boolean;
};

export type ChatControllerDeps = {
  store: ReducerStore<ChatState, ChatAction>;
  send?: (req: CompletionRequest) => Promise<unknown>;
  now?: () => number;
  newId?: (prefix: string) => string;
};

function defaultId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 10)}`;
}

function transportFailure(err: unknown): RenderedReply {
  return { content: `Error: ${errorMessage(err)}`, isHtml: false, failed: true };
}

export class ChatController {
  private readonly store: ReducerStore<ChatState, ChatAction>;
  private readonly send: (req: CompletionRequest) => Promise<unknown>;
  private readonly now: () => number;
  private readonly newId: (prefix: string) => string;

  constructor(deps: ChatControllerDeps) {
    this.store = deps.store;
    this.send = deps.send ?? requestCompletion;
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? defaultId;
  }

  isAwaitingReply(): boolean {
    return isAwaitingReply(this.store.get());
  }

  /**
   * Run one chat turn. Resolves false without touching state when the input
   * is blank or another turn is still pending; otherwise resolves true once
   * the reply (or error) has replaced the loading placeholder.
   */
  async sendMessage(input: string, opts: SendOptions): Promise<boolean> {
    const prompt = input.trim();
    if (!prompt || this.isAwaitingReply()) return false;

    const turnId = this.newId("turn");
    const startedAt = this.now();
    this.store.dispatch({
      type: "turn_started",
      turnId,
      user: this.message("user", prompt, false, "message"),
      placeholder: this.message("assistant", LOADING_TEXT, false, "loading"),
    });
    emitClientEvent({ type: "turn_start", turnId, model: opts.model });

    let reply: RenderedReply;
    let code: string | undefined;
    try {
      const body = await this.send({ prompt, model: opts.model, quick_mode: opts.quickMode });
      reply = renderOutcome(decodeCompletion(body));
    } catch (err) {
      reply = transportFailure(err);
      code = err instanceof ApiError ? err.code : "unknown";
    }

    const settled = this.message("assistant", reply.content, reply.isHtml, reply.failed ? "error" : "message");
    this.store.dispatch({
      type: "turn_settled",
      turnId,
      reply: reply.toolName ? { ...settled, toolName: reply.toolName } : settled,
    });
    emitClientEvent({
      type: reply.failed ? "turn_error" : "turn_done",
      turnId,
      code,
      durationMs: this.now() - startedAt,
    });
    return true;
  }

  clear(): void {
    this.store.dispatch({ type: "cleared" });
  }

  private message(
    role: ChatMessage["role"],
    content: string,
    isHtml: boolean,
    kind: ChatMessage["kind"]
  ): ChatMessage {
    return { id: this.newId("msg"), role, content, isHtml, kind, createdAt: this.now() };
  }
}
