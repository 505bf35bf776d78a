import { useEffect, useMemo, useState } from "preact/hooks";
import { Banner } from "../components/Banner";
import { ChatComposer } from "../components/ChatComposer";
import { MessageList } from "../components/MessageList";
import { ModelSelect } from "../components/ModelSelect";
import { getRuntimeConfig } from "../config/runtimeConfig";
import { ChatController } from "../core/chat/chatController";
import { chatStore, useChatState } from "../core/chat/chatStore";
import { resolveModelId, useModelState } from "../core/models/modelStore";
import { setPrefs, uiPrefsStore } from "../core/prefs/uiPrefsStore";

export function ChatRoute() {
  const ctrl = useMemo(() => new ChatController({ store: chatStore }), []);
  const chat = useChatState();
  const models = useModelState();

  const [prefs, setPrefsState] = useState(uiPrefsStore.get());
  useEffect(() => uiPrefsStore.subscribe(() => setPrefsState(uiPrefsStore.get())), []);

  const modelId = resolveModelId(models.models, prefs.modelId, getRuntimeConfig().DEFAULT_MODEL);
  const pending = chat.pending !== null;

  async function onSend(text: string): Promise<boolean> {
    if (!modelId) return false;
    return ctrl.sendMessage(text, { model: modelId, quickMode: prefs.quickMode });
  }

  return (
    <div class="page chat">
      <div class="chatToolbar">
        <ModelSelect
          models={models.models}
          value={modelId}
          quickMode={prefs.quickMode}
          disabled={pending}
          onModelChange={(id) => setPrefs({ modelId: id })}
          onQuickModeChange={(quickMode) => setPrefs({ quickMode })}
        />
        <button class="btn" disabled={pending || !chat.messages.length} onClick={() => ctrl.clear()}>
          Clear
        </button>
      </div>

      {chat.messages.length ? (
        <MessageList messages={chat.messages} />
      ) : (
        <div class="empty muted">Ask anything to start the conversation.</div>
      )}

      {chat.lastError ? <Banner kind="error" text={chat.lastError} /> : null}

      <ChatComposer pending={pending} onSend={onSend} />
    </div>
  );
}
