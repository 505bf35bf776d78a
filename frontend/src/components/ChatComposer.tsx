import { useRef, useState } from "preact/hooks";
import { handleComposerKeyDown, submitDraft } from "./composerKeys";

export function ChatComposer(props: {
  pending: boolean;
  onSend: (text: string) => Promise<boolean>;
}) {
  const [text, setText] = useState("");
  const taRef = useRef<HTMLTextAreaElement>(null);

  async function send() {
    await submitDraft(text, { pending: props.pending, onSend: props.onSend, setDraft: setText });
    taRef.current?.focus();
  }

  return (
    <div class="composer">
      <textarea
        ref={taRef}
        class="textarea"
        rows={2}
        value={text}
        onInput={(e) => setText(e.currentTarget.value)}
        onKeyDown={(e) => handleComposerKeyDown(e, () => void send())}
        placeholder="Type your message…"
        aria-label="Message"
      />
      <div class="composerRow">
        <button class="btn primary" disabled={props.pending || !text.trim()} onClick={() => void send()}>
          {props.pending ? "Sending…" : "Send"}
        </button>
      </div>
    </div>
  );
}
