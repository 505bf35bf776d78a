import { useEffect, useRef } from "preact/hooks";
import type { ChatMessage } from "../core/chat/types";

function MessageBody(props: { message: ChatMessage }) {
  const m = props.message;
  // Completion HTML comes from the relay's sanitizing markdown renderer.
  if (m.isHtml) {
    return <div class="msgBody markdown" dangerouslySetInnerHTML={{ __html: m.content }} />;
  }
  return <div class="msgBody">{m.content}</div>;
}

/**
 * Changes whenever a message is appended, including when a settled reply
 * replaces the loading placeholder and the count stays the same.
 */
export function scrollKey(messages: ChatMessage[]): string {
  return messages[messages.length - 1]?.id ?? "";
}

export function MessageList(props: { messages: ChatMessage[] }) {
  const endRef = useRef<HTMLDivElement>(null);
  const key = scrollKey(props.messages);

  useEffect(() => {
    endRef.current?.scrollIntoView({ block: "end" });
  }, [key]);

  return (
    <div class="messages" role="log" aria-live="polite">
      {props.messages.map((m) => (
        <div key={m.id} class={`msg ${m.role} ${m.kind}`}>
          <div class="msgInner">
            <div class="msgRole">{m.role === "user" ? "You" : "Assistant"}</div>
            <MessageBody message={m} />
            {m.toolName ? <div class="msgTool muted mono">used {m.toolName}</div> : null}
          </div>
        </div>
      ))}
      <div ref={endRef} />
    </div>
  );
}
