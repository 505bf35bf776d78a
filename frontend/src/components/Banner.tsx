export function Banner(props: { kind: "error" | "info"; text: string; onDismiss?: () => void }) {
  return (
    <div class={`banner ${props.kind}`} role={props.kind === "error" ? "alert" : "status"}>
      <span>{props.text}</span>
      {props.onDismiss ? (
        <button class="btn ghost" onClick={props.onDismiss} aria-label="Dismiss">
          ×
        </button>
      ) : null}
    </div>
  );
}
