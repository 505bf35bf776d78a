import type { ModelInfo } from "../core/models/types";

export function ModelSelect(props: {
  models: ModelInfo[];
  value: string | null;
  quickMode: boolean;
  disabled?: boolean;
  onModelChange: (id: string) => void;
  onQuickModeChange: (quick: boolean) => void;
}) {
  return (
    <div class="modelSelect row">
      <label class="field">
        <span class="label">Model</span>
        <select
          class="select"
          value={props.value ?? ""}
          disabled={props.disabled || !props.models.length}
          onChange={(e) => props.onModelChange(e.currentTarget.value)}
        >
          {props.models.map((m) => (
            <option key={m.id} value={m.id}>
              {m.name}
            </option>
          ))}
        </select>
      </label>
      <label class="field inline">
        <input
          type="checkbox"
          checked={props.quickMode}
          disabled={props.disabled}
          onChange={(e) => props.onQuickModeChange(e.currentTarget.checked)}
        />
        <span class="label">Quick answers</span>
      </label>
    </div>
  );
}
