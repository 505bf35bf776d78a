export type ComposerKey = {
  key: string;
  shiftKey: boolean;
  isComposing?: boolean;
};

export type ComposerKeyEvent = ComposerKey & { preventDefault: () => void };

/** Enter sends; Shift+Enter inserts a newline; keys typed mid-IME never send. */
export function shouldSubmit(e: ComposerKey): boolean {
  if (e.isComposing) return false;
  return e.key === "Enter" && !e.shiftKey;
}

/** Runs `submit` once for a sending key and keeps its newline out of the textarea. */
export function handleComposerKeyDown(e: ComposerKeyEvent, submit: () => void): boolean {
  if (!shouldSubmit(e)) return false;
  e.preventDefault();
  submit();
  return true;
}

export type DraftDeps = {
  pending: boolean;
  onSend: (text: string) => Promise<boolean>;
  setDraft: (update: (current: string) => string) => void;
};

/**
 * Clears the draft as the turn starts. A send that is refused puts the text
 * back, unless something new was typed meanwhile.
 */
export async function submitDraft(draft: string, deps: DraftDeps): Promise<boolean> {
  const text = draft.trim();
  if (!text || deps.pending) return false;
  deps.setDraft(() => "");
  const accepted = await deps.onSend(text);
  if (!accepted) deps.setDraft((current) => current || draft);
  return accepted;
}
