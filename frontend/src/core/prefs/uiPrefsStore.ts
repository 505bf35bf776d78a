import { createStore } from "../state/store";
import { isRecord } from "../util/guards";

export type UiPrefs = {
  // null = first model the catalogue lists
  modelId: string | null;
  // short answers, smaller token budget on the relay
  quickMode: boolean;
};

const STORAGE_KEY = "relayChat.uiPrefs.v1";

export const DEFAULT_PREFS: UiPrefs = {
  modelId: null,
  quickMode: true
};

export function sanitizePrefs(p: unknown): UiPrefs {
  if (!isRecord(p)) return DEFAULT_PREFS;
  return {
    modelId: typeof p.modelId === "string" && p.modelId.trim() ? p.modelId : null,
    quickMode: typeof p.quickMode === "boolean" ? p.quickMode : DEFAULT_PREFS.quickMode
  };
}

function load(): UiPrefs {
  try {
    const raw = localStorage.getItem(STORAGE_KEY);
    if (!raw) return DEFAULT_PREFS;
    return sanitizePrefs(JSON.parse(raw));
  } catch {
    return DEFAULT_PREFS;
  }
}

function save(v: UiPrefs) {
  try {
    localStorage.setItem(STORAGE_KEY, JSON.stringify(v));
  } catch {
    // storage may be disabled (private mode, tests)
  }
}

export const uiPrefsStore = createStore<UiPrefs>(load());

export function setPrefs(partial: Partial<UiPrefs>) {
  const next = sanitizePrefs({ ...uiPrefsStore.get(), ...partial });
  uiPrefsStore.set(next);
  save(next);
}

export function resetPrefs() {
  uiPrefsStore.set(DEFAULT_PREFS);
  save(DEFAULT_PREFS);
}
