import { describe, expect, it } from "vitest";
import { DEFAULT_PREFS, resetPrefs, sanitizePrefs, setPrefs, uiPrefsStore } from "./uiPrefsStore";

describe("uiPrefsStore", () => {
  it("sanitizes stored values of the wrong shape", () => {
    expect(sanitizePrefs({ modelId: "  ", quickMode: "yes" })).toEqual({ modelId: null, quickMode: true });
    expect(sanitizePrefs({ modelId: "m-1", quickMode: false })).toEqual({ modelId: "m-1", quickMode: false });
    expect(sanitizePrefs(null)).toEqual(DEFAULT_PREFS);
  });

  it("updates and resets without browser storage", () => {
    setPrefs({ modelId: "m-2", quickMode: false });
    expect(uiPrefsStore.get()).toEqual({ modelId: "m-2", quickMode: false });

    resetPrefs();
    expect(uiPrefsStore.get()).toEqual(DEFAULT_PREFS);
  });
});
