import { useEffect, useState } from "preact/hooks";
import { createStore } from "../state/store";
import { errorMessage } from "../api/errors";
import { emitClientEvent } from "../../telemetry/clientEvents";
import { FALLBACK_MODELS, listModels } from "./modelsApi";
import type { ModelInfo } from "./types";

export type ModelState = {
  loading: boolean;
  models: ModelInfo[];
  // set when the catalogue could not be fetched and the fallback list is shown
  error?: string;
  loadedAt?: number;
};

export const modelStore = createStore<ModelState>({
  loading: false,
  models: FALLBACK_MODELS
});

export async function hydrateModels(): Promise<void> {
  if (modelStore.get().loading) return;
  modelStore.patch({ loading: true, error: undefined });

  try {
    const listed = await listModels();
    modelStore.patch({
      loading: false,
      models: listed.length ? listed : FALLBACK_MODELS,
      loadedAt: Date.now()
    });
  } catch (e) {
    emitClientEvent({ type: "models_unavailable" });
    modelStore.patch({ loading: false, models: FALLBACK_MODELS, error: errorMessage(e) });
  }
}

/**
 * The model a turn should use: the stored preference when the catalogue still
 * lists it, else the configured default, else the first listed model.
 */
export function resolveModelId(
  models: ModelInfo[],
  preferred: string | null,
  fallback?: string
): string | null {
  if (preferred && models.some((m) => m.id === preferred)) return preferred;
  if (fallback && models.some((m) => m.id === fallback)) return fallback;
  return models[0]?.id ?? null;
}

export function useModelState(): ModelState {
  const [state, setState] = useState(modelStore.get());
  useEffect(() => modelStore.subscribe(() => setState(modelStore.get())), []);
  return state;
}
