import { hydrateModels, modelStore } from "../models/modelStore";
import { loadRuntimeConfigSafe, setRuntimeConfig, type RuntimeConfig } from "../../config/runtimeConfig";

export type BootResult = {
  runtimeConfig: RuntimeConfig;
  modelsLoaded: boolean;
  // non-fatal: the chat keeps working against the fallback model list
  bootError?: string;
};

export async function bootstrapApp(): Promise<BootResult> {
  const runtimeConfig = await loadRuntimeConfigSafe();
  setRuntimeConfig(runtimeConfig);

  await hydrateModels();

  const { error } = modelStore.get();
  return error
    ? { runtimeConfig, modelsLoaded: false, bootError: `Model list unavailable: ${error}` }
    : { runtimeConfig, modelsLoaded: true };
}
