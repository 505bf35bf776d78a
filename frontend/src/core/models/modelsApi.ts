import { endpoints } from "../api/endpoints";
import { ApiError } from "../api/errors";
import { getJson } from "../api/http";
import { isRecord, readString } from "../util/guards";
import type { ModelInfo } from "./types";

// Used when the catalogue endpoint is unreachable; mirrors the relay's list.
export const FALLBACK_MODELS: ModelInfo[] = [
  { id: "meta-llama/Llama-3.3-70B-Instruct-Turbo-Free", name: "Llama 3.3 70B" },
  { id: "deepseek-ai/DeepSeek-R1-Distill-Llama-70B-free", name: "DeepSeek R1" }
];

export function normalizeModel(x: unknown): ModelInfo | null {
  if (!isRecord(x)) return null;
  const id = readString(x, "id");
  if (!id) return null;
  return { id, name: readString(x, "name") ?? id };
}

export async function listModels(): Promise<ModelInfo[]> {
  const res = await getJson(endpoints.models);
  if (!res.ok) {
    throw new ApiError("server_error", `Model catalogue failed (${res.status})`, res.status, res.body);
  }

  const raw = isRecord(res.body) ? res.body.models : res.body;
  if (!Array.isArray(raw)) {
    throw new ApiError("invalid_response", "Model catalogue has no models list", res.status, res.body);
  }

  return raw.map(normalizeModel).filter((m): m is ModelInfo => m !== null);
}
