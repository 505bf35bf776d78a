export interface ModelSettings {
  name: string;
  temperature: number;
  maxTokens: number;
  maxTokensQuick: number;
  topP: number;
  supportsTools: boolean;
  /** prompt is wrapped in a think-then-answer instruction */
  reasoning: boolean;
}

export interface ModelSummary {
  id: string;
  name: string;
  temperature: number;
  max_tokens: number;
  top_p: number;
}

// Together caps prompt + max_tokens at 8193; keep max_tokens well under that.
export const MODEL_CATALOG: Readonly<Record<string, ModelSettings>> = {
  "meta-llama/Llama-3.3-70B-Instruct-Turbo-Free": {
    name: "Llama 3.3 70B",
    temperature: 0.7,
    maxTokens: 2048,
    maxTokensQuick: 256,
    topP: 0.9,
    supportsTools: true,
    reasoning: false,
  },
  "deepseek-ai/DeepSeek-R1-Distill-Llama-70B-free": {
    name: "DeepSeek R1",
    temperature: 0.6,
    maxTokens: 2048,
    maxTokensQuick: 256,
    topP: 0.95,
    supportsTools: false,
    reasoning: true,
  },
};

export function getModel(id: string): ModelSettings | undefined {
  return Object.hasOwn(MODEL_CATALOG, id) ? MODEL_CATALOG[id] : undefined;
}

export function listModelSummaries(): ModelSummary[] {
  return Object.entries(MODEL_CATALOG).map(([id, settings]) => ({
    id,
    name: settings.name,
    temperature: settings.temperature,
    max_tokens: settings.maxTokens,
    top_p: settings.topP,
  }));
}
