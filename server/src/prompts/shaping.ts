import type { ModelSettings } from "../models";
import type { CompletionRequestBody, ToolDefinition } from "../together/types";
import { type PromptCategory, classifyPrompt, systemPromptFor } from "./classify";
import { wrapForReasoning } from "./reasoning";

export const QUICK_TIMEOUT_MS = 8_000;
export const FULL_TIMEOUT_MS = 15_000;

export interface ShapeInput {
  prompt: string;
  model: string;
  settings: ModelSettings;
  temperature?: unknown;
  quickMode: boolean;
  tools?: ToolDefinition[];
}

export interface ShapedCompletion {
  body: CompletionRequestBody;
  timeoutMs: number;
  category: PromptCategory;
}

/**
 * A caller temperature is clamped to [0, 1]; anything that does not read as a
 * finite number leaves the model default in place.
 */
export function resolveTemperature(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === null || raw === "") {
    return fallback;
  }
  const value = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, value));
}

export function shapeCompletion(input: ShapeInput): ShapedCompletion {
  const { settings, quickMode } = input;
  const category = classifyPrompt(input.prompt);
  const userContent = settings.reasoning ? wrapForReasoning(input.prompt) : input.prompt;

  const body: CompletionRequestBody = {
    model: input.model,
    messages: [
      { role: "system", content: systemPromptFor(category, quickMode) },
      { role: "user", content: userContent },
    ],
    max_tokens: quickMode ? settings.maxTokensQuick : settings.maxTokens,
    temperature: resolveTemperature(input.temperature, settings.temperature),
    top_p: settings.topP,
  };

  if (settings.supportsTools && input.tools?.length) {
    body.tools = input.tools;
  }

  return { body, timeoutMs: quickMode ? QUICK_TIMEOUT_MS : FULL_TIMEOUT_MS, category };
}
