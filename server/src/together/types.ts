import { z } from "zod";

export const functionCallSchema = z
  .object({
    name: z.string(),
    arguments: z.string().optional(),
  })
  .passthrough();

export const toolCallSchema = z
  .object({
    id: z.string().optional(),
    type: z.string().optional(),
    function: functionCallSchema,
  })
  .passthrough();

export const completionMessageSchema = z
  .object({
    role: z.string().optional(),
    content: z.string().nullable().optional(),
    tool_calls: z.array(toolCallSchema).nullable().optional(),
    function_call: functionCallSchema.nullable().optional(),
  })
  .passthrough();

export const chatCompletionSchema = z
  .object({
    choices: z.array(z.object({ message: completionMessageSchema }).passthrough()).min(1),
  })
  .passthrough();

export type FunctionCall = z.infer<typeof functionCallSchema>;
export type ToolCall = z.infer<typeof toolCallSchema>;
export type CompletionMessage = z.infer<typeof completionMessageSchema>;
export type ChatCompletion = z.infer<typeof chatCompletionSchema>;

export type OutgoingMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: null; tool_calls: ToolCall[] }
  | { role: "assistant"; content: null; function_call: FunctionCall }
  | { role: "tool"; tool_call_id: string; name: string; content: string }
  | { role: "function"; name: string; content: string };

export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface CompletionRequestBody {
  model: string;
  messages: OutgoingMessage[];
  max_tokens: number;
  temperature: number;
  top_p: number;
  tools?: ToolDefinition[];
}

/** Anything that can answer a chat-completion request. */
export interface CompletionClient {
  complete(body: CompletionRequestBody, timeoutMs: number): Promise<ChatCompletion>;
}
