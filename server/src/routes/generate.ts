import { Hono } from "hono";
import { z } from "zod";
import { BadRequestError, InvalidModelError, RelayError } from "../errors";
import { formatZodError, readJsonBody } from "../http";
import type { Logger } from "../logger";
import { renderMarkdown } from "../markdown";
import { getModel } from "../models";
import { shapeCompletion } from "../prompts/shaping";
import { TOOL_DEFINITIONS } from "../tools/definitions";
import type { ToolExecutor } from "../tools/executor";
import type { ToolResult } from "../tools/types";
import type {
  ChatCompletion,
  CompletionClient,
  CompletionMessage,
  FunctionCall,
  OutgoingMessage,
  ToolCall,
} from "../together/types";

export interface GenerateRouteDeps {
  client: CompletionClient;
  tools: ToolExecutor;
  logger: Logger;
}

const generateRequestSchema = z.object({
  prompt: z.string({ required_error: "Prompt is required" }).trim().min(1, "Prompt is required"),
  // absent, blank and unknown models all answer InvalidModelError
  model: z.unknown().optional(),
  temperature: z.unknown().optional(),
  quick_mode: z.boolean().optional(),
});

type RequestedCall =
  | { kind: "tool"; call: ToolCall; name: string; arguments?: string }
  | { kind: "function"; call: FunctionCall; name: string; arguments?: string };

/** First tool call in the message, or the legacy single function_call. */
export function findRequestedCall(message: CompletionMessage): RequestedCall | null {
  const [toolCall] = message.tool_calls ?? [];
  if (toolCall && (toolCall.type === undefined || toolCall.type === "function")) {
    return { kind: "tool", call: toolCall, name: toolCall.function.name, arguments: toolCall.function.arguments };
  }
  if (message.function_call) {
    const call = message.function_call;
    return { kind: "function", call, name: call.name, arguments: call.arguments };
  }
  return null;
}

function followUpMessages(
  requested: RequestedCall,
  message: CompletionMessage,
  result: ToolResult
): OutgoingMessage[] {
  const content = JSON.stringify(result);
  if (requested.kind === "tool") {
    return [
      { role: "assistant", content: null, tool_calls: message.tool_calls ?? [requested.call] },
      { role: "tool", tool_call_id: requested.call.id ?? "", name: requested.name, content },
    ];
  }
  return [
    { role: "assistant", content: null, function_call: requested.call },
    { role: "function", name: requested.name, content },
  ];
}

export function toolResultFallback(name: string, result: ToolResult): string {
  return `I found the information you requested about ${name}:\n\n\`\`\`json\n${JSON.stringify(result, null, 2)}\n\`\`\``;
}

/** The provider envelope with the first choice's Markdown replaced by HTML. */
export function withHtmlContent(completion: ChatCompletion): ChatCompletion {
  return {
    ...completion,
    choices: completion.choices.map((choice, index) =>
      index === 0
        ? { ...choice, message: { ...choice.message, content: renderMarkdown(choice.message.content ?? "") } }
        : choice
    ),
  };
}

export function createGenerateRoutes(deps: GenerateRouteDeps) {
  const app = new Hono();
  const logger = deps.logger.child({ module: "generate" });

  app.post("/generate", async (c) => {
    const raw = await readJsonBody(c);
    if (raw === null) {
      throw new BadRequestError("Request body must be valid JSON");
    }
    const parsed = generateRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BadRequestError(formatZodError(parsed.error));
    }

    const { prompt, temperature } = parsed.data;
    const model = typeof parsed.data.model === "string" ? parsed.data.model.trim() : "";
    const quickMode = parsed.data.quick_mode ?? true;
    const settings = getModel(model);
    if (!settings) {
      throw new InvalidModelError(model);
    }

    const shaped = shapeCompletion({
      prompt,
      model,
      settings,
      temperature,
      quickMode,
      tools: [...TOOL_DEFINITIONS],
    });
    logger.info("completion.requested", { model, quickMode, category: shaped.category });

    const first = await deps.client.complete(shaped.body, shaped.timeoutMs);
    const message = first.choices[0]?.message;
    const requested = settings.supportsTools && message ? findRequestedCall(message) : null;

    if (!message || !requested) {
      return c.json(withHtmlContent(first));
    }

    const result = await deps.tools.execute(requested.name, requested.arguments);
    logger.info("tool.executed", { tool: requested.name });
    const functionExecuted = { name: requested.name, result };

    try {
      const second = await deps.client.complete(
        {
          ...shaped.body,
          messages: [...shaped.body.messages, ...followUpMessages(requested, message, result)],
        },
        shaped.timeoutMs
      );
      return c.json({ ...withHtmlContent(second), function_executed: functionExecuted });
    } catch (err) {
      if (!(err instanceof RelayError)) {
        throw err;
      }
      // The tool already ran; answer with its raw result rather than an error.
      logger.warn("tool.followup_failed", { tool: requested.name, status: err.status });
      return c.json({
        choices: [
          {
            index: 0,
            message: {
              role: "assistant",
              content: renderMarkdown(toolResultFallback(requested.name, result)),
            },
          },
        ],
        function_executed: functionExecuted,
      });
    }
  });

  return app;
}
