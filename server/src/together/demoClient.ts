import type { ChatCompletion, CompletionClient, CompletionRequestBody } from "./types";

function lastUserPrompt(body: CompletionRequestBody): string {
  for (let i = body.messages.length - 1; i >= 0; i--) {
    const message = body.messages[i];
    if (message?.role === "user") {
      return message.content;
    }
  }
  return "";
}

export function demoReply(prompt: string): string {
  const quoted = prompt
    .split("\n")
    .map((line) => `> ${line}`)
    .join("\n");
  return [
    "**Demo mode** is on, so no model was called.",
    "",
    "You asked:",
    "",
    quoted,
    "",
    "Set `TOGETHER_API_KEY` and restart the server to get real answers.",
  ].join("\n");
}

/** Answers every request with a canned Markdown reply. */
export class DemoCompletionClient implements CompletionClient {
  async complete(body: CompletionRequestBody): Promise<ChatCompletion> {
    return {
      id: "demo",
      object: "chat.completion",
      model: body.model,
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: demoReply(lastUserPrompt(body)) },
          finish_reason: "stop",
        },
      ],
    };
  }
}
