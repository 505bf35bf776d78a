import { TransportError, UpstreamError, describeError } from "../errors";
import type { Logger } from "../logger";
import {
  type ChatCompletion,
  type CompletionClient,
  type CompletionRequestBody,
  chatCompletionSchema,
} from "./types";

export interface TogetherClientOptions {
  apiKey: string;
  baseUrl: string;
  logger: Logger;
  /** defaults to the global fetch, looked up per call */
  fetch?: typeof fetch;
}

function readProviderMessage(body: unknown, status: number): string {
  if (typeof body === "object" && body !== null && "error" in body) {
    const error = body.error;
    if (typeof error === "string" && error.trim()) {
      return error;
    }
    if (typeof error === "object" && error !== null && "message" in error) {
      const message = error.message;
      if (typeof message === "string" && message.trim()) {
        return message;
      }
    }
  }
  return `HTTP ${status}`;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export class TogetherClient implements CompletionClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetchImpl?: typeof fetch;

  constructor(options: TogetherClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.logger = options.logger.child({ module: "together" });
    this.fetchImpl = options.fetch;
  }

  async complete(body: CompletionRequestBody, timeoutMs: number): Promise<ChatCompletion> {
    const doFetch = this.fetchImpl ?? fetch;
    const started = performance.now();

    let res: Response;
    try {
      res = await doFetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        this.logger.warn("upstream.timeout", { model: body.model, timeoutMs });
        throw new TransportError(`Together API timed out after ${timeoutMs}ms`, true, { cause: err });
      }
      throw new TransportError(`Together API unreachable: ${describeError(err)}`, false, {
        cause: err,
      });
    }

    const payload: unknown = await res.json().catch(() => null);
    const durationMs = Math.round(performance.now() - started);

    if (!res.ok) {
      const message = readProviderMessage(payload, res.status);
      this.logger.warn("upstream.error", { model: body.model, status: res.status, durationMs });
      throw new UpstreamError(res.status, `Together API error: ${message}`);
    }

    const parsed = chatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn("upstream.malformed", { model: body.model, durationMs });
      throw new UpstreamError(502, "Together API returned a malformed response", {
        cause: parsed.error,
      });
    }

    this.logger.debug("upstream.completed", { model: body.model, durationMs });
    return parsed.data;
  }
}
