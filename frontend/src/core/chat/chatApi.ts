import { getRuntimeConfig } from "../../config/runtimeConfig";
import { endpoints } from "../api/endpoints";
import { postJson } from "../api/http";
import type { CompletionRequest } from "./types";

/**
 * POST one prompt to the relay. Resolves with the decoded JSON body whatever
 * the status, since error envelopes come back as JSON too; rejects with an
 * ApiError only when the relay could not be reached or answered non-JSON.
 */
export async function requestCompletion(req: CompletionRequest): Promise<unknown> {
  const timeoutMs = getRuntimeConfig().REQUEST_TIMEOUT_MS;
  const res = await postJson(endpoints.generate, req, timeoutMs);
  return res.body;
}
