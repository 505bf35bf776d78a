import type { Context } from "hono";
import type { ZodError } from "zod";
import type { ErrorStatus } from "./errors";

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    // malformed or missing body; callers answer 400
    return null;
  }
}

/** Every relay failure has the same wire shape: `{ error: string }`. */
export function jsonError(c: Context, status: ErrorStatus, message: string) {
  return c.json({ error: message }, status);
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
