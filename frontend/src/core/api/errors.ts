export type ApiErrorCode =
  | "network_error"
  | "timeout"
  | "invalid_response"
  | "server_error"
  | "unknown";

export class ApiError extends Error {
  code: ApiErrorCode;
  status?: number;
  detail?: unknown;

  constructor(code: ApiErrorCode, message: string, status?: number, detail?: unknown) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
    this.detail = detail;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message.trim() || err.name;
  const msg = String(err ?? "").trim();
  return msg || "unknown error";
}
