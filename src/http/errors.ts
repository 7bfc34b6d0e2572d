import { STATUS_CODES } from "node:http";

export type GatewayErrorKind =
  | "BadRequest"
  | "Unauthenticated"
  | "NotFound"
  | "MethodNotAllowed"
  | "PayloadTooLarge"
  | "ExecutionFailure"
  | "MalformedScriptOutput"
  | "Internal";

export type ErrorEnvelope = {
  error: {
    code: number;
    type: string;
    message: string;
  };
};

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly kind: GatewayErrorKind,
    message: string,
    readonly headers: Record<string, string> = {}
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function statusText(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? "Unknown";
}

export function errorEnvelope(statusCode: number, message = ""): ErrorEnvelope {
  return {
    error: {
      code: statusCode,
      type: statusText(statusCode),
      message,
    },
  };
}

export const badRequest = (message: string) => new HttpError(400, "BadRequest", message);
export const notFound = (message: string) => new HttpError(404, "NotFound", message);
export const methodNotAllowed = (message: string) => new HttpError(405, "MethodNotAllowed", message);
