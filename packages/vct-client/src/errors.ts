export type VctClientErrorCode =
  | "http_error"
  | "invalid_response"
  | "timeout"
  | "network_error";

export class VctClientError extends Error {
  readonly code: VctClientErrorCode;
  readonly status?: number;
  readonly body?: string;

  constructor(
    code: VctClientErrorCode,
    message: string,
    options: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "VctClientError";
    this.code = code;
    this.status = options.status;
    this.body = options.body;
  }
}
