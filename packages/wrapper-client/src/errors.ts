export type WrapperClientErrorKind = "transport" | "rejected" | "decode";

/**
 * Failure of one wrapper service call. The message is meant for users as is:
 * it names the operation and, for rejections, carries the response body.
 */
export class WrapperClientError extends Error {
  readonly kind: WrapperClientErrorKind;
  readonly status?: number;
  readonly body?: string;

  constructor(
    kind: WrapperClientErrorKind,
    message: string,
    details: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "WrapperClientError";
    this.kind = kind;
    this.status = details.status;
    this.body = details.body;
  }
}

export function isWrapperClientError(error: unknown): error is WrapperClientError {
  return error instanceof WrapperClientError;
}
