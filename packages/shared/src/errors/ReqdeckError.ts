export type ReqdeckErrorCode =
  | "missing_variable"
  | "malformed_auth"
  | "unsupported_auth_type"
  | "transport_error"
  | "output_write_error"
  | "invalid_assertion"
  | "history_io_error"
  | "not_found"
  | "invalid_input";

export type ReqdeckErrorDetails = Record<string, unknown>;

type ReqdeckErrorInput = {
  code: ReqdeckErrorCode;
  message: string;
  details?: ReqdeckErrorDetails;
  cause?: unknown;
  name?: string;
};

export class ReqdeckError extends Error {
  readonly code: ReqdeckErrorCode;
  readonly details: ReqdeckErrorDetails;

  constructor({ code, message, details, cause, name }: ReqdeckErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name ?? "ReqdeckError";
    this.code = code;
    this.details = details ?? {};
  }
}

export const isReqdeckError = (error: unknown, code?: ReqdeckErrorCode): error is ReqdeckError =>
  error instanceof ReqdeckError && (code === undefined || error.code === code);

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const createMissingVariableError = (variable: string, field: string): ReqdeckError =>
  new ReqdeckError({
    code: "missing_variable",
    name: "MissingVariableError",
    message: `Variable '${variable}' not found in saved variables (used in ${field}).`,
    details: { variable, field },
  });

export const createMalformedAuthError = (authType: string): ReqdeckError =>
  new ReqdeckError({
    code: "malformed_auth",
    name: "MalformedAuthError",
    message: "Basic auth value must be in the form username:password",
    details: { authType },
  });

export const createUnsupportedAuthTypeError = (authType: string): ReqdeckError =>
  new ReqdeckError({
    code: "unsupported_auth_type",
    name: "UnsupportedAuthTypeError",
    message: `Unsupported auth type '${authType}'. Use 'bearer' or 'basic'.`,
    details: { authType },
  });

export const createTransportError = (input: { method: string; url: string; cause: unknown }): ReqdeckError =>
  new ReqdeckError({
    code: "transport_error",
    name: "TransportError",
    message: `${input.method} ${input.url} failed: ${describeError(input.cause)}`,
    details: { method: input.method, url: input.url },
    cause: input.cause,
  });

export const createOutputWriteError = (outputFile: string, cause: unknown): ReqdeckError =>
  new ReqdeckError({
    code: "output_write_error",
    name: "OutputWriteError",
    message: `Failed to write to output file '${outputFile}': ${describeError(cause)}`,
    details: { outputFile },
    cause,
  });

export const createInvalidAssertionError = (condition: string, reason: string): ReqdeckError =>
  new ReqdeckError({
    code: "invalid_assertion",
    name: "InvalidAssertionError",
    message: `Invalid assertion '${condition}': ${reason}`,
    details: { condition },
  });

export const createHistoryIoError = (operation: string, cause: unknown): ReqdeckError =>
  new ReqdeckError({
    code: "history_io_error",
    name: "HistoryIOError",
    message: `History ${operation} failed: ${describeError(cause)}`,
    details: { operation },
    cause,
  });

export const createNotFoundError = (what: string, details?: ReqdeckErrorDetails): ReqdeckError =>
  new ReqdeckError({
    code: "not_found",
    message: `${what} not found.`,
    details,
  });

export const createInvalidInputError = (message: string, details?: ReqdeckErrorDetails): ReqdeckError =>
  new ReqdeckError({ code: "invalid_input", message, details });
