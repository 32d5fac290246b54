/**
 * Error taxonomy shared by the collaborators and the reconciliation engine.
 *
 * Every failure that reaches an operation boundary is a ProviderError, so the
 * boundary can turn it into a diagnostic without inspecting SDK error shapes.
 */

/**
 * Standard error types surfaced to the orchestrator
 */
export enum ProviderErrorType {
  NOT_FOUND = "NOT_FOUND",
  INVALID_IDENTIFIER = "INVALID_IDENTIFIER",
  UPSTREAM = "UPSTREAM",
  MISSING_CONFIGURATION = "MISSING_CONFIGURATION",
  SERIALIZATION = "SERIALIZATION",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
}

/**
 * Structured error for provider operations
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly originalError?: Error,
    public readonly suggestions?: string[]
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * HTTP status carried by SDK errors (RestError and plain objects alike).
 */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return undefined;
  }
  const { statusCode } = error;
  return typeof statusCode === "number" ? statusCode : undefined;
}

function getMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string") {
      return message;
    }
  }
  return String(error);
}

/**
 * Translate a collaborator failure into a ProviderError.
 * 404 becomes NOT_FOUND; everything else is UPSTREAM with the message passed through verbatim.
 * ProviderErrors are returned unchanged.
 */
export function toProviderError(error: unknown, suggestions?: string[]): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  const original = error instanceof Error ? error : undefined;
  const type =
    getStatusCode(error) === 404 ? ProviderErrorType.NOT_FOUND : ProviderErrorType.UPSTREAM;

  return new ProviderError(getMessage(error), type, original, suggestions);
}

/**
 * Message plus remediation hints, one per line.
 */
export function describeError(error: ProviderError): string {
  if (!error.suggestions || error.suggestions.length === 0) {
    return error.message;
  }
  return [error.message, ...error.suggestions].join("\n");
}
