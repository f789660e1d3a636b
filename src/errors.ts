export class FinancialDataError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required settings are missing or invalid; the server must not start. */
export class ConfigurationError extends FinancialDataError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class UpstreamError extends FinancialDataError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(readonly timeoutMs: number, options?: ErrorOptions) {
    super(`Request timeout after ${timeoutMs}ms`, options);
  }
}

/** The tool invocation was cancelled by the client before the upstream answered. */
export class RequestAbortedError extends FinancialDataError {
  constructor(operation: string, options?: ErrorOptions) {
    super(`Request for ${operation} was aborted`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
