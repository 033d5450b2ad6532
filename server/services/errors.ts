export class CredentialDecryptionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CredentialDecryptionError";
  }
}

export class ExchangeGatewayError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = "ExchangeGatewayError";
  }
}

export class InvoicingError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "InvoicingError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
