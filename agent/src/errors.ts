// Missing or invalid environment configuration. Fatal at startup.
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class FetchError extends Error {
  readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.status = options.status ?? null;
  }
}

// Upstream answered, but not with the payload shape we expect.
export class ParseError extends FetchError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class StoreError extends Error {
  readonly file: string;

  constructor(file: string, message: string, cause?: unknown) {
    super(`${file}: ${message}`, { cause });
    this.name = "StoreError";
    this.file = file;
  }
}

export class SendError extends Error {
  readonly recipient: string;

  constructor(recipient: string, message: string, cause?: unknown) {
    super(`send to ${recipient} failed: ${message}`, { cause });
    this.name = "SendError";
    this.recipient = recipient;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
