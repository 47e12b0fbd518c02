export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  constructor(readonly trackerId: string) {
    super(`Tracker ${trackerId} not found`);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends Error {
  constructor(readonly trackerId: string) {
    super(`Tracker ${trackerId} belongs to another user`);
    this.name = "ForbiddenError";
  }
}

/**
 * Failure talking to the flight-search provider. `transient` marks failures
 * worth retrying (timeouts, dropped connections, throttling, 5xx).
 */
export class ProviderError extends Error {
  readonly transient: boolean;

  constructor(message: string, options: { transient: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.transient = options.transient;
  }
}

export interface ChannelFailure {
  channel: string;
  message: string;
}

export class DeliveryError extends Error {
  readonly failures: ChannelFailure[];

  constructor(message: string, failures: ChannelFailure[] = []) {
    super(message);
    this.name = "DeliveryError";
    this.failures = failures;
  }
}

export class PersistenceError extends Error {
  constructor(readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
