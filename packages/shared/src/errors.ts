/**
 * Raised while loading configuration or the limits catalog. It is a startup
 * fault: the process must not begin serving requests with it.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type StoreOperation =
  | "window.check"
  | "window.peek"
  | "quota.read"
  | "quota.increment"
  | "plan.lookup";

/**
 * The counter store did not answer in time or failed. Callers never see it:
 * the store guard turns it into a decision under the configured policy.
 */
export class StoreUnavailableError extends Error {
  readonly operation: StoreOperation;

  constructor(operation: StoreOperation, reason: string, options?: { cause?: unknown }) {
    super(`Store unavailable during ${operation}: ${reason}`, options);
    this.name = "StoreUnavailableError";
    this.operation = operation;
  }
}
