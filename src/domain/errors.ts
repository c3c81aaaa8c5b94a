/** Raised when required configuration is missing or malformed. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Raised when the chat backend cannot be reached or answers with a
 * non-success status. `status` is absent for network-level failures.
 */
export class ChatDeliveryError extends Error {
  readonly status: number | undefined;
  readonly responseBody: string | undefined;

  constructor(message: string, options: { status?: number; responseBody?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ChatDeliveryError';
    this.status = options.status;
    this.responseBody = options.responseBody;
  }
}

/** Raised by the test-event generator for a scenario name it does not know. */
export class UnknownScenarioError extends Error {
  readonly scenario: string;

  constructor(scenario: string, valid: readonly string[]) {
    super(`Unknown event type: ${scenario}. Valid types: ${valid.join(', ')}`);
    this.name = 'UnknownScenarioError';
    this.scenario = scenario;
  }
}
