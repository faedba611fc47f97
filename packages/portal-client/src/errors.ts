export const INTEGRATION_NAME = "brightree";

export class IntegrationError extends Error {
  readonly integration = INTEGRATION_NAME;

  constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Session tokens are missing, expired or rejected. The caller must re-acquire them. */
export class IntegrationAuthError extends IntegrationError {}

export class IntegrationApiError extends IntegrationError {
  constructor(
    message: string,
    statusCode?: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message, statusCode);
  }
}
