/** Base error for all client errors */
export class ProvisioningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisioningError';
  }
}

/** HTTP API errors (4xx, 5xx responses) */
export class ProvisioningAPIError extends ProvisioningError {
  readonly statusCode: number;
  readonly errorMessage: string;

  constructor(statusCode: number, errorMessage: string) {
    super(`API error ${statusCode}: ${errorMessage}`);
    this.name = 'ProvisioningAPIError';
    this.statusCode = statusCode;
    this.errorMessage = errorMessage;
  }

  isNotFound(): boolean {
    return this.statusCode === 404;
  }
  isConflict(): boolean {
    return this.statusCode === 409;
  }
  isUnauthorized(): boolean {
    return this.statusCode === 401;
  }
  isRateLimited(): boolean {
    return this.statusCode === 429;
  }
}

/** Network connectivity and timeout errors */
export class ProvisioningConnectionError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisioningConnectionError';
  }
}

/** A response body lacked a required key or carried the wrong type */
export class ProvisioningDecodeError extends ProvisioningError {
  readonly context: string;
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    super(`Failed to decode ${context}: ${issues.join('; ')}`);
    this.name = 'ProvisioningDecodeError';
    this.context = context;
    this.issues = issues;
  }
}

/** The credentials do not map to exactly one tenant */
export class TenantResolutionError extends ProvisioningError {
  readonly tenantCount: number;

  constructor(tenantCount: number) {
    super(`Expected exactly one tenant, found ${tenantCount}`);
    this.name = 'TenantResolutionError';
    this.tenantCount = tenantCount;
  }
}

/** Input validation errors (client-side) */
export class ProvisioningValidationError extends ProvisioningError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Validation error on '${field}': ${message}`);
    this.name = 'ProvisioningValidationError';
    this.field = field;
  }
}
