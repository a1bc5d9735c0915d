export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProvisioningError';
  }
}

export class ProfileError extends ProvisioningError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_profile', details);
    this.name = 'ProfileError';
  }
}

export class AccountApiError extends ProvisioningError {
  constructor(message: string, public readonly status?: number, details?: Record<string, unknown>) {
    super(message, 'account_api_failed', { ...details, status });
    this.name = 'AccountApiError';
  }
}
