export enum ServiceErrorCode {
  VALIDATION_FAILED = "VALIDATION_FAILED",
  AUTH_FAILED = "AUTH_FAILED",
  BACKEND_UNAVAILABLE = "BACKEND_UNAVAILABLE",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  UNEXPECTED_RESPONSE = "UNEXPECTED_RESPONSE",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export class ServiceError extends Error {
  constructor(
    public code: ServiceErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ServiceError";
  }

  toPublicMessage(): string {
    switch (this.code) {
      case ServiceErrorCode.VALIDATION_FAILED:
      case ServiceErrorCode.CONFIGURATION_ERROR:
        return this.message;
      case ServiceErrorCode.AUTH_FAILED:
        return `Authentication failed: ${this.message}`;
      case ServiceErrorCode.BACKEND_UNAVAILABLE:
        return `Assisted installer service temporarily unavailable, retry later: ${this.message}`;
      case ServiceErrorCode.UNEXPECTED_RESPONSE:
        return `Unexpected response from the assisted installer service: ${this.message}`;
      default:
        return "An error occurred while processing your request";
    }
  }
}

export class ValidationError extends ServiceError {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(ServiceErrorCode.VALIDATION_FAILED, message);
    this.name = "ValidationError";
  }
}

export class AuthError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ServiceErrorCode.AUTH_FAILED, message, options);
    this.name = "AuthError";
  }
}

export class BackendUnavailableError extends ServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ServiceErrorCode.BACKEND_UNAVAILABLE, message, options);
    this.name = "BackendUnavailableError";
  }
}

export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super(ServiceErrorCode.CONFIGURATION_ERROR, message);
    this.name = "ConfigurationError";
  }
}
