// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors
export class ConfigurationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class MissingApplicationIdError extends ConfigurationError {
  constructor(
    message: string = 'An application id is required. Set ALGOLIA_APPLICATION_ID or pass credentials.applicationId'
  ) {
    super(message);
    this.code = 'MISSING_APPLICATION_ID';
  }
}

export class MissingApiKeyError extends ConfigurationError {
  constructor(
    message: string = 'An API key is required. Set ALGOLIA_API_KEY or pass credentials.apiKey'
  ) {
    super(message);
    this.code = 'MISSING_API_KEY';
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, { issues });
    this.code = 'INVALID_CONFIG';
  }
}

// Local validation, raised before any request is built
export class ValidationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

// Network errors (transport failures, retried by the dispatcher)
export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Errors returned as result values
export class HttpError extends SDKError {
  constructor(
    public status: number,
    public body: string,
    details?: Record<string, unknown>
  ) {
    super(`Request failed with status ${status}`, 'HTTP_ERROR', { ...details, status });
  }
}

export class HostsExhaustedError extends SDKError {
  constructor(
    message: string = 'Unable to connect to Algolia',
    details?: Record<string, unknown>
  ) {
    super(message, 'HOSTS_EXHAUSTED', details);
  }
}

export class ResponseDecodeError extends SDKError {
  constructor(
    public body: string,
    details?: Record<string, unknown>
  ) {
    super('Response body is not valid JSON', 'RESPONSE_DECODE_ERROR', details);
  }
}

export class InvalidObjectIdError extends SDKError {
  constructor(message: string = 'The ObjectID cannot be an empty string') {
    super(message, 'INVALID_OBJECT_ID');
  }
}

export class TaskStatusError extends SDKError {
  constructor(
    public taskStatus: unknown,
    details?: Record<string, unknown>
  ) {
    super(`Unexpected task status: ${String(taskStatus)}`, 'TASK_STATUS_ERROR', details);
  }
}

export type DispatchError =
  | HttpError
  | HostsExhaustedError
  | ResponseDecodeError
  | InvalidObjectIdError
  | TaskStatusError;
