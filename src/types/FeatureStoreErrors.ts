/**
 * Feature Store Errors - typed errors for lifecycle, polling and parameter handling
 *
 * Every error carries error_class, error_code and a retryable flag so callers can
 * decide whether to re-invoke an operation without parsing messages.
 */

export type FeatureStoreErrorClass =
  | 'LIFECYCLE'
  | 'POLLING'
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'PARAMETERS';

/**
 * Base error for everything this library raises on purpose
 */
export class FeatureStoreError extends Error {
  constructor(
    message: string,
    public readonly error_class: FeatureStoreErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A feature group landed in a failure status (or vanished) while being polled.
 * Fatal to the calling workflow; never retried here.
 */
export class ResourceLifecycleError extends FeatureStoreError {
  constructor(
    public readonly featureGroupName: string,
    public readonly status: string,
    public readonly failureReason?: string
  ) {
    super(
      `Feature group ${featureGroupName} reached status ${status}` +
        (failureReason ? `: ${failureReason}` : ''),
      'LIFECYCLE',
      'RESOURCE_LIFECYCLE_FAILED',
      false
    );
  }
}

export class PollingCancelledError extends FeatureStoreError {
  constructor(public readonly operation: string, public readonly polls: number) {
    super(`${operation} cancelled after ${polls} poll(s)`, 'POLLING', 'POLLING_CANCELLED', false);
  }
}

/**
 * Raised before a sleep that would cross the caller's deadline
 */
export class PollingDeadlineExceededError extends FeatureStoreError {
  constructor(
    public readonly operation: string,
    public readonly timeoutSeconds: number,
    public readonly polls: number
  ) {
    super(
      `${operation} did not finish within ${timeoutSeconds}s (${polls} poll(s))`,
      'POLLING',
      'POLLING_DEADLINE_EXCEEDED',
      true
    );
  }
}

export class FeatureStoreValidationError extends FeatureStoreError {
  constructor(message: string, errorCode?: string) {
    super(message, 'VALIDATION', errorCode || 'VALIDATION_FAILED', false);
  }
}

export class FeatureStoreConfigurationError extends FeatureStoreError {
  constructor(message: string, errorCode?: string) {
    super(message, 'CONFIGURATION', errorCode || 'CONFIGURATION_INVALID', false);
  }
}

/**
 * Parameter store errors
 */
export class ParameterNamespaceMissingError extends FeatureStoreError {
  constructor(public readonly namespace: string) {
    super(
      `Namespace "${namespace}" does not exist; call create() before modifying it`,
      'PARAMETERS',
      'NAMESPACE_MISSING',
      false
    );
  }
}

export class ParameterKeyNotFoundError extends FeatureStoreError {
  constructor(public readonly namespace: string, public readonly key: string) {
    super(`Key "${key}" not found in namespace "${namespace}"`, 'PARAMETERS', 'KEY_NOT_FOUND', false);
  }
}

export class ParameterFileNotFoundError extends FeatureStoreError {
  constructor(public readonly filePath: string) {
    super(`Parameter file not found: ${filePath}`, 'PARAMETERS', 'FILE_NOT_FOUND', false);
  }
}

export class ParameterFileParseError extends FeatureStoreError {
  constructor(public readonly filePath: string, detail: string, originalError?: Error) {
    super(`Parameter file ${filePath} is not a valid parameter document: ${detail}`, 'PARAMETERS', 'FILE_PARSE_FAILED', false);
    if (originalError) {
      this.cause = originalError;
    }
  }
}
