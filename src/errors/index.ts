/**
 * Warehouse Provisioning Error Types
 *
 * Error classes for the cluster lifecycle controller, the AWS service
 * wrappers and the CLI.
 * @module dwh-provisioner/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes mapped to categories.
 */
export enum DwhErrorCode {
  // Usage errors
  USAGE = 'DWH_USAGE',

  // Configuration errors
  INVALID_CONFIG = 'DWH_INVALID_CONFIG',
  MISSING_CONFIG = 'DWH_MISSING_CONFIG',

  // Control-plane errors
  CONTROL_PLANE_FAILED = 'DWH_CONTROL_PLANE_FAILED',
  THROTTLED = 'DWH_THROTTLED',
  ACCESS_DENIED = 'DWH_ACCESS_DENIED',
  SECRET_RESOLUTION_FAILED = 'DWH_SECRET_RESOLUTION_FAILED',

  // Wait errors
  WAIT_TIMEOUT = 'DWH_WAIT_TIMEOUT',
  WAIT_ABORTED = 'DWH_WAIT_ABORTED',

  // General errors
  UNKNOWN_ERROR = 'DWH_UNKNOWN_ERROR',
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all provisioning errors.
 */
export class DwhError extends Error {
  /** Error code */
  readonly code: DwhErrorCode;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Additional context */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: DwhErrorCode,
    options?: {
      cause?: Error;
      retryable?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'DwhError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.context = options?.context;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a detailed error message including context.
   */
  toDetailedString(): string {
    const parts = [`${this.name} [${this.code}]: ${this.message}`];
    if (this.cause instanceof Error) parts.push(`Caused by: ${this.cause.message}`);
    if (this.context) parts.push(`Context: ${JSON.stringify(this.context)}`);
    return parts.join('\n');
  }
}

// ============================================================================
// Usage Errors
// ============================================================================

/**
 * Invalid command-line usage, raised before any external call is made.
 */
export class UsageError extends DwhError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DwhErrorCode.USAGE, { retryable: false, context });
    this.name = 'UsageError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends DwhError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, DwhErrorCode.INVALID_CONFIG, { retryable: false, context });
    this.name = 'ConfigurationError';
  }
}

/**
 * Missing configuration error.
 */
export class MissingConfigurationError extends DwhError {
  constructor(configKey: string) {
    super(`Missing required configuration: ${configKey}`, DwhErrorCode.MISSING_CONFIG, {
      retryable: false,
      context: { configKey },
    });
    this.name = 'MissingConfigurationError';
  }
}

// ============================================================================
// Control-Plane Errors
// ============================================================================

/**
 * AWS service a control-plane call was made against.
 */
export type AwsService = 'iam' | 'redshift' | 'secretsmanager';

/**
 * A failed AWS control-plane call.
 */
export class ControlPlaneError extends DwhError {
  /** Service the call was made against */
  readonly service: AwsService;
  /** API operation name */
  readonly operation: string;
  /** AWS error name (exception shape), if the SDK reported one */
  readonly awsErrorName?: string;
  /** HTTP status code of the failed response */
  readonly httpStatusCode?: number;

  constructor(
    service: AwsService,
    operation: string,
    message: string,
    options?: {
      code?: DwhErrorCode;
      awsErrorName?: string;
      httpStatusCode?: number;
      cause?: Error;
      retryable?: boolean;
    }
  ) {
    super(`${service}:${operation} failed: ${message}`, options?.code ?? DwhErrorCode.CONTROL_PLANE_FAILED, {
      cause: options?.cause,
      retryable: options?.retryable ?? false,
      context: {
        service,
        operation,
        awsErrorName: options?.awsErrorName,
        httpStatusCode: options?.httpStatusCode,
      },
    });
    this.name = 'ControlPlaneError';
    this.service = service;
    this.operation = operation;
    this.awsErrorName = options?.awsErrorName;
    this.httpStatusCode = options?.httpStatusCode;
  }
}

/**
 * The cluster master password could not be read from Secrets Manager.
 */
export class SecretResolutionError extends DwhError {
  constructor(secretId: string, message: string, cause?: Error) {
    super(`Failed to resolve secret ${secretId}: ${message}`, DwhErrorCode.SECRET_RESOLUTION_FAILED, {
      cause,
      retryable: false,
      context: { secretId },
    });
    this.name = 'SecretResolutionError';
  }
}

// ============================================================================
// Wait Errors
// ============================================================================

/**
 * The polling budget ran out before the target status was observed.
 */
export class WaitTimeoutError extends DwhError {
  /** Status that was waited for */
  readonly target: string;
  /** Last status observed before giving up */
  readonly lastStatus: string;
  /** Number of status checks performed */
  readonly attempts: number;

  constructor(target: string, lastStatus: string, attempts: number) {
    super(
      `Gave up waiting for status '${target}' after ${attempts} attempts (last status: '${lastStatus}')`,
      DwhErrorCode.WAIT_TIMEOUT,
      { retryable: true, context: { target, lastStatus, attempts } }
    );
    this.name = 'WaitTimeoutError';
    this.target = target;
    this.lastStatus = lastStatus;
    this.attempts = attempts;
  }
}

/**
 * Polling was cancelled through an AbortSignal.
 */
export class WaitAbortedError extends DwhError {
  /** Number of status checks performed before the abort */
  readonly attempts: number;

  constructor(target: string, attempts: number) {
    super(`Stopped waiting for status '${target}' after ${attempts} attempts`, DwhErrorCode.WAIT_ABORTED, {
      retryable: false,
      context: { target, attempts },
    });
    this.name = 'WaitAbortedError';
    this.attempts = attempts;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is a DwhError.
 */
export function isDwhError(error: unknown): error is DwhError {
  return error instanceof DwhError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (isDwhError(error)) {
    return error.retryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('temporarily unavailable')
    );
  }
  return false;
}

/**
 * Wraps an unknown error as a DwhError.
 */
export function wrapError(error: unknown, context?: string): DwhError {
  if (isDwhError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  const fullMessage = context ? `${context}: ${message}` : message;

  return new DwhError(fullMessage, DwhErrorCode.UNKNOWN_ERROR, {
    cause,
    retryable: isRetryableError(error),
  });
}

const THROTTLING_ERROR_NAMES = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'LimitExceededException',
]);

const ACCESS_DENIED_ERROR_NAMES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'UnauthorizedOperation',
  'UnrecognizedClientException',
  'InvalidClientTokenId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
]);

/**
 * Shape of the error fields the AWS SDK attaches to service exceptions.
 */
interface AwsSdkErrorFields {
  name?: string;
  $fault?: 'client' | 'server';
  $metadata?: { httpStatusCode?: number };
}

function readAwsFields(error: Error): AwsSdkErrorFields {
  const fields: AwsSdkErrorFields = { name: error.name };
  if ('$fault' in error && (error.$fault === 'client' || error.$fault === 'server')) {
    fields.$fault = error.$fault;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      fields.$metadata = { httpStatusCode: metadata.httpStatusCode };
    }
  }
  return fields;
}

/**
 * Converts an AWS SDK failure into a ControlPlaneError.
 *
 * Throttling and server faults are marked retryable, credential and
 * permission failures are not.
 */
export function wrapAwsError(service: AwsService, operation: string, error: unknown): ControlPlaneError {
  if (error instanceof ControlPlaneError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new ControlPlaneError(service, operation, String(error));
  }

  const fields = readAwsFields(error);
  const httpStatusCode = fields.$metadata?.httpStatusCode;
  const awsErrorName = fields.name && fields.name !== 'Error' ? fields.name : undefined;

  let code = DwhErrorCode.CONTROL_PLANE_FAILED;
  let retryable = fields.$fault === 'server' || (httpStatusCode !== undefined && httpStatusCode >= 500);

  if (awsErrorName && THROTTLING_ERROR_NAMES.has(awsErrorName)) {
    code = DwhErrorCode.THROTTLED;
    retryable = true;
  } else if (awsErrorName && ACCESS_DENIED_ERROR_NAMES.has(awsErrorName)) {
    code = DwhErrorCode.ACCESS_DENIED;
    retryable = false;
  } else if (!fields.$fault && httpStatusCode === undefined) {
    // Networking and credential-resolution failures never reached the service
    retryable = isRetryableError(error);
  }

  return new ControlPlaneError(service, operation, error.message, {
    code,
    awsErrorName,
    httpStatusCode,
    cause: error,
    retryable,
  });
}
