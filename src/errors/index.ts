/**
 * Error types raised by the deployer.
 * Every error carries a stable `code` so callers can branch without string matching.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
    cause?: { message: string };
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      ...(this.stack !== undefined && { stack: this.stack }),
      ...(this.cause !== undefined && { cause: { message: this.cause.message } }),
    };
  }
}

/**
 * Thrown when deploying an app id that already has instances, or whose
 * resources the cluster reports as already existing.
 */
export class DeploymentConflictError extends ApplicationError {
  constructor(
    public readonly appId: string,
    cause?: Error,
  ) {
    super(`App '${appId}' is already deployed`, 'DEPLOYMENT_CONFLICT', { appId }, cause);
    this.name = 'DeploymentConflictError';
  }
}

/**
 * Thrown when a numeric property (port, replica count) does not parse as an integer
 */
export class NumberFormatError extends ApplicationError {
  constructor(
    public readonly property: string,
    public readonly value: string,
  ) {
    super(`Property '${property}' is not an integer: '${value}'`, 'NUMBER_FORMAT', {
      property,
      value,
    });
    this.name = 'NumberFormatError';
  }
}

/**
 * Error thrown when Kubernetes operations fail
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    code: string = 'K8S_ERROR',
    public readonly operation?: string | undefined,
    public readonly resource?: string | undefined,
    public readonly namespace?: string | undefined,
    public readonly statusCode?: number | undefined,
    cause?: Error,
  ) {
    super(message, code, { operation, resource, namespace, statusCode }, cause);
    this.name = 'KubernetesError';
  }
}

/**
 * Raised when tearing down an app fails part way. Steps already completed are not undone.
 */
export class UndeployError extends ApplicationError {
  constructor(
    public readonly appId: string,
    cause?: Error,
  ) {
    super(
      `Failed to undeploy app '${appId}'${cause ? `: ${cause.message}` : ''}`,
      'UNDEPLOY_FAILED',
      { appId },
      cause,
    );
    this.name = 'UndeployError';
  }
}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields?: string[],
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, fields });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly violations: Array<{ path: string; message: string }> = [],
    cause?: Error,
  ) {
    super(message, 'CONFIG_ERROR', { violations }, cause);
    this.name = 'ConfigurationError';
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Result type for boundaries that report failures as values (the CLI)
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string; code: string };

/**
 * Execute function and convert thrown errors to a Result
 */
export async function executeAsResult<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    const value = await fn();
    return { ok: true, value };
  } catch (error) {
    if (isApplicationError(error)) {
      return { ok: false, error: error.message, code: error.code };
    }
    return { ok: false, error: toError(error).message, code: 'INTERNAL_ERROR' };
  }
}
