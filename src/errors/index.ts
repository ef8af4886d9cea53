/**
 * Deployment error taxonomy.
 * Every failure a pass can surface is one of these classes, identified by `code`.
 */

export type DeploymentErrorCode =
  | 'BUILD_FAILED'
  | 'PUSH_FAILED'
  | 'INVALID_CONFIGURATION'
  | 'TIMEOUT'
  | 'REPLACE_FAILED_POST_DELETE'
  | 'PLATFORM_ERROR'
  | 'STATE_STORE_ERROR'
  | 'CANCELLED';

/**
 * Base error class for all deployment errors
 */
export abstract class DeploymentError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public abstract readonly code: DeploymentErrorCode;
  /** Whether repeating the same call may succeed */
  public readonly retryable: boolean = false;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    code: DeploymentErrorCode;
    message: string;
    retryable: boolean;
    timestamp: string;
    context: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

/**
 * The build engine reported a failure. Builds are deterministic for fixed
 * inputs, so this is never retried.
 */
export class BuildFailedError extends DeploymentError {
  readonly code = 'BUILD_FAILED';
}

export class PushFailedError extends DeploymentError {
  readonly code = 'PUSH_FAILED';
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly attempts: number,
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, attempts });
  }
}

export class InvalidConfigurationError extends DeploymentError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(
    message: string,
    public readonly violations: string[] = [],
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, violations });
  }
}

export class TimeoutError extends DeploymentError {
  readonly code = 'TIMEOUT';

  constructor(
    message: string,
    public readonly timeoutMs: number,
    context: Record<string, unknown> = {},
  ) {
    super(message, { ...context, timeoutMs });
  }
}

/**
 * The old service was deleted but its replacement could not be created.
 * The resource may be gone; an operator has to look at it.
 */
export class ReplaceFailedPostDeleteError extends DeploymentError {
  readonly code = 'REPLACE_FAILED_POST_DELETE';

  constructor(
    message: string,
    public readonly deleted: { name: string; region: string },
    public override readonly cause?: DeploymentError,
  ) {
    super(message, { deleted, cause: cause?.code });
  }
}

export class PlatformError extends DeploymentError {
  readonly code = 'PLATFORM_ERROR';
}

export class StateStoreError extends DeploymentError {
  readonly code = 'STATE_STORE_ERROR';
}

export class CancelledError extends DeploymentError {
  readonly code = 'CANCELLED';

  constructor(message = 'Deployment cancelled', context: Record<string, unknown> = {}) {
    super(message, context);
  }
}

export function isDeploymentError(error: unknown): error is DeploymentError {
  return error instanceof DeploymentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
