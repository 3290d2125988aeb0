/**
 * Custom error types for cluster-bootstrap.
 *
 * Adapters (command runner, Docker, Kubernetes) throw the infrastructure errors;
 * pipeline stages convert them into one of the deployment error kinds and hand
 * them back inside a Result.
 */

export const ErrorCodes = {
  // Pipeline stages
  NO_BACKEND_AVAILABLE: 'NO_BACKEND_AVAILABLE',
  CLUSTER_PROVISION_FAILED: 'CLUSTER_PROVISION_FAILED',
  REGISTRY_BRIDGE_FAILED: 'REGISTRY_BRIDGE_FAILED',
  MANIFEST_APPLY_FAILED: 'MANIFEST_APPLY_FAILED',
  ROLLOUT_TIMED_OUT: 'ROLLOUT_TIMED_OUT',
  ROLLOUT_ERRORED: 'ROLLOUT_ERRORED',
  HEALTH_CHECK_FAILED: 'HEALTH_CHECK_FAILED',

  // Infrastructure
  COMMAND_FAILED: 'COMMAND_FAILED',
  DOCKER_ERROR: 'DOCKER_ERROR',
  K8S_ERROR: 'K8S_ERROR',
  K8S_NOT_FOUND: 'K8S_NOT_FOUND',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: ErrorCode,
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

  toJSON(): SerializedError {
    const context = Object.fromEntries(
      Object.entries(this.context).filter(([, value]) => value !== undefined),
    );
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(Object.keys(context).length > 0 && { context }),
    };
  }
}

/**
 * Thrown when an external tool (kind, minikube) exits non-zero
 */
export class CommandError extends ApplicationError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
    cause?: Error,
  ) {
    super(message, ErrorCodes.COMMAND_FAILED, { command, exitCode }, cause);
    this.name = 'CommandError';
  }
}

/**
 * Thrown when Docker operations fail
 */
export class DockerError extends ApplicationError {
  constructor(
    message: string,
    public readonly operation?: string | undefined,
    public readonly statusCode?: number | undefined,
    cause?: Error,
  ) {
    super(message, ErrorCodes.DOCKER_ERROR, { operation, statusCode }, cause);
    this.name = 'DockerError';
  }
}

/**
 * Thrown when Kubernetes operations fail
 */
export class KubernetesError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.K8S_ERROR,
    public readonly resource?: string | undefined,
    public readonly namespace?: string | undefined,
    public readonly statusCode?: number | undefined,
    cause?: Error,
  ) {
    super(message, code, { resource, namespace, statusCode }, cause);
    this.name = 'KubernetesError';
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, ErrorCodes.CONFIG_ERROR, issues.length > 0 ? { issues } : undefined);
    this.name = 'ConfigurationError';
  }
}

/**
 * Neither kind nor minikube is installed (or the forced one is missing)
 */
export class NoBackendAvailableError extends ApplicationError {
  constructor(
    message: string,
    public readonly searched: readonly string[],
  ) {
    super(message, ErrorCodes.NO_BACKEND_AVAILABLE, { searched });
    this.name = 'NoBackendAvailableError';
  }
}

export class ClusterProvisionError extends ApplicationError {
  constructor(
    message: string,
    public readonly cluster: string,
    cause?: Error,
  ) {
    super(message, ErrorCodes.CLUSTER_PROVISION_FAILED, { cluster }, cause);
    this.name = 'ClusterProvisionError';
  }
}

export class RegistryBridgeError extends ApplicationError {
  constructor(
    message: string,
    public readonly registry: string,
    public readonly network: string | null,
    cause?: Error,
  ) {
    super(message, ErrorCodes.REGISTRY_BRIDGE_FAILED, { registry, network }, cause);
    this.name = 'RegistryBridgeError';
  }
}

/**
 * A manifest could not be applied; `resource` is `Kind/name`.
 * Resources applied before the failure stay in the cluster.
 */
export class ManifestApplyError extends ApplicationError {
  constructor(
    message: string,
    public readonly resource: string,
    cause?: Error,
  ) {
    super(message, ErrorCodes.MANIFEST_APPLY_FAILED, { resource }, cause);
    this.name = 'ManifestApplyError';
  }
}

export class RolloutError extends ApplicationError {
  constructor(
    message: string,
    code: typeof ErrorCodes.ROLLOUT_TIMED_OUT | typeof ErrorCodes.ROLLOUT_ERRORED,
    public readonly deployment: string,
    public readonly namespace: string,
  ) {
    super(message, code, { deployment, namespace });
    this.name = 'RolloutError';
  }
}

/**
 * Advisory only, never aborts a run
 */
export class HealthCheckError extends ApplicationError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly attempts: number,
  ) {
    super(message, ErrorCodes.HEALTH_CHECK_FAILED, { endpoint, attempts });
    this.name = 'HealthCheckError';
  }
}

/**
 * A non-application error escaped a pipeline stage
 */
export class InternalError extends ApplicationError {
  constructor(
    message: string,
    public readonly stage: string,
    cause?: Error,
  ) {
    super(message, ErrorCodes.INTERNAL_ERROR, { stage }, cause);
    this.name = 'InternalError';
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

/**
 * Extract a message from anything thrown
 */
function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Error-shaped values are matched by shape: errors raised inside Node itself
 * (fs, fetch) are not `instanceof Error` in a sandboxed realm such as Jest's.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error || hasMessage(error)) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/** The `code` of a system error such as ENOENT */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(extractErrorMessage(error));
}
