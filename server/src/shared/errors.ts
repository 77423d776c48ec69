import { ResourceType } from './types';

/**
 * The addressed row does not exist, or its owning list does not.
 */
export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND' as const;
  readonly resourceType: ResourceType;
  readonly resourceId: number;

  constructor(resourceType: ResourceType, resourceId: number) {
    super(`${resourceType} with id ${resourceId} not found`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * The caller's version token is stale. Carries the stored version so the
 * caller can re-read before trying again.
 */
export class VersionConflictError extends Error {
  readonly code = 'VERSION_CONFLICT' as const;
  readonly resourceType: ResourceType;
  readonly resourceId: number;
  readonly currentVersion: number;
  readonly providedVersion: number;

  constructor(resourceType: ResourceType, resourceId: number, currentVersion: number, providedVersion: number) {
    super(
      `optimistic lock failed for ${resourceType} ${resourceId}: ` +
        `current version ${currentVersion}, provided version ${providedVersion}`
    );
    this.name = 'VersionConflictError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    this.currentVersion = currentVersion;
    this.providedVersion = providedVersion;
  }
}

/**
 * Matches errors by shape. Errors raised by the sqlite3 addon are created in
 * Node's main realm, so `instanceof Error` is false for them inside a vm
 * context such as Jest's.
 */
export function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export type ErrorContext = Record<string, string | number>;

/**
 * Storage unreachable, transaction failure, unexplained constraint violation
 * or a row that does not decode. Fatal to the current call.
 */
export class InfrastructureError extends Error {
  readonly code = 'INFRASTRUCTURE_FAILURE' as const;
  readonly operation: string;
  readonly context: ErrorContext;

  constructor(operation: string, context: ErrorContext, cause: unknown) {
    const details = Object.entries(context)
      .map(([key, value]) => `${key}=${value}`)
      .join(' ');
    const reason = isErrorLike(cause) ? cause.message : String(cause);
    super(`${operation} failed (${details}): ${reason}`, { cause });
    this.name = 'InfrastructureError';
    this.operation = operation;
    this.context = context;
  }
}

export function isDomainError(error: unknown): error is NotFoundError | VersionConflictError | InfrastructureError {
  return (
    error instanceof NotFoundError ||
    error instanceof VersionConflictError ||
    error instanceof InfrastructureError
  );
}
