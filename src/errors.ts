import type { HealthSnapshot } from './modules/health/monitor.js';

export type ErrorKind =
  | 'NotFound'
  | 'IllegalTransition'
  | 'VersionConflict'
  | 'BackendUnavailable'
  | 'ValidationError';

export type BackendName = 'relational' | 'search' | 'cache';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly statusCode: number;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly kind = 'NotFound';
  readonly statusCode = 404;

  constructor(
    readonly entityType: string,
    readonly id: string
  ) {
    super(`${entityType} ${id} not found`);
  }
}

export class IllegalTransitionError extends AppError {
  readonly kind = 'IllegalTransition';
  readonly statusCode = 409;

  constructor(
    readonly entityType: string,
    readonly from: string,
    readonly event: string
  ) {
    super(`Cannot ${event} ${entityType} in status "${from}"`);
  }
}

export class VersionConflictError extends AppError {
  readonly kind = 'VersionConflict';
  readonly statusCode = 409;
  override readonly retryable = true;

  constructor(
    readonly entityType: string,
    readonly id: string,
    readonly expectedVersion: number
  ) {
    super(`${entityType} ${id} was modified concurrently (expected version ${expectedVersion})`);
  }
}

export class BackendUnavailableError extends AppError {
  readonly kind = 'BackendUnavailable';
  readonly statusCode = 503;
  health?: HealthSnapshot;

  constructor(
    readonly backend: BackendName,
    cause?: unknown
  ) {
    super(`${backend} store is unavailable`, { cause });
  }
}

export class ValidationError extends AppError {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly details?: Record<string, string[] | undefined>
  ) {
    super(message);
  }
}

export function isBackendUnavailable(error: unknown, backend?: BackendName): error is BackendUnavailableError {
  return error instanceof BackendUnavailableError && (backend === undefined || error.backend === backend);
}
