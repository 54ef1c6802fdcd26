/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Fatal condition detected before any task is submitted
 */
export class PreconditionError extends AppError {
  public readonly path?: string;

  constructor(message: string, path?: string, code = 'PRECONDITION_FAILED') {
    super(message, code);
    this.path = path;
  }
}

/**
 * Background directory holds no usable images
 */
export class EmptyPoolError extends PreconditionError {
  constructor(backgroundRoot: string) {
    super(`No background images found in ${backgroundRoot}`, backgroundRoot, 'EMPTY_BACKGROUND_POOL');
  }
}

/**
 * Relative path resolves outside of its root
 */
export class PathTraversalError extends AppError {
  public readonly root: string;
  public readonly relativePath: string;

  constructor(root: string, relativePath: string) {
    super(`Path "${relativePath}" escapes root ${root}`, 'PATH_TRAVERSAL');
    this.root = root;
    this.relativePath = relativePath;
  }
}

/**
 * Compositing pipeline stage that failed
 */
export type CompositingStage =
  | 'read-foreground'
  | 'read-background'
  | 'extract-subject'
  | 'composite'
  | 'save';

/**
 * Failure while producing a single composite image
 */
export class CompositingError extends AppError {
  public readonly stage: CompositingStage;
  public readonly filePath: string;
  public readonly originalError?: Error;

  constructor(stage: CompositingStage, filePath: string, message: string, originalError?: Error) {
    super(`${stage} failed for ${filePath}: ${message}`, `COMPOSITING_${stage.toUpperCase().replace('-', '_')}`);
    this.stage = stage;
    this.filePath = filePath;
    this.originalError = originalError;
  }
}

/**
 * External API error (Stability, Photoroom)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;
  public readonly status?: number;
  public readonly originalError?: Error;

  constructor(service: string, message: string, options: { status?: number; originalError?: Error } = {}) {
    super(`${service}: ${message}`, 'EXTERNAL_API_ERROR');
    this.service = service;
    this.status = options.status;
    this.originalError = options.originalError;
  }
}

/**
 * Missing or unusable configuration
 */
export class ConfigurationError extends AppError {
  constructor(message: string, code = 'CONFIGURATION_ERROR') {
    super(message, code);
  }
}

/**
 * Worker process exited while it owned a task, or could not be started
 */
export class WorkerCrashError extends AppError {
  public readonly exitCode: number | null;
  public readonly signal: string | null;

  constructor(message: string, exitCode: number | null = null, signal: string | null = null) {
    super(message, 'WORKER_CRASHED', false);
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Stable error code for reporting, falling back to Node's errno code
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof AppError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'UNKNOWN_ERROR';
}
