/**
 * Error taxonomy and result values.
 *
 * Fatal conditions (unparseable collaborator output, invalid project
 * structure, path traversal, invalid config) are thrown as `DevcrewError`
 * subclasses. Best-effort operations return a `Result` instead.
 */

export type DevcrewErrorCode =
  | 'STRUCTURED_OUTPUT_INVALID'
  | 'PROJECT_STRUCTURE_INVALID'
  | 'PATH_TRAVERSAL'
  | 'CONFIG_INVALID'
  | 'DESTINATION_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'REPOSITORY_INVALID'
  | 'COLLABORATOR_FAILED';

export class DevcrewError extends Error {
  readonly code: DevcrewErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DevcrewErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DevcrewError';
    this.code = code;
    this.details = details;
  }
}

export class StructuredOutputError extends DevcrewError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('STRUCTURED_OUTPUT_INVALID', message, details);
    this.name = 'StructuredOutputError';
  }
}

export class ProjectStructureError extends DevcrewError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROJECT_STRUCTURE_INVALID', message, details);
    this.name = 'ProjectStructureError';
  }
}

export class PathTraversalError extends DevcrewError {
  constructor(target: string, base: string) {
    super('PATH_TRAVERSAL', `Path "${target}" resolves outside of "${base}"`, { target, base });
    this.name = 'PathTraversalError';
  }
}

export class ConfigError extends DevcrewError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, details);
    this.name = 'ConfigError';
  }
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True for a Node.js system error carrying the given errno code (e.g. ENOENT).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
