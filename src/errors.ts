export type BuildErrorCode =
  | 'UNKNOWN_PROFILE'
  | 'COMPILE_FAILED'
  | 'ARCHIVE_FAILED'
  | 'LINK_FAILED'
  | 'TOOLCHAIN_NOT_FOUND'
  | 'OBJECT_NAME_COLLISION'
  | 'INVALID_CONFIG';

export type BuildErrorDetails = {
  command?: string[];
  status?: number | null;
  /** Raw toolchain output, kept verbatim. */
  output?: string;
  paths?: string[];
};

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly details?: BuildErrorDetails;

  constructor(code: BuildErrorCode, message: string, details?: BuildErrorDetails) {
    super(message);
    this.name = 'BuildError';
    this.code = code;
    this.details = details;
  }
}

export function isBuildError(value: unknown): value is BuildError {
  return value instanceof BuildError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
