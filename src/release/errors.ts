export type ReleaseErrorCode =
  | 'CONFIG_ERROR'
  | 'DEPENDENCY_MISSING'
  | 'PARSE_FAILURE'
  | 'TOOL_FAILURE'
  | 'VERIFY_FAILURE'
  | 'CLEANUP_FAILURE';

export type ReleaseStep =
  | 'config'
  | 'dependencies'
  | 'read-version'
  | 'bump'
  | 'write-version'
  | 'verify'
  | 'cleanup'
  | 'build'
  | 'publish';

/**
 * Failure of a single release step. `exitCode` is what the process exits
 * with; for subprocess failures it is the subprocess's own exit code.
 */
export class ReleaseError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseErrorCode,
    public readonly step: ReleaseStep,
    public readonly exitCode: number = 1,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ReleaseError';
  }
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: ReleaseError };

export function ok<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ReleaseError): StepResult<T> {
  return { ok: false, error };
}

/**
 * Exit codes of 0 can't signal failure; anything outside 1-255 is clamped to 1.
 */
export function failureExitCode(code: number | null | undefined): number {
  if (code === null || code === undefined || !Number.isInteger(code) || code < 1 || code > 255) {
    return 1;
  }
  return code;
}
