export type BaselineErrorCode =
  | 'IdentityUnavailable'
  | 'ResourceListUnavailable'
  | 'ResourceReadError'
  | 'ResourceWriteError'
  | 'LogSinkCreateError';

const FATAL_CODES: ReadonlySet<BaselineErrorCode> = new Set<BaselineErrorCode>([
  'IdentityUnavailable',
  'ResourceListUnavailable',
  'LogSinkCreateError',
]);

export class BaselineError extends Error {
  readonly code: BaselineErrorCode;

  constructor(code: BaselineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BaselineError';
    this.code = code;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps an AWS SDK failure the same way for every call site:
 * `Failed to <action> for <target>: <cause>`.
 */
export function wrapError(
  code: BaselineErrorCode,
  action: string,
  target: string,
  error: unknown
): BaselineError {
  if (error instanceof BaselineError && error.code === code) {
    return error;
  }
  return new BaselineError(code, `Failed to ${action} for ${target}: ${errorMessage(error)}`, {
    cause: error,
  });
}
