/** Machine-readable failure codes for an export run. */
export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'SOURCE_UNAVAILABLE'
  | 'SOURCE_TIMEOUT'
  | 'SOURCE_ERROR'
  | 'VERSION_UNSUPPORTED'
  | 'INVALID_PAYLOAD'
  | 'INVARIANT_VIOLATION'
  | 'THUMBNAIL_FAILED'
  | 'ABORTED';

/**
 * Maps known error codes to process exit statuses.
 * Unrecognised errors default to 1.
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  CONFIG_MISSING: 2,
  CONFIG_INVALID: 2,
  SOURCE_UNAVAILABLE: 3,
  SOURCE_TIMEOUT: 3,
  SOURCE_ERROR: 3,
  VERSION_UNSUPPORTED: 4,
  INVALID_PAYLOAD: 5,
  INVARIANT_VIOLATION: 5,
  THUMBNAIL_FAILED: 6,
  ABORTED: 130,
};

export class ExportError extends Error {
  readonly code: ErrorCode;
  /** HTTP status of the source response, when the failure came from one. */
  readonly status?: number;

  constructor(code: ErrorCode, message: string, opts: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'ExportError';
    this.code = code;
    this.status = opts.status;
  }
}

/** Throws INVARIANT_VIOLATION when the condition does not hold. */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new ExportError('INVARIANT_VIOLATION', message);
  }
}

/**
 * Derives an error code from any thrown value, falling back to INTERNAL_ERROR.
 */
export function deriveErrorCode(error: unknown): ErrorCode | 'INTERNAL_ERROR' {
  if (error instanceof ExportError) return error.code;
  return 'INTERNAL_ERROR';
}

/** Process exit status for a failed run. */
export function exitCodeFor(error: unknown): number {
  const code = deriveErrorCode(error);
  return code === 'INTERNAL_ERROR' ? 1 : EXIT_CODE_MAP[code];
}
