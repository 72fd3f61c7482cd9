import { REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable archive operation error codes. */
export type CipherArchiveErrorCode =
  | 'ARCHIVE_PATH_NOT_FOUND'
  | 'ARCHIVE_NO_FILES'
  | 'ARCHIVE_INVALID_TARGET'
  | 'ARCHIVE_IO_FAILURE'
  | 'ARCHIVE_TRUNCATED'
  | 'ARCHIVE_BAD_HEADER'
  | 'ARCHIVE_PATH_TRAVERSAL'
  | 'ARCHIVE_CORRUPT'
  | 'ARCHIVE_INVALID_STATE'
  | 'ARCHIVE_INVALID_SETTINGS';

const BASE_CONTEXT_SHADOW_KEYS = new Set<string>([
  'schemaVersion',
  'name',
  'code',
  'message',
  'hint',
  'context'
]);

/** Error raised while identifying, packing or unpacking archive files. */
export class CipherArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: CipherArchiveErrorCode;
  /** Relative path of the entry involved, if available. */
  readonly entryName?: string | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a CipherArchiveError with a stable code. */
  constructor(
    code: CipherArchiveErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CipherArchiveError';
    this.code = code;
    this.entryName = options?.entryName;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: CipherArchiveErrorCode;
    message: string;
    context: Record<string, string>;
    entryName?: string;
  } {
    const shadowKeys = this.entryName !== undefined ? ['entryName'] : [];
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      context: sanitizeErrorContext(this.context, shadowKeys),
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {})
    };
  }
}

export function isCipherArchiveError(value: unknown, code?: CipherArchiveErrorCode): value is CipherArchiveError {
  if (!(value instanceof CipherArchiveError)) return false;
  return code === undefined || value.code === code;
}

/** Wrap an unknown failure, keeping CipherArchiveErrors as they are. */
export function toCipherArchiveError(
  err: unknown,
  code: CipherArchiveErrorCode,
  message: string,
  entryName?: string
): CipherArchiveError {
  if (err instanceof CipherArchiveError) return err;
  return new CipherArchiveError(code, `${message}: ${describeError(err)}`, {
    ...(entryName !== undefined ? { entryName } : {}),
    cause: err
  });
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelShadowKeys: readonly string[]
): Record<string, string> {
  if (!context) return {};
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (BASE_CONTEXT_SHADOW_KEYS.has(key) || topLevelShadowKeys.includes(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}
