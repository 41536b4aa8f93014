export type LibraryErrorCode = 'INPUT_INVALID' | 'INDEX_BUILD_FAILED' | 'EXTRACTION_FAILED';

export class LibraryError extends Error {
  readonly code: LibraryErrorCode;
  readonly metadata: Record<string, unknown>;

  constructor(message: string, code: LibraryErrorCode, options: { cause?: unknown; metadata?: Record<string, unknown> } = {}) {
    super(message, { cause: options.cause });
    this.name = 'LibraryError';
    this.code = code;
    this.metadata = options.metadata ?? {};
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, metadata: this.metadata };
  }
}

/** Caller supplied arguments the query layer cannot act on. */
export class InputError extends LibraryError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'INPUT_INVALID', { metadata });
    this.name = 'InputError';
  }
}

export class IndexBuildError extends LibraryError {
  constructor(message: string, cause?: unknown, metadata?: Record<string, unknown>) {
    super(message, 'INDEX_BUILD_FAILED', { cause, metadata });
    this.name = 'IndexBuildError';
  }
}

export function isInputError(err: unknown): err is InputError {
  return err instanceof LibraryError && err.code === 'INPUT_INVALID';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
