// src/lib/errors.ts
export type BackendErrorKind =
  | 'configuration'
  | 'connection'
  | 'protocol'
  | 'execution'
  | 'unavailable';

export class BackendError extends Error {
  readonly kind: BackendErrorKind;
  readonly backend: string;

  constructor(kind: BackendErrorKind, backend: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendError';
    this.kind = kind;
    this.backend = backend;
  }

  static connection(backend: string, message: string, cause?: unknown) {
    return new BackendError('connection', backend, message, { cause });
  }

  static protocol(backend: string, message: string, cause?: unknown) {
    return new BackendError('protocol', backend, message, { cause });
  }

  static execution(backend: string, message: string, cause?: unknown) {
    return new BackendError('execution', backend, message, { cause });
  }

  static unavailable(backend: string, message = `${backend} control not available`) {
    return new BackendError('unavailable', backend, message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : typeof err === 'string' ? err : String(err);
}

/** The `code` of a Node system error (`ENOENT`, `EACCES`...), if any. */
export function errorCode(err: unknown): string | null {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : null;
}
