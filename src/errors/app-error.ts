export type AppErrorKind = 'not_found' | 'bad_request' | 'validation' | 'database' | 'internal';

const STATUS_BY_KIND: Record<AppErrorKind, number> = {
  not_found: 404,
  bad_request: 400,
  validation: 400,
  database: 500,
  internal: 500,
};

/**
 * Application error carrying the HTTP status it should surface with
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    public readonly kind: AppErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = STATUS_BY_KIND[kind];
    this.isOperational = kind !== 'database' && kind !== 'internal';
  }

  static notFound(message: string): AppError {
    return new AppError('not_found', message);
  }

  static badRequest(message: string): AppError {
    return new AppError('bad_request', message);
  }

  static validation(message: string): AppError {
    return new AppError('validation', message);
  }

  static database(error: unknown): AppError {
    const detail = error instanceof Error ? error.message : String(error);
    return new AppError('database', `Database error: ${detail}`, { cause: error });
  }

  static internal(message: string, cause?: unknown): AppError {
    return new AppError('internal', `Internal server error: ${message}`, { cause });
  }
}

/**
 * Pull the SQLSTATE code out of a driver error, looking through `cause`
 * wrappers added by the ORM
 */
export const getPgErrorCode = (error: unknown): string | undefined => {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }

  return undefined;
};
