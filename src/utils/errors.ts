export type AppErrorKind =
  | 'NotFound'
  | 'Forbidden'
  | 'InvalidInput'
  | 'QuotaExceeded'
  | 'Conflict'
  | 'Expired'
  | 'Gone'
  | 'Unauthorized';

const statusByKind: Record<AppErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  InvalidInput: 400,
  QuotaExceeded: 413,
  Conflict: 409,
  Expired: 410,
  Gone: 410,
  Unauthorized: 401,
};

export class AppError extends Error {
  public readonly kind: AppErrorKind;

  public constructor(kind: AppErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'AppError';
    this.kind = kind;
    this.cause = cause;
  }

  public get status(): number {
    return statusByKind[this.kind];
  }
}

export const notFound = (message: string): AppError => new AppError('NotFound', message);
export const forbidden = (message: string): AppError => new AppError('Forbidden', message);
export const invalidInput = (message: string): AppError => new AppError('InvalidInput', message);
export const conflict = (message: string): AppError => new AppError('Conflict', message);
export const unauthorized = (message: string): AppError => new AppError('Unauthorized', message);

export function isAppError(error: unknown, kind?: AppErrorKind): error is AppError {
  return error instanceof AppError && (kind === undefined || error.kind === kind);
}
