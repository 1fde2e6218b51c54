import { Error as MongooseError } from 'mongoose';

export type ServiceErrorKind =
  | 'validation'
  | 'not_found'
  | 'persistence'
  | 'internal';

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
  /** Set when the store refused the document itself (schema or unique index). */
  rejected?: boolean;
  cause?: unknown;
}

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ServiceError };

export const ok = <T>(value: T): ServiceResult<T> => ({ ok: true, value });

export const failure = (error: ServiceError): ServiceResult<never> => ({
  ok: false,
  error,
});

export const validationError = (message: string): ServiceResult<never> =>
  failure({ kind: 'validation', message });

export const notFoundError = (message: string): ServiceResult<never> =>
  failure({ kind: 'not_found', message });

export const persistenceError = (
  message: string,
  cause?: unknown,
): ServiceResult<never> =>
  failure({
    kind: 'persistence',
    message,
    rejected: isStoreRejection(cause),
    cause,
  });

export const internalError = (
  message: string,
  cause?: unknown,
): ServiceResult<never> => failure({ kind: 'internal', message, cause });

export function isStoreRejection(error: unknown): boolean {
  if (error instanceof MongooseError.ValidationError) {
    return true;
  }
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 11000
  );
}

export function describeError(error: unknown): {
  message: string;
  stack?: string;
} {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
