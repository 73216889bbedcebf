/**
 * Response envelope used by every REST endpoint:
 * `{ success: true, data }` or `{ success: false, error }`.
 */
import type { ZodError } from 'zod';

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  errors?: FieldError[];
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export type Envelope<T> = SuccessResponse<T> | ErrorResponse;

export function createErrorResponse(error: string, errors?: FieldError[]): ErrorResponse {
  return {
    success: false,
    error,
    ...(errors && errors.length > 0 && { errors }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

/** String form of anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toFieldErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/** One-line summary of a validation failure, e.g. `departure_id: Required`. */
export function formatFieldErrors(errors: FieldError[]): string {
  return errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}
