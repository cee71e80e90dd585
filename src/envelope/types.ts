/**
 * Envelope: the normalized result of any capability call.
 */

export const ErrorKind = {
  VALIDATION: "ValidationError",
  DECODE: "DecodeError",
  SERVICE: "ServiceError",
  UNEXPECTED: "UnexpectedError",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface Success<T> {
  ok: true;
  payload: T;
}

export interface Failure {
  ok: false;
  errorKind: ErrorKind;
  message: string;
  details: Record<string, unknown>;
}

export type Envelope<T> = Success<T> | Failure;

export function success<T>(payload: T): Success<T> {
  return { ok: true, payload };
}

export function failure(
  errorKind: ErrorKind,
  message: string,
  details: Record<string, unknown> = {},
): Failure {
  return { ok: false, errorKind, message, details };
}
