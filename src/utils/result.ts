// src/utils/result.ts

import type { DispatchError } from './errors';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface Success<T> {
  ok: true;
  data: T;
}

export interface Failure {
  ok: false;
  error: DispatchError;
}

/**
 * Outcome of every client operation. Service-level errors are carried as
 * values so callers can branch on `ok` without try/catch.
 */
export type Result<T = JsonObject> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { ok: true, data };
}

export function failure(error: DispatchError): Failure {
  return { ok: false, error };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
