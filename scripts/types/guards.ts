/**
 * Type guards and field readers for decoding untrusted JSON.
 */

import { MalformedDataError } from "./errors.ts";

/**
 * Checks whether a value is a string.
 */
export function isString(value: unknown): value is string {
  return typeof value === "string";
}

/**
 * Checks whether a value is a finite number.
 */
export function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Checks whether a value is a plain object (not null, not an array).
 */
export function isObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Checks whether a value is an array of strings.
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

/**
 * Field readers used by the decoders.
 *
 * A missing required field in upstream JSON throws MalformedDataError.
 */
export function expectObject(
  value: unknown,
  what: string,
): Record<string, unknown> {
  if (!isObject(value)) {
    throw new MalformedDataError(`Expected ${what} to be an object.`);
  }
  return value;
}

export function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedDataError(`Expected ${what} to be an array.`);
  }
  return value;
}

export function expectString(
  obj: Record<string, unknown>,
  key: string,
  what: string,
): string {
  const value = obj[key];
  if (!isString(value)) {
    throw new MalformedDataError(`Expected ${what}.${key} to be a string.`);
  }
  return value;
}

export function expectNumber(
  obj: Record<string, unknown>,
  key: string,
  what: string,
): number {
  const value = obj[key];
  if (!isNumber(value)) {
    throw new MalformedDataError(`Expected ${what}.${key} to be a number.`);
  }
  return value;
}

export function optionalString(
  obj: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = obj[key];
  return isString(value) ? value : undefined;
}

export function optionalBoolean(
  obj: Record<string, unknown>,
  key: string,
): boolean | undefined {
  const value = obj[key];
  return typeof value === "boolean" ? value : undefined;
}

export function optionalNumber(
  obj: Record<string, unknown>,
  key: string,
): number | undefined {
  const value = obj[key];
  return isNumber(value) ? value : undefined;
}
