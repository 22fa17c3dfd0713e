/**
 * Runtime Values
 *
 * Value model, truthiness, equality and canonical string form.
 */

import type { TarnCallable, TarnInstance } from './callable.js';
import { formatCallable, isCallable, isInstance } from './callable.js';

/** Every value a Tarn program can produce. `null` is nil. */
export type TarnValue =
  | null
  | boolean
  | number
  | string
  | TarnCallable
  | TarnInstance;

/** Only nil and false are falsy; 0 and "" are truthy */
export function isTruthy(value: TarnValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  return true;
}

/**
 * Equality without coercion.
 * Primitives compare by value, callables and instances by identity.
 */
export function valuesEqual(a: TarnValue, b: TarnValue): boolean {
  return a === b;
}

/**
 * Canonical number form: integral values drop the fractional part,
 * negative zero keeps its sign.
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

/** String form used by `print` */
export function formatValue(value: TarnValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (isCallable(value)) return formatCallable(value);
  return `${value.klass.name} instance`;
}

/** Runtime type name of a value, for hosts inspecting results */
export function inferType(value: TarnValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (isInstance(value)) return 'instance';
  return value.kind === 'class' ? 'class' : 'function';
}
