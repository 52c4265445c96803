/**
 * Field validation shared by the entity facades.
 */

import { DomainError, ErrorKind, type FieldError } from '../client/errors';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^\+?[\d\s()-]+$/;

/** Strips angle brackets and surrounding whitespace from free text. */
export function sanitizeText(input: string): string {
  return input.replace(/[<>]/g, '').trim();
}

export function isEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isPhone(value: string): boolean {
  return PHONE_PATTERN.test(value);
}

export function isOneOf<V extends string>(value: unknown, allowed: readonly V[]): value is V {
  return allowed.some((candidate) => candidate === value);
}

/**
 * Collects field errors in insertion order.
 */
export class FieldErrors {
  private errors: FieldError[] = [];

  add(field: string, message: string): this {
    this.errors.push({ field, message });
    return this;
  }

  check(condition: boolean, field: string, message: string): this {
    if (!condition) this.add(field, message);
    return this;
  }

  list(): FieldError[] {
    return this.errors.slice();
  }

  get isEmpty(): boolean {
    return this.errors.length === 0;
  }
}

export function validationError(fieldErrors: readonly FieldError[], correlationId?: string): DomainError {
  return new DomainError({
    kind: ErrorKind.VALIDATION,
    message: `Validation failed: ${fieldErrors.map((error) => error.message).join(', ')}`,
    fieldErrors: [...fieldErrors],
    correlationId,
  });
}
