import { DecodeError, ValidationError } from './errors';
import type { UserInput } from './data/users';

const ID_PATTERN = /^[+-]?\d+$/;

export function parseUserId(raw: string): number {
  const id = Number(raw);
  if (!ID_PATTERN.test(raw) || !Number.isSafeInteger(id)) {
    throw new DecodeError('Invalid user ID');
  }
  return id;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeField(body: Record<string, unknown>, field: keyof UserInput): string {
  const value = body[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new DecodeError();
  }
  return value;
}

/**
 * Reads name and email from a parsed JSON body. Absent fields come back empty
 * so that validation, not decoding, reports them.
 */
export function decodeUserPayload(body: unknown): UserInput {
  if (!isPlainObject(body)) {
    throw new DecodeError();
  }
  return {
    name: decodeField(body, 'name'),
    email: decodeField(body, 'email'),
  };
}

// Whitespace-only counts as empty; values are kept as sent
function requireFields(input: UserInput): UserInput {
  if (!input.name.trim() || !input.email.trim()) {
    throw new ValidationError();
  }
  return input;
}

export function validateCreate(input: UserInput): UserInput {
  return requireFields(input);
}

export function validateUpdate(input: UserInput): UserInput {
  return requireFields(input);
}
