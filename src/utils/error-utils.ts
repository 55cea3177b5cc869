import { TabularSourceError } from '../engines/errors';

const UNKNOWN_ERROR_TEXT = 'An unexpected error occurred';
const MAX_NESTING = 5;
const MESSAGE_KEYS = ['message', 'error', 'reason', 'cause'] as const;

const nonBlank = (text: string): string | null => {
  const trimmed = text.trim();
  return trimmed === '' || trimmed === '[object Object]' ? null : trimmed;
};

function describeObject(value: object, depth: number): string {
  for (const key of MESSAGE_KEYS) {
    const found = key in value ? messageOf(Reflect.get(value, key), depth + 1) : null;
    if (found) return found;
  }

  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(value);
  } catch {
    serialized = undefined; // circular
  }

  return serialized && serialized !== '{}' ? serialized : Object.prototype.toString.call(value);
}

function messageOf(value: unknown, depth = 0): string | null {
  if (depth > MAX_NESTING || value === null || value === undefined) {
    return null;
  }

  if (value instanceof Error) {
    const own = nonBlank(value.message);
    if (own) return own;

    const wrapped =
      value instanceof TabularSourceError ? messageOf(value.details?.originalError, depth + 1) : null;
    return wrapped ?? messageOf(value.cause, depth + 1);
  }

  switch (typeof value) {
    case 'string':
      return nonBlank(value);
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'object':
      return describeObject(value, depth);
    default:
      return null;
  }
}

/**
 * Display text for anything thrown by a source or the engine. Wrapped
 * causes are unwrapped until a non-empty message is found.
 */
export function getErrorMessage(error: unknown): string {
  return messageOf(error) ?? UNKNOWN_ERROR_TEXT;
}

/**
 * Whether the error should be offered a retry affordance.
 */
export function isRecoverableError(error: unknown): boolean {
  return error instanceof TabularSourceError && error.recoverable;
}
