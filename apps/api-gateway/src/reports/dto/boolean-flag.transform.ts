import type { TransformFnParams } from 'class-transformer';

const TRUE_VALUES = new Set(['true', '1', 'on', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'off', 'no']);

/**
 * Reads a boolean form field from the raw request body.
 *
 * Multipart fields arrive as strings, and implicit conversion would turn
 * "false" into `true`, so the original value is read from `obj`.
 * Unrecognised values are passed through for @IsBoolean() to reject.
 */
export function toBooleanFlag({ obj, key }: TransformFnParams): unknown {
  const raw: unknown = obj[key];
  if (typeof raw !== 'string') {
    return raw;
  }
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return raw;
}
