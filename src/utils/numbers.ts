import { InvalidFieldError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a comma-grouped integer such as "1,234".
 * An empty value counts as 0.
 */
export function parseGroupedInt(value: string, field = 'value'): number {
  const trimmed = value.trim();
  if (trimmed === '') {
    return 0;
  }

  const digits = trimmed.replace(/,/g, '');
  if (!INTEGER_PATTERN.test(digits)) {
    throw new InvalidFieldError(field, value);
  }

  return Number.parseInt(digits, 10);
}
