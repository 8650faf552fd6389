import { InvalidArgumentError } from 'commander';

/**
 * commander parser for counts (`--abbrev 3`, `plan-batch … 10`).
 * Rejections surface as usage errors, not stack traces.
 */
export function positiveInt(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return n;
}
