const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * Parse a numeric command-line option. Only plain digit strings are accepted,
 * so `5abc`, `-1` and `1e3` are rejected rather than truncated.
 */
export function parseCount(value: string, name: string): number {
  if (!NON_NEGATIVE_INTEGER.test(value)) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}
