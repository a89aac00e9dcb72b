export enum Conjunction {
  AND = 'and',
  OR = 'or',
}

/**
 * Converts the array of string items to a single textual string where elements are
 * comma-separated, and an "and" is inserted as necessary., e.g.
 * `['a'] => 'a'`
 * `['a', 'b'] => 'a and b'`
 * `['a', 'b', 'c'] => 'a, b, and c'`
 *
 * Oxford commas are used.
 *
 * @param items - The items to be converted to text
 * @param joinWord - The word used before the last item
 * @returns The resulting textual string
 */
export function listToText(items: string[] | undefined, joinWord = Conjunction.AND): string {
  if (!items) return '';
  switch (items.length) {
    case 0: return '';
    case 1: return items[0];
    case 2: return items.join(` ${joinWord} `);
    default: {
      const result = items.concat(); // Copies the array
      result[result.length - 1] = `${joinWord} ${result[result.length - 1]}`;
      return result.join(', ');
    }
  }
}

/**
 * Returns true if a string is an integer.
 * @param value - the value to check
 * @returns true if it is an integer and false otherwise
 */
export function isInteger(value: string): boolean {
  return /^-?\d+$/.test(value);
}

/**
 * Returns true if a string is a decimal number that is not an integer, e.g. "1.5" or "-.25"
 * @param value - the value to check
 */
export function isFloat(value: string): boolean {
  return /^-?\d*\.\d+$/.test(value);
}

/**
 * Returns true if a string spells out a boolean
 * @param value - the value to check
 */
export function isBoolean(value: string): boolean {
  return /^(true|false)$/i.test(value);
}

/**
 * Parses "true" or "false" (in any case) into a boolean. Anything else is false.
 * @param value - the string to parse
 */
export function parseBoolean(value: string): boolean {
  return value?.toLowerCase() === 'true';
}

/**
 * Parses a string as a port number, returning null when it is not a non-negative integer
 *
 * @param value - The string to parse, possibly null
 * @returns the port or null
 */
export function parsePort(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return parseInt(trimmed, 10);
}
