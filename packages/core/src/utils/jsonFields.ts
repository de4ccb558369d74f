/**
 * Field scanners for single-line JSON objects.
 *
 * Not a JSON parser: each lookup is a literal search for `"key":` followed by
 * a forward read to the value's natural terminator. Nesting depth is not
 * tracked, so a key that also appears at another level of the same line
 * yields whichever occurrence comes first.
 */

const STRING_ESCAPES = new Map<string, string>([
  ['"', '"'],
  ['\\', '\\'],
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
]);

const INT32_MAX = 2_147_483_647;

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

/** Index of the first character of `key`'s value, or -1 when the key is absent. */
function locateValue(line: string, key: string): number {
  const pattern = `"${key}":`;
  const at = line.indexOf(pattern);
  if (at < 0) return -1;

  let index = at + pattern.length;
  while (index < line.length && line[index] === ' ') index += 1;
  return index;
}

export function extractString(line: string, key: string): string | null {
  const start = locateValue(line, key);
  if (start < 0 || line[start] !== '"') return null;

  let value = '';
  for (let i = start + 1; i < line.length; i += 1) {
    const char = line.charAt(i);

    if (char === '\\' && i + 1 < line.length) {
      const unescaped = STRING_ESCAPES.get(line.charAt(i + 1));
      if (unescaped !== undefined) {
        value += unescaped;
        i += 1;
      } else {
        // unknown escapes (\uXXXX, \/) are kept verbatim
        value += char;
      }
      continue;
    }

    if (char === '"') break;
    value += char;
  }

  return value;
}

function readDigits(line: string, key: string): string {
  const start = locateValue(line, key);
  if (start < 0) return '';

  let end = start;
  while (end < line.length && isDigit(line.charAt(end))) end += 1;
  return line.slice(start, end);
}

/** Saturates at 2^53 - 1. Absent keys and non-numeric values read as 0. */
export function extractLong(line: string, key: string): number {
  const digits = readDigits(line, key);
  if (!digits) return 0;
  return Math.min(Number.parseInt(digits, 10), Number.MAX_SAFE_INTEGER);
}

/** Like {@link extractLong}, saturating at the 32-bit signed maximum. */
export function extractInteger(line: string, key: string): number {
  return Math.min(extractLong(line, key), INT32_MAX);
}

/** Quotes `value` escaping exactly the characters {@link extractString} understands. */
export function encodeJsonString(value: string): string {
  let encoded = '"';
  for (const char of value) {
    switch (char) {
      case '"': encoded += '\\"'; break;
      case '\\': encoded += '\\\\'; break;
      case '\n': encoded += '\\n'; break;
      case '\r': encoded += '\\r'; break;
      case '\t': encoded += '\\t'; break;
      default: encoded += char;
    }
  }
  return `${encoded}"`;
}
