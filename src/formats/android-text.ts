import { InvalidEscapeError } from '../errors.js';
import { Logger, SilentLogger } from '../logger.js';

const WHITESPACE = ' \n\t\r';

function isWhitespace(char: string): boolean {
  return WHITESPACE.includes(char);
}

export function trimAndroidWhitespace(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && isWhitespace(text[start])) start++;
  while (end > start && isWhitespace(text[end - 1])) end--;
  return text.slice(start, end);
}

const SIMPLE_ESCAPES = new Map<string, string>([
  ['n', '\n'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
  ['@', '@'],
  ['?', '?'],
]);

export interface DecodeOptions {
  /** Strip leading and trailing whitespace first; done for strings without nested markup. */
  trim?: boolean;
  /** Resource name, used in warnings. */
  name?: string;
  logger?: Logger;
}

/**
 * Turns one block of Android resource text (the text between two tags, entities already decoded) into the
 * text a translator sees. Literal `<` and `>` come out as `&lt;` and `&gt;` so they cannot be confused with
 * nested markup.
 *
 * @throws InvalidEscapeError for a malformed `\u` sequence
 */
export function decodeAndroidText(raw: string, options: DecodeOptions = {}): string {
  const logger = options.logger ?? new SilentLogger();
  const text = options.trim ? trimAndroidWhitespace(raw) : raw;

  let result = '';
  let inQuote = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (isWhitespace(char)) {
      let end = i;
      while (end < text.length && isWhitespace(text[end])) end++;
      // An unterminated quote does not protect whitespace at the very end of the block.
      result += inQuote && end < text.length ? text.slice(i, end) : ' ';
      i = end;
      continue;
    }

    if (char === '"') {
      inQuote = !inQuote;
      i++;
      continue;
    }

    if (char === '\\') {
      if (i + 1 >= text.length) {
        result += '\\';
        i++;
        continue;
      }

      const code = text[i + 1];
      const simple = SIMPLE_ESCAPES.get(code);
      if (simple !== undefined) {
        result += simple;
        i += 2;
      } else if (code === 'u') {
        const digits = text.slice(i + 2, i + 6);
        const rest = text.slice(i + 2);
        if (/^[0-9a-fA-F]{4}$/.test(digits)) {
          result += String.fromCharCode(parseInt(digits, 16));
          i += 6;
        } else if (/^[0-9a-fA-F]{1,3}$/.test(rest)) {
          // Sequences cut short by the end of the string are allowed.
          result += String.fromCharCode(parseInt(rest, 16));
          i = text.length;
        } else {
          throw new InvalidEscapeError(`bad unicode escape sequence "\\u${digits}"`);
        }
      } else {
        logger.warn(
          `${options.name ? `"${options.name}" contains ` : ''}unsupported escape sequence "\\${code}"; removing it`
        );
        i += 2;
      }
      continue;
    }

    if (char === '<') {
      result += '&lt;';
    } else if (char === '>') {
      result += '&gt;';
    } else {
      result += char;
    }
    i++;
  }

  return result;
}

export function escapeAndroidText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/'/g, "\\'")
    .replace(/"/g, '\\"')
    .replace(/@/g, '\\@')
    .replace(/^\?/, '\\?');
}

export interface TextEdges {
  /** The text starts the value, so leading whitespace would be trimmed. */
  start: boolean;
  /** The text ends the value. */
  end: boolean;
}

const WHOLE_VALUE: TextEdges = { start: true, end: true };

/** Wraps text in quotes when Android would otherwise trim or collapse some of its whitespace. */
export function quoteAndroidText(text: string, edges: TextEdges = WHOLE_VALUE): string {
  if (
    /[ \n\t\r]{2}/.test(text) ||
    (edges.start && /^[ \n\t\r]/.test(text)) ||
    (edges.end && /[ \n\t\r]$/.test(text))
  ) {
    return `"${text}"`;
  }
  return text;
}

export function encodeAndroidText(text: string, edges: TextEdges = WHOLE_VALUE): string {
  return quoteAndroidText(escapeAndroidText(text), edges);
}
