/**
 * Exceptions raised while rendering a placeholder template, reported in the
 * notation translators see from the framework's own runtime.
 */

export type PyExceptionType =
  | 'KeyError'
  | 'TypeError'
  | 'ValueError'
  | 'IndexError'
  | 'AttributeError'
  | 'OverflowError';

export class PyFormatError extends Error {
  constructor(
    public readonly type: PyExceptionType,
    public readonly detail: string
  ) {
    super(`${type}: ${detail}`);
    this.name = 'PyFormatError';
  }

  /** `KeyError('cuenta')` */
  repr(): string {
    return `${this.type}(${pyRepr(this.detail)})`;
  }
}

/**
 * Quote a string the way the runtime's `repr()` does: single quotes unless the text
 * holds a single quote and no double quote.
 */
export function pyRepr(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === '\\') out += '\\\\';
    else if (ch === quote) out += `\\${quote}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (code < 0x20 || code === 0x7f) out += `\\x${code.toString(16).padStart(2, '0')}`;
    else out += ch;
  }
  return out + quote;
}

/** Split on every line boundary the runtime's `splitlines()` recognizes. */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
