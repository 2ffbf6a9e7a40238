/**
 * printf-style placeholders (`%s`, `%(name)d`, `%1$s`): extraction of dummy arguments
 * and rendering with the semantics of the runtime's `%` operator.
 */
import { PyFormatError, pyRepr, splitLines } from './python-error.js';

export type PrintfValue = string | number;

export type PrintfArgs =
  | { kind: 'tuple'; values: readonly PrintfValue[] }
  | { kind: 'mapping'; values: ReadonlyMap<string, PrintfValue> };

/** A value handed to a conversion: a dummy, or the whole mapping for an un-keyed `%s`. */
type Operand = PrintfValue | ReadonlyMap<string, PrintfValue>;

const PRINTF_PLACEHOLDER =
  /%(?:(\d+)%|(?:(\d+)\$|\((\w+)\))?([+#-]*(?:\d+)?(?:\.\d+)?(hh|h|l|ll)?([\w@])))/g;

/**
 * Dummy arguments for every placeholder of `template`: the positional list when any
 * placeholder is un-keyed, else the keyed mapping. `null` when there is nothing to check.
 */
export function extractPrintfArgs(template: string): PrintfArgs | null {
  const positional: PrintfValue[] = [];
  const keyed = new Map<string, PrintfValue>();

  for (const line of splitLines(template.replace(/%%/g, ''))) {
    for (const match of line.matchAll(PRINTF_PLACEHOLDER)) {
      const key = match[3];
      const dummy: PrintfValue = match[6] === 's' ? '' : 0;
      if (key === undefined) {
        positional.push(dummy);
      } else {
        keyed.set(key, dummy);
      }
    }
  }

  if (positional.length > 0) return { kind: 'tuple', values: positional };
  if (keyed.size > 0) return { kind: 'mapping', values: keyed };
  return null;
}

function typeName(value: Operand): string {
  if (typeof value === 'string') return 'str';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  return 'dict';
}

function toStr(value: Operand): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  const items = [...value].map(([k, v]) => `${pyRepr(k)}: ${toRepr(v)}`);
  return `{${items.join(', ')}}`;
}

function toRepr(value: Operand): string {
  return typeof value === 'string' ? pyRepr(value) : toStr(value);
}

function requireNumber(value: Operand, conversion: string, integerOnly: boolean): number {
  if (typeof value === 'number') {
    if (integerOnly && !Number.isInteger(value)) {
      throw new PyFormatError('TypeError', `%${conversion} format: an integer is required, not float`);
    }
    return value;
  }
  const required = integerOnly ? 'an integer' : 'a real number';
  throw new PyFormatError(
    'TypeError',
    `%${conversion} format: ${required} is required, not ${typeName(value)}`
  );
}

function pad(text: string, width: number, leftAlign: boolean, zero: boolean): string {
  if (text.length >= width) return text;
  if (leftAlign) return text.padEnd(width, ' ');
  if (zero && /^[-+]?\d/.test(text)) {
    const sign = /^[-+]/.test(text) ? text[0] : '';
    return sign + text.slice(sign.length).padStart(width - sign.length, '0');
  }
  return text.padStart(width, ' ');
}

/**
 * Render `template % args`. Throws {@link PyFormatError} where the runtime raises.
 */
export function renderPrintf(template: string, args: PrintfArgs): string {
  const mapping = args.kind === 'mapping' ? args.values : null;

  // Positional tuple, or a single object used once (argIndex -2 = unused, -1 = used).
  const tuple: readonly PrintfValue[] | null = args.kind === 'tuple' ? args.values : null;
  let single: Operand = args.values;
  let argIndex = tuple !== null ? 0 : -2;

  const nextArg = (): Operand => {
    if (tuple !== null) {
      const value = tuple[argIndex];
      if (value !== undefined) {
        argIndex += 1;
        return value;
      }
    } else if (argIndex === -2) {
      argIndex = -1;
      return single;
    }
    throw new PyFormatError('TypeError', 'not enough arguments for format string');
  };

  let out = '';
  let i = 0;
  const n = template.length;

  while (i < n) {
    const ch = template[i];
    if (ch !== '%') {
      out += ch;
      i += 1;
      continue;
    }
    i += 1;
    if (i >= n) throw new PyFormatError('ValueError', 'incomplete format');

    if (template[i] === '(') {
      if (mapping === null) throw new PyFormatError('TypeError', 'format requires a mapping');
      let depth = 1;
      const keyStart = i + 1;
      i += 1;
      while (i < n && depth > 0) {
        if (template[i] === ')') depth -= 1;
        else if (template[i] === '(') depth += 1;
        i += 1;
      }
      if (depth > 0) throw new PyFormatError('ValueError', 'incomplete format key');
      const key = template.slice(keyStart, i - 1);
      const value = mapping.get(key);
      if (value === undefined) throw new PyFormatError('KeyError', key);
      single = value;
      argIndex = -2;
    }

    let leftAlign = false;
    let zero = false;
    let sign = '';
    for (; i < n; i += 1) {
      const flag = template[i];
      if (flag === '-') leftAlign = true;
      else if (flag === '0') zero = true;
      else if (flag === '+') sign = '+';
      else if (flag === ' ') sign = sign || ' ';
      else if (flag !== '#') break;
    }

    let width = 0;
    if (template[i] === '*') {
      const value = nextArg();
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw new PyFormatError('TypeError', '* wants int');
      }
      width = Math.abs(value);
      if (value < 0) leftAlign = true;
      i += 1;
    } else {
      while (i < n && /\d/.test(template[i])) {
        width = width * 10 + Number(template[i]);
        i += 1;
      }
    }

    let precision: number | null = null;
    if (template[i] === '.') {
      i += 1;
      precision = 0;
      if (template[i] === '*') {
        const value = nextArg();
        if (typeof value !== 'number' || !Number.isInteger(value)) {
          throw new PyFormatError('TypeError', '* wants int');
        }
        precision = Math.max(value, 0);
        i += 1;
      } else {
        while (i < n && /\d/.test(template[i])) {
          precision = precision * 10 + Number(template[i]);
          i += 1;
        }
      }
    }

    // Length modifiers are accepted and ignored.
    while (i < n && (template[i] === 'h' || template[i] === 'l' || template[i] === 'L')) {
      i += 1;
    }
    if (i >= n) throw new PyFormatError('ValueError', 'incomplete format');

    const conversion = template[i];
    const conversionIndex = i;
    i += 1;

    if (conversion === '%') {
      out += '%';
      continue;
    }

    const value = nextArg();
    let text: string;

    switch (conversion) {
      case 's':
        text = toStr(value);
        if (precision !== null) text = text.slice(0, precision);
        break;
      case 'r':
      case 'a':
        text = toRepr(value);
        if (precision !== null) text = text.slice(0, precision);
        break;
      case 'd':
      case 'i':
      case 'u': {
        const num = Math.trunc(requireNumber(value, conversion, false));
        text = (num >= 0 ? sign : '') + String(num);
        break;
      }
      case 'o':
      case 'x':
      case 'X': {
        const num = requireNumber(value, conversion, true);
        const radix = conversion === 'o' ? 8 : 16;
        text = (num >= 0 ? sign : '') + num.toString(radix);
        if (conversion === 'X') text = text.toUpperCase();
        break;
      }
      case 'e':
      case 'E':
      case 'f':
      case 'F':
      case 'g':
      case 'G': {
        if (typeof value !== 'number') {
          throw new PyFormatError('TypeError', `must be real number, not ${typeName(value)}`);
        }
        const digits = precision ?? 6;
        const lower = conversion.toLowerCase();
        if (lower === 'e') text = value.toExponential(digits);
        else if (lower === 'f') text = value.toFixed(digits);
        else text = String(Number(value.toPrecision(Math.max(digits, 1))));
        if (conversion !== lower) text = text.toUpperCase();
        if (value >= 0) text = sign + text;
        break;
      }
      case 'c':
        if (typeof value === 'number' && Number.isInteger(value)) {
          if (value < 0 || value > 0x10ffff) {
            throw new PyFormatError('OverflowError', '%c arg not in range(0x110000)');
          }
          text = String.fromCodePoint(value);
        } else if (typeof value === 'string' && [...value].length === 1) {
          text = value;
        } else if (typeof value === 'string') {
          throw new PyFormatError(
            'TypeError',
            `%c requires an int or a unicode character, not a string of length ${[...value].length}`
          );
        } else {
          throw new PyFormatError(
            'TypeError',
            `%c requires an int or a unicode character, not ${typeName(value)}`
          );
        }
        break;
      default: {
        const code = conversion.codePointAt(0) ?? 0;
        throw new PyFormatError(
          'ValueError',
          `unsupported format character '${conversion}' (0x${code.toString(16)}) at index ${conversionIndex}`
        );
      }
    }

    out += pad(text, width, leftAlign, zero);
  }

  if (tuple !== null && argIndex < tuple.length) {
    throw new PyFormatError('TypeError', 'not all arguments converted during string formatting');
  }

  return out;
}
