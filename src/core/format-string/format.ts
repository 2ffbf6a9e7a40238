/**
 * Brace placeholders (`{}`, `{0}`, `{name}`): template parsing, dummy extraction and
 * rendering with the semantics of the runtime's `str.format`.
 */
import { PyFormatError, splitLines } from './python-error.js';

export interface FormatChunk {
  literal: string;
  /** `null` for a trailing literal with no replacement field */
  fieldName: string | null;
  formatSpec: string;
  conversion: string | null;
}

export interface FormatArgs {
  positional: readonly number[];
  keyed: ReadonlyMap<string, number>;
}

/** A bound method of an int, reachable through attribute access. */
interface IntMethod {
  kind: 'method';
  name: string;
}

type FormatValue = number | string | IntMethod;

const INT_NUMERIC_ATTRIBUTES: Readonly<Record<string, (value: number) => number>> = {
  real: (value) => value,
  imag: () => 0,
  numerator: (value) => value,
  denominator: () => 1,
};

const INT_METHODS = new Set([
  'as_integer_ratio',
  'bit_count',
  'bit_length',
  'conjugate',
  'from_bytes',
  'is_integer',
  'to_bytes',
]);

const MAX_RECURSION = 2;

/**
 * Split a template into literal text and replacement fields, raising `ValueError`
 * where the runtime's template parser does. Chunks are produced one at a time, so an
 * error later in the template surfaces only once the earlier chunks are consumed.
 */
export function* parseFormatTemplate(template: string): Generator<FormatChunk, void, undefined> {
  const n = template.length;
  let pos = 0;

  while (pos < n) {
    const start = pos;
    let c = '';
    let markupFollows = false;
    while (pos < n) {
      c = template[pos];
      pos += 1;
      if (c === '{' || c === '}') {
        markupFollows = true;
        break;
      }
    }

    const atEnd = pos >= n;
    let length = pos - start;

    if (markupFollows && c === '}' && (atEnd || template[pos] !== '}')) {
      throw new PyFormatError('ValueError', "Single '}' encountered in format string");
    }
    if (markupFollows && atEnd && c === '{') {
      throw new PyFormatError('ValueError', "Single '{' encountered in format string");
    }
    if (markupFollows && !atEnd) {
      if (template[pos] === c) {
        // Escaped brace: keep one, no field follows.
        pos += 1;
        markupFollows = false;
      } else {
        length -= 1;
      }
    }

    const literal = template.slice(start, start + length);
    if (!markupFollows) {
      yield { literal, fieldName: null, formatSpec: '', conversion: null };
      continue;
    }

    const fieldStart = pos;
    let depth = 1;
    let closed = false;
    while (pos < n) {
      const ch = template[pos];
      pos += 1;
      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          closed = true;
          break;
        }
      }
    }
    if (!closed) {
      throw new PyFormatError('ValueError', "expected '}' before end of string");
    }

    yield { literal, ...parseField(template.slice(fieldStart, pos - 1)) };
  }
}

function parseField(field: string): Omit<FormatChunk, 'literal'> {
  let pos = 0;
  let terminator = '';
  while (pos < field.length) {
    const c = field[pos];
    pos += 1;
    if (c === '{') {
      throw new PyFormatError('ValueError', "unexpected '{' in field name");
    }
    if (c === '[') {
      while (pos < field.length && field[pos] !== ']') pos += 1;
      continue;
    }
    if (c === '}' || c === ':' || c === '!') {
      terminator = c;
      break;
    }
  }

  if (terminator !== '!' && terminator !== ':') {
    return { fieldName: field, formatSpec: '', conversion: null };
  }

  const fieldName = field.slice(0, pos - 1);
  let conversion: string | null = null;
  if (terminator === '!') {
    if (pos >= field.length) {
      throw new PyFormatError('ValueError', 'end of string while looking for conversion specifier');
    }
    conversion = field[pos];
    pos += 1;
    if (pos < field.length) {
      if (field[pos] !== ':') {
        throw new PyFormatError('ValueError', "expected ':' after conversion specifier");
      }
      pos += 1;
    }
  }

  return { fieldName, formatSpec: field.slice(pos), conversion };
}

/**
 * Dummy arguments for every field of `template`, read line by line. Lines the template
 * parser rejects are skipped. `null` when there is nothing to check.
 */
export function extractFormatArgs(template: string): FormatArgs | null {
  const pushed: number[] = [];
  const keyed = new Map<string, number>();

  for (const line of splitLines(template)) {
    let chunks: FormatChunk[];
    try {
      chunks = [...parseFormatTemplate(line)];
    } catch (error) {
      if (error instanceof PyFormatError) continue;
      throw error;
    }
    for (const chunk of chunks) {
      const name = chunk.fieldName;
      if (name === null) continue;
      if (name === '') pushed.push(0);
      else if (/^\d+$/.test(name)) pushed.push(Number(name) + 1);
      else keyed.set(name, 0);
    }
  }

  if (pushed.length === 0 && keyed.size === 0) return null;

  const max = pushed.reduce((acc, value) => Math.max(acc, value), 0);
  const count = max === 0 ? pushed.length : max;
  return {
    positional: Array.from({ length: count }, (_, index) => index),
    keyed,
  };
}

type Numbering = 'init' | 'auto' | 'manual';

interface RenderState {
  numbering: Numbering;
  nextIndex: number;
}

/**
 * Render `template.format(*positional, **keyed)`. Throws {@link PyFormatError} where the
 * runtime raises.
 */
export function renderFormat(template: string, args: FormatArgs): string {
  return build(template, args, { numbering: 'init', nextIndex: 0 }, MAX_RECURSION);
}

function build(template: string, args: FormatArgs, state: RenderState, depth: number): string {
  if (depth <= 0) {
    throw new PyFormatError('ValueError', 'Max string recursion exceeded');
  }
  let out = '';
  for (const chunk of parseFormatTemplate(template)) {
    out += chunk.literal;
    if (chunk.fieldName === null) continue;

    let value = resolveField(chunk.fieldName, args, state);
    if (chunk.conversion !== null) {
      value = convert(value, chunk.conversion);
    }
    const spec = chunk.formatSpec.includes('{')
      ? build(chunk.formatSpec, args, state, depth - 1)
      : chunk.formatSpec;
    out += formatValue(value, spec);
  }
  return out;
}

function resolveField(fieldName: string, args: FormatArgs, state: RenderState): FormatValue {
  let pos = 0;
  while (pos < fieldName.length && fieldName[pos] !== '.' && fieldName[pos] !== '[') pos += 1;
  const first = fieldName.slice(0, pos);

  const isEmpty = first === '';
  const isNumeric = /^\d+$/.test(first);
  if (isEmpty || isNumeric) {
    if (state.numbering === 'init') {
      state.numbering = isEmpty ? 'auto' : 'manual';
    }
    if (state.numbering === 'manual' && isEmpty) {
      throw new PyFormatError(
        'ValueError',
        'cannot switch from manual field specification to automatic field numbering'
      );
    }
    if (state.numbering === 'auto' && !isEmpty) {
      throw new PyFormatError(
        'ValueError',
        'cannot switch from automatic field numbering to manual field specification'
      );
    }
  }

  let value: FormatValue;
  if (isEmpty || isNumeric) {
    const index = isEmpty ? state.nextIndex++ : Number(first);
    const positional = args.positional[index];
    if (positional === undefined) {
      throw new PyFormatError(
        'IndexError',
        `Replacement index ${index} out of range for positional args tuple`
      );
    }
    value = positional;
  } else {
    const keyed = args.keyed.get(first);
    if (keyed === undefined) throw new PyFormatError('KeyError', first);
    value = keyed;
  }

  while (pos < fieldName.length) {
    const c = fieldName[pos];
    pos += 1;
    if (c === '.') {
      const start = pos;
      while (pos < fieldName.length && fieldName[pos] !== '.' && fieldName[pos] !== '[') pos += 1;
      const attribute = fieldName.slice(start, pos);
      if (attribute === '') {
        throw new PyFormatError('ValueError', 'Empty attribute in format string');
      }
      value = getAttribute(value, attribute);
    } else if (c === '[') {
      const start = pos;
      while (pos < fieldName.length && fieldName[pos] !== ']') pos += 1;
      if (pos >= fieldName.length) {
        throw new PyFormatError('ValueError', "Missing ']' in format string");
      }
      if (start === pos) {
        throw new PyFormatError('ValueError', 'Empty attribute in format string');
      }
      // No dummy value supports item access.
      throw new PyFormatError('TypeError', `'${pyTypeName(value)}' object is not subscriptable`);
    }
  }

  return value;
}

function pyTypeName(value: FormatValue): string {
  if (typeof value === 'number') return 'int';
  if (typeof value === 'string') return 'str';
  return 'builtin_function_or_method';
}

function getAttribute(value: FormatValue, attribute: string): FormatValue {
  if (typeof value === 'number') {
    const numeric = INT_NUMERIC_ATTRIBUTES[attribute];
    if (numeric) return numeric(value);
    if (INT_METHODS.has(attribute)) return { kind: 'method', name: attribute };
  }
  throw new PyFormatError(
    'AttributeError',
    `'${pyTypeName(value)}' object has no attribute '${attribute}'`
  );
}

function convert(value: FormatValue, conversion: string): string {
  if (conversion !== 'r' && conversion !== 's' && conversion !== 'a') {
    throw new PyFormatError('ValueError', `Unknown conversion specifier ${conversion}`);
  }
  if (typeof value === 'object') return `<built-in method ${value.name} of int object>`;
  if (typeof value === 'string' && conversion !== 's') return `'${value}'`;
  return String(value);
}

interface ParsedSpec {
  fill: string;
  align: string | null;
  sign: string | null;
  noNegativeZero: boolean;
  alternate: boolean;
  width: number;
  grouping: string | null;
  precision: number | null;
  type: string | null;
}

function parseSpec(spec: string, typeName: string, defaultAlign: string): ParsedSpec {
  const parsed: ParsedSpec = {
    fill: ' ',
    align: null,
    sign: null,
    noNegativeZero: false,
    alternate: false,
    width: 0,
    grouping: null,
    precision: null,
    type: null,
  };
  const isAlign = (c: string | undefined): boolean =>
    c === '<' || c === '>' || c === '=' || c === '^';

  let pos = 0;
  let fillSpecified = false;
  if (spec.length >= 2 && isAlign(spec[1])) {
    parsed.fill = spec[0];
    parsed.align = spec[1];
    fillSpecified = true;
    pos = 2;
  } else if (spec.length >= 1 && isAlign(spec[0])) {
    parsed.align = spec[0];
    pos = 1;
  }

  if (spec[pos] === '+' || spec[pos] === '-' || spec[pos] === ' ') {
    parsed.sign = spec[pos];
    pos += 1;
  }
  if (spec[pos] === 'z') {
    parsed.noNegativeZero = true;
    pos += 1;
  }
  if (spec[pos] === '#') {
    parsed.alternate = true;
    pos += 1;
  }
  if (!fillSpecified && spec[pos] === '0') {
    parsed.fill = '0';
    if (parsed.align === null && defaultAlign === '>') {
      parsed.align = '=';
    }
    pos += 1;
  }

  const widthStart = pos;
  while (pos < spec.length && /\d/.test(spec[pos])) pos += 1;
  if (pos > widthStart) parsed.width = Number(spec.slice(widthStart, pos));

  if (spec[pos] === ',') {
    parsed.grouping = ',';
    pos += 1;
  }
  if (spec[pos] === '_') {
    if (parsed.grouping !== null) {
      throw new PyFormatError('ValueError', "Cannot specify both ',' and '_'.");
    }
    parsed.grouping = '_';
    pos += 1;
  }
  if (spec[pos] === ',' && parsed.grouping === '_') {
    throw new PyFormatError('ValueError', "Cannot specify both ',' and '_'.");
  }

  if (spec[pos] === '.') {
    pos += 1;
    const precisionStart = pos;
    while (pos < spec.length && /\d/.test(spec[pos])) pos += 1;
    if (pos === precisionStart) {
      throw new PyFormatError('ValueError', 'Format specifier missing precision');
    }
    parsed.precision = Number(spec.slice(precisionStart, pos));
  }

  if (spec.length - pos > 1) {
    throw new PyFormatError(
      'ValueError',
      `Invalid format specifier '${spec}' for object of type '${typeName}'`
    );
  }
  if (spec.length - pos === 1) {
    parsed.type = spec[pos];
  }

  if (parsed.grouping !== null) {
    const allowed = parsed.grouping === ',' ? 'defgEGF%' : 'defgEGF%boxX';
    if (parsed.type !== null && !allowed.includes(parsed.type)) {
      throw new PyFormatError('ValueError', `Cannot specify '${parsed.grouping}' with '${parsed.type}'.`);
    }
  }

  return parsed;
}

function align(text: string, spec: ParsedSpec, defaultAlign: string): string {
  const width = spec.width;
  if (text.length >= width) return text;
  const gap = width - text.length;
  const fill = spec.fill;
  switch (spec.align ?? defaultAlign) {
    case '<':
      return text + fill.repeat(gap);
    case '^': {
      const left = Math.floor(gap / 2);
      return fill.repeat(left) + text + fill.repeat(gap - left);
    }
    case '=': {
      const sign = /^[-+ ]/.test(text) ? text[0] : '';
      return sign + fill.repeat(gap) + text.slice(sign.length);
    }
    default:
      return fill.repeat(gap) + text;
  }
}

function formatValue(value: FormatValue, spec: string): string {
  if (typeof value === 'object') {
    if (spec !== '') {
      throw new PyFormatError(
        'TypeError',
        'unsupported format string passed to builtin_function_or_method.__format__'
      );
    }
    return `<built-in method ${value.name} of int object>`;
  }
  if (typeof value === 'string') return formatString(value, spec);
  return formatInt(value, spec);
}

function formatString(value: string, raw: string): string {
  if (raw === '') return value;
  const spec = parseSpec(raw, 'str', '<');
  if (spec.type !== null && spec.type !== 's') {
    throw new PyFormatError('ValueError', `Unknown format code '${spec.type}' for object of type 'str'`);
  }
  if (spec.sign !== null) {
    throw new PyFormatError('ValueError', 'Sign not allowed in string format specifier');
  }
  if (spec.noNegativeZero) {
    throw new PyFormatError(
      'ValueError',
      'Negative zero coercion (z) not allowed in format specifier'
    );
  }
  if (spec.alternate) {
    throw new PyFormatError('ValueError', 'Alternate form (#) not allowed in string format specifier');
  }
  if (spec.align === '=') {
    throw new PyFormatError('ValueError', "'=' alignment not allowed in string format specifier");
  }
  if (spec.grouping !== null) {
    throw new PyFormatError('ValueError', `Cannot specify '${spec.grouping}' with 's'.`);
  }
  const text = spec.precision !== null ? value.slice(0, spec.precision) : value;
  return align(text, spec, '<');
}

function formatInt(value: number, raw: string): string {
  if (raw === '') return String(value);
  const spec = parseSpec(raw, 'int', '>');
  const type = spec.type ?? 'd';
  const signed = (text: string): string =>
    value < 0 ? text : (spec.sign === '+' ? '+' : spec.sign === ' ' ? ' ' : '') + text;

  let text: string;
  switch (type) {
    case 'b':
    case 'c':
    case 'd':
    case 'n':
    case 'o':
    case 'x':
    case 'X': {
      if (spec.precision !== null) {
        throw new PyFormatError('ValueError', 'Precision not allowed in integer format specifier');
      }
      if (spec.noNegativeZero) {
        throw new PyFormatError(
          'ValueError',
          'Negative zero coercion (z) not allowed in integer format specifier'
        );
      }
      if (type === 'c') {
        if (spec.sign !== null) {
          throw new PyFormatError('ValueError', "Sign not allowed with integer format specifier 'c'");
        }
        if (spec.alternate) {
          throw new PyFormatError(
            'ValueError',
            "Alternate form (#) not allowed with integer format specifier 'c'"
          );
        }
        if (value < 0 || value > 0x10ffff) {
          throw new PyFormatError('OverflowError', '%c arg not in range(0x110000)');
        }
        text = String.fromCodePoint(value);
        break;
      }
      const radix = type === 'b' ? 2 : type === 'o' ? 8 : type === 'x' || type === 'X' ? 16 : 10;
      const prefix = spec.alternate && radix !== 10 ? `0${type === 'X' ? 'X' : type}` : '';
      text = Math.abs(value).toString(radix);
      if (type === 'X') text = text.toUpperCase();
      text = (value < 0 ? '-' : '') + prefix + text;
      text = signed(text);
      break;
    }
    case 'e':
    case 'E':
    case 'f':
    case 'F':
    case 'g':
    case 'G':
    case '%': {
      const digits = spec.precision ?? 6;
      const lower = type.toLowerCase();
      if (type === '%') text = `${(value * 100).toFixed(digits)}%`;
      else if (lower === 'e') text = value.toExponential(digits);
      else if (lower === 'f') text = value.toFixed(digits);
      else text = String(Number(value.toPrecision(Math.max(digits, 1))));
      if (type !== lower) text = text.toUpperCase();
      text = signed(text);
      break;
    }
    default:
      throw new PyFormatError('ValueError', `Unknown format code '${type}' for object of type 'int'`);
  }

  return align(text, spec, '>');
}
