/**
 * Gettext catalog extractor (.po/.pot) keeping the line of every entry.
 */
import type { IFactExtractor, ExtractionInput } from './interface.types.js';
import type { PoFacts, SourceUnit, TranslationEntry } from '../core/facts/types.js';
import { ExtractionError, ErrorCodes } from '../utils/errors.js';

const KEYWORD_LINE = /^(msgctxt|msgid_plural|msgid|msgstr(?:\[(\d+)\])?)\s+(".*")\s*$/;
const STRING_LINE = /^(".*")\s*$/;

const C_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

type Target = 'msgctxt' | 'msgid' | 'msgid_plural' | 'msgstr' | { plural: number };

interface EntryDraft {
  entry: TranslationEntry;
  hasMsgid: boolean;
  hasMsgstr: boolean;
  hasMsgctxt: boolean;
  target: Target | null;
}

function syntaxError(line: number): ExtractionError {
  return new ExtractionError(ErrorCodes.PARSE_ERROR, `Syntax error in po file (line ${line})`, line);
}

/**
 * Decode a double-quoted catalog string. Returns null if the quoting is broken.
 */
export function decodePoString(quoted: string): string | null {
  if (quoted.length < 2 || !quoted.startsWith('"') || !quoted.endsWith('"')) return null;
  const body = quoted.slice(1, -1);
  let result = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '"') return null;
    if (ch !== '\\') {
      result += ch;
      continue;
    }
    const next = body[i + 1];
    if (next === undefined) return null;
    i++;
    result += C_ESCAPES[next] ?? `\\${next}`;
  }
  return result;
}

function newDraft(line: number): EntryDraft {
  return {
    entry: {
      msgctxt: null,
      msgid: '',
      msgidPlural: null,
      msgstr: '',
      msgstrPlural: [],
      comment: '',
      translatorComment: '',
      occurrences: [],
      flags: [],
      obsolete: false,
      line,
      messageLine: line,
    },
    hasMsgid: false,
    hasMsgstr: false,
    hasMsgctxt: false,
    target: null,
  };
}

function appendLine(existing: string, text: string): string {
  return existing ? `${existing}\n${text}` : text;
}

function appendTo(draft: EntryDraft, target: Target, text: string): void {
  const entry = draft.entry;
  if (typeof target === 'object') {
    entry.msgstrPlural[target.plural] = (entry.msgstrPlural[target.plural] ?? '') + text;
    return;
  }
  switch (target) {
    case 'msgctxt':
      entry.msgctxt = (entry.msgctxt ?? '') + text;
      break;
    case 'msgid':
      entry.msgid += text;
      break;
    case 'msgid_plural':
      entry.msgidPlural = (entry.msgidPlural ?? '') + text;
      break;
    case 'msgstr':
      entry.msgstr += text;
      break;
  }
}

function parseHeader(msgstr: string): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const line of msgstr.split('\n')) {
    const colon = line.indexOf(':');
    if (colon > 0) {
      metadata[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
    }
  }
  return metadata;
}

/**
 * Parse catalog text into entries.
 * @throws ExtractionError on the first malformed line
 */
export function parseCatalog(content: string): Pick<PoFacts, 'entries' | 'metadata'> {
  const entries: TranslationEntry[] = [];
  let metadata: Record<string, string> = {};
  let draft: EntryDraft | null = null;

  const finish = (): void => {
    if (!draft) return;
    if (draft.hasMsgid) {
      const { entry } = draft;
      if (entry.msgid === '' && entry.msgctxt === null && !entry.obsolete) {
        metadata = parseHeader(entry.msgstr);
      } else {
        entries.push(entry);
      }
    }
    draft = null;
  };

  const handleKeyword = (lineNo: number, text: string, obsolete: boolean): boolean => {
    const match = KEYWORD_LINE.exec(text);
    if (match) {
      const [, keyword, pluralIndex, quoted] = match;
      const value = decodePoString(quoted);
      if (value === null) throw syntaxError(lineNo);

      if (keyword === 'msgctxt' || keyword === 'msgid') {
        const startsNew = !draft || draft.hasMsgstr || draft.hasMsgid || (keyword === 'msgctxt' && draft.hasMsgctxt);
        if (startsNew && draft && (draft.hasMsgid || draft.hasMsgctxt)) {
          if (!draft.hasMsgstr) throw syntaxError(lineNo);
          finish();
        }
        if (!draft) draft = newDraft(lineNo);
        if (!draft.hasMsgid && !draft.hasMsgctxt) draft.entry.messageLine = lineNo;
        if (keyword === 'msgctxt') {
          draft.hasMsgctxt = true;
          draft.entry.msgctxt = '';
        } else {
          draft.hasMsgid = true;
        }
      } else if (!draft || !draft.hasMsgid) {
        throw syntaxError(lineNo);
      } else if (keyword === 'msgid_plural') {
        draft.entry.msgidPlural = '';
      } else {
        draft.hasMsgstr = true;
      }

      const target: Target =
        keyword === 'msgctxt' || keyword === 'msgid' || keyword === 'msgid_plural'
          ? keyword
          : pluralIndex !== undefined
            ? { plural: Number(pluralIndex) }
            : 'msgstr';
      draft.target = target;
      draft.entry.obsolete ||= obsolete;
      appendTo(draft, target, value);
      return true;
    }

    const continuation = STRING_LINE.exec(text);
    if (continuation) {
      const value = decodePoString(continuation[1]);
      if (value === null || !draft || draft.target === null) throw syntaxError(lineNo);
      appendTo(draft, draft.target, value);
      return true;
    }
    return false;
  };

  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const line = lines[index].trim();

    if (line === '') {
      if (draft?.hasMsgstr) finish();
      continue;
    }

    if (line.startsWith('#~')) {
      const rest = line.slice(2).trim();
      if (rest === '' || rest.startsWith('|')) continue;
      if (!handleKeyword(lineNo, rest, true)) throw syntaxError(lineNo);
      continue;
    }

    if (line.startsWith('#')) {
      if (draft?.hasMsgstr) finish();
      if (draft?.hasMsgid || draft?.hasMsgctxt) throw syntaxError(lineNo);
      if (!draft) draft = newDraft(lineNo);
      const entry = draft.entry;
      const marker = line.charAt(1);
      const body = line.slice(2).trim();
      if (marker === '.') {
        entry.comment = appendLine(entry.comment, body);
      } else if (marker === ':') {
        entry.occurrences.push(...body.split(/\s+/).filter((ref) => ref.length > 0));
      } else if (marker === ',') {
        entry.flags.push(...body.split(',').map((flag) => flag.trim()).filter((flag) => flag.length > 0));
      } else if (marker !== '|') {
        entry.translatorComment = appendLine(entry.translatorComment, line.slice(1).trim());
      }
      continue;
    }

    if (!handleKeyword(lineNo, line, false)) throw syntaxError(lineNo);
  }

  if (draft && (draft.hasMsgid || draft.hasMsgctxt) && !draft.hasMsgstr) {
    throw syntaxError(lines.length);
  }
  finish();

  return { entries, metadata };
}

export class PoExtractor implements IFactExtractor<PoFacts> {
  readonly language = 'po' as const;
  readonly supportedExtensions = ['.po', '.pot'];

  extract(input: ExtractionInput): SourceUnit<PoFacts> {
    const unit: SourceUnit<PoFacts> = {
      path: input.path,
      relativePath: input.relativePath,
      facts: { language: 'po', file: input.path, entries: [], metadata: {} },
      error: null,
    };
    try {
      const { entries, metadata } = parseCatalog(input.content);
      unit.facts = { language: 'po', file: input.path, entries, metadata };
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      unit.error = { message: error.message, line: error.line };
    }
    return unit;
  }

  dispose(): void {
    // Nothing held between files
  }
}
