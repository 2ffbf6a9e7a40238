/**
 * Tests for the gettext catalog extractor.
 */
import { describe, it, expect } from 'vitest';
import { PoExtractor, decodePoString, parseCatalog } from '../../../src/validators/po.js';
import { ExtractionError } from '../../../src/utils/errors.js';

const CATALOG = [
  '# Translation of Sale.',
  'msgid ""',
  'msgstr ""',
  '"Language: fr\\n"',
  '"Content-Type: text/plain; charset=UTF-8\\n"',
  '',
  '#. module: sale',
  '#: model:ir.model.fields,field_description:sale.field_sale_order__note',
  '#, python-format',
  'msgid "Hello %s"',
  'msgstr "Bonjour %s"',
  '',
  '#~ msgid "Old"',
  '#~ msgstr "Vieux"',
  '',
].join('\n');

describe('decodePoString', () => {
  it('decodes C escapes', () => {
    expect(decodePoString('"a\\nb\\t\\"c\\""')).toBe('a\nb\t"c"');
  });

  it('keeps unknown escapes as written', () => {
    expect(decodePoString('"\\q"')).toBe('\\q');
  });

  it('rejects broken quoting', () => {
    expect(decodePoString('"a"b"')).toBeNull();
    expect(decodePoString('"a')).toBeNull();
    expect(decodePoString('"a\\"')).toBeNull();
  });
});

describe('parseCatalog', () => {
  it('moves the header entry into metadata', () => {
    const { metadata } = parseCatalog(CATALOG);

    expect(metadata).toEqual({ Language: 'fr', 'Content-Type': 'text/plain; charset=UTF-8' });
  });

  it('reads comments, references and flags', () => {
    const [entry] = parseCatalog(CATALOG).entries;

    expect(entry).toMatchObject({
      msgid: 'Hello %s',
      msgstr: 'Bonjour %s',
      comment: 'module: sale',
      occurrences: ['model:ir.model.fields,field_description:sale.field_sale_order__note'],
      flags: ['python-format'],
      obsolete: false,
      line: 7,
      messageLine: 10,
    });
  });

  it('keeps obsolete entries marked as such', () => {
    const entries = parseCatalog(CATALOG).entries;

    expect(entries).toHaveLength(2);
    expect(entries[1]).toMatchObject({ msgid: 'Old', msgstr: 'Vieux', obsolete: true, line: 13 });
  });

  it('joins continuation lines', () => {
    const [entry] = parseCatalog('msgid ""\n"Hello "\n"world"\nmsgstr "Salut"\n').entries;

    expect(entry.msgid).toBe('Hello world');
    expect(entry.messageLine).toBe(1);
  });

  it('reads context and plural forms', () => {
    const [entry] = parseCatalog(
      'msgctxt "menu"\nmsgid "File"\nmsgid_plural "Files"\nmsgstr[0] "Fichier"\nmsgstr[1] "Fichiers"\n'
    ).entries;

    expect(entry.msgctxt).toBe('menu');
    expect(entry.msgidPlural).toBe('Files');
    expect(entry.msgstrPlural).toEqual(['Fichier', 'Fichiers']);
  });

  it('rejects a msgstr without msgid', () => {
    expect(() => parseCatalog('msgstr "x"\n')).toThrow('Syntax error in po file (line 1)');
  });

  it('rejects an entry without msgstr', () => {
    expect(() => parseCatalog('msgid "a"\nmsgid "b"\nmsgstr "c"\n')).toThrow(ExtractionError);
  });

  it('rejects stray text', () => {
    expect(() => parseCatalog('msgid "a"\nmsgstr "b"\nnonsense\n')).toThrow('Syntax error in po file (line 3)');
  });
});

describe('PoExtractor', () => {
  const extractor = new PoExtractor();

  it('returns entries on success', () => {
    const unit = extractor.extract({ path: '/addons/sale/i18n/fr.po', relativePath: 'i18n/fr.po', content: CATALOG });

    expect(unit.error).toBeNull();
    expect(unit.facts?.entries).toHaveLength(2);
  });

  it('returns the failing line on a syntax error', () => {
    const unit = extractor.extract({
      path: '/addons/sale/i18n/fr.po',
      relativePath: 'i18n/fr.po',
      content: 'msgid "a"\nmsgstr "b"\nmsgstr "c\n',
    });

    expect(unit.error).toEqual({ message: 'Syntax error in po file (line 3)', line: 3 });
    expect(unit.facts?.entries).toEqual([]);
  });
});
