/**
 * Facts extracted from the source units of one add-on.
 */

export interface SourceLocation {
  line: number;
  column: number;
}

/** true / false / not given */
export type TriState = boolean | null;

export interface FieldFact {
  name: string;
  /** Declared type tag, e.g. `Char`, `Many2one` */
  type: string;
  location: SourceLocation;
  label: string | null;
  help: string | null;
  related: string | null;
  compute: string | null;
  computeSudo: TriState;
  tracking: TriState;
  selection: boolean;
  comodel: string | null;
  isPrivate: boolean;
}

export interface MethodFact {
  name: string;
  location: SourceLocation;
  isPrivate: boolean;
  isMagic: boolean;
  isAsync: boolean;
  docstring: string | null;
  decorators: string[];
}

export interface ModelFact {
  className: string;
  location: SourceLocation;
  /** `_name` */
  name: string | null;
  /** `_inherit`, normalized to a list */
  inherit: string[];
  /** `_description` */
  description: string | null;
  /** Declares `_name`/`_inherit` or derives from a Model/TransientModel/AbstractModel base */
  isOdooModel: boolean;
  bases: string[];
  fields: FieldFact[];
  methods: MethodFact[];
  /** Origin file (resolved path) */
  file: string;
  /** Set by the inheritance resolver */
  hasMailThread: boolean;
}

export interface PythonFacts {
  language: 'python';
  file: string;
  models: ModelFact[];
}

export interface XmlElement {
  name: string;
  attributes: Readonly<Record<string, string>>;
  children: XmlElement[];
  parent: XmlElement | null;
  /** Concatenated direct text content */
  text: string;
  line: number;
}

export interface XmlFacts {
  language: 'xml';
  file: string;
  /** Manifest section the file is listed under (`data`, `demo`, ...) */
  dataSection: string;
  /** An empty `__empty__` placeholder when the file failed to parse */
  root: XmlElement;
}

export interface CsvRow {
  line: number;
  values: Readonly<Record<string, string>>;
}

export interface CsvFacts {
  language: 'csv';
  file: string;
  dataSection: string;
  /** Target model, from the file name */
  model: string;
  columns: string[];
  rows: CsvRow[];
}

export interface TranslationEntry {
  msgctxt: string | null;
  msgid: string;
  msgidPlural: string | null;
  msgstr: string;
  /** `msgstr[n]` values of plural entries */
  msgstrPlural: string[];
  /** Extracted comments (`#.`), joined with newlines */
  comment: string;
  /** Translator comments (`# `), joined with newlines */
  translatorComment: string;
  occurrences: string[];
  flags: string[];
  obsolete: boolean;
  /** First line of the entry, comments included */
  line: number;
  /** Line of the first keyword (`msgctxt` or `msgid`) */
  messageLine: number;
}

export interface PoFacts {
  language: 'po';
  file: string;
  entries: TranslationEntry[];
  /** Header fields from the empty-msgid entry */
  metadata: Record<string, string>;
}

export type ManifestValue =
  | string
  | number
  | boolean
  | null
  | ManifestValue[]
  | { [key: string]: ManifestValue };

export interface ManifestFacts {
  language: 'manifest';
  file: string;
  values: Record<string, ManifestValue>;
}

export type Facts = PythonFacts | XmlFacts | CsvFacts | PoFacts | ManifestFacts;

export type Language = Facts['language'];

/**
 * A unit that failed to parse. `line` is null when the parser gives no position.
 */
export interface ParseFailure {
  message: string;
  line: number | null;
}

/**
 * One file and what extraction made of it.
 * A failed markup unit still carries placeholder facts so that rules can run.
 */
export interface SourceUnit<F extends Facts = Facts> {
  /** Resolved absolute path */
  path: string;
  /** Path relative to the add-on root, used in messages */
  relativePath: string;
  facts: F | null;
  error: ParseFailure | null;
}
