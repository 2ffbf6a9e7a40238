/**
 * Placeholder compatibility between a source message and its translation.
 *
 * The source is rendered with dummy arguments derived from its own placeholders; when that
 * succeeds, the translation must render with the same arguments.
 */
import { extractPrintfArgs, renderPrintf } from './printf.js';
import { extractFormatArgs, renderFormat } from './format.js';
import { PyFormatError } from './python-error.js';

export type FormatGrammar = 'printf' | 'format';

export interface FormatIncompatibility {
  grammar: FormatGrammar;
  /** Exception repr, e.g. `KeyError('cuenta')` */
  error: string;
}

function attempt(render: () => string): PyFormatError | null {
  try {
    render();
    return null;
  } catch (error) {
    if (error instanceof PyFormatError) return error;
    throw error;
  }
}

/** `undefined` when compatible or when the source has no checkable shape. */
export function validatePrintf(reference: string, candidate: string): string | undefined {
  const args = extractPrintfArgs(reference);
  if (args === null) return undefined;
  if (attempt(() => renderPrintf(reference, args)) !== null) return undefined;
  return attempt(() => renderPrintf(candidate, args))?.repr();
}

/** `undefined` when compatible or when the source has no checkable shape. */
export function validateFormat(reference: string, candidate: string): string | undefined {
  const args = extractFormatArgs(reference);
  if (args === null) return undefined;
  if (attempt(() => renderFormat(reference, args)) !== null) return undefined;
  return attempt(() => renderFormat(candidate, args))?.repr();
}

/**
 * Check both grammars; the brace check only runs once the printf check passes.
 */
export function checkTranslation(
  reference: string,
  candidate: string
): FormatIncompatibility | null {
  const printf = validatePrintf(reference, candidate);
  if (printf !== undefined) return { grammar: 'printf', error: printf };
  const format = validateFormat(reference, candidate);
  if (format !== undefined) return { grammar: 'format', error: format };
  return null;
}
