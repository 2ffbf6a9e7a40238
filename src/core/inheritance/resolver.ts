/**
 * Mail-thread capability resolution across the model inheritance graph.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ModelFact } from '../facts/types.js';
import { findUpSync, readFileSync } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';

const MailThreadDataSchema = z.object({
  /** Mixins that grant the capability directly */
  mixins: z.array(z.string()),
  /** Stock models known to carry the capability */
  models: z.array(z.string()),
});

export type MailThreadData = z.infer<typeof MailThreadDataSchema>;

const DATA_FILE = 'data/mail-thread-models.json';

let cachedAllowList: ReadonlySet<string> | null = null;

/**
 * Names that hold the capability before any module code is considered.
 */
export function loadMailThreadAllowList(): ReadonlySet<string> {
  if (cachedAllowList) return cachedAllowList;

  const here = path.dirname(fileURLToPath(import.meta.url));
  const file = findUpSync(here, DATA_FILE);
  if (!file) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Data file not found: ${DATA_FILE}`);
  }
  const data = MailThreadDataSchema.parse(JSON.parse(readFileSync(file)));
  cachedAllowList = new Set([...data.mixins, ...data.models]);
  return cachedAllowList;
}

/**
 * Identity of a model in the graph: `_name`, or the first `_inherit` entry for extensions.
 */
export function effectiveName(model: ModelFact): string | null {
  return model.name ?? model.inherit[0] ?? null;
}

/**
 * Mark every model that holds the capability, directly or through any chain of parents.
 *
 * Works on a worklist of newly marked names: each name is enqueued at most once, so the run
 * is bounded by the number of distinct names and terminates on cyclic graphs. Marks are only
 * ever added, and the final set does not depend on the order of `models`.
 *
 * Sets `hasMailThread` on the models and returns the set of marked names.
 */
export function resolveCapabilities(
  models: readonly ModelFact[],
  allowList: ReadonlySet<string> = loadMailThreadAllowList()
): Set<string> {
  const marked = new Set<string>(allowList);
  const worklist: string[] = [...allowList];

  // parent name -> models inheriting it; name -> models carrying that identity
  const childrenOf = new Map<string, ModelFact[]>();
  const modelsNamed = new Map<string, ModelFact[]>();
  const push = (index: Map<string, ModelFact[]>, key: string, model: ModelFact): void => {
    const list = index.get(key);
    if (list) list.push(model);
    else index.set(key, [model]);
  };

  for (const model of models) {
    model.hasMailThread = false;
    for (const parent of model.inherit) {
      push(childrenOf, parent, model);
    }
    const name = effectiveName(model);
    if (name !== null) {
      push(modelsNamed, name, model);
    }
  }

  const markModel = (model: ModelFact): void => {
    if (model.hasMailThread) return;
    model.hasMailThread = true;
    const name = effectiveName(model);
    if (name !== null && !marked.has(name)) {
      marked.add(name);
      worklist.push(name);
    }
  };

  while (worklist.length > 0) {
    const name = worklist.pop();
    if (name === undefined) break;
    for (const model of childrenOf.get(name) ?? []) markModel(model);
    for (const model of modelsNamed.get(name) ?? []) markModel(model);
  }

  return marked;
}
