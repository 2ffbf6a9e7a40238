/**
 * Checks over model classes: field declarations and method docstrings.
 */
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type { FieldFact, ModelFact, PythonFacts, SourceUnit } from '../facts/types.js';
import { BaseUnitRule, groupBy, type ParsedUnit } from './base.js';
import type { AddonFacts, RuleContext } from './types.js';

abstract class ModelRule extends BaseUnitRule<PythonFacts> {
  readonly language = 'python';

  protected selectUnits(addon: AddonFacts): SourceUnit<PythonFacts>[] {
    return addon.python;
  }

  protected abstract checkModel(model: ModelFact, context: RuleContext): RawDiagnostic[];

  protected checkUnit(unit: ParsedUnit<PythonFacts>, context: RuleContext): RawDiagnostic[] {
    return unit.facts.models.flatMap((model) => this.checkModel(model, context));
  }
}

export class DuplicateFieldLabelRule extends ModelRule {
  readonly name = 'duplicate-field-label';
  readonly kinds: readonly DiagnosticKind[] = ['python_duplicate_field_label'];

  protected checkModel(model: ModelFact): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    const groups = groupBy(model.fields, (field) => (field.label ? field.label : null));
    for (const [label, fields] of groups) {
      if (fields.length < 2) continue;
      const names = fields.map((f) => f.name).join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'python_duplicate_field_label',
          model.file,
          fields[0].location.line,
          `Fields (${names}) have the same label: "${label}"`
        )
      );
    }
    return diagnostics;
  }
}

export class InconsistentComputeSudoRule extends ModelRule {
  readonly name = 'inconsistent-compute-sudo';
  readonly kinds: readonly DiagnosticKind[] = ['python_inconsistent_compute_sudo'];

  protected checkModel(model: ModelFact): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    const groups = groupBy(model.fields, (field) => (field.compute ? field.compute : null));
    for (const [compute, fields] of groups) {
      if (fields.length < 2) continue;
      const values = new Set(fields.map((f) => f.computeSudo));
      if (values.size <= 1) continue;
      const names = fields.map((f) => f.name).join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'python_inconsistent_compute_sudo',
          model.file,
          fields[0].location.line,
          `Inconsistent 'compute_sudo' for fields (${names}) using compute='${compute}'`
        )
      );
    }
    return diagnostics;
  }
}

export class TrackingWithoutMailThreadRule extends ModelRule {
  readonly name = 'tracking-without-mail-thread';
  readonly kinds: readonly DiagnosticKind[] = ['python_tracking_without_mail_thread'];

  protected checkModel(model: ModelFact): RawDiagnostic[] {
    if (!model.isOdooModel || model.hasMailThread) return [];
    return model.fields
      .filter((field) => field.tracking === true)
      .map((field) =>
        this.createDiagnostic(
          'python_tracking_without_mail_thread',
          model.file,
          field.location.line,
          `Field "${field.name}" has tracking but model does not inherit from mail.thread`
        )
      );
  }
}

export class SelectionOnRelatedRule extends ModelRule {
  readonly name = 'selection-on-related';
  readonly kinds: readonly DiagnosticKind[] = ['python_selection_on_related'];

  protected checkModel(model: ModelFact): RawDiagnostic[] {
    return model.fields
      .filter((field) => field.related && field.selection)
      .map((field) =>
        this.createDiagnostic(
          'python_selection_on_related',
          model.file,
          field.location.line,
          `Field "${field.name}" is related but has selection (will be ignored)`
        )
      );
  }
}

/** Fields subject to the string/help checks: public and not related. */
function documentableFields(model: ModelFact): FieldFact[] {
  return model.fields.filter((field) => !field.isPrivate && !field.related);
}

export class FieldAttributesRule extends ModelRule {
  readonly name = 'field-attributes';
  readonly kinds: readonly DiagnosticKind[] = [
    'python_field_missing_string',
    'python_field_missing_help',
  ];

  protected checkModel(model: ModelFact, context: RuleContext): RawDiagnostic[] {
    if (!model.isOdooModel) return [];
    const { skipStringFields, skipHelpFields } = context.config;
    const diagnostics: RawDiagnostic[] = [];

    for (const field of documentableFields(model)) {
      if (!field.label && !skipStringFields.has(field.name)) {
        diagnostics.push(
          this.createDiagnostic(
            'python_field_missing_string',
            model.file,
            field.location.line,
            `Field "${field.name}" is missing string attribute`
          )
        );
      }
      if (!field.help && !skipHelpFields.has(field.name)) {
        diagnostics.push(
          this.createDiagnostic(
            'python_field_missing_help',
            model.file,
            field.location.line,
            `Field "${field.name}" is missing help attribute`
          )
        );
      }
    }
    return diagnostics;
  }
}

/**
 * `my_method` → `my method`; compared against the docstring without trailing dots.
 */
export function isUninformativeDocstring(methodName: string, docstring: string): boolean {
  const name = methodName.replace(/_/g, ' ').trim().toLowerCase();
  const doc = docstring.trim().toLowerCase().replace(/\.+$/, '');
  return doc === name;
}

export class MethodDocstringRule extends ModelRule {
  readonly name = 'method-docstring';
  readonly kinds: readonly DiagnosticKind[] = [
    'python_method_missing_docstring',
    'python_docstring_too_short',
    'python_docstring_uninformative',
  ];

  protected checkModel(model: ModelFact, context: RuleContext): RawDiagnostic[] {
    if (!model.isOdooModel) return [];
    const { skipDocstringMethods, minDocstringLength } = context.config;
    const diagnostics: RawDiagnostic[] = [];

    for (const method of model.methods) {
      if (method.isPrivate || skipDocstringMethods.has(method.name)) continue;
      const line = method.location.line;

      if (method.docstring === null) {
        diagnostics.push(
          this.createDiagnostic(
            'python_method_missing_docstring',
            model.file,
            line,
            `Public method "${method.name}" is missing docstring`
          )
        );
        continue;
      }

      if (method.docstring.trim().length < minDocstringLength) {
        diagnostics.push(
          this.createDiagnostic(
            'python_docstring_too_short',
            model.file,
            line,
            `Method "${method.name}" has too short docstring (min ${minDocstringLength} chars)`
          )
        );
      }
      if (isUninformativeDocstring(method.name, method.docstring)) {
        diagnostics.push(
          this.createDiagnostic(
            'python_docstring_uninformative',
            model.file,
            line,
            `Method "${method.name}" has uninformative docstring`
          )
        );
      }
    }
    return diagnostics;
  }
}
