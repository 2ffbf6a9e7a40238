/**
 * The closed set of diagnostic kinds and their default severities.
 */

export type Severity = 'error' | 'warning' | 'info';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

/** error > warning > info */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  error: 3,
  warning: 2,
  info: 1,
};

export const DIAGNOSTIC_KINDS = [
  // Parse errors
  'xml_syntax_error',
  'csv_syntax_error',
  'python_syntax_error',
  'manifest_syntax_error',
  'po_syntax_error',
  // Duplicates
  'xml_duplicate_record_id',
  'csv_duplicate_record_id',
  'po_duplicate_message_definition',
  'xml_duplicate_fields',
  // Models
  'python_duplicate_field_label',
  'python_inconsistent_compute_sudo',
  'python_tracking_without_mail_thread',
  'python_selection_on_related',
  'python_field_missing_string',
  'python_field_missing_help',
  'python_method_missing_docstring',
  'python_docstring_too_short',
  'python_docstring_uninformative',
  // Data records and views
  'xml_deprecated_active_id_usage',
  'xml_alert_missing_role',
  'xml_create_user_wo_reset_password',
  'xml_dangerous_filter_wo_user',
  'xml_hardcoded_id',
  'xml_duplicate_view_priority',
  'xml_deprecated_tree_attribute',
  'xml_deprecated_data_node',
  'xml_deprecated_openerp_xml_node',
  'xml_deprecated_t_raw',
  'xml_deprecated_qweb_directive',
  'xml_not_valid_char_link',
  'xml_redundant_module_name',
  'xml_view_dangerous_replace_low_priority',
  'xml_button_without_type',
  // Translations
  'po_requires_module',
  'po_python_parse_printf',
  'po_python_parse_format',
  // Module layout
  'missing_readme',
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

const KIND_SET: ReadonlySet<string> = new Set(DIAGNOSTIC_KINDS);

export function isDiagnosticKind(value: string): value is DiagnosticKind {
  return KIND_SET.has(value);
}

export function isSeverity(value: string): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

/** Kinds that are reported even when listed in `disabled_checks`. */
export const PARSE_ERROR_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  'xml_syntax_error',
  'csv_syntax_error',
  'python_syntax_error',
  'manifest_syntax_error',
  'po_syntax_error',
]);

/** Severity for kinds without an entry here. */
export const FALLBACK_SEVERITY: Severity = 'warning';

export const DEFAULT_SEVERITY: Readonly<Partial<Record<DiagnosticKind, Severity>>> = Object.freeze({
  xml_syntax_error: 'error',
  csv_syntax_error: 'error',
  python_syntax_error: 'error',
  manifest_syntax_error: 'error',
  po_syntax_error: 'error',
  xml_duplicate_record_id: 'error',
  csv_duplicate_record_id: 'error',
  po_duplicate_message_definition: 'error',
  xml_duplicate_fields: 'error',
  python_duplicate_field_label: 'error',
  python_inconsistent_compute_sudo: 'error',
  python_tracking_without_mail_thread: 'error',
  python_selection_on_related: 'error',
  xml_deprecated_active_id_usage: 'error',
  xml_alert_missing_role: 'error',

  xml_create_user_wo_reset_password: 'warning',
  xml_dangerous_filter_wo_user: 'warning',
  xml_hardcoded_id: 'warning',
  xml_duplicate_view_priority: 'warning',
  xml_deprecated_tree_attribute: 'warning',
  xml_deprecated_data_node: 'warning',
  xml_deprecated_openerp_xml_node: 'warning',
  xml_deprecated_t_raw: 'warning',
  xml_deprecated_qweb_directive: 'warning',
  xml_not_valid_char_link: 'warning',
  python_field_missing_string: 'warning',
  python_field_missing_help: 'warning',
  python_method_missing_docstring: 'warning',
  po_requires_module: 'warning',
  po_python_parse_printf: 'warning',
  po_python_parse_format: 'warning',

  python_docstring_too_short: 'info',
  python_docstring_uninformative: 'info',
  xml_redundant_module_name: 'info',
  missing_readme: 'info',
});
