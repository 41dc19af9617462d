/** Severity classes used by layout and render diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional layout location attached to a diagnostic record. */
export interface DiagnosticSource {
  /** Timeline position, in base units. */
  flowableX?: number;
  pageIndex?: number;
  objectKind?: string;
}

/** Canonical diagnostic object returned by every render pass. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
}

/** True when any diagnostic is an error. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
