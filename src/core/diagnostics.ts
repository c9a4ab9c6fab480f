import { Diagnostic, RuleDescriptor, Severity, SourceLocation } from './types';

export interface DiagnosticOptions {
  severity?: Severity;
  messageArgs?: readonly string[];
  additionalLocations?: readonly SourceLocation[];
}

export function createDiagnostic(
  descriptor: RuleDescriptor,
  location: SourceLocation,
  options: DiagnosticOptions = {}
): Diagnostic {
  return Object.freeze({
    ruleId: descriptor.id,
    severity: options.severity ?? descriptor.defaultSeverity,
    category: descriptor.category,
    message: formatMessage(descriptor.messageFormat, options.messageArgs ?? []),
    location,
    additionalLocations: Object.freeze([...(options.additionalLocations ?? [])])
  });
}

/**
 * Substitutes `{0}`, `{1}`, ... placeholders. Placeholders without a matching
 * argument are left as written.
 */
export function formatMessage(format: string, args: readonly string[]): string {
  return format.replace(/\{(\d+)\}/g, (placeholder, index: string) => args[Number(index)] ?? placeholder);
}

export function formatLocation(location: SourceLocation): string {
  return `${location.path}:${location.startLine}:${location.startColumn}`;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    a.location.path.localeCompare(b.location.path) ||
    a.location.startLine - b.location.startLine ||
    a.location.startColumn - b.location.startColumn ||
    a.ruleId.localeCompare(b.ruleId)
  );
}
