import { writeFileSync } from 'fs';
import chalk from 'chalk';
import { compareDiagnostics, formatLocation } from './diagnostics';
import { Diagnostic, RuleDescriptor, Severity } from './types';
import { TOOL_NAME, TOOL_VERSION } from './version';

export type ReportFormat = 'text' | 'json' | 'junit' | 'sarif';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'junit', 'sarif'];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export class DiagnosticReporter {
  constructor(private readonly descriptors: readonly RuleDescriptor[]) {}

  generateReport(diagnostics: readonly Diagnostic[], format: ReportFormat): string {
    const sorted = [...diagnostics].sort(compareDiagnostics);

    switch (format) {
      case 'json':
        return this.generateJSONReport(sorted);
      case 'junit':
        return this.generateJUnitReport(sorted);
      case 'sarif':
        return this.generateSARIFReport(sorted);
      case 'text':
      default:
        return this.generateTextReport(sorted);
    }
  }

  writeReport(report: string, outputPath: string): void {
    writeFileSync(outputPath, report, 'utf-8');
  }

  private generateTextReport(diagnostics: Diagnostic[]): string {
    if (diagnostics.length === 0) {
      return chalk.green('No diagnostics reported.\n');
    }

    let report = chalk.bold(`\n${diagnostics.length} diagnostic(s) reported:\n`);

    const groups: Array<[Severity, string, (text: string) => string]> = [
      ['error', 'ERRORS', chalk.red.bold],
      ['warning', 'WARNINGS', chalk.yellow.bold],
      ['info', 'INFO', chalk.blue.bold]
    ];

    for (const [severity, heading, color] of groups) {
      const group = diagnostics.filter(d => d.severity === severity);
      if (group.length === 0) continue;

      report += color(`\n${heading} (${group.length}):\n`);
      for (const diagnostic of group) {
        report += this.formatDiagnostic(diagnostic);
      }
    }

    return report;
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const severityColor =
      diagnostic.severity === 'error' ? chalk.red : diagnostic.severity === 'warning' ? chalk.yellow : chalk.blue;

    let formatted = `\n${severityColor('●')} ${chalk.cyan(diagnostic.ruleId)} ${chalk.bold(diagnostic.message)}\n`;
    formatted += `  Location: ${chalk.gray(formatLocation(diagnostic.location))}\n`;

    for (const location of diagnostic.additionalLocations) {
      formatted += `  Also at: ${chalk.gray(formatLocation(location))}\n`;
    }

    const helpUri = this.descriptorFor(diagnostic.ruleId)?.helpUri;
    if (helpUri) {
      formatted += `  Help: ${chalk.gray(helpUri)}\n`;
    }

    return formatted;
  }

  private generateJSONReport(diagnostics: Diagnostic[]): string {
    const report = {
      tool: TOOL_NAME,
      version: TOOL_VERSION,
      summary: {
        total: diagnostics.length,
        errors: diagnostics.filter(d => d.severity === 'error').length,
        warnings: diagnostics.filter(d => d.severity === 'warning').length,
        info: diagnostics.filter(d => d.severity === 'info').length
      },
      diagnostics
    };

    return JSON.stringify(report, null, 2);
  }

  private generateJUnitReport(diagnostics: Diagnostic[]): string {
    const errorCount = diagnostics.filter(d => d.severity === 'error').length;
    const warningCount = diagnostics.filter(d => d.severity === 'warning').length;

    let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
    xml += `<testsuite name="${TOOL_NAME}" tests="${diagnostics.length}" failures="${errorCount}" errors="0" skipped="${warningCount}">\n`;

    for (const diagnostic of diagnostics) {
      const location = this.escapeXml(formatLocation(diagnostic.location));
      xml += `  <testcase name="${diagnostic.ruleId}" classname="${location}">\n`;

      if (diagnostic.severity === 'error') {
        xml += `    <failure message="${this.escapeXml(diagnostic.message)}"/>\n`;
      } else if (diagnostic.severity === 'warning') {
        xml += `    <skipped message="${this.escapeXml(diagnostic.message)}"/>\n`;
      }

      xml += `  </testcase>\n`;
    }

    xml += '</testsuite>\n';
    return xml;
  }

  private generateSARIFReport(diagnostics: Diagnostic[]): string {
    const sarif = {
      version: '2.1.0',
      $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
      runs: [
        {
          tool: {
            driver: {
              name: TOOL_NAME,
              version: TOOL_VERSION,
              rules: this.descriptors.map(descriptor => ({
                id: descriptor.id,
                shortDescription: { text: descriptor.title },
                fullDescription: { text: descriptor.description },
                ...(descriptor.helpUri ? { helpUri: descriptor.helpUri } : {}),
                defaultConfiguration: {
                  enabled: descriptor.isEnabledByDefault,
                  level: this.sarifLevel(descriptor.defaultSeverity)
                },
                properties: { category: descriptor.category, tags: [...descriptor.customTags] }
              }))
            }
          },
          results: diagnostics.map(diagnostic => ({
            ruleId: diagnostic.ruleId,
            level: this.sarifLevel(diagnostic.severity),
            message: { text: diagnostic.message },
            locations: [diagnostic.location, ...diagnostic.additionalLocations].map(location => ({
              physicalLocation: {
                artifactLocation: { uri: location.path },
                region: {
                  startLine: location.startLine,
                  startColumn: location.startColumn,
                  endLine: location.endLine,
                  endColumn: location.endColumn
                }
              }
            }))
          }))
        }
      ]
    };

    return JSON.stringify(sarif, null, 2);
  }

  private sarifLevel(severity: Severity): 'error' | 'warning' | 'note' {
    return severity === 'info' ? 'note' : severity;
  }

  private descriptorFor(ruleId: string): RuleDescriptor | undefined {
    return this.descriptors.find(descriptor => descriptor.id === ruleId);
  }

  private escapeXml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#39;');
  }
}
