#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { CompilationAnalyzer } from '../core/analyzer';
import { ConfigManager, ConfigTemplate } from '../core/config';
import { DiagnosticReporter, REPORT_FORMATS, ReportFormat } from '../core/reporter';
import { TOOL_NAME, TOOL_VERSION } from '../core/version';
import { getAllRules } from '../rules';
import { Diagnostic, RuleCategory } from '../core/types';

export type FailOn = 'error' | 'warning' | 'never';

export interface AnalyzeOptions {
  config?: string;
  format: ReportFormat;
  output?: string;
  failOn: FailOn;
  buildingExtension?: boolean;
}

export function shouldFail(diagnostics: readonly Diagnostic[], failOn: FailOn): boolean {
  switch (failOn) {
    case 'never':
      return false;
    case 'warning':
      return diagnostics.some(d => d.severity === 'error' || d.severity === 'warning');
    case 'error':
      return diagnostics.some(d => d.severity === 'error');
  }
}

export async function runAnalyze(snapshotPaths: string[], options: AnalyzeOptions): Promise<number> {
  try {
    console.log(chalk.blue('Analyzing compilation snapshots...'));

    const configManager = ConfigManager.getInstance();
    const config = configManager.loadConfig(process.cwd(), options.config);
    if (options.buildingExtension) {
      config.buildingExtension = true;
    }

    const analyzer = new CompilationAnalyzer(config);
    const diagnostics = await analyzer.analyze(snapshotPaths);

    const reporter = new DiagnosticReporter(analyzer.rules.map(rule => rule.descriptor));
    const report = reporter.generateReport(diagnostics, options.format);

    if (options.output) {
      reporter.writeReport(report, options.output);
      console.log(chalk.green(`Report written to ${options.output}`));
    } else {
      console.log(report);
    }

    const errorCount = diagnostics.filter(d => d.severity === 'error').length;
    const warningCount = diagnostics.filter(d => d.severity === 'warning').length;
    const infoCount = diagnostics.filter(d => d.severity === 'info').length;

    console.log('\n' + chalk.bold('Summary:'));
    console.log(`${chalk.red('Errors:')} ${errorCount}`);
    console.log(`${chalk.yellow('Warnings:')} ${warningCount}`);
    console.log(`${chalk.blue('Info:')} ${infoCount}`);

    return shouldFail(diagnostics, options.failOn) ? 1 : 0;
  } catch (error: unknown) {
    console.error(chalk.red('Analysis failed:'), error instanceof Error ? error.message : String(error));
    return 1;
  }
}

export function listRules(category?: string, buildingExtension = false): string {
  let rules = getAllRules({ buildingExtension });
  if (category) {
    rules = rules.filter(rule => rule.descriptor.category.toLowerCase() === category.toLowerCase());
  }

  let output = chalk.bold('\nAvailable rules:\n\n');
  for (const { descriptor } of rules) {
    const badge = descriptor.isEnabledByDefault ? chalk.green('[ENABLED]') : chalk.gray('[DISABLED]');
    output += `${chalk.bold(descriptor.id)} ${descriptor.title} ${badge}\n`;
    output += `  Category: ${chalk.cyan(descriptor.category)}\n`;
    output += `  Severity: ${descriptor.defaultSeverity}\n`;
    output += `  Description: ${descriptor.description}\n`;
    if (descriptor.helpUri) {
      output += `  Help: ${descriptor.helpUri}\n`;
    }
    output += '\n';
  }
  return output;
}

const program = new Command();

program.name(TOOL_NAME).description('Operation-tree rule engine for compilation snapshots').version(TOOL_VERSION);

program
  .command('analyze')
  .description('Analyze one or more compilation snapshots')
  .argument('<snapshots...>', 'Compilation snapshot files (JSON)')
  .option('-c, --config <path>', 'Path to configuration file')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('text'))
  .option('-o, --output <path>', 'Output file path')
  .addOption(new Option('--fail-on <level>', 'Fail on diagnostic level').choices(['error', 'warning', 'never']).default('error'))
  .option('--building-extension', 'Ship rules disabled by default, as in extension builds')
  .action(async (snapshotPaths: string[], options: AnalyzeOptions) => {
    process.exitCode = await runAnalyze(snapshotPaths, options);
  });

program
  .command('rules')
  .description('List available rules')
  .addOption(new Option('--category <category>', 'Filter by category').choices(['Security', 'Usage'] satisfies RuleCategory[]))
  .option('--building-extension', 'Show defaults as in extension builds')
  .action((options: { category?: string; buildingExtension?: boolean }) => {
    console.log(listRules(options.category, options.buildingExtension));
  });

program
  .command('init')
  .description('Write an opguard configuration file')
  .argument('[path]', 'Project path', '.')
  .addOption(new Option('--template <template>', 'Configuration template').choices(['default', 'strict']).default('default'))
  .action(async (projectPath: string, options: { template: ConfigTemplate }) => {
    try {
      const filePath = await ConfigManager.getInstance().initializeConfig(projectPath, options.template);
      console.log(chalk.green(`Configuration written to ${filePath}`));
    } catch (error: unknown) {
      console.error(chalk.red('Configuration initialization failed:'), error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  });

program
  .command('validate-config')
  .description('Validate an opguard configuration file')
  .argument('<config>', 'Path to configuration file')
  .action(async (configPath: string) => {
    const isValid = await ConfigManager.getInstance().validateConfig(configPath);
    if (isValid) {
      console.log(chalk.green('Configuration is valid'));
    } else {
      console.log(chalk.red('Configuration is invalid'));
      process.exitCode = 1;
    }
  });

if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('opguard failed:'), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}

export { program };
