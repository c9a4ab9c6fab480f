import chalk from 'chalk';
import { EngineOptions, RuleEngine, AnalyzerRule } from './engine';
import { getAllRules } from '../rules';
import { loadCompilation } from './snapshot';
import { SemanticModel } from './semantic-model';
import { Diagnostic, OpguardConfig } from './types';

export interface CompilationReport {
  assemblyName: string;
  diagnostics: Diagnostic[];
  inertRules: string[];
}

export class CompilationAnalyzer {
  private readonly engine: RuleEngine;

  constructor(
    config: OpguardConfig,
    rules: readonly AnalyzerRule[] = getAllRules({ buildingExtension: config.buildingExtension })
  ) {
    this.engine = new RuleEngine(rules, config);
  }

  public get rules(): readonly AnalyzerRule[] {
    return this.engine.enabledRules;
  }

  public async analyze(snapshotPaths: readonly string[], options: EngineOptions = {}): Promise<Diagnostic[]> {
    const diagnostics: Diagnostic[] = [];

    for (const snapshotPath of snapshotPaths) {
      const compilation = loadCompilation(snapshotPath);
      const report = this.analyzeCompilation(compilation, options);
      diagnostics.push(...report.diagnostics);
    }

    return diagnostics;
  }

  public analyzeCompilation(model: SemanticModel, options: EngineOptions = {}): CompilationReport {
    const result = this.engine.run(model, options);

    for (const ruleId of result.inertRules) {
      console.info(chalk.gray(`${ruleId} is inactive for ${model.assemblyName}: required types are not available`));
    }

    return {
      assemblyName: model.assemblyName,
      diagnostics: result.diagnostics,
      inertRules: result.inertRules
    };
  }
}
