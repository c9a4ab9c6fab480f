import chalk from 'chalk';
import { AnalysisCancelledError } from './errors';
import { createDiagnostic, DiagnosticOptions } from './diagnostics';
import { SemanticModel } from './semantic-model';
import { descendantsAndSelf } from './traversal';
import {
  Diagnostic,
  OperationBlock,
  OperationKind,
  OperationNode,
  OpguardConfig,
  RuleDescriptor,
  Severity,
  SourceLocation
} from './types';

export interface OperationContext {
  readonly model: SemanticModel;
  readonly block: OperationBlock;
  readonly descriptor: RuleDescriptor;
  readonly severity: Severity;
  createDiagnostic(location: SourceLocation, options?: Omit<DiagnosticOptions, 'severity'>): Diagnostic;
}

export interface RuleEvaluator {
  evaluate(node: OperationNode, context: OperationContext): Diagnostic | undefined;
}

export interface AnalyzerRule {
  readonly descriptor: RuleDescriptor;
  /** Whether blocks flagged as generated code are analyzed and reported on. */
  readonly analyzeGeneratedCode: boolean;
  interestedInKinds(): ReadonlySet<OperationKind>;
  /**
   * Resolves what the rule needs from the compilation. Returning `undefined`
   * leaves the rule inert for this compilation.
   */
  onCompilationStart(model: SemanticModel): RuleEvaluator | undefined;
}

export interface EngineOptions {
  signal?: AbortSignal;
}

export interface EngineResult {
  diagnostics: Diagnostic[];
  /** Ids of enabled rules that could not resolve their well-known types. */
  inertRules: string[];
}

interface ActiveRule {
  rule: AnalyzerRule;
  evaluator: RuleEvaluator;
  severity: Severity;
}

export class RuleEngine {
  private readonly rules: AnalyzerRule[];

  constructor(
    rules: readonly AnalyzerRule[],
    private readonly config: OpguardConfig
  ) {
    this.rules = rules.filter(rule => this.isEnabled(rule.descriptor));
  }

  public get enabledRules(): readonly AnalyzerRule[] {
    return this.rules;
  }

  public run(model: SemanticModel, options: EngineOptions = {}): EngineResult {
    const inertRules: string[] = [];
    const byKind = new Map<OperationKind, ActiveRule[]>();

    for (const rule of this.rules) {
      const evaluator = rule.onCompilationStart(model);
      if (!evaluator) {
        inertRules.push(rule.descriptor.id);
        continue;
      }
      const active: ActiveRule = { rule, evaluator, severity: this.severityOf(rule.descriptor) };
      for (const kind of rule.interestedInKinds()) {
        const registered = byKind.get(kind) ?? [];
        registered.push(active);
        byKind.set(kind, registered);
      }
    }

    const diagnostics: Diagnostic[] = [];
    for (const block of model.operationBlocks) {
      for (const node of descendantsAndSelf(block.body)) {
        const interested = byKind.get(node.kind);
        if (!interested) continue;

        for (const active of interested) {
          if (block.isGenerated && !active.rule.analyzeGeneratedCode) continue;
          if (options.signal?.aborted) {
            throw new AnalysisCancelledError(model.assemblyName);
          }

          const diagnostic = this.evaluate(active, node, model, block);
          if (diagnostic) {
            diagnostics.push(diagnostic);
          }
        }
      }
    }

    return { diagnostics, inertRules };
  }

  private evaluate(
    active: ActiveRule,
    node: OperationNode,
    model: SemanticModel,
    block: OperationBlock
  ): Diagnostic | undefined {
    const { descriptor } = active.rule;
    const context: OperationContext = {
      model,
      block,
      descriptor,
      severity: active.severity,
      createDiagnostic: (location, options = {}) =>
        createDiagnostic(descriptor, location, { ...options, severity: active.severity })
    };

    try {
      return active.evaluator.evaluate(node, context);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(
        chalk.yellow(`Rule ${descriptor.id} skipped ${node.kind} at ${node.location.path}:${node.location.startLine}:`),
        reason
      );
      return undefined;
    }
  }

  private isEnabled(descriptor: RuleDescriptor): boolean {
    return this.config.rules[descriptor.id]?.enabled ?? descriptor.isEnabledByDefault;
  }

  private severityOf(descriptor: RuleDescriptor): Severity {
    return this.config.rules[descriptor.id]?.severity ?? descriptor.defaultSeverity;
  }
}
