import { AnalyzerRule, RuleEvaluator } from '../../core/engine';
import {
  DEFAULT_BUILD_FLAGS,
  defineRuleDescriptor,
  enabledByDefaultIfNotBuildingExtension,
  WellKnownDiagnosticTags
} from '../../core/descriptors';
import { SemanticModel } from '../../core/semantic-model';
import { descendants, withoutSynthesized } from '../../core/traversal';
import { WellKnownTypeNames } from '../../core/well-known-types';
import { BuildFlags, MethodSymbol, OperationKind, OperationNode, TypeSymbol } from '../../core/types';

export const CERTIFICATE_VALIDATION_RULE_ID = 'CA5359';

export interface CertificateValidationTypes {
  callback: TypeSymbol;
  object: TypeSymbol;
  certificate: TypeSymbol;
  chain: TypeSymbol;
  policyErrors: TypeSymbol;
}

const KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>(['DelegateCreation']);

/**
 * True when `method` has the shape of a remote certificate validation
 * callback: `bool (object, X509Certificate, X509Chain, SslPolicyErrors)`.
 */
export function isCertificateValidationFunction(
  method: MethodSymbol,
  types: CertificateValidationTypes,
  model: SemanticModel
): boolean {
  if (method.returnType?.specialType !== 'System_Boolean') {
    return false;
  }

  const parameters = method.parameters;
  if (parameters.length !== 4) {
    return false;
  }

  return (
    model.typesEqual(parameters[0].type, types.object) &&
    model.typesEqual(parameters[1].type, types.certificate) &&
    model.typesEqual(parameters[2].type, types.chain) &&
    model.typesEqual(parameters[3].type, types.policyErrors)
  );
}

/**
 * Inspects every return in a method body. Holds only when there is at least
 * one return and every return yields the compile-time constant `true`.
 */
export function alwaysReturnsTrue(operations: Iterable<OperationNode>): boolean {
  let hasReturnStatement = false;

  for (const operation of operations) {
    if (operation.kind !== 'Return') continue;

    if (operation.returnedValue === null) {
      return false;
    }

    hasReturnStatement = true;
    const constant = operation.returnedValue.constantValue;
    if (!constant.hasValue || constant.value !== true) {
      return false;
    }
  }

  return hasReturnStatement;
}

export function resolveCertificateValidationTypes(model: SemanticModel): CertificateValidationTypes | undefined {
  const callback = model.resolveType(WellKnownTypeNames.SystemNetSecurityRemoteCertificateValidationCallback);
  const object = model.resolveType(WellKnownTypeNames.SystemObject);
  const certificate = model.resolveType(WellKnownTypeNames.SystemSecurityCryptographyX509CertificatesX509Certificate);
  const chain = model.resolveType(WellKnownTypeNames.SystemSecurityCryptographyX509CertificatesX509Chain);
  const policyErrors = model.resolveType(WellKnownTypeNames.SystemNetSecuritySslPolicyErrors);

  if (!callback || !object || !certificate || !chain || !policyErrors) {
    return undefined;
  }
  return { callback, object, certificate, chain, policyErrors };
}

export function createCertificateValidationRule(flags: BuildFlags = DEFAULT_BUILD_FLAGS): AnalyzerRule {
  const descriptor = defineRuleDescriptor({
    id: CERTIFICATE_VALIDATION_RULE_ID,
    category: 'Security',
    isEnabledByDefault: enabledByDefaultIfNotBuildingExtension(flags),
    customTags: [WellKnownDiagnosticTags.Telemetry]
  });

  return {
    descriptor,
    // Security rules also report on generated code.
    analyzeGeneratedCode: true,

    interestedInKinds() {
      return KINDS;
    },

    onCompilationStart(model: SemanticModel): RuleEvaluator | undefined {
      const types = resolveCertificateValidationTypes(model);
      if (!types) {
        return undefined;
      }

      return {
        evaluate(node, context) {
          if (node.kind !== 'DelegateCreation' || !model.typesEqual(types.callback, node.type)) {
            return undefined;
          }

          const target = node.target;
          let body: Iterable<OperationNode>;

          switch (target.kind) {
            case 'AnonymousFunction':
              if (!isCertificateValidationFunction(target.symbol, types, model)) {
                return undefined;
              }
              body = descendants(target);
              break;

            case 'MethodReference': {
              if (!isCertificateValidationFunction(target.method, types, model)) {
                return undefined;
              }
              const block = model.operationBlockOf(target.method);
              if (!block) {
                return undefined;
              }
              // A body fetched by symbol carries host-inserted wrappers.
              body = withoutSynthesized(descendants(block));
              break;
            }

            default:
              return undefined;
          }

          return alwaysReturnsTrue(body) ? context.createDiagnostic(node.location) : undefined;
        }
      };
    }
  };
}

export const doNotDisableCertificateValidation = createCertificateValidationRule();
