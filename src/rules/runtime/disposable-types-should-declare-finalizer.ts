import { AnalyzerRule, RuleEvaluator } from '../../core/engine';
import {
  DEFAULT_BUILD_FLAGS,
  defineRuleDescriptor,
  enabledByDefaultIfNotBuildingExtension,
  WellKnownDiagnosticTags
} from '../../core/descriptors';
import { SemanticModel } from '../../core/semantic-model';
import { WellKnownTypeNames } from '../../core/well-known-types';
import { BuildFlags, OperationKind, TypeSymbol } from '../../core/types';

export const DISPOSABLE_FINALIZER_RULE_ID = 'CA2216';

const HELP_URI = 'https://docs.microsoft.com/visualstudio/code-quality/ca2216-disposable-types-should-declare-finalizer';

const KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>(['SimpleAssignment']);

export interface NativeResourceTypes {
  handles: readonly TypeSymbol[];
  disposable: TypeSymbol;
}

export function resolveNativeResourceTypes(model: SemanticModel): NativeResourceTypes | undefined {
  const intPtr = model.resolveType(WellKnownTypeNames.SystemIntPtr);
  const uintPtr = model.resolveType(WellKnownTypeNames.SystemUIntPtr);
  const handleRef = model.resolveType(WellKnownTypeNames.SystemRuntimeInteropServicesHandleRef);
  const disposable = model.resolveType(WellKnownTypeNames.SystemIDisposable);

  if (!intPtr || !uintPtr || !handleRef || !disposable) {
    return undefined;
  }
  return { handles: [intPtr, uintPtr, handleRef], disposable };
}

export function createDisposableFinalizerRule(flags: BuildFlags = DEFAULT_BUILD_FLAGS): AnalyzerRule {
  const descriptor = defineRuleDescriptor({
    id: DISPOSABLE_FINALIZER_RULE_ID,
    category: 'Usage',
    isEnabledByDefault: enabledByDefaultIfNotBuildingExtension(flags),
    helpUri: HELP_URI,
    customTags: [WellKnownDiagnosticTags.PortedFromFxCop, WellKnownDiagnosticTags.Telemetry]
  });

  return {
    descriptor,
    analyzeGeneratedCode: false,

    interestedInKinds() {
      return KINDS;
    },

    onCompilationStart(model: SemanticModel): RuleEvaluator | undefined {
      const types = resolveNativeResourceTypes(model);
      if (!types) {
        return undefined;
      }

      const isNativeHandle = (type: TypeSymbol) => types.handles.some(handle => model.typesEqual(handle, type));
      const isDisposable = (type: TypeSymbol) =>
        [...model.interfacesOf(type)].some(iface => model.typesEqual(iface, types.disposable));

      return {
        evaluate(node, context) {
          if (node.kind !== 'SimpleAssignment') {
            return undefined;
          }

          // Unbound left-hand sides show up as a null target.
          const target = node.target;
          if (target === null || target.kind !== 'FieldReference') {
            return undefined;
          }

          const field = target.field;
          if (field.isStatic || !isNativeHandle(field.type)) {
            return undefined;
          }

          const containingType = field.containingType;
          if (containingType.isValueType || !isDisposable(containingType)) {
            return undefined;
          }

          if (model.hasFinalizer(containingType)) {
            return undefined;
          }

          const value = node.value;
          if (value === null || value.kind !== 'Invocation') {
            return undefined;
          }

          if (!model.interopMarker(value.targetMethod)) {
            return undefined;
          }

          const [primary = node.location, ...additionalLocations] = containingType.locations;
          return context.createDiagnostic(primary, {
            messageArgs: [containingType.name],
            additionalLocations
          });
        }
      };
    }
  };
}

export const disposableTypesShouldDeclareFinalizer = createDisposableFinalizerRule();
