import { AnalyzerRule } from '../core/engine';
import { DEFAULT_BUILD_FLAGS } from '../core/descriptors';
import { BuildFlags } from '../core/types';

// Security rules
import {
  createCertificateValidationRule,
  doNotDisableCertificateValidation
} from './security/do-not-disable-certificate-validation';

// Runtime rules
import {
  createDisposableFinalizerRule,
  disposableTypesShouldDeclareFinalizer
} from './runtime/disposable-types-should-declare-finalizer';

export {
  createCertificateValidationRule,
  createDisposableFinalizerRule,
  doNotDisableCertificateValidation,
  disposableTypesShouldDeclareFinalizer
};

export function getAllRules(flags: BuildFlags = DEFAULT_BUILD_FLAGS): AnalyzerRule[] {
  const rules = [createCertificateValidationRule(flags)];
  // The finalizer rule is not offered at all in extension builds.
  if (!flags.buildingExtension) {
    rules.push(createDisposableFinalizerRule(flags));
  }
  return rules;
}
