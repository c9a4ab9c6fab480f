import messages from '../resources/rule-messages.json';
import { BuildFlags, RuleCategory, RuleDescriptor, Severity } from './types';

export type KnownRuleId = keyof typeof messages;

export const DEFAULT_BUILD_FLAGS: Readonly<BuildFlags> = Object.freeze({ buildingExtension: false });

export const WellKnownDiagnosticTags = {
  Telemetry: 'Telemetry',
  PortedFromFxCop: 'PortedFromFxCop'
} as const;

export interface RuleDescriptorInit {
  id: KnownRuleId;
  category: RuleCategory;
  defaultSeverity?: Severity;
  isEnabledByDefault: boolean;
  helpUri?: string;
  customTags?: readonly string[];
}

export function defineRuleDescriptor(init: RuleDescriptorInit): RuleDescriptor {
  const text = messages[init.id];
  return Object.freeze({
    id: init.id,
    title: text.title,
    messageFormat: text.messageFormat,
    description: text.description,
    category: init.category,
    defaultSeverity: init.defaultSeverity ?? 'warning',
    isEnabledByDefault: init.isEnabledByDefault,
    helpUri: init.helpUri ?? null,
    customTags: Object.freeze([...(init.customTags ?? [])])
  });
}

export function enabledByDefaultIfNotBuildingExtension(flags: BuildFlags): boolean {
  return !flags.buildingExtension;
}
