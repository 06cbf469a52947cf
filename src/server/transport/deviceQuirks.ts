import type { DeviceClass, EndpointRef } from '../../types/device.js';

/**
 * Per-family behaviour applied while bringing a link up
 */
export interface DeviceQuirks {
  /** Drop the platform service cache before MTU negotiation */
  invalidateCacheBeforeNegotiation: boolean;
}

export interface ClassificationRule {
  deviceClass: DeviceClass;
  /** Case-insensitive substrings matched against the advertised name */
  nameContains?: string[];
  /** Case-insensitive prefixes matched against the address */
  addressPrefixes?: string[];
}

export type DeviceClassifier = (endpoint: EndpointRef) => DeviceClass;

export interface DeviceQuirkPolicy {
  classify: DeviceClassifier;
  quirksFor(deviceClass: DeviceClass): DeviceQuirks;
}

export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { deviceClass: 'nrf52', nameContains: ['rak', 't-echo', 'nrf52'] },
  { deviceClass: 'esp32', nameContains: ['esp32', 't-beam', 'heltec', 't3'] },
];

export const DEFAULT_QUIRKS: Readonly<Record<DeviceClass, DeviceQuirks>> = {
  esp32: { invalidateCacheBeforeNegotiation: true },
  nrf52: { invalidateCacheBeforeNegotiation: false },
  generic: { invalidateCacheBeforeNegotiation: false },
};

function matchesRule(rule: ClassificationRule, endpoint: EndpointRef): boolean {
  const name = endpoint.name?.toLowerCase() ?? '';
  const address = endpoint.address.toLowerCase();

  const nameHit = rule.nameContains?.some((needle) => name.includes(needle.toLowerCase())) ?? false;
  const addressHit = rule.addressPrefixes?.some((prefix) => address.startsWith(prefix.toLowerCase())) ?? false;
  return nameHit || addressHit;
}

/**
 * First matching rule wins; no match is 'generic'.
 */
export function createRuleClassifier(rules: readonly ClassificationRule[]): DeviceClassifier {
  return (endpoint) => rules.find((rule) => matchesRule(rule, endpoint))?.deviceClass ?? 'generic';
}

export function createDeviceQuirkPolicy(
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
  quirks: Partial<Record<DeviceClass, DeviceQuirks>> = {}
): DeviceQuirkPolicy {
  const table: Record<DeviceClass, DeviceQuirks> = { ...DEFAULT_QUIRKS, ...quirks };
  return {
    classify: createRuleClassifier(rules),
    quirksFor: (deviceClass) => table[deviceClass],
  };
}
