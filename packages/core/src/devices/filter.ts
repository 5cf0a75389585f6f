import type { DeviceFilterConfig } from '../domain/schemas';
import type { DeviceClassification, DeviceDecision, InputDevice } from './types';

export interface DeviceFilter {
  classify(device: InputDevice): Exclude<DeviceClassification, 'unknown'>;
  /** Classifies (once per device id) and reports whether to monitor the device. */
  admit(device: InputDevice): DeviceDecision;
  remove(deviceId: string): void;
  classificationOf(deviceId: string): DeviceClassification;
  isMonitored(deviceId: string): boolean;
  decisions(): DeviceDecision[];
}

const normalizeHexId = (value: string) =>
  value.trim().toLowerCase().replace(/^0x/, '').padStart(4, '0');

const findPattern = (name: string, patterns: readonly string[]) => {
  const lower = name.toLowerCase();
  return patterns.find((pattern) => lower.includes(pattern.toLowerCase()));
};

export const createDeviceFilter = (config: DeviceFilterConfig): DeviceFilter => {
  const syntheticVendors = new Set(config.syntheticVendorIds.map(normalizeHexId));
  const syntheticBuses = new Set(config.syntheticBusTypes.map(normalizeHexId));
  const cache = new Map<string, DeviceDecision>();

  const matchSynthetic = (device: InputDevice): string | undefined => {
    const pattern = findPattern(device.name, config.syntheticNamePatterns);
    if (pattern) return pattern;
    if (device.vendor && syntheticVendors.has(normalizeHexId(device.vendor))) {
      return `vendor:${normalizeHexId(device.vendor)}`;
    }
    if (device.bus && syntheticBuses.has(normalizeHexId(device.bus))) {
      return `bus:${normalizeHexId(device.bus)}`;
    }
    return undefined;
  };

  const decide = (device: InputDevice): DeviceDecision => {
    const synthetic = matchSynthetic(device);
    if (synthetic) {
      return {
        device,
        classification: 'synthetic',
        monitored: false,
        reason: 'synthetic',
        matched: synthetic,
      };
    }
    if (!device.reportsKeys) {
      return { device, classification: 'physical', monitored: false, reason: 'no-keys' };
    }
    const ignored = findPattern(device.name, config.ignoredNamePatterns);
    if (ignored) {
      return {
        device,
        classification: 'physical',
        monitored: false,
        reason: 'ignored',
        matched: ignored,
      };
    }
    return { device, classification: 'physical', monitored: true, reason: 'monitored' };
  };

  const admit = (device: InputDevice) => {
    const cached = cache.get(device.id);
    if (cached) return cached;
    const decision = decide(device);
    cache.set(device.id, decision);
    return decision;
  };

  return {
    classify: (device) => admit(device).classification,
    admit,
    remove: (deviceId) => {
      cache.delete(deviceId);
    },
    classificationOf: (deviceId) => cache.get(deviceId)?.classification ?? 'unknown',
    isMonitored: (deviceId) => cache.get(deviceId)?.monitored ?? false,
    decisions: () => Array.from(cache.values()),
  };
};
