export type DeviceClassification = 'physical' | 'synthetic' | 'unknown';

export interface InputDevice {
  /** Stable for the device's lifetime, e.g. `event4`. */
  id: string;
  name: string;
  path: string;
  bus?: string;
  vendor?: string;
  product?: string;
  reportsKeys: boolean;
}

export type DeviceDecisionReason = 'monitored' | 'synthetic' | 'no-keys' | 'ignored';

export interface DeviceDecision {
  device: InputDevice;
  classification: Exclude<DeviceClassification, 'unknown'>;
  monitored: boolean;
  reason: DeviceDecisionReason;
  /** The pattern or id that made the device synthetic or ignored. */
  matched?: string;
}
