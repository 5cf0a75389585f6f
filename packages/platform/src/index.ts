import type {
  CaptureBackend,
  DeviceSource,
  InputDevice,
  Notifier,
  TextInjector,
  TranscriptionEngine,
} from '@holdtype/core';

export type {
  CaptureBackend,
  DeviceSource,
  InputDevice,
  Notifier,
  TextInjector,
  TranscriptionEngine,
};

export interface ToolStatus {
  name: string;
  available: boolean;
  detail?: string;
}

export interface PermissionStatus {
  /** Whether /dev/input event nodes can be opened by this user. */
  inputDevices: 'granted' | 'denied';
  tools: ToolStatus[];
}

export interface PermissionsAdapter {
  check(): Promise<PermissionStatus>;
  requestGuidance(): string;
}

export interface PlatformAdapter {
  devices: DeviceSource;
  audioCapture: CaptureBackend;
  transcription: TranscriptionEngine;
  insertText: TextInjector;
  notifier: Notifier;
  permissions: PermissionsAdapter;
}
