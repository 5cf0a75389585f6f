import type { DictationErrorKind } from '../errors';
import type { InputDevice } from '../devices/types';
import type { KeyEvent } from '../hotkey/types';

export type NotifierEvent =
  | { type: 'idle' }
  | { type: 'recording' }
  | { type: 'transcribing' }
  | { type: 'done'; textLength: number; preview: string }
  | { type: 'error'; kind: DictationErrorKind; message: string };

export interface Notifier {
  /** Fire-and-forget; a returned promise is never awaited by the caller. */
  notify(event: NotifierEvent): void | Promise<void>;
}

export interface TextInjector {
  inject(text: string, signal: AbortSignal): Promise<void>;
}

/** What a device reader yields: key events, or notice that events were lost. */
export type RawDeviceEvent = KeyEvent | { type: 'dropped'; deviceId: string; timestamp: number };

export type DeviceChange =
  | { type: 'added'; device: InputDevice }
  | { type: 'removed'; deviceId: string };

export interface DeviceSource {
  list(): Promise<InputDevice[]>;
  /** Returns an unsubscribe function. */
  watch(listener: (change: DeviceChange) => void): () => void;
  /** Ends when the device disappears or the signal aborts; throws when it cannot be read. */
  open(device: InputDevice, signal: AbortSignal): AsyncIterable<RawDeviceEvent>;
}

export type InboxMessage =
  | { type: 'key'; event: KeyEvent }
  | { type: 'device-added'; device: InputDevice }
  | { type: 'device-removed'; deviceId: string }
  | { type: 'device-lost'; deviceId: string; timestamp: number };
