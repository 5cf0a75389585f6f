export type DictationErrorKind = 'device' | 'capture' | 'transcription' | 'injection' | 'config';

export class DictationError extends Error {
  readonly kind: DictationErrorKind;

  constructor(kind: DictationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A device vanished or could not be opened. Only that device is dropped. */
export class DeviceError extends DictationError {
  readonly deviceId: string;

  constructor(deviceId: string, message: string, options?: { cause?: unknown }) {
    super('device', message, options);
    this.deviceId = deviceId;
  }
}

export class CaptureError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('capture', message, options);
  }
}

export class TranscriptionError extends DictationError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super('transcription', message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class InjectionError extends DictationError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super('injection', message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

/** Invalid configuration. The only error that stops the daemon. */
export class ConfigError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

export const toErrorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const isDictationError = (error: unknown): error is DictationError =>
  error instanceof DictationError;
