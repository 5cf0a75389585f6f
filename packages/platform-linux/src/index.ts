import {
  createHttpTranscriptionEngine,
  type DaemonConfig,
  type Logger,
  type TranscriptionEngine,
} from '@holdtype/core';
import type { PlatformAdapter } from '@holdtype/platform';
import { createRecorderCapture } from './audio';
import { createEvdevSource } from './devices';
import { createTypingInjector } from './injection';
import { createDesktopNotifier } from './notifier';
import { createLinuxPermissions } from './permissions';
import { createWhisperCliEngine } from './whisperCli';

export { KEY_NAMES, KEY_CODE_NAMES, keyNameOf } from './keycodes';
export { readInputDevices, parseProcInputDevices, toInputDevices } from './procDevices';
export { createEventDecoder, inputEventSize } from './evdev';
export { createEvdevSource } from './devices';
export { createRecorderCapture } from './audio';
export { createWhisperCliEngine, parseDetectedLanguage, resolveModelPath } from './whisperCli';
export { createTypingInjector, buildTypeCommand } from './injection';
export { createDesktopNotifier, describeEvent } from './notifier';
export { createLinuxPermissions } from './permissions';
export { runCommand, CommandError } from './exec';
export type { CommandRunner, CommandResult } from './exec';
export type { InjectionBackend } from './injection';

export interface LinuxAdapterOptions {
  config: DaemonConfig;
  logger: (scope: string) => Logger;
  fetcher?: typeof fetch;
}

const createTranscription = (
  config: DaemonConfig['transcription'],
  fetcher: typeof fetch
): TranscriptionEngine => {
  if (config.engine === 'http') {
    return createHttpTranscriptionEngine({
      fetcher,
      baseUrl: config.baseUrl ?? 'http://127.0.0.1:8080',
      model: config.model,
      apiKey: config.apiKey,
    });
  }
  return createWhisperCliEngine({
    command: config.command,
    model: config.model,
    modelDir: config.modelDir,
    threads: config.threads,
  });
};

export const createLinuxAdapter = ({
  config,
  logger,
  fetcher = fetch,
}: LinuxAdapterOptions): PlatformAdapter => ({
  devices: createEvdevSource({ logger: logger('devices') }),
  audioCapture: createRecorderCapture({
    recorder: config.capture.recorder,
    device: config.capture.device,
    sampleRate: config.capture.sampleRate,
    stopTimeoutMs: config.capture.stopTimeoutMs,
  }),
  transcription: createTranscription(config.transcription, fetcher),
  insertText: createTypingInjector({
    backend: config.injection.backend,
    delayMs: config.injection.delayMs,
  }),
  notifier: createDesktopNotifier({ ...config.notifications, logger: logger('notify') }),
  permissions: createLinuxPermissions({
    recorder: config.capture.recorder,
    injection: config.injection.backend,
    transcriptionCommand:
      config.transcription.engine === 'whisper-cli' ? config.transcription.command : undefined,
  }),
});
