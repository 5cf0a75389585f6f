import {
  createDeviceFilter,
  createOrchestrator,
  resolveHotkey,
  resolveMaxRecordingMs,
  type DaemonConfig,
  type DeviceDecision,
  type Logger,
  type Orchestrator,
} from '@holdtype/core';
import type { PlatformAdapter } from '@holdtype/platform';
import { KEY_NAMES } from '@holdtype/platform-linux';
import type { Env } from './paths';

const DEFAULT_THREADPOOL_SIZE = 4;
/** Threads left for file access, model loading and hot-plug checks. */
const RESERVED_THREADS = 4;

/** `m:ss`, as the recording cap is logged. */
export const formatClock = (durationMs: number) => {
  const seconds = Number.isFinite(durationMs) ? Math.max(0, Math.floor(durationMs / 1000)) : 0;
  return `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, '0')}`;
};

/** Each device read blocks one libuv thread until the device's next event. */
export const deviceReaderLimit = (env: Env = process.env) => {
  const configured = Number.parseInt(env.UV_THREADPOOL_SIZE ?? '', 10);
  const poolSize = configured > 0 ? configured : DEFAULT_THREADPOOL_SIZE;
  return Math.max(1, poolSize - RESERVED_THREADS);
};

export interface DaemonOptions {
  config: DaemonConfig;
  platform: PlatformAdapter;
  logger: (scope: string) => Logger;
  onError?: (error: unknown) => void;
  maxDevices?: number;
}

export const createDaemon = ({
  config,
  platform,
  logger,
  onError,
  maxDevices = deviceReaderLimit(),
}: DaemonOptions): Orchestrator => {
  const hotkey = resolveHotkey(config.hotkey, KEY_NAMES);
  const sessionLog = logger('session');
  const maxRecordingMs = resolveMaxRecordingMs(config);
  if (maxRecordingMs > 0) {
    sessionLog.info(`Recordings are capped at ${formatClock(maxRecordingMs)}`);
  }
  return createOrchestrator({
    hotkey,
    deviceFilter: createDeviceFilter(config.devices),
    devices: platform.devices,
    capture: platform.audioCapture,
    transcription: platform.transcription,
    injector: platform.insertText,
    notifier: platform.notifier,
    processing: config.processing,
    session: { ...config.session, maxRecordingMs },
    language: config.transcription.language,
    transcriptionTimeoutMs: config.transcription.timeoutMs,
    injectionTimeoutMs: config.injection.timeoutMs,
    minAudioBytes: config.capture.minAudioBytes,
    maxDevices,
    logger: logger('orchestrator'),
    hooks: {
      onSignal: (signal) =>
        sessionLog.debug(`Hotkey signal ${signal.type} (hold ${signal.holdId})`),
      onSessionEnd: (snapshot) =>
        sessionLog.debug(
          `Session ${snapshot.id} ended ${snapshot.state}${
            snapshot.cancellationReason ? ` (${snapshot.cancellationReason})` : ''
          }`
        ),
      onError,
    },
  });
};

export const formatDeviceDecisions = (decisions: DeviceDecision[]) =>
  decisions.map((decision) => {
    const status = decision.monitored ? 'monitored' : `skipped (${decision.reason})`;
    const matched = decision.matched ? ` [${decision.matched}]` : '';
    const { path, name } = decision.device;
    return `${path}\t${name}\t${decision.classification}\t${status}${matched}`;
  });

export const listDevices = async (config: DaemonConfig, platform: PlatformAdapter) => {
  const filter = createDeviceFilter(config.devices);
  const devices = await platform.devices.list();
  return formatDeviceDecisions(devices.map((device) => filter.admit(device)));
};
