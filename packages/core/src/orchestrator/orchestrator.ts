import type { DeviceFilter } from '../devices/filter';
import type { InputDevice } from '../devices/types';
import type { ProcessingConfig, SessionConfig } from '../domain/schemas';
import {
  DeviceError,
  InjectionError,
  isDictationError,
  toErrorMessage,
  type DictationErrorKind,
} from '../errors';
import type { ResolvedHotkey } from '../hotkey/keys';
import { createHotkeyStateMachine } from '../hotkey/stateMachine';
import type { HotkeySignal, HotkeySnapshot, KeyEvent } from '../hotkey/types';
import { processText } from '../pipeline/pipeline';
import type { PipelineStage } from '../pipeline/types';
import { createRecordingSession, type RecordingSession } from '../recording/session';
import type { CaptureBackend, SessionAbortReason, SessionSnapshot } from '../recording/types';
import type { TranscriptionEngine } from '../transcription/types';
import { silentLogger, type Logger } from '../util/logger';
import { withTimeout } from '../util/timeout';
import { createChannel } from './channel';
import type {
  DeviceSource,
  InboxMessage,
  Notifier,
  NotifierEvent,
  TextInjector,
} from './types';

export interface OrchestratorHooks {
  onSignal?: (signal: HotkeySignal) => void;
  onSessionEnd?: (snapshot: SessionSnapshot) => void;
  onError?: (error: unknown) => void;
}

export interface OrchestratorOptions {
  hotkey: ResolvedHotkey;
  deviceFilter: DeviceFilter;
  devices: DeviceSource;
  capture: CaptureBackend;
  transcription: TranscriptionEngine;
  injector: TextInjector;
  notifier: Notifier;
  processing: ProcessingConfig;
  session: SessionConfig;
  language: string;
  transcriptionTimeoutMs: number;
  injectionTimeoutMs: number;
  minAudioBytes?: number;
  /** Most devices read at once; the rest wait for a free slot. */
  maxDevices?: number;
  pipelineStages?: PipelineStage[];
  hooks?: OrchestratorHooks;
  logger?: Logger;
  now?: () => number;
}

export interface Orchestrator {
  /** Resolves once stop() has drained everything. */
  run(): Promise<void>;
  stop(): Promise<void>;
  post(message: InboxMessage): boolean;
  /** Waits until the inbox is empty and no session work is pending. */
  settled(): Promise<void>;
  currentSession(): SessionSnapshot | null;
  hotkeyState(): HotkeySnapshot;
  monitoredDevices(): InputDevice[];
}

const PREVIEW_LENGTH = 50;

const previewOf = (text: string) =>
  text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;

const errorKindOf = (error: unknown): DictationErrorKind =>
  isDictationError(error) ? error.kind : 'transcription';

export const createOrchestrator = (options: OrchestratorOptions): Orchestrator => {
  const log = options.logger ?? silentLogger;
  const now = options.now ?? (() => Date.now());
  const hooks = options.hooks ?? {};
  const filter = options.deviceFilter;

  const inbox = createChannel<InboxMessage>();
  const readers = new Map<string, AbortController>();
  const waiting = new Map<string, InputDevice>();
  const maxDevices = options.maxDevices ?? Number.POSITIVE_INFINITY;
  const pending = new Set<Promise<void>>();
  const delivering = new WeakSet<RecordingSession>();
  const shutdown = new AbortController();

  // The current-session slot. Only this closure writes it.
  let current: RecordingSession | null = null;
  let maxLengthTimer: ReturnType<typeof setTimeout> | null = null;
  let unwatch: (() => void) | null = null;
  let loop: Promise<void> | null = null;
  let stopping = false;

  const machine = createHotkeyStateMachine({
    hotkey: options.hotkey,
    minHoldMs: options.session.minHoldMs,
    onTransition: ({ from, to }) => log.debug(`Hotkey ${from} -> ${to}`),
  });

  const notify = (event: NotifierEvent) => {
    void Promise.resolve()
      .then(() => options.notifier.notify(event))
      .catch((error: unknown) => log.warn(`Notification failed: ${toErrorMessage(error)}`));
  };

  const track = (task: Promise<void>) => {
    const tracked = task
      .catch((error: unknown) => {
        log.error(`Unhandled session failure: ${toErrorMessage(error)}`);
      })
      .finally(() => {
        pending.delete(tracked);
      });
    pending.add(tracked);
  };

  const reported = new WeakSet<object>();

  const report = (error: unknown) => {
    // A failed start can surface through both the start and the commit path.
    if (typeof error === 'object' && error !== null) {
      if (reported.has(error)) return;
      reported.add(error);
    }
    const kind = errorKindOf(error);
    const message = toErrorMessage(error);
    log.error(`${kind} error: ${message}`);
    hooks.onError?.(error);
    notify({ type: 'error', kind, message });
  };

  const clearMaxLengthTimer = () => {
    if (!maxLengthTimer) return;
    clearTimeout(maxLengthTimer);
    maxLengthTimer = null;
  };

  const release = (session: RecordingSession) => {
    if (current !== session) return;
    clearMaxLengthTimer();
    current = null;
    hooks.onSessionEnd?.(session.snapshot());
  };

  const inject = (text: string) =>
    withTimeout((signal) => options.injector.inject(text, signal), {
      timeoutMs: options.injectionTimeoutMs,
      signal: shutdown.signal,
      onTimeout: () =>
        new InjectionError(`Text injection timed out after ${options.injectionTimeoutMs} ms`, {
          timedOut: true,
        }),
    }).catch((error: unknown) => {
      if (error instanceof InjectionError) throw error;
      throw new InjectionError(`Text injection failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    });

  const deliver = async (session: RecordingSession) => {
    delivering.add(session);
    clearMaxLengthTimer();
    notify({ type: 'transcribing' });
    try {
      const result = await session.commit();
      const processed = processText(result.text, options.processing, options.pipelineStages);
      log.info(
        `Transcribed ${session.id} (${result.language}) with ${processed.stepsApplied.join(', ')}`
      );
      if (!processed.text) {
        log.warn('No speech detected');
        notify({ type: 'done', textLength: 0, preview: '' });
        return;
      }
      await inject(processed.text);
      log.info(`Injected ${processed.text.length} characters`);
      notify({
        type: 'done',
        textLength: processed.text.length,
        preview: previewOf(processed.text),
      });
    } catch (error) {
      if (stopping) {
        log.info(`Session ${session.id} cancelled by shutdown`);
        return;
      }
      report(error);
    } finally {
      release(session);
    }
  };

  const armMaxLength = (session: RecordingSession) => {
    const limit = options.session.maxRecordingMs;
    if (limit <= 0) return;
    clearMaxLengthTimer();
    maxLengthTimer = setTimeout(() => {
      maxLengthTimer = null;
      if (current !== session || session.getState() !== 'capturing') return;
      log.warn(`Maximum recording length of ${limit} ms reached; transcribing now`);
      track(deliver(session));
    }, limit);
  };

  const startSession = async (session: RecordingSession) => {
    try {
      await session.start();
      if (session.getState() === 'capturing') {
        log.info(`Recording ${session.id}`);
        armMaxLength(session);
      }
    } catch (error) {
      report(error);
      release(session);
    }
  };

  const abortSession = async (session: RecordingSession, reason: SessionAbortReason) => {
    const aborted = await session.abort(reason);
    if (!aborted) return;
    notify({ type: 'idle' });
    release(session);
  };

  const dispatch = (signal: HotkeySignal) => {
    hooks.onSignal?.(signal);
    if (signal.type === 'sessionStart') {
      if (current) {
        log.warn(`Hotkey pressed while ${current.id} is still in progress; ignoring`);
        return;
      }
      const session = createRecordingSession(
        {
          capture: options.capture,
          transcription: options.transcription,
          language: options.language,
          transcriptionTimeoutMs: options.transcriptionTimeoutMs,
          minAudioBytes: options.minAudioBytes,
          logger: log,
          now,
        },
        signal.holdId
      );
      current = session;
      notify({ type: 'recording' });
      track(startSession(session));
      return;
    }

    const session = current;
    if (!session || session.holdId !== signal.holdId) return;

    if (signal.type === 'sessionAbort') {
      log.info(`Hold ${signal.holdId} aborted: ${signal.reason} after ${signal.heldMs} ms`);
      track(abortSession(session, signal.reason));
      return;
    }
    if (delivering.has(session)) return;
    log.info(`Hold ${signal.holdId} released after ${signal.heldMs} ms`);
    track(deliver(session));
  };

  const readDevice = async (device: InputDevice, controller: AbortController) => {
    try {
      for await (const event of options.devices.open(device, controller.signal)) {
        if ('type' in event) {
          log.warn(`Events dropped by ${device.name}; releasing its keys`);
          inbox.push({ type: 'device-lost', deviceId: event.deviceId, timestamp: event.timestamp });
          continue;
        }
        inbox.push({ type: 'key', event });
      }
    } catch (error) {
      if (!controller.signal.aborted) {
        const failure = new DeviceError(
          device.id,
          `Stopped reading ${device.name}: ${toErrorMessage(error)}`,
          { cause: error }
        );
        log.warn(failure.message);
        hooks.onError?.(failure);
      }
    } finally {
      if (readers.get(device.id) === controller) readers.delete(device.id);
      inbox.push({ type: 'device-lost', deviceId: device.id, timestamp: now() });
    }
  };

  const addDevice = (device: InputDevice) => {
    const decision = filter.admit(device);
    if (!decision.monitored) {
      log.info(
        `Skipping ${decision.classification} device ${device.name} (${decision.reason}${
          decision.matched ? `: ${decision.matched}` : ''
        })`
      );
      return;
    }
    if (readers.has(device.id) || waiting.has(device.id) || stopping) return;
    if (readers.size >= maxDevices) {
      log.warn(`Not reading ${device.name} yet: already reading ${maxDevices} devices`);
      waiting.set(device.id, device);
      return;
    }
    openReader(device);
  };

  const openReader = (device: InputDevice) => {
    log.info(`Monitoring ${device.name} at ${device.path}`);
    const controller = new AbortController();
    readers.set(device.id, controller);
    // Not tracked: a blocked read only returns with the device's next event.
    void readDevice(device, controller).catch((error: unknown) => {
      log.error(`Reader for ${device.id} failed: ${toErrorMessage(error)}`);
    });
  };

  const fillFreeSlots = () => {
    for (const device of Array.from(waiting.values())) {
      if (readers.size >= maxDevices || stopping) return;
      waiting.delete(device.id);
      openReader(device);
    }
  };

  const removeDevice = (deviceId: string) => {
    readers.get(deviceId)?.abort();
    readers.delete(deviceId);
    waiting.delete(deviceId);
    filter.remove(deviceId);
    machine.releaseDevice(deviceId, now()).forEach(dispatch);
    fillFreeSlots();
  };

  const handleKey = (event: KeyEvent) => {
    // Readers only exist for monitored devices; this keeps injected keystrokes out regardless.
    if (!filter.isMonitored(event.deviceId)) return;
    machine.handle(event).forEach(dispatch);
  };

  const handle = (message: InboxMessage) => {
    switch (message.type) {
      case 'key':
        handleKey(message.event);
        return;
      case 'device-added':
        addDevice(message.device);
        return;
      case 'device-removed':
        removeDevice(message.deviceId);
        return;
      case 'device-lost':
        machine.releaseDevice(message.deviceId, message.timestamp).forEach(dispatch);
        fillFreeSlots();
        return;
    }
  };

  const consume = async () => {
    for await (const message of inbox) {
      try {
        handle(message);
      } catch (error) {
        log.error(`Failed to handle ${message.type}: ${toErrorMessage(error)}`);
      }
    }
  };

  const run = async () => {
    if (loop) throw new Error('Orchestrator is already running');
    loop = consume();
    let devices: InputDevice[] = [];
    try {
      devices = await options.devices.list();
    } catch (error) {
      const failure = new DeviceError(
        '*',
        `Cannot enumerate input devices: ${toErrorMessage(error)}`,
        { cause: error }
      );
      log.error(`${failure.message}; waiting for devices to be plugged in`);
      hooks.onError?.(failure);
    }
    unwatch = options.devices.watch((change) => {
      if (change.type === 'added') {
        inbox.push({ type: 'device-added', device: change.device });
      } else {
        inbox.push({ type: 'device-removed', deviceId: change.deviceId });
      }
    });
    devices.forEach((device) => inbox.push({ type: 'device-added', device }));
    log.info(`Press ${options.hotkey.display} to start dictation`);
    notify({ type: 'idle' });
    await loop;
  };

  const stop = async () => {
    if (stopping) return;
    stopping = true;
    unwatch?.();
    unwatch = null;
    clearMaxLengthTimer();
    const session = current;
    if (session) {
      await session.abort('shutdown');
    }
    shutdown.abort();
    readers.forEach((controller) => controller.abort());
    readers.clear();
    waiting.clear();
    inbox.close();
    while (pending.size) {
      await Promise.allSettled(Array.from(pending));
    }
    await loop;
    machine.reset();
    notify({ type: 'idle' });
  };

  const settled = async () => {
    for (;;) {
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (inbox.size === 0 && pending.size === 0) return;
      if (pending.size) await Promise.allSettled(Array.from(pending));
    }
  };

  return {
    run,
    stop,
    post: (message) => inbox.push(message),
    settled,
    currentSession: () => current?.snapshot() ?? null,
    hotkeyState: () => machine.snapshot(),
    monitoredDevices: () =>
      filter
        .decisions()
        .filter((decision) => decision.monitored && readers.has(decision.device.id))
        .map((decision) => decision.device),
  };
};
