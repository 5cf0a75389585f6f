import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CaptureError,
  DeviceError,
  DeviceFilterConfigSchema,
  HotkeyConfigSchema,
  ProcessingConfigSchema,
  SessionConfigSchema,
  createChannel,
  createDeviceFilter,
  createOrchestrator,
  resolveHotkey,
  type AudioBuffer,
  type CaptureHandle,
  type Channel,
  type DeviceChange,
  type DeviceSource,
  type InputDevice,
  type NotifierEvent,
  type Orchestrator,
  type RawDeviceEvent,
  type SessionSnapshot,
  type TranscriptionRequest,
  type TranscriptionResult,
} from '@holdtype/core';

const keyboard: InputDevice = {
  id: 'event0',
  name: 'AT Translated Set 2 keyboard',
  path: '/dev/input/event0',
  bus: '0011',
  reportsKeys: true,
};

const externalKeyboard: InputDevice = {
  id: 'event4',
  name: 'USB Keyboard',
  path: '/dev/input/event4',
  bus: '0003',
  reportsKeys: true,
};

const ydotoold: InputDevice = {
  id: 'event7',
  name: 'ydotoold virtual device',
  path: '/dev/input/event7',
  bus: '0006',
  reportsKeys: true,
};

const createFakeDevices = (initial: InputDevice[]) => {
  const streams = new Map<string, Channel<RawDeviceEvent>>();
  let listener: ((change: DeviceChange) => void) | null = null;
  const source: DeviceSource = {
    list: vi.fn(async () => initial),
    watch: (next) => {
      listener = next;
      return () => {
        listener = null;
      };
    },
    open: (device, signal) => {
      const channel = createChannel<RawDeviceEvent>();
      streams.set(device.id, channel);
      signal.addEventListener('abort', () => channel.close(), { once: true });
      return channel;
    },
  };
  return {
    source,
    press: (deviceId: string, key: string, action: 'down' | 'up', timestamp: number) =>
      streams.get(deviceId)?.push({ deviceId, key, action, timestamp }),
    unplug: (deviceId: string) => streams.get(deviceId)?.close(),
    change: (change: DeviceChange) => listener?.(change),
    opened: () => Array.from(streams.keys()),
  };
};

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((next) => {
    resolve = next;
  });
  return { promise, resolve };
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const running: Array<{ orchestrator: Orchestrator; done: Promise<void> }> = [];

interface SetupOptions {
  devices?: InputDevice[];
  text?: string;
  maxRecordingMs?: number;
  injectionTimeoutMs?: number;
  maxDevices?: number;
  listError?: Error;
}

const setup = async (options: SetupOptions = {}) => {
  const fake = createFakeDevices(options.devices ?? [keyboard, externalKeyboard, ydotoold]);
  if (options.listError) {
    vi.mocked(fake.source.list).mockRejectedValueOnce(options.listError);
  }
  const handle: CaptureHandle = { id: 'capture-1', startedAt: 0 };
  const capture = {
    start: vi.fn(async (_signal: AbortSignal) => handle),
    stop: vi.fn(
      async (_handle: CaptureHandle): Promise<AudioBuffer> => ({
        data: new Uint8Array(3200),
        sampleRate: 16000,
        durationMs: 100,
      })
    ),
    cancel: vi.fn(async (_handle: CaptureHandle) => undefined),
  };
  const transcribe = vi.fn(
    async (_request: TranscriptionRequest): Promise<TranscriptionResult> => ({
      text: options.text ?? 'um so hello world',
      language: 'en',
    })
  );
  const inject = vi.fn(async (_text: string, _signal: AbortSignal) => undefined);
  const notify = vi.fn((_event: NotifierEvent) => undefined);
  const onSessionEnd = vi.fn((_snapshot: SessionSnapshot) => undefined);
  const onError = vi.fn((_error: unknown) => undefined);

  const orchestrator = createOrchestrator({
    hotkey: resolveHotkey(HotkeyConfigSchema.parse({})),
    deviceFilter: createDeviceFilter(DeviceFilterConfigSchema.parse({})),
    devices: fake.source,
    capture,
    transcription: { id: 'fake', transcribe },
    injector: { inject },
    notifier: { notify },
    processing: ProcessingConfigSchema.parse({}),
    session: SessionConfigSchema.parse({ maxRecordingMs: options.maxRecordingMs ?? 0 }),
    language: 'en',
    transcriptionTimeoutMs: 1000,
    injectionTimeoutMs: options.injectionTimeoutMs ?? 1000,
    maxDevices: options.maxDevices,
    hooks: { onSessionEnd, onError },
  });
  const done = orchestrator.run();
  running.push({ orchestrator, done });
  await orchestrator.settled();

  const events = () => notify.mock.calls.map(([event]) => event);
  const hold = async (deviceId = 'event0', start = 1000, heldMs = 490) => {
    fake.press(deviceId, 'leftmeta', 'down', start);
    fake.press(deviceId, 'dot', 'down', start + 10);
    fake.press(deviceId, 'dot', 'up', start + 10 + heldMs);
    fake.press(deviceId, 'leftmeta', 'up', start + 20 + heldMs);
    await orchestrator.settled();
  };

  return {
    fake,
    orchestrator,
    done,
    capture,
    transcribe,
    inject,
    notify,
    onSessionEnd,
    onError,
    events,
    hold,
  };
};

afterEach(async () => {
  await Promise.all(running.map(({ orchestrator }) => orchestrator.stop()));
  await Promise.all(running.map(({ done }) => done));
  running.length = 0;
});

describe('orchestrator', () => {
  it('opens readers for physical keyboards only', async () => {
    const { fake, orchestrator } = await setup();
    expect(fake.opened()).toEqual(['event0', 'event4']);
    expect(orchestrator.monitoredDevices().map((device) => device.id)).toEqual([
      'event0',
      'event4',
    ]);
  });

  it('transcribes, cleans up and types a held dictation', async () => {
    const ctx = await setup();
    await ctx.hold();

    expect(ctx.transcribe).toHaveBeenCalledTimes(1);
    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
    expect(ctx.events()).toEqual([
      { type: 'idle' },
      { type: 'recording' },
      { type: 'transcribing' },
      { type: 'done', textLength: 14, preview: 'So hello world' },
    ]);
    expect(ctx.onSessionEnd).toHaveBeenCalledWith(
      expect.objectContaining({ holdId: 1, state: 'committed' })
    );
    expect(ctx.orchestrator.currentSession()).toBeNull();
    expect(ctx.orchestrator.hotkeyState().state).toBe('idle');
  });

  it('never reacts to keys from synthetic devices', async () => {
    const ctx = await setup();
    ctx.orchestrator.post({
      type: 'key',
      event: { deviceId: 'event7', key: 'leftmeta', action: 'down', timestamp: 1 },
    });
    ctx.orchestrator.post({
      type: 'key',
      event: { deviceId: 'event7', key: 'dot', action: 'down', timestamp: 2 },
    });
    await ctx.orchestrator.settled();

    expect(ctx.capture.start).not.toHaveBeenCalled();
    expect(ctx.orchestrator.hotkeyState().state).toBe('idle');
  });

  it('arms with the modifier on one keyboard and the key on another', async () => {
    const ctx = await setup();
    ctx.fake.press('event0', 'rightmeta', 'down', 0);
    ctx.fake.press('event4', 'dot', 'down', 10);
    ctx.fake.press('event4', 'dot', 'up', 400);
    await ctx.orchestrator.settled();

    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
  });

  it('discards the recording when the modifier is released first', async () => {
    const ctx = await setup();
    ctx.fake.press('event0', 'leftmeta', 'down', 0);
    ctx.fake.press('event0', 'dot', 'down', 10);
    ctx.fake.press('event0', 'leftmeta', 'up', 200);
    ctx.fake.press('event0', 'dot', 'up', 250);
    await ctx.orchestrator.settled();

    expect(ctx.capture.cancel).toHaveBeenCalledTimes(1);
    expect(ctx.transcribe).not.toHaveBeenCalled();
    expect(ctx.inject).not.toHaveBeenCalled();
    expect(ctx.onSessionEnd).toHaveBeenCalledWith(
      expect.objectContaining({ state: 'aborted', cancellationReason: 'modifier-released-early' })
    );
    expect(ctx.events().at(-1)).toEqual({ type: 'idle' });
  });

  it('does not transcribe taps shorter than the minimum hold', async () => {
    const ctx = await setup();
    await ctx.hold('event0', 1000, 20);

    expect(ctx.capture.cancel).toHaveBeenCalledTimes(1);
    expect(ctx.transcribe).not.toHaveBeenCalled();
    expect(ctx.onSessionEnd).toHaveBeenCalledWith(
      expect.objectContaining({ cancellationReason: 'too-short' })
    );
  });

  it('keeps a single session while one is still transcribing', async () => {
    const ctx = await setup();
    const result = deferred<TranscriptionResult>();
    ctx.transcribe.mockImplementationOnce(() => result.promise);

    ctx.fake.press('event0', 'leftmeta', 'down', 0);
    ctx.fake.press('event0', 'dot', 'down', 10);
    ctx.fake.press('event0', 'dot', 'up', 500);
    await vi.waitFor(() => expect(ctx.transcribe).toHaveBeenCalledTimes(1));

    ctx.fake.press('event0', 'dot', 'down', 600);
    ctx.fake.press('event0', 'dot', 'up', 1100);
    await flush();
    await flush();
    expect(ctx.capture.start).toHaveBeenCalledTimes(1);

    result.resolve({ text: 'first take', language: 'en' });
    await ctx.orchestrator.settled();
    expect(ctx.inject).toHaveBeenCalledTimes(1);
    expect(ctx.inject).toHaveBeenCalledWith('First take', expect.any(AbortSignal));
  });

  it('skips typing when nothing but fillers was heard', async () => {
    const ctx = await setup({ text: 'um uh' });
    await ctx.hold();

    expect(ctx.inject).not.toHaveBeenCalled();
    expect(ctx.events().at(-1)).toEqual({ type: 'done', textLength: 0, preview: '' });
  });

  it('previews long text in the completion notice', async () => {
    const text = 'this sentence is long enough that the notification has to cut it short';
    const ctx = await setup({ text });
    await ctx.hold();

    expect(ctx.events().at(-1)).toEqual({
      type: 'done',
      textLength: text.length,
      preview: 'This sentence is long enough that the notification...',
    });
  });

  it('reports transcription failures and recovers', async () => {
    const ctx = await setup();
    ctx.transcribe.mockRejectedValueOnce(new Error('engine crashed'));
    await ctx.hold();

    expect(ctx.inject).not.toHaveBeenCalled();
    expect(ctx.onError).toHaveBeenCalledTimes(1);
    expect(ctx.events().at(-1)).toEqual({
      type: 'error',
      kind: 'transcription',
      message: 'Transcription failed: engine crashed',
    });
    expect(ctx.orchestrator.currentSession()).toBeNull();

    await ctx.hold('event0', 5000);
    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
  });

  it('times out a stuck injection', async () => {
    const ctx = await setup({ injectionTimeoutMs: 20 });
    ctx.inject.mockImplementationOnce(
      (_text, signal) =>
        new Promise<undefined>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );
    await ctx.hold();

    expect(ctx.events().at(-1)).toEqual({
      type: 'error',
      kind: 'injection',
      message: 'Text injection timed out after 20 ms',
    });
    expect(ctx.orchestrator.currentSession()).toBeNull();
  });

  it('aborts the hold when its keyboard disappears', async () => {
    const ctx = await setup();
    ctx.fake.press('event0', 'leftmeta', 'down', 0);
    ctx.fake.press('event0', 'dot', 'down', 10);
    await ctx.orchestrator.settled();
    ctx.fake.unplug('event0');
    await ctx.orchestrator.settled();

    expect(ctx.transcribe).not.toHaveBeenCalled();
    expect(ctx.onSessionEnd).toHaveBeenCalledWith(
      expect.objectContaining({ cancellationReason: 'device-lost' })
    );
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual(['event4']);
  });

  it('follows keyboards that are plugged in and removed', async () => {
    const ctx = await setup({ devices: [keyboard] });
    const added: InputDevice = { ...externalKeyboard, id: 'event9', path: '/dev/input/event9' };
    ctx.fake.change({ type: 'added', device: added });
    await ctx.orchestrator.settled();
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual([
      'event0',
      'event9',
    ]);

    ctx.fake.change({ type: 'removed', deviceId: 'event9' });
    await ctx.orchestrator.settled();
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual(['event0']);
  });

  it('transcribes when the maximum recording length is reached', async () => {
    const ctx = await setup({ maxRecordingMs: 30 });
    ctx.fake.press('event0', 'leftmeta', 'down', 0);
    ctx.fake.press('event0', 'dot', 'down', 10);
    await vi.waitFor(() => expect(ctx.inject).toHaveBeenCalledTimes(1));

    ctx.fake.press('event0', 'dot', 'up', 5000);
    await ctx.orchestrator.settled();
    expect(ctx.transcribe).toHaveBeenCalledTimes(1);
    expect(ctx.inject).toHaveBeenCalledTimes(1);
  });

  it('discards an in-flight recording on shutdown', async () => {
    const ctx = await setup();
    ctx.fake.press('event0', 'leftmeta', 'down', 0);
    ctx.fake.press('event0', 'dot', 'down', 10);
    await ctx.orchestrator.settled();

    await ctx.orchestrator.stop();
    await ctx.done;
    expect(ctx.capture.cancel).toHaveBeenCalledTimes(1);
    expect(ctx.transcribe).not.toHaveBeenCalled();
    expect(ctx.inject).not.toHaveBeenCalled();
    expect(ctx.orchestrator.hotkeyState().state).toBe('idle');
  });

  it('reports a recorder that cannot start and recovers', async () => {
    const ctx = await setup();
    ctx.capture.start.mockRejectedValueOnce(
      new CaptureError('arecord could not start: spawn arecord ENOENT')
    );
    await ctx.hold();

    expect(ctx.events().filter((event) => event.type === 'error')).toEqual([
      {
        type: 'error',
        kind: 'capture',
        message: 'Audio capture failed to start: arecord could not start: spawn arecord ENOENT',
      },
    ]);
    expect(ctx.events().at(-1)).toEqual(expect.objectContaining({ type: 'error' }));
    expect(ctx.onError).toHaveBeenCalledTimes(1);
    expect(ctx.onSessionEnd).toHaveBeenCalledWith(
      expect.objectContaining({ cancellationReason: 'capture-failed' })
    );
    expect(ctx.capture.stop).not.toHaveBeenCalled();
    expect(ctx.transcribe).not.toHaveBeenCalled();
    expect(ctx.orchestrator.currentSession()).toBeNull();

    await ctx.hold('event0', 5000);
    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
  });

  it('keeps running when devices cannot be listed', async () => {
    const ctx = await setup({ listError: new Error('permission denied') });

    expect(ctx.onError).toHaveBeenCalledTimes(1);
    const [[failure]] = ctx.onError.mock.calls;
    expect(failure).toBeInstanceOf(DeviceError);
    expect(failure).toMatchObject({
      deviceId: '*',
      message: 'Cannot enumerate input devices: permission denied',
    });
    expect(ctx.orchestrator.monitoredDevices()).toEqual([]);
    expect(ctx.events()).toEqual([{ type: 'idle' }]);

    ctx.fake.change({ type: 'added', device: keyboard });
    await ctx.orchestrator.settled();
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual(['event0']);

    await ctx.hold();
    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
  });

  it('reads at most the configured number of devices', async () => {
    const ctx = await setup({ maxDevices: 1 });
    expect(ctx.fake.opened()).toEqual(['event0']);
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual(['event0']);

    ctx.fake.change({ type: 'removed', deviceId: 'event0' });
    await ctx.orchestrator.settled();
    expect(ctx.fake.opened()).toEqual(['event0', 'event4']);
    expect(ctx.orchestrator.monitoredDevices().map((device) => device.id)).toEqual(['event4']);

    await ctx.hold('event4');
    expect(ctx.inject).toHaveBeenCalledWith('So hello world', expect.any(AbortSignal));
  });
});
