import { createReadStream, watch, type FSWatcher } from 'fs';
import { access } from 'fs/promises';
import {
  DeviceError,
  silentLogger,
  toErrorMessage,
  type DeviceChange,
  type DeviceSource,
  type InputDevice,
  type Logger,
  type RawDeviceEvent,
} from '@holdtype/core';
import { createEventDecoder, inputEventSize } from './evdev';
import { PROC_INPUT_DEVICES, readInputDevices } from './procDevices';

export interface EvdevSourceOptions {
  devDir?: string;
  procPath?: string;
  /** udev needs a moment to set permissions on a new node. */
  settleMs?: number;
  logger?: Logger;
}

const EVENT_NODE = /^event\d+$/;

const errorCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const isGone = (error: unknown) => {
  const code = errorCode(error);
  return code === 'ENODEV' || code === 'ENOENT';
};

const isAbort = (error: unknown) => error instanceof Error && error.name === 'AbortError';

export const createEvdevSource = (options: EvdevSourceOptions = {}): DeviceSource => {
  const devDir = options.devDir ?? '/dev/input';
  const procPath = options.procPath ?? PROC_INPUT_DEVICES;
  const settleMs = options.settleMs ?? 250;
  const log = options.logger ?? silentLogger;

  const list = () => readInputDevices(procPath);

  const watchDevices = (listener: (change: DeviceChange) => void) => {
    const known = new Set<string>();
    const timers = new Set<ReturnType<typeof setTimeout>>();
    let closed = false;

    const announce = async (id: string) => {
      try {
        await access(`${devDir}/${id}`);
      } catch {
        if (known.delete(id)) listener({ type: 'removed', deviceId: id });
        return;
      }
      if (known.has(id)) return;
      const device = (await list()).find((candidate) => candidate.id === id);
      if (!device || closed) return;
      known.add(id);
      listener({ type: 'added', device });
    };

    const schedule = (id: string) => {
      const timer = setTimeout(() => {
        timers.delete(timer);
        announce(id).catch((error: unknown) => {
          log.warn(`Failed to inspect ${id}: ${toErrorMessage(error)}`);
        });
      }, settleMs);
      timers.add(timer);
    };

    void list()
      .then((devices) => devices.forEach((device) => known.add(device.id)))
      .catch((error: unknown) =>
        log.warn(`Failed to list input devices: ${toErrorMessage(error)}`)
      );

    let watcher: FSWatcher | null = null;
    try {
      watcher = watch(devDir, (_event, filename) => {
        if (closed || !filename || !EVENT_NODE.test(filename)) return;
        schedule(filename);
      });
      watcher.on('error', (error) => log.warn(`Device watcher failed: ${toErrorMessage(error)}`));
    } catch (error) {
      log.warn(`Hot-plug detection unavailable: ${toErrorMessage(error)}`);
    }

    return () => {
      closed = true;
      timers.forEach((timer) => clearTimeout(timer));
      timers.clear();
      watcher?.close();
    };
  };

  async function* open(device: InputDevice, signal: AbortSignal): AsyncIterable<RawDeviceEvent> {
    const decoder = createEventDecoder({ deviceId: device.id });
    const stream = createReadStream(device.path, {
      signal,
      highWaterMark: inputEventSize() * 64,
    });
    try {
      for await (const chunk of stream) {
        if (!(chunk instanceof Uint8Array)) continue;
        yield* decoder.push(chunk);
      }
    } catch (error) {
      if (isAbort(error) || signal.aborted) return;
      if (isGone(error)) {
        log.info(`Input device ${device.id} disconnected`);
        return;
      }
      throw new DeviceError(device.id, `Cannot read ${device.path}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    } finally {
      stream.destroy();
    }
  }

  return { list, watch: watchDevices, open };
};
