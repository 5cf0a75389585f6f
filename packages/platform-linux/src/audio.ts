import type { EventEmitter } from 'events';
import { createRequire } from 'module';
import type { Readable } from 'stream';
import {
  CaptureError,
  type AudioBuffer,
  type CaptureBackend,
  type CaptureHandle,
} from '@holdtype/core';

/** The spawned recorder; node-record-lpcm16 exposes it as `process`. */
type RecorderProcess = EventEmitter & { stderr: Readable | null };

type RecordModule = {
  record: (options?: {
    sampleRate?: number;
    channels?: number;
    threshold?: number;
    verbose?: boolean;
    recorder?: string;
    device?: string | null;
    audioType?: string;
  }) => { stop(): void; stream(): NodeJS.ReadableStream; process: RecorderProcess };
};

const require = createRequire(import.meta.url);

let recordModule: RecordModule | null = null;

const loadRecorder = (): RecordModule => {
  if (recordModule) return recordModule;
  recordModule = require('node-record-lpcm16') as RecordModule;
  return recordModule;
};

export interface RecorderCaptureOptions {
  recorder: 'arecord' | 'sox' | 'rec';
  device?: string;
  sampleRate: number;
  stopTimeoutMs: number;
  /** Test seam; defaults to node-record-lpcm16. */
  record?: RecordModule['record'];
}

interface ActiveRecording {
  handle: CaptureHandle;
  recorder: { stop(): void };
  chunks: Uint8Array[];
  failure: Error | null;
  /** Last line the recorder wrote to stderr. */
  stderr: string;
  stopped: Promise<void>;
}

// The recorder reports a non-zero exit as a plain string.
const toError = (value: unknown) => (value instanceof Error ? value : new Error(String(value)));

const lastLine = (text: string) =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .at(-1);

const waitSpawned = (child: RecorderProcess) =>
  new Promise<Error | null>((resolve) => {
    const onSpawn = () => {
      child.removeListener('error', onError);
      resolve(null);
    };
    const onError = (error: unknown) => {
      child.removeListener('spawn', onSpawn);
      resolve(toError(error));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });

const concatChunks = (chunks: Uint8Array[]) => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const merged = new Uint8Array(total);
  let offset = 0;
  chunks.forEach((chunk) => {
    merged.set(chunk, offset);
    offset += chunk.length;
  });
  return merged;
};

let captureCounter = 0;

export const createRecorderCapture = (options: RecorderCaptureOptions): CaptureBackend => {
  const recordings = new Map<string, ActiveRecording>();

  const waitStopped = async (recording: ActiveRecording) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, options.stopTimeoutMs);
    });
    await Promise.race([recording.stopped, timeout]);
    clearTimeout(timer);
  };

  const take = (handle: CaptureHandle) => {
    const recording = recordings.get(handle.id);
    if (!recording) {
      throw new CaptureError(`Unknown capture ${handle.id}`);
    }
    recordings.delete(handle.id);
    return recording;
  };

  return {
    async start(signal) {
      if (signal.aborted) {
        throw new CaptureError('Capture start was cancelled');
      }
      const record = options.record ?? loadRecorder().record;
      const recorder = record({
        sampleRate: options.sampleRate,
        channels: 1,
        threshold: 0,
        verbose: false,
        recorder: options.recorder,
        device: options.device ?? null,
        audioType: 'raw',
      });
      const stream = recorder.stream();
      let resolveStopped = () => {};
      const stopped = new Promise<void>((resolve) => {
        resolveStopped = () => resolve();
      });
      const recording: ActiveRecording = {
        handle: { id: `capture-${(captureCounter += 1)}`, startedAt: Date.now() },
        recorder,
        chunks: [],
        failure: null,
        stderr: '',
        stopped,
      };
      const fail = (error: unknown) => {
        recording.failure ??= toError(error);
        resolveStopped();
      };
      stream.on('data', (chunk: Buffer | string) => {
        recording.chunks.push(
          typeof chunk === 'string' ? Buffer.from(chunk) : new Uint8Array(chunk)
        );
      });
      stream.on('error', fail);
      stream.on('end', resolveStopped);
      stream.on('close', resolveStopped);
      recorder.process.on('error', fail);
      recorder.process.stderr?.on('data', (chunk: Buffer | string) => {
        recording.stderr = lastLine(String(chunk)) ?? recording.stderr;
      });

      const spawnError = await waitSpawned(recorder.process);
      if (spawnError) {
        throw new CaptureError(`${options.recorder} could not start: ${spawnError.message}`, {
          cause: spawnError,
        });
      }
      if (signal.aborted) {
        recorder.stop();
        throw new CaptureError('Capture start was cancelled');
      }
      recordings.set(recording.handle.id, recording);
      return recording.handle;
    },
    async stop(handle): Promise<AudioBuffer> {
      const recording = take(handle);
      recording.recorder.stop();
      await waitStopped(recording);
      const data = concatChunks(recording.chunks);
      if (recording.failure && data.length === 0) {
        const reason = recording.stderr || recording.failure.message;
        throw new CaptureError(`${options.recorder} failed: ${reason}`, {
          cause: recording.failure,
        });
      }
      const durationMs = Math.round((data.length / 2 / options.sampleRate) * 1000);
      return { data, sampleRate: options.sampleRate, durationMs };
    },
    async cancel(handle) {
      if (!recordings.has(handle.id)) return;
      const recording = take(handle);
      recording.recorder.stop();
      await waitStopped(recording);
    },
  };
};
