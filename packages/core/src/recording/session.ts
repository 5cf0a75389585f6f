import { CaptureError, TranscriptionError, toErrorMessage } from '../errors';
import {
  TranscriptionResultSchema,
  type TranscriptionEngine,
  type TranscriptionResult,
} from '../transcription/types';
import { silentLogger, type Logger } from '../util/logger';
import { withTimeout } from '../util/timeout';
import type {
  AudioBuffer,
  CaptureBackend,
  CaptureHandle,
  RecordingSessionState,
  SessionAbortReason,
  SessionSnapshot,
} from './types';

export interface RecordingSessionDependencies {
  capture: CaptureBackend;
  transcription: TranscriptionEngine;
  language: string;
  transcriptionTimeoutMs: number;
  /** Recordings smaller than this are rejected as empty. */
  minAudioBytes?: number;
  now?: () => number;
  idFactory?: () => string;
  logger?: Logger;
}

export interface RecordingSession {
  readonly id: string;
  readonly holdId: number;
  getState(): RecordingSessionState;
  isActive(): boolean;
  snapshot(): SessionSnapshot;
  start(): Promise<void>;
  /** Returns false when the session is past the point where it can be aborted. */
  abort(reason: SessionAbortReason): Promise<boolean>;
  commit(): Promise<TranscriptionResult>;
}

let sessionCounter = 0;

const settle = async (promise: Promise<unknown> | null) => {
  if (!promise) return;
  try {
    await promise;
  } catch {
    // the start path reports its own failure
  }
};

export const createRecordingSession = (
  deps: RecordingSessionDependencies,
  holdId: number
): RecordingSession => {
  const now = deps.now ?? (() => Date.now());
  const log = deps.logger ?? silentLogger;
  const id = deps.idFactory?.() ?? `session-${(sessionCounter += 1)}`;
  const startedAt = now();

  let state: RecordingSessionState = 'starting';
  let endedAt: number | null = null;
  let cancellationReason: SessionAbortReason | null = null;
  let audioDurationMs: number | null = null;
  let handle: CaptureHandle | null = null;
  let startPromise: Promise<void> | null = null;
  const startController = new AbortController();
  const transcribeController = new AbortController();

  const finish = (next: 'committed' | 'aborted', reason: SessionAbortReason | null = null) => {
    state = next;
    cancellationReason = reason;
    endedAt = now();
    handle = null;
  };

  const discard = async (target: CaptureHandle) => {
    try {
      await deps.capture.cancel(target);
    } catch (error) {
      log.warn(`Failed to discard capture for ${id}: ${toErrorMessage(error)}`);
    }
  };

  const runStart = async () => {
    let started: CaptureHandle;
    try {
      started = await deps.capture.start(startController.signal);
    } catch (error) {
      if (state === 'aborted') return;
      finish('aborted', 'capture-failed');
      throw new CaptureError(`Audio capture failed to start: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (state === 'aborted') {
      // Abort arrived while the backend was starting; abort() waits for us.
      handle = started;
      return;
    }
    handle = started;
    state = 'capturing';
    log.debug(`Session ${id} capturing`);
  };

  const start = () => {
    if (!startPromise) {
      startPromise = runStart();
    }
    return startPromise;
  };

  const abort = async (reason: SessionAbortReason) => {
    if (state === 'starting') {
      state = 'aborted';
      cancellationReason = reason;
      endedAt = now();
      startController.abort();
      await settle(startPromise);
      const pending = handle;
      handle = null;
      if (pending) await discard(pending);
      log.info(`Session ${id} aborted while starting (${reason})`);
      return true;
    }
    if (state === 'capturing') {
      const pending = handle;
      finish('aborted', reason);
      if (pending) await discard(pending);
      log.info(`Session ${id} aborted (${reason})`);
      return true;
    }
    if (state === 'transcribing' && reason === 'shutdown') {
      const pending = handle;
      finish('aborted', reason);
      transcribeController.abort();
      if (pending) await discard(pending);
      log.info(`Session ${id} cancelled during transcription`);
      return true;
    }
    return false;
  };

  const stopCapture = async (target: CaptureHandle): Promise<AudioBuffer> => {
    try {
      return await deps.capture.stop(target);
    } catch (error) {
      if (state === 'transcribing') finish('aborted', 'capture-failed');
      throw new CaptureError(`Audio capture failed to stop: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  };

  const commit = async (): Promise<TranscriptionResult> => {
    // A failed start rejects again here with the same error.
    if (state === 'starting' || cancellationReason === 'capture-failed') {
      await start();
    }
    const target = handle;
    if (state !== 'capturing' || !target) {
      throw new CaptureError(`Session ${id} is not capturing (${state})`);
    }
    state = 'transcribing';

    const audio = await stopCapture(target);
    handle = null;
    audioDurationMs = audio.durationMs;
    if (state !== 'transcribing') {
      throw new TranscriptionError('Session cancelled before transcription');
    }
    const minAudioBytes = Math.max(1, deps.minAudioBytes ?? 0);
    if (audio.data.length < minAudioBytes) {
      finish('aborted', 'no-audio');
      throw new CaptureError('No audio recorded');
    }

    const timeoutMs = deps.transcriptionTimeoutMs;
    let raw: TranscriptionResult;
    try {
      raw = await withTimeout(
        (signal) => deps.transcription.transcribe({ audio, language: deps.language, signal }),
        {
          timeoutMs,
          signal: transcribeController.signal,
          onTimeout: () =>
            new TranscriptionError(`Transcription timed out after ${timeoutMs} ms`, {
              timedOut: true,
            }),
        }
      );
    } catch (error) {
      if (state === 'transcribing') finish('aborted', 'transcription-failed');
      if (error instanceof TranscriptionError) throw error;
      throw new TranscriptionError(`Transcription failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (state !== 'transcribing') {
      throw new TranscriptionError('Transcription cancelled');
    }

    const parsed = TranscriptionResultSchema.safeParse(raw);
    if (!parsed.success) {
      finish('aborted', 'transcription-failed');
      throw new TranscriptionError('Transcription engine returned a malformed result', {
        cause: parsed.error,
      });
    }
    finish('committed');
    log.debug(`Session ${id} committed (${parsed.data.text.length} chars)`);
    return parsed.data;
  };

  return {
    id,
    holdId,
    getState: () => state,
    isActive: () => state === 'starting' || state === 'capturing' || state === 'transcribing',
    snapshot: () => ({
      id,
      holdId,
      state,
      startedAt,
      endedAt,
      cancellationReason,
      audioDurationMs,
    }),
    start,
    abort,
    commit,
  };
};
