import type { HoldAbortReason } from '../hotkey/types';

export interface AudioBuffer {
  /** Raw 16-bit little-endian mono PCM. */
  data: Uint8Array;
  sampleRate: number;
  durationMs: number;
}

export interface CaptureHandle {
  readonly id: string;
  readonly startedAt: number;
}

export interface CaptureBackend {
  start(signal: AbortSignal): Promise<CaptureHandle>;
  /** Ends capture and keeps the audio. */
  stop(handle: CaptureHandle): Promise<AudioBuffer>;
  /** Ends capture and discards whatever was recorded. */
  cancel(handle: CaptureHandle): Promise<void>;
}

export type RecordingSessionState =
  | 'starting'
  | 'capturing'
  | 'transcribing'
  | 'committed'
  | 'aborted';

export type SessionAbortReason =
  | HoldAbortReason
  | 'capture-failed'
  | 'no-audio'
  | 'transcription-failed'
  | 'shutdown';

export interface SessionSnapshot {
  id: string;
  holdId: number;
  state: RecordingSessionState;
  startedAt: number;
  endedAt: number | null;
  cancellationReason: SessionAbortReason | null;
  audioDurationMs: number | null;
}
