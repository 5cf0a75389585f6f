import { z } from 'zod';
import type { AudioBuffer } from '../recording/types';

export const AUTO_LANGUAGE = 'auto';

export const TranscriptionResultSchema = z.object({
  text: z.string(),
  language: z.string(),
  confidence: z.number().min(0).max(1).optional(),
});
export type TranscriptionResult = z.infer<typeof TranscriptionResultSchema>;

export interface TranscriptionRequest {
  audio: AudioBuffer;
  /** A language code, or `auto` to let the engine detect it. */
  language: string;
  signal: AbortSignal;
}

export interface TranscriptionEngine {
  readonly id: string;
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

export interface HttpTranscriptionEngineOptions {
  fetcher: typeof fetch;
  baseUrl: string;
  model: string;
  apiKey?: string;
}
