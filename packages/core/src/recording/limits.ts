import type { DaemonConfig, TranscriptionConfig } from '../domain/schemas';

/** Largest file the hosted transcription API accepts. */
const HOSTED_UPLOAD_LIMIT_BYTES = 25 * 1024 * 1024;
/** Left for the WAV header and the multipart envelope. */
const HOSTED_UPLOAD_MARGIN_BYTES = 512 * 1024;

const uploadsToHostedApi = (transcription: TranscriptionConfig) =>
  transcription.engine === 'http' && (transcription.baseUrl ?? '').includes('api.openai.com');

/**
 * The recording cap to enforce. An explicit `session.maxRecordingMs` wins;
 * otherwise recordings sent to the hosted API stop before the upload would
 * outgrow its size limit, and local engines are left unlimited.
 */
export const resolveMaxRecordingMs = (config: DaemonConfig) => {
  if (config.session.maxRecordingMs > 0) return config.session.maxRecordingMs;
  if (!uploadsToHostedApi(config.transcription)) return 0;
  // Capture is 16-bit mono.
  const bytesPerSecond = config.capture.sampleRate * 2;
  const budget = HOSTED_UPLOAD_LIMIT_BYTES - HOSTED_UPLOAD_MARGIN_BYTES;
  return Math.floor((budget * 1000) / bytesPerSecond);
};
