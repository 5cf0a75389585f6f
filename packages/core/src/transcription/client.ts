import { TranscriptionError } from '../errors';
import type { AudioBuffer } from '../recording/types';
import {
  AUTO_LANGUAGE,
  type HttpTranscriptionEngineOptions,
  type TranscriptionEngine,
  type TranscriptionRequest,
  type TranscriptionResult,
} from './types';

const isOpenAIBaseUrl = (baseUrl: string) => baseUrl.includes('api.openai.com');

const joinUrl = (base: string, path: string) => {
  if (!base.endsWith('/') && !path.startsWith('/')) return `${base}/${path}`;
  if (base.endsWith('/') && path.startsWith('/')) return `${base}${path.slice(1)}`;
  return `${base}${path}`;
};

export const resolveOpenAITranscriptionUrl = (baseUrl: string) => {
  if (baseUrl.includes('/v1/audio')) {
    return joinUrl(baseUrl, 'transcriptions');
  }
  if (baseUrl.endsWith('/v1')) {
    return joinUrl(baseUrl, 'audio/transcriptions');
  }
  if (baseUrl.includes('/v1/')) {
    return joinUrl(baseUrl, 'audio/transcriptions');
  }
  return joinUrl(baseUrl, '/v1/audio/transcriptions');
};

export const encodeWav = (pcm: Uint8Array, sampleRate = 16000, channels = 1, bitDepth = 16) => {
  const bytesPerSample = bitDepth / 8;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;
  const dataSize = pcm.length;
  const buffer = new ArrayBuffer(44 + dataSize);
  const view = new DataView(buffer);

  const writeString = (offset: number, value: string) => {
    for (let i = 0; i < value.length; i += 1) {
      view.setUint8(offset + i, value.charCodeAt(i));
    }
  };

  writeString(0, 'RIFF');
  view.setUint32(4, 36 + dataSize, true);
  writeString(8, 'WAVE');
  writeString(12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, channels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitDepth, true);
  writeString(36, 'data');
  view.setUint32(40, dataSize, true);

  new Uint8Array(buffer, 44).set(pcm);
  return new Uint8Array(buffer);
};

const readTextField = (data: unknown, field: string) => {
  if (typeof data !== 'object' || data === null) return undefined;
  const value: unknown = Reflect.get(data, field);
  return typeof value === 'string' ? value : undefined;
};

const toResult = (data: unknown, hint: string): TranscriptionResult => {
  const text = readTextField(data, 'text');
  if (text === undefined) {
    throw new TranscriptionError('Transcription response did not include text');
  }
  const language = readTextField(data, 'language') ?? hint;
  return { text: text.trim(), language };
};

/**
 * Transcription over HTTP. OpenAI-compatible base URLs get a multipart WAV
 * upload; anything else receives raw PCM at `<baseUrl>/transcriptions`.
 */
export const createHttpTranscriptionEngine = (
  options: HttpTranscriptionEngineOptions
): TranscriptionEngine => {
  const sendOpenAI = async (audio: AudioBuffer, language: string, signal: AbortSignal) => {
    if (!options.apiKey) {
      throw new TranscriptionError('OpenAI API key is required for transcription.');
    }
    const form = new FormData();
    const wav = encodeWav(audio.data, audio.sampleRate);
    form.append('file', new Blob([wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('model', options.model);
    if (language !== AUTO_LANGUAGE) form.append('language', language);
    return options.fetcher(resolveOpenAITranscriptionUrl(options.baseUrl), {
      method: 'POST',
      headers: { Authorization: `Bearer ${options.apiKey}` },
      body: form,
      signal,
    });
  };

  const sendRaw = (audio: AudioBuffer, language: string, signal: AbortSignal) => {
    const headers: Record<string, string> = {
      'Content-Type': 'application/octet-stream',
      'X-Model-Id': options.model,
      'X-Sample-Rate': String(audio.sampleRate),
    };
    if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;
    if (language !== AUTO_LANGUAGE) headers['X-Language'] = language;
    return options.fetcher(joinUrl(options.baseUrl, '/transcriptions'), {
      method: 'POST',
      headers,
      body: audio.data,
      signal,
    });
  };

  const transcribe = async ({
    audio,
    language,
    signal,
  }: TranscriptionRequest): Promise<TranscriptionResult> => {
    const response = isOpenAIBaseUrl(options.baseUrl)
      ? await sendOpenAI(audio, language, signal)
      : await sendRaw(audio, language, signal);

    if (!response.ok) {
      const details = await response.text();
      throw new TranscriptionError(
        `Transcription failed: ${response.status}${details ? ` ${details}` : ''}`
      );
    }
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return toResult(await response.json(), language);
    }
    return { text: (await response.text()).trim(), language };
  };

  return {
    id: `http:${options.model}`,
    transcribe,
  };
};
