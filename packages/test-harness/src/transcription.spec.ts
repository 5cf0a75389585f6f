import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  TranscriptionError,
  createHttpTranscriptionEngine,
  encodeWav,
  resolveOpenAITranscriptionUrl,
  type AudioBuffer,
} from '@holdtype/core';
import { startMockTranscriptionServer } from './mock/mockServer';

const audio: AudioBuffer = {
  data: new Uint8Array(3200).fill(1),
  sampleRate: 16000,
  durationMs: 100,
};

const servers: Array<{ close: () => Promise<void> }> = [];

const startServer = async (...args: Parameters<typeof startMockTranscriptionServer>) => {
  const server = await startMockTranscriptionServer(...args);
  servers.push(server);
  return server;
};

const signal = () => new AbortController().signal;

afterEach(async () => {
  await Promise.all(servers.map((server) => server.close()));
  servers.length = 0;
});

describe('http transcription engine', () => {
  it('posts raw PCM to a local server', async () => {
    const server = await startServer({ text: 'Hello from mock', language: 'en' });
    const engine = createHttpTranscriptionEngine({
      fetcher: fetch,
      baseUrl: server.baseUrl,
      model: 'base',
    });

    await expect(engine.transcribe({ audio, language: 'en', signal: signal() })).resolves.toEqual({
      text: 'Hello from mock',
      language: 'en',
    });
    expect(engine.id).toBe('http:base');
    const [request] = server.requests;
    expect(request.path).toBe('/transcriptions');
    expect(request.headers['x-model-id']).toBe('base');
    expect(request.headers['x-sample-rate']).toBe('16000');
    expect(request.headers['x-language']).toBe('en');
    expect(request.headers.authorization).toBeUndefined();
    expect(request.body.length).toBe(3200);
  });

  it('lets the server detect the language', async () => {
    const server = await startServer({ text: 'Guten Tag', language: 'de' });
    const engine = createHttpTranscriptionEngine({
      fetcher: fetch,
      baseUrl: `${server.baseUrl}/`,
      model: 'base',
      apiKey: 'test-secret',
    });

    await expect(
      engine.transcribe({ audio, language: 'auto', signal: signal() })
    ).resolves.toEqual({ text: 'Guten Tag', language: 'de' });
    expect(server.requests[0].headers['x-language']).toBeUndefined();
    expect(server.requests[0].headers.authorization).toBe('Bearer test-secret');
  });

  it('accepts plain text responses', async () => {
    const server = await startServer({ text: 'plain words', contentType: 'text' });
    const engine = createHttpTranscriptionEngine({
      fetcher: fetch,
      baseUrl: server.baseUrl,
      model: 'base',
    });

    await expect(engine.transcribe({ audio, language: 'fr', signal: signal() })).resolves.toEqual({
      text: 'plain words',
      language: 'fr',
    });
  });

  it('surfaces server errors', async () => {
    const server = await startServer();
    const fetcher: typeof fetch = (input, init) => {
      const url = typeof input === 'string' ? `${input}?error=fail` : input;
      return fetch(url, init);
    };
    const engine = createHttpTranscriptionEngine({
      fetcher,
      baseUrl: server.baseUrl,
      model: 'base',
    });

    await expect(engine.transcribe({ audio, language: 'en', signal: signal() })).rejects.toThrow(
      new TranscriptionError('Transcription failed: 500 mock failure')
    );
  });

  it('uploads WAV audio to the OpenAI API', async () => {
    const fetcher = vi.fn(
      async (_input: Parameters<typeof fetch>[0], _init?: RequestInit) =>
        new Response(JSON.stringify({ text: 'hi there' }), {
          headers: { 'content-type': 'application/json' },
        })
    );
    const engine = createHttpTranscriptionEngine({
      fetcher,
      baseUrl: 'https://api.openai.com/v1',
      model: 'whisper-1',
      apiKey: 'test-secret',
    });

    await expect(engine.transcribe({ audio, language: 'en', signal: signal() })).resolves.toEqual({
      text: 'hi there',
      language: 'en',
    });
    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/audio/transcriptions');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret' });
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (!(form instanceof FormData)) return;
    expect(form.get('model')).toBe('whisper-1');
    expect(form.get('language')).toBe('en');
    const file = form.get('file');
    expect(file).toBeInstanceOf(Blob);
    if (file instanceof Blob) expect(file.size).toBe(44 + 3200);
  });

  it('requires an API key for OpenAI', async () => {
    const fetcher = vi.fn(fetch);
    const engine = createHttpTranscriptionEngine({
      fetcher,
      baseUrl: 'https://api.openai.com',
      model: 'whisper-1',
    });

    await expect(engine.transcribe({ audio, language: 'en', signal: signal() })).rejects.toThrow(
      'OpenAI API key is required for transcription.'
    );
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('rejects JSON without text', async () => {
    const fetcher = vi.fn(
      async () =>
        new Response(JSON.stringify({ result: 'nope' }), {
          headers: { 'content-type': 'application/json' },
        })
    );
    const engine = createHttpTranscriptionEngine({
      fetcher,
      baseUrl: 'http://127.0.0.1:9',
      model: 'base',
    });

    await expect(engine.transcribe({ audio, language: 'en', signal: signal() })).rejects.toThrow(
      'Transcription response did not include text'
    );
  });
});

describe('transcription helpers', () => {
  it('resolves OpenAI transcription urls', () => {
    expect(resolveOpenAITranscriptionUrl('https://api.openai.com')).toBe(
      'https://api.openai.com/v1/audio/transcriptions'
    );
    expect(resolveOpenAITranscriptionUrl('https://api.openai.com/v1/')).toBe(
      'https://api.openai.com/v1/audio/transcriptions'
    );
    expect(resolveOpenAITranscriptionUrl('https://api.openai.com/v1/audio')).toBe(
      'https://api.openai.com/v1/audio/transcriptions'
    );
  });

  it('writes a 16-bit mono WAV header', () => {
    const wav = encodeWav(new Uint8Array(8), 16000);
    const view = new DataView(wav.buffer);
    expect(wav.length).toBe(52);
    expect(new TextDecoder().decode(wav.subarray(0, 4))).toBe('RIFF');
    expect(view.getUint32(4, true)).toBe(44);
    expect(new TextDecoder().decode(wav.subarray(8, 16))).toBe('WAVEfmt ');
    expect(view.getUint16(22, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(16000);
    expect(view.getUint32(28, true)).toBe(32000);
    expect(view.getUint16(34, true)).toBe(16);
    expect(view.getUint32(40, true)).toBe(8);
  });
});
