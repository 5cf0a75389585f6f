import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import {
  AUTO_LANGUAGE,
  TranscriptionError,
  encodeWav,
  toErrorMessage,
  type TranscriptionEngine,
  type TranscriptionResult,
} from '@holdtype/core';
import { runCommand, type CommandRunner } from './exec';

export interface WhisperCliOptions {
  command: string;
  model: string;
  modelDir?: string;
  threads: number;
  home?: string;
  run?: CommandRunner;
}

export const defaultModelDirs = (home = homedir()) => [
  join(home, '.local/share/whisper/models'),
  join(home, '.local/share/whisper-models'),
];

const exists = async (path: string) => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

/** `ggml-<model>.bin` in the configured directory, or the first default one that has it. */
export const resolveModelPath = async (
  options: Pick<WhisperCliOptions, 'model' | 'modelDir' | 'home'>
) => {
  const file = `ggml-${options.model}.bin`;
  const dirs = options.modelDir ? [options.modelDir] : defaultModelDirs(options.home);
  for (const dir of dirs) {
    const candidate = join(dir, file);
    if (await exists(candidate)) return candidate;
  }
  throw new TranscriptionError(
    `Whisper model not found at ${join(dirs[0], file)}. ` +
      `Download with: whisper-cpp-download-ggml-model ${options.model}`
  );
};

const DETECTED_LANGUAGE = /auto-detected language:\s*([a-z]{2,3})\s*\(p\s*=\s*([0-9.]+)\)/i;

export const parseDetectedLanguage = (output: string) => {
  const match = output.match(DETECTED_LANGUAGE);
  if (!match) return null;
  const probability = Number(match[2]);
  return {
    language: match[1].toLowerCase(),
    confidence: Number.isFinite(probability) ? Math.min(1, Math.max(0, probability)) : undefined,
  };
};

export const buildWhisperArgs = (options: {
  modelPath: string;
  audioPath: string;
  outputBase: string;
  language: string;
  threads: number;
}) => [
  '-m',
  options.modelPath,
  '-f',
  options.audioPath,
  '--output-txt',
  '--output-file',
  options.outputBase,
  '--no-timestamps',
  '--language',
  options.language,
  '--threads',
  String(options.threads),
];

export const createWhisperCliEngine = (options: WhisperCliOptions): TranscriptionEngine => {
  const run = options.run ?? runCommand;

  return {
    id: `whisper-cli:${options.model}`,
    async transcribe({ audio, language, signal }): Promise<TranscriptionResult> {
      const modelPath = await resolveModelPath(options);
      const workDir = await mkdtemp(join(tmpdir(), 'holdtype-'));
      try {
        const audioPath = join(workDir, 'recording.wav');
        const outputBase = join(workDir, 'transcription');
        await writeFile(audioPath, encodeWav(audio.data, audio.sampleRate));

        let stderr: string;
        try {
          ({ stderr } = await run(
            options.command,
            buildWhisperArgs({
              modelPath,
              audioPath,
              outputBase,
              language,
              threads: options.threads,
            }),
            { signal }
          ));
        } catch (error) {
          if (signal.aborted) throw error;
          throw new TranscriptionError(`whisper-cli failed: ${toErrorMessage(error)}`, {
            cause: error,
          });
        }

        let text: string;
        try {
          text = await readFile(`${outputBase}.txt`, 'utf8');
        } catch (error) {
          throw new TranscriptionError('Transcription file not created', { cause: error });
        }
        const detected = language === AUTO_LANGUAGE ? parseDetectedLanguage(stderr) : null;
        const result: TranscriptionResult = {
          text: text.replace(/\s+/g, ' ').trim(),
          language: detected?.language ?? language,
        };
        if (detected?.confidence !== undefined) result.confidence = detected.confidence;
        return result;
      } finally {
        await rm(workDir, { recursive: true, force: true });
      }
    },
  };
};
