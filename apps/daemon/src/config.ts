import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import {
  ConfigError,
  DaemonConfigSchema,
  migrateConfig,
  toErrorMessage,
  type DaemonConfig,
} from '@holdtype/core';
import { defaultConfigPath, type Env } from './paths';

export interface ConfigOverrides {
  language?: string;
  model?: string;
}

export const defaultConfig = (): DaemonConfig => DaemonConfigSchema.parse({});

const readJson = (filePath: string): unknown => {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}: ${toErrorMessage(error)}`, { cause: error });
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
};

/** Reads the config file, writing one with defaults when none exists. */
export const loadConfig = (filePath: string = defaultConfigPath()): DaemonConfig => {
  if (!existsSync(filePath)) {
    const config = defaultConfig();
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot create ${filePath}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    return config;
  }
  return migrateConfig(readJson(filePath));
};

export const applyOverrides = (config: DaemonConfig, overrides: ConfigOverrides): DaemonConfig =>
  migrateConfig({
    ...config,
    transcription: {
      ...config.transcription,
      ...(overrides.language ? { language: overrides.language } : {}),
      ...(overrides.model ? { model: overrides.model } : {}),
    },
  });

/** Environment values win over the file for secrets. */
export const applyEnv = (config: DaemonConfig, env: Env = process.env): DaemonConfig => {
  const apiKey = env.HOLDTYPE_API_KEY;
  if (!apiKey) return config;
  return { ...config, transcription: { ...config.transcription, apiKey } };
};
