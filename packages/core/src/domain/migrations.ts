import { ConfigError } from '../errors';
import { CONFIG_VERSION, DaemonConfigSchema, type DaemonConfig } from './schemas';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Brings a raw config document up to the current version and validates it.
 * Documents without a version are treated as current.
 */
export const migrateConfig = (input: unknown): DaemonConfig => {
  if (!isRecord(input)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  const version = typeof input.version === 'number' ? input.version : CONFIG_VERSION;
  if (version > CONFIG_VERSION) {
    throw new ConfigError(`Unsupported config version: ${version}`);
  }
  const parsed = DaemonConfigSchema.safeParse({ ...input, version: CONFIG_VERSION });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
};
