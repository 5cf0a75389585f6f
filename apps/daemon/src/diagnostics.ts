import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import { isDictationError, toErrorMessage } from '@holdtype/core';
import log from './logger';
import { stateDir } from './paths';

const MAX_RECENT_ERRORS = 50;

const RecentErrorSchema = z.object({
  timestamp: z.number(),
  kind: z.string().optional(),
  message: z.string(),
});
export type RecentError = z.infer<typeof RecentErrorSchema>;

export const defaultErrorsFile = () => join(stateDir(), 'recent-errors.json');

export const redactSecrets = (value: string) =>
  value
    .replace(/sk-[A-Za-z0-9_-]{20,}/g, 'sk-REDACTED')
    .replace(/\bBearer\s+[A-Za-z0-9._-]+\b/gi, 'Bearer REDACTED');

export const loadRecentErrors = (file = defaultErrorsFile()): RecentError[] => {
  try {
    if (!existsSync(file)) return [];
    const parsed = z.array(RecentErrorSchema).safeParse(JSON.parse(readFileSync(file, 'utf-8')));
    return parsed.success ? parsed.data : [];
  } catch (error) {
    log.error('Failed to read recent errors', error);
    return [];
  }
};

export const recordError = (error: unknown, file = defaultErrorsFile(), now = Date.now()) => {
  const entry: RecentError = {
    timestamp: now,
    kind: isDictationError(error) ? error.kind : undefined,
    message: redactSecrets(toErrorMessage(error)),
  };
  try {
    const existing = loadRecentErrors(file);
    existing.unshift(entry);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, JSON.stringify(existing.slice(0, MAX_RECENT_ERRORS), null, 2), 'utf-8');
  } catch (writeError) {
    log.error('Failed to write recent errors', writeError);
  }
};
