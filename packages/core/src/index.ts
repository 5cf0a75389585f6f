export * from './errors';
export * from './domain/schemas';
export * from './domain/migrations';
export * from './devices/types';
export * from './devices/filter';
export * from './hotkey/types';
export * from './hotkey/keys';
export * from './hotkey/stateMachine';
export * from './recording/types';
export * from './recording/session';
export * from './recording/limits';
export * from './transcription/types';
export * from './transcription/client';
export * from './pipeline/types';
export * from './pipeline/stages';
export * from './pipeline/pipeline';
export * from './orchestrator/types';
export * from './orchestrator/channel';
export * from './orchestrator/orchestrator';
export * from './util/logger';
export * from './util/timeout';
