import type { ProcessingConfig } from '../domain/schemas';

export type PipelineContext = ProcessingConfig;

export interface PipelineStage {
  id: string;
  enabled: (context: PipelineContext) => boolean;
  run: (input: string, context: PipelineContext) => string;
}

export interface ProcessedText {
  text: string;
  stepsApplied: string[];
}
