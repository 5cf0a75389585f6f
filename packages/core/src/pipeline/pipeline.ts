import type { PipelineContext, PipelineStage, ProcessedText } from './types';
import {
  capitalizationStage,
  fillerRemovalStage,
  punctuationStage,
  whitespaceNormalizationStage,
} from './stages';

// Capitalization must see the text after fillers are gone.
export const DEFAULT_PIPELINE: PipelineStage[] = [
  whitespaceNormalizationStage,
  fillerRemovalStage,
  capitalizationStage,
  punctuationStage,
];

export const processText = (
  input: string,
  context: PipelineContext,
  stages: PipelineStage[] = DEFAULT_PIPELINE
): ProcessedText => {
  let text = input;
  const stepsApplied: string[] = [];
  stages.forEach((stage) => {
    if (!stage.enabled(context)) return;
    stepsApplied.push(stage.id);
    text = stage.run(text, context);
  });
  return { text, stepsApplied };
};

export const runPipeline = (
  input: string,
  context: PipelineContext,
  stages: PipelineStage[] = DEFAULT_PIPELINE
) => processText(input, context, stages).text;
