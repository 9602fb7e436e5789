export * from '../shared/types/app.js';
export { loadConfig, requireApiKey } from './config.js';
export type { AppConfig, ConfigOverrides, ModelConfig } from './config.js';
export * from './errors.js';
export {
  computeKeepIntervals,
  findSilenceGaps,
  normalizeSpeechIntervals,
} from './services/silence-trimmer/segmentation.js';
export {
  buildFilterComplex,
  buildTranscodeArgs,
  buildTranscodeSpec,
  keptDuration,
} from './services/silence-trimmer/filter-graph.js';
export { planTrim, removeSilence } from './services/silence-trimmer/index.js';
export { refineLines } from './services/subtitle-processing/pipeline/refine-pass.js';
export { reassemble } from './services/subtitle-processing/pipeline/reassemble.js';
export {
  applyCorrections,
  reconcileBatches,
} from './services/subtitle-processing/pipeline/review-pass.js';
export type { CorrectionSource } from './services/subtitle-processing/pipeline/review-pass.js';
export { prepareSharedContext } from './services/subtitle-processing/context.js';
export { processSubtitles } from './services/subtitle-processing/index.js';
export { FailureTally } from './services/subtitle-processing/failure-tally.js';
export { createPipelineServices } from './services/index.js';
export type { PipelineServices } from './services/index.js';
export {
  processDirectory,
  processSingleVideo,
} from './services/video-pipeline.js';
export { buildSrt, parseSrt } from '../shared/helpers/index.js';
