// packages/shared/constants/runtime-config.ts
// All runtime configuration defaults live here – zero env access.

/* Silence trimming */
export const DEFAULT_GAP_THRESHOLD_SEC = 1.0;

/* Subtitle refinement */
export const REFINE_PARALLEL = 20;
export const REVIEW_WINDOW_SIZE = 100;
export const REVIEW_PARALLEL = 1;
export const MAX_MERGED_CHARS = 30;

/* Service calls */
export const REQUEST_TIMEOUT_MS = 120_000;
export const MAX_SERVICE_RETRIES = 2;

/* Transcription */
export const DEFAULT_LANGUAGE = 'zh';
export const DEFAULT_INITIAL_PROMPT = '這是一個繁體中文的句子';
export const DEFAULT_SUBTITLE_LANGUAGE = 'Traditional Chinese (繁體中文)';
export const FALLBACK_TOPIC = 'Topic: Mathematics.';

/* Batch processing */
export const VIDEO_PARALLEL = 1;

/* Progress */
export const PROGRESS_LOG_EVERY = 100;

/* Transcode target */
export const TRANSCODE_VIDEO_CODEC = 'libx264';
export const TRANSCODE_PRESET = 'medium';
export const TRANSCODE_AUDIO_CODEC = 'aac';
