import os from 'os';
import path from 'path';
import { AI_MODELS } from '../shared/constants/index.js';
import {
  DEFAULT_GAP_THRESHOLD_SEC,
  DEFAULT_INITIAL_PROMPT,
  DEFAULT_LANGUAGE,
  DEFAULT_SUBTITLE_LANGUAGE,
  FALLBACK_TOPIC,
  MAX_MERGED_CHARS,
  MAX_SERVICE_RETRIES,
  REFINE_PARALLEL,
  REQUEST_TIMEOUT_MS,
  REVIEW_PARALLEL,
  REVIEW_WINDOW_SIZE,
  VIDEO_PARALLEL,
} from '../shared/constants/runtime-config.js';
import { ConfigError } from './errors.js';

export interface ModelConfig {
  refine: string;
  review: string;
  summary: string;
  offTopic: string;
  transcription: string;
}

export interface AppConfig {
  openAiApiKey?: string;
  models: ModelConfig;
  gapThreshold: number;
  refineConcurrency: number;
  reviewWindowSize: number;
  reviewConcurrency: number;
  maxMergedChars: number;
  language: string;
  initialPrompt: string;
  subtitleLanguage: string;
  fallbackTopic: string;
  requestTimeoutMs: number;
  maxServiceRetries: number;
  tempDir: string;
  videoWorkers: number;
  ffmpegPath?: string;
  ffprobePath?: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, 'models'>> & {
  models?: Partial<ModelConfig>;
};

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readString(
  env: NodeJS.ProcessEnv,
  key: string
): string | undefined {
  const raw = env[key];
  return raw && raw.trim() ? raw.trim() : undefined;
}

function requirePositive(name: string, value: number, integer: boolean) {
  if (!(value > 0) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `${name} must be a positive ${integer ? 'integer' : 'number'}, got ${value}`
    );
  }
}

/**
 * Builds the single configuration object for a run. This is the only place
 * environment variables are read; everything downstream receives the result.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const { models: modelOverrides, ...rest } = overrides;

  const config: AppConfig = {
    openAiApiKey: readString(env, 'OPENAI_API_KEY'),
    models: {
      refine: readString(env, 'TRIMSCRIBE_REFINE_MODEL') ?? AI_MODELS.REFINE,
      review: readString(env, 'TRIMSCRIBE_REVIEW_MODEL') ?? AI_MODELS.REVIEW,
      summary:
        readString(env, 'TRIMSCRIBE_SUMMARY_MODEL') ?? AI_MODELS.SUMMARY,
      offTopic:
        readString(env, 'TRIMSCRIBE_OFF_TOPIC_MODEL') ?? AI_MODELS.OFF_TOPIC,
      transcription:
        readString(env, 'TRIMSCRIBE_TRANSCRIPTION_MODEL') ?? AI_MODELS.WHISPER,
      ...modelOverrides,
    },
    gapThreshold: readNumber(
      env,
      'TRIMSCRIBE_GAP_THRESHOLD',
      DEFAULT_GAP_THRESHOLD_SEC
    ),
    refineConcurrency: readNumber(
      env,
      'TRIMSCRIBE_REFINE_PARALLEL',
      REFINE_PARALLEL
    ),
    reviewWindowSize: readNumber(
      env,
      'TRIMSCRIBE_REVIEW_WINDOW',
      REVIEW_WINDOW_SIZE
    ),
    reviewConcurrency: readNumber(
      env,
      'TRIMSCRIBE_REVIEW_PARALLEL',
      REVIEW_PARALLEL
    ),
    maxMergedChars: readNumber(
      env,
      'TRIMSCRIBE_MAX_MERGED_CHARS',
      MAX_MERGED_CHARS
    ),
    language: readString(env, 'TRIMSCRIBE_LANGUAGE') ?? DEFAULT_LANGUAGE,
    initialPrompt:
      readString(env, 'TRIMSCRIBE_INITIAL_PROMPT') ?? DEFAULT_INITIAL_PROMPT,
    subtitleLanguage:
      readString(env, 'TRIMSCRIBE_SUBTITLE_LANGUAGE') ??
      DEFAULT_SUBTITLE_LANGUAGE,
    fallbackTopic: FALLBACK_TOPIC,
    requestTimeoutMs: readNumber(
      env,
      'TRIMSCRIBE_REQUEST_TIMEOUT_MS',
      REQUEST_TIMEOUT_MS
    ),
    maxServiceRetries: readNumber(
      env,
      'TRIMSCRIBE_MAX_RETRIES',
      MAX_SERVICE_RETRIES
    ),
    tempDir:
      readString(env, 'TRIMSCRIBE_TEMP_DIR') ??
      path.join(os.tmpdir(), 'trimscribe'),
    videoWorkers: readNumber(env, 'TRIMSCRIBE_WORKERS', VIDEO_PARALLEL),
    ffmpegPath: readString(env, 'FFMPEG_PATH'),
    ffprobePath: readString(env, 'FFPROBE_PATH'),
    ...rest,
  };

  requirePositive('gapThreshold', config.gapThreshold, false);
  requirePositive('refineConcurrency', config.refineConcurrency, true);
  requirePositive('reviewWindowSize', config.reviewWindowSize, true);
  requirePositive('reviewConcurrency', config.reviewConcurrency, true);
  requirePositive('maxMergedChars', config.maxMergedChars, true);
  requirePositive('requestTimeoutMs', config.requestTimeoutMs, true);
  requirePositive('videoWorkers', config.videoWorkers, true);
  if (
    !Number.isInteger(config.maxServiceRetries) ||
    config.maxServiceRetries < 0
  ) {
    throw new ConfigError(
      `maxServiceRetries must be a non-negative integer, got ${config.maxServiceRetries}`
    );
  }

  return Object.freeze({ ...config, models: Object.freeze(config.models) });
}

export function requireApiKey(config: AppConfig): string {
  if (!config.openAiApiKey) {
    throw new ConfigError('OPENAI_API_KEY not found.');
  }
  return config.openAiApiKey;
}
