import os from 'os';
import path from 'path';
import { loadConfig, requireApiKey } from '../../packages/main/config';
import { ConfigError } from '../../packages/main/errors';

describe('loadConfig', () => {
  it('falls back to the built-in defaults', () => {
    const config = loadConfig({}, {});
    expect(config.openAiApiKey).toBeUndefined();
    expect(config.gapThreshold).toBe(1);
    expect(config.refineConcurrency).toBe(20);
    expect(config.reviewWindowSize).toBe(100);
    expect(config.reviewConcurrency).toBe(1);
    expect(config.maxMergedChars).toBe(30);
    expect(config.videoWorkers).toBe(1);
    expect(config.language).toBe('zh');
    expect(config.models.refine).toBe('gpt-4.1-mini');
    expect(config.models.transcription).toBe('whisper-1');
    expect(config.tempDir).toBe(path.join(os.tmpdir(), 'trimscribe'));
  });

  it('reads the environment', () => {
    const config = loadConfig(
      {},
      {
        OPENAI_API_KEY: 'test-secret',
        TRIMSCRIBE_GAP_THRESHOLD: '0.5',
        TRIMSCRIBE_REFINE_MODEL: 'small-model',
        TRIMSCRIBE_REVIEW_WINDOW: '50',
        FFMPEG_PATH: ' /opt/ffmpeg ',
      }
    );
    expect(config.openAiApiKey).toBe('test-secret');
    expect(config.gapThreshold).toBe(0.5);
    expect(config.models.refine).toBe('small-model');
    expect(config.reviewWindowSize).toBe(50);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig(
      { gapThreshold: 2, models: { review: 'big-model' } },
      { TRIMSCRIBE_GAP_THRESHOLD: '0.5', TRIMSCRIBE_REVIEW_MODEL: 'other' }
    );
    expect(config.gapThreshold).toBe(2);
    expect(config.models.review).toBe('big-model');
    expect(config.models.refine).toBe('gpt-4.1-mini');
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({}, { TRIMSCRIBE_REFINE_PARALLEL: 'many' })).toThrow(
      new ConfigError('TRIMSCRIBE_REFINE_PARALLEL must be a number, got "many"')
    );
  });

  it('rejects counts that are not positive integers', () => {
    expect(() => loadConfig({ videoWorkers: 1.5 }, {})).toThrow(
      'videoWorkers must be a positive integer, got 1.5'
    );
    expect(() => loadConfig({ gapThreshold: 0 }, {})).toThrow(ConfigError);
    expect(() => loadConfig({ maxServiceRetries: -1 }, {})).toThrow(ConfigError);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({}, {});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.models)).toBe(true);
  });
});

describe('requireApiKey', () => {
  it('throws without a key', () => {
    expect(() => requireApiKey(loadConfig({}, {}))).toThrow('OPENAI_API_KEY not found.');
  });

  it('returns the configured key', () => {
    expect(requireApiKey(loadConfig({ openAiApiKey: 'test-secret' }, {}))).toBe(
      'test-secret'
    );
  });
});
