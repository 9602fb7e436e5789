export const AI_MODELS = {
  REFINE: 'gpt-4.1-mini',
  REVIEW: 'gpt-4.1',
  SUMMARY: 'gpt-4.1',
  OFF_TOPIC: 'gpt-4.1',
  WHISPER: 'whisper-1',
} as const;

export const ERROR_CODES = {
  INPUT_NOT_FOUND: 'input-not-found',
  NO_SPEECH_DETECTED: 'no-speech-detected',
  NO_RETAINABLE_CONTENT: 'no-retainable-content',
  TRANSCODE_FAILURE: 'transcode-failure',
  INVALID_SEGMENTATION_INPUT: 'invalid-segmentation-input',
  INVALID_CONFIG: 'invalid-config',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const FILE_SUFFIXES = {
  TRIMMED_VIDEO: '_trimmed.mp4',
  ORIGINAL_BACKUP: '_orig.mp4',
  DRAFT_SRT: '_draft.srt',
  REFINED_SRT: '_refined.srt',
  OFF_TOPIC_REPORT: '_off_topic.txt',
} as const;

// .txt and .md are sent inline, .pdf is uploaded.
export const REFERENCE_EXTENSIONS = ['.pdf', '.txt', '.md'] as const;
