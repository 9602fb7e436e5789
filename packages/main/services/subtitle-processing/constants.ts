// --- ASR audio format (compact mono Opus keeps long lectures under upload limits)
export const ASR_SAMPLE_RATE = 16_000;
export const ASR_SAMPLE_FMT = 's16';
export const ASR_OUT_EXT = '.webm';
export const ASR_AUDIO_CODEC = 'libopus';
export const ASR_OPUS_BITRATE = '32k';
export const ASR_VBR = 'on';

// --- Reference materials
export const TEXT_REFERENCE_EXTENSIONS = ['.txt', '.md'];
export const MAX_INLINE_REFERENCE_CHARS = 60_000;

// --- Prompt context
export const MAX_SUMMARY_TRANSCRIPT_CHARS = 120_000;
