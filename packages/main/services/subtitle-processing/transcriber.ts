import fsp from 'fs/promises';
import log from 'electron-log/node';
import type {
  SpeechDetection,
  SpeechService,
  SubtitleLine,
  TranscriptionResult,
} from '../../../shared/types/app.js';
import type { FFmpegContext } from '../ffmpeg-runner.js';
import { extractAudio } from './audio-extractor.js';
import { normalizeSpeechIntervals } from '../silence-trimmer/segmentation.js';
import { errorMessage } from '../../errors.js';

export interface TranscribeOptions {
  ffmpeg: FFmpegContext;
  speech: SpeechService;
  language?: string;
  prompt?: string;
  operationId: string;
  signal?: AbortSignal;
}

export async function transcribeVideo(
  videoPath: string,
  { ffmpeg, speech, language, prompt, operationId, signal }: TranscribeOptions
): Promise<TranscriptionResult> {
  const audioPath = await extractAudio(ffmpeg, {
    videoPath,
    operationId,
    signal,
  });
  try {
    log.info(`[${operationId}] Transcribing ${videoPath}`);
    return await speech.transcribe(audioPath, { language, prompt, signal });
  } finally {
    await fsp.unlink(audioPath).catch(err => {
      log.warn(
        `[${operationId}] Failed to remove temp audio ${audioPath}: ${errorMessage(err)}`
      );
    });
  }
}

export async function detectSpeech(
  videoPath: string,
  opts: TranscribeOptions
): Promise<SpeechDetection> {
  const transcription = await transcribeVideo(videoPath, opts);
  const totalDuration = await opts.ffmpeg.getMediaDuration(
    videoPath,
    opts.signal
  );
  const speechIntervals = normalizeSpeechIntervals(
    transcription.segments,
    totalDuration
  );
  log.info(
    `[${opts.operationId}] ${speechIntervals.length} speech intervals over ${totalDuration.toFixed(2)}s`
  );
  return { speechIntervals, totalDuration };
}

export function segmentsToLines(
  transcription: TranscriptionResult
): SubtitleLine[] {
  const lines: SubtitleLine[] = [];
  for (const seg of transcription.segments) {
    const text = seg.text.trim();
    if (!text) continue;
    lines.push({ id: lines.length + 1, start: seg.start, end: seg.end, text });
  }
  return lines;
}

export async function transcribeToLines(
  videoPath: string,
  opts: TranscribeOptions
): Promise<SubtitleLine[]> {
  return segmentsToLines(await transcribeVideo(videoPath, opts));
}
