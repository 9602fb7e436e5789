import fs from 'fs';
import path from 'path';
import fsp from 'fs/promises';
import log from 'electron-log/node';
import type {
  KeepInterval,
  SpeechDetection,
  SpeechService,
  TrimResult,
  TrimSkipReason,
} from '../../../shared/types/app.js';
import { FILE_SUFFIXES } from '../../../shared/constants/index.js';
import { stripExtension } from '../../../shared/helpers/index.js';
import { FFmpegContext, FFmpegError } from '../ffmpeg-runner.js';
import { detectSpeech } from '../subtitle-processing/transcriber.js';
import {
  errorMessage,
  InputNotFoundError,
  NoRetainableContentError,
  NoSpeechDetectedError,
  throwIfAborted,
  TranscodeFailureError,
} from '../../errors.js';
import { computeKeepIntervals, findSilenceGaps } from './segmentation.js';
import {
  buildTranscodeArgs,
  buildTranscodeSpec,
  keptDuration,
} from './filter-graph.js';

export interface RemoveSilenceOptions {
  ffmpeg: FFmpegContext;
  speech: SpeechService;
  gapThreshold: number;
  language?: string;
  initialPrompt?: string;
  operationId: string;
  signal?: AbortSignal;
  progress?: (pct: number) => void;
}

export type TrimPlan =
  | { kind: 'skip'; reason: 'no-gaps'; keepIntervals: KeepInterval[] }
  | { kind: 'trim'; keepIntervals: KeepInterval[] };

/**
 * Throws NoSpeechDetectedError or NoRetainableContentError when there is
 * nothing to trim towards.
 */
export function planTrim(
  { speechIntervals, totalDuration }: SpeechDetection,
  gapThreshold: number
): TrimPlan {
  if (speechIntervals.length === 0) throw new NoSpeechDetectedError();

  const keepIntervals = computeKeepIntervals(
    speechIntervals,
    totalDuration,
    gapThreshold
  );
  if (keepIntervals.length === 0) throw new NoRetainableContentError();

  if (findSilenceGaps(speechIntervals, totalDuration, gapThreshold).length === 0) {
    return { kind: 'skip', reason: 'no-gaps', keepIntervals };
  }
  return { kind: 'trim', keepIntervals };
}

function skipReason(error: unknown): TrimSkipReason | null {
  if (error instanceof NoSpeechDetectedError) return 'no-speech';
  if (error instanceof NoRetainableContentError) return 'no-retainable-content';
  return null;
}

export async function removeSilence(
  inputPath: string,
  {
    ffmpeg,
    speech,
    gapThreshold,
    language,
    initialPrompt,
    operationId,
    signal,
    progress,
  }: RemoveSilenceOptions
): Promise<TrimResult> {
  const videoPath = path.resolve(inputPath);
  if (!fs.existsSync(videoPath)) throw new InputNotFoundError(videoPath);

  log.info(`[silence-trimmer] Detecting speech in ${videoPath}`);
  const detection = await detectSpeech(videoPath, {
    ffmpeg,
    speech,
    language,
    prompt: initialPrompt,
    operationId,
    signal,
  });
  const { totalDuration } = detection;

  let plan: TrimPlan;
  try {
    plan = planTrim(detection, gapThreshold);
  } catch (error) {
    const reason = skipReason(error);
    if (!reason) throw error;
    log.warn(`[silence-trimmer] ${errorMessage(error)} Keeping original video.`);
    return {
      outputPath: videoPath,
      trimmed: false,
      keepIntervals: [],
      totalDuration,
      reason,
    };
  }

  if (plan.kind === 'skip') {
    log.info('[silence-trimmer] No silence gaps found. Keeping original video.');
    return {
      outputPath: videoPath,
      trimmed: false,
      keepIntervals: plan.keepIntervals,
      totalDuration,
      reason: plan.reason,
    };
  }

  throwIfAborted(signal);
  const spec = buildTranscodeSpec(plan.keepIntervals);
  const outputPath = `${stripExtension(videoPath)}${FILE_SUFFIXES.TRIMMED_VIDEO}`;
  const outDuration = keptDuration(spec);
  log.info(
    `[silence-trimmer] Keeping ${spec.segments.length} segments, ${outDuration.toFixed(2)}s of ${totalDuration.toFixed(2)}s`
  );

  try {
    await ffmpeg.run(buildTranscodeArgs(spec, videoPath, outputPath), {
      operationId,
      totalDuration: outDuration,
      progress,
      signal,
    });
  } catch (error) {
    await fsp.rm(outputPath, { force: true });
    throwIfAborted(signal);
    if (error instanceof FFmpegError) {
      throw new TranscodeFailureError(
        `Transcoding ${videoPath} failed: ${error.message}`,
        error.stderr
      );
    }
    throw error;
  }

  log.info(`[silence-trimmer] Trimmed video written to ${outputPath}`);
  return {
    outputPath,
    trimmed: true,
    keepIntervals: plan.keepIntervals,
    totalDuration,
  };
}
