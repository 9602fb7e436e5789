import path from 'path';
import log from 'electron-log/node';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type {
  BatchSummary,
  PipelineProgressCallback,
  TrimResult,
  VideoResult,
} from '../../shared/types/app.js';
import { FILE_SUFFIXES } from '../../shared/constants/index.js';
import { stripExtension } from '../../shared/helpers/index.js';
import type { AppConfig } from '../config.js';
import {
  errorMessage,
  InputNotFoundError,
  NoSpeechDetectedError,
} from '../errors.js';
import { addJob, finish } from '../active-processes.js';
import type { PipelineServices } from './index.js';
import { removeSilence } from './silence-trimmer/index.js';
import { transcribeToLines } from './subtitle-processing/transcriber.js';
import { processSubtitles } from './subtitle-processing/index.js';

export interface VideoPipelineOptions {
  config: AppConfig;
  services: PipelineServices;
  mathSymbols?: string;
  signal?: AbortSignal;
  progressCallback?: PipelineProgressCallback;
}

async function finalizeOutputs({
  videoPath,
  trim,
  workingSrt,
  draftSrt,
  refinedSrt,
  offTopicReport,
  services,
  operationId,
}: {
  videoPath: string;
  trim: TrimResult;
  workingSrt: string;
  draftSrt: string;
  refinedSrt: string;
  offTopicReport?: string;
  services: PipelineServices;
  operationId: string;
}): Promise<string> {
  const { fileManager } = services;
  const videoBase = stripExtension(videoPath);

  if (trim.trimmed) {
    const backup = `${videoBase}${FILE_SUFFIXES.ORIGINAL_BACKUP}`;
    if (!fileManager.exists(backup)) {
      await fileManager.move(videoPath, backup);
    } else {
      log.info(`[${operationId}] Backup ${backup} already exists, keeping it`);
    }
    await fileManager.move(trim.outputPath, videoPath);
  }

  const targetSrt = `${videoBase}.srt`;
  await fileManager.removeIfExists(targetSrt);
  await fileManager.move(refinedSrt, targetSrt);

  const targetReport = `${videoBase}${FILE_SUFFIXES.OFF_TOPIC_REPORT}`;
  if (offTopicReport && offTopicReport !== targetReport) {
    await fileManager.move(offTopicReport, targetReport);
  }

  for (const intermediate of [workingSrt, draftSrt]) {
    if (intermediate !== targetSrt) {
      await fileManager.removeIfExists(intermediate);
    }
  }
  return targetSrt;
}

/**
 * Trim, transcribe and refine one video. Failures are logged and reported
 * in the result; they never reject.
 */
export async function processSingleVideo(
  inputPath: string,
  { config, services, mathSymbols, signal, progressCallback }: VideoPipelineOptions
): Promise<VideoResult> {
  const videoPath = path.resolve(inputPath);
  const operationId = `video-${uuidv4()}`;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });
  addJob(operationId, controller);

  log.info(`[${operationId}] Processing ${path.basename(videoPath)}`);
  try {
    const trim = await removeSilence(videoPath, {
      ffmpeg: services.ffmpeg,
      speech: services.speechService,
      gapThreshold: config.gapThreshold,
      language: config.language,
      initialPrompt: config.initialPrompt,
      operationId,
      signal: controller.signal,
    });
    log.info(
      `[${operationId}] Step 1 done: ${trim.trimmed ? `trimmed to ${trim.outputPath}` : `kept original (${trim.reason})`}`
    );

    const lines = await transcribeToLines(trim.outputPath, {
      ffmpeg: services.ffmpeg,
      speech: services.speechService,
      language: config.language,
      prompt: config.initialPrompt,
      operationId,
      signal: controller.signal,
    });
    if (lines.length === 0) {
      throw new NoSpeechDetectedError(
        `Transcription of ${trim.outputPath} produced no lines.`
      );
    }
    const workingSrt = await services.fileManager.writeSrt(
      `${stripExtension(trim.outputPath)}.srt`,
      lines
    );
    log.info(`[${operationId}] Step 2 done: ${lines.length} lines transcribed`);

    const refined = await processSubtitles({
      srtPath: workingSrt,
      referenceBases: [stripExtension(trim.outputPath), stripExtension(videoPath)],
      config,
      services,
      mathSymbols,
      operationId,
      signal: controller.signal,
      progressCallback,
    });
    log.info(`[${operationId}] Step 3 done: ${refined.lines.length} lines refined`);

    const subtitlePath = await finalizeOutputs({
      videoPath,
      trim,
      workingSrt,
      draftSrt: refined.draftPath,
      refinedSrt: refined.refinedPath,
      offTopicReport: refined.offTopicPath,
      services,
      operationId,
    });
    log.info(`[${operationId}] Processing complete for ${path.basename(videoPath)}`);
    return { videoPath, ok: true, subtitlePath, trimmed: trim.trimmed };
  } catch (error) {
    log.error(`[${operationId}] Error processing ${videoPath}: ${errorMessage(error)}`);
    return { videoPath, ok: false, error: errorMessage(error) };
  } finally {
    signal?.removeEventListener('abort', onAbort);
    finish(operationId);
  }
}

export async function processDirectory(
  inputDir: string,
  options: VideoPipelineOptions
): Promise<BatchSummary> {
  const dir = path.resolve(inputDir);
  const { fileManager } = options.services;
  if (!fileManager.exists(dir)) throw new InputNotFoundError(dir);

  const videos = await fileManager.listSourceVideos(dir);
  if (videos.length === 0) {
    log.warn(`[video-pipeline] No valid .mp4 files found in ${dir}`);
  } else {
    log.info(
      `[video-pipeline] Found ${videos.length} videos (${options.config.videoWorkers} at a time)`
    );
  }

  const limit = pLimit(options.config.videoWorkers);
  const results = await Promise.all(
    videos.map(video => limit(() => processSingleVideo(video, options)))
  );
  const succeeded = results.filter(r => r.ok).length;
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    results,
  };
}
