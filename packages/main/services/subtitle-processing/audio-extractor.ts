import fs from 'fs';
import path from 'path';
import fsp from 'fs/promises';
import log from 'electron-log/node';
import { FFmpegError, FFmpegContext } from '../ffmpeg-runner.js';
import {
  ASR_OUT_EXT,
  ASR_AUDIO_CODEC,
  ASR_OPUS_BITRATE,
  ASR_VBR,
  ASR_SAMPLE_RATE,
  ASR_SAMPLE_FMT,
} from './constants.js';
import { errorMessage } from '../../errors.js';

export const mkTempAudioName = (stem: string): string =>
  `${stem}${ASR_OUT_EXT}`;

export function buildExtractAudioArgs(
  videoPath: string,
  outputPath: string
): string[] {
  // No silence filtering here: transcript timestamps must match the video.
  return [
    '-v',
    'error',
    '-i',
    videoPath,
    '-map',
    '0:a:0',
    '-vn',
    '-ar',
    String(ASR_SAMPLE_RATE),
    '-sample_fmt',
    ASR_SAMPLE_FMT,
    '-ac',
    '1',
    '-c:a',
    ASR_AUDIO_CODEC,
    '-b:a',
    ASR_OPUS_BITRATE,
    '-vbr',
    ASR_VBR,
    '-application',
    'voip',
    '-y',
    outputPath,
  ];
}

export async function extractAudio(
  ctx: FFmpegContext,
  opts: {
    videoPath: string;
    operationId?: string;
    signal?: AbortSignal;
  }
): Promise<string> {
  const { operationId, signal } = opts;
  const videoPath = path.resolve(opts.videoPath);

  if (!fs.existsSync(videoPath)) {
    throw new FFmpegError(`Input video file not found: ${videoPath}`);
  }
  if (!(await ctx.hasAudioTrack(videoPath))) {
    throw new FFmpegError('No audio stream detected in input file');
  }

  const outputPath = mkTempAudioName(
    path.join(
      ctx.tempDir,
      `${path.basename(videoPath, path.extname(videoPath))}_${
        operationId ?? Date.now()
      }_audio`
    )
  );

  try {
    await ctx.run(buildExtractAudioArgs(videoPath, outputPath), {
      operationId,
      cwd: path.dirname(videoPath),
      signal,
    });
    return outputPath;
  } catch (error) {
    log.error(`[extractAudio${operationId ? `/${operationId}` : ''}]`, error);
    try {
      await fsp.unlink(outputPath);
    } catch (cleanupError) {
      log.warn(
        `Failed to delete invalid file ${outputPath} during cleanup: ${errorMessage(cleanupError)}`
      );
    }
    throw error;
  }
}
