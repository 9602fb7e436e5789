import type {
  KeepInterval,
  TranscodeSpec,
} from '../../../shared/types/app.js';
import {
  TRANSCODE_AUDIO_CODEC,
  TRANSCODE_PRESET,
  TRANSCODE_VIDEO_CODEC,
} from '../../../shared/constants/runtime-config.js';
import { SegmentationInputError } from '../../errors.js';

export function buildTranscodeSpec(
  keepIntervals: readonly KeepInterval[]
): TranscodeSpec {
  if (keepIntervals.length < 1) {
    throw new SegmentationInputError(
      'At least one keep interval is required to build a transcode spec'
    );
  }
  return {
    segments: keepIntervals.map(({ start, end }, index) => ({
      index,
      start,
      end,
    })),
    videoCodec: TRANSCODE_VIDEO_CODEC,
    preset: TRANSCODE_PRESET,
    audioCodec: TRANSCODE_AUDIO_CODEC,
  };
}

// ffmpeg accepts plain decimal seconds; millisecond precision is plenty.
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

export function buildFilterComplex(spec: TranscodeSpec): string {
  const parts: string[] = [];
  let concatInputs = '';
  for (const { index, start, end } of spec.segments) {
    const range = `start=${formatSeconds(start)}:end=${formatSeconds(end)}`;
    parts.push(`[0:v]trim=${range},setpts=PTS-STARTPTS[v${index}]`);
    parts.push(`[0:a]atrim=${range},asetpts=PTS-STARTPTS[a${index}]`);
    concatInputs += `[v${index}][a${index}]`;
  }
  parts.push(
    `${concatInputs}concat=n=${spec.segments.length}:v=1:a=1[outv][outa]`
  );
  return parts.join(';');
}

export function buildTranscodeArgs(
  spec: TranscodeSpec,
  inputPath: string,
  outputPath: string
): string[] {
  return [
    '-i',
    inputPath,
    '-filter_complex',
    buildFilterComplex(spec),
    '-map',
    '[outv]',
    '-map',
    '[outa]',
    '-c:v',
    spec.videoCodec,
    '-preset',
    spec.preset,
    '-c:a',
    spec.audioCodec,
    '-y',
    outputPath,
  ];
}

export function keptDuration(spec: TranscodeSpec): number {
  return spec.segments.reduce((sum, seg) => sum + (seg.end - seg.start), 0);
}
