import { writeFile } from 'fs/promises';
import path from 'path';
import type {
  ReferenceMaterial,
  SpeechService,
  TextRequest,
  TextService,
  TranscriptionResult,
} from '../../packages/shared/types/app';
import {
  FFmpegContext,
  FFmpegError,
} from '../../packages/main/services/ffmpeg-runner';

export type Handler = (request: TextRequest) => string | Promise<string>;

/** Answers each request with the handler registered for its schema name. */
export class FakeTextService implements TextService {
  readonly requests: TextRequest[] = [];
  readonly uploads: string[] = [];

  constructor(private readonly handlers: Record<string, Handler> = {}) {}

  async generate(request: TextRequest): Promise<string> {
    this.requests.push(request);
    const handler = this.handlers[request.schema.name];
    if (!handler) throw new Error(`no handler for ${request.schema.name}`);
    return handler(request);
  }

  async uploadReference(filePath: string): Promise<ReferenceMaterial> {
    this.uploads.push(filePath);
    return {
      kind: 'file',
      name: path.basename(filePath),
      fileId: `file-${this.uploads.length}`,
    };
  }
}

export function fakeSpeechService(
  transcribe: (audioPath: string) => TranscriptionResult
): SpeechService & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async transcribe(audioPath) {
      calls.push(audioPath);
      return transcribe(audioPath);
    },
  };
}

/**
 * Stand-in for ffmpeg: `run` writes an empty file at the last argument
 * (the output path). `failTranscode` makes filter-graph runs fail.
 */
export function fakeFFmpeg({
  tempDir,
  duration,
  failTranscode,
}: {
  tempDir: string;
  duration: number;
  failTranscode?: { message: string; stderr: string };
}): FFmpegContext & { runs: string[][] } {
  const runs: string[][] = [];
  return {
    runs,
    tempDir,
    ffmpegPath: '/usr/bin/ffmpeg',
    ffprobePath: '/usr/bin/ffprobe',
    async run(args: string[]) {
      runs.push(args);
      if (failTranscode && args.includes('-filter_complex')) {
        throw new FFmpegError(failTranscode.message, failTranscode.stderr);
      }
      await writeFile(args[args.length - 1], '');
    },
    async getMediaDuration() {
      return duration;
    },
    async hasAudioTrack() {
      return true;
    },
  };
}
