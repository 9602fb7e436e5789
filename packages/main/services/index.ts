import type { SpeechService, TextService } from '../../shared/types/app.js';
import type { AppConfig } from '../config.js';
import { createFFmpegContext, FFmpegContext } from './ffmpeg-runner.js';
import { FileManager } from './file-manager.js';
import {
  createOpenAiClient,
  createOpenAiSpeechService,
  createOpenAiTextService,
} from './openai-client.js';

export interface PipelineServices {
  ffmpeg: FFmpegContext;
  fileManager: FileManager;
  textService: TextService;
  speechService: SpeechService;
}

export function createPipelineServices(config: AppConfig): PipelineServices {
  const client = createOpenAiClient(config);
  return {
    ffmpeg: createFFmpegContext({
      tempDir: config.tempDir,
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
    }),
    fileManager: new FileManager(config.tempDir),
    textService: createOpenAiTextService(config, client),
    speechService: createOpenAiSpeechService(config, client),
  };
}
