import OpenAI from 'openai';
import fs from 'fs';
import path from 'path';
import log from 'electron-log/node';
import type {
  ReferenceMaterial,
  SpeechService,
  TextRequest,
  TextService,
  TranscriptionResult,
  TranscriptSegment,
} from '../../shared/types/app.js';
import { AppConfig, requireApiKey } from '../config.js';

type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;
type MessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function createOpenAiClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: requireApiKey(config),
    timeout: config.requestTimeoutMs,
    maxRetries: config.maxServiceRetries,
  });
}

export function referenceToContentPart(ref: ReferenceMaterial): ContentPart {
  if (ref.kind === 'file') {
    return { type: 'file', file: { file_id: ref.fileId } };
  }
  return {
    type: 'text',
    text: `Reference document "${ref.name}":\n${ref.text}`,
  };
}

export function buildMessages(request: TextRequest): MessageParam[] {
  const messages: MessageParam[] = [];
  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }
  const parts: ContentPart[] = (request.references ?? []).map(
    referenceToContentPart
  );
  parts.push({ type: 'text', text: request.prompt });
  messages.push({ role: 'user', content: parts });
  return messages;
}

export function createOpenAiTextService(
  config: AppConfig,
  client: OpenAI = createOpenAiClient(config)
): TextService {
  async function generate(request: TextRequest): Promise<string> {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        messages: buildMessages(request),
        response_format: {
          type: 'json_schema',
          json_schema: {
            name: request.schema.name,
            schema: request.schema.schema,
            strict: true,
          },
        },
      },
      { signal: request.signal }
    );
    const content = completion.choices[0]?.message?.content ?? '';
    if (!content) {
      throw new Error('Unexpected response format from OpenAI Chat API.');
    }
    return content;
  }

  async function uploadReference(
    filePath: string
  ): Promise<ReferenceMaterial> {
    const uploaded = await client.files.create({
      file: fs.createReadStream(filePath),
      purpose: 'user_data',
    });
    if (uploaded.status === 'error') {
      throw new Error(
        `File ${uploaded.id} failed to process: ${uploaded.status_details ?? 'unknown error'}`
      );
    }
    log.info(`[openai-client] Uploaded ${path.basename(filePath)} as ${uploaded.id}`);
    return {
      kind: 'file',
      name: path.basename(filePath),
      fileId: uploaded.id,
    };
  }

  return { generate, uploadReference };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function parseVerboseTranscription(raw: unknown): TranscriptionResult {
  if (!isRecord(raw)) {
    throw new Error('Unexpected transcription response.');
  }
  const duration = typeof raw.duration === 'number' ? raw.duration : 0;
  const segments: TranscriptSegment[] = [];
  if (Array.isArray(raw.segments)) {
    for (const seg of raw.segments) {
      if (
        isRecord(seg) &&
        typeof seg.start === 'number' &&
        typeof seg.end === 'number' &&
        seg.end > seg.start
      ) {
        segments.push({
          start: seg.start,
          end: seg.end,
          text: typeof seg.text === 'string' ? seg.text.trim() : '',
        });
      }
    }
  }
  return { duration, segments };
}

export function createOpenAiSpeechService(
  config: AppConfig,
  client: OpenAI = createOpenAiClient(config)
): SpeechService {
  return {
    async transcribe(audioPath, { language, prompt, signal }) {
      log.debug(
        `[openai-client] Sending ${path.basename(audioPath)} (${(
          fs.statSync(audioPath).size /
          (1024 * 1024)
        ).toFixed(2)} MB) to transcription API.`
      );
      const raw: unknown = await client.audio.transcriptions.create(
        {
          file: fs.createReadStream(audioPath),
          model: config.models.transcription,
          response_format: 'verbose_json',
          timestamp_granularities: ['segment'],
          language,
          prompt,
        },
        { signal }
      );
      return parseVerboseTranscription(raw);
    },
  };
}
