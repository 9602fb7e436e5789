import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import log from 'electron-log/node';
import type {
  ReferenceMaterial,
  SharedContext,
  SubtitleLine,
  TextService,
} from '../../../shared/types/app.js';
import { REFERENCE_EXTENSIONS } from '../../../shared/constants/index.js';
import type { AppConfig } from '../../config.js';
import { errorMessage, isAbortError, throwIfAborted } from '../../errors.js';
import { callStructured } from './ai-client.js';
import { GLOBAL_SUMMARY_SCHEMA, validateGlobalSummary } from './schemas.js';
import { buildSummaryPrompt } from './prompts.js';
import { FailureTally } from './failure-tally.js';
import {
  MAX_INLINE_REFERENCE_CHARS,
  MAX_SUMMARY_TRANSCRIPT_CHARS,
  TEXT_REFERENCE_EXTENSIONS,
} from './constants.js';

export function findReferenceFiles(referenceBases: string[]): string[] {
  const seen = new Set<string>();
  const found: string[] = [];
  for (const base of referenceBases) {
    for (const ext of REFERENCE_EXTENSIONS) {
      const candidate = path.resolve(`${base}${ext}`);
      if (seen.has(candidate)) continue;
      seen.add(candidate);
      if (existsSync(candidate)) found.push(candidate);
    }
  }
  return found;
}

async function loadReference(
  filePath: string,
  textService: TextService,
  operationId: string
): Promise<ReferenceMaterial> {
  const ext = path.extname(filePath).toLowerCase();
  const name = path.basename(filePath);

  if (TEXT_REFERENCE_EXTENSIONS.includes(ext)) {
    const text = await fs.readFile(filePath, 'utf8');
    return { kind: 'text', name, text: text.slice(0, MAX_INLINE_REFERENCE_CHARS) };
  }
  log.info(`[${operationId}] Uploading reference ${name}`);
  return textService.uploadReference(filePath);
}

export function formatGlobalSummary(summary: string, styleGuide: string): string {
  return `Summary: ${summary.trim()}\nKey Terms/Style: ${styleGuide.trim()}`;
}

/**
 * Gathers reference material sitting next to the media and asks for a
 * summary of the whole transcript. Both feed every later request of the
 * run, so the returned object is frozen.
 */
export async function prepareSharedContext({
  referenceBases,
  lines,
  textService,
  config,
  tally,
  operationId,
  signal,
}: {
  referenceBases: string[];
  lines: SubtitleLine[];
  textService: TextService;
  config: AppConfig;
  tally: FailureTally;
  operationId: string;
  signal?: AbortSignal;
}): Promise<SharedContext> {
  const references: ReferenceMaterial[] = [];
  for (const filePath of findReferenceFiles(referenceBases)) {
    throwIfAborted(signal);
    try {
      references.push(await loadReference(filePath, textService, operationId));
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) throw err;
      tally.record({
        stage: 'reference',
        unit: path.basename(filePath),
        kind: 'transport-error',
        message: errorMessage(err),
      });
    }
  }

  throwIfAborted(signal);
  const transcript = lines
    .map(line => line.text)
    .join('\n')
    .slice(0, MAX_SUMMARY_TRANSCRIPT_CHARS);

  let summary = config.fallbackTopic;
  if (transcript.trim()) {
    const result = await callStructured({
      service: textService,
      request: {
        model: config.models.summary,
        prompt: buildSummaryPrompt(transcript),
        references,
        schema: GLOBAL_SUMMARY_SCHEMA,
        signal,
      },
      validate: validateGlobalSummary,
      operationId,
    });
    if (result.ok) {
      summary = formatGlobalSummary(result.value.summary, result.value.styleGuide);
    } else {
      tally.record({
        stage: 'summary',
        unit: 'global summary',
        kind: result.kind,
        message: result.message,
      });
    }
  }

  log.info(
    `[${operationId}] Shared context ready (${references.length} references)`
  );
  return Object.freeze({ summary, references: Object.freeze(references) });
}
