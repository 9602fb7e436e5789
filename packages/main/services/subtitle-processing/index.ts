import path from 'path';
import log from 'electron-log/node';
import type {
  LineLineage,
  PipelineProgressCallback,
  ReconcileSummary,
  SubtitleLine,
  TextService,
} from '../../../shared/types/app.js';
import { FILE_SUFFIXES } from '../../../shared/constants/index.js';
import { stripExtension } from '../../../shared/helpers/index.js';
import type { AppConfig } from '../../config.js';
import { NoSpeechDetectedError } from '../../errors.js';
import { FileManager } from '../file-manager.js';
import { prepareSharedContext } from './context.js';
import { FailureTally } from './failure-tally.js';
import { loadMathSymbols } from './prompts.js';
import { refineLines } from './pipeline/refine-pass.js';
import { reassemble } from './pipeline/reassemble.js';
import { createWindowReviewer, reconcileBatches } from './pipeline/review-pass.js';
import { detectOffTopic, formatOffTopicReport } from './pipeline/off-topic-pass.js';
import { stageProgress } from './pipeline/progress.js';

export interface ProcessSubtitlesResult {
  draftPath: string;
  refinedPath: string;
  offTopicPath?: string;
  lines: SubtitleLine[];
  lineage: LineLineage[];
  reconcile: ReconcileSummary;
  tally: FailureTally;
}

export async function processSubtitles({
  srtPath,
  referenceBases,
  config,
  services,
  mathSymbols = loadMathSymbols(),
  operationId,
  signal,
  progressCallback,
}: {
  srtPath: string;
  /** Paths without extension next to which reference files are looked up. */
  referenceBases?: string[];
  config: AppConfig;
  services: { textService: TextService; fileManager: FileManager };
  mathSymbols?: string;
  operationId: string;
  signal?: AbortSignal;
  progressCallback?: PipelineProgressCallback;
}): Promise<ProcessSubtitlesResult> {
  const { textService, fileManager } = services;
  const base = stripExtension(srtPath);
  const tally = new FailureTally();

  const original = await fileManager.readSrt(srtPath);
  if (original.length === 0) {
    throw new NoSpeechDetectedError(`No subtitle lines found in ${srtPath}`);
  }
  log.info(`[${operationId}] Loaded ${original.length} lines from ${srtPath}`);

  progressCallback?.({ percent: stageProgress('context', 0), stage: 'Preparing shared context' });
  const context = await prepareSharedContext({
    referenceBases: referenceBases ?? [base],
    lines: original,
    textService,
    config,
    tally,
    operationId,
    signal,
  });

  const results = await refineLines(original, context, {
    textService,
    model: config.models.refine,
    concurrency: config.refineConcurrency,
    mathSymbols,
    subtitleLanguage: config.subtitleLanguage,
    maxMergedChars: config.maxMergedChars,
    tally,
    operationId,
    signal,
    progressCallback,
  });

  const { lines, lineage } = reassemble(original, results, {
    maxMergedChars: config.maxMergedChars,
  });
  for (const entry of lineage) {
    if (entry.sourceIds.length > 1) {
      log.debug(
        `[${operationId}] line ${entry.id} <- ${entry.sourceIds.join('+')}`
      );
    }
  }
  log.info(
    `[${operationId}] Reassembled ${original.length} lines into ${lines.length}`
  );

  const draftPath = await fileManager.writeSrt(
    `${base}${FILE_SUFFIXES.DRAFT_SRT}`,
    lines
  );

  const reconcile = await reconcileBatches(
    lines,
    config.reviewWindowSize,
    createWindowReviewer({
      textService,
      context,
      model: config.models.review,
      operationId,
      signal,
    }),
    {
      concurrency: config.reviewConcurrency,
      tally,
      operationId,
      signal,
      progressCallback,
    }
  );

  const refinedPath = await fileManager.writeSrt(
    `${base}${FILE_SUFFIXES.REFINED_SRT}`,
    lines
  );

  progressCallback?.({
    percent: stageProgress('report', 0),
    stage: 'Detecting off-topic segments',
  });
  let offTopicPath: string | undefined;
  const segments = await detectOffTopic({
    lines,
    context,
    textService,
    model: config.models.offTopic,
    tally,
    operationId,
    signal,
  });
  if (segments) {
    offTopicPath = await fileManager.writeText(
      `${base}${FILE_SUFFIXES.OFF_TOPIC_REPORT}`,
      formatOffTopicReport(path.basename(base), segments)
    );
  }

  log.info(`[${operationId}] Subtitle processing done (${tally.summarize()})`);
  progressCallback?.({ percent: stageProgress('report', 100), stage: 'Subtitles refined' });

  return {
    draftPath,
    refinedPath,
    offTopicPath,
    lines,
    lineage,
    reconcile,
    tally,
  };
}
