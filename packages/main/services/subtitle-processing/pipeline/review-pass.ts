import log from 'electron-log/node';
import pLimit from 'p-limit';
import type {
  Correction,
  PipelineProgressCallback,
  ReconcileSummary,
  ServiceResult,
  SharedContext,
  SubtitleLine,
  TextService,
} from '../../../../shared/types/app.js';
import { callStructured } from '../ai-client.js';
import { WINDOW_REVIEW_SCHEMA, validateWindowReview } from '../schemas.js';
import { buildReviewPrompt } from '../prompts.js';
import { FailureTally } from '../failure-tally.js';
import { errorMessage, isAbortError, throwIfAborted } from '../../../errors.js';
import { stageProgress } from './progress.js';

export interface WindowInfo {
  windowIndex: number;
  startPosition: number;
}

export type CorrectionSource = (
  window: SubtitleLine[],
  info: WindowInfo
) => Promise<ServiceResult<Correction[]>>;

export function applyCorrections(
  window: SubtitleLine[],
  corrections: Correction[]
): { applied: number; unchanged: number; ignored: number } {
  const byId = new Map(window.map(line => [line.id, line]));
  let applied = 0;
  let unchanged = 0;
  let ignored = 0;
  for (const correction of corrections) {
    const target = byId.get(correction.id);
    if (!target) {
      ignored++;
      continue;
    }
    if (target.text === correction.text) {
      unchanged++;
      continue;
    }
    target.text = correction.text;
    applied++;
  }
  return { applied, unchanged, ignored };
}

export function partitionWindows<T>(items: T[], windowSize: number): T[][] {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new RangeError(`windowSize must be a positive integer: ${windowSize}`);
  }
  const windows: T[][] = [];
  for (let i = 0; i < items.length; i += windowSize) {
    windows.push(items.slice(i, i + windowSize));
  }
  return windows;
}

/**
 * Requests corrections window by window and applies each one to the line
 * with the same id inside that window only. Lines are mutated in place.
 */
export async function reconcileBatches(
  lines: SubtitleLine[],
  windowSize: number,
  correctionSource: CorrectionSource,
  {
    concurrency = 1,
    tally,
    operationId = 'review',
    signal,
    progressCallback,
  }: {
    concurrency?: number;
    tally?: FailureTally;
    operationId?: string;
    signal?: AbortSignal;
    progressCallback?: PipelineProgressCallback;
  } = {}
): Promise<ReconcileSummary> {
  const windows = partitionWindows(lines, windowSize);
  const summary: ReconcileSummary = {
    windows: windows.length,
    failedWindows: 0,
    applied: 0,
    unchanged: 0,
    ignored: 0,
  };
  const limit = pLimit(concurrency);
  let done = 0;

  log.info(
    `[${operationId}] Reviewing ${lines.length} lines in ${windows.length} windows`
  );

  const reviewWindow = async (window: SubtitleLine[], windowIndex: number) => {
    throwIfAborted(signal);
    const startPosition = windowIndex * windowSize;
    const unit = `window ${startPosition}-${startPosition + window.length}`;

    let result: ServiceResult<Correction[]>;
    try {
      result = await correctionSource(window, { windowIndex, startPosition });
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) throw err;
      result = {
        ok: false,
        kind: 'transport-error',
        message: errorMessage(err),
      };
    }

    if (result.ok) {
      const counts = applyCorrections(window, result.value);
      summary.applied += counts.applied;
      summary.unchanged += counts.unchanged;
      summary.ignored += counts.ignored;
      if (counts.applied > 0) {
        log.info(
          `[${operationId}] ${unit}: ${counts.applied} corrections applied.`
        );
      }
    } else {
      summary.failedWindows++;
      tally?.record({
        stage: 'review',
        unit,
        kind: result.kind,
        message: result.message,
      });
    }

    done++;
    progressCallback?.({
      percent: stageProgress('review', (done / windows.length) * 100),
      stage: `Reviewing window ${done}/${windows.length}`,
      current: done,
      total: windows.length,
    });
  };

  await Promise.all(
    windows.map((window, windowIndex) =>
      limit(() => reviewWindow(window, windowIndex))
    )
  );

  return summary;
}

export function createWindowReviewer({
  textService,
  context,
  model,
  operationId,
  signal,
}: {
  textService: TextService;
  context: SharedContext;
  model: string;
  operationId: string;
  signal?: AbortSignal;
}): CorrectionSource {
  return (window, { startPosition }) =>
    callStructured({
      service: textService,
      request: {
        model,
        system: `Global context for this lecture:\n${context.summary}`,
        prompt: buildReviewPrompt({ window, startPosition }),
        references: context.references,
        schema: WINDOW_REVIEW_SCHEMA,
        signal,
      },
      validate: validateWindowReview,
      operationId,
    });
}
