import log from 'electron-log/node';
import pLimit from 'p-limit';
import type {
  PipelineProgressCallback,
  RefinementResult,
  SharedContext,
  SubtitleLine,
  TextService,
} from '../../../../shared/types/app.js';
import { callStructured } from '../ai-client.js';
import { LINE_REWRITE_SCHEMA, validateLineRewrite } from '../schemas.js';
import { buildRefinePrompt, buildRefineSystemPrompt } from '../prompts.js';
import { FailureTally } from '../failure-tally.js';
import { errorMessage, isAbortError, throwIfAborted } from '../../../errors.js';
import { PROGRESS_LOG_EVERY } from '../../../../shared/constants/runtime-config.js';
import { stageProgress } from './progress.js';

export interface RefineOptions {
  textService: TextService;
  model: string;
  concurrency: number;
  mathSymbols: string;
  subtitleLanguage: string;
  maxMergedChars: number;
  tally: FailureTally;
  operationId: string;
  signal?: AbortSignal;
  progressCallback?: PipelineProgressCallback;
}

export function fallbackResult(line: SubtitleLine): RefinementResult {
  return { text: line.text, shouldMergeNext: false };
}

/**
 * One rewrite request per line, at most `concurrency` in flight. Results are
 * written to the slot of the line's position, so completion order never
 * leaks into the output.
 */
export async function refineLines(
  lines: SubtitleLine[],
  context: SharedContext,
  {
    textService,
    model,
    concurrency,
    mathSymbols,
    subtitleLanguage,
    maxMergedChars,
    tally,
    operationId,
    signal,
    progressCallback,
  }: RefineOptions
): Promise<RefinementResult[]> {
  const total = lines.length;
  const results: RefinementResult[] = new Array(total);
  if (total === 0) return results;

  const system = buildRefineSystemPrompt({
    mathSymbols,
    globalSummary: context.summary,
    subtitleLanguage,
    maxMergedChars,
  });
  const limit = pLimit(concurrency);
  let done = 0;

  log.info(
    `[${operationId}] Refining ${total} lines (${concurrency} in flight)`
  );

  const refineOne = async (position: number): Promise<void> => {
    throwIfAborted(signal);
    const line = lines[position];
    try {
      const result = await callStructured({
        service: textService,
        request: {
          model,
          system,
          prompt: buildRefinePrompt({
            previous: lines[position - 1]?.text,
            current: line.text,
            next: lines[position + 1]?.text,
          }),
          references: context.references,
          schema: LINE_REWRITE_SCHEMA,
          signal,
        },
        validate: validateLineRewrite,
        operationId,
      });
      if (result.ok) {
        results[position] = result.value;
      } else {
        tally.record({
          stage: 'refine',
          unit: `line ${line.id}`,
          kind: result.kind,
          message: result.message,
        });
        results[position] = fallbackResult(line);
      }
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) throw err;
      tally.record({
        stage: 'refine',
        unit: `line ${line.id}`,
        kind: 'transport-error',
        message: errorMessage(err),
      });
      results[position] = fallbackResult(line);
    }

    done++;
    if (done % PROGRESS_LOG_EVERY === 0) {
      log.info(`[${operationId}] Refined ${done}/${total} lines`);
    }
    progressCallback?.({
      percent: stageProgress('refine', (done / total) * 100),
      stage: `Refining ${done}/${total}`,
      current: done,
      total,
    });
  };

  await Promise.all(lines.map((_, position) => limit(() => refineOne(position))));

  log.info(
    `[${operationId}] Refinement done, ${tally.count('refine')} lines kept their original text`
  );
  return results;
}
