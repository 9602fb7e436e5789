import log from 'electron-log/node';
import type {
  OffTopicSegment,
  SharedContext,
  SubtitleLine,
  TextService,
} from '../../../../shared/types/app.js';
import { callStructured } from '../ai-client.js';
import { OFF_TOPIC_SCHEMA, validateOffTopicReport } from '../schemas.js';
import { buildOffTopicPrompt } from '../prompts.js';
import { FailureTally } from '../failure-tally.js';

export function formatOffTopicReport(
  videoName: string,
  segments: OffTopicSegment[]
): string {
  let report = `Off-Topic Segments Report\nVideo: ${videoName}\n${'='.repeat(50)}\n\n`;
  if (segments.length === 0) {
    return report + 'No significant off-topic segments detected.\n';
  }
  for (const seg of segments) {
    report += `Time: ${seg.startTime} - ${seg.endTime}\n`;
    report += `Content: ${seg.description}\n`;
    report += `${'-'.repeat(30)}\n`;
  }
  return report;
}

// Returns null when the analysis failed; the failure is already tallied.
export async function detectOffTopic({
  lines,
  context,
  textService,
  model,
  tally,
  operationId,
  signal,
}: {
  lines: SubtitleLine[];
  context: SharedContext;
  textService: TextService;
  model: string;
  tally: FailureTally;
  operationId: string;
  signal?: AbortSignal;
}): Promise<OffTopicSegment[] | null> {
  const result = await callStructured({
    service: textService,
    request: {
      model,
      prompt: buildOffTopicPrompt({ globalSummary: context.summary, lines }),
      references: context.references,
      schema: OFF_TOPIC_SCHEMA,
      signal,
    },
    validate: validateOffTopicReport,
    operationId,
  });
  if (!result.ok) {
    tally.record({
      stage: 'off-topic',
      unit: 'report',
      kind: result.kind,
      message: result.message,
    });
    return null;
  }
  log.info(
    `[${operationId}] Off-topic analysis found ${result.value.length} segments`
  );
  return result.value;
}
