import type {
  LineLineage,
  ReassembledLines,
  RefinementResult,
  SubtitleLine,
} from '../../../../shared/types/app.js';
import { charLength } from '../../../../shared/helpers/index.js';
import { MAX_MERGED_CHARS } from '../../../../shared/constants/runtime-config.js';

/**
 * Applies per-position rewrite results in original order and merges a line
 * with its successor when flagged and the joined text fits. At most one
 * merge hop per line; output ids restart at 1.
 */
export function reassemble(
  lines: readonly SubtitleLine[],
  results: ReadonlyArray<RefinementResult | undefined>,
  { maxMergedChars = MAX_MERGED_CHARS }: { maxMergedChars?: number } = {}
): ReassembledLines {
  const out: SubtitleLine[] = [];
  const lineage: LineLineage[] = [];
  const consumed = new Set<number>();

  for (let position = 0; position < lines.length; position++) {
    if (consumed.has(position)) continue;

    const line = lines[position];
    const result = results[position];
    const merged: SubtitleLine = {
      id: out.length + 1,
      start: line.start,
      end: line.end,
      text: result?.text ?? line.text,
    };
    const sourceIds = [line.id];

    const nextLine = lines[position + 1];
    const nextResult = results[position + 1];
    if (result?.shouldMergeNext && nextLine && nextResult) {
      const combined = result.text + nextResult.text;
      if (charLength(combined) <= maxMergedChars) {
        merged.text = combined;
        merged.end = nextLine.end;
        consumed.add(position + 1);
        sourceIds.push(nextLine.id);
      }
    }

    out.push(merged);
    lineage.push({ id: merged.id, sourceIds });
  }

  return { lines: out, lineage };
}
