import type {
  KeepInterval,
  SilenceGap,
  SpeechInterval,
  TimeRange,
} from '../../../shared/types/app.js';
import { SegmentationInputError } from '../../errors.js';

function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new SegmentationInputError(`${name} must be a finite number, got ${value}`);
  }
}

function validateInput(
  speechIntervals: readonly SpeechInterval[],
  totalDuration: number,
  gapThreshold: number
): void {
  assertFinite('totalDuration', totalDuration);
  assertFinite('gapThreshold', gapThreshold);
  if (totalDuration < 0) {
    throw new SegmentationInputError(
      `totalDuration must not be negative, got ${totalDuration}`
    );
  }
  if (gapThreshold <= 0) {
    throw new SegmentationInputError(
      `gapThreshold must be positive, got ${gapThreshold}`
    );
  }
  speechIntervals.forEach(({ start, end }, i) => {
    assertFinite(`speechIntervals[${i}].start`, start);
    assertFinite(`speechIntervals[${i}].end`, end);
    if (end <= start) {
      throw new SegmentationInputError(
        `speechIntervals[${i}] is empty or reversed: ${start}-${end}`
      );
    }
    if (start < 0 || end > totalDuration) {
      throw new SegmentationInputError(
        `speechIntervals[${i}] lies outside 0-${totalDuration}: ${start}-${end}`
      );
    }
    const prev = speechIntervals[i - 1];
    if (prev && start < prev.end) {
      throw new SegmentationInputError(
        `speechIntervals[${i}] overlaps or precedes the interval before it`
      );
    }
  });
}

/** Silences strictly longer than `gapThreshold`, in timeline order. */
export function findSilenceGaps(
  speechIntervals: readonly SpeechInterval[],
  totalDuration: number,
  gapThreshold: number
): SilenceGap[] {
  if (speechIntervals.length === 0) return [];
  const gaps: SilenceGap[] = [];

  const first = speechIntervals[0];
  if (first.start > gapThreshold) {
    gaps.push({ start: 0, end: first.start });
  }
  for (let i = 0; i < speechIntervals.length - 1; i++) {
    const end = speechIntervals[i].end;
    const nextStart = speechIntervals[i + 1].start;
    if (nextStart - end > gapThreshold) {
      gaps.push({ start: end, end: nextStart });
    }
  }
  const lastEnd = speechIntervals[speechIntervals.length - 1].end;
  if (totalDuration - lastEnd > gapThreshold) {
    gaps.push({ start: lastEnd, end: totalDuration });
  }
  return gaps;
}

/**
 * Portions of the timeline to keep. Each cut leaves half the threshold of
 * silence on both sides of the gap; intervals that collapse to zero width
 * are dropped. An empty result means there is nothing to keep.
 */
export function computeKeepIntervals(
  speechIntervals: readonly SpeechInterval[],
  totalDuration: number,
  gapThreshold: number
): KeepInterval[] {
  validateInput(speechIntervals, totalDuration, gapThreshold);
  if (speechIntervals.length === 0) return [];

  const gaps = findSilenceGaps(speechIntervals, totalDuration, gapThreshold);
  if (gaps.length === 0) return [{ start: 0, end: totalDuration }];

  const half = gapThreshold / 2;
  const keep: KeepInterval[] = [];
  let openAt = 0;
  for (const gap of gaps) {
    const closeAt = gap.start + half;
    if (closeAt > openAt) keep.push({ start: openAt, end: closeAt });
    openAt = gap.end - half;
  }
  if (openAt < totalDuration) {
    keep.push({ start: openAt, end: totalDuration });
  }
  return keep;
}

/**
 * Turns raw recognizer segments into ordered, disjoint speech intervals
 * clamped to the media duration.
 */
export function normalizeSpeechIntervals(
  segments: readonly TimeRange[],
  totalDuration: number
): SpeechInterval[] {
  const clamped = segments
    .filter(s => Number.isFinite(s.start) && Number.isFinite(s.end))
    .map(s => ({
      start: Math.max(0, s.start),
      end: Math.min(totalDuration, s.end),
    }))
    .filter(s => s.end > s.start)
    .sort((a, b) => a.start - b.start);

  const fused: SpeechInterval[] = [];
  for (const seg of clamped) {
    const last = fused[fused.length - 1];
    if (last && seg.start <= last.end) {
      last.end = Math.max(last.end, seg.end);
    } else {
      fused.push({ ...seg });
    }
  }
  return fused;
}
