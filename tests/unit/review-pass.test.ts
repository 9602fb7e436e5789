import {
  applyCorrections,
  createWindowReviewer,
  CorrectionSource,
  partitionWindows,
  reconcileBatches,
} from '../../packages/main/services/subtitle-processing/pipeline/review-pass';
import { FailureTally } from '../../packages/main/services/subtitle-processing/failure-tally';
import type { SubtitleLine } from '../../packages/shared/types/app';
import { FakeTextService } from '../helpers/fakes';

function makeLines(texts: string[], ids?: number[]): SubtitleLine[] {
  return texts.map((text, i) => ({
    id: ids ? ids[i] : i + 1,
    start: i,
    end: i + 1,
    text,
  }));
}

describe('applyCorrections', () => {
  it('overwrites changed text and counts no-ops and unknown ids', () => {
    const window = makeLines(['a', 'b']);
    expect(
      applyCorrections(window, [
        { id: 1, text: 'A' },
        { id: 2, text: 'b' },
        { id: 9, text: 'zzz' },
      ])
    ).toEqual({ applied: 1, unchanged: 1, ignored: 1 });
    expect(window.map(l => l.text)).toEqual(['A', 'b']);
  });
});

describe('partitionWindows', () => {
  it('splits into consecutive windows with a short tail', () => {
    expect(partitionWindows([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('rejects a non-positive window size', () => {
    expect(() => partitionWindows([1], 0)).toThrow(RangeError);
  });
});

describe('reconcileBatches', () => {
  it('applies corrections only inside their own window and survives a failed window', async () => {
    const lines = makeLines(['a', 'b', 'c', 'd', 'e']);
    const tally = new FailureTally();
    const source: CorrectionSource = async (_window, { windowIndex }) => {
      if (windowIndex === 0) {
        return {
          ok: true,
          value: [
            { id: 1, text: 'A' },
            { id: 3, text: 'X' },
          ],
        };
      }
      if (windowIndex === 1) {
        return {
          ok: true,
          value: [
            { id: 3, text: 'c' },
            { id: 4, text: 'D' },
          ],
        };
      }
      return { ok: false, kind: 'transport-error', message: 'rate limited' };
    };

    const summary = await reconcileBatches(lines, 2, source, { tally });

    expect(lines.map(l => l.text)).toEqual(['A', 'b', 'c', 'D', 'e']);
    expect(summary).toEqual({
      windows: 3,
      failedWindows: 1,
      applied: 2,
      unchanged: 1,
      ignored: 1,
    });
    expect(tally.list()).toEqual([
      {
        stage: 'review',
        unit: 'window 4-5',
        kind: 'transport-error',
        message: 'rate limited',
      },
    ]);
  });

  it('keeps going after a window whose request throws', async () => {
    const lines = makeLines(['a', 'b', 'c']);
    const seen: number[] = [];
    const source: CorrectionSource = async (window, { windowIndex }) => {
      seen.push(windowIndex);
      if (windowIndex === 0) throw new Error('boom');
      return { ok: true, value: [{ id: window[0].id, text: 'C' }] };
    };

    const summary = await reconcileBatches(lines, 2, source);

    expect(seen).toEqual([0, 1]);
    expect(summary.failedWindows).toBe(1);
    expect(lines.map(l => l.text)).toEqual(['a', 'b', 'C']);
  });

  it('does not leak a repeated id into another window', async () => {
    const lines = makeLines(['a', 'b', 'c', 'd'], [1, 2, 1, 2]);
    const source: CorrectionSource = async (_window, { windowIndex }) => ({
      ok: true,
      value: windowIndex === 1 ? [{ id: 1, text: 'Z' }] : [],
    });

    await reconcileBatches(lines, 2, source, { concurrency: 2 });

    expect(lines.map(l => l.text)).toEqual(['a', 'b', 'Z', 'd']);
  });
});

describe('createWindowReviewer', () => {
  it('sends the window as numbered lines and validates the reply', async () => {
    const textService = new FakeTextService({
      window_review: () => JSON.stringify({ corrections: [{ id: 4, text: 'D' }] }),
    });
    const review = createWindowReviewer({
      textService,
      context: { summary: 'Summary: limits', references: [] },
      model: 'test-model',
      operationId: 'test-op',
    });

    const window = makeLines(['c', 'd'], [3, 4]);
    const result = await review(window, { windowIndex: 1, startPosition: 2 });

    expect(result).toEqual({ ok: true, value: [{ id: 4, text: 'D' }] });
    expect(textService.requests[0].prompt).toContain('3: c\n4: d');
    expect(textService.requests[0].prompt).toContain('(Lines 2 to 4)');
  });
});
