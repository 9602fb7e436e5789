import { FailureTally } from '../../packages/main/services/subtitle-processing/failure-tally';

describe('FailureTally', () => {
  it('counts absorbed failures per stage and kind', () => {
    const tally = new FailureTally();
    expect(tally.summarize()).toBe('no absorbed failures');

    tally.record({ stage: 'refine', unit: 'line 1', kind: 'schema-error', message: 'x' });
    tally.record({ stage: 'refine', unit: 'line 2', kind: 'transport-error', message: 'y' });
    tally.record({ stage: 'review', unit: 'window 0-100', kind: 'transport-error', message: 'z' });

    expect(tally.count()).toBe(3);
    expect(tally.count('refine')).toBe(2);
    expect(tally.count('summary')).toBe(0);
    expect(tally.countByKind('transport-error')).toBe(2);
    expect(tally.summarize()).toBe('refine: 2, review: 1');
  });
});
