import log from 'electron-log/node';
import type { ServiceFailureKind } from '../../../shared/types/app.js';

export type FailureStage =
  | 'refine'
  | 'review'
  | 'summary'
  | 'reference'
  | 'off-topic';

export interface FailureRecord {
  stage: FailureStage;
  unit: string;
  kind: ServiceFailureKind;
  message: string;
}

// Absorbed unit failures never stop the pipeline, so they are counted here
// and reported once the run ends.
export class FailureTally {
  private readonly records: FailureRecord[] = [];

  record(record: FailureRecord): void {
    this.records.push(record);
    log.warn(
      `[failure-tally] ${record.stage} ${record.unit} fell back (${record.kind}): ${record.message}`
    );
  }

  count(stage?: FailureStage): number {
    if (!stage) return this.records.length;
    return this.records.filter(r => r.stage === stage).length;
  }

  countByKind(kind: ServiceFailureKind): number {
    return this.records.filter(r => r.kind === kind).length;
  }

  list(): readonly FailureRecord[] {
    return this.records;
  }

  summarize(): string {
    if (this.records.length === 0) return 'no absorbed failures';
    const byStage = new Map<FailureStage, number>();
    for (const r of this.records) {
      byStage.set(r.stage, (byStage.get(r.stage) ?? 0) + 1);
    }
    return [...byStage.entries()]
      .map(([stage, n]) => `${stage}: ${n}`)
      .join(', ');
  }
}
