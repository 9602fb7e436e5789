/** Overall percent range each subtitle stage reports within. */
export const STAGE_RANGES = {
  context: [0, 5],
  refine: [5, 70],
  review: [70, 95],
  report: [98, 100],
} as const;

export type SubtitleStage = keyof typeof STAGE_RANGES;

export function stageProgress(stage: SubtitleStage, localPct: number): number {
  const [from, to] = STAGE_RANGES[stage];
  const pct = Math.min(100, Math.max(0, localPct));
  return Math.round(from + (pct / 100) * (to - from));
}
