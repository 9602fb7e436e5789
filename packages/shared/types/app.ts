// =========================================
// === Media & Segmentation
// =========================================

export interface TimeRange {
  start: number;
  end: number;
}

/** A stretch of detected speech, in seconds from the start of the media. */
export type SpeechInterval = TimeRange;

/** A silent stretch longer than the configured gap threshold. */
export type SilenceGap = TimeRange;

/** A stretch of source media retained after silence trimming. */
export type KeepInterval = TimeRange;

export interface TranscodeSegment {
  index: number;
  start: number;
  end: number;
}

export interface TranscodeSpec {
  segments: TranscodeSegment[];
  videoCodec: string;
  preset: string;
  audioCodec: string;
}

export interface SpeechDetection {
  speechIntervals: SpeechInterval[];
  totalDuration: number;
}

export type TrimSkipReason =
  | 'no-speech'
  | 'no-gaps'
  | 'no-retainable-content';

export interface TrimResult {
  outputPath: string;
  trimmed: boolean;
  keepIntervals: KeepInterval[];
  totalDuration: number;
  reason?: TrimSkipReason;
}

// =========================================
// === Subtitles
// =========================================

export interface SubtitleLine {
  id: number;
  start: number;
  end: number;
  text: string;
}

export interface RefinementResult {
  text: string;
  shouldMergeNext: boolean;
}

export interface Correction {
  id: number;
  text: string;
}

export interface LineLineage {
  id: number;
  sourceIds: number[];
}

export interface ReassembledLines {
  lines: SubtitleLine[];
  lineage: LineLineage[];
}

export interface ReconcileSummary {
  windows: number;
  failedWindows: number;
  applied: number;
  unchanged: number;
  ignored: number;
}

export interface OffTopicSegment {
  startTime: string;
  endTime: string;
  description: string;
}

// =========================================
// === Text service
// =========================================

export type ReferenceMaterial =
  | { kind: 'file'; name: string; fileId: string }
  | { kind: 'text'; name: string; text: string };

export interface SharedContext {
  readonly summary: string;
  readonly references: readonly ReferenceMaterial[];
}

export type ServiceFailureKind = 'schema-error' | 'transport-error';

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ServiceFailureKind; message: string };

export interface JsonSchemaSpec {
  name: string;
  schema: Record<string, unknown>;
}

export interface TextRequest {
  model: string;
  system?: string;
  prompt: string;
  references?: readonly ReferenceMaterial[];
  schema: JsonSchemaSpec;
  signal?: AbortSignal;
}

export interface TextService {
  /** Resolves with the raw JSON text produced by the model. */
  generate(request: TextRequest): Promise<string>;
  uploadReference(filePath: string): Promise<ReferenceMaterial>;
}

// =========================================
// === Speech service
// =========================================

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface TranscriptionResult {
  duration: number;
  segments: TranscriptSegment[];
}

export interface SpeechService {
  transcribe(
    audioPath: string,
    opts: { language?: string; prompt?: string; signal?: AbortSignal }
  ): Promise<TranscriptionResult>;
}

// =========================================
// === Progress & results
// =========================================

export interface PipelineProgress {
  percent: number;
  stage: string;
  current?: number;
  total?: number;
}

export type PipelineProgressCallback = (progress: PipelineProgress) => void;

export interface VideoResult {
  videoPath: string;
  ok: boolean;
  subtitlePath?: string;
  trimmed?: boolean;
  error?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  results: VideoResult[];
}
