import type {
  Correction,
  JsonSchemaSpec,
  OffTopicSegment,
  RefinementResult,
} from '../../../shared/types/app.js';
import type { Validation } from './ai-client.js';

export interface GlobalSummary {
  summary: string;
  styleGuide: string;
}

export const LINE_REWRITE_SCHEMA: JsonSchemaSpec = {
  name: 'line_rewrite',
  schema: {
    type: 'object',
    properties: {
      output: { type: 'string' },
      shouldMergeNext: { type: 'boolean' },
    },
    required: ['output', 'shouldMergeNext'],
    additionalProperties: false,
  },
};

export const WINDOW_REVIEW_SCHEMA: JsonSchemaSpec = {
  name: 'window_review',
  schema: {
    type: 'object',
    properties: {
      corrections: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            text: { type: 'string' },
          },
          required: ['id', 'text'],
          additionalProperties: false,
        },
      },
    },
    required: ['corrections'],
    additionalProperties: false,
  },
};

export const GLOBAL_SUMMARY_SCHEMA: JsonSchemaSpec = {
  name: 'global_summary',
  schema: {
    type: 'object',
    properties: {
      summary: { type: 'string' },
      styleGuide: { type: 'string' },
    },
    required: ['summary', 'styleGuide'],
    additionalProperties: false,
  },
};

export const OFF_TOPIC_SCHEMA: JsonSchemaSpec = {
  name: 'off_topic_report',
  schema: {
    type: 'object',
    properties: {
      segments: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            startTime: { type: 'string' },
            endTime: { type: 'string' },
            description: { type: 'string' },
          },
          required: ['startTime', 'endTime', 'description'],
          additionalProperties: false,
        },
      },
    },
    required: ['segments'],
    additionalProperties: false,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const invalid = (error: string): { valid: false; error: string } => ({
  valid: false,
  error,
});

export function validateLineRewrite(
  value: unknown
): Validation<RefinementResult> {
  if (!isRecord(value)) return invalid('expected an object');
  const { output, shouldMergeNext } = value;
  if (typeof output !== 'string') return invalid('output must be a string');
  if (!output.trim()) return invalid('output is empty');
  if (shouldMergeNext !== undefined && typeof shouldMergeNext !== 'boolean') {
    return invalid('shouldMergeNext must be a boolean');
  }
  return {
    valid: true,
    value: { text: output.trim(), shouldMergeNext: shouldMergeNext === true },
  };
}

export function validateWindowReview(value: unknown): Validation<Correction[]> {
  if (!isRecord(value)) return invalid('expected an object');
  if (!Array.isArray(value.corrections)) {
    return invalid('corrections must be an array');
  }
  const corrections: Correction[] = [];
  for (const item of value.corrections) {
    if (
      !isRecord(item) ||
      typeof item.id !== 'number' ||
      !Number.isInteger(item.id) ||
      typeof item.text !== 'string'
    ) {
      return invalid('each correction needs an integer id and a string text');
    }
    corrections.push({ id: item.id, text: item.text });
  }
  return { valid: true, value: corrections };
}

export function validateGlobalSummary(
  value: unknown
): Validation<GlobalSummary> {
  if (!isRecord(value)) return invalid('expected an object');
  const { summary, styleGuide } = value;
  if (typeof summary !== 'string' || !summary.trim()) {
    return invalid('summary must be a non-empty string');
  }
  if (typeof styleGuide !== 'string') {
    return invalid('styleGuide must be a string');
  }
  return { valid: true, value: { summary, styleGuide } };
}

export function validateOffTopicReport(
  value: unknown
): Validation<OffTopicSegment[]> {
  if (!isRecord(value)) return invalid('expected an object');
  if (!Array.isArray(value.segments)) {
    return invalid('segments must be an array');
  }
  const segments: OffTopicSegment[] = [];
  for (const item of value.segments) {
    if (
      !isRecord(item) ||
      typeof item.startTime !== 'string' ||
      typeof item.endTime !== 'string' ||
      typeof item.description !== 'string'
    ) {
      return invalid('each segment needs startTime, endTime and description');
    }
    segments.push({
      startTime: item.startTime,
      endTime: item.endTime,
      description: item.description,
    });
  }
  return { valid: true, value: segments };
}
