import fs from 'fs';
import path from 'path';
import log from 'electron-log/node';
import type { SubtitleLine } from '../../../shared/types/app.js';
import { formatTranscriptLine } from '../../../shared/helpers/index.js';

const MATH_SYMBOLS_FILE = 'math-symbols.txt';

// Source runs from packages/main/..., the build from dist/packages/main/...
const DATA_DIR_CANDIDATES = [
  path.resolve(__dirname, '../../../../data'),
  path.resolve(__dirname, '../../../../../data'),
];

export function loadMathSymbols(dataDirs = DATA_DIR_CANDIDATES): string {
  for (const dir of dataDirs) {
    const file = path.join(dir, MATH_SYMBOLS_FILE);
    if (fs.existsSync(file)) {
      return fs.readFileSync(file, 'utf8').trim();
    }
  }
  log.warn(`[prompts] ${MATH_SYMBOLS_FILE} not found; notation table is empty`);
  return '';
}

export function buildRefineSystemPrompt({
  mathSymbols,
  globalSummary,
  subtitleLanguage,
  maxMergedChars,
}: {
  mathSymbols: string;
  globalSummary: string;
  subtitleLanguage: string;
  maxMergedChars: number;
}): string {
  return `
You are a strict subtitle editor for a mathematics video using ${subtitleLanguage}.

**CRITICAL RULE: SUBTRACTION & MERGING**
1. **Subtraction Only**: Remove filler words, stutters, and redundant phrases.
2. **Merging**: Check if the current line flows grammatically into the NEXT line.
   - If merging them creates a better sentence AND the combined length is ≤ ${maxMergedChars} characters, set \`shouldMergeNext\` to true.
   - Do NOT manually merge the text in \`output\`. Just return the refined text of the CURRENT line.
3. **No Rewriting**: Do not change sentence structure or add words unless using Math Notation.

**MATHEMATICAL NOTATION**
Replace spoken math terms with symbols:
${mathSymbols || '(none)'}

**FORMATTING**
1. Output valid JSON.
2. Add spaces between English/Numbers and Chinese.
3. ${subtitleLanguage} only.

**GLOBAL SUMMARY**
${globalSummary}
`.trim();
}

export function buildRefinePrompt({
  previous,
  current,
  next,
}: {
  previous?: string;
  current: string;
  next?: string;
}): string {
  return `
PREVIOUS LINE (context only): ${previous ?? '(none)'}
CURRENT LINE: ${current}
NEXT LINE (context only): ${next ?? '(none)'}

Return the refined CURRENT LINE as \`output\` and whether it should merge with the NEXT LINE as \`shouldMergeNext\`.
`.trim();
}

export function buildSummaryPrompt(transcript: string): string {
  return `
Analyze the attached reference documents (if any) and the following transcript.
Task:
1. Provide a comprehensive summary of the mathematical topic as \`summary\`.
2. Extract a "Style Guide" of specific notations and terminology used in the lecture as \`styleGuide\`.

Transcript:
${transcript}
`.trim();
}

export function buildReviewPrompt({
  window,
  startPosition,
}: {
  window: SubtitleLine[];
  startPosition: number;
}): string {
  const body = window.map(line => `${line.id}: ${line.text}`).join('\n');
  return `
Review the following subtitle chunk (Lines ${startPosition} to ${
    startPosition + window.length
  }).
You have access to the attached reference documents.

Task:
1. Check for mismatches between the text and the reference material (slides, notes).
2. Ensure strict mathematical terminology consistency.
3. OUTPUT: \`corrections\`, a list of ONLY the lines that need correction, each with the line's \`id\` (the number before the colon) and the corrected \`text\`. If a line is correct, do not include it.

Subtitles:
${body}
`.trim();
}

export function buildOffTopicPrompt({
  globalSummary,
  lines,
}: {
  globalSummary: string;
  lines: SubtitleLine[];
}): string {
  return `
Analyze the following lecture transcript.
Goal: Identify segments that are **Off-Topic** or unrelated to the main educational content.
Examples:
- Logistics (assignments, exam dates, "don't come tomorrow").
- Jokes, personal stories, idle chatter.
- Political commentary or unrelated current events.
- Classroom management ("don't be afraid to raise hands").

Return \`segments\`, each with \`startTime\`, \`endTime\` (as shown in the transcript) and a short \`description\`.

Video Topic Summary:
${globalSummary}

Transcript:
${lines.map(formatTranscriptLine).join('\n')}
`.trim();
}
