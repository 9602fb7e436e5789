import type { SubtitleLine } from '../types/app.js';

const TIME_RE = /(\d{2}:\d{2}:\d{2},\d{3})\s*-->\s*(\d{2}:\d{2}:\d{2},\d{3})/;
const INDEX_RE = /^\s*\d+\s*$/;

export function srtTimeToSeconds(timeString: string): number {
  if (!timeString) return 0;
  const parts = timeString.trim().split(',');
  if (parts.length !== 2) return 0;
  const [time, msStr] = parts;
  const timeParts = time.split(':');
  if (timeParts.length !== 3) return 0;
  const [hoursStr, minutesStr, secondsStr] = timeParts;

  const hours = parseInt(hoursStr, 10);
  const minutes = parseInt(minutesStr, 10);
  const seconds = parseInt(secondsStr, 10);
  const ms = parseInt(msStr, 10);

  if (isNaN(hours) || isNaN(minutes) || isNaN(seconds) || isNaN(ms)) {
    return 0;
  }

  return hours * 3600 + minutes * 60 + seconds + ms / 1000;
}

/**
 * Convert seconds to SRT time format (00:00:00,000).
 * Rounds to the nearest millisecond so a parsed timestamp prints back unchanged.
 */
export function secondsToSrtTime(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds < 0)
    return '00:00:00,000';

  const totalMs = Math.round(totalSeconds * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const milliseconds = totalMs % 1000;

  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(
    2,
    '0'
  )}:${String(seconds).padStart(2, '0')},${String(milliseconds).padStart(
    3,
    '0'
  )}`;
}

// Each cue keeps all of its text lines; ids come from the block's index line.
export function parseSrt(srtString: string): SubtitleLine[] {
  if (!srtString?.trim()) return [];

  const out: SubtitleLine[] = [];
  const lines = srtString
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n');

  let i = 0;

  while (i < lines.length) {
    // find index line
    while (i < lines.length && !INDEX_RE.test(lines[i])) i++;
    if (i >= lines.length) break;
    const id = Number(lines[i].trim());
    i++;

    // find time line
    if (i >= lines.length) break;
    const tm = lines[i].match(TIME_RE);
    if (!tm) {
      // malformed block; skip to next blank
      while (i < lines.length && lines[i].trim() !== '') i++;
      i++;
      continue;
    }
    const start = srtTimeToSeconds(tm[1]);
    const end = srtTimeToSeconds(tm[2]);
    i++;

    const textLines: string[] = [];
    while (i < lines.length) {
      const line = lines[i];
      const next = lines[i + 1];
      const next2 = lines[i + 2];
      const looksLikeNextBlock =
        line.trim() === '' &&
        typeof next === 'string' &&
        INDEX_RE.test(next) &&
        typeof next2 === 'string' &&
        TIME_RE.test(next2);
      if (looksLikeNextBlock) {
        i++; // skip blank separator
        break;
      }
      textLines.push(line);
      i++;
      if (i >= lines.length) break;
      if (lines[i].trim() === '' && i + 1 >= lines.length) {
        i++;
        break;
      }
    }

    out.push({
      id,
      start,
      end,
      text: textLines.join('\n').trim(),
    });
  }

  return out;
}

export function buildSrt(lines: SubtitleLine[]): string {
  if (!lines?.length) return '';

  return (
    lines
      .map(
        line =>
          `${line.id}\n${secondsToSrtTime(line.start)} --> ${secondsToSrtTime(
            line.end
          )}\n${line.text}`
      )
      .join('\n\n') + '\n'
  );
}

export function formatTranscriptLine(line: SubtitleLine): string {
  return `[${secondsToSrtTime(line.start)} --> ${secondsToSrtTime(
    line.end
  )}] ${line.text}`;
}

/** Counts user-perceived characters by code point, not UTF-16 units. */
export function charLength(text: string): number {
  return [...text].length;
}

export function stripExtension(filePath: string): string {
  const dot = filePath.lastIndexOf('.');
  const slash = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  return dot > slash ? filePath.slice(0, dot) : filePath;
}
